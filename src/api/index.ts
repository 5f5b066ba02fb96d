/**
 * API Module - Barrel Export
 *
 * The HTTP surface of the drill: a Hono app over knowledge sets, live
 * sessions and completion history.
 *
 * @example
 * ```typescript
 * import { createApp, createDependencies } from '@/api';
 * import { createDatabase } from '@/storage';
 *
 * const app = createApp(createDependencies(createDatabase(':memory:')));
 * ```
 */

export { createApp, type AppOptions } from './app';
export { createDependencies, type ApiDependencies, type DependencyOverrides } from './dependencies';

export {
  corsMiddleware,
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  notFoundError,
  validationError,
  loggerMiddleware,
  rateLimiter,
  llmRateLimiter,
  RATE_LIMITS,
  validate,
  validateQuery,
  getValidatedBody,
  getValidatedQuery,
  type ErrorCode,
  type RateLimitConfig,
} from './middleware';

export { createApiRouter, healthRoutes, toSessionView, type ApiInfo } from './routes';

export type {
  ApiResponse,
  ApiError,
  ApiErrorResponse,
  ApiResult,
  ValidationErrorDetail,
  SessionView,
  SubmissionView,
} from './types';

export { success, error, notFound, badRequest } from './utils/response';
