/**
 * API Middleware - Barrel Export
 *
 * Order of application in createApp():
 *
 * 1. Logger - logs request information
 * 2. CORS - handles cross-origin requests
 * 3. Rate limiter - on the suggestion endpoint only
 * 4. Error handler - registered with app.onError
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  notFoundError,
  validationError,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, formatResponseTime, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export { validate, validateQuery, getValidatedBody, getValidatedQuery } from './validate';

export { rateLimiter, llmRateLimiter, RATE_LIMITS, type RateLimitConfig } from './rate-limit';
