/**
 * Global Error Handler
 *
 * Turns anything thrown by a route into the standard error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Domain errors from the quiz engine, the knowledge store and the LLM client
 * are mapped to fixed status codes here, so routes can simply let them
 * propagate.
 *
 * Register it with `app.onError`. Hono routes handler errors to the
 * onError hook rather than back up through middleware.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/locked', () => {
 *   throw new AppError('FORBIDDEN', 'Not allowed', 403);
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { QuizStateError, InvalidKnowledgeSetError } from '../../core/quiz';
import {
  DuplicateKnowledgeSetNameError,
  EmptyKnowledgeSetError,
  KnowledgeSetNotFoundError,
} from '../../core/knowledge';
import { LLMError } from '../../llm/types';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  CONFLICT: 'CONFLICT',
  EMPTY_KNOWLEDGE_SET: 'EMPTY_KNOWLEDGE_SET',
  INVALID_KNOWLEDGE_SET: 'INVALID_KNOWLEDGE_SET',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  LLM_ERROR: 'LLM_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Application error with an explicit status code.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Session not found', 404, { id });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

interface FormattedError {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
}

function formatted(
  code: string,
  message: string,
  statusCode: ContentfulStatusCode,
  details?: unknown
): FormattedError {
  return {
    response: {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined && { details }),
      },
    },
    statusCode,
  };
}

/**
 * Maps a thrown value to its envelope and status.
 */
export function formatErrorResponse(err: unknown, isDev: boolean): FormattedError {
  if (err instanceof AppError) {
    return formatted(err.code, err.message, err.statusCode, err.details);
  }

  if (err instanceof QuizStateError) {
    return formatted(err.code, err.message, 409, { stage: err.stage });
  }

  if (err instanceof KnowledgeSetNotFoundError) {
    return formatted(ErrorCodes.NOT_FOUND, err.message, 404, {
      resource: 'KnowledgeSet',
      id: err.reference,
    });
  }

  if (err instanceof DuplicateKnowledgeSetNameError) {
    return formatted(ErrorCodes.CONFLICT, err.message, 409, { name: err.setName });
  }

  if (err instanceof EmptyKnowledgeSetError) {
    return formatted(ErrorCodes.EMPTY_KNOWLEDGE_SET, err.message, 422, {
      knowledgeSetId: err.knowledgeSetId,
    });
  }

  if (err instanceof InvalidKnowledgeSetError) {
    return formatted(ErrorCodes.INVALID_KNOWLEDGE_SET, err.message, 422);
  }

  if (err instanceof LLMError) {
    switch (err.type) {
      case 'authentication':
        return formatted(ErrorCodes.SERVICE_UNAVAILABLE, err.message, 503, { llmError: err.type });
      case 'rate_limit':
        return formatted(ErrorCodes.RATE_LIMITED, err.message, 429, { llmError: err.type });
      default:
        return formatted(ErrorCodes.LLM_ERROR, err.message, 502, { llmError: err.type });
    }
  }

  if (err instanceof Error) {
    return formatted(
      ErrorCodes.INTERNAL_ERROR,
      isDev ? err.message : 'An unexpected error occurred. Please try again.',
      500,
      isDev ? { stack: err.stack } : undefined
    );
  }

  return formatted(
    ErrorCodes.INTERNAL_ERROR,
    'An unexpected error occurred',
    500,
    isDev ? { rawError: String(err) } : undefined
  );
}

/**
 * Creates the handler to pass to `app.onError`.
 *
 * Only unexpected errors (500s) are logged; mapped domain errors are
 * ordinary client outcomes.
 */
export function errorHandler(): ErrorHandler {
  return (err: Error, c: Context) => {
    const isDev = process.env.NODE_ENV !== 'production';
    const { response, statusCode } = formatErrorResponse(err, isDev);

    if (statusCode >= 500) {
      console.error('[Error Handler]', err);
    }

    return c.json(response, statusCode);
  };
}

/**
 * 404 error for a resource looked up by id.
 *
 * @example
 * ```typescript
 * const session = registry.get(id);
 * if (!session) {
 *   throw notFoundError('Session', id);
 * }
 * ```
 */
export function notFoundError(resource: string, id: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} with id '${id}' not found`, 404, {
    resource,
    id,
  });
}

export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
