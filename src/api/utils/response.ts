/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelope (see types.ts).
 *
 * @example
 * ```typescript
 * import { success, notFound } from '@/api/utils/response';
 *
 * router.get('/:id', async (c) => {
 *   const set = await knowledgeSets.findById(c.req.param('id'));
 *   if (!set) {
 *     return notFound(c, 'KnowledgeSet', c.req.param('id'));
 *   }
 *   return success(c, set);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Creates a standardized success response.
 *
 * @param statusCode - Defaults to 200; use 201 for created resources
 */
export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helpers
// ============================================================================

/**
 * Creates a standardized error response.
 *
 * @param code - Machine-readable error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR')
 * @param statusCode - Defaults to 400
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

/**
 * 404 for a resource looked up by id.
 *
 * @param resource - Resource type name (e.g., 'KnowledgeSet', 'Session')
 */
export function notFound(c: Context, resource: string, id: string): Response {
  return error(c, 'NOT_FOUND', `${resource} with id '${id}' not found`, 404, { resource, id });
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, 'BAD_REQUEST', message, 400, details);
}
