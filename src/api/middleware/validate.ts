/**
 * Zod Validation Middleware
 *
 * Validates the JSON body (or the query string) of a request against a zod
 * schema. Invalid requests are answered with 400 before the route runs;
 * valid data is stored on the context for the handler.
 *
 * @example
 * ```typescript
 * router.post('/', validate(createKnowledgeSetSchema), async (c) => {
 *   const body = getValidatedBody(c, createKnowledgeSetSchema);
 *   return success(c, await knowledgeSets.create(body), 201);
 * });
 * ```
 *
 * Error response for invalid input:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "name", "message": "Name is required" }]
 *   }
 * }
 * ```
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail, ApiErrorResponse } from '../types';

declare module 'hono' {
  interface ContextVariableMap {
    /** Request body after the validate middleware has parsed it */
    validatedBody: unknown;
    /** Query parameters after the validateQuery middleware has parsed them */
    validatedQuery: unknown;
  }
}

function toDetails(err: z.ZodError): ValidationErrorDetail[] {
  return err.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function validationFailure(c: Context, message: string, err: z.ZodError): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message,
      details: toDetails(err),
    },
  };

  return c.json(response, 400);
}

// ============================================================================
// Body Validation
// ============================================================================

export function validate<T extends z.ZodTypeAny>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        const response: ApiErrorResponse = {
          success: false,
          error: {
            code: 'INVALID_JSON',
            message: 'Request body must be valid JSON',
          },
        };
        return c.json(response, 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationFailure(c, 'Invalid request body', result.error);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

// ============================================================================
// Query Parameter Validation
// ============================================================================

export function validateQuery<T extends z.ZodTypeAny>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return validationFailure(c, 'Invalid query parameters', result.error);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}

// ============================================================================
// Typed Getters
// ============================================================================

/**
 * Reads the validated body back with the schema's output type.
 *
 * The stored value has already passed the same schema, so parsing it again
 * only re-establishes the type.
 */
export function getValidatedBody<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedBody'));
}

export function getValidatedQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedQuery'));
}
