/**
 * Hono Application Factory
 *
 * Builds the API app around a set of dependencies. The server entry point
 * passes real repositories over the configured database; tests pass an
 * in-memory database, a fixed clock and a fake LLM client.
 *
 * @example
 * ```typescript
 * const app = createApp(createDependencies(createDatabase(':memory:')), { logRequests: false });
 * const res = await app.request('/api/knowledge-sets');
 * ```
 */

import { Hono } from 'hono';
import { corsMiddleware, errorHandler, llmRateLimiter, loggerMiddleware } from './middleware';
import type { RateLimitConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import type { ApiDependencies } from './dependencies';
import type { ApiErrorResponse } from './types';

export interface AppOptions {
  /** Print one line per request (default true) */
  logRequests?: boolean;
  /** Origins allowed by CORS; empty means the development defaults */
  corsOrigins?: string[];
  /** Overrides for the suggestion endpoint's rate limit */
  suggestionRateLimit?: Partial<RateLimitConfig>;
}

export function createApp(deps: ApiDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logRequests ?? true) {
    app.use('*', loggerMiddleware());
  }

  app.use('*', corsMiddleware({ allowedOrigins: options.corsOrigins ?? [] }));

  // Each suggestion run makes one LLM request per letter
  app.use('/api/knowledge-sets/:id/suggestions', llmRateLimiter(options.suggestionRateLimit));

  app.route('/health', healthRoutes(deps.sessions));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) => {
    const response: ApiErrorResponse = {
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
    };
    return c.json(response, 404);
  });

  return app;
}
