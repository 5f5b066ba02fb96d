/**
 * CORS Middleware
 *
 * Wraps Hono's cors() with the project's defaults. Allowed origins come
 * from ALLOWED_ORIGINS (see config.ts); the defaults cover local front-end
 * dev servers.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  credentials: boolean;
  /** Preflight cache duration in seconds */
  maxAge: number;
}

const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:4173'],
  allowedMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
  credentials: false,
  maxAge: 86400,
};

/**
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */
export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };

  // An empty list from config means "use the defaults"
  const origins =
    finalConfig.allowedOrigins.length > 0
      ? finalConfig.allowedOrigins
      : DEFAULT_CORS_CONFIG.allowedOrigins;

  return cors({
    origin: origins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    credentials: finalConfig.credentials,
    maxAge: finalConfig.maxAge,
  });
}

export { DEFAULT_CORS_CONFIG };
