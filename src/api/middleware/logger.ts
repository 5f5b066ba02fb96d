/**
 * Request Logger Middleware
 *
 * Writes one line per request with the method, path, status and how long the
 * handler took:
 * ```
 * [API] GET /api/knowledge-sets 200 - 4ms
 * [API] POST /api/sessions/qs_.../answers 409 - 1ms
 * [API] POST /api/knowledge-sets/ks_.../suggestions 200 - 8.42s
 * ```
 *
 * Requests under `/health` are not logged.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', loggerMiddleware());
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';

/**
 * Configuration options for the logger middleware
 */
export interface LoggerConfig {
  /** Prefix for every line */
  prefix: string;
  /** Prepend an ISO timestamp */
  includeTimestamp: boolean;
  /** Path prefixes that are not logged */
  skipPaths: string[];
  /** Color the method, status and time for a terminal */
  colorize: boolean;
  /** Where lines go; defaults to console.log */
  write: (line: string) => void;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

/**
 * Color for a status code.
 * - 2xx: green
 * - 3xx: cyan
 * - 4xx: yellow (a 409 from a stage conflict or a 429 from the suggestion limit)
 * - 5xx: red, including 502/503 when the LLM is unreachable
 */
function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

/**
 * Color for a method: reads are cyan, creates and drill actions (POST) green,
 * entry edits yellow, deletes red.
 */
function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PUT':
    case 'PATCH':
      return colors.yellow;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

/**
 * Milliseconds below one second, seconds with two decimals above.
 *
 * @example
 * formatResponseTime(12);   // "12ms"
 * formatResponseTime(1500); // "1.50s"
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Creates the request logger.
 *
 * The line is written after the handler (and the error handler) has run, so
 * the status is the one the client received.
 *
 * @param config - Overrides for DEFAULT_LOGGER_CONFIG
 *
 * @example
 * ```typescript
 * // Collect lines in a test
 * const lines: string[] = [];
 * app.use('*', loggerMiddleware({ colorize: false, write: (line) => lines.push(line) }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c: Context, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    const method = c.req.method;
    const status = c.res.status;

    let line: string;
    if (finalConfig.colorize) {
      line = [
        finalConfig.prefix,
        `${getMethodColor(method)}${method.padEnd(7)}${colors.reset}`,
        path,
        `${getStatusColor(status)}${status}${colors.reset}`,
        '-',
        `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
      ].join(' ');
    } else {
      // Plain form for production log collectors
      line = `${finalConfig.prefix} ${method} ${path} ${status} - ${formatResponseTime(responseTime)}`;
    }

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    finalConfig.write(line);
  };
}

export { DEFAULT_LOGGER_CONFIG };
