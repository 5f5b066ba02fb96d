/**
 * Rate Limiting Middleware
 *
 * Fixed-window request limits per client, tracked in memory. Used to cap
 * the suggestion endpoint, where one request fans out to 26 LLM calls.
 *
 * Limit state is reported in headers:
 * - X-RateLimit-Limit / X-RateLimit-Remaining / X-RateLimit-Reset
 *
 * When the limit is hit the request is answered with 429:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "RATE_LIMITED",
 *     "message": "Too many requests. Please try again later.",
 *     "details": { "retryAfter": 45 }
 *   }
 * }
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';
import type { ApiErrorResponse } from '../types';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  /** Identifies the client; defaults to the forwarded IP */
  keyGenerator?: (c: Context) => string;
  message?: string;
  /** Defaults to Date.now */
  now?: () => number;
}

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export const RATE_LIMITS = {
  /** Suggestion runs: each one makes a request per letter */
  LLM: {
    windowMs: 60_000,
    maxRequests: 5,
  },
} as const;

/** Expired windows are swept once the store grows past this */
const SWEEP_THRESHOLD = 1000;

function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    const [first] = forwardedFor.split(',');
    return first.trim();
  }

  return c.req.header('x-real-ip') ?? 'unknown-client';
}

/**
 * Each call creates its own store, so separately mounted limiters (and
 * separate app instances in tests) never share counts.
 *
 * @example
 * ```typescript
 * app.use('/api/knowledge-sets/:id/suggestions', rateLimiter(RATE_LIMITS.LLM));
 * ```
 */
export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
    now: clock = Date.now,
  } = config;

  const store = new Map<string, RateLimitEntry>();

  function sweep(now: number): void {
    for (const [key, entry] of store) {
      if (now - entry.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }

  return async (c: Context, next) => {
    const now = clock();
    const clientKey = keyGenerator(c);

    if (store.size > SWEEP_THRESHOLD) {
      sweep(now);
    }

    let entry = store.get(clientKey);
    if (!entry || now - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: now };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);
      c.header('Retry-After', String(retryAfter));

      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: 'RATE_LIMITED',
          message,
          details: { retryAfter },
        },
      };
      return c.json(response, 429);
    }

    entry.count++;
    await next();
  };
}

export function llmRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({
    ...RATE_LIMITS.LLM,
    ...overrides,
  });
}
