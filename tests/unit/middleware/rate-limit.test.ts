/**
 * Rate Limiter and Request Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { Hono } from 'hono';
import { rateLimiter, loggerMiddleware, formatResponseTime } from '../../../src/api/middleware';

describe('rateLimiter', () => {
  function limitedApp(now: () => number, maxRequests = 2): Hono {
    const app = new Hono();
    app.use('*', rateLimiter({ windowMs: 60_000, maxRequests, now }));
    app.get('/', (c) => c.text('ok'));
    return app;
  }

  it('counts requests per client within a window', async () => {
    const t0 = 1_700_000_000_000;
    const app = limitedApp(() => t0);

    const first = await app.request('/', { headers: { 'x-forwarded-for': '10.0.0.1, 10.0.0.2' } });
    expect(first.status).toBe(200);
    expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(first.headers.get('X-RateLimit-Reset')).toBe(String(Math.ceil((t0 + 60_000) / 1000)));

    expect((await app.request('/', { headers: { 'x-forwarded-for': '10.0.0.1' } })).status).toBe(200);

    const third = await app.request('/', { headers: { 'x-forwarded-for': '10.0.0.1' } });
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('60');
    expect(await third.json()).toEqual({
      success: false,
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests. Please try again later.',
        details: { retryAfter: 60 },
      },
    });

    // A different client has its own count
    expect((await app.request('/', { headers: { 'x-real-ip': '10.0.0.9' } })).status).toBe(200);
  });

  it('starts a new window once the old one has passed', async () => {
    let now = 1_700_000_000_000;
    const app = limitedApp(() => now, 1);

    expect((await app.request('/')).status).toBe(200);
    expect((await app.request('/')).status).toBe(429);

    now += 60_000;
    expect((await app.request('/')).status).toBe(200);
  });

  it('keeps separate counts for separate limiters', async () => {
    const now = () => 1_700_000_000_000;
    const a = limitedApp(now, 1);
    const b = limitedApp(now, 1);

    expect((await a.request('/')).status).toBe(200);
    expect((await b.request('/')).status).toBe(200);
  });
});

describe('loggerMiddleware', () => {
  function loggedApp(lines: string[], colorize = false): Hono {
    const app = new Hono();
    app.use('*', loggerMiddleware({ colorize, write: (line) => lines.push(line) }));
    app.get('/health', (c) => c.text('ok'));
    app.get('/api/things', (c) => c.json([], 200));
    return app;
  }

  it('writes one line per request and skips health checks', async () => {
    const lines: string[] = [];
    const app = loggedApp(lines);

    await app.request('/health');
    await app.request('/api/things');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET \/api\/things 200 - \d+ms$/);
  });

  it('colors the method, status and time for a terminal', async () => {
    const lines: string[] = [];

    await loggedApp(lines, true).request('/api/things');

    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith('[API] \x1b[36mGET    \x1b[0m /api/things \x1b[32m200\x1b[0m - ')).toBe(true);
    expect(stripVTControlCharacters(lines[0])).toMatch(/^\[API\] GET {5}\/api\/things 200 - \d+ms$/);
  });

  it('formats response times', () => {
    expect(formatResponseTime(12)).toBe('12ms');
    expect(formatResponseTime(1500)).toBe('1.50s');
  });
});
