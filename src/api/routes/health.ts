/**
 * Health Check Route
 *
 * Lightweight liveness endpoint; does not touch the database.
 *
 * ```bash
 * curl http://localhost:3000/health
 * # { "success": true, "data": { "status": "ok", "activeSessions": 0, ... } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import type { SessionRegistry } from '../../core/session';

export interface HealthCheckData {
  status: 'ok';
  timestamp: string;
  environment: string;
  version: string;
  /** Live drill sessions held in memory */
  activeSessions: number;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(sessions: Pick<SessionRegistry, 'size'>): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      activeSessions: sessions.size,
    };

    return success(c, healthData);
  });

  return router;
}
