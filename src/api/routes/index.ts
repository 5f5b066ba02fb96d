/**
 * API Routes Aggregator
 *
 * Route Structure:
 * - /health - Health check (mounted at root by createApp, not under /api)
 * - /api - API root with version info
 * - /api/knowledge-sets - Knowledge sets and their entries
 * - /api/sessions - Live drill sessions
 * - /api/results - Completion history
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import type { ApiDependencies } from '../dependencies';
import { APP_VERSION } from './health';
import { knowledgeSetsRoutes } from './knowledge-sets';
import { sessionsRoutes } from './sessions';
import { resultsRoutes } from './results';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { knowledgeSetsRoutes, type ImportSummary } from './knowledge-sets';
export { sessionsRoutes, toSessionView } from './sessions';
export { resultsRoutes } from './results';

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'ABC Drill API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/knowledge-sets', description: 'Knowledge sets and their A–Z entries' },
        { path: '/api/knowledge-sets/:id/suggestions', description: 'Fill a set from a category via the LLM' },
        { path: '/api/sessions', description: 'Practice, quiz and final review sessions' },
        { path: '/api/results', description: 'Completed drills' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/knowledge-sets', knowledgeSetsRoutes(deps));
  router.route('/sessions', sessionsRoutes(deps));
  router.route('/results', resultsRoutes(deps));

  return router;
}

export default createApiRouter;
