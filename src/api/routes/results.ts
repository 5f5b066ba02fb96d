/**
 * Results API Route
 *
 * - GET / - Completed drills, most recent first (`?limit=` caps the list)
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { getValidatedQuery, validateQuery } from '../middleware';
import { resultsQuerySchema } from '../types';
import type { ApiDependencies } from '../dependencies';

export function resultsRoutes(deps: Pick<ApiDependencies, 'completionLog'>): Hono {
  const router = new Hono();

  router.get('/', validateQuery(resultsQuerySchema), async (c) => {
    const query = getValidatedQuery(c, resultsQuerySchema);
    return success(c, await deps.completionLog.history(query.limit));
  });

  return router;
}
