/**
 * Sessions API Routes
 *
 * Drives live drill sessions held in the SessionRegistry. Every response
 * carries the session view, so a client can render the current stage,
 * active key and lockout countdown without a second request.
 *
 * Routes:
 * - POST   /                         - Start a session for a knowledge set
 * - GET    /:id                      - Session state and progress
 * - GET    /:id/practice             - Current practice window
 * - POST   /:id/practice/:direction  - Move to the next/previous window
 * - POST   /:id/advance              - Leave practice for the quiz
 * - POST   /:id/answers              - Submit an answer
 * - DELETE /:id                      - Abandon a session
 *
 * Submissions made in the wrong stage answer 409 with
 * SUBMISSION_NOT_ACCEPTED or INVALID_STAGE_TRANSITION (see error-handler).
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { getValidatedBody, notFoundError, validate, validationError } from '../middleware';
import { startSessionSchema, submitAnswerSchema } from '../types';
import type { SessionView, SubmissionView } from '../types';
import type { ApiDependencies } from '../dependencies';
import type { LiveSession } from '../../core/session';

type SessionDeps = Pick<ApiDependencies, 'sessions' | 'clock'>;

export function toSessionView(live: LiveSession, now: number): SessionView {
  return {
    id: live.id,
    knowledgeSetId: live.knowledgeSetId,
    knowledgeSetName: live.knowledgeSetName,
    stage: live.quiz.currentStage(),
    startedAt: live.startedAt.toISOString(),
    progress: live.quiz.progressSummary(now),
  };
}

function isDirection(value: string): value is 'next' | 'previous' {
  return value === 'next' || value === 'previous';
}

export function sessionsRoutes(deps: SessionDeps): Hono {
  const router = new Hono();
  const { sessions, clock } = deps;

  function requireSession(id: string): LiveSession {
    const live = sessions.get(id);
    if (!live) {
      throw notFoundError('Session', id);
    }
    return live;
  }

  /**
   * Starting a session for a set that already has one replaces it.
   */
  router.post('/', validate(startSessionSchema), async (c) => {
    const body = getValidatedBody(c, startSessionSchema);
    const live = await sessions.start(body.knowledgeSetId);
    return success(c, toSessionView(live, clock()), 201);
  });

  router.get('/:id', (c) => {
    const live = requireSession(c.req.param('id'));
    return success(c, toSessionView(live, clock()));
  });

  router.get('/:id/practice', (c) => {
    const live = requireSession(c.req.param('id'));
    return success(c, live.quiz.practiceWindow());
  });

  router.post('/:id/practice/:direction', (c) => {
    const live = requireSession(c.req.param('id'));
    const direction = c.req.param('direction');
    if (!isDirection(direction)) {
      throw validationError("Direction must be 'next' or 'previous'", { direction });
    }
    return success(c, live.quiz.navigatePractice(direction));
  });

  router.post('/:id/advance', (c) => {
    const live = requireSession(c.req.param('id'));
    const result = live.quiz.advanceStage();
    const view: SubmissionView = { result, session: toSessionView(live, clock()) };
    return success(c, view);
  });

  router.post('/:id/answers', validate(submitAnswerSchema), (c) => {
    const live = requireSession(c.req.param('id'));
    const body = getValidatedBody(c, submitAnswerSchema);

    const now = clock();
    const result = live.quiz.submitAnswer(body.answer, now);
    const view: SubmissionView = { result, session: toSessionView(live, now) };
    return success(c, view);
  });

  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    requireSession(id);
    sessions.remove(id);
    return success(c, { id, abandoned: true });
  });

  return router;
}
