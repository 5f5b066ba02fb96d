/**
 * Error Handler Tests
 *
 * Domain errors map to fixed status codes; anything else is a 500 whose
 * message is only shown outside production.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Hono } from 'hono';
import { AppError, errorHandler, formatErrorResponse, notFoundError } from '../../../src/api/middleware';
import { InvalidKnowledgeSetError, QuizStateError } from '../../../src/core/quiz';
import {
  DuplicateKnowledgeSetNameError,
  EmptyKnowledgeSetError,
  KnowledgeSetNotFoundError,
} from '../../../src/core/knowledge';
import { LLMError } from '../../../src/llm/types';

describe('formatErrorResponse', () => {
  it('keeps the code, status and details of an AppError', () => {
    const { response, statusCode } = formatErrorResponse(notFoundError('Session', 'qs_1'), false);

    expect(statusCode).toBe(404);
    expect(response).toEqual({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: "Session with id 'qs_1' not found",
        details: { resource: 'Session', id: 'qs_1' },
      },
    });
  });

  it('maps quiz state errors to 409 with the stage', () => {
    const err = new QuizStateError('NAVIGATION_NOT_AVAILABLE', 'final', 'Practice is over');

    expect(formatErrorResponse(err, false)).toEqual({
      statusCode: 409,
      response: {
        success: false,
        error: { code: 'NAVIGATION_NOT_AVAILABLE', message: 'Practice is over', details: { stage: 'final' } },
      },
    });
  });

  it.each([
    [new KnowledgeSetNotFoundError('Fruit'), 404, 'NOT_FOUND'],
    [new DuplicateKnowledgeSetNameError('Fruit'), 409, 'CONFLICT'],
    [new EmptyKnowledgeSetError('ks_fruit'), 422, 'EMPTY_KNOWLEDGE_SET'],
    [new InvalidKnowledgeSetError('bad set'), 422, 'INVALID_KNOWLEDGE_SET'],
    [new LLMError('no key', 'authentication'), 503, 'SERVICE_UNAVAILABLE'],
    [new LLMError('slow down', 'rate_limit'), 429, 'RATE_LIMITED'],
    [new LLMError('timed out', 'timeout'), 502, 'LLM_ERROR'],
  ])('maps %s', (err, status, code) => {
    const { response, statusCode } = formatErrorResponse(err, false);

    expect(statusCode).toBe(status);
    expect(response.error.code).toBe(code);
    expect(response.error.message).toBe(err.message);
  });

  it('hides unexpected messages in production', () => {
    const err = new Error('database is locked');

    expect(formatErrorResponse(err, false).response.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again.',
    });
    expect(formatErrorResponse(err, true).response.error.message).toBe('database is locked');
  });
});

describe('errorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function appThrowing(err: Error): Hono {
    const app = new Hono();
    app.onError(errorHandler());
    app.get('/boom', () => {
      throw err;
    });
    return app;
  }

  it('answers with the mapped envelope without logging client errors', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const response = await appThrowing(new AppError('TEAPOT', 'Short and stout', 418)).request('/boom');

    expect(response.status).toBe(418);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: 'TEAPOT', message: 'Short and stout' },
    });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('logs unexpected errors', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const err = new Error('disk full');

    const response = await appThrowing(err).request('/boom');

    expect(response.status).toBe(500);
    expect(errorSpy).toHaveBeenCalledWith('[Error Handler]', err);
  });
});
