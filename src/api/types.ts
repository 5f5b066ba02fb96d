/**
 * API Types and Request Schemas
 *
 * Every endpoint answers with the same envelope:
 *
 * ```json
 * { "success": true, "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": { ... } } }
 * ```
 *
 * Request bodies are validated with the zod schemas below (see the
 * `validate` middleware).
 */

import { z } from 'zod';
import type { ProgressSummary, Stage, SubmissionResult } from '@/core/quiz';

// ============================================================================
// Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code (e.g. 'NOT_FOUND', 'SUBMISSION_NOT_ACCEPTED') */
  code: string;

  message: string;

  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One failed field from a zod validation.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path, e.g. 'values.0' */
  path: string;
  message: string;
}

// ============================================================================
// Knowledge Set Schemas
// ============================================================================

const setName = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(100, 'Name must be 100 characters or less');

export const createKnowledgeSetSchema = z.object({
  name: setName,
});

export const updateKnowledgeSetSchema = z.object({
  name: setName,
});

/**
 * Values may be sent as a list or as a single comma-separated cell.
 */
export const setEntryValuesSchema = z.object({
  values: z.union([
    z.array(z.string().max(200, 'Values must be 200 characters or less')).max(100),
    z.string().max(5000, 'Cell must be 5000 characters or less'),
  ]),
});

export const clearEntriesSchema = z.object({
  keys: z.array(z.string().trim().min(1)).min(1, 'At least one key is required'),
});

export const generateSuggestionsSchema = z.object({
  category: z.string().trim().min(1, 'Category is required').max(200),
  perKey: z.number().int().min(1).max(10).optional(),
});

export const importItemsSchema = z.object({
  items: z.array(z.string().max(200)).min(1, 'At least one item is required').max(1000),
});

// ============================================================================
// Session Schemas
// ============================================================================

export const startSessionSchema = z.object({
  knowledgeSetId: z.string().min(1, 'knowledgeSetId is required'),
});

export const submitAnswerSchema = z.object({
  /** Blank answers are accepted here and reported as blank_input */
  answer: z.string().max(500, 'Answer must be 500 characters or less'),
});

export const resultsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type CreateKnowledgeSetBody = z.infer<typeof createKnowledgeSetSchema>;
export type SetEntryValuesBody = z.infer<typeof setEntryValuesSchema>;
export type SubmitAnswerBody = z.infer<typeof submitAnswerSchema>;

// ============================================================================
// Session Views
// ============================================================================

/**
 * Session state returned by every session endpoint.
 */
export interface SessionView {
  id: string;
  knowledgeSetId: string;
  knowledgeSetName: string;
  stage: Stage;
  startedAt: string;
  progress: ProgressSummary;
}

export interface SubmissionView {
  result: SubmissionResult;
  session: SessionView;
}
