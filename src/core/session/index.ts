/**
 * Session Module - Barrel Export
 *
 * In-memory registry of the live drills served over HTTP.
 *
 * @example
 * ```typescript
 * import { SessionRegistry } from '@/core/session';
 *
 * const registry = new SessionRegistry({ loader, completionLogger: completionLog });
 * const live = await registry.start(knowledgeSetId);
 * live.quiz.submitAnswer('Apple');
 * ```
 */

export {
  SessionRegistry,
  describeEvent,
  type LiveSession,
  type SessionRegistryOptions,
} from './session-registry';
