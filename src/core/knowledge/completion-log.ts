/**
 * Completion Log
 *
 * Persists the record a QuizSession emits when its final review is cleared
 * and serves the history listing. Plugs into QuizSession as its
 * CompletionLogger.
 */

import type { CompletionRecordRepository } from '../../storage/repositories/completion-record.repository';
import type { CompletionHistoryEntry, CompletionRecord } from '../models';
import type { CompletionLogger } from '../quiz';

export class CompletionLog implements CompletionLogger {
  constructor(private readonly records: Pick<CompletionRecordRepository, 'create' | 'findRecent'>) {}

  /**
   * Writes one record. A failed write is logged and rethrown; the session
   * that produced the record is not affected either way.
   */
  async record(record: CompletionRecord): Promise<void> {
    try {
      await this.records.create(record);
      console.log(
        `[CompletionLog] Recorded completion of ${record.knowledgeSetId} at ${record.timestamp.toISOString()}`
      );
    } catch (error) {
      console.error(`[CompletionLog] Failed to write completion for ${record.knowledgeSetId}:`, error);
      throw error;
    }
  }

  /**
   * Completed drills, most recent first.
   */
  async history(limit?: number): Promise<CompletionHistoryEntry[]> {
    return this.records.findRecent(limit);
  }
}
