/**
 * CompletionRecord Domain Types
 *
 * A CompletionRecord is written once, when a learner clears the final review
 * of a knowledge set. It is the only history the drill keeps.
 */

/**
 * Outcome written to the completion log. Only finished drills are logged.
 */
export type CompletionStatus = 'completed';

/**
 * Record handed to the completion logger on Final → Complete.
 * Never mutated after creation.
 */
export interface CompletionRecord {
  /** When the last key of the final review was cleared */
  timestamp: Date;
  /** The knowledge set the session ran over */
  knowledgeSetId: string;
  status: CompletionStatus;
}

/**
 * A persisted completion record, joined with the set's current name for
 * history listings.
 */
export interface CompletionHistoryEntry extends CompletionRecord {
  id: string;
  /** Name of the knowledge set, or null if the set has since been deleted */
  knowledgeSetName: string | null;
}
