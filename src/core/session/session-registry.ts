/**
 * Session Registry
 *
 * Keeps the live QuizSessions of this process in memory, keyed by session
 * id. Sessions are not persisted; a restart drops them, and only completed
 * drills leave a trace (through the completion log).
 *
 * At most one live session exists per knowledge set. Starting a drill for
 * a set that already has one replaces it, which is how a learner restarts.
 */

import { generateId } from '../models';
import type { KnowledgeSet } from '../models';
import {
  QuizSession,
  systemClock,
  type Clock,
  type CompletionLogger,
  type QuizEvent,
  type RandomSource,
} from '../quiz';

export interface LiveSession {
  /** 'qs_' + uuid */
  id: string;
  knowledgeSetId: string;
  knowledgeSetName: string;
  startedAt: Date;
  quiz: QuizSession;
}

export interface SessionRegistryOptions {
  /** Produces the snapshot a session runs over; throws if it cannot start */
  loader: { load(knowledgeSetId: string): Promise<KnowledgeSet> };
  completionLogger?: CompletionLogger;
  clock?: Clock;
  random?: RandomSource;
  /** Log session events to the console (default true) */
  logEvents?: boolean;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, LiveSession>();
  private readonly clock: Clock;

  constructor(private readonly options: SessionRegistryOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Loads the set and starts a new session at the practice stage.
   *
   * @throws KnowledgeSetNotFoundError / EmptyKnowledgeSetError from the loader
   */
  async start(knowledgeSetId: string): Promise<LiveSession> {
    const knowledgeSet = await this.options.loader.load(knowledgeSetId);

    const quiz = new QuizSession(knowledgeSet, {
      completionLogger: this.options.completionLogger,
      clock: this.clock,
      random: this.options.random,
    });

    for (const existing of this.sessions.values()) {
      if (existing.knowledgeSetId === knowledgeSet.id) {
        this.sessions.delete(existing.id);
        console.log(`[SessionRegistry] Replaced session ${existing.id} for ${knowledgeSet.id}`);
      }
    }

    const live: LiveSession = {
      id: generateId('qs'),
      knowledgeSetId: knowledgeSet.id,
      knowledgeSetName: knowledgeSet.name,
      startedAt: new Date(this.clock()),
      quiz,
    };

    if (this.options.logEvents ?? true) {
      quiz.setEventListener((event) => console.log(`[QuizSession] ${live.id}: ${describeEvent(event)}`));
    }

    this.sessions.set(live.id, live);
    console.log(
      `[SessionRegistry] Started session ${live.id} for '${knowledgeSet.name}' (${knowledgeSet.entries.size} keys)`
    );
    return live;
  }

  get(sessionId: string): LiveSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Drops a session. Returns false if it was not live.
   */
  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Drops every session over the given set, e.g. after the set is deleted.
   */
  removeForKnowledgeSet(knowledgeSetId: string): number {
    let removed = 0;
    for (const live of this.sessions.values()) {
      if (live.knowledgeSetId === knowledgeSetId) {
        this.sessions.delete(live.id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * One-line description of a session event for the log.
 */
export function describeEvent(event: QuizEvent): string {
  switch (event.type) {
    case 'stage_advanced':
      return `stage ${event.from} -> ${event.to}`;
    case 'key_completed':
      return `${event.stage} key '${event.key}' completed`;
    case 'required_correct_raised':
      return `key '${event.key}' now needs ${event.requiredCorrect} correct`;
    case 'gate_activated':
      return `review gate (${event.reason}) until ${event.expiresAt.toISOString()}`;
    case 'final_restarted':
      return `final review restarted after '${event.failedKey}'`;
    case 'session_completed':
      return `completed at ${event.record.timestamp.toISOString()}`;
  }
}
