/**
 * Review Gate
 *
 * A timed lockout that forces the learner to pause and review after
 * repeated failure. The gate is a declarative deadline: it never sleeps or
 * schedules timers. Callers ask {@link ReviewGate.isActive} on each
 * interaction (or on a periodic wake, e.g. every 500ms) and render
 * {@link ReviewGate.remaining} as a countdown.
 *
 * Once `now >= expiresAt`, the next check clears the gate.
 */

/**
 * Length of every review pause, in seconds. Not user-configurable.
 */
export const REVIEW_PAUSE_SECONDS = 45;

/**
 * Source of the current time in milliseconds since epoch.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export class ReviewGate {
  private expiresAtMs: number | null = null;

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Starts (or restarts) a lockout lasting `durationSeconds` from `now`.
   */
  activate(durationSeconds: number = REVIEW_PAUSE_SECONDS, now: number = this.clock()): void {
    this.expiresAtMs = now + durationSeconds * 1000;
  }

  /**
   * Whether submissions are currently blocked. Clears an expired gate.
   */
  isActive(now: number = this.clock()): boolean {
    if (this.expiresAtMs === null) {
      return false;
    }
    if (now >= this.expiresAtMs) {
      this.expiresAtMs = null;
      return false;
    }
    return true;
  }

  /**
   * Whole seconds left before the gate opens, rounded up; 0 when inactive.
   */
  remaining(now: number = this.clock()): number {
    if (!this.isActive(now) || this.expiresAtMs === null) {
      return 0;
    }
    return Math.ceil((this.expiresAtMs - now) / 1000);
  }

  clear(): void {
    this.expiresAtMs = null;
  }

  /**
   * Deadline of the current lockout, or null when none is in force.
   * Does not clear an expired gate; use {@link isActive} for that.
   */
  get expiresAt(): Date | null {
    return this.expiresAtMs === null ? null : new Date(this.expiresAtMs);
  }
}
