import { randomUUID } from 'node:crypto';

/**
 * Prefixes tell record kinds apart at a glance:
 * knowledge set, knowledge entry, completion record, quiz session.
 */
export type IdPrefix = 'ks' | 'ke' | 'cr' | 'qs';

/**
 * Generates a prefixed UUID, e.g. `ks_0b6f5c1e-...`.
 */
export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID()}`;
}
