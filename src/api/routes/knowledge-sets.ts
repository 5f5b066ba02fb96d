/**
 * Knowledge Sets API Routes
 *
 * CRUD for knowledge sets and their A–Z entries, plus the two ways of
 * filling a set in bulk: LLM suggestions for a category, and a plain list
 * of items grouped by first letter.
 *
 * Routes:
 * - GET    /                          - List all sets
 * - POST   /                          - Create a set (26 empty keys)
 * - GET    /:id                       - Get one set
 * - PATCH  /:id                       - Rename a set
 * - DELETE /:id                       - Delete a set and its entries
 * - GET    /:id/entries               - List entries in template order
 * - PUT    /:id/entries/:key          - Set the values of one key
 * - POST   /:id/entries/clear         - Empty one or more keys
 * - POST   /:id/suggestions           - Generate entries for a category and import them
 * - POST   /:id/import                - Import a list of items grouped by first letter
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { getValidatedBody, validate, validationError } from '../middleware';
import {
  clearEntriesSchema,
  createKnowledgeSetSchema,
  generateSuggestionsSchema,
  importItemsSchema,
  setEntryValuesSchema,
  updateKnowledgeSetSchema,
} from '../types';
import type { ApiDependencies } from '../dependencies';
import type { KnowledgeEntry, KnowledgeSetRecord } from '../../core/models';
import {
  KnowledgeSetNotFoundError,
  cleanValues,
  normalizeEntryKey,
  parseValueList,
} from '../../core/knowledge';
import { groupByInitial, importSuggestions } from '../../core/suggestions';

type KnowledgeSetDeps = Pick<
  ApiDependencies,
  'knowledgeSets' | 'knowledgeEntries' | 'sessions' | 'suggestions'
>;

/**
 * Result of a bulk fill.
 */
export interface ImportSummary {
  /** Keys that ended up with at least one value */
  populatedKeys: number;
  entries: KnowledgeEntry[];
}

function summarize(entries: KnowledgeEntry[]): ImportSummary {
  return {
    populatedKeys: entries.filter((entry) => entry.values.length > 0).length,
    entries,
  };
}

export function knowledgeSetsRoutes(deps: KnowledgeSetDeps): Hono {
  const router = new Hono();
  const { knowledgeSets, knowledgeEntries } = deps;

  async function requireSet(id: string): Promise<KnowledgeSetRecord> {
    const set = await knowledgeSets.findById(id);
    if (!set) {
      throw new KnowledgeSetNotFoundError(id);
    }
    return set;
  }

  // ==========================================================================
  // Sets
  // ==========================================================================

  router.get('/', async (c) => {
    return success(c, await knowledgeSets.findAll());
  });

  router.post('/', validate(createKnowledgeSetSchema), async (c) => {
    const body = getValidatedBody(c, createKnowledgeSetSchema);
    const created = await knowledgeSets.create({ name: body.name });
    console.log(`[KnowledgeSets] Created '${created.name}' (${created.id})`);
    return success(c, created, 201);
  });

  router.get('/:id', async (c) => {
    return success(c, await requireSet(c.req.param('id')));
  });

  router.patch('/:id', validate(updateKnowledgeSetSchema), async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    const body = getValidatedBody(c, updateKnowledgeSetSchema);
    return success(c, await knowledgeSets.update(id, { name: body.name }));
  });

  /**
   * Live sessions over the set are dropped with it; completion history
   * is kept.
   */
  router.delete('/:id', async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    await knowledgeSets.delete(id);
    const endedSessions = deps.sessions.removeForKnowledgeSet(id);
    console.log(`[KnowledgeSets] Deleted ${id}`);
    return success(c, { id, deleted: true, endedSessions });
  });

  // ==========================================================================
  // Entries
  // ==========================================================================

  router.get('/:id/entries', async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    return success(c, await knowledgeEntries.findBySetId(id));
  });

  /**
   * Body: `{ "values": ["Apple", "Apricot"] }` or `{ "values": "Apple, Apricot" }`.
   * An empty list leaves the key in place with no values.
   */
  router.put('/:id/entries/:key', validate(setEntryValuesSchema), async (c) => {
    const id = c.req.param('id');
    const key = normalizeEntryKey(c.req.param('key'));
    if (key.length === 0) {
      throw validationError('Key must not be blank');
    }

    await requireSet(id);
    const body = getValidatedBody(c, setEntryValuesSchema);
    const values = typeof body.values === 'string' ? parseValueList(body.values) : cleanValues(body.values);

    const entry = await knowledgeEntries.setValues(id, key, values);
    await knowledgeSets.touch(id);
    return success(c, entry);
  });

  router.post('/:id/entries/clear', validate(clearEntriesSchema), async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    const body = getValidatedBody(c, clearEntriesSchema);

    const cleared = await knowledgeEntries.clearKeys(id, body.keys.map(normalizeEntryKey));
    await knowledgeSets.touch(id);
    return success(c, { cleared });
  });

  // ==========================================================================
  // Bulk Fill
  // ==========================================================================

  /**
   * Replaces every entry of the set with LLM suggestions for a category.
   * Letters whose request failed come back empty.
   */
  router.post('/:id/suggestions', validate(generateSuggestionsSchema), async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    const body = getValidatedBody(c, generateSuggestionsSchema);

    const suggestions = await deps.suggestions.suggestForCategory(body.category, { perKey: body.perKey });
    const entries = await importSuggestions({ sets: knowledgeSets, entries: knowledgeEntries }, id, suggestions);
    return success(c, summarize(entries));
  });

  /**
   * Replaces every entry of the set with the given items, each filed under
   * its first letter.
   */
  router.post('/:id/import', validate(importItemsSchema), async (c) => {
    const id = c.req.param('id');
    await requireSet(id);
    const body = getValidatedBody(c, importItemsSchema);

    const entries = await importSuggestions(
      { sets: knowledgeSets, entries: knowledgeEntries },
      id,
      groupByInitial(body.items)
    );
    return success(c, summarize(entries));
  });

  return router;
}
