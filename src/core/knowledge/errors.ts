/**
 * Knowledge Set Errors
 *
 * Thrown by the loader and the store when a set cannot be found, has
 * nothing to drill, or would clash with an existing name.
 */

export class KnowledgeSetNotFoundError extends Error {
  public readonly reference: string;

  constructor(reference: string) {
    super(`Knowledge set '${reference}' not found`);
    this.name = 'KnowledgeSetNotFoundError';
    this.reference = reference;
  }
}

/**
 * The set exists but no key has a value yet, so no session can start.
 */
export class EmptyKnowledgeSetError extends Error {
  public readonly knowledgeSetId: string;

  constructor(knowledgeSetId: string) {
    super('No quiz questions available. Add data first.');
    this.name = 'EmptyKnowledgeSetError';
    this.knowledgeSetId = knowledgeSetId;
  }
}

export class DuplicateKnowledgeSetNameError extends Error {
  public readonly setName: string;

  constructor(setName: string) {
    super(`A knowledge set named '${setName}' already exists`);
    this.name = 'DuplicateKnowledgeSetNameError';
    this.setName = setName;
  }
}
