/**
 * Letter Suggestions Prompt Tests
 *
 * The parser sees whatever the model sends back, so most cases here are
 * replies that ignore the requested format.
 */

import { describe, it, expect } from 'vitest';
import {
  buildLetterSuggestionPrompt,
  parseLetterSuggestionResponse,
} from '../../../src/llm/prompts/letter-suggestions';

describe('buildLetterSuggestionPrompt', () => {
  it('names the count, category and letter', () => {
    const prompt = buildLetterSuggestionPrompt({ category: 'Coffee shops in Cork', letter: 'C', count: 4 });

    expect(prompt.startsWith("Generate 4 examples of 'Coffee shops in Cork' that start with the letter 'C'.")).toBe(true);
    expect(prompt).toContain('comma-separated list');
  });
});

describe('parseLetterSuggestionResponse', () => {
  it('splits a plain comma-separated reply', () => {
    expect(parseLetterSuggestionResponse('Apple, Apricot, Avocado', 'A', 3)).toEqual([
      'Apple',
      'Apricot',
      'Avocado',
    ]);
  });

  it('drops items that start with another letter', () => {
    expect(parseLetterSuggestionResponse('Apple, Banana, apricot', 'A', 5)).toEqual(['Apple', 'apricot']);
  });

  it('truncates to the requested count', () => {
    expect(parseLetterSuggestionResponse('Apple, Apricot, Avocado', 'A', 2)).toEqual(['Apple', 'Apricot']);
  });

  it('strips numbering, bullets, quotes and trailing periods', () => {
    const reply = "1. 'Mango'\n2) Melon.\n- \"Mulberry\"\n• Medlar";

    expect(parseLetterSuggestionResponse(reply, 'M', 5)).toEqual(['Mango', 'Melon', 'Mulberry', 'Medlar']);
  });

  it('returns nothing for an empty reply', () => {
    expect(parseLetterSuggestionResponse('', 'Q', 3)).toEqual([]);
    expect(parseLetterSuggestionResponse(' , ,', 'Q', 3)).toEqual([]);
  });
});
