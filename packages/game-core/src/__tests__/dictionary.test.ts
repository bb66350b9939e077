// packages/game-core/src/__tests__/dictionary.test.ts
//
// Unit tests for Dictionary: normalization, filtering, the two-word minimum
// and sampling through an injected random source.

import { Dictionary, DictionaryError } from '../index.js';
import { sequence, thrown } from './fixtures.js';

describe('Dictionary.fromWords', () => {
  it('trims, lower-cases and deduplicates entries', () => {
    const dict = Dictionary.fromWords([' Sale ', 'PALE', 'pale', 'sale']);
    expect([...dict]).toEqual(['sale', 'pale']);
    expect(dict.size).toBe(2);
  });

  it('keeps only a–z words of the configured length', () => {
    const dict = Dictionary.fromWords(
      ['sale', 'sales', 'ale', "o'er", 'pa1e', 'pale'],
      { wordLength: 4 },
    );
    expect([...dict]).toEqual(['sale', 'pale']);
  });

  it('supports other word lengths', () => {
    const dict = Dictionary.fromWords(['crane', 'slate', 'sale'], { wordLength: 5 });
    expect(dict.wordLength).toBe(5);
    expect([...dict]).toEqual(['crane', 'slate']);
  });

  it('rejects a list with no usable words', () => {
    expect(() => Dictionary.fromWords(['toolong', 'ab'])).toThrow(DictionaryError);
    expect(thrown(() => Dictionary.fromWords([]))).toMatchObject({
      name: 'DictionaryError',
      code: 'EMPTY_DICTIONARY',
    });
  });

  it('rejects a list with a single usable word', () => {
    expect(() => Dictionary.fromWords(['sale', 'SALE'])).toThrowError(
      /at least two 4-letter words, got 1/,
    );
  });

  it('rejects a non-positive word length', () => {
    expect(() => Dictionary.fromWords(['sale', 'pale'], { wordLength: 0 })).toThrowError(
      /positive integer/,
    );
  });
});

describe('Dictionary membership and sampling', () => {
  const dict = Dictionary.fromWords(['sale', 'pale', 'pane', 'pant']);

  it('tests membership case-insensitively', () => {
    expect(dict.contains('pale')).toBe(true);
    expect(dict.contains('PaNe')).toBe(true);
    expect(dict.contains('opal')).toBe(false);
    expect(dict.contains('sales')).toBe(false);
  });

  it('samples by scaling the random draw onto the word list', () => {
    const random = sequence(0, 0.25, 0.5, 0.99);
    expect([dict.sample(random), dict.sample(random), dict.sample(random), dict.sample(random)])
      .toEqual(['sale', 'pale', 'pane', 'pant']);
  });

  it('clamps a draw of exactly 1 to the last word', () => {
    expect(dict.sample(() => 1)).toBe('pant');
  });
});
