// packages/game-core/src/dictionary.ts
//
// Immutable, fixed-length word set.
//
// Built once from whatever word list a loader hands in (a file, a bundled
// array, a test fixture), then only read. Several engines may share one
// instance.
//
// Rules:
//   • Entries are trimmed and lower-cased; only a–z words of exactly
//     `wordLength` letters are kept; duplicates collapse.
//   • At least two words must survive, so a start word and a different
//     target word can always be drawn.

import { DictionaryError } from './errors.js';
import { randomIndex, type RandomSource } from './random.js';

export const DEFAULT_WORD_LENGTH = 4;

export interface DictionaryOptions {
  wordLength?: number;
}

/** Lower-cases and trims a raw word. */
export const normalizeWord = (w: string): string => w.trim().toLowerCase();

/** True when `word` is made only of the letters a–z. */
export const isAlphabetic = (word: string): boolean => /^[a-z]+$/.test(word);

export class Dictionary implements Iterable<string> {
  readonly wordLength: number;
  private readonly members: ReadonlySet<string>;
  private readonly list: readonly string[];

  private constructor(wordLength: number, list: readonly string[]) {
    this.wordLength = wordLength;
    this.list = list;
    this.members = new Set(list);
  }

  /**
   * fromWords keeps the usable entries of `words` and builds a Dictionary.
   *
   * @throws DictionaryError when wordLength is not a positive integer, when
   *   nothing survives filtering, or when fewer than two words do.
   *
   * Example:
   *   Dictionary.fromWords(['Sale', 'pale', 'pale', 'opals'])
   *   → members: sale, pale
   */
  static fromWords(
    words: Iterable<string>,
    options: DictionaryOptions = {},
  ): Dictionary {
    const wordLength = options.wordLength ?? DEFAULT_WORD_LENGTH;
    if (!Number.isInteger(wordLength) || wordLength < 1) {
      throw new DictionaryError(
        'INVALID_WORD_LENGTH',
        `Word length must be a positive integer, got ${wordLength}`,
      );
    }

    const seen = new Set<string>();
    for (const raw of words) {
      const w = normalizeWord(raw);
      if (w.length === wordLength && isAlphabetic(w)) seen.add(w);
    }

    if (seen.size === 0) {
      throw new DictionaryError(
        'EMPTY_DICTIONARY',
        `Dictionary has no ${wordLength}-letter words`,
      );
    }
    if (seen.size < 2) {
      throw new DictionaryError(
        'TOO_FEW_WORDS',
        `Dictionary needs at least two ${wordLength}-letter words, got ${seen.size}`,
      );
    }

    return new Dictionary(wordLength, [...seen]);
  }

  get size(): number {
    return this.list.length;
  }

  /** Case-insensitive membership test. */
  contains(word: string): boolean {
    return this.members.has(word.toLowerCase());
  }

  /** Picks one member using the caller's random source. */
  sample(random: RandomSource): string {
    return this.list[randomIndex(random, this.list.length)];
  }

  /** Iterates members in load order. */
  [Symbol.iterator](): Iterator<string> {
    return this.list[Symbol.iterator]();
  }
}
