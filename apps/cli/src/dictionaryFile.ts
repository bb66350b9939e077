// apps/cli/src/dictionaryFile.ts
//
// Loads a Dictionary from a plain word file: one word per line, blank lines
// and lines starting with "#" ignored. Entries of the wrong length or with
// characters outside a–z are dropped by Dictionary.fromWords.

import { readFile } from 'node:fs/promises';
import { Dictionary } from '@weaver/game-core';
import type { Logger } from './logger.js';

export function parseWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * loadDictionaryFile reads `path` and builds a Dictionary of `wordLength`
 * letter words. Read errors and DictionaryError propagate to the caller.
 */
export async function loadDictionaryFile(
  path: string,
  wordLength: number,
  log: Logger,
): Promise<Dictionary> {
  const entries = parseWordList(await readFile(path, 'utf8'));
  const dictionary = Dictionary.fromWords(entries, { wordLength });
  log.info(
    { path, entries: entries.length, words: dictionary.size, skipped: entries.length - dictionary.size },
    'dictionary loaded',
  );
  return dictionary;
}
