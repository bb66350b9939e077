// packages/game-core/src/__tests__/fixtures.ts
//
// Shared word lists and random sources for game-core tests.
//
// LADDER_WORDS connects the default pair sale → opal through
//   sale, bale, bole, bold, gold, goad, grad, orad, oral, opal
// and also holds a cold → warm ladder and one isolated word ("zany").

import { Dictionary, type RandomSource } from '../index.js';

export const LADDER_WORDS = [
  'sale', 'pale', 'pane', 'pant', 'bale', 'bole', 'bold', 'gold',
  'goad', 'grad', 'orad', 'oral', 'opal', 'opto', 'cold', 'cord',
  'card', 'ward', 'warm', 'word', 'worm', 'zany',
];

export const ladderDictionary = (): Dictionary => Dictionary.fromWords(LADDER_WORDS);

/** A random source that replays `values` in a loop. */
export function sequence(...values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}

/** Runs `fn` and returns what it threw, or undefined. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
