// packages/game-core/src/ladder.ts
//
// Word-ladder graph logic.
//
// Nodes are dictionary words; two words are adjacent when they differ in
// exactly one letter position. The graph is implicit: neighbours are
// generated on demand by trying every substitution at every position and
// keeping the ones the dictionary contains, so nothing is precomputed.

import type { Dictionary } from './dictionary.js';

export const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * letterDistance counts positions where `a` and `b` differ.
 * Words of different lengths are infinitely far apart.
 */
export function letterDistance(a: string, b: string): number {
  if (a.length !== b.length) return Infinity;
  let d = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) d++;
  }
  return d;
}

/** True iff `a` and `b` have the same length and exactly one differing position. */
export function isDifferByOneLetter(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  let d = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i] && ++d > 1) return false;
  }
  return d === 1;
}

/**
 * neighbours yields every dictionary word one substitution away from `word`,
 * position by position, letters in alphabetical order.
 */
export function* neighbours(
  word: string,
  dictionary: Dictionary,
): Generator<string> {
  for (let i = 0; i < word.length; i++) {
    const head = word.slice(0, i);
    const tail = word.slice(i + 1);
    for (const c of ALPHABET) {
      if (c === word[i]) continue;
      const candidate = head + c + tail;
      if (dictionary.contains(candidate)) yield candidate;
    }
  }
}

/**
 * findShortestLadder runs a breadth-first search from `start` to `target`.
 *
 * @returns the shortest ladder, `start` first and `target` last, or `[]`
 *          when the two words are not connected.
 *
 * Algorithm:
 *   1. Queue `start`, mark it visited.
 *   2. Dequeue a word; if it is `target`, walk the parent pointers back
 *      to `start` and reverse.
 *   3. Otherwise enqueue each unvisited neighbour, recording its parent.
 *
 * Layers are explored in order, so the first time `target` is dequeued its
 * ladder is minimal. Every word is expanded at most once.
 *
 * Example (dictionary: cold, cord, card, ward, warm, word, worm):
 *   findShortestLadder(dict, 'cold', 'warm')
 *   → ['cold', 'cord', 'word', 'ward', 'warm']
 */
export function findShortestLadder(
  dictionary: Dictionary,
  start: string,
  target: string,
): string[] {
  const parents = new Map<string, string | null>([[start, null]]);
  const queue: string[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];

    if (current === target) {
      const path: string[] = [];
      for (let w: string | null = current; w !== null; w = parents.get(w) ?? null) {
        path.push(w);
      }
      return path.reverse();
    }

    for (const next of neighbours(current, dictionary)) {
      if (parents.has(next)) continue;
      parents.set(next, current);
      queue.push(next);
    }
  }

  return [];
}
