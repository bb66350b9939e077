// packages/game-core/src/feedback.ts
//
// Per-letter feedback for a word against the target.
//
// Mark legend:
//   - "correct": same letter at the same position
//   - "present": letter occurs somewhere else in the target
//   - "absent":  letter does not occur in the target
//
// Unlike Wordle scoring, "present" is a plain containment check and is not
// limited by how many times the letter occurs in the target: in "opto"
// against "opal" the second "o" is "present" even though the target's
// only "o" is already matched.

import { GameCoreError } from './errors.js';

export type Mark = 'correct' | 'present' | 'absent';

/**
 * scoreFeedback compares `word` against `target` position by position.
 *
 * @throws GameCoreError when the two words differ in length
 *
 * Example:
 *   target = "opal", word = "opto"
 *   → ["correct", "correct", "absent", "present"]
 */
export function scoreFeedback(target: string, word: string): Mark[] {
  const T = target.toLowerCase();
  const W = word.toLowerCase();

  if (T.length !== W.length) {
    throw new GameCoreError(
      'WORD_LENGTH_MISMATCH',
      `Expected a ${T.length}-letter word, got "${word}"`,
    );
  }

  return Array.from(W, (c, i): Mark => {
    if (c === T[i]) return 'correct';
    return T.includes(c) ? 'present' : 'absent';
  });
}

