// apps/cli/src/render.ts
//
// Text views of a game. Every function returns lines without trailing
// newlines; the session decides where they go.

import type { GameEngine, Mark, RejectionReason } from '@weaver/game-core';

export const RULE = '---------------------------';

const MARK_LETTER: Record<Mark, string> = {
  correct: 'G', // green
  present: 'Y', // yellow
  absent: 'X', // grey
};

export const BANNER = [
  'Welcome to Weaver!',
  'Change one letter at a time to transform the start word into the target word.',
  'All intermediate steps must be valid words.',
  "Type 'exit' to quit, 'restart' to reset the game, or 'new' for a new game.",
  "Type 'help' to list every command.",
  '',
];

export const HELP = [
  'Commands:',
  '  <word>             submit a word',
  '  restart            clear your moves, keep the words',
  '  new                start a new game',
  '  path               show the shortest solution',
  '  set errors on|off  show why a word is rejected',
  '  set path on|off    show the solution under the board',
  '  set random on|off  pick random words for new games',
  '  exit | quit        leave the game',
  'A command that is also a legal move is played as a word; quit always leaves.',
];

const upper = (w: string) => w.toUpperCase();

/** "[GGXY]" for correct, correct, absent, present. */
export function renderMarks(marks: readonly Mark[]): string {
  return `[${marks.map((m) => MARK_LETTER[m]).join('')}]`;
}

export function renderPath(start: string, target: string, path: readonly string[]): string[] {
  if (path.length === 0) {
    return [`No path found from ${upper(start)} to ${upper(target)}`];
  }
  return [
    `Path from ${upper(start)} to ${upper(target)}:`,
    ...path.map((w, i) => `${i + 1}. ${upper(w)}`),
    RULE,
  ];
}

export function renderBoard(engine: GameEngine): string[] {
  const lines = [
    '',
    RULE,
    `Start word: ${upper(engine.startWord)}`,
    `Target word: ${upper(engine.targetWord)}`,
    RULE,
  ];

  const attempts = engine.getAttempts();
  if (attempts.length === 0) {
    lines.push('No attempts yet');
  } else {
    lines.push('Your attempts:');
    attempts.forEach((w, i) => {
      lines.push(`${i + 1}. ${upper(w)} ${renderMarks(engine.getFeedback(w))}`);
    });
  }
  lines.push(RULE);

  if (engine.showPath) {
    lines.push(...renderPath(engine.startWord, engine.targetWord, engine.findPath()));
  }
  return lines;
}

export function renderWin(engine: GameEngine): string[] {
  const moves = engine.currentAttempt;
  return [
    '',
    'Congratulations! You won!',
    `You transformed ${upper(engine.startWord)} into ${upper(engine.targetWord)} in ${moves} ${
      moves === 1 ? 'attempt' : 'attempts'
    }.`,
    '',
  ];
}

export function renderRejection(reason: RejectionReason, word: string, wordLength: number): string {
  switch (reason) {
    case 'wrong-length':
      return `Error: Word must be ${wordLength} letters long`;
    case 'not-letters':
      return `Error: "${word}" may only contain the letters a-z`;
    case 'not-in-dictionary':
      return `Error: ${upper(word)} is not in the dictionary`;
    case 'unchanged':
      return `Error: ${upper(word)} is the same as the previous word`;
    case 'too-many-changes':
      return `Error: ${upper(word)} must differ by exactly one letter from the previous word`;
  }
}
