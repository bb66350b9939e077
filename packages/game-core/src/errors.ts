// packages/game-core/src/errors.ts
//
// Error types thrown by game-core.
//
// Rule violations by the player (a word that is not in the dictionary, or
// that changes too many letters) are never thrown: the engine reports them
// as return values. Errors here signal a setup the engine cannot run with,
// e.g. a dictionary that is empty or default words it does not contain.

export type GameCoreErrorCode =
  | 'EMPTY_DICTIONARY'
  | 'TOO_FEW_WORDS'
  | 'INVALID_WORD_LENGTH'
  | 'INVALID_DEFAULT_WORDS'
  | 'WORD_LENGTH_MISMATCH';

export class GameCoreError extends Error {
  readonly code: GameCoreErrorCode;

  constructor(code: GameCoreErrorCode, message: string) {
    super(message);
    this.name = 'GameCoreError';
    this.code = code;
  }
}

/** Raised while building a Dictionary. */
export class DictionaryError extends GameCoreError {
  constructor(code: GameCoreErrorCode, message: string) {
    super(code, message);
    this.name = 'DictionaryError';
  }
}
