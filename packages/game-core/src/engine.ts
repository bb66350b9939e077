// packages/game-core/src/engine.ts
//
// GameEngine: one Weaver session over a shared Dictionary.
//
// The player starts from `startWord` and must reach `targetWord`, changing
// one letter per move, every move landing on a dictionary word. The engine
// keeps the move history, answers whether a word is a legal next move,
// scores feedback against the target and solves the puzzle on demand.
//
// Everything is synchronous and free of I/O. Front ends subscribe to a
// payload-less change notification and re-read whatever they display.
//
// State machine:
//   fresh ──submitWord──▶ in-progress ──submitWord(target)──▶ won
//     ▲                                                         │
//     └──────────────── resetGame / newGame ◀───────────────────┘
//
// Winning does not lock the session; whether to accept more moves after a
// win is the front end's call.

import { isAlphabetic, type Dictionary } from './dictionary.js';
import { DictionaryError, GameCoreError } from './errors.js';
import { scoreFeedback, type Mark } from './feedback.js';
import { findShortestLadder, letterDistance } from './ladder.js';
import { defaultRandom, type RandomSource } from './random.js';

export interface WordPair {
  start: string;
  target: string;
}

/** The fixed pair used whenever random words are off. */
export const DEFAULT_WORDS: Readonly<WordPair> = { start: 'sale', target: 'opal' };

/** Bound on redraws when the sampled target equals the start word. */
export const MAX_TARGET_DRAWS = 64;

export interface GameSettings {
  showErrorMessages: boolean;
  showPath: boolean;
  randomWords: boolean;
}

export type GameStatus = 'fresh' | 'in-progress' | 'won';

export type RejectionReason =
  | 'wrong-length'
  | 'not-letters'
  | 'not-in-dictionary'
  | 'unchanged'
  | 'too-many-changes';

export type WordCheck =
  | { ok: true; word: string }
  | { ok: false; word: string; reason: RejectionReason };

export interface GameSnapshot {
  startWord: string;
  targetWord: string;
  attempts: string[];
  currentAttempt: number;
  status: GameStatus;
  settings: GameSettings;
}

export type ChangeListener = () => void;

export interface GameEngineOptions {
  dictionary: Dictionary;
  /** Source for random word draws. Defaults to Math.random. */
  random?: RandomSource;
  /** Pair used while random words are off. Defaults to sale → opal. */
  defaultWords?: WordPair;
  settings?: Partial<GameSettings>;
}

export class GameEngine {
  private readonly dictionary: Dictionary;
  private readonly random: RandomSource;
  private readonly defaults: Readonly<WordPair>;
  private readonly listeners = new Set<ChangeListener>();

  private start = '';
  private target = '';
  private history: string[] = [];
  private attemptCount = 0;
  private flags: GameSettings;

  constructor(options: GameEngineOptions) {
    this.dictionary = options.dictionary;
    this.random = options.random ?? defaultRandom;
    this.defaults = GameEngine.checkDefaults(
      options.dictionary,
      options.defaultWords ?? DEFAULT_WORDS,
    );
    this.flags = {
      showErrorMessages: options.settings?.showErrorMessages ?? false,
      showPath: options.settings?.showPath ?? false,
      randomWords: options.settings?.randomWords ?? false,
    };
    this.initializeGame();
  }

  private static checkDefaults(dictionary: Dictionary, pair: WordPair): WordPair {
    const start = pair.start.toLowerCase();
    const target = pair.target.toLowerCase();
    for (const w of [start, target]) {
      if (!dictionary.contains(w)) {
        throw new GameCoreError(
          'INVALID_DEFAULT_WORDS',
          `Default word "${w}" is not in the dictionary`,
        );
      }
    }
    if (start === target) {
      throw new GameCoreError(
        'INVALID_DEFAULT_WORDS',
        `Default start and target words must differ, both are "${start}"`,
      );
    }
    return { start, target };
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Getters                                 */
  /* ------------------------------------------------------------------------ */

  get startWord(): string {
    return this.start;
  }

  get targetWord(): string {
    return this.target;
  }

  get currentAttempt(): number {
    return this.attemptCount;
  }

  get wordLength(): number {
    return this.dictionary.wordLength;
  }

  get showErrorMessages(): boolean {
    return this.flags.showErrorMessages;
  }

  get showPath(): boolean {
    return this.flags.showPath;
  }

  get randomWords(): boolean {
    return this.flags.randomWords;
  }

  settings(): GameSettings {
    return { ...this.flags };
  }

  /** Copy of the move history; mutating it does not touch the session. */
  getAttempts(): string[] {
    return [...this.history];
  }

  status(): GameStatus {
    if (this.hasWon()) return 'won';
    return this.history.length === 0 ? 'fresh' : 'in-progress';
  }

  snapshot(): GameSnapshot {
    return {
      startWord: this.start,
      targetWord: this.target,
      attempts: this.getAttempts(),
      currentAttempt: this.attemptCount,
      status: this.status(),
      settings: this.settings(),
    };
  }

  /* ------------------------------------------------------------------------ */
  /*                                   Moves                                  */
  /* ------------------------------------------------------------------------ */

  /**
   * checkWord explains whether `word` is a legal next move.
   *
   * The previous word is the last attempt, or the start word before the
   * first move. Checks run in order: length, letters, dictionary, then the
   * number of changed positions against the previous word.
   */
  checkWord(word: string): WordCheck {
    const w = word.toLowerCase();
    const reject = (reason: RejectionReason): WordCheck => ({ ok: false, word: w, reason });

    if (w.length !== this.dictionary.wordLength) return reject('wrong-length');
    if (!isAlphabetic(w)) return reject('not-letters');
    if (!this.dictionary.contains(w)) return reject('not-in-dictionary');

    const changed = letterDistance(this.previousWord(), w);
    if (changed === 0) return reject('unchanged');
    if (changed > 1) return reject('too-many-changes');
    return { ok: true, word: w };
  }

  isValidWord(word: string): boolean {
    return this.checkWord(word).ok;
  }

  /** Appends `word` when it is a legal move. Returns false, changing nothing, otherwise. */
  submitWord(word: string): boolean {
    const check = this.checkWord(word);
    if (!check.ok) return false;

    this.history.push(check.word);
    this.attemptCount++;
    this.emit();
    return true;
  }

  hasWon(): boolean {
    return (
      this.history.length > 0 &&
      this.history[this.history.length - 1] === this.target
    );
  }

  /** Feedback of `word` against the target word; [] for a word of the wrong length. */
  getFeedback(word: string): Mark[] {
    if (word.length !== this.target.length) return [];
    return scoreFeedback(this.target, word);
  }

  /** Shortest ladder from the start word to the target word, or [] if none. */
  findPath(): string[] {
    return findShortestLadder(this.dictionary, this.start, this.target);
  }

  /* ------------------------------------------------------------------------ */
  /*                              Session control                             */
  /* ------------------------------------------------------------------------ */

  /** Clears the moves and keeps the same start and target words. */
  resetGame(): void {
    this.clearAttempts();
    this.emit();
  }

  /** Clears the moves and picks words again (random or the default pair). */
  newGame(): void {
    this.initializeGame();
    this.emit();
  }

  setShowErrorMessages(flag: boolean): void {
    this.flags.showErrorMessages = flag;
    this.emit();
  }

  setShowPath(flag: boolean): void {
    this.flags.showPath = flag;
    this.emit();
  }

  /** Stores the flag and always starts a new game. */
  setRandomWords(flag: boolean): void {
    this.flags.randomWords = flag;
    this.newGame();
  }

  /**
   * subscribe registers a change listener, called once after every state
   * change (accepted move, reset, new game, flag change).
   *
   * @returns a function removing the listener
   */
  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* ------------------------------------------------------------------------ */
  /*                                 Internals                                */
  /* ------------------------------------------------------------------------ */

  private previousWord(): string {
    return this.history.length > 0
      ? this.history[this.history.length - 1]
      : this.start;
  }

  private clearAttempts(): void {
    this.history = [];
    this.attemptCount = 0;
  }

  private initializeGame(): void {
    this.clearAttempts();
    const { start, target } = this.pickWords();
    this.start = start;
    this.target = target;
  }

  private pickWords(): WordPair {
    if (!this.flags.randomWords) return { ...this.defaults };

    const start = this.dictionary.sample(this.random);
    for (let i = 0; i < MAX_TARGET_DRAWS; i++) {
      const target = this.dictionary.sample(this.random);
      if (target !== start) return { start, target };
    }

    // The random source keeps repeating the start word: take the first
    // other word in dictionary order.
    for (const target of this.dictionary) {
      if (target !== start) return { start, target };
    }
    throw new DictionaryError(
      'TOO_FEW_WORDS',
      'Dictionary has no word other than the start word',
    );
  }

  private emit(): void {
    for (const listener of [...this.listeners]) listener();
  }
}
