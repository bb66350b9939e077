// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • dictionary.ts → fixed-length word set (Dictionary)
//   • ladder.ts     → one-letter adjacency and shortest ladder search
//   • feedback.ts   → per-letter feedback (scoreFeedback, Mark type)
//   • engine.ts     → session state machine (GameEngine)
//   • random.ts     → injectable random sources (seededRandom)
//   • errors.ts     → GameCoreError, DictionaryError
//
// Example usage:
//   import { Dictionary, GameEngine } from '@weaver/game-core';

export * from './dictionary.js';
export * from './ladder.js';
export * from './feedback.js';
export * from './engine.js';
export * from './random.js';
export * from './errors.js';
