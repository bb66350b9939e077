// apps/cli/src/__tests__/helpers.ts
//
// Shared setup for CLI tests: a small ladder dictionary (sale → opal in
// nine moves) and a logger that records pino's JSON lines in memory.

import { pino, type Logger } from 'pino';
import { Dictionary, GameEngine, type GameEngineOptions } from '@weaver/game-core';

export const WORDS = [
  'sale', 'pale', 'pane', 'pant', 'bale', 'bole', 'bold', 'gold',
  'goad', 'grad', 'orad', 'oral', 'opal', 'cold', 'cord', 'zany',
];

export function newEngine(options: Omit<GameEngineOptions, 'dictionary'> = {}): GameEngine {
  return new GameEngine({ dictionary: Dictionary.fromWords(WORDS), ...options });
}

export interface MemoryLogger {
  log: Logger;
  records: () => Array<Record<string, unknown>>;
}

export function memoryLogger(level = 'debug'): MemoryLogger {
  const lines: string[] = [];
  const log = pino({ level }, { write: (msg: string) => void lines.push(msg) });
  return {
    log,
    records: () => lines.map((l) => JSON.parse(l) as Record<string, unknown>),
  };
}
