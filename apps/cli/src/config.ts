// apps/cli/src/config.ts
//
// Environment configuration for the terminal front end.
//
// Variables (all optional; a .env file is read by the entry point):
//   WEAVER_DICTIONARY   word file, one word per line (default: bundled list)
//   WEAVER_WORD_LENGTH  letters per word (default 4; any other length needs a start/target pair)
//   WEAVER_START_WORD   default start word, with WEAVER_TARGET_WORD
//   WEAVER_TARGET_WORD  default target word (default pair: sale → opal)
//   WEAVER_SEED         seed for random word selection (default: unseeded)
//   WEAVER_RANDOM_WORDS random words for new games (default off)
//   WEAVER_SHOW_PATH    print the solution under the board (default off)
//   WEAVER_SHOW_ERRORS  explain rejected words (default on)
//   LOG_LEVEL           pino level (default info)

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_WORD_LENGTH, type WordPair } from '@weaver/game-core';
import type { Settings } from '@weaver/protocol';
import { parseSwitch } from './commands.js';

export const DEFAULT_DICTIONARY_PATH = fileURLToPath(
  new URL('../data/dictionary.txt', import.meta.url),
);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSwitch = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === '') return fallback;
      const value = parseSwitch(raw);
      if (value === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected on or off, got "${raw}"` });
        return z.NEVER;
      }
      return value;
    });

const envSchema = z
  .object({
    WEAVER_DICTIONARY: z.string().min(1).default(DEFAULT_DICTIONARY_PATH),
    WEAVER_WORD_LENGTH: z.coerce.number().int().min(2).max(15).default(4),
    WEAVER_START_WORD: z.string().min(1).optional(),
    WEAVER_TARGET_WORD: z.string().min(1).optional(),
    WEAVER_SEED: z.string().min(1).optional(),
    WEAVER_RANDOM_WORDS: envSwitch(false),
    WEAVER_SHOW_PATH: envSwitch(false),
    WEAVER_SHOW_ERRORS: envSwitch(true),
    LOG_LEVEL: logLevelSchema.default('info'),
  })
  .superRefine((env, ctx) => {
    const hasStart = env.WEAVER_START_WORD !== undefined;
    if (hasStart !== (env.WEAVER_TARGET_WORD !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'WEAVER_START_WORD and WEAVER_TARGET_WORD must be set together',
        path: ['WEAVER_TARGET_WORD'],
      });
    } else if (!hasStart && env.WEAVER_WORD_LENGTH !== DEFAULT_WORD_LENGTH) {
      // The built-in pair only fits the default length.
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `WEAVER_START_WORD and WEAVER_TARGET_WORD are required when WEAVER_WORD_LENGTH is not ${DEFAULT_WORD_LENGTH}`,
        path: ['WEAVER_START_WORD'],
      });
    }
  });

export interface CliConfig {
  dictionaryPath: string;
  wordLength: number;
  defaultWords?: WordPair;
  seed?: string;
  settings: Settings;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * loadConfig validates `env` and maps it onto CliConfig.
 *
 * @throws ConfigError listing every invalid variable as "NAME: message"
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }

  const e = parsed.data;
  return {
    dictionaryPath: e.WEAVER_DICTIONARY,
    wordLength: e.WEAVER_WORD_LENGTH,
    defaultWords:
      e.WEAVER_START_WORD !== undefined && e.WEAVER_TARGET_WORD !== undefined
        ? { start: e.WEAVER_START_WORD, target: e.WEAVER_TARGET_WORD }
        : undefined,
    seed: e.WEAVER_SEED,
    settings: {
      showErrorMessages: e.WEAVER_SHOW_ERRORS,
      showPath: e.WEAVER_SHOW_PATH,
      randomWords: e.WEAVER_RANDOM_WORDS,
    },
    logLevel: e.LOG_LEVEL,
  };
}
