// packages/protocol/src/index.ts
//
// Wire shapes for Weaver front ends: what they read from players and what
// they log or pass around about a session.
//
// Defines:
//   - Status:    where a session stands ("fresh", "in-progress", "won").
//   - Settings:  the three session flags and their front-end names.
//   - Snapshot:  a plain view of one session.
//   - Command:   the terminal front end's command language.
//
// The engine itself has no dependency on these schemas; front ends use them
// to validate what they read from users and what they hand to each other.

import { z } from 'zod';

export const gameStatusSchema = z.enum(['fresh', 'in-progress', 'won']);

/** A lowercase a–z word; length is checked by the engine. */
export const wordSchema = z.string().regex(/^[a-z]+$/);

/* -------------------------------------------------------------------------- */
/*                                  Settings                                  */
/* -------------------------------------------------------------------------- */

export const settingsSchema = z.object({
  showErrorMessages: z.boolean().default(false),
  showPath: z.boolean().default(false),
  randomWords: z.boolean().default(false),
});
export type Settings = z.infer<typeof settingsSchema>;

/** Short flag names typed by players: `set errors on`, `set path off`. */
export const flagNameSchema = z.enum(['errors', 'path', 'random']);
export type FlagName = z.infer<typeof flagNameSchema>;

export const flagSettingKey = {
  errors: 'showErrorMessages',
  path: 'showPath',
  random: 'randomWords',
} as const satisfies Record<FlagName, keyof Settings>;

/* -------------------------------------------------------------------------- */
/*                                  Snapshot                                  */
/* -------------------------------------------------------------------------- */

/**
 * Snapshot of a session:
 *  - currentAttempt always equals attempts.length
 *  - startWord and targetWord differ
 */
export const snapshotSchema = z
  .object({
    startWord: wordSchema,
    targetWord: wordSchema,
    attempts: z.array(wordSchema),
    currentAttempt: z.number().int().min(0),
    status: gameStatusSchema,
    settings: settingsSchema,
  })
  .refine((s) => s.currentAttempt === s.attempts.length, {
    message: 'currentAttempt must equal the number of attempts',
    path: ['currentAttempt'],
  })
  .refine((s) => s.startWord !== s.targetWord, {
    message: 'start and target words must differ',
    path: ['targetWord'],
  });

/* -------------------------------------------------------------------------- */
/*                                  Commands                                  */
/* -------------------------------------------------------------------------- */

/**
 * Commands understood by the terminal front end:
 *  - guess   → submit a word (any text that is not a keyword)
 *  - restart → same words, no moves
 *  - new     → new words (random or default pair)
 *  - set     → change a flag
 *  - path    → print the shortest ladder
 *  - help    → print the command list
 *  - exit    → leave
 */
export const commandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('guess'), word: z.string().min(1) }),
  z.object({ kind: z.literal('restart') }),
  z.object({ kind: z.literal('new') }),
  z.object({ kind: z.literal('set'), flag: flagNameSchema, value: z.boolean() }),
  z.object({ kind: z.literal('path') }),
  z.object({ kind: z.literal('help') }),
  z.object({ kind: z.literal('exit') }),
]);
export type Command = z.infer<typeof commandSchema>;
