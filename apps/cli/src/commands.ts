// apps/cli/src/commands.ts
//
// Turns a line typed at the prompt into a Command.
//
//   exit | quit               → leave
//   restart                   → same words, no moves
//   new                       → new words
//   path                      → print the shortest ladder
//   help                      → print this list
//   set <flag> <on|off>       → flag is errors, path or random
//   anything else             → a guess
//
// Keywords can be dictionary words too ("path", "help", "exit"); the session
// plays such a keyword as a move when it is a legal one. `quit` always leaves.
//
// Candidates are validated with the shared commandSchema; zod issues are
// turned into the messages players see.

import { commandSchema, flagNameSchema, type Command } from '@weaver/protocol';

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; errors: string[] };

const SWITCHES: ReadonlyMap<string, boolean> = new Map([
  ['on', true],
  ['true', true],
  ['yes', true],
  ['1', true],
  ['off', false],
  ['false', false],
  ['no', false],
  ['0', false],
]);

/** Reads on/off, true/false, yes/no or 1/0. Anything else is undefined. */
export function parseSwitch(text: string): boolean | undefined {
  return SWITCHES.get(text.trim().toLowerCase());
}

const KEYWORDS = new Set(['restart', 'new', 'path', 'help', 'exit']);

export const QUIT = 'quit';

export const SET_USAGE = "Invalid command. Use 'set <flag> <value>'";

function toCandidate(input: string): Record<string, unknown> | null {
  const [head, ...rest] = input.split(/\s+/);

  if (head === QUIT && rest.length === 0) return { kind: 'exit' };
  if (KEYWORDS.has(head) && rest.length === 0) return { kind: head };
  if (head === 'set') {
    if (rest.length !== 2) return null;
    return { kind: 'set', flag: rest[0], value: parseSwitch(rest[1]) };
  }
  return { kind: 'guess', word: input };
}

export function parseCommand(line: string): ParseResult {
  const input = line.trim().toLowerCase();
  if (input === '') {
    return { ok: false, errors: ["Type a word, or 'help' for commands"] };
  }

  const candidate = toCandidate(input);
  if (candidate === null) return { ok: false, errors: [SET_USAGE] };

  const parsed = commandSchema.safeParse(candidate);
  if (parsed.success) return { ok: true, command: parsed.data };

  const [, flag = '', value = ''] = input.split(/\s+/);
  const field = parsed.error.issues[0]?.path[0];
  if (field === 'flag') {
    return {
      ok: false,
      errors: [`Unknown flag: ${flag}`, `Available flags: ${flagNameSchema.options.join(', ')}`],
    };
  }
  if (field === 'value') {
    return { ok: false, errors: [`Invalid value "${value}". Use on or off`] };
  }
  return { ok: false, errors: [SET_USAGE] };
}
