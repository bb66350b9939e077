// packages/protocol/src/__tests__/schemas.test.ts
//
// Unit tests for the shared zod schemas: defaults, the snapshot invariants
// and the command union.

import {
  commandSchema,
  flagNameSchema,
  flagSettingKey,
  gameStatusSchema,
  settingsSchema,
  snapshotSchema,
} from '../index.js';

const snapshot = {
  startWord: 'sale',
  targetWord: 'opal',
  attempts: ['pale'],
  currentAttempt: 1,
  status: 'in-progress',
  settings: { showErrorMessages: true, showPath: false, randomWords: false },
};

describe('settingsSchema', () => {
  it('defaults every flag to false', () => {
    expect(settingsSchema.parse({})).toEqual({
      showErrorMessages: false,
      showPath: false,
      randomWords: false,
    });
  });

  it('maps every flag name onto a settings key', () => {
    for (const name of flagNameSchema.options) {
      expect(Object.keys(settingsSchema.shape)).toContain(flagSettingKey[name]);
    }
  });
});

describe('gameStatusSchema', () => {
  it('accepts the three session states only', () => {
    expect(gameStatusSchema.options).toEqual(['fresh', 'in-progress', 'won']);
    expect(gameStatusSchema.safeParse('lost').success).toBe(false);
  });
});

describe('snapshotSchema', () => {
  it('accepts a consistent snapshot', () => {
    expect(snapshotSchema.parse(snapshot)).toEqual(snapshot);
  });

  it('rejects a counter that disagrees with the attempts', () => {
    const result = snapshotSchema.safeParse({ ...snapshot, currentAttempt: 2 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['currentAttempt']);
    }
  });

  it('rejects equal start and target words', () => {
    const result = snapshotSchema.safeParse({ ...snapshot, targetWord: 'sale' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('start and target words must differ');
    }
  });

  it('rejects uppercase words', () => {
    expect(snapshotSchema.safeParse({ ...snapshot, attempts: ['PALE'] }).success).toBe(false);
  });
});

describe('commandSchema', () => {
  it('parses each command kind', () => {
    expect(commandSchema.parse({ kind: 'guess', word: 'pale' })).toEqual({
      kind: 'guess',
      word: 'pale',
    });
    expect(commandSchema.parse({ kind: 'set', flag: 'path', value: true })).toEqual({
      kind: 'set',
      flag: 'path',
      value: true,
    });
    expect(commandSchema.parse({ kind: 'exit' })).toEqual({ kind: 'exit' });
  });

  it('rejects unknown flags and empty guesses', () => {
    expect(commandSchema.safeParse({ kind: 'set', flag: 'colour', value: true }).success).toBe(
      false,
    );
    expect(commandSchema.safeParse({ kind: 'guess', word: '' }).success).toBe(false);
  });
});
