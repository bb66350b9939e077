// apps/cli/src/__tests__/render.test.ts

import {
  RULE,
  renderBoard,
  renderMarks,
  renderPath,
  renderRejection,
  renderWin,
} from '../render.js';
import { newEngine } from './helpers.js';

describe('renderMarks', () => {
  it('uses G, Y and X', () => {
    expect(renderMarks(['correct', 'correct', 'absent', 'present'])).toBe('[GGXY]');
  });
});

describe('renderBoard', () => {
  it('shows the words and an empty history', () => {
    expect(renderBoard(newEngine())).toEqual([
      '',
      RULE,
      'Start word: SALE',
      'Target word: OPAL',
      RULE,
      'No attempts yet',
      RULE,
    ]);
  });

  it('numbers attempts with their feedback', () => {
    const engine = newEngine();
    engine.submitWord('pale');
    engine.submitWord('pane');
    expect(renderBoard(engine).slice(5)).toEqual([
      'Your attempts:',
      '1. PALE [YYYX]',
      '2. PANE [YYXX]',
      RULE,
    ]);
  });

  it('appends the solution while showPath is on', () => {
    const engine = newEngine({ defaultWords: { start: 'cold', target: 'cord' } });
    engine.setShowPath(true);
    expect(renderBoard(engine).slice(-4)).toEqual([
      'Path from COLD to CORD:',
      '1. COLD',
      '2. CORD',
      RULE,
    ]);
  });
});

describe('renderPath', () => {
  it('reports a missing path', () => {
    expect(renderPath('sale', 'zany', [])).toEqual(['No path found from SALE to ZANY']);
  });
});

describe('renderWin', () => {
  it('counts the moves', () => {
    const engine = newEngine({ defaultWords: { start: 'cold', target: 'cord' } });
    engine.submitWord('cord');
    expect(renderWin(engine)).toEqual([
      '',
      'Congratulations! You won!',
      'You transformed COLD into CORD in 1 attempt.',
      '',
    ]);
  });
});

describe('renderRejection', () => {
  it('explains each reason', () => {
    expect(renderRejection('wrong-length', 'sales', 4)).toBe('Error: Word must be 4 letters long');
    expect(renderRejection('not-letters', 'sa1e', 4)).toBe(
      'Error: "sa1e" may only contain the letters a-z',
    );
    expect(renderRejection('not-in-dictionary', 'salt', 4)).toBe(
      'Error: SALT is not in the dictionary',
    );
    expect(renderRejection('unchanged', 'sale', 4)).toBe(
      'Error: SALE is the same as the previous word',
    );
    expect(renderRejection('too-many-changes', 'bole', 4)).toBe(
      'Error: BOLE must differ by exactly one letter from the previous word',
    );
  });
});
