// apps/cli/src/session.ts
//
// The terminal game loop.
//
// CliSession holds no I/O: handleLine takes one typed line and returns the
// lines to print, which keeps the flow testable. runSession wires it to
// readline on stdin/stdout.
//
// Flow:
//   • a guess is checked first; rejected words print a reason only while
//     "errors" is on, accepted words print the board
//   • after a win the prompt becomes "play again? (yes/no)"; yes starts a
//     new game, anything else ends the session

import { createInterface } from 'node:readline';
import type { GameEngine } from '@weaver/game-core';
import { flagSettingKey, type Command, type FlagName } from '@weaver/protocol';
import { QUIT, parseCommand } from './commands.js';
import type { Logger } from './logger.js';
import {
  BANNER,
  HELP,
  renderBoard,
  renderPath,
  renderRejection,
  renderWin,
} from './render.js';

export interface SessionOutput {
  lines: string[];
  done: boolean;
}

export const WORD_PROMPT = 'Enter a word: ';
export const REPLAY_PROMPT = 'Would you like to play again? (yes/no): ';
export const GOODBYE = 'Thanks for playing!';

export class CliSession {
  private awaitingReplay = false;

  constructor(
    private readonly engine: GameEngine,
    private readonly log: Logger,
  ) {}

  start(): string[] {
    return [...BANNER, ...renderBoard(this.engine)];
  }

  prompt(): string {
    return this.awaitingReplay ? REPLAY_PROMPT : WORD_PROMPT;
  }

  handleLine(line: string): SessionOutput {
    if (this.awaitingReplay) return this.handleReplay(line);

    const parsed = parseCommand(line);
    if (!parsed.ok) return { lines: parsed.errors, done: false };
    return this.run(this.preferMove(parsed.command, line));
  }

  /** A bare keyword that is also a legal move is played as a word. */
  private preferMove(command: Command, line: string): Command {
    if (command.kind === 'guess') return command;
    const word = line.trim().toLowerCase();
    if (word === QUIT || !this.engine.isValidWord(word)) return command;
    return { kind: 'guess', word };
  }

  private handleReplay(line: string): SessionOutput {
    this.awaitingReplay = false;
    const answer = line.trim().toLowerCase();
    if (answer === 'yes' || answer === 'y') {
      this.engine.newGame();
      return { lines: renderBoard(this.engine), done: false };
    }
    return { lines: [GOODBYE], done: true };
  }

  private run(command: Command): SessionOutput {
    const engine = this.engine;
    const keepGoing = (lines: string[]): SessionOutput => ({ lines, done: false });

    switch (command.kind) {
      case 'exit':
        return { lines: [GOODBYE], done: true };
      case 'help':
        return keepGoing(HELP);
      case 'restart':
        engine.resetGame();
        return keepGoing(['Game reset.', ...renderBoard(engine)]);
      case 'new':
        engine.newGame();
        return keepGoing(['New game started.', ...renderBoard(engine)]);
      case 'path':
        return keepGoing(renderPath(engine.startWord, engine.targetWord, engine.findPath()));
      case 'set':
        return keepGoing(this.setFlag(command.flag, command.value));
      case 'guess':
        return keepGoing(this.guess(command.word));
    }
  }

  private setFlag(flag: FlagName, value: boolean): string[] {
    const engine = this.engine;
    switch (flagSettingKey[flag]) {
      case 'showErrorMessages':
        engine.setShowErrorMessages(value);
        return [`Show error messages: ${value}`];
      case 'showPath':
        engine.setShowPath(value);
        return value
          ? [`Show path: ${value}`, ...renderPath(engine.startWord, engine.targetWord, engine.findPath())]
          : [`Show path: ${value}`];
      case 'randomWords':
        engine.setRandomWords(value);
        return [`Random words: ${value}`, ...renderBoard(engine)];
    }
  }

  private guess(word: string): string[] {
    const engine = this.engine;
    const check = engine.checkWord(word);
    if (!check.ok) {
      this.log.debug({ word: check.word, reason: check.reason }, 'word rejected');
      return engine.showErrorMessages
        ? [renderRejection(check.reason, check.word, engine.wordLength)]
        : [];
    }

    engine.submitWord(check.word);
    const lines = renderBoard(engine);
    if (engine.hasWon()) {
      this.log.info(
        { start: engine.startWord, target: engine.targetWord, attempts: engine.currentAttempt },
        'game won',
      );
      this.awaitingReplay = true;
      lines.push(...renderWin(engine));
    }
    return lines;
  }
}

/**
 * runSession feeds `input` line by line into `session` and prints its output,
 * until the session is done or the input ends.
 */
export async function runSession(
  session: CliSession,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  const rl = createInterface({ input, terminal: false });
  const print = (lines: readonly string[]) => {
    for (const line of lines) output.write(`${line}\n`);
  };

  print(session.start());
  output.write(session.prompt());
  // Leaving the loop early closes the interface.
  for await (const line of rl) {
    const { lines, done } = session.handleLine(line);
    print(lines);
    if (done) break;
    output.write(session.prompt());
  }
}
