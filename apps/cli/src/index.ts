// apps/cli/src/index.ts
//
// Entry point of the terminal front end:
//   config (.env + environment) → logger → dictionary file → engine → loop
//
// Run with `npm start`. Startup failures (bad configuration, unreadable or
// unusable dictionary, default words missing from it) are logged and end the
// process with exit code 1.

import 'dotenv/config';
import { GameEngine, seededRandom } from '@weaver/game-core';
import { snapshotSchema } from '@weaver/protocol';
import { ConfigError, loadConfig } from './config.js';
import { loadDictionaryFile } from './dictionaryFile.js';
import { createLogger } from './logger.js';
import { CliSession, runSession } from './session.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  const dictionary = await loadDictionaryFile(config.dictionaryPath, config.wordLength, log);
  const engine = new GameEngine({
    dictionary,
    random: config.seed !== undefined ? seededRandom(config.seed) : undefined,
    defaultWords: config.defaultWords,
    settings: config.settings,
  });

  // In debug runs every change is checked against the snapshot schema.
  engine.subscribe(() => {
    if (!log.isLevelEnabled('debug')) return;
    log.debug({ snapshot: snapshotSchema.parse(engine.snapshot()) }, 'state changed');
  });
  log.info(
    { start: engine.startWord, target: engine.targetWord, seeded: config.seed !== undefined },
    'game ready',
  );

  await runSession(new CliSession(engine, log));
}

try {
  await main();
} catch (err) {
  const log = createLogger('error');
  if (err instanceof ConfigError) {
    log.error({ issues: err.issues }, 'invalid configuration');
  } else {
    log.error({ err }, 'weaver stopped');
  }
  process.exitCode = 1;
}
