/**
 * One contender in a multi-process race on a shared data directory
 *
 * Forked by the contention test with its task as the only argument. It
 * opens its own storage, reports ready, waits for the go signal and then
 * performs the task once, reporting the outcome code.
 */

import { ok, type Result } from '../errors.js';
import { createLogger } from '../logger.js';
import { SealedBallot } from '../sealed-ballot.js';
import { ContenderTaskSchema, GO, type ContenderMessage } from './contention-protocol.js';

const logger = createLogger({ name: 'contender', level: 'warn' });

function send(message: ContenderMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error('Contender must be forked with an IPC channel'));
      return;
    }
    process.send(message, undefined, {}, (error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const task = ContenderTaskSchema.parse(JSON.parse(process.argv[2] ?? 'null'));

  const go = new Promise<void>((resolve) => {
    process.on('message', (message) => {
      if (message === GO) {
        resolve();
      }
    });
  });

  // Opening is itself the race in 'open' mode
  const early = task.mode === 'open' ? undefined : SealedBallot.open({ dataDir: task.dataDir });
  await send({ type: 'ready' });
  await go;

  const core = early ?? SealedBallot.open({ dataDir: task.dataDir });
  try {
    let result: Result<unknown>;
    switch (task.mode) {
      case 'issue':
        result = core.authenticateAndIssue(task.identityToken);
        break;
      case 'cast':
        result = core.castBallot(task.ballotToken, task.encryptedChoice);
        break;
      case 'open':
        result = ok(null);
        break;
    }
    await send(
      result.ok ? { type: 'done', ok: true, code: null } : { type: 'done', ok: false, code: result.error.code }
    );
  } finally {
    core.close();
  }
}

main()
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Contender failed');
    process.exitCode = 1;
  })
  .finally(() => {
    process.disconnect?.();
  });
