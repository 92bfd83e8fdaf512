import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { isTerminalFailure, withJobTimeout } from '../queue-manager.js';

type FakeJob = Readonly<{ id: string }>;

void describe('withJobTimeout', () => {
  void it('passes the processor result through', async () => {
    const run = withJobTimeout<FakeJob>((job) => Promise.resolve(`done ${job.id}`), 1_000);

    assert.equal(await run({ id: '1' }), 'done 1');
  });

  void it('aborts the signal and rejects once the timeout elapses', async () => {
    let seen: AbortSignal | undefined;
    const run = withJobTimeout<FakeJob>((_job, signal) => {
      seen = signal;
      return new Promise((resolve) => setTimeout(resolve, 200));
    }, 10);

    await assert.rejects(run({ id: '1' }), { message: 'Job exceeded timeout of 10ms' });
    assert.equal(seen?.aborted, true);
  });

  void it('runs without a timer when disabled', async () => {
    let seen: AbortSignal | undefined;
    const run = withJobTimeout<FakeJob>((_job, signal) => {
      seen = signal;
      return Promise.resolve('ok');
    }, null);

    assert.equal(await run({ id: '1' }), 'ok');
    assert.equal(seen?.aborted, false);
  });
});

void describe('isTerminalFailure', () => {
  const failure = new Error('boom');

  void it('waits until the last attempt', () => {
    assert.equal(isTerminalFailure({ attemptsMade: 2, opts: { attempts: 3 } }, failure, 3), false);
    assert.equal(isTerminalFailure({ attemptsMade: 3, opts: { attempts: 3 } }, failure, 3), true);
    assert.equal(isTerminalFailure({ attemptsMade: 1, opts: {} }, failure, 1), true);
  });

  void it('treats unrecoverable errors as terminal at once', () => {
    const unrecoverable = new Error('bad payload');
    unrecoverable.name = 'UnrecoverableError';

    assert.equal(isTerminalFailure({ attemptsMade: 1, opts: { attempts: 3 } }, unrecoverable, 3), true);
  });
});
