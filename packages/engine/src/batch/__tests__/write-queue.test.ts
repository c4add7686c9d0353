import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { WriteQueue } from '../write-queue.js';

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

describe('WriteQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new WriteQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return ok(1);
    }, 'first');
    const second = queue.run(() => {
      events.push('second:start');
      return Promise.resolve(ok(2));
    }, 'second');

    await Promise.resolve();
    expect(queue.size).toBe(2);
    gate.release();

    expect((await first)._unsafeUnwrap()).toBe(1);
    expect((await second)._unsafeUnwrap()).toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a task returns an error', async () => {
    const queue = new WriteQueue();

    const failed = await queue.run(() => Promise.resolve(err(new Error('nope'))), 'failing');
    const next = await queue.run(() => Promise.resolve(ok('done')), 'next');

    expect(failed._unsafeUnwrapErr().message).toBe('nope');
    expect(next._unsafeUnwrap()).toBe('done');
  });

  it('converts a thrown error into an Err and keeps going', async () => {
    const queue = new WriteQueue();

    const thrown = await queue.run(() => Promise.reject<Result<boolean, Error>>(new Error('boom')), 'Task exploded');
    const next = await queue.run(() => Promise.resolve(ok(true)), 'next');

    expect(thrown._unsafeUnwrapErr().message).toBe('Task exploded: boom');
    expect(next._unsafeUnwrap()).toBe(true);
  });
});
