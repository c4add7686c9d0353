import { IN_MEMORY_DATABASE } from '@batchpay/sqlite';
import { describe, expect, it } from 'vitest';

import { heightAtHour, ManualClock } from '../clock/clock.js';
import { openBatchTransferEngine } from '../engine-factory.js';
import { InvalidThresholdError } from '../errors.js';

describe('openBatchTransferEngine', () => {
  it('drives a batch end to end over the bundled ledger', async () => {
    const clock = ManualClock.create(heightAtHour(12, 144))._unsafeUnwrap();
    const handle = (await openBatchTransferEngine({ dbPath: IN_MEMORY_DATABASE, clock }))._unsafeUnwrap();

    await handle.engine.initialize('owner');
    await handle.ledger.deposit('alice', 5_000_000n);

    const result = await handle.engine.executeBatchTransfer('alice', [{ recipient: 'bob', amount: '1000000' }], []);

    expect(result._unsafeUnwrap()).toMatchObject({ id: 1, totalAmount: 1_000_000n, success: true });
    expect((await handle.ledger.getBalance('alice'))._unsafeUnwrap()).toBe(4_000_000n);
    expect((await handle.ledger.getBalance('bob'))._unsafeUnwrap()).toBe(1_000_000n);

    expect((await handle.close()).isOk()).toBe(true);
  });

  it('refuses an inconsistent configuration', async () => {
    const clock = ManualClock.create()._unsafeUnwrap();

    const result = await openBatchTransferEngine({
      dbPath: IN_MEMORY_DATABASE,
      clock,
      config: { businessHours: { startHour: 18, endHour: 8 } },
    });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidThresholdError);
  });
});
