import { describe, expect, it } from 'vitest';

import { FakeTransferService } from '../../__tests__/test-utils.js';
import type { TransferInstruction } from '../../types.js';
import { compensateTransfers } from '../compensation.js';
import { TransferApplier } from '../transfer-applier.js';

function transfer(recipient: string, amount: bigint): TransferInstruction {
  return { recipient, amount, requiresHighValueCheck: false };
}

const batch = [transfer('bob', 100n), transfer('carol', 200n), transfer('dave', 300n)];

describe('TransferApplier', () => {
  it('applies every transfer in order', async () => {
    const service = new FakeTransferService({ alice: 1000n });
    const outcome = await new TransferApplier(service).apply('alice', batch);

    expect(outcome).toEqual({ success: true, applied: batch });
    expect(service.calls).toEqual([
      { amount: 100n, from: 'alice', to: 'bob' },
      { amount: 200n, from: 'alice', to: 'carol' },
      { amount: 300n, from: 'alice', to: 'dave' },
    ]);
    expect(service.balanceOf('alice')).toBe(400n);
  });

  it('stops at the first failing transfer', async () => {
    const service = new FakeTransferService({ alice: 1000n });
    service.failOnCall(2, 'INSUFFICIENT_FUNDS');

    const outcome = await new TransferApplier(service).apply('alice', batch);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failedIndex).toBe(1);
      expect(outcome.applied).toEqual([batch[0]]);
      expect(outcome.reason).toBe('injected insufficient_funds');
      expect(outcome.error.reason).toBe('INSUFFICIENT_FUNDS');
    }
    expect(service.calls).toHaveLength(2);
    expect(service.balanceOf('dave')).toBe(0n);
  });

  it('converts a rejected service call into a fault', async () => {
    const service = new FakeTransferService({ alice: 1000n });
    service.throwOnCall(1);

    const outcome = await new TransferApplier(service).apply('alice', batch);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failedIndex).toBe(0);
      expect(outcome.applied).toEqual([]);
      expect(outcome.reason).toBe('ledger unavailable');
      expect(outcome.error.reason).toBe('FAULT');
    }
  });

  it('succeeds trivially for an empty batch', async () => {
    const service = new FakeTransferService();
    const outcome = await new TransferApplier(service).apply('alice', []);

    expect(outcome).toEqual({ success: true, applied: [] });
    expect(service.calls).toEqual([]);
  });
});

describe('compensateTransfers', () => {
  it('reverses applied transfers last first', async () => {
    const service = new FakeTransferService({ alice: 1000n });
    const applied = batch.slice(0, 2);
    await new TransferApplier(service).apply('alice', applied);

    const result = await compensateTransfers(service, 'alice', applied);

    expect(result).toEqual({ compensated: true, failures: [] });
    expect(service.calls.slice(2)).toEqual([
      { amount: 200n, from: 'carol', to: 'alice' },
      { amount: 100n, from: 'bob', to: 'alice' },
    ]);
    expect(service.balanceOf('alice')).toBe(1000n);
  });

  it('keeps reversing after one reversal fails', async () => {
    const service = new FakeTransferService({ bob: 100n, carol: 200n });
    service.failOnCall(1);

    const result = await compensateTransfers(service, 'alice', batch.slice(0, 2));

    expect(result.compensated).toBe(false);
    expect(result.failures).toEqual([{ index: 1, recipient: 'carol', amount: 200n, reason: 'injected fault' }]);
    expect(service.balanceOf('alice')).toBe(100n);
  });
});
