import { describe, expect, it } from 'vitest';

import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../engine-config.js';

describe('loadEngineConfig', () => {
  it('fills every default', () => {
    const result = loadEngineConfig({});

    expect(result._unsafeUnwrap()).toEqual({
      blocksPerHour: 144,
      businessHours: { startHour: 9, endHour: 17 },
      highValueThreshold: 50_000_000_000n,
      balanceBufferPercent: 110,
      maxInstructions: 50,
      maxSignatures: 10,
      enforcePerformanceGate: false,
      compensateOnFailure: true,
    });
    expect(DEFAULT_ENGINE_CONFIG).toEqual(result._unsafeUnwrap());
  });

  it('accepts the high-value threshold as a digit string', () => {
    const config = loadEngineConfig({ highValueThreshold: '1000' })._unsafeUnwrap();
    expect(config.highValueThreshold).toBe(1000n);
  });

  it('keeps default end hour when only the start hour is overridden', () => {
    const config = loadEngineConfig({ businessHours: { startHour: 8 } })._unsafeUnwrap();
    expect(config.businessHours).toEqual({ startHour: 8, endHour: 17 });
  });

  it('rejects a window that starts after it ends', () => {
    const result = loadEngineConfig({ businessHours: { startHour: 18, endHour: 9 } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('INVALID_THRESHOLD');
      expect(result.error.field).toBe('businessHours');
    }
  });

  it('rejects a balance buffer below 100 percent', () => {
    const result = loadEngineConfig({ balanceBufferPercent: 90 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.field).toBe('balanceBufferPercent');
      expect(result.error.message).toBe("Invalid threshold 'balanceBufferPercent': must be at least 100, got 90");
    }
  });

  it('reports the path of a malformed field', () => {
    const result = loadEngineConfig({ businessHours: { endHour: 30 } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.field).toBe('businessHours.endHour');
    }
  });
});
