import { NonNegativeIntegerSchema } from '@batchpay/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { InvalidInputError } from '../errors.js';

export const HOURS_PER_DAY = 24;

/**
 * Source of the monotonically increasing height the engine timestamps batches with.
 */
export interface ClockSource {
  currentHeight(): number;
}

/**
 * Cyclical hour derived from a height: `floor(height / blocksPerHour) mod 24`.
 */
export function hourOfDay(height: number, blocksPerHour: number): number {
  return Math.floor(height / blocksPerHour) % HOURS_PER_DAY;
}

/**
 * First height whose hourOfDay() is `hour` on the given day
 */
export function heightAtHour(hour: number, blocksPerHour: number, day = 0): number {
  return (day * HOURS_PER_DAY + hour) * blocksPerHour;
}

function validateHeight(height: number): Result<number, InvalidInputError> {
  const parsed = NonNegativeIntegerSchema.safeParse(height);
  return parsed.success
    ? ok(parsed.data)
    : err(new InvalidInputError(`Height must be a non-negative safe integer, got ${height}`));
}

/**
 * Clock whose height only moves when told to. Used by tests and by
 * callers that supply an explicit height.
 */
export class ManualClock implements ClockSource {
  private height: number;

  private constructor(height: number) {
    this.height = height;
  }

  static create(height = 0): Result<ManualClock, InvalidInputError> {
    return validateHeight(height).map((valid) => new ManualClock(valid));
  }

  currentHeight(): number {
    return this.height;
  }

  /**
   * Move to an absolute height. Heights never go backwards.
   */
  setHeight(height: number): Result<void, InvalidInputError> {
    return validateHeight(height).andThen((valid) => {
      if (valid < this.height) {
        return err(new InvalidInputError(`Height cannot move backwards from ${this.height} to ${valid}`));
      }
      this.height = valid;
      return ok(undefined);
    });
  }

  advance(blocks = 1): Result<void, InvalidInputError> {
    return this.setHeight(this.height + blocks);
  }
}

export interface SystemClockOptions {
  blocksPerHour: number;
  /** Seconds per height step. Defaults to 3600 / blocksPerHour, so hourOfDay() follows the UTC hour */
  blockIntervalSeconds?: number | undefined;
  /** Unix time of height 0. Defaults to the epoch */
  genesisUnixSeconds?: number | undefined;
  now?: (() => number) | undefined;
}

/**
 * Height derived from wall-clock time. Times before genesis read as height 0.
 */
export class SystemClock implements ClockSource {
  private readonly blockIntervalSeconds: number;
  private readonly genesisUnixSeconds: number;
  private readonly now: () => number;

  constructor(options: SystemClockOptions) {
    this.blockIntervalSeconds = options.blockIntervalSeconds ?? 3600 / options.blocksPerHour;
    this.genesisUnixSeconds = options.genesisUnixSeconds ?? 0;
    this.now = options.now ?? Date.now;
  }

  currentHeight(): number {
    const elapsedSeconds = Math.floor(this.now() / 1000) - this.genesisUnixSeconds;
    if (elapsedSeconds <= 0) return 0;
    return Math.floor(elapsedSeconds / this.blockIntervalSeconds);
  }
}
