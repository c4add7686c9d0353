import { readFileSync } from 'node:fs';
import path from 'node:path';

import { getErrorMessage, wrapError } from '@batchpay/core';
import {
  loadEngineConfig,
  openBatchTransferEngine,
  SystemClock,
  type ClockSource,
  type EngineConfig,
  type EngineHandle,
} from '@batchpay/engine';
import { getDataDirectory } from '@batchpay/env';
import { getLogger } from '@batchpay/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { CliIO } from './cli-io.js';
import { exitCodeForError } from './error-mapping.js';
import { ExitCodes } from './exit-codes.js';
import { OutputManager } from './output.js';
import type { GlobalOptions } from './schemas.js';

const logger = getLogger('command-runtime');

export const DATABASE_FILE_NAME = 'batchpay.db';

/**
 * Thrown inside a command to stop it with a specific exit code
 */
export class CommandFailure extends Error {
  constructor(
    readonly error: Error,
    readonly exitCode = exitCodeForError(error)
  ) {
    super(error.message, { cause: error });
  }
}

/**
 * Per-invocation resources: output, configuration and a lazily opened engine.
 */
export class CommandContext {
  readonly output: OutputManager;
  readonly dataDir: string;

  private handle: EngineHandle | undefined;
  private clock: ClockSource | undefined;
  private config: EngineConfig | undefined;

  constructor(
    readonly options: GlobalOptions,
    readonly io: CliIO,
    output?: OutputManager
  ) {
    this.output = output ?? new OutputManager(options.json ? 'json' : 'text', io);
    this.dataDir = options.dataDir ?? getDataDirectory();
  }

  get databasePath(): string {
    return path.join(this.dataDir, DATABASE_FILE_NAME);
  }

  /**
   * Engine configuration from --config (a JSON file), defaults otherwise
   */
  engineConfig(): Result<EngineConfig, Error> {
    if (this.config) return ok(this.config);

    let raw: unknown = {};
    if (this.options.config) {
      try {
        raw = JSON.parse(readFileSync(this.options.config, 'utf8'));
      } catch (error) {
        return wrapError(error, `Failed to read engine config ${this.options.config}`);
      }
    }

    const loaded = loadEngineConfig(raw);
    if (loaded.isErr()) return err(loaded.error);
    this.config = loaded.value;
    return ok(loaded.value);
  }

  /**
   * Open the engine on first use. Without an explicit clock, heights follow wall time.
   * Once open, asking for a different clock is an error.
   */
  async engine(clock?: ClockSource): Promise<EngineHandle> {
    if (this.handle) {
      if (clock !== undefined && clock !== this.clock) {
        throw new CommandFailure(new Error('Engine is already open with a different clock'), ExitCodes.GENERAL_ERROR);
      }
      return this.handle;
    }

    const config = unwrap(this.engineConfig());
    const engineClock = clock ?? new SystemClock({ blocksPerHour: config.blocksPerHour });
    const handle = unwrap(
      await openBatchTransferEngine({
        dbPath: this.databasePath,
        clock: engineClock,
        config,
      })
    );

    this.handle = handle;
    this.clock = engineClock;
    return handle;
  }

  async dispose(): Promise<void> {
    if (!this.handle) return;
    const closeResult = await this.handle.close();
    this.handle = undefined;
    if (closeResult.isErr()) {
      throw closeResult.error;
    }
  }
}

/**
 * Convert a Result to its value or stop the command with the error's exit code.
 */
export function unwrap<T>(result: Result<T, Error>): T {
  if (result.isErr()) {
    throw new CommandFailure(result.error);
  }
  return result.value;
}

/**
 * Run a command with its context and always release the engine.
 * Failures are reported through the output manager, never thrown.
 */
export async function runCommand(
  command: string,
  options: GlobalOptions,
  io: CliIO,
  fn: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  const output = new OutputManager(options.json ? 'json' : 'text', io);
  let ctx: CommandContext | undefined;

  try {
    ctx = new CommandContext(options, io, output);
    await fn(ctx);
  } catch (error) {
    if (error instanceof CommandFailure) {
      output.error(command, error.error, error.exitCode);
    } else {
      logger.error({ error }, `Command ${command} failed`);
      output.error(command, new Error(getErrorMessage(error, 'Command failed')), ExitCodes.GENERAL_ERROR);
    }
  }

  if (!ctx) return;

  try {
    await ctx.dispose();
  } catch (error) {
    logger.error({ error }, 'Failed to close engine database');
    output.error(command, new Error(getErrorMessage(error)), ExitCodes.DATABASE_ERROR);
  }
}
