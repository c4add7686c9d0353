import { formatZodIssues, NonNegativeIntegerSchema } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { AuditLedger, freezeRecord } from '../audit/audit-ledger.js';
import { AuthorizationRegistry, parsePrincipal } from '../authorization/authorization-registry.js';
import type { ClockSource } from '../clock/clock.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { assertConditions } from '../conditions/condition-gate.js';
import { countDistinctSignatures, evaluateConditions, sumInstructionAmounts } from '../conditions/condition-evaluator.js';
import {
  EngineNotInitializedError,
  InvalidInputError,
  RecordWriteFailedError,
  TransferFailedError,
  type BatchGateError,
  type UnauthorizedError,
} from '../errors.js';
import type { EngineDataContext } from '../persistence/engine-data-context.js';
import { compensateTransfers } from '../transfers/compensation.js';
import { TransferApplier } from '../transfers/transfer-applier.js';
import type { TransferError, TransferService } from '../transfers/transfer-service.js';
import {
  TransferInstructionSchema,
  type BatchRecord,
  type EngineState,
  type ListRecordsOptions,
  type TransferInstruction,
  type TransferInstructionInput,
} from '../types.js';

import { WriteQueue } from './write-queue.js';

const logger = getLogger('BatchTransferEngine');

export interface BatchTransferEngineDeps {
  data: EngineDataContext;
  transferService: TransferService;
  clock: ClockSource;
  config?: EngineConfig | undefined;
}

export type ExecuteBatchError =
  | BatchGateError
  | TransferFailedError
  | RecordWriteFailedError
  | InvalidInputError
  | EngineNotInitializedError
  | TransferError
  | Error;

interface ValidatedBatch {
  caller: string;
  instructions: readonly TransferInstruction[];
  signatures: readonly string[];
}

/**
 * Entry point for every engine operation.
 *
 * Mutations (administration and batch execution) run one at a time on a
 * write queue; reads go straight to storage.
 */
export class BatchTransferEngine {
  readonly config: EngineConfig;

  private readonly data: EngineDataContext;
  private readonly transferService: TransferService;
  private readonly clock: ClockSource;
  private readonly registry: AuthorizationRegistry;
  private readonly audit: AuditLedger;
  private readonly applier: TransferApplier;
  private readonly queue = new WriteQueue();

  constructor(deps: BatchTransferEngineDeps) {
    this.data = deps.data;
    this.transferService = deps.transferService;
    this.clock = deps.clock;
    this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
    this.registry = new AuthorizationRegistry(deps.data.state, deps.data.signers);
    this.audit = new AuditLedger(deps.data.records, deps.data.state);
    this.applier = new TransferApplier(deps.transferService);
  }

  /**
   * Create engine state with its first owner. Re-initializing keeps the existing state.
   */
  async initialize(owner: string): Promise<Result<EngineState, InvalidInputError | Error>> {
    const parsed = parsePrincipal(owner, 'owner');
    if (parsed.isErr()) return err(parsed.error);

    return this.queue.run(async () => {
      const result = await this.data.state.initialize(parsed.value);
      return result.map(({ state }) => state);
    }, 'Failed to initialize engine');
  }

  async setContractOwner(
    caller: string,
    newOwner: string
  ): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    return this.queue.run(() => this.registry.setOwner(caller, newOwner), 'Failed to set owner');
  }

  async addAuthorizedSigner(
    caller: string,
    signer: string
  ): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    return this.queue.run(() => this.registry.addSigner(caller, signer), 'Failed to add signer');
  }

  async removeAuthorizedSigner(
    caller: string,
    signer: string
  ): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    return this.queue.run(() => this.registry.removeSigner(caller, signer), 'Failed to remove signer');
  }

  async setPerformanceMetrics(
    caller: string,
    value: number
  ): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    const parsed = NonNegativeIntegerSchema.safeParse(value);
    if (!parsed.success) {
      return err(new InvalidInputError(`Performance metric must be a non-negative safe integer, got ${value}`));
    }

    return this.queue.run(async (): Promise<Result<void, Error>> => {
      const allowed = await this.registry.requireOwner(caller, 'set performance metrics');
      if (allowed.isErr()) return err(allowed.error);

      const updated = await this.data.state.update({ performanceMetric: parsed.data });
      if (updated.isErr()) return err(updated.error);

      logger.info({ performanceMetric: parsed.data }, 'Performance metric updated');
      return ok(undefined);
    }, 'Failed to set performance metrics');
  }

  /**
   * Gate a batch on its four conditions, apply its transfers in order and
   * record the outcome.
   *
   * Gating and input failures write nothing. Once transfers start, a record is
   * always written and the batch id advances; a failed transfer is reported as
   * TransferFailedError after its record is stored. If the record cannot be
   * stored, the applied transfers are reversed (when compensation is on) and
   * RecordWriteFailedError is returned.
   */
  async executeBatchTransfer(
    caller: string,
    instructions: readonly TransferInstructionInput[],
    signatures: readonly string[]
  ): Promise<Result<BatchRecord, ExecuteBatchError>> {
    const validated = this.validateBatch(caller, instructions, signatures);
    if (validated.isErr()) return err(validated.error);

    return this.queue.run(() => this.executeValidated(validated.value), 'Batch execution failed');
  }

  async getTransferRecord(id: number): Promise<Result<BatchRecord | undefined, Error>> {
    return this.audit.get(id);
  }

  async getLastExecution(): Promise<Result<number, Error>> {
    return this.audit.lastExecutionTimestamp();
  }

  async listTransferRecords(options?: ListRecordsOptions): Promise<Result<BatchRecord[], Error>> {
    return this.audit.list(options);
  }

  async isAuthorized(identity: string): Promise<Result<boolean, Error>> {
    return this.registry.isAuthorized(identity);
  }

  async listAuthorizedSigners(): Promise<Result<string[], Error>> {
    return this.registry.listSigners();
  }

  async getOwner(): Promise<Result<string, EngineNotInitializedError | Error>> {
    return this.registry.getOwner();
  }

  async getPerformanceMetric(): Promise<Result<number, EngineNotInitializedError | Error>> {
    const stateResult = await this.data.state.get();
    if (stateResult.isErr()) return err(stateResult.error);
    if (!stateResult.value) return err(new EngineNotInitializedError());
    return ok(stateResult.value.performanceMetric);
  }

  private validateBatch(
    caller: string,
    instructions: readonly TransferInstructionInput[],
    signatures: readonly string[]
  ): Result<ValidatedBatch, InvalidInputError> {
    const callerResult = parsePrincipal(caller, 'caller');
    if (callerResult.isErr()) return err(callerResult.error);

    if (instructions.length > this.config.maxInstructions) {
      return err(
        new InvalidInputError(
          `Batch has ${instructions.length} instructions, at most ${this.config.maxInstructions} are allowed`
        )
      );
    }
    if (signatures.length > this.config.maxSignatures) {
      return err(
        new InvalidInputError(
          `Batch has ${signatures.length} signatures, at most ${this.config.maxSignatures} are allowed`
        )
      );
    }

    const parsedInstructions = z.array(TransferInstructionSchema).safeParse(instructions);
    if (!parsedInstructions.success) {
      return err(new InvalidInputError(`Invalid instructions: ${formatZodIssues(parsedInstructions.error)}`));
    }

    const signaturePrincipals: string[] = [];
    for (const signature of signatures) {
      const parsed = parsePrincipal(signature, 'signature');
      if (parsed.isErr()) return err(parsed.error);
      signaturePrincipals.push(parsed.value);
    }

    return ok({
      caller: callerResult.value,
      instructions: Object.freeze(parsedInstructions.data.map((instruction) => Object.freeze(instruction))),
      signatures: Object.freeze(signaturePrincipals),
    });
  }

  private async executeValidated(batch: ValidatedBatch): Promise<Result<BatchRecord, ExecuteBatchError>> {
    const { caller, instructions, signatures } = batch;

    const stateResult = await this.data.state.get();
    if (stateResult.isErr()) return err(stateResult.error);
    const state = stateResult.value;
    if (!state) return err(new EngineNotInitializedError());

    const totalAmount = sumInstructionAmounts(instructions);
    const currentHeight = this.clock.currentHeight();

    const signerResult = await this.registry.isAuthorized(caller);
    if (signerResult.isErr()) return err(signerResult.error);

    const balanceResult = await this.transferService.getBalance(caller);
    if (balanceResult.isErr()) return err(balanceResult.error);

    const inputs = {
      currentHeight,
      totalAmount,
      availableBalance: balanceResult.value,
      callerIsAuthorizedSigner: signerResult.value,
      signatureCount: countDistinctSignatures(signatures),
      performanceMetric: state.performanceMetric,
    };
    const evaluation = evaluateConditions(inputs, this.config);

    const gate = assertConditions({ caller, inputs, evaluation }, this.config);
    if (gate.isErr()) {
      logger.info(
        { caller, code: gate.error.code, conditionsMet: evaluation.conditionsMet, totalAmount },
        `Batch rejected: ${gate.error.message}`
      );
      return err(gate.error);
    }

    const batchId = state.nextBatchId;
    logger.debug(
      { batchId, caller, instructionCount: instructions.length, totalAmount, height: currentHeight },
      'Executing batch'
    );

    const outcome = await this.applier.apply(caller, instructions);
    const compensated = outcome.success ? undefined : await this.compensateIfEnabled(caller, outcome.applied);

    const record: BatchRecord = {
      id: batchId,
      timestamp: currentHeight,
      caller,
      totalAmount,
      success: outcome.success,
      conditionsMet: evaluation.conditionsMet,
      instructionCount: instructions.length,
      failedInstructionIndex: outcome.success ? undefined : outcome.failedIndex,
      failureReason: outcome.success ? undefined : outcome.reason,
      createdAt: new Date(),
    };

    const written = await this.data.executeInTransaction(async (tx): Promise<Result<EngineState, Error>> => {
      const put = await new AuditLedger(tx.records, tx.state).put(record);
      if (put.isErr()) return err(put.error);

      return tx.state.update({
        nextBatchId: batchId + 1,
        ...(outcome.success && { lastExecutionTimestamp: currentHeight }),
      });
    });

    if (written.isErr()) {
      logger.error(
        { batchId, success: outcome.success, error: written.error },
        'Failed to record batch after its transfers ran'
      );
      // A failed outcome was already compensated above
      const reversed = outcome.success ? await this.compensateIfEnabled(caller, outcome.applied) : compensated;
      return err(new RecordWriteFailedError({ batchId, compensated: reversed }, { cause: written.error }));
    }

    logger.info(
      { batchId, caller, success: record.success, totalAmount, instructionCount: record.instructionCount },
      'Batch recorded'
    );

    if (!outcome.success) {
      return err(
        new TransferFailedError(
          { batchId, failedIndex: outcome.failedIndex, reason: outcome.reason, compensated },
          { cause: outcome.error }
        )
      );
    }

    return ok(freezeRecord(record));
  }

  private async compensateIfEnabled(
    source: string,
    applied: readonly TransferInstruction[]
  ): Promise<boolean | undefined> {
    if (!this.config.compensateOnFailure) {
      return undefined;
    }
    const result = await compensateTransfers(this.transferService, source, applied);
    return result.compensated;
  }
}
