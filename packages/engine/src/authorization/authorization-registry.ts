import { fromZod, formatZodIssues, PrincipalSchema } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { EngineNotInitializedError, InvalidInputError, UnauthorizedError } from '../errors.js';
import type { EngineStateStore, SignerStore } from '../persistence/stores.js';

const logger = getLogger('AuthorizationRegistry');

export function parsePrincipal(value: unknown, label = 'principal'): Result<string, InvalidInputError> {
  return fromZod(PrincipalSchema, value).mapErr(
    (error) => new InvalidInputError(`Invalid ${label}: ${formatZodIssues(error)}`)
  );
}

/**
 * Owner role and the default-deny set of authorized signers.
 *
 * Mutations are owner-only. Callers are expected to serialize mutations
 * (the engine runs them on its write queue).
 */
export class AuthorizationRegistry {
  constructor(
    private readonly state: EngineStateStore,
    private readonly signers: SignerStore
  ) {}

  async getOwner(): Promise<Result<string, EngineNotInitializedError | Error>> {
    const stateResult = await this.state.get();
    if (stateResult.isErr()) return err(stateResult.error);
    if (!stateResult.value) return err(new EngineNotInitializedError());
    return ok(stateResult.value.owner);
  }

  async requireOwner(
    caller: string,
    operation: string
  ): Promise<Result<void, UnauthorizedError | EngineNotInitializedError | Error>> {
    const ownerResult = await this.getOwner();
    if (ownerResult.isErr()) return err(ownerResult.error);

    if (ownerResult.value !== caller) {
      logger.info({ caller, operation }, 'Rejected non-owner caller');
      return err(new UnauthorizedError(operation, caller, 'caller is not the owner'));
    }
    return ok(undefined);
  }

  async setOwner(caller: string, newOwner: string): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    const parsed = parsePrincipal(newOwner, 'new owner');
    if (parsed.isErr()) return err(parsed.error);

    const allowed = await this.requireOwner(caller, 'set owner');
    if (allowed.isErr()) return err(allowed.error);

    const updated = await this.state.update({ owner: parsed.value });
    if (updated.isErr()) return err(updated.error);

    logger.info({ previousOwner: caller, owner: parsed.value }, 'Owner changed');
    return ok(undefined);
  }

  /**
   * Idempotent: adding an existing signer succeeds without change.
   */
  async addSigner(caller: string, signer: string): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    const parsed = parsePrincipal(signer, 'signer');
    if (parsed.isErr()) return err(parsed.error);

    const allowed = await this.requireOwner(caller, 'add signer');
    if (allowed.isErr()) return err(allowed.error);

    const added = await this.signers.add(parsed.value);
    if (added.isErr()) return err(added.error);

    if (added.value) {
      logger.info({ signer: parsed.value }, 'Authorized signer added');
    }
    return ok(undefined);
  }

  /**
   * Removing a principal that is not a signer succeeds without change.
   */
  async removeSigner(
    caller: string,
    signer: string
  ): Promise<Result<void, UnauthorizedError | InvalidInputError | Error>> {
    const parsed = parsePrincipal(signer, 'signer');
    if (parsed.isErr()) return err(parsed.error);

    const allowed = await this.requireOwner(caller, 'remove signer');
    if (allowed.isErr()) return err(allowed.error);

    const removed = await this.signers.remove(parsed.value);
    if (removed.isErr()) return err(removed.error);

    if (removed.value) {
      logger.info({ signer: parsed.value }, 'Authorized signer removed');
    }
    return ok(undefined);
  }

  async isAuthorized(identity: string): Promise<Result<boolean, Error>> {
    return this.signers.has(identity);
  }

  async listSigners(): Promise<Result<string[], Error>> {
    return this.signers.list();
  }
}
