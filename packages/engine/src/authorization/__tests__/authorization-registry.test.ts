import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestDataContext } from '../../__tests__/test-utils.js';
import { EngineNotInitializedError, InvalidInputError, UnauthorizedError } from '../../errors.js';
import type { EngineDataContext } from '../../persistence/engine-data-context.js';
import { AuthorizationRegistry } from '../authorization-registry.js';

describe('AuthorizationRegistry', () => {
  let data: EngineDataContext;
  let registry: AuthorizationRegistry;

  beforeEach(async () => {
    data = await createTestDataContext();
    registry = new AuthorizationRegistry(data.state, data.signers);
    await data.state.initialize('owner');
  });

  afterEach(async () => {
    await data.close();
  });

  it('denies unknown identities by default', async () => {
    expect((await registry.isAuthorized('alice'))._unsafeUnwrap()).toBe(false);
  });

  it('lets the owner add signers idempotently', async () => {
    expect((await registry.addSigner('owner', 'alice')).isOk()).toBe(true);
    expect((await registry.addSigner('owner', 'alice')).isOk()).toBe(true);

    expect((await registry.isAuthorized('alice'))._unsafeUnwrap()).toBe(true);
    expect((await registry.listSigners())._unsafeUnwrap()).toEqual(['alice']);
  });

  it('rejects signer changes from anyone but the owner', async () => {
    const result = await registry.addSigner('mallory', 'mallory');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(UnauthorizedError);
    expect(error.message).toBe('mallory is not authorized to add signer: caller is not the owner');
    expect((await registry.isAuthorized('mallory'))._unsafeUnwrap()).toBe(false);
  });

  it('removes signers, treating an absent one as a no-op', async () => {
    await registry.addSigner('owner', 'alice');
    await registry.addSigner('owner', 'bob');

    expect((await registry.removeSigner('owner', 'alice')).isOk()).toBe(true);
    expect((await registry.removeSigner('owner', 'nobody')).isOk()).toBe(true);
    expect((await registry.listSigners())._unsafeUnwrap()).toEqual(['bob']);

    expect((await registry.removeSigner('bob', 'bob'))._unsafeUnwrapErr()).toBeInstanceOf(UnauthorizedError);
  });

  it('transfers ownership so only the new owner can administer', async () => {
    expect((await registry.setOwner('owner', 'carol')).isOk()).toBe(true);
    expect((await registry.getOwner())._unsafeUnwrap()).toBe('carol');

    expect((await registry.addSigner('owner', 'alice'))._unsafeUnwrapErr()).toBeInstanceOf(UnauthorizedError);
    expect((await registry.addSigner('carol', 'alice')).isOk()).toBe(true);
  });

  it('rejects a blank principal before checking the caller', async () => {
    const result = await registry.setOwner('mallory', '   ');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error.message).toBe('Invalid new owner: Principal must not be empty');
  });

  it('reports an uninitialized engine', async () => {
    const empty = await createTestDataContext();
    const emptyRegistry = new AuthorizationRegistry(empty.state, empty.signers);

    expect((await emptyRegistry.getOwner())._unsafeUnwrapErr()).toBeInstanceOf(EngineNotInitializedError);
    expect((await emptyRegistry.addSigner('owner', 'alice'))._unsafeUnwrapErr()).toBeInstanceOf(
      EngineNotInitializedError
    );

    await empty.close();
  });
});
