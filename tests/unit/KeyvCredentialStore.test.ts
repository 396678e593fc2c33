// tests/unit/KeyvCredentialStore.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { KeyvCredentialStore } from '../../src/core/store/KeyvCredentialStore';
import { AuthError, ConfigNotFoundError } from '../../src/utils/errors';
import { TEST_TOKENS, quietLogger } from '../helpers/harness';

describe('KeyvCredentialStore', () => {
  let store: KeyvCredentialStore;

  beforeEach(() => {
    store = new KeyvCredentialStore({ backend: 'memory' }, quietLogger());
  });

  afterEach(async () => {
    await store.disconnect();
  });

  it('should return null for unknown names', async () => {
    expect(await store.getCredentials('unknown')).toBeNull();
    expect(await store.getSession('unknown')).toBeNull();
    expect(await store.getConfig('unknown')).toBeNull();
  });

  it('should store credentials, sessions and config per name', async () => {
    await store.putCredentials('acme', TEST_TOKENS);
    await store.putSession('acme', 'session-1');
    await store.putConfig('acme', { baseUrl: 'https://dep.test' });

    expect(await store.getCredentials('acme')).toEqual(TEST_TOKENS);
    expect(await store.getSession('acme')).toBe('session-1');
    expect(await store.getConfig('acme')).toEqual({ baseUrl: 'https://dep.test' });
    expect(await store.getSession('other')).toBeNull();
  });

  it('should overwrite the session of a name', async () => {
    await store.putSession('acme', 'session-1');
    await store.putSession('acme', 'session-2');

    expect(await store.getSession('acme')).toBe('session-2');
  });

  it('should delete every record of a name', async () => {
    await store.putCredentials('acme', TEST_TOKENS);
    await store.putSession('acme', 'session-1');
    await store.delete('acme');

    expect(await store.getCredentials('acme')).toBeNull();
    expect(await store.getSession('acme')).toBeNull();
  });

  it('should reject malformed credentials with AuthError', async () => {
    await store.putCredentials('acme', { ...TEST_TOKENS, consumer_secret: '' });

    await expect(store.getCredentials('acme')).rejects.toBeInstanceOf(AuthError);
  });

  it('should reject malformed config with ConfigNotFoundError', async () => {
    await store.putConfig('acme', { baseUrl: 'not a url' });

    await expect(store.getConfig('acme')).rejects.toBeInstanceOf(ConfigNotFoundError);
  });

  it('should round-trip through encryption', async () => {
    const encrypted = new KeyvCredentialStore(
      {
        backend: 'memory',
        encryption: { key: 'c'.repeat(64), algorithm: 'aes-256-gcm' },
      },
      quietLogger()
    );

    await encrypted.putCredentials('acme', TEST_TOKENS);
    await encrypted.putSession('acme', 'session-1');

    expect(await encrypted.getCredentials('acme')).toEqual(TEST_TOKENS);
    expect(await encrypted.getSession('acme')).toBe('session-1');
  });
});
