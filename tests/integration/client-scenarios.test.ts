// tests/integration/client-scenarios.test.ts

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { DEPClient } from '../../src/client';
import {
  AuthError,
  ConfigNotFoundError,
  InvalidRequestError,
  ProtocolError,
} from '../../src/utils/errors';
import { BASE_URL, createHarness, mockSessions } from '../helpers/harness';

describe('DEPClient scenarios', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should return per-device statuses of a partially successful assignment', async () => {
    const { client } = await createHarness();
    mockSessions(['session-1']);
    nock(BASE_URL)
      .put('/profile/devices', { profile_uuid: 'P1', devices: ['S1', 'S2'] })
      .reply(200, {
        profile_uuid: 'P1',
        devices: { S1: 'SUCCESS', S2: 'NOT_ACCESSIBLE' },
      });

    const result = await client.assignProfile('acme', 'P1', ['S1', 'S2']);

    expect(result).toEqual({
      profile_uuid: 'P1',
      devices: { S1: 'SUCCESS', S2: 'NOT_ACCESSIBLE' },
    });
  });

  it('should recover from an expired session with exactly two operation calls', async () => {
    const { client, metrics } = await createHarness();
    const handshakes = mockSessions(['session-1', 'session-2']);
    let calls = 0;
    nock(BASE_URL)
      .get('/account')
      .times(2)
      .reply(() => {
        calls++;
        return calls === 1
          ? ([401, 'UNAUTHORIZED'] as const)
          : ([200, { server_name: 'MDM', server_uuid: 'u-1' }] as const);
      });

    const account = await client.account('acme');

    expect(account).toMatchObject({ server_name: 'MDM', server_uuid: 'u-1' });
    expect(calls).toBe(2);
    expect(handshakes.count).toBe(2);
    expect(await metrics.getMetrics()).toContain('dep_auth_retries_total 1');
  });

  it('should fail with AuthError when every session is rejected', async () => {
    const { client } = await createHarness();
    mockSessions(['session-1', 'session-2']);
    nock(BASE_URL).post('/devices').times(2).reply(401, 'UNAUTHORIZED');

    await expect(client.deviceDetails('acme', ['S1'])).rejects.toBeInstanceOf(AuthError);
  });

  it('should send every operation with its verb, path and body', async () => {
    const { client } = await createHarness();
    mockSessions(['session-1']);
    const scope = nock(BASE_URL)
      .get('/account')
      .reply(200, { server_name: 'MDM', server_uuid: 'u-1' })
      .post('/profile', { profile_name: 'Default', url: 'https://mdm.test/enroll' })
      .reply(200, { profile_uuid: 'P1', devices: [] })
      .get('/profile')
      .query({ profile_uuid: 'P1' })
      .reply(200, { profile_name: 'Default', url: 'https://mdm.test/enroll', profile_uuid: 'P1' })
      .delete('/profile/devices', { devices: ['S1'] })
      .reply(200, { devices: { S1: 'SUCCESS' } })
      .post('/server/devices', { limit: 100 })
      .reply(200, { devices: [{ serial_number: 'S1' }], cursor: 'c1', more_to_follow: false })
      .post('/devices/sync', { cursor: 'c1' })
      .reply(200, { devices: [{ serial_number: 'S2', op_type: 'added' }], cursor: 'c2' })
      .post('/devices', { devices: ['S1'] })
      .reply(200, { devices: { S1: { serial_number: 'S1', model: 'iPad' } } })
      .post('/devices/disown', { devices: ['S1'] })
      .reply(200, { devices: { S1: 'SUCCESS' } });

    expect(await client.account('acme')).toMatchObject({ server_uuid: 'u-1' });
    expect(
      await client.defineProfile('acme', { profile_name: 'Default', url: 'https://mdm.test/enroll' })
    ).toEqual({ profile_uuid: 'P1', devices: [] });
    expect(await client.getProfile('acme', 'P1')).toMatchObject({ profile_uuid: 'P1' });
    expect(await client.removeProfile('acme', ['S1'])).toEqual({ devices: { S1: 'SUCCESS' } });
    expect(await client.fetchDevices('acme', { limit: 100 })).toEqual({
      devices: [{ serial_number: 'S1' }],
      cursor: 'c1',
      more_to_follow: false,
    });
    expect(await client.syncDevices('acme', { cursor: 'c1' })).toEqual({
      devices: [{ serial_number: 'S2', op_type: 'added' }],
      cursor: 'c2',
    });
    expect(await client.deviceDetails('acme', ['S1'])).toEqual({
      devices: { S1: { serial_number: 'S1', model: 'iPad' } },
    });
    expect(await client.disownDevices('acme', ['S1'])).toEqual({ devices: { S1: 'SUCCESS' } });
    expect(scope.isDone()).toBe(true);
  });

  it('should use an overridden verb for assignProfile', async () => {
    const { client } = await createHarness({ operations: { assignProfile: { method: 'POST' } } });
    mockSessions(['session-1']);
    const scope = nock(BASE_URL)
      .post('/profile/devices', { profile_uuid: 'P1', devices: ['S1'] })
      .reply(200, { profile_uuid: 'P1', devices: { S1: 'SUCCESS' } });

    await client.assignProfile('acme', 'P1', ['S1']);
    expect(scope.isDone()).toBe(true);
  });

  it('should reject an unparseable success body with ProtocolError', async () => {
    const { client } = await createHarness();
    mockSessions(['session-1']);
    nock(BASE_URL).post('/server/devices').reply(200, '<html>maintenance</html>');

    await expect(client.fetchDevices('acme')).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should keep sessions of different names apart', async () => {
    const { client } = await createHarness({}, ['acme', 'globex']);
    mockSessions(['session-a', 'session-g']);
    const scope = nock(BASE_URL)
      .get('/account')
      .matchHeader('x-adm-auth-session', 'session-a')
      .reply(200, { server_name: 'A', server_uuid: 'a' })
      .get('/account')
      .matchHeader('x-adm-auth-session', 'session-g')
      .reply(200, { server_name: 'G', server_uuid: 'g' });

    expect((await client.account('acme')).server_name).toBe('A');
    expect((await client.account('globex')).server_name).toBe('G');
    expect(scope.isDone()).toBe(true);
  });

  it('should reject an invalid request body before contacting DEP', async () => {
    const { client } = await createHarness();

    const error = await client.fetchDevices('acme', { limit: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({
      code: 'INVALID_REQUEST',
      kind: 'validation',
      details: { operation: 'fetchDevices', issues: ['limit: Number must be greater than 0'] },
    });
  });

  it('should reject names without credentials', async () => {
    const { client } = await createHarness();

    await expect(client.account('unknown')).rejects.toBeInstanceOf(ConfigNotFoundError);
  });

  it('should validate configuration on create', () => {
    expect(() => DEPClient.create({ store: { backend: 'redis' } })).toThrow();
  });

  it('should close the store', async () => {
    const { client } = await createHarness();
    await expect(client.close()).resolves.toBeUndefined();
  });
});
