// tests/unit/operations.test.ts

import { describe, it, expect } from 'vitest';
import { DEP_OPERATIONS, resolveOperations } from '../../src/api/operations';

describe('operations', () => {
  it('should default assignProfile to PUT', () => {
    expect(DEP_OPERATIONS.assignProfile).toEqual({ method: 'PUT', path: '/profile/devices' });
  });

  it('should return the defaults without overrides', () => {
    expect(resolveOperations()).toEqual(DEP_OPERATIONS);
  });

  it('should merge a partial override', () => {
    const routes = resolveOperations({ assignProfile: { method: 'POST' } });

    expect(routes.assignProfile).toEqual({ method: 'POST', path: '/profile/devices' });
    expect(routes.removeProfile).toEqual({ method: 'DELETE', path: '/profile/devices' });
  });

  it('should not mutate the default table', () => {
    resolveOperations({ account: { path: '/v2/account' } });
    expect(DEP_OPERATIONS.account.path).toBe('/account');
  });
});
