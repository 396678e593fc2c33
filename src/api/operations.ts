// src/api/operations.ts

import type { OperationRoute } from '../core/http/types';

/**
 * Verb and path of every DEP operation.
 *
 * assignProfile is a PUT: the DEP simulator and older deployed servers
 * require it, although current documentation lists POST. Deployments that
 * need the documented verb override it through client config rather than
 * by editing this table.
 */
export const DEP_OPERATIONS = {
  account: { method: 'GET', path: '/account' },
  defineProfile: { method: 'POST', path: '/profile' },
  getProfile: { method: 'GET', path: '/profile' },
  assignProfile: { method: 'PUT', path: '/profile/devices' },
  removeProfile: { method: 'DELETE', path: '/profile/devices' },
  fetchDevices: { method: 'POST', path: '/server/devices' },
  syncDevices: { method: 'POST', path: '/devices/sync' },
  deviceDetails: { method: 'POST', path: '/devices' },
  disownDevices: { method: 'POST', path: '/devices/disown' },
} as const satisfies Record<string, OperationRoute>;

export type OperationName = keyof typeof DEP_OPERATIONS;

export type OperationTable = Record<OperationName, OperationRoute>;

export type OperationOverrides = Partial<Record<OperationName, Partial<OperationRoute>>>;

export function resolveOperations(overrides: OperationOverrides = {}): OperationTable {
  const resolve = (name: OperationName): OperationRoute => ({
    ...DEP_OPERATIONS[name],
    ...overrides[name],
  });

  return {
    account: resolve('account'),
    defineProfile: resolve('defineProfile'),
    getProfile: resolve('getProfile'),
    assignProfile: resolve('assignProfile'),
    removeProfile: resolve('removeProfile'),
    fetchDevices: resolve('fetchDevices'),
    syncDevices: resolve('syncDevices'),
    deviceDetails: resolve('deviceDetails'),
    disownDevices: resolve('disownDevices'),
  };
}
