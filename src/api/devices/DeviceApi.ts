// src/api/devices/DeviceApi.ts

import { BaseApi } from '../BaseApi';
import type { CallOptions } from '../types';
import {
  DeviceDetailsResponseSchema,
  DeviceListRequestSchema,
  DeviceRequestSchema,
  DeviceResponseSchema,
  DisownDevicesResponseSchema,
  type DeviceDetailsResponse,
  type DeviceRequest,
  type DeviceResponse,
  type DisownDevicesResponse,
} from './types';

export class DeviceApi extends BaseApi {
  /**
   * Page through every device assigned to the server. Pass the returned
   * cursor back until `more_to_follow` is false.
   */
  async fetchDevices(
    name: string,
    request: DeviceRequest = {},
    opts?: CallOptions
  ): Promise<DeviceResponse> {
    const body = this.buildBody('fetchDevices', DeviceRequestSchema, request);
    return this.call('fetchDevices', name, DeviceResponseSchema, body, opts);
  }

  /** Changes since the cursor of an earlier fetch or sync. */
  async syncDevices(
    name: string,
    request: DeviceRequest,
    opts?: CallOptions
  ): Promise<DeviceResponse> {
    const body = this.buildBody('syncDevices', DeviceRequestSchema, request);
    return this.call('syncDevices', name, DeviceResponseSchema, body, opts);
  }

  async deviceDetails(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<DeviceDetailsResponse> {
    const body = this.buildBody('deviceDetails', DeviceListRequestSchema, { devices: serials });
    return this.call('deviceDetails', name, DeviceDetailsResponseSchema, body, opts);
  }

  async disownDevices(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<DisownDevicesResponse> {
    const body = this.buildBody('disownDevices', DeviceListRequestSchema, { devices: serials });
    return this.call('disownDevices', name, DisownDevicesResponseSchema, body, opts);
  }
}
