// src/client.ts

import type { AxiosInstance } from 'axios';
import type { CredentialStore } from './core/store/types';
import type { CallOptions } from './api/types';
import type { Profile, DefineProfileResponse, AssignProfileResponse, ClearProfileResponse } from './api/profile/types';
import type {
  DeviceRequest,
  DeviceResponse,
  DeviceDetailsResponse,
  DisownDevicesResponse,
} from './api/devices/types';
import type { AccountDetail } from './api/account/types';
import { KeyvCredentialStore } from './core/store/KeyvCredentialStore';
import { SessionCache } from './core/session/SessionCache';
import { SessionManager } from './core/session/SessionManager';
import { OAuth1Signer } from './core/auth/OAuth1Signer';
import { HttpCore } from './core/http/HttpCore';
import { ResponseDecoder } from './core/http/ResponseDecoder';
import { DEFAULT_TIMEOUT_MS } from './core/http/types';
import { resolveOperations, type OperationTable } from './api/operations';
import { AccountApi } from './api/account/AccountApi';
import { ProfileApi } from './api/profile/ProfileApi';
import { DeviceApi } from './api/devices/DeviceApi';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, type ClientConfig, type ResolvedClientConfig } from './config/ConfigValidator';

/**
 * Collaborators that replace the ones built from config.
 */
export interface ClientOverrides {
  store?: CredentialStore;
  cache?: SessionCache;
  signer?: OAuth1Signer;
  axiosInstance?: AxiosInstance;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class DEPClient {
  readonly store: CredentialStore;
  readonly sessions: SessionManager;
  readonly routes: OperationTable;
  private metrics: MetricsCollector;
  private logger: Logger;
  private accountApi: AccountApi;
  private profileApi: ProfileApi;
  private deviceApi: DeviceApi;

  private constructor(config: ResolvedClientConfig, overrides: ClientOverrides) {
    const logger = overrides.logger ?? new Logger(config.logging);
    const metrics = overrides.metrics ?? new MetricsCollector(config.metrics);
    const store = overrides.store ?? new KeyvCredentialStore(config.store, logger);
    const httpConfig = { ...config.http, timeout: config.http.timeout ?? DEFAULT_TIMEOUT_MS };

    const sessions = new SessionManager(
      { store, signer: overrides.signer ?? new OAuth1Signer(), metrics, logger },
      {
        defaultBaseUrl: config.defaultBaseUrl,
        timeout: httpConfig.timeout,
        userAgent: httpConfig.userAgent,
        cache: overrides.cache,
        axiosInstance: overrides.axiosInstance,
      }
    );
    const decoder = new ResponseDecoder(config.authFailureMarkers);
    const http = new HttpCore(
      { sessions, decoder, metrics, logger },
      httpConfig,
      overrides.axiosInstance
    );

    this.store = store;
    this.sessions = sessions;
    this.routes = resolveOperations(config.operations);
    this.metrics = metrics;
    this.logger = logger;

    const deps = { http, routes: this.routes, logger };
    this.accountApi = new AccountApi(deps);
    this.profileApi = new ProfileApi(deps);
    this.deviceApi = new DeviceApi(deps);
  }

  /**
   * Create a DEP client
   *
   * @param config - Client configuration; validated before anything is built
   * @param overrides - Collaborators to use instead of the configured ones
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const client = DEPClient.create({
   *   store: { backend: 'redis', url: process.env.REDIS_URL },
   *   operations: { assignProfile: { method: 'POST' } },
   * });
   * const result = await client.assignProfile('acme', profileUuid, ['SERIAL1']);
   * ```
   */
  static create(config: ClientConfig = {}, overrides: ClientOverrides = {}): DEPClient {
    const client = new DEPClient(validateConfig(config), overrides);
    client.logger.debug('DEP client created', { routes: client.routes });
    return client;
  }

  async account(name: string, opts?: CallOptions): Promise<AccountDetail> {
    return this.accountApi.account(name, opts);
  }

  async defineProfile(
    name: string,
    profile: Profile,
    opts?: CallOptions
  ): Promise<DefineProfileResponse> {
    return this.profileApi.defineProfile(name, profile, opts);
  }

  async getProfile(name: string, profileUuid: string, opts?: CallOptions): Promise<Profile> {
    return this.profileApi.getProfile(name, profileUuid, opts);
  }

  async assignProfile(
    name: string,
    profileUuid: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<AssignProfileResponse> {
    return this.profileApi.assignProfile(name, profileUuid, serials, opts);
  }

  async removeProfile(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<ClearProfileResponse> {
    return this.profileApi.removeProfile(name, serials, opts);
  }

  async fetchDevices(
    name: string,
    request?: DeviceRequest,
    opts?: CallOptions
  ): Promise<DeviceResponse> {
    return this.deviceApi.fetchDevices(name, request, opts);
  }

  async syncDevices(
    name: string,
    request: DeviceRequest,
    opts?: CallOptions
  ): Promise<DeviceResponse> {
    return this.deviceApi.syncDevices(name, request, opts);
  }

  async deviceDetails(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<DeviceDetailsResponse> {
    return this.deviceApi.deviceDetails(name, serials, opts);
  }

  async disownDevices(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<DisownDevicesResponse> {
    return this.deviceApi.disownDevices(name, serials, opts);
  }

  /** Prometheus text exposition of the client's metrics. */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    if (this.store instanceof KeyvCredentialStore) {
      await this.store.disconnect();
    }
  }
}
