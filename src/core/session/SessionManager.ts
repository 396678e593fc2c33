// src/core/session/SessionManager.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { CredentialStore, DEPConfig, OAuth1Tokens } from '../store/types';
import { OAuth1TokensSchema } from '../store/schemas';
import type { OAuth1Signer } from '../auth/OAuth1Signer';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { SessionCache } from './SessionCache';
import { extractApiCode, mapTransportError } from '../http/ResponseDecoder';
import { DEFAULT_TIMEOUT_MS } from '../http/types';
import {
  AuthError,
  ConfigNotFoundError,
  DEPError,
  ProtocolError,
  ServerError,
  StoreError,
  UnexpectedResponseError,
} from '../../utils/errors';
import { waitFor } from '../../utils/abort';
import { withSessionSpan } from '../../observability/tracing';

export const DEFAULT_BASE_URL = 'https://mdmenrollment.apple.com';

const SessionResponseSchema = z.object({
  auth_session_token: z.string().min(1),
});

export interface SessionManagerOptions {
  defaultBaseUrl?: string;
  timeout?: number;
  userAgent?: string;
  cache?: SessionCache;
  axiosInstance?: AxiosInstance;
}

export interface SessionManagerDeps {
  store: CredentialStore;
  signer: OAuth1Signer;
  metrics: MetricsCollector;
  logger: Logger;
}

/**
 * Owns the session token of every DEP name.
 *
 * Tokens carry no TTL: a token stays cached until the request executor
 * reports a rejection through `invalidate`. Concurrent callers for a name
 * with no token share one handshake; names never wait on each other.
 */
export class SessionManager {
  private inFlight: Map<string, Promise<string>> = new Map();
  // names whose persisted session was rejected and must not be reused
  private stale: Set<string> = new Set();
  private cache: SessionCache;
  private http: AxiosInstance;
  private defaultBaseUrl: string;
  private timeout: number;

  constructor(
    private deps: SessionManagerDeps,
    private options: SessionManagerOptions = {}
  ) {
    this.cache = options.cache ?? new SessionCache();
    this.http = options.axiosInstance ?? axios.create();
    this.defaultBaseUrl = options.defaultBaseUrl ?? DEFAULT_BASE_URL;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Return a session token for `name`, authenticating if none is cached.
   *
   * @throws {ConfigNotFoundError} No credentials for the name
   * @throws {StoreError} The credential store failed
   * @throws {AuthError} Credentials malformed or rejected by DEP
   * @throws {TransportError} Network failure during the handshake
   */
  async ensureSession(name: string, signal?: AbortSignal): Promise<string> {
    assertName(name);

    const cached = this.cache.get(name);
    if (cached) return cached;

    let pending = this.inFlight.get(name);
    if (pending) {
      this.deps.metrics.incrementCounter('dep_session_dedup');
      this.deps.logger.debug('Session handshake in progress, waiting', { depName: name });
    } else {
      pending = this.establish(name).finally(() => this.inFlight.delete(name));
      this.inFlight.set(name, pending);
      // waiters may all abort; the outcome still has to be observed
      void pending.catch((error: unknown) => {
        this.deps.logger.debug('Session handshake failed', {
          depName: name,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }

    return waitFor(pending, signal, { depName: name });
  }

  /**
   * Drop the session of `name`. The next `ensureSession` re-authenticates
   * instead of reusing a persisted token.
   */
  invalidate(name: string): void {
    this.cache.delete(name);
    this.stale.add(name);
    this.deps.logger.debug('Session invalidated', { depName: name });
  }

  /**
   * Adopt a token DEP rotated through the X-ADM-Auth-Session header. The
   * cached token only changes once the store holds the new one.
   */
  async updateSession(name: string, token: string): Promise<void> {
    assertName(name);
    await this.callStore(name, () => this.deps.store.putSession(name, token));
    this.cache.set(name, token);
    this.stale.delete(name);
    this.deps.logger.debug('Session rotated by server', { depName: name });
  }

  /**
   * Server configuration for `name`, falling back to the client default.
   */
  async resolveConfig(name: string): Promise<DEPConfig> {
    assertName(name);
    const getConfig = this.deps.store.getConfig?.bind(this.deps.store);
    const config = getConfig ? await this.callStore(name, () => getConfig(name)) : null;

    return { baseUrl: trimSlash(config?.baseUrl ?? this.defaultBaseUrl) };
  }

  private async establish(name: string): Promise<string> {
    if (!this.stale.has(name)) {
      const persisted = await this.callStore(name, () => this.deps.store.getSession(name));
      if (persisted) {
        this.cache.set(name, persisted);
        this.deps.logger.debug('Session loaded from store', { depName: name });
        return persisted;
      }
    }

    const token = await this.authenticate(name);
    await this.callStore(name, () => this.deps.store.putSession(name, token));
    this.cache.set(name, token);
    this.stale.delete(name);

    return token;
  }

  private async authenticate(name: string): Promise<string> {
    return withSessionSpan(name, async () => {
      const credentials = await this.loadCredentials(name);
      const { baseUrl } = await this.resolveConfig(name);
      const url = `${baseUrl}/session`;
      const startTime = Date.now();

      let response: AxiosResponse<string>;
      try {
        response = await this.http.get<string>(url, {
          headers: {
            Authorization: this.deps.signer.authorizationHeader('GET', url, credentials),
            'User-Agent': this.options.userAgent ?? 'dep-client/0.1',
            'X-Server-Protocol-Version': '3',
          },
          timeout: this.timeout,
          responseType: 'text',
          transformResponse: [(data: string) => data],
          validateStatus: () => true,
        });
      } catch (error: unknown) {
        this.deps.metrics.incrementCounter('dep_auth_handshakes_total', { status: 'error' });
        throw mapTransportError(error, { depName: name, url });
      }

      this.deps.metrics.incrementCounter('dep_auth_handshakes_total', {
        status: response.status,
      });
      this.deps.logger.info('DEP session handshake', {
        depName: name,
        status: response.status,
        durationMs: Date.now() - startTime,
      });

      return this.parseSessionResponse(name, response.status, response.data ?? '');
    });
  }

  private parseSessionResponse(name: string, status: number, body: string): string {
    const details = { depName: name, path: '/session', status, body };

    if (status >= 200 && status < 300) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        throw new ProtocolError('DEP session response is not JSON', details);
      }
      const result = SessionResponseSchema.safeParse(parsed);
      if (!result.success) {
        throw new ProtocolError('DEP session response has no auth_session_token', details);
      }
      return result.data.auth_session_token;
    }

    const apiCode = extractApiCode(body);
    if (status >= 400 && status < 500) {
      throw new AuthError(`DEP rejected the credentials for ${name} (${status})`, {
        ...details,
        apiCode,
      });
    }
    if (status >= 500) {
      throw new ServerError(`DEP session endpoint failed with ${status}`, status, body, {
        depName: name,
        path: '/session',
        apiCode,
      });
    }
    throw new UnexpectedResponseError(`DEP session endpoint answered ${status}`, status, body, {
      depName: name,
      path: '/session',
    });
  }

  private async loadCredentials(name: string): Promise<OAuth1Tokens> {
    const credentials = await this.callStore(name, () => this.deps.store.getCredentials(name));
    if (!credentials) {
      throw new ConfigNotFoundError(`No DEP credentials configured for ${name}`, {
        depName: name,
      });
    }

    const result = OAuth1TokensSchema.safeParse(credentials);
    if (!result.success) {
      throw new AuthError(`DEP credentials for ${name} are malformed`, {
        depName: name,
        issues: result.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    return result.data;
  }

  private async callStore<T>(name: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error: unknown) {
      if (error instanceof DEPError) throw error;
      throw new StoreError(`Credential store failed for ${name}`, {
        depName: name,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function assertName(name: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigNotFoundError('DEP name must be a non-empty string');
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
