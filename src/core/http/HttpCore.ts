// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import {
  DEFAULT_TIMEOUT_MS,
  type HttpConfig,
  type OperationRoute,
  type RawResponse,
  type RequestOptions,
} from './types';
import type { SessionManager } from '../session/SessionManager';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { ResponseDecoder, mapTransportError } from './ResponseDecoder';
import { AuthError, RequestAbortedError, StoreError } from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const SESSION_HEADER = 'X-ADM-Auth-Session';
const SERVER_PROTOCOL_VERSION = '3';

export interface HttpCoreDeps {
  sessions: SessionManager;
  decoder: ResponseDecoder;
  metrics: MetricsCollector;
  logger: Logger;
}

/**
 * Sends DEP operations on behalf of a DEP name.
 *
 * Every request carries the name's session token. When DEP signals the
 * token expired, the session is invalidated and the request is sent once
 * more with a fresh token; a second rejection surfaces as AuthError.
 * Nothing else is retried here.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private queues: Map<string, PQueue> = new Map();

  constructor(
    private deps: HttpCoreDeps,
    private config: HttpConfig = {},
    axiosInstance?: AxiosInstance
  ) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true }),
      });
  }

  /**
   * Send an operation and decode its response against `schema`.
   *
   * @param name - DEP name selecting credentials and server
   * @param route - Verb and path, used exactly as given
   * @param schema - Expected shape of a 2xx body
   * @param body - Request body; `undefined` sends no body at all
   */
  async execute<S extends z.ZodTypeAny>(
    name: string,
    route: OperationRoute,
    schema: S,
    body?: unknown,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const response = await this.send(name, route, body, options);
    return this.deps.decoder.decode(response.status, response.body, schema, {
      depName: name,
      method: route.method,
      path: route.path,
    });
  }

  /**
   * Send an operation, handling one session expiry, and return the raw
   * response for the caller to classify.
   */
  async send(
    name: string,
    route: OperationRoute,
    body?: unknown,
    options: RequestOptions = {}
  ): Promise<RawResponse> {
    return this.runThroughQueue(name, async () => {
      const first = await this.attempt(name, route, body, options);
      if (!this.deps.decoder.isAuthFailure(first.status, first.body)) {
        return first;
      }

      this.deps.logger.info('DEP session rejected, re-authenticating', {
        depName: name,
        status: first.status,
        path: route.path,
      });
      this.deps.sessions.invalidate(name);
      this.deps.metrics.incrementCounter('dep_auth_retries');

      const second = await this.attempt(name, route, body, options);
      if (this.deps.decoder.isAuthFailure(second.status, second.body)) {
        throw new AuthError(`DEP rejected a fresh session for ${name}`, {
          depName: name,
          method: route.method,
          path: route.path,
          status: second.status,
          body: second.body,
        });
      }
      return second;
    });
  }

  private async attempt(
    name: string,
    route: OperationRoute,
    body: unknown,
    options: RequestOptions
  ): Promise<RawResponse> {
    const token = await this.deps.sessions.ensureSession(name, options.signal);
    const { baseUrl } = await this.deps.sessions.resolveConfig(name);
    const url = `${baseUrl}${route.path}`;
    const requestId = uuidv4();
    const details = { depName: name, method: route.method, path: route.path, requestId };

    if (options.signal?.aborted) {
      throw new RequestAbortedError(undefined, details);
    }

    const headers: Record<string, string> = {
      [SESSION_HEADER]: token,
      'X-Server-Protocol-Version': SERVER_PROTOCOL_VERSION,
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent ?? 'dep-client/0.1',
      Accept: 'application/json',
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json;charset=UTF8';
    }

    this.deps.logger.debug('DEP request', { ...details, query: options.query });

    return withHttpSpan(route.method, url, name, async () => {
      const startTime = Date.now();

      let response: AxiosResponse<string>;
      try {
        response = await this.axiosInstance.request<string>({
          url,
          method: route.method,
          headers,
          params: options.query,
          data: body === undefined ? undefined : JSON.stringify(body),
          signal: options.signal,
          timeout: this.config.timeout ?? DEFAULT_TIMEOUT_MS,
          responseType: 'text',
          transformResponse: [(data: string) => data],
          validateStatus: () => true,
        });
      } catch (error: unknown) {
        this.deps.metrics.incrementCounter('dep_requests_total', {
          method: route.method,
          path: route.path,
          status: 'error',
        });
        throw mapTransportError(error, details);
      }

      const labels = { method: route.method, path: route.path, status: response.status };
      this.deps.metrics.incrementCounter('dep_requests_total', labels);
      this.deps.metrics.recordLatency('dep_request_duration', Date.now() - startTime, labels);

      const raw: RawResponse = {
        status: response.status,
        body: response.data ?? '',
        headers: this.toHeaderRecord(response.headers),
      };

      const rotated = raw.headers[SESSION_HEADER.toLowerCase()];
      if (
        rotated &&
        rotated !== token &&
        !this.deps.decoder.isAuthFailure(raw.status, raw.body)
      ) {
        await this.adoptRotatedSession(name, rotated, details);
      }

      this.deps.logger.debug('DEP response', { ...details, status: raw.status });
      return raw;
    });
  }

  /**
   * The response is already applied server-side, so a failed write of the
   * rotated token must not replace it. The previous token stays cached.
   */
  private async adoptRotatedSession(
    name: string,
    token: string,
    details: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.deps.sessions.updateSession(name, token);
    } catch (error: unknown) {
      if (!(error instanceof StoreError)) throw error;
      this.deps.metrics.incrementCounter('dep_session_rotation_failures');
      this.deps.logger.warn('Rotated DEP session not persisted, keeping previous token', {
        ...details,
        error: error.message,
      });
    }
  }

  /**
   * Per-name queue when a concurrency limit is configured. Names never
   * share a queue.
   */
  private async runThroughQueue<T>(name: string, task: () => Promise<T>): Promise<T> {
    const limit = this.config.concurrencyPerName;
    if (!limit) {
      return task();
    }

    let queue = this.queues.get(name);
    if (!queue) {
      queue = new PQueue({ concurrency: limit });
      this.queues.set(name, queue);
    }
    return queue.add(task);
  }

  private toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }
}
