// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/** Verb and path of one DEP operation. */
export interface OperationRoute {
  method: HttpMethod;
  path: string;
}

export interface RequestOptions {
  query?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * A response matching any marker is treated as an expired or invalid
 * session. `bodyContains` narrows a status to responses whose raw body
 * includes the given text.
 */
export interface AuthFailureMarker {
  status: number;
  bodyContains?: string;
}

export interface HttpConfig {
  timeout?: number;
  userAgent?: string;
  concurrencyPerName?: number;
}

export interface RawResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

export interface DecodeContext {
  depName: string;
  method: string;
  path: string;
}

/** Applied to the session handshake and to operation requests alike. */
export const DEFAULT_TIMEOUT_MS = 30000;
