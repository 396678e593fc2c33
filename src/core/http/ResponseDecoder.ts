// src/core/http/ResponseDecoder.ts

import axios from 'axios';
import type { z } from 'zod';
import type { AuthFailureMarker, DecodeContext } from './types';
import {
  AuthError,
  DEPError,
  NotFoundError,
  ProtocolError,
  RequestAbortedError,
  ServerError,
  TransportError,
  TransportTimeoutError,
  UnexpectedResponseError,
  ValidationError,
} from '../../utils/errors';

/**
 * DEP answers an expired session with 401, and an invalid one with 403
 * and a FORBIDDEN body. Other 403 bodies (T_C_NOT_SIGNED, ACCESS_DENIED)
 * are not session problems and must not trigger re-authentication.
 */
export const DEFAULT_AUTH_FAILURE_MARKERS: AuthFailureMarker[] = [
  { status: 401 },
  { status: 403, bodyContains: 'FORBIDDEN' },
];

const API_CODE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

/**
 * Pull the DEP error code out of an error body. DEP mostly answers with a
 * bare code (`MALFORMED_REQUEST_BODY`), sometimes with a JSON object.
 */
export function extractApiCode(body: string): string | undefined {
  const trimmed = body.trim();
  if (API_CODE_PATTERN.test(trimmed)) return trimmed;

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === 'object') {
      for (const field of ['code', 'error'] as const) {
        const value = field in parsed ? Reflect.get(parsed, field) : undefined;
        if (typeof value === 'string') return value;
      }
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Map a failure thrown by axios before any response arrived.
 */
export function mapTransportError(error: unknown, details: Record<string, unknown>): DEPError {
  if (error instanceof DEPError) return error;

  if (axios.isCancel(error)) {
    return new RequestAbortedError(undefined, details);
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransportTimeoutError(undefined, { ...details, cause: error.code });
    }
    return new TransportError(`Network error: ${error.message}`, {
      ...details,
      cause: error.code ?? error.message,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Network error: ${message}`, { ...details, cause: message });
}

export class ResponseDecoder {
  constructor(private markers: AuthFailureMarker[] = DEFAULT_AUTH_FAILURE_MARKERS) {}

  isAuthFailure(status: number, body: string): boolean {
    return this.markers.some(
      (marker) =>
        marker.status === status &&
        (marker.bodyContains === undefined || body.includes(marker.bodyContains))
    );
  }

  /**
   * Classify a response and decode its body against the expected shape.
   * Per-item statuses inside a 2xx body are returned as-is for the caller
   * to inspect.
   */
  decode<S extends z.ZodTypeAny>(
    status: number,
    body: string,
    schema: S,
    context: DecodeContext
  ): z.output<S> {
    if (status >= 200 && status < 300) {
      return this.decodeSuccess(status, body, schema, context);
    }
    throw this.toError(status, body, context);
  }

  toError(status: number, body: string, context: DecodeContext): DEPError {
    const apiCode = extractApiCode(body);
    const details = { ...context, apiCode };
    const message = `DEP ${context.method} ${context.path} failed with ${status}${
      apiCode ? ` ${apiCode}` : ''
    }`;

    if (this.isAuthFailure(status, body)) {
      return new AuthError(message, { ...details, status, body });
    }
    if (status === 404) {
      return new NotFoundError(message, body, details);
    }
    if (status >= 400 && status < 500) {
      return new ValidationError(message, status, body, details);
    }
    if (status >= 500) {
      return new ServerError(message, status, body, details);
    }
    return new UnexpectedResponseError(message, status, body, details);
  }

  private decodeSuccess<S extends z.ZodTypeAny>(
    status: number,
    body: string,
    schema: S,
    context: DecodeContext
  ): z.output<S> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error: unknown) {
      throw new ProtocolError(`DEP ${context.method} ${context.path} returned a non-JSON body`, {
        ...context,
        status,
        body,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ProtocolError(
        `DEP ${context.method} ${context.path} returned an unexpected body shape`,
        {
          ...context,
          status,
          body,
          issues: result.error.issues.map(
            (issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`
          ),
        }
      );
    }
    return result.data;
  }
}
