// src/utils/errors.ts

export type ErrorKind =
  | 'config'
  | 'store'
  | 'auth'
  | 'transport'
  | 'protocol'
  | 'validation'
  | 'not_found'
  | 'server'
  | 'unknown';

export class DEPError extends Error {
  constructor(
    message: string,
    public code: string,
    public readonly kind: ErrorKind,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration / store errors
export class ConfigNotFoundError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_NOT_FOUND', 'config', details);
  }
}

export class StoreError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', 'store', details);
  }
}

// Authentication errors
export class AuthError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', 'auth', details);
  }
}

// Network errors
export class TransportError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', 'transport', details);
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TRANSPORT_TIMEOUT';
  }
}

export class RequestAbortedError extends TransportError {
  constructor(message: string = 'Request aborted', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'REQUEST_ABORTED';
  }
}

// Response errors
export class ProtocolError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', 'protocol', details);
  }
}

// Caller input rejected before anything is sent
export class InvalidRequestError extends DEPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', 'validation', details);
  }
}

export class ApiError extends DEPError {
  constructor(
    message: string,
    code: string,
    kind: ErrorKind,
    public status: number,
    public body: string,
    details?: Record<string, unknown>
  ) {
    super(message, code, kind, { ...details, status, body });
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, status: number, body: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 'validation', status, body, details);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, body: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 'not_found', 404, body, details);
  }
}

export class ServerError extends ApiError {
  constructor(message: string, status: number, body: string, details?: Record<string, unknown>) {
    super(message, 'SERVER_ERROR', 'server', status, body, details);
  }
}

export class UnexpectedResponseError extends ApiError {
  constructor(message: string, status: number, body: string, details?: Record<string, unknown>) {
    super(message, 'UNEXPECTED_RESPONSE', 'unknown', status, body, details);
  }
}

export function isDEPError(error: unknown): error is DEPError {
  return error instanceof DEPError;
}
