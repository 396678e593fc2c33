/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEPError,
  ConfigNotFoundError,
  StoreError,
  AuthError,
  TransportError,
  TransportTimeoutError,
  RequestAbortedError,
  ProtocolError,
  InvalidRequestError,
  ValidationError,
  NotFoundError,
  ServerError,
  UnexpectedResponseError,
  isDEPError,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  it('should carry code, kind and details on the base class', () => {
    const error = new DEPError('Test error', 'TEST_CODE', 'unknown', { depName: 'acme' });
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.kind).toBe('unknown');
    expect(error.details).toEqual({ depName: 'acme' });
    expect(error.name).toBe('DEPError');
    expect(error).toBeInstanceOf(Error);
  });

  const cases: Array<[DEPError, string, string]> = [
    [new ConfigNotFoundError('x'), 'CONFIG_NOT_FOUND', 'config'],
    [new StoreError('x'), 'STORE_ERROR', 'store'],
    [new AuthError('x'), 'AUTH_ERROR', 'auth'],
    [new TransportError('x'), 'TRANSPORT_ERROR', 'transport'],
    [new TransportTimeoutError(), 'TRANSPORT_TIMEOUT', 'transport'],
    [new RequestAbortedError(), 'REQUEST_ABORTED', 'transport'],
    [new ProtocolError('x'), 'PROTOCOL_ERROR', 'protocol'],
    [new InvalidRequestError('x'), 'INVALID_REQUEST', 'validation'],
    [new ValidationError('x', 400, 'BAD'), 'VALIDATION_ERROR', 'validation'],
    [new NotFoundError('x', 'NOT_FOUND'), 'NOT_FOUND', 'not_found'],
    [new ServerError('x', 503, ''), 'SERVER_ERROR', 'server'],
    [new UnexpectedResponseError('x', 302, ''), 'UNEXPECTED_RESPONSE', 'unknown'],
  ];

  it.each(cases)('%s should map to %s / %s', (error, code, kind) => {
    expect(error.code).toBe(code);
    expect(error.kind).toBe(kind);
    expect(isDEPError(error)).toBe(true);
  });

  it('should keep transport subclasses catchable as TransportError', () => {
    expect(new TransportTimeoutError()).toBeInstanceOf(TransportError);
    expect(new RequestAbortedError()).toBeInstanceOf(TransportError);
  });

  it('should use default messages', () => {
    expect(new TransportTimeoutError().message).toBe('Request timeout');
    expect(new RequestAbortedError().message).toBe('Request aborted');
  });

  it('should record status and raw body on API errors', () => {
    const error = new ValidationError('bad', 400, 'MALFORMED_REQUEST_BODY', { path: '/profile' });
    expect(error.status).toBe(400);
    expect(error.body).toBe('MALFORMED_REQUEST_BODY');
    expect(error.details).toEqual({
      path: '/profile',
      status: 400,
      body: 'MALFORMED_REQUEST_BODY',
    });
  });

  it('should fix NotFoundError status to 404', () => {
    expect(new NotFoundError('missing', 'NOT_FOUND').status).toBe(404);
  });

  it('should not treat plain errors as DEP errors', () => {
    expect(isDEPError(new Error('plain'))).toBe(false);
    expect(isDEPError('string')).toBe(false);
  });
});
