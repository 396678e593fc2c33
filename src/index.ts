// src/index.ts

export { DEPClient } from './client';
export type { ClientOverrides } from './client';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { ClientConfig } from './config/ConfigValidator';

export { KeyvCredentialStore } from './core/store/KeyvCredentialStore';
export type { CredentialStore, CredentialStoreConfig, DEPConfig, OAuth1Tokens } from './core/store/types';
export { SessionCache } from './core/session/SessionCache';
export { SessionManager, DEFAULT_BASE_URL } from './core/session/SessionManager';
export { OAuth1Signer } from './core/auth/OAuth1Signer';
export { HttpCore } from './core/http/HttpCore';
export { ResponseDecoder, DEFAULT_AUTH_FAILURE_MARKERS } from './core/http/ResponseDecoder';
export type { AuthFailureMarker, HttpMethod, OperationRoute } from './core/http/types';
export { DEP_OPERATIONS, resolveOperations } from './api/operations';
export type { OperationName, OperationOverrides } from './api/operations';

export * from './api/profile/types';
export * from './api/devices/types';
export * from './api/account/types';

// Export error classes for error handling
export {
  DEPError,
  ConfigNotFoundError,
  StoreError,
  AuthError,
  TransportError,
  TransportTimeoutError,
  RequestAbortedError,
  ProtocolError,
  InvalidRequestError,
  ApiError,
  ValidationError,
  NotFoundError,
  ServerError,
  UnexpectedResponseError,
  isDEPError,
} from './utils/errors';
export type { ErrorKind } from './utils/errors';
