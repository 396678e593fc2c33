// src/core/store/types.ts

/**
 * OAuth 1.0a material issued by the DEP portal for one MDM server.
 * Field names follow the token file the portal hands out.
 */
export interface OAuth1Tokens {
  consumer_key: string;
  consumer_secret: string;
  access_token: string;
  access_secret: string;
  access_token_expiry?: string;
}

export interface DEPConfig {
  baseUrl: string;
}

/**
 * Key-value contract the session layer relies on. Implementations must be
 * linearizable per DEP name; the backend itself is irrelevant to the client.
 */
export interface CredentialStore {
  /** Long-lived credentials, or null when the name is not configured. */
  getCredentials(name: string): Promise<OAuth1Tokens | null>;
  /** Previously persisted session token, if any. */
  getSession(name: string): Promise<string | null>;
  putSession(name: string, token: string): Promise<void>;
  /** Per-name server configuration; the client default applies when absent. */
  getConfig?(name: string): Promise<DEPConfig | null>;
}

export interface CredentialStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  namespace?: string;
  encryption?: {
    key: string;
    previousKeys?: string[];
    algorithm: 'aes-256-gcm';
  };
}
