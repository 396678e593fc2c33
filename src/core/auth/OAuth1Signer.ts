// src/core/auth/OAuth1Signer.ts

import crypto from 'crypto';
import type { OAuth1Tokens } from '../store/types';

export interface OAuth1SignerOptions {
  signatureMethod?: 'HMAC-SHA1' | 'HMAC-SHA256';
  /** Overrides for deterministic signing in tests. */
  nonce?: () => string;
  now?: () => number;
}

/**
 * Two-legged OAuth 1.0 signing for the DEP session handshake.
 *
 * DEP issues the consumer and access token pairs up front, so only the
 * request-signing part of OAuth 1.0 is needed: the `/session` request is
 * signed with HMAC over the consumer secret and access secret.
 *
 * @example
 * ```typescript
 * const signer = new OAuth1Signer();
 * const header = signer.authorizationHeader('GET', 'https://mdmenrollment.apple.com/session', tokens);
 * ```
 */
export class OAuth1Signer {
  private signatureMethod: 'HMAC-SHA1' | 'HMAC-SHA256';
  private nonce: () => string;
  private now: () => number;

  constructor(options: OAuth1SignerOptions = {}) {
    this.signatureMethod = options.signatureMethod ?? 'HMAC-SHA1';
    this.nonce = options.nonce ?? (() => crypto.randomBytes(16).toString('hex'));
    this.now = options.now ?? Date.now;
  }

  /**
   * Build the `Authorization: OAuth ...` header value for a request.
   * Query parameters already present on `url` take part in the signature.
   */
  authorizationHeader(method: string, url: string, tokens: OAuth1Tokens): string {
    const oauthParams: Record<string, string> = {
      oauth_consumer_key: tokens.consumer_key,
      oauth_nonce: this.nonce(),
      oauth_signature_method: this.signatureMethod,
      oauth_timestamp: Math.floor(this.now() / 1000).toString(),
      oauth_token: tokens.access_token,
      oauth_version: '1.0',
    };

    const parsed = new URL(url);
    const queryParams: Array<[string, string]> = Array.from(parsed.searchParams.entries());
    const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;

    const signature = this.generateSignature(
      method,
      baseUrl,
      [...Object.entries(oauthParams), ...queryParams],
      tokens.consumer_secret,
      tokens.access_secret
    );

    return this.buildAuthHeader({ ...oauthParams, oauth_signature: signature });
  }

  /**
   * Signature per RFC 5849 section 3.4
   */
  generateSignature(
    method: string,
    baseUrl: string,
    params: Array<[string, string]>,
    consumerSecret: string,
    tokenSecret: string
  ): string {
    const normalized = params
      .map(([key, value]): [string, string] => [this.percentEncode(key), this.percentEncode(value)])
      .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)))
      .map(([key, value]) => `${key}=${value}`)
      .join('&');

    const baseString = [
      method.toUpperCase(),
      this.percentEncode(baseUrl),
      this.percentEncode(normalized),
    ].join('&');

    const signingKey = `${this.percentEncode(consumerSecret)}&${this.percentEncode(tokenSecret)}`;
    const algorithm = this.signatureMethod === 'HMAC-SHA256' ? 'sha256' : 'sha1';

    return crypto.createHmac(algorithm, signingKey).update(baseString).digest('base64');
  }

  private buildAuthHeader(params: Record<string, string>): string {
    const fields = Object.keys(params)
      .sort()
      .map((key) => `${this.percentEncode(key)}="${this.percentEncode(params[key])}"`)
      .join(', ');

    return `OAuth ${fields}`;
  }

  /**
   * Percent-encode for OAuth (RFC 3986)
   */
  private percentEncode(str: string): string {
    return encodeURIComponent(str)
      .replace(/!/g, '%21')
      .replace(/'/g, '%27')
      .replace(/\(/g, '%28')
      .replace(/\)/g, '%29')
      .replace(/\*/g, '%2A');
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
