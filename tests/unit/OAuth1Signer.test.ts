// tests/unit/OAuth1Signer.test.ts

import { describe, it, expect } from 'vitest';
import { OAuth1Signer } from '../../src/core/auth/OAuth1Signer';
import type { OAuth1Tokens } from '../../src/core/store/types';

const tokens: OAuth1Tokens = {
  consumer_key: 'ck',
  consumer_secret: 'cs',
  access_token: 'at',
  access_secret: 'as',
};

function fixedSigner(signatureMethod?: 'HMAC-SHA1' | 'HMAC-SHA256'): OAuth1Signer {
  return new OAuth1Signer({
    signatureMethod,
    nonce: () => 'abc',
    now: () => 1700000000000,
  });
}

function parseHeader(header: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const part of header.replace(/^OAuth /, '').split(', ')) {
    const [key, quoted] = part.split('=');
    fields[key] = decodeURIComponent(quoted.slice(1, -1));
  }
  return fields;
}

describe('OAuth1Signer', () => {
  it('should sign the session request with HMAC-SHA1', () => {
    const header = fixedSigner().authorizationHeader('GET', 'https://dep.test/session', tokens);

    expect(header).toBe(
      'OAuth oauth_consumer_key="ck", oauth_nonce="abc", ' +
        'oauth_signature="zoAAZaYj70D7pXkKdtzqkx1sUEU%3D", oauth_signature_method="HMAC-SHA1", ' +
        'oauth_timestamp="1700000000", oauth_token="at", oauth_version="1.0"'
    );
  });

  it('should include query parameters in the signature but not the header', () => {
    const header = fixedSigner().authorizationHeader(
      'get',
      'https://dep.test/profile?z=last&a=1',
      tokens
    );
    const fields = parseHeader(header);

    expect(fields.oauth_signature).toBe('BjbjlvJRSzYzZSra7xmx3x2L3o4=');
    expect(fields).not.toHaveProperty('a');
    expect(fields).not.toHaveProperty('z');
  });

  it('should support HMAC-SHA256', () => {
    const fields = parseHeader(
      fixedSigner('HMAC-SHA256').authorizationHeader('GET', 'https://dep.test/session', tokens)
    );

    expect(fields.oauth_signature_method).toBe('HMAC-SHA256');
    expect(fields.oauth_signature).toBe('GUCXJECsKf6XnvF0/PIpUDF0zTbqVdkvrO2kAHPNjFg=');
  });

  it('should use a fresh random nonce by default', () => {
    const signer = new OAuth1Signer();
    const first = parseHeader(signer.authorizationHeader('GET', 'https://dep.test/session', tokens));
    const second = parseHeader(signer.authorizationHeader('GET', 'https://dep.test/session', tokens));

    expect(first.oauth_nonce).toMatch(/^[0-9a-f]{32}$/);
    expect(first.oauth_nonce).not.toBe(second.oauth_nonce);
  });

  it('should percent-encode reserved characters in the signing key', () => {
    const signer = fixedSigner();
    const plain = signer.generateSignature('GET', 'https://dep.test/session', [], 'c&s', 'a s');
    const encoded = signer.generateSignature('GET', 'https://dep.test/session', [], 'c%26s', 'a%20s');

    expect(plain).not.toBe(encoded);
  });

  it('should order repeated keys by value', () => {
    const signer = fixedSigner();
    const forward = signer.generateSignature(
      'POST',
      'https://dep.test/devices',
      [['k', 'b'], ['k', 'a']],
      'cs',
      'as'
    );
    const reversed = signer.generateSignature(
      'POST',
      'https://dep.test/devices',
      [['k', 'a'], ['k', 'b']],
      'cs',
      'as'
    );

    expect(forward).toBe(reversed);
  });
});
