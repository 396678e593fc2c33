// src/core/store/SecretEncryption.ts

import * as crypto from 'crypto';

const KEY_PATTERN = /^[0-9a-f]{64}$/i;
const IV_BYTES = 12;
const PREFIX = 'v1';

function parseKey(hex: string, label: string): Buffer {
  if (!KEY_PATTERN.test(hex)) {
    throw new Error(`${label} must be a 32-byte hex string (64 hexadecimal characters)`);
  }
  return Buffer.from(hex, 'hex');
}

/**
 * AES-256-GCM sealing for values persisted by the credential store.
 * Sealed format: `v1.<iv>.<tag>.<ciphertext>` with base64url segments.
 * Older keys are tried in order when opening, so keys can be rotated.
 */
export class SecretEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = parseKey(currentKey, 'Encryption key');
    this.previousKeys = previousKeys.map((k) => parseKey(k, 'Previous encryption key'));
  }

  seal(plaintext: string): string {
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return [
      PREFIX,
      iv.toString('base64url'),
      cipher.getAuthTag().toString('base64url'),
      ciphertext.toString('base64url'),
    ].join('.');
  }

  open(sealed: string): string {
    const parts = sealed.split('.');
    if (parts.length !== 4 || parts[0] !== PREFIX) {
      throw new Error('Sealed value has an unknown format');
    }

    for (const key of [this.currentKey, ...this.previousKeys]) {
      try {
        return this.openWithKey(parts[1], parts[2], parts[3], key);
      } catch {
        // authentication failed for this key, try the next one
      }
    }
    throw new Error('Failed to open sealed value with any available key');
  }

  private openWithKey(iv: string, tag: string, ciphertext: string, key: Buffer): string {
    const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'base64url'));
    decipher.setAuthTag(Buffer.from(tag, 'base64url'));

    return Buffer.concat([
      decipher.update(Buffer.from(ciphertext, 'base64url')),
      decipher.final(),
    ]).toString('utf8');
  }
}
