// src/core/store/KeyvCredentialStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import type { CredentialStore, CredentialStoreConfig, DEPConfig, OAuth1Tokens } from './types';
import { SecretEncryption } from './SecretEncryption';
import { DEPConfigSchema, OAuth1TokensSchema } from './schemas';
import { AuthError, ConfigNotFoundError } from '../../utils/errors';
import type { Logger } from '../../observability/Logger';

type RecordKind = 'credentials' | 'session' | 'config';

/**
 * Credential store backed by Keyv. Memory by default; Redis and Postgres
 * share the same key layout so a deployment can switch backends freely.
 */
export class KeyvCredentialStore implements CredentialStore {
  private store: Keyv<string>;
  private encryption?: SecretEncryption;

  constructor(
    config: CredentialStoreConfig,
    private logger: Logger
  ) {
    const namespace = config.namespace ?? 'dep';

    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<string>({ store: new KeyvRedis(config.url), namespace });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<string>({ store: new KeyvPostgres({ uri: config.url }), namespace });
    } else {
      this.store = new Keyv<string>({ namespace });
    }

    if (config.encryption) {
      this.encryption = new SecretEncryption(
        config.encryption.key,
        config.encryption.previousKeys
      );
    }
  }

  async getCredentials(name: string): Promise<OAuth1Tokens | null> {
    const raw = await this.read(name, 'credentials');
    if (raw === null) return null;

    const parsed = OAuth1TokensSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new AuthError(`Stored credentials for ${name} are malformed`, {
        depName: name,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    return parsed.data;
  }

  async putCredentials(name: string, tokens: OAuth1Tokens): Promise<void> {
    await this.write(name, 'credentials', JSON.stringify(tokens));
    this.logger.info('DEP credentials stored', { depName: name, credentials: tokens });
  }

  async getSession(name: string): Promise<string | null> {
    return this.read(name, 'session');
  }

  async putSession(name: string, token: string): Promise<void> {
    await this.write(name, 'session', token);
    this.logger.debug('DEP session stored', { depName: name });
  }

  async getConfig(name: string): Promise<DEPConfig | null> {
    const raw = await this.read(name, 'config');
    if (raw === null) return null;

    const parsed = DEPConfigSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new ConfigNotFoundError(`Stored config for ${name} is malformed`, { depName: name });
    }
    return parsed.data;
  }

  async putConfig(name: string, config: DEPConfig): Promise<void> {
    await this.write(name, 'config', JSON.stringify(config));
    this.logger.info('DEP config stored', { depName: name, baseUrl: config.baseUrl });
  }

  async delete(name: string): Promise<void> {
    await Promise.all(
      (['credentials', 'session', 'config'] as const).map((kind) =>
        this.store.delete(this.createKey(name, kind))
      )
    );
    this.logger.info('DEP name deleted', { depName: name });
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private createKey(name: string, kind: RecordKind): string {
    return `${kind}:${name}`;
  }

  private async read(name: string, kind: RecordKind): Promise<string | null> {
    const stored = await this.store.get(this.createKey(name, kind));
    if (stored === undefined) return null;
    return this.encryption ? this.encryption.open(stored) : stored;
  }

  private async write(name: string, kind: RecordKind, value: string): Promise<void> {
    const toStore = this.encryption ? this.encryption.seal(value) : value;
    await this.store.set(this.createKey(name, kind), toStore);
  }
}
