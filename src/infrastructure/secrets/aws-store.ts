// ═══════════════════════════════════════════════════════════════════════════════
// AWS SECRETS MANAGER STORE — Remote Secret Backend
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import {
  GetSecretValueCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  SecretsManagerClient,
  type GetSecretValueCommandOutput,
  type PutSecretValueCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import { SecretNotFoundError, SecretStoreError, type SecretStore } from './types.js';
import { tryCatchAsync } from '../../types/result.js';

export type GetSecretValueSender = (command: GetSecretValueCommand) => Promise<GetSecretValueCommandOutput>;
export type PutSecretValueSender = (command: PutSecretValueCommand) => Promise<PutSecretValueCommandOutput>;

export interface AwsSecretsManagerStoreOptions {
  readonly region?: string;

  /** Prepended to every secret name, e.g. 'provisioning/production/' */
  readonly secretPrefix?: string;

  readonly client?: SecretsManagerClient;

  /** Replace client.send for reads and writes; tests pass fakes */
  readonly send?: GetSecretValueSender;
  readonly sendPut?: PutSecretValueSender;
}

/**
 * Secret store backed by AWS Secrets Manager.
 *
 * Errors other than a missing secret are rethrown as the SDK raised them,
 * so retry classifiers can read `$metadata.httpStatusCode`. The SDK client
 * is created on first use.
 *
 * @example
 * ```typescript
 * const store = new AwsSecretsManagerStore({ region: 'eu-west-1', secretPrefix: 'provisioning/production/' });
 * const apiKey = await store.fetch('provisioning-api-key');
 * ```
 */
export class AwsSecretsManagerStore implements SecretStore {
  readonly name = 'aws-secrets-manager';
  private readonly prefix: string;
  private readonly region?: string;
  private readonly send: GetSecretValueSender;
  private readonly sendPut: PutSecretValueSender;
  private client?: SecretsManagerClient;

  constructor(options: AwsSecretsManagerStoreOptions = {}) {
    this.prefix = options.secretPrefix ?? '';
    this.region = options.region;
    this.client = options.client;
    this.send = options.send ?? ((command) => this.getClient().send(command));
    this.sendPut = options.sendPut ?? ((command) => this.getClient().send(command));
  }

  private getClient(): SecretsManagerClient {
    if (!this.client) {
      this.client = new SecretsManagerClient(this.region ? { region: this.region } : {});
    }
    return this.client;
  }

  async fetch(name: string): Promise<string> {
    const secretId = `${this.prefix}${name}`;
    const result = await tryCatchAsync(() => this.send(new GetSecretValueCommand({ SecretId: secretId })));

    if (!result.ok) {
      if (result.error instanceof ResourceNotFoundException) {
        throw new SecretNotFoundError(name, { cause: result.error });
      }
      throw result.error;
    }

    const { SecretString, SecretBinary } = result.value;
    if (SecretString !== undefined) {
      return SecretString;
    }
    if (SecretBinary !== undefined) {
      return Buffer.from(SecretBinary).toString('utf8');
    }

    throw new SecretStoreError(this.name, name, 'secret has no value');
  }

  async put(name: string, value: string): Promise<void> {
    const secretId = `${this.prefix}${name}`;
    const result = await tryCatchAsync(() =>
      this.sendPut(new PutSecretValueCommand({ SecretId: secretId, SecretString: value }))
    );

    if (!result.ok) {
      if (result.error instanceof ResourceNotFoundException) {
        throw new SecretNotFoundError(name, { cause: result.error });
      }
      throw result.error;
    }
  }
}
