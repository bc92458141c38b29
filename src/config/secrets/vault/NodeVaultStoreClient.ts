/**
 * node-vault Store Client
 *
 * Default {@link SecretStoreClient} backed by the `node-vault` HTTP client.
 * Token auth is applied at construction; AppRole and Kubernetes logins run
 * once, on the first read, and the resulting client token is reused.
 *
 * Note: node-vault requests cannot be aborted. The signal is checked before
 * each request; the resolver's deadline is enforced by the caller.
 */

import Vault from 'node-vault';
import { z } from 'zod';
import type { VaultAuthDescriptor } from './auth/VaultAuthMethod.js';
import type {
  ReadSecretRequest,
  SecretStoreClient,
  StoreClientSettings,
} from './SecretStoreClient.js';

/**
 * The subset of the node-vault client used here
 */
export interface VaultHttpClient {
  token: string;
  read(path: string): Promise<unknown>;
  approleLogin(options: { role_id: string; secret_id: string; mount_point: string }): Promise<unknown>;
  kubernetesLogin(options: { role: string; jwt: string; mount_point: string }): Promise<unknown>;
}

const LoginResponseSchema = z.object({
  auth: z.object({
    client_token: z.string().min(1),
  }),
});

const KvV2ResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable().optional(),
  }),
});

const KvV1ResponseSchema = z.object({
  data: z.record(z.unknown()),
});

const NotFoundErrorSchema = z.object({
  response: z.object({
    statusCode: z.literal(404),
  }),
});

export function createNodeVaultClient(settings: StoreClientSettings): VaultHttpClient {
  return Vault({
    apiVersion: 'v1',
    endpoint: settings.address,
    ...(settings.namespace ? { namespace: settings.namespace } : {}),
  });
}

export class NodeVaultStoreClient implements SecretStoreClient {
  private readonly auth: VaultAuthDescriptor;
  private readonly client: VaultHttpClient;
  private login?: Promise<void>;

  constructor(settings: StoreClientSettings, client: VaultHttpClient = createNodeVaultClient(settings)) {
    this.auth = settings.auth;
    this.client = client;

    if (settings.auth.kind === 'token') {
      this.client.token = settings.auth.token;
      this.login = Promise.resolve();
    }
  }

  async readSecret(request: ReadSecretRequest): Promise<Record<string, unknown> | undefined> {
    request.signal?.throwIfAborted();
    await this.ensureAuthenticated();
    request.signal?.throwIfAborted();

    const vaultPath =
      request.kvVersion === 2
        ? `${request.mountPoint}/data/${request.path}`
        : `${request.mountPoint}/${request.path}`;

    let response: unknown;
    try {
      response = await this.client.read(vaultPath);
    } catch (error) {
      if (NotFoundErrorSchema.safeParse(error).success) {
        return undefined;
      }
      throw error;
    }

    if (request.kvVersion === 2) {
      return KvV2ResponseSchema.parse(response).data.data ?? undefined;
    }
    return KvV1ResponseSchema.parse(response).data;
  }

  private ensureAuthenticated(): Promise<void> {
    if (!this.login) {
      this.login = this.authenticate().catch((error: unknown) => {
        // Let the next read attempt a fresh login
        this.login = undefined;
        throw error;
      });
    }
    return this.login;
  }

  private async authenticate(): Promise<void> {
    const auth = this.auth;

    switch (auth.kind) {
      case 'token':
        this.client.token = auth.token;
        return;

      case 'approle': {
        const result = await this.client.approleLogin({
          role_id: auth.roleId,
          secret_id: auth.secretId,
          mount_point: auth.mountPoint,
        });
        this.client.token = LoginResponseSchema.parse(result).auth.client_token;
        console.info(`[NodeVaultStoreClient] Authenticated via AppRole (mount: ${auth.mountPoint})`);
        return;
      }

      case 'kubernetes': {
        const result = await this.client.kubernetesLogin({
          role: auth.role,
          jwt: auth.jwt,
          mount_point: auth.mountPoint,
        });
        this.client.token = LoginResponseSchema.parse(result).auth.client_token;
        console.info(
          `[NodeVaultStoreClient] Authenticated via Kubernetes (role: ${auth.role}, mount: ${auth.mountPoint})`
        );
        return;
      }
    }
  }
}

export const createNodeVaultStoreClient = (settings: StoreClientSettings): SecretStoreClient =>
  new NodeVaultStoreClient(settings);
