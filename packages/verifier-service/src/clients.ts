/**
 * Inbound clients: who may call the service, with which key and algorithm.
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_SIGNED_HEADERS,
  headersConfig,
  hmacSecret,
  impliedAlgorithm,
  rsaPublicKey,
  signedHeadersConfig,
  type HeadersConfig,
  type KeyMaterial,
  type SignedHeadersConfig,
} from '@httpsig/core';
import type { InboundClient } from './types.js';

const HeadersConfigSchema = z.object({
  always: z.array(z.string().min(1)),
  ifPresent: z.array(z.string().min(1)).optional(),
});

const ClientSchema = z
  .object({
    keyId: z.string().min(1),
    principalName: z.string().min(1),
    principalType: z.enum(['service', 'user']).default('service'),
    algorithm: z.enum(['rsa-sha256', 'hmac-sha256']).optional(),
    publicKey: z.string().min(1).optional(),
    publicKeyFile: z.string().min(1).optional(),
    hmacSecret: z.string().min(1).optional(),
  })
  .refine(
    (c) => [c.publicKey, c.publicKeyFile, c.hmacSecret].filter((v) => v !== undefined).length === 1,
    { message: 'Exactly one of publicKey, publicKeyFile or hmacSecret is required' }
  );

export const ClientsFileSchema = z.object({
  clients: z.array(ClientSchema),
  signedHeaders: z
    .object({
      default: HeadersConfigSchema.optional(),
      methods: z.record(HeadersConfigSchema).optional(),
    })
    .optional(),
});

export type ClientsFile = z.infer<typeof ClientsFileSchema>;
type ClientEntry = z.infer<typeof ClientSchema>;
type HeadersEntry = z.infer<typeof HeadersConfigSchema>;

export interface LoadedClients {
  registry: InboundClientRegistry;
  /** Headers every inbound signature must cover, per method */
  signedHeaders: SignedHeadersConfig;
}

/**
 * Lookup of configured clients by keyId.
 */
export class InboundClientRegistry {
  private readonly clients = new Map<string, InboundClient>();

  constructor(clients: Iterable<InboundClient> = []) {
    for (const client of clients) {
      if (this.clients.has(client.keyId)) {
        throw new Error(`Duplicate client keyId: ${client.keyId}`);
      }
      this.clients.set(client.keyId, client);
    }
  }

  resolve(keyId: string): InboundClient | null {
    return this.clients.get(keyId) ?? null;
  }

  get size(): number {
    return this.clients.size;
  }

  keyIds(): string[] {
    return [...this.clients.keys()];
  }
}

/**
 * Build the registry from already-parsed JSON.
 *
 * @param baseDir - directory `publicKeyFile` paths are resolved against
 */
export function parseClientsConfig(data: unknown, baseDir: string = process.cwd()): LoadedClients {
  const parsed = ClientsFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid clients configuration: ${issues}`);
  }

  const clients = parsed.data.clients.map((entry) => toClient(entry, baseDir));
  return {
    registry: new InboundClientRegistry(clients),
    signedHeaders: toSignedHeaders(parsed.data.signedHeaders),
  };
}

/**
 * Read and validate a clients file.
 */
export function loadClients(file: string): LoadedClients {
  const path = resolve(file);

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new Error(`Unable to read clients file ${path}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Clients file ${path} is not valid JSON`, { cause: error });
  }

  return parseClientsConfig(data, dirname(path));
}

function toClient(entry: ClientEntry, baseDir: string): InboundClient {
  const key = toKey(entry, baseDir);
  const algorithm = impliedAlgorithm(key);

  if (entry.algorithm !== undefined && entry.algorithm !== algorithm) {
    throw new Error(
      `Client ${entry.keyId}: algorithm ${entry.algorithm} cannot be used with a ${key.kind} key`
    );
  }

  return {
    keyId: entry.keyId,
    principalName: entry.principalName,
    principalType: entry.principalType,
    algorithm,
    key,
  };
}

function toKey(entry: ClientEntry, baseDir: string): KeyMaterial {
  if (entry.hmacSecret !== undefined) {
    return hmacSecret(entry.hmacSecret);
  }

  if (entry.publicKey === undefined && entry.publicKeyFile === undefined) {
    throw new Error(`Client ${entry.keyId} has no key`);
  }

  try {
    return rsaPublicKey(entry.publicKey ?? readFileSync(resolve(baseDir, entry.publicKeyFile ?? '')));
  } catch (error) {
    throw new Error(`Client ${entry.keyId}: unable to load public key`, { cause: error });
  }
}

function toSignedHeaders(section: ClientsFile['signedHeaders']): SignedHeadersConfig {
  if (!section) {
    return signedHeadersConfig(headersConfig(DEFAULT_SIGNED_HEADERS));
  }

  const toConfig = (entry: HeadersEntry): HeadersConfig => headersConfig(entry.always, entry.ifPresent);
  const methods = Object.fromEntries(
    Object.entries(section.methods ?? {}).map(([method, entry]) => [method, toConfig(entry)])
  );

  return signedHeadersConfig(section.default ? toConfig(section.default) : undefined, methods);
}
