/**
 * Key Storage for the signer CLI
 *
 * Stores the signing configuration (key id, algorithm, keys) in a local file
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { SignerConfig } from './types.js';

const CONFIG_FILE_NAME = 'signer-config.json';

const SharedFields = {
  key_id: z.string().min(1),
  signed_headers: z.array(z.string().min(1)).optional(),
  location: z.enum(['signature', 'authorization']).optional(),
};

const SignerConfigSchema = z.discriminatedUnion('algorithm', [
  z.object({
    ...SharedFields,
    algorithm: z.literal('rsa-sha256'),
    private_key: z.string().min(1),
    public_key: z.string().min(1),
  }),
  z.object({
    ...SharedFields,
    algorithm: z.literal('hmac-sha256'),
    hmac_secret: z.string().min(1),
  }),
]);

export class KeyStorage {
  /**
   * Configuration directory (HTTPSIG_CONFIG_DIR, or ~/.httpsig)
   */
  static getConfigDir(): string {
    return process.env.HTTPSIG_CONFIG_DIR || join(homedir(), '.httpsig');
  }

  /**
   * Get configuration file path
   */
  static getConfigPath(): string {
    return join(KeyStorage.getConfigDir(), CONFIG_FILE_NAME);
  }

  /**
   * Save signer configuration
   */
  static async save(config: SignerConfig): Promise<void> {
    const dir = KeyStorage.getConfigDir();
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    // Holds private key material
    await writeFile(KeyStorage.getConfigPath(), JSON.stringify(config, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    console.log(`✅ Configuration saved to ${KeyStorage.getConfigPath()}`);
  }

  /**
   * Load signer configuration
   */
  static async load(): Promise<SignerConfig | null> {
    const path = KeyStorage.getConfigPath();
    try {
      if (!existsSync(path)) {
        return null;
      }

      const content = await readFile(path, 'utf-8');
      const parsed = SignerConfigSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        console.error(`Invalid configuration in ${path}: ${issues}`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      console.error('Error loading configuration:', error);
      return null;
    }
  }

  /**
   * Check if configuration exists
   */
  static exists(): boolean {
    return existsSync(KeyStorage.getConfigPath());
  }
}
