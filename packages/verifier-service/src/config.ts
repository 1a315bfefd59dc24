import type { SignatureLocation } from '@httpsig/core';
import type { ServiceConfig } from './types.js';

const LOCATIONS: readonly SignatureLocation[] = ['signature', 'authorization'];

function isLocation(value: string): value is SignatureLocation {
  return LOCATIONS.some((location) => location === value);
}

function parseLocations(raw: string): SignatureLocation[] {
  const entries = raw.split(',').map((l) => l.trim().toLowerCase()).filter(Boolean);
  if (entries.length === 0) {
    throw new Error('HTTPSIG_HEADER_LOCATIONS must name at least one location');
  }
  return entries.map((entry) => {
    if (!isLocation(entry)) {
      throw new Error(
        `Invalid HTTPSIG_HEADER_LOCATIONS entry: ${entry}. Must be 'signature' or 'authorization'`
      );
    }
    return entry;
  });
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ServiceConfig {
  const port = parseInt(process.env.PORT || '8081', 10);
  const clientsFile = process.env.HTTPSIG_CLIENTS_FILE || './clients.json';
  const locations = parseLocations(process.env.HTTPSIG_HEADER_LOCATIONS || 'signature,authorization');
  const optionalEnv = (process.env.HTTPSIG_OPTIONAL || 'false').toLowerCase();
  const realm = process.env.HTTPSIG_REALM || 'httpsig';

  if (Number.isNaN(port)) {
    throw new Error(`Invalid PORT: ${process.env.PORT}`);
  }

  if (optionalEnv !== 'true' && optionalEnv !== 'false') {
    throw new Error(`Invalid HTTPSIG_OPTIONAL: ${optionalEnv}. Must be 'true' or 'false'`);
  }

  return {
    port,
    clientsFile,
    locations,
    optional: optionalEnv === 'true',
    realm,
  };
}
