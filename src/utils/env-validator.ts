/**
 * Environment Variable Validation
 *
 * Validates venue configuration at startup using Zod.
 * Values come from the process environment, then .env, then .env.local
 * (which overrides .env).
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { DEFAULT_HISTORY_DIR, DEFAULT_STATE_FILE } from '../core/constants';

// Allowed RPC endpoints
const ALLOWED_RPC_HOSTS = [
  'api.devnet.solana.com',
  'api.mainnet-beta.solana.com',
  'rpc.helius.xyz',
  'mainnet.helius-rpc.com',
  'devnet.helius-rpc.com',
  'localhost',
  '127.0.0.1',
];

const DEFAULT_RPC_URLS = {
  devnet: 'https://api.devnet.solana.com',
  mainnet: 'https://api.mainnet-beta.solana.com',
  localnet: 'http://127.0.0.1:8899',
} as const;

const rpcUrlSchema = z.string().url().refine(
  (url) => {
    try {
      const parsed = new URL(url);
      return ALLOWED_RPC_HOSTS.some(host => parsed.hostname === host || parsed.hostname.endsWith(`.${host}`));
    } catch {
      return false;
    }
  },
  { message: 'RPC URL must be from an allowed host (Solana, Helius or local validator)' }
);

const pubkeySchema = z.string().refine(
  (value) => {
    try {
      new PublicKey(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Not a valid base58 public key' }
);

/**
 * Venue environment schema
 */
export const VenueEnvSchema = z.object({
  IDO_NETWORK: z.enum(['devnet', 'mainnet', 'localnet']).default('devnet'),
  RPC_URL: rpcUrlSchema.optional(),

  // Keys
  OWNER_PUBKEY: pubkeySchema.optional(),
  TREASURY_PUBKEY: pubkeySchema.optional(),
  POOL_KEYPAIR_PATH: z.string().refine(
    (path) => fs.existsSync(path),
    { message: 'Pool keypair file does not exist' }
  ).optional(),

  // Storage
  STATE_FILE: z.string().min(1).default(DEFAULT_STATE_FILE),
  HISTORY_DIR: z.string().min(1).default(DEFAULT_HISTORY_DIR),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type VenueEnv = z.infer<typeof VenueEnvSchema>;

/**
 * Load .env then .env.local into process.env
 */
export function loadEnvFiles(): void {
  dotenv.config();
  dotenv.config({ path: '.env.local', override: true });
}

/**
 * Validate venue environment variables
 * Throws descriptive error if validation fails
 */
export function validateVenueEnv(env: NodeJS.ProcessEnv = process.env): VenueEnv {
  const result = VenueEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');

    throw new Error(
      `Invalid venue configuration:\n${errors}\n\n` +
      `Set these environment variables or use a .env file.`
    );
  }

  // CRITICAL: no implicit keys on mainnet
  if (result.data.IDO_NETWORK === 'mainnet') {
    const missing = (['OWNER_PUBKEY', 'TREASURY_PUBKEY', 'POOL_KEYPAIR_PATH', 'RPC_URL'] as const)
      .filter((key) => !result.data[key]);
    if (missing.length > 0) {
      throw new Error(`CRITICAL: ${missing.join(', ')} required on mainnet.`);
    }
  }

  return result.data;
}

export function resolveRpcUrl(env: VenueEnv): string {
  return env.RPC_URL ?? DEFAULT_RPC_URLS[env.IDO_NETWORK];
}

/**
 * Log validated configuration (redacting sensitive values)
 */
export function logConfig(
  config: VenueEnv,
  logger: { info: (msg: string) => void }
): void {
  const redacted: Record<string, unknown> = { ...config };

  if (config.RPC_URL) {
    // API keys travel in the query string
    try {
      const url = new URL(config.RPC_URL);
      redacted.RPC_URL = url.search ? `${url.origin}${url.pathname}?***REDACTED***` : config.RPC_URL;
    } catch {
      redacted.RPC_URL = '***REDACTED***';
    }
  }
  if (config.POOL_KEYPAIR_PATH) {
    redacted.POOL_KEYPAIR_PATH = '***REDACTED***';
  }

  logger.info(`Configuration: ${JSON.stringify(redacted)}`);
}
