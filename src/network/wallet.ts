/**
 * Keypair loading for the pool authority
 */

import { Keypair } from '@solana/web3.js';
import * as fs from 'fs';

/**
 * Load and validate a keypair file (JSON array of 64 bytes)
 * @throws Error with descriptive message if validation fails
 */
export function loadKeypair(keypairPath: string): Keypair {
  if (!fs.existsSync(keypairPath)) {
    throw new Error(`Keypair file not found: ${keypairPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(keypairPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Invalid keypair JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!Array.isArray(raw)) {
    throw new Error(`Invalid keypair format: Expected array of numbers, got ${typeof raw}`);
  }
  if (raw.length !== 64) {
    throw new Error(`Invalid keypair format: Expected 64 bytes, got ${raw.length}`);
  }

  const bytes = new Uint8Array(64);
  raw.forEach((value: unknown, i) => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 255) {
      throw new Error(`Invalid keypair format: Element at index ${i} is not a valid byte (0-255)`);
    }
    bytes[i] = value;
  });

  try {
    return Keypair.fromSecretKey(bytes);
  } catch (error) {
    throw new Error(`Invalid keypair: ${error instanceof Error ? error.message : String(error)}`);
  }
}
