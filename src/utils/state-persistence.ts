/**
 * IDO Venue State Persistence
 *
 * Atomic state save/load with backup rotation for crash recovery.
 * - Writes to temp file first, then atomic rename
 * - Keeps 3 backup versions
 * - Validates every file against the schema on load
 *
 * Amounts are stored as decimal strings, keys as base58.
 */

import * as fs from "fs";
import * as path from "path";
import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { STATE_BACKUP_COUNT, STATE_VERSION } from "../core/constants";
import type { MetaIdo, Round } from "../core/types";
import type { VenueState } from "../managers/round-manager";
import { createLogger } from "./logger";

const log = createLogger("state");

// ============================================================================
// Schema
// ============================================================================

const Amount = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer string")
  .transform((v) => BigInt(v));

const Key = z.string().transform((value, ctx) => {
  try {
    return new PublicKey(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid public key: ${error instanceof Error ? error.message : String(error)}`,
    });
    return z.NEVER;
  }
});

const Timestamp = z.number().int().nonnegative();

const PositionSchema = z.object({
  amount: Amount,
  secondaryAmount: Amount,
  tokenAllocation: Amount,
});

const RoundSpecSchema = z.object({
  minRank: z.number().int(),
  maxRank: z.number().int(),
  noRank: z.boolean(),
  maxAlloc: Amount,
  maxAllocMultiplier: Amount,
  noMultiplier: z.boolean(),
});

const RoundSchema = z.object({
  id: z.number().int().positive(),
  clock: z.object({
    startTime: Timestamp,
    endTime: Timestamp,
    initialEndTime: Timestamp,
    claimableTime: Timestamp,
    initialClaimableTime: Timestamp,
    isFinalized: z.boolean(),
    hasWhitelist: z.boolean(),
    parentMetaIdoId: z.number().int().positive().nullable(),
  }),
  config: z.object({
    idoToken: Key,
    idoTokenDecimals: z.number().int().min(0).max(255),
    primaryToken: Key,
    secondaryToken: Key,
    idoPrice: Amount,
    idoSize: Amount,
    minimumFundingGoal: Amount,
    fundedUSDValue: Amount,
    secondaryCapBps: z.number().int().min(0).max(10_000),
    whitelist: z.array(z.string()),
    totalFunded: z.record(Amount),
    positions: z.record(PositionSchema),
    spec: RoundSpecSchema.nullable(),
  }),
});

const MetaIdoSchema = z.object({
  id: z.number().int().positive(),
  roundIds: z.array(z.number().int().positive()),
  registered: z.array(z.string()),
  ranks: z.record(z.number().int().nonnegative()),
  multipliers: z.record(Amount),
});

const PersistedStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  savedAt: Timestamp,
  network: z.enum(["devnet", "mainnet", "localnet"]),
  owner: Key,
  pendingOwner: Key.nullable(),
  nextRoundId: z.number().int().positive(),
  nextMetaIdoId: z.number().int().positive(),
  rounds: z.array(RoundSchema),
  metaIdos: z.array(MetaIdoSchema),
});

export type VenueNetwork = z.infer<typeof PersistedStateSchema>["network"];

/** On-disk shape */
export type PersistedState = z.input<typeof PersistedStateSchema>;

export interface LoadedState {
  network: VenueNetwork;
  owner: PublicKey;
  pendingOwner: PublicKey | null;
  savedAt: number;
  venue: VenueState;
}

export interface SaveStateInput {
  network: VenueNetwork;
  owner: PublicKey;
  pendingOwner: PublicKey | null;
  venue: VenueState;
}

// ============================================================================
// Serialization
// ============================================================================

function mapValues<V, R>(map: Map<string, V>, fn: (value: V) => R): Record<string, R> {
  const out: Record<string, R> = {};
  for (const [key, value] of map) {
    out[key] = fn(value);
  }
  return out;
}

export function serializeRound(round: Round): PersistedState["rounds"][number] {
  const { clock, config } = round;
  return {
    id: round.id,
    clock: { ...clock },
    config: {
      idoToken: config.idoToken.toBase58(),
      idoTokenDecimals: config.idoTokenDecimals,
      primaryToken: config.primaryToken.toBase58(),
      secondaryToken: config.secondaryToken.toBase58(),
      idoPrice: config.idoPrice.toString(),
      idoSize: config.idoSize.toString(),
      minimumFundingGoal: config.minimumFundingGoal.toString(),
      fundedUSDValue: config.fundedUSDValue.toString(),
      secondaryCapBps: config.secondaryCapBps,
      whitelist: Array.from(config.whitelist),
      totalFunded: mapValues(config.totalFunded, (v) => v.toString()),
      positions: mapValues(config.positions, (p) => ({
        amount: p.amount.toString(),
        secondaryAmount: p.secondaryAmount.toString(),
        tokenAllocation: p.tokenAllocation.toString(),
      })),
      spec: config.spec
        ? {
            ...config.spec,
            maxAlloc: config.spec.maxAlloc.toString(),
            maxAllocMultiplier: config.spec.maxAllocMultiplier.toString(),
          }
        : null,
    },
  };
}

export function serializeMetaIdo(metaIdo: MetaIdo): PersistedState["metaIdos"][number] {
  return {
    id: metaIdo.id,
    roundIds: [...metaIdo.roundIds],
    registered: Array.from(metaIdo.registered),
    ranks: Object.fromEntries(metaIdo.ranks),
    multipliers: mapValues(metaIdo.multipliers, (v) => v.toString()),
  };
}

export function serializeState(input: SaveStateInput, savedAt: number = Date.now()): PersistedState {
  return {
    version: STATE_VERSION,
    savedAt,
    network: input.network,
    owner: input.owner.toBase58(),
    pendingOwner: input.pendingOwner ? input.pendingOwner.toBase58() : null,
    nextRoundId: input.venue.nextRoundId,
    nextMetaIdoId: input.venue.nextMetaIdoId,
    rounds: input.venue.rounds.map(serializeRound),
    metaIdos: input.venue.metaIdos.map(serializeMetaIdo),
  };
}

/**
 * Parse and validate a persisted document
 * @throws Error listing the first schema issues
 */
export function deserializeState(raw: unknown): LoadedState {
  const result = PersistedStateSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid state document: ${issues.join("; ")}`);
  }
  const state = result.data;

  const rounds: Round[] = state.rounds.map((r) => ({
    id: r.id,
    clock: r.clock,
    config: {
      ...r.config,
      whitelist: new Set(r.config.whitelist),
      totalFunded: new Map(Object.entries(r.config.totalFunded)),
      positions: new Map(Object.entries(r.config.positions)),
    },
  }));

  const metaIdos: MetaIdo[] = state.metaIdos.map((m) => ({
    id: m.id,
    roundIds: m.roundIds,
    registered: new Set(m.registered),
    ranks: new Map(Object.entries(m.ranks)),
    multipliers: new Map(Object.entries(m.multipliers)),
  }));

  return {
    network: state.network,
    owner: state.owner,
    pendingOwner: state.pendingOwner,
    savedAt: state.savedAt,
    venue: {
      rounds,
      nextRoundId: state.nextRoundId,
      metaIdos,
      nextMetaIdoId: state.nextMetaIdoId,
    },
  };
}

// ============================================================================
// Files
// ============================================================================

function backupFiles(filePath: string): string[] {
  return Array.from({ length: STATE_BACKUP_COUNT }, (_, i) => `${filePath}.${i + 1}`);
}

/**
 * Rotate backup files
 * state.json -> state.json.1 -> state.json.2 -> state.json.3 (deleted)
 */
function rotateBackups(filePath: string): void {
  const oldest = `${filePath}.${STATE_BACKUP_COUNT}`;
  if (fs.existsSync(oldest)) {
    fs.unlinkSync(oldest);
  }

  for (let i = STATE_BACKUP_COUNT - 1; i >= 1; i--) {
    const current = `${filePath}.${i}`;
    if (fs.existsSync(current)) {
      fs.renameSync(current, `${filePath}.${i + 1}`);
    }
  }
  fs.renameSync(filePath, `${filePath}.1`);
}

/**
 * Atomically save state to file
 * - Writes to temp file first
 * - Rotates backups
 * - Atomic rename
 */
export async function saveState(filePath: string, input: SaveStateInput): Promise<void> {
  const state = serializeState(input);
  const tempFile = `${filePath}.tmp.${process.pid}`;
  const content = JSON.stringify(state, null, 2);

  try {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(tempFile, content, "utf-8");

    if (fs.existsSync(filePath)) {
      rotateBackups(filePath);
    }

    fs.renameSync(tempFile, filePath);

    log.debug("State saved", {
      rounds: state.rounds.length,
      metaIdos: state.metaIdos.length,
    });
  } catch (error) {
    if (fs.existsSync(tempFile)) {
      fs.unlinkSync(tempFile);
    }
    throw error;
  }
}

export interface LoadStateOptions {
  /**
   * Load the newest valid backup instead of the current file. Backups
   * predate the last save, so positions settled since then reappear.
   */
  restoreBackup?: boolean;
}

function readStateFile(file: string): LoadedState {
  return deserializeState(JSON.parse(fs.readFileSync(file, "utf-8")));
}

function logLoaded(file: string, loaded: LoadedState): void {
  log.info("State loaded", {
    file,
    rounds: loaded.venue.rounds.length,
    metaIdos: loaded.venue.metaIdos.length,
    savedAt: new Date(loaded.savedAt).toISOString(),
  });
}

/**
 * Load the current state file.
 * Returns null when neither it nor any backup exists; throws when it is
 * invalid or missing beside existing backups.
 */
export async function loadState(filePath: string, options: LoadStateOptions = {}): Promise<LoadedState | null> {
  const backups = backupFiles(filePath).filter((file) => fs.existsSync(file));

  if (options.restoreBackup) {
    for (const file of backups) {
      try {
        const loaded = readStateFile(file);
        log.warn("Restored state from backup", { file });
        logLoaded(file, loaded);
        return loaded;
      } catch (error) {
        log.warn("Backup is invalid, trying an older one", {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    throw new Error(`No valid backup of ${filePath} to restore`);
  }

  if (!fs.existsSync(filePath)) {
    if (backups.length > 0) {
      throw new Error(`State file ${filePath} is missing but backups exist; restore one explicitly`);
    }
    log.info("No state file found, starting fresh");
    return null;
  }

  let loaded: LoadedState;
  try {
    loaded = readStateFile(filePath);
  } catch (error) {
    throw new Error(`State file ${filePath} is invalid; restore a backup explicitly`, { cause: error });
  }
  logLoaded(filePath, loaded);
  return loaded;
}

/**
 * Delete state file and all backups
 */
export function clearState(filePath: string): void {
  for (const file of [filePath, ...backupFiles(filePath)]) {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  }
  log.info("State cleared");
}
