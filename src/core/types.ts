/**
 * IDO Venue Core Types
 *
 * Round, ledger and MetaIDO state, plus the collaborator contracts
 * the venue calls into. Amounts are raw integer token units (bigint),
 * timestamps are unix seconds.
 */

import { PublicKey } from "@solana/web3.js";

// ============================================================
// ROUND STATE
// ============================================================

/**
 * Time windows and lifecycle flags of one round
 */
export interface RoundClock {
  startTime: number;
  endTime: number;
  initialEndTime: number;
  claimableTime: number;
  initialClaimableTime: number;
  isFinalized: boolean;
  hasWhitelist: boolean;
  parentMetaIdoId: number | null;
}

/**
 * A participant's cumulative contribution in one round
 */
export interface Position {
  /** Total contributed, across both payment tokens */
  amount: bigint;
  /** Portion of `amount` paid in the secondary (capped) token */
  secondaryAmount: bigint;
  /** Sale-token entitlement accrued so far */
  tokenAllocation: bigint;
}

/**
 * Read-side eligibility policy of a round
 */
export interface RoundSpec {
  minRank: number;
  maxRank: number;
  noRank: boolean;
  maxAlloc: bigint;
  maxAllocMultiplier: bigint;
  noMultiplier: boolean;
}

export interface RoundConfig {
  idoToken: PublicKey;
  idoTokenDecimals: number;
  primaryToken: PublicKey;
  secondaryToken: PublicKey;
  /** Payment units per whole sale token, see allocation-calculator */
  idoPrice: bigint;
  idoSize: bigint;
  minimumFundingGoal: bigint;
  fundedUSDValue: bigint;
  secondaryCapBps: number;
  /** base58 participant keys */
  whitelist: Set<string>;
  /** base58 token mint → cumulative funded */
  totalFunded: Map<string, bigint>;
  /** base58 participant → position */
  positions: Map<string, Position>;
  spec: RoundSpec | null;
}

export interface Round {
  id: number;
  clock: RoundClock;
  config: RoundConfig;
}

export interface MetaIdo {
  id: number;
  roundIds: number[];
  /** base58 participant keys */
  registered: Set<string>;
  ranks: Map<string, number>;
  multipliers: Map<string, bigint>;
}

// ============================================================
// OPERATION PARAMETERS
// ============================================================

export interface CreateRoundParams {
  idoToken: PublicKey;
  primaryToken: PublicKey;
  secondaryToken: PublicKey;
  idoPrice: bigint;
  idoSize: bigint;
  minimumFundingGoal: bigint;
  secondaryCapBps: number;
  startTime: number;
  endTime: number;
  claimableTime: number;
  hasWhitelist: boolean;
}

export interface RankEntry {
  participant: PublicKey;
  rank: number;
  multiplier: bigint;
}

// ============================================================
// READ MODELS
// ============================================================

export interface RoundEligibility {
  roundId: number;
  metaIdoId: number | null;
  isRegistered: boolean;
  rank: number;
  multiplier: bigint;
  eligible: boolean;
  /** null when the round carries no spec (unrestricted) */
  maxAllocation: bigint | null;
}

export interface ParticipantSummary {
  participant: string;
  positions: Array<{ roundId: number; position: Position }>;
  totalAmount: bigint;
  totalSecondaryAmount: bigint;
  totalTokenAllocation: bigint;
}

export interface SettlementSummary {
  roundId: number;
  idoSize: bigint;
  fundedUSDValue: bigint;
  claimableTime: number;
  openPositions: number;
  outstandingAllocation: bigint;
}

// ============================================================
// COLLABORATORS
// ============================================================

/**
 * Moves tokens in and out of the pool's custody.
 * Each call is all-or-nothing.
 */
export interface TokenTransferGateway {
  pull(token: PublicKey, from: PublicKey, amount: bigint): Promise<void>;
  push(token: PublicKey, to: PublicKey, amount: bigint): Promise<void>;
}

export interface TokenMetadataReader {
  decimals(token: PublicKey): Promise<number>;
  balanceOf(holder: PublicKey, token: PublicKey): Promise<bigint>;
}

/**
 * Source of "now" in unix seconds
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
