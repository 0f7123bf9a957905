/**
 * Funding Ledger
 *
 * Per-round running totals and per-participant positions.
 * The accounting source of truth: only this module mutates
 * totalFunded and positions.
 */

import { PublicKey } from "@solana/web3.js";
import { allocator } from "./allocation-calculator";
import { IdoError } from "./errors";
import { CreateRoundParams, Position, Round, RoundClock, RoundConfig } from "./types";

export type PaymentKind = "primary" | "secondary";

export interface ContributionRecord {
  kind: PaymentKind;
  amount: bigint;
  allocation: bigint;
  position: Position;
}

export function createRoundConfig(params: CreateRoundParams, idoTokenDecimals: number): RoundConfig {
  return {
    idoToken: params.idoToken,
    idoTokenDecimals,
    primaryToken: params.primaryToken,
    secondaryToken: params.secondaryToken,
    idoPrice: params.idoPrice,
    idoSize: params.idoSize,
    minimumFundingGoal: params.minimumFundingGoal,
    fundedUSDValue: 0n,
    secondaryCapBps: params.secondaryCapBps,
    whitelist: new Set(),
    totalFunded: new Map([
      [params.primaryToken.toBase58(), 0n],
      [params.secondaryToken.toBase58(), 0n],
    ]),
    positions: new Map(),
    spec: null,
  };
}

export function emptyPosition(): Position {
  return { amount: 0n, secondaryAmount: 0n, tokenAllocation: 0n };
}

export function fundedIn(config: RoundConfig, token: PublicKey): bigint {
  return config.totalFunded.get(token.toBase58()) ?? 0n;
}

/**
 * Sum of cumulative funding across both payment tokens
 */
export function totalRaised(config: RoundConfig): bigint {
  return fundedIn(config, config.primaryToken) + fundedIn(config, config.secondaryToken);
}

export function positionOf(config: RoundConfig, participant: PublicKey): Position {
  const position = config.positions.get(participant.toBase58());
  return position ? { ...position } : emptyPosition();
}

/**
 * Credit a validated contribution to the participant's position and
 * the round's token total.
 */
export function recordContribution(
  config: RoundConfig,
  participant: PublicKey,
  kind: PaymentKind,
  amount: bigint
): ContributionRecord {
  const key = participant.toBase58();
  const token = kind === "primary" ? config.primaryToken : config.secondaryToken;
  const allocation = allocator.tokenAllocation(amount, config.idoTokenDecimals, config.idoPrice);

  const position = config.positions.get(key) ?? emptyPosition();
  position.amount += amount;
  if (kind === "secondary") {
    position.secondaryAmount += amount;
  }
  position.tokenAllocation += allocation;
  config.positions.set(key, position);

  const tokenKey = token.toBase58();
  config.totalFunded.set(tokenKey, (config.totalFunded.get(tokenKey) ?? 0n) + amount);

  return { kind, amount, allocation, position: { ...position } };
}

/**
 * Remove and return a participant's position. Single use.
 */
export function takePosition(config: RoundConfig, participant: PublicKey): Position {
  const key = participant.toBase58();
  const position = config.positions.get(key);
  if (!position || position.amount === 0n) {
    throw new IdoError("NoPosition", "participant has no position in this round", {
      participant: key,
    });
  }
  config.positions.delete(key);
  return position;
}

// ============================================================================
// Snapshots (operation rollback)
// ============================================================================

export interface RoundSnapshot {
  clock: RoundClock;
  fundedUSDValue: bigint;
  idoSize: bigint;
  secondaryCapBps: number;
  whitelist: Set<string>;
  totalFunded: Map<string, bigint>;
  positions: Map<string, Position>;
  spec: RoundConfig["spec"];
}

export function snapshotRound(round: Round): RoundSnapshot {
  const { config } = round;
  return {
    clock: { ...round.clock },
    fundedUSDValue: config.fundedUSDValue,
    idoSize: config.idoSize,
    secondaryCapBps: config.secondaryCapBps,
    whitelist: new Set(config.whitelist),
    totalFunded: new Map(config.totalFunded),
    positions: new Map(Array.from(config.positions, ([key, p]) => [key, { ...p }])),
    spec: config.spec ? { ...config.spec } : null,
  };
}

export function restoreRound(round: Round, snapshot: RoundSnapshot): void {
  round.clock = { ...snapshot.clock };
  round.config.fundedUSDValue = snapshot.fundedUSDValue;
  round.config.idoSize = snapshot.idoSize;
  round.config.secondaryCapBps = snapshot.secondaryCapBps;
  round.config.whitelist = snapshot.whitelist;
  round.config.totalFunded = snapshot.totalFunded;
  round.config.positions = snapshot.positions;
  round.config.spec = snapshot.spec;
}

/**
 * Detached copy of a round for read models and persistence
 */
export function copyRound(round: Round): Round {
  const snapshot = snapshotRound(round);
  return {
    id: round.id,
    clock: snapshot.clock,
    config: {
      ...round.config,
      whitelist: snapshot.whitelist,
      totalFunded: snapshot.totalFunded,
      positions: snapshot.positions,
      spec: snapshot.spec,
    },
  };
}
