/**
 * IDO Venue - Round Manager
 *
 * Orchestrates the round lifecycle, participation, settlement and
 * MetaIDO grouping on top of the clock, ledger, eligibility and
 * settlement modules.
 *
 * Every entry point:
 * - runs under its lock scopes (registry before round, never the reverse)
 * - snapshots each round it touches and journals each transfer
 * - on failure restores the snapshots and reverses the transfers
 * - publishes its events only after it commits
 */

import { PublicKey } from "@solana/web3.js";
import { allocator } from "../core/allocation-calculator";
import { FIRST_ID, MAX_BPS } from "../core/constants";
import {
  assertAcceptingContributions,
  assertBeforeStart,
  assertEnded,
  assertNotFinalized,
  createClock,
  delayClaimableTime,
  delayEndTime,
} from "../core/clock";
import { projectEligibility, validateContribution } from "../core/eligibility";
import { IdoError, isIdoError, TransferRollbackError } from "../core/errors";
import { EventBuffer, VenueEvents } from "../core/events";
import {
  copyRound,
  createRoundConfig,
  positionOf,
  recordContribution,
  restoreRound,
  RoundSnapshot,
  snapshotRound,
  totalRaised,
} from "../core/funding-ledger";
import { MetaIdoRegistry } from "../core/meta-ido-registry";
import { OwnerGate } from "../core/owner-gate";
import { settleClaim, SettlementContext, withdrawSpare } from "../core/settlement";
import { TransferJournal } from "../core/transfer-journal";
import {
  Clock,
  CreateRoundParams,
  MetaIdo,
  ParticipantSummary,
  Position,
  RankEntry,
  Round,
  RoundEligibility,
  RoundSpec,
  SettlementSummary,
  systemClock,
  TokenMetadataReader,
  TokenTransferGateway,
} from "../core/types";
import { createLogger } from "../utils/logger";
import { ScopedLockManager } from "../utils/execution-lock";

const log = createLogger("rounds");

const ID_SCOPE = "ids";
const META_SCOPE = "meta";

function roundScope(roundId: number): string {
  return `round:${roundId}`;
}

/**
 * Venue state as held in memory; the persistence layer serializes it
 */
export interface VenueState {
  rounds: Round[];
  nextRoundId: number;
  metaIdos: MetaIdo[];
  nextMetaIdoId: number;
}

export interface RoundManagerConfig {
  owner: OwnerGate;
  transfers: TokenTransferGateway;
  metadata: TokenMetadataReader;
  /** Custody account holding sale tokens and contributions */
  pool: PublicKey;
  /** Destination of raised funds on claim */
  treasury: PublicKey;
  clock?: Clock;
  events?: VenueEvents;
  lockTimeoutMs?: number;
  state?: VenueState;
}

/**
 * One in-flight operation: its transfers, events and round snapshots
 */
class Operation {
  readonly journal: TransferJournal;
  readonly events = new EventBuffer();
  private snapshots: Array<{ round: Round; snapshot: RoundSnapshot }> = [];

  constructor(transfers: TokenTransferGateway, readonly now: number) {
    this.journal = new TransferJournal(transfers);
  }

  track(round: Round): Round {
    this.snapshots.push({ round, snapshot: snapshotRound(round) });
    return round;
  }

  /**
   * Compensate completed transfers, then restore the tracked rounds.
   * When a compensation fails the rounds keep the operation's effects.
   */
  async abort(cause: unknown): Promise<void> {
    await this.journal.rollback(cause);
    for (const { round, snapshot } of [...this.snapshots].reverse()) {
      restoreRound(round, snapshot);
    }
  }
}

export class RoundManager {
  private rounds: Map<number, Round> = new Map();
  private nextRoundId: number;
  private metaIdos: MetaIdoRegistry;
  private locks: ScopedLockManager;
  private owner: OwnerGate;
  private transfers: TokenTransferGateway;
  private metadata: TokenMetadataReader;
  private pool: PublicKey;
  private treasury: PublicKey;
  private clock: Clock;

  readonly events: VenueEvents;

  constructor(config: RoundManagerConfig) {
    this.owner = config.owner;
    this.transfers = config.transfers;
    this.metadata = config.metadata;
    this.pool = config.pool;
    this.treasury = config.treasury;
    this.clock = config.clock ?? systemClock;
    this.events = config.events ?? new VenueEvents();
    this.locks = new ScopedLockManager({ acquireTimeoutMs: config.lockTimeoutMs });

    const state = config.state;
    for (const round of state?.rounds ?? []) {
      this.rounds.set(round.id, round);
    }
    this.nextRoundId = state?.nextRoundId ?? FIRST_ID;
    this.metaIdos = new MetaIdoRegistry(state?.metaIdos ?? [], state?.nextMetaIdoId ?? FIRST_ID);

    log.info("RoundManager initialized", {
      rounds: this.rounds.size,
      metaIdos: this.metaIdos.count(),
      pool: this.pool,
    });
  }

  // ==========================================================================
  // Operation plumbing
  // ==========================================================================

  private async execute<T>(
    operation: string,
    scopes: string[],
    body: (op: Operation) => Promise<T>
  ): Promise<T> {
    try {
      return await this.locks.withScopes(scopes, operation, async () => {
        const op = new Operation(this.transfers, this.clock.now());
        try {
          const result = await body(op);
          op.events.flushTo(this.events);
          return result;
        } catch (error) {
          await op.abort(error);
          throw error;
        }
      });
    } catch (error) {
      if (isIdoError(error)) {
        log.warn(`${operation} rejected`, { code: error.code, category: error.category, ...error.details });
      } else if (error instanceof TransferRollbackError) {
        log.error(`${operation} left funds in transit, ledger keeps its effects`, {
          original: error.original instanceof Error ? error.original.message : String(error.original),
          compensation: error.compensation instanceof Error ? error.compensation.message : String(error.compensation),
        });
      } else {
        log.error(`${operation} failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }
  }

  private requireRound(roundId: number): Round {
    const round = this.rounds.get(roundId);
    if (!round) {
      throw new IdoError("RoundNotFound", `round ${roundId} does not exist`, { roundId });
    }
    return round;
  }

  private settlementContext(op: Operation): SettlementContext {
    return {
      journal: op.journal,
      metadata: this.metadata,
      pool: this.pool,
      treasury: this.treasury,
      now: op.now,
    };
  }

  // ==========================================================================
  // Round lifecycle
  // ==========================================================================

  /**
   * Create a round. Decimals are read from the sale token before an ID
   * is assigned, so a failed read consumes no ID.
   * @returns the new round ID
   */
  async createRound(caller: PublicKey, params: CreateRoundParams): Promise<number> {
    return this.execute("createRound", [ID_SCOPE], async (op) => {
      this.owner.assertOwner(caller);
      validateCreateParams(params);
      const clock = createClock(params.startTime, params.endTime, params.claimableTime, params.hasWhitelist);

      const decimals = await this.metadata.decimals(params.idoToken);
      if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
        throw new IdoError("InvalidParameter", "sale token reports invalid decimals", { decimals });
      }

      const id = this.nextRoundId;
      this.rounds.set(id, { id, clock, config: createRoundConfig(params, decimals) });
      this.nextRoundId++;

      op.events.push("roundCreated", {
        roundId: id,
        idoToken: params.idoToken.toBase58(),
        idoTokenDecimals: decimals,
        startTime: clock.startTime,
        endTime: clock.endTime,
        claimableTime: clock.claimableTime,
      });
      log.info("Round created", { roundId: id, idoToken: params.idoToken, decimals });
      return id;
    });
  }

  /**
   * Freeze size (pool's sale-token balance) and raised value, then open
   * the round for claims. One-way.
   */
  async finalizeRound(caller: PublicKey, roundId: number): Promise<void> {
    await this.execute("finalizeRound", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const round = op.track(this.requireRound(roundId));
      const { clock, config } = round;

      assertNotFinalized(clock);
      assertEnded(clock, op.now);

      config.idoSize = await this.metadata.balanceOf(this.pool, config.idoToken);
      config.fundedUSDValue = totalRaised(config);

      if (config.fundedUSDValue < config.minimumFundingGoal) {
        throw new IdoError("FundingGoalNotReached", "raised value is below the funding goal", {
          roundId,
          fundedUSDValue: config.fundedUSDValue,
          minimumFundingGoal: config.minimumFundingGoal,
        });
      }

      clock.isFinalized = true;
      op.events.push("roundFinalized", {
        roundId,
        idoSize: config.idoSize,
        fundedUSDValue: config.fundedUSDValue,
      });
      log.info("Round finalized", {
        roundId,
        idoSize: allocator.formatUnits(config.idoSize, config.idoTokenDecimals),
        fundedUSDValue: config.fundedUSDValue,
      });
    });
  }

  async delayEndTime(caller: PublicKey, roundId: number, newTime: number): Promise<void> {
    await this.execute("delayEndTime", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const round = op.track(this.requireRound(roundId));
      if (delayEndTime(round.clock, newTime)) {
        op.events.push("endTimeDelayed", { roundId, endTime: newTime });
        log.info("End time delayed", { roundId, endTime: newTime });
      }
    });
  }

  async delayClaimableTime(caller: PublicKey, roundId: number, newTime: number): Promise<void> {
    await this.execute("delayClaimableTime", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const round = op.track(this.requireRound(roundId));
      if (delayClaimableTime(round.clock, newTime)) {
        op.events.push("claimableTimeDelayed", { roundId, claimableTime: newTime });
        log.info("Claimable time delayed", { roundId, claimableTime: newTime });
      }
    });
  }

  // ==========================================================================
  // Round configuration
  // ==========================================================================

  /**
   * Enabling is only possible before the round opens; disabling any
   * time before finalization.
   */
  async setWhitelistStatus(caller: PublicKey, roundId: number, enabled: boolean): Promise<void> {
    await this.execute("setWhitelistStatus", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const round = op.track(this.requireRound(roundId));
      const { clock } = round;

      if (enabled) {
        assertBeforeStart(clock, op.now, "enabling the whitelist");
        if (clock.hasWhitelist) {
          throw new IdoError("WhitelistAlreadyEnabled", "whitelist is already enabled", { roundId });
        }
      } else {
        assertNotFinalized(clock);
        if (!clock.hasWhitelist) {
          throw new IdoError("WhitelistNotEnabled", "whitelist is already disabled", { roundId });
        }
      }

      clock.hasWhitelist = enabled;
      op.events.push("whitelistStatusChanged", { roundId, enabled });
      log.info("Whitelist status changed", { roundId, enabled });
    });
  }

  async modifyWhitelist(
    caller: PublicKey,
    roundId: number,
    addresses: PublicKey[],
    add: boolean
  ): Promise<void> {
    await this.execute("modifyWhitelist", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      if (addresses.length === 0) {
        throw new IdoError("EmptyAddressList", "no addresses given", { roundId });
      }
      const round = op.track(this.requireRound(roundId));
      assertNotFinalized(round.clock);
      if (!round.clock.hasWhitelist) {
        throw new IdoError("WhitelistNotEnabled", "whitelist is not enabled", { roundId });
      }

      for (const address of addresses) {
        if (add) {
          round.config.whitelist.add(address.toBase58());
        } else {
          round.config.whitelist.delete(address.toBase58());
        }
      }

      op.events.push("whitelistModified", { roundId, added: add, count: addresses.length });
      log.info("Whitelist modified", { roundId, added: add, count: addresses.length });
    });
  }

  async setFyTokenMaxBasisPoints(caller: PublicKey, roundId: number, bps: number): Promise<void> {
    await this.execute("setFyTokenMaxBasisPoints", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      assertBasisPoints(bps);
      const round = op.track(this.requireRound(roundId));
      assertBeforeStart(round.clock, op.now, "changing the secondary cap");

      round.config.secondaryCapBps = bps;
      op.events.push("basisPointsChanged", { roundId, bps });
      log.info("Secondary cap changed", { roundId, bps });
    });
  }

  /**
   * Set or clear (null) the read-side eligibility policy
   */
  async setRoundSpec(caller: PublicKey, roundId: number, spec: RoundSpec | null): Promise<void> {
    await this.execute("setRoundSpec", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      if (spec) validateSpec(spec);
      const round = op.track(this.requireRound(roundId));
      assertNotFinalized(round.clock);

      round.config.spec = spec ? { ...spec } : null;
      op.events.push("roundSpecChanged", { roundId, spec: round.config.spec });
      log.info("Round spec changed", { roundId, restricted: spec !== null });
    });
  }

  // ==========================================================================
  // Participation & settlement
  // ==========================================================================

  /**
   * Contribute `amount` of `token` to a round.
   * @returns the sale-token allocation credited by this contribution
   */
  async participate(
    caller: PublicKey,
    roundId: number,
    token: PublicKey,
    amount: bigint
  ): Promise<bigint> {
    return this.execute("participate", [roundScope(roundId)], async (op) => {
      if (amount <= 0n) {
        throw new IdoError("InvalidAmount", "contribution must be positive", { amount });
      }
      const round = op.track(this.requireRound(roundId));
      assertAcceptingContributions(round.clock, op.now);

      const kind = validateContribution(round, caller, token, amount);
      const record = recordContribution(round.config, caller, kind, amount);
      await op.journal.pull(token, caller, amount);

      op.events.push("participated", {
        roundId,
        participant: caller.toBase58(),
        token: token.toBase58(),
        amount,
        allocation: record.allocation,
      });
      log.info("Participation recorded", {
        roundId,
        participant: caller,
        kind,
        amount,
        allocation: record.allocation,
      });
      return record.allocation;
    });
  }

  /**
   * Settle a participant's position. Callable by anyone; funds only
   * ever move to the participant and the treasury.
   */
  async claim(roundId: number, participant: PublicKey): Promise<Position> {
    return this.execute("claim", [roundScope(roundId)], async (op) => {
      const round = op.track(this.requireRound(roundId));
      const position = await settleClaim(round, participant, this.settlementContext(op));

      op.events.push("claimed", {
        roundId,
        participant: participant.toBase58(),
        amount: position.amount,
        secondaryAmount: position.secondaryAmount,
        tokenAllocation: position.tokenAllocation,
      });
      log.info("Position claimed", {
        roundId,
        participant,
        tokenAllocation: allocator.formatUnits(position.tokenAllocation, round.config.idoTokenDecimals),
      });
      return position;
    });
  }

  /**
   * Send unsold sale tokens of an unfinalized, under-funded round to the owner
   * @returns the amount withdrawn
   */
  async withdrawSpareTokens(caller: PublicKey, roundId: number): Promise<bigint> {
    return this.execute("withdrawSpareTokens", [roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const round = op.track(this.requireRound(roundId));
      const result = await withdrawSpare(round, caller, this.settlementContext(op));

      op.events.push("spareTokensWithdrawn", {
        roundId,
        to: caller.toBase58(),
        amount: result.amount,
      });
      log.info("Spare tokens withdrawn", { roundId, ...result });
      return result.amount;
    });
  }

  // ==========================================================================
  // MetaIDO grouping
  // ==========================================================================

  async createMetaIDO(caller: PublicKey): Promise<number> {
    return this.execute("createMetaIDO", [META_SCOPE], async (op) => {
      this.owner.assertOwner(caller);
      const metaIdo = this.metaIdos.create();
      op.events.push("metaIdoCreated", { metaIdoId: metaIdo.id });
      log.info("MetaIDO created", { metaIdoId: metaIdo.id });
      return metaIdo.id;
    });
  }

  /**
   * Add a round to, or remove it from, a MetaIDO.
   * A round belongs to at most one MetaIDO.
   */
  async manageRoundInMetaIDO(
    caller: PublicKey,
    metaIdoId: number,
    roundId: number,
    add: boolean
  ): Promise<void> {
    await this.execute("manageRoundInMetaIDO", [META_SCOPE, roundScope(roundId)], async (op) => {
      this.owner.assertOwner(caller);
      const metaIdo = this.metaIdos.get(metaIdoId);
      const round = op.track(this.requireRound(roundId));

      if (add) {
        const parent = round.clock.parentMetaIdoId;
        if (parent !== null) {
          throw new IdoError("RoundAlreadyInMetaIDO", `round ${roundId} already belongs to MetaIDO ${parent}`, {
            roundId,
            metaIdoId: parent,
          });
        }
        this.metaIdos.addRound(metaIdo, roundId);
        round.clock.parentMetaIdoId = metaIdoId;
      } else {
        this.metaIdos.removeRound(metaIdo, roundId);
        round.clock.parentMetaIdoId = null;
      }

      op.events.push("roundMembershipChanged", { metaIdoId, roundId, added: add });
      log.info("MetaIDO membership changed", { metaIdoId, roundId, added: add });
    });
  }

  /**
   * Participant opts into a MetaIDO
   */
  async registerForMetaIDO(caller: PublicKey, metaIdoId: number): Promise<void> {
    await this.execute("registerForMetaIDO", [META_SCOPE], async (op) => {
      const metaIdo = this.metaIdos.get(metaIdoId);
      if (this.metaIdos.register(metaIdo, caller)) {
        op.events.push("metaIdoRegistered", { metaIdoId, participant: caller.toBase58() });
        log.info("Participant registered", { metaIdoId, participant: caller });
      }
    });
  }

  async setRanksAndMultipliers(caller: PublicKey, metaIdoId: number, entries: RankEntry[]): Promise<void> {
    await this.execute("setRanksAndMultipliers", [META_SCOPE], async (op) => {
      this.owner.assertOwner(caller);
      const metaIdo = this.metaIdos.get(metaIdoId);
      this.metaIdos.setRanks(metaIdo, entries);
      op.events.push("ranksUpdated", { metaIdoId, count: entries.length });
      log.info("Ranks updated", { metaIdoId, count: entries.length });
    });
  }

  // ==========================================================================
  // Queries (read-only)
  // ==========================================================================

  getRound(roundId: number): Round {
    return copyRound(this.requireRound(roundId));
  }

  getPosition(roundId: number, participant: PublicKey): Position {
    return positionOf(this.requireRound(roundId).config, participant);
  }

  isWhitelisted(roundId: number, participant: PublicKey): boolean {
    return this.requireRound(roundId).config.whitelist.has(participant.toBase58());
  }

  getMetaIDO(metaIdoId: number): MetaIdo {
    const metaIdo = this.metaIdos.get(metaIdoId);
    return {
      id: metaIdo.id,
      roundIds: [...metaIdo.roundIds],
      registered: new Set(metaIdo.registered),
      ranks: new Map(metaIdo.ranks),
      multipliers: new Map(metaIdo.multipliers),
    };
  }

  /**
   * Advisory eligibility of a participant across rounds
   */
  getEligibility(participant: PublicKey, roundIds: number[]): RoundEligibility[] {
    return roundIds.map((roundId) => {
      const round = this.requireRound(roundId);
      return projectEligibility(round, this.metaIdos.find(round.clock.parentMetaIdoId), participant);
    });
  }

  getParticipantSummary(participant: PublicKey, roundIds: number[]): ParticipantSummary {
    const positions = roundIds.map((roundId) => ({
      roundId,
      position: this.getPosition(roundId, participant),
    }));
    return {
      participant: participant.toBase58(),
      positions,
      totalAmount: positions.reduce((sum, p) => sum + p.position.amount, 0n),
      totalSecondaryAmount: positions.reduce((sum, p) => sum + p.position.secondaryAmount, 0n),
      totalTokenAllocation: positions.reduce((sum, p) => sum + p.position.tokenAllocation, 0n),
    };
  }

  /**
   * Frozen totals of a finalized round and what is still owed to claimants
   */
  getSettlementSummary(roundId: number): SettlementSummary {
    const round = this.requireRound(roundId);
    if (!round.clock.isFinalized) {
      throw new IdoError("NotFinalized", `round ${roundId} is not finalized`, { roundId });
    }
    const positions = Array.from(round.config.positions.values());
    return {
      roundId,
      idoSize: round.config.idoSize,
      fundedUSDValue: round.config.fundedUSDValue,
      claimableTime: round.clock.claimableTime,
      openPositions: positions.length,
      outstandingAllocation: positions.reduce((sum, p) => sum + p.tokenAllocation, 0n),
    };
  }

  getRoundCount(): number {
    return this.nextRoundId - FIRST_ID;
  }

  getMetaIdoCount(): number {
    return this.metaIdos.count();
  }

  /**
   * Detached copy of the whole venue state
   */
  exportState(): VenueState {
    return {
      rounds: Array.from(this.rounds.values(), copyRound),
      nextRoundId: this.nextRoundId,
      metaIdos: this.metaIdos.all().map((m) => this.getMetaIDO(m.id)),
      nextMetaIdoId: this.metaIdos.peekNextId(),
    };
  }
}

// ============================================================================
// Parameter validation
// ============================================================================

function assertBasisPoints(bps: number): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > MAX_BPS) {
    throw new IdoError("InvalidBasisPoints", "basis points must be an integer in [0, 10000]", { bps });
  }
}

function validateCreateParams(params: CreateRoundParams): void {
  if (params.idoPrice <= 0n) {
    throw new IdoError("InvalidParameter", "idoPrice must be positive", { idoPrice: params.idoPrice });
  }
  if (params.idoSize < 0n || params.minimumFundingGoal < 0n) {
    throw new IdoError("InvalidParameter", "idoSize and minimumFundingGoal must not be negative", {
      idoSize: params.idoSize,
      minimumFundingGoal: params.minimumFundingGoal,
    });
  }
  if (params.primaryToken.equals(params.secondaryToken)) {
    throw new IdoError("InvalidParameter", "primary and secondary tokens must differ", {
      token: params.primaryToken.toBase58(),
    });
  }
  assertBasisPoints(params.secondaryCapBps);
}

function validateSpec(spec: RoundSpec): void {
  if (!Number.isInteger(spec.minRank) || !Number.isInteger(spec.maxRank) || spec.minRank > spec.maxRank) {
    throw new IdoError("InvalidParameter", "minRank must not exceed maxRank", {
      minRank: spec.minRank,
      maxRank: spec.maxRank,
    });
  }
  if (spec.maxAlloc < 0n || spec.maxAllocMultiplier < 0n) {
    throw new IdoError("InvalidParameter", "maxAlloc and maxAllocMultiplier must not be negative", {
      maxAlloc: spec.maxAlloc,
      maxAllocMultiplier: spec.maxAllocMultiplier,
    });
  }
}
