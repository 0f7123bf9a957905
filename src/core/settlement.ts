/**
 * Settlement
 *
 * Claim and spare-token withdrawal. The ledger is mutated before any
 * transfer leaves the pool, so a re-entered claim finds no position.
 */

import { PublicKey } from "@solana/web3.js";
import { allocator } from "./allocation-calculator";
import { assertClaimable, assertNotFinalized } from "./clock";
import { IdoError } from "./errors";
import { takePosition, totalRaised } from "./funding-ledger";
import { TransferJournal } from "./transfer-journal";
import { Position, Round, TokenMetadataReader } from "./types";

export interface SettlementContext {
  journal: TransferJournal;
  metadata: TokenMetadataReader;
  /** Custody account whose balances back every round */
  pool: PublicKey;
  /** Destination of raised payment tokens */
  treasury: PublicKey;
  now: number;
}

/**
 * Settle one participant: delete the position, route the raised funds
 * to the treasury, deliver the sale tokens.
 */
export async function settleClaim(
  round: Round,
  participant: PublicKey,
  ctx: SettlementContext
): Promise<Position> {
  assertClaimable(round.clock, ctx.now);

  const position = takePosition(round.config, participant);
  const primaryAmount = position.amount - position.secondaryAmount;
  const { config } = round;

  await ctx.journal.push(config.secondaryToken, ctx.treasury, position.secondaryAmount);
  await ctx.journal.push(config.primaryToken, ctx.treasury, primaryAmount);
  await ctx.journal.push(config.idoToken, participant, position.tokenAllocation);

  return position;
}

export interface SpareWithdrawal {
  fundedValue: bigint;
  totalGoalValue: bigint;
  soldEquivalent: bigint;
  balance: bigint;
  amount: bigint;
}

/**
 * Recover unsold sale-token inventory from an unfinalized round whose
 * funding fell short of the nominal sale value.
 */
export async function withdrawSpare(
  round: Round,
  to: PublicKey,
  ctx: SettlementContext
): Promise<SpareWithdrawal> {
  assertNotFinalized(round.clock);

  const { config } = round;
  const fundedValue = totalRaised(config);
  const totalGoalValue = allocator.totalGoalValue(
    config.idoSize,
    config.idoPrice,
    config.idoTokenDecimals
  );

  if (totalGoalValue <= fundedValue) {
    throw new IdoError("FundingGoalReached", "funding covers the full sale, nothing is spare", {
      roundId: round.id,
      totalGoalValue,
      fundedValue,
    });
  }

  const soldEquivalent = allocator.soldEquivalent(fundedValue, config.idoPrice, config.idoTokenDecimals);
  const balance = await ctx.metadata.balanceOf(ctx.pool, config.idoToken);

  if (balance <= soldEquivalent) {
    throw new IdoError("NoSpareTokens", "pool holds no sale tokens beyond those sold", {
      roundId: round.id,
      balance,
      soldEquivalent,
    });
  }

  const amount = balance - soldEquivalent;
  await ctx.journal.push(config.idoToken, to, amount);

  return { fundedValue, totalGoalValue, soldEquivalent, balance, amount };
}
