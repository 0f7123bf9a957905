/**
 * IDO Venue - Allocation Calculator
 *
 * Fixed-point arithmetic for the funding ledger and settlement.
 * Every division truncates toward zero (bigint semantics); dust left by
 * truncation is never redistributed.
 *
 * Key formulas:
 * - Allocation:    amount * 10^decimals / price
 * - Secondary cap: idoSize * capBps / 10_000
 * - Max alloc:     maxAlloc * rankMultiplier * specMultiplier / 1e8
 * - Goal value:    idoSize * price / 10^decimals
 * - Sold tokens:   fundedValue / price * 10^decimals
 */

import { BPS_DENOMINATOR, MULTIPLIER_SCALE } from "./constants";
import { RoundSpec } from "./types";

export interface SpecEvaluation {
  eligible: boolean;
  /** null when no spec restricts the round */
  maxAllocation: bigint | null;
}

export class AllocationCalculator {
  /**
   * 10^decimals as bigint
   */
  scale(decimals: number): bigint {
    return 10n ** BigInt(decimals);
  }

  /**
   * Sale tokens bought by `amount` payment units at `price`
   *
   * @param amount - Payment amount in raw units
   * @param decimals - Sale token decimals, snapshotted at round creation
   * @param price - Payment units per whole sale token
   */
  tokenAllocation(amount: bigint, decimals: number, price: bigint): bigint {
    return (amount * this.scale(decimals)) / price;
  }

  /**
   * Ceiling on total funding once the secondary token is involved
   */
  secondaryCap(idoSize: bigint, capBps: number): bigint {
    return (idoSize * BigInt(capBps)) / BPS_DENOMINATOR;
  }

  /**
   * Whether a secondary-token contribution of `amount` keeps the round
   * within its cap. The projected total spans both payment tokens.
   */
  fitsSecondaryCap(
    primaryFunded: bigint,
    secondaryFunded: bigint,
    amount: bigint,
    idoSize: bigint,
    capBps: number
  ): boolean {
    const projectedGlobalTotal = primaryFunded + secondaryFunded + amount;
    return projectedGlobalTotal <= this.secondaryCap(idoSize, capBps);
  }

  /**
   * Evaluate a round spec for a participant's MetaIDO rank and multiplier
   */
  evaluateSpec(spec: RoundSpec | null, rank: number, rankMultiplier: bigint): SpecEvaluation {
    if (!spec) {
      return { eligible: true, maxAllocation: null };
    }

    const eligible = spec.noRank || (rank >= spec.minRank && rank <= spec.maxRank);
    const maxAllocation = spec.noMultiplier
      ? spec.maxAlloc
      : (spec.maxAlloc * rankMultiplier * spec.maxAllocMultiplier) / MULTIPLIER_SCALE;

    return { eligible, maxAllocation };
  }

  /**
   * Value of the full nominal sale, in payment units
   */
  totalGoalValue(idoSize: bigint, price: bigint, decimals: number): bigint {
    return (idoSize * price) / this.scale(decimals);
  }

  /**
   * Sale tokens matching `fundedValue` payment units.
   * Divides before scaling, so remainder below one price unit is dropped.
   */
  soldEquivalent(fundedValue: bigint, price: bigint, decimals: number): bigint {
    return (fundedValue / price) * this.scale(decimals);
  }

  /**
   * Human-readable amount for logs: 1500000 @ 6 decimals → "1.5"
   */
  formatUnits(amount: bigint, decimals: number): string {
    const negative = amount < 0n;
    const abs = negative ? -amount : amount;
    const base = this.scale(decimals);
    const whole = abs / base;
    const fraction = (abs % base).toString().padStart(decimals, "0").replace(/0+$/, "");
    const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
    return negative ? `-${text}` : text;
  }
}

// Export singleton for convenience
export const allocator = new AllocationCalculator();
