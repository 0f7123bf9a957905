/**
 * Eligibility & Allocation Engine
 *
 * Participation checks (payment token, whitelist, secondary cap) run
 * cheap-first before the ledger is touched. The projection half is
 * read-only and advisory.
 */

import { PublicKey } from "@solana/web3.js";
import { allocator } from "./allocation-calculator";
import { IdoError } from "./errors";
import { fundedIn, PaymentKind } from "./funding-ledger";
import { MetaIdo, Round, RoundEligibility } from "./types";

/**
 * Validate a contribution request against the round's rules.
 * @returns which payment token the contribution uses
 */
export function validateContribution(
  round: Round,
  participant: PublicKey,
  token: PublicKey,
  amount: bigint
): PaymentKind {
  const kind = resolvePaymentToken(round, token);

  if (round.clock.hasWhitelist && !round.config.whitelist.has(participant.toBase58())) {
    throw new IdoError("NotWhitelisted", "participant is not whitelisted", {
      roundId: round.id,
      participant: participant.toBase58(),
    });
  }

  if (kind === "secondary") {
    const { config } = round;
    const fits = allocator.fitsSecondaryCap(
      fundedIn(config, config.primaryToken),
      fundedIn(config, config.secondaryToken),
      amount,
      config.idoSize,
      config.secondaryCapBps
    );
    if (!fits) {
      throw new IdoError("SecondaryCapExceeded", "contribution exceeds the secondary token cap", {
        roundId: round.id,
        amount,
        cap: allocator.secondaryCap(config.idoSize, config.secondaryCapBps),
      });
    }
  }

  return kind;
}

export function resolvePaymentToken(round: Round, token: PublicKey): PaymentKind {
  if (token.equals(round.config.primaryToken)) return "primary";
  if (token.equals(round.config.secondaryToken)) return "secondary";
  throw new IdoError("InvalidToken", "token is not accepted by this round", {
    roundId: round.id,
    token: token.toBase58(),
  });
}

/**
 * Project a participant's eligibility for one round.
 * `metaIdo` is the round's parent group, if any.
 */
export function projectEligibility(
  round: Round,
  metaIdo: MetaIdo | null,
  participant: PublicKey
): RoundEligibility {
  const key = participant.toBase58();
  const rank = metaIdo?.ranks.get(key) ?? 0;
  const multiplier = metaIdo?.multipliers.get(key) ?? 0n;
  const { eligible, maxAllocation } = allocator.evaluateSpec(round.config.spec, rank, multiplier);

  return {
    roundId: round.id,
    metaIdoId: metaIdo?.id ?? null,
    isRegistered: metaIdo?.registered.has(key) ?? false,
    rank,
    multiplier,
    eligible,
    maxAllocation,
  };
}
