/**
 * Transfer Journal
 *
 * Records the transfers an operation has completed so a failure later
 * in the same operation can reverse them, newest first. A pull is
 * reversed by a push back to its source and a push by a pull from its
 * recipient.
 */

import { PublicKey } from "@solana/web3.js";
import { TransferRollbackError } from "./errors";
import { TokenTransferGateway } from "./types";
import { createLogger } from "../utils/logger";

const log = createLogger("journal");

export interface TransferLeg {
  direction: "pull" | "push";
  token: PublicKey;
  counterparty: PublicKey;
  amount: bigint;
}

export class TransferJournal {
  private completed: TransferLeg[] = [];

  constructor(private readonly gateway: TokenTransferGateway) {}

  async pull(token: PublicKey, from: PublicKey, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    await this.gateway.pull(token, from, amount);
    this.completed.push({ direction: "pull", token, counterparty: from, amount });
  }

  async push(token: PublicKey, to: PublicKey, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    await this.gateway.push(token, to, amount);
    this.completed.push({ direction: "push", token, counterparty: to, amount });
  }

  legs(): TransferLeg[] {
    return [...this.completed];
  }

  /**
   * Reverse every completed leg. Throws TransferRollbackError carrying
   * `cause` when a reversal fails; the remaining legs are not attempted.
   */
  async rollback(cause: unknown): Promise<void> {
    while (this.completed.length > 0) {
      const leg = this.completed[this.completed.length - 1];
      const reversal = leg.direction === "pull" ? "push" : "pull";
      try {
        if (reversal === "push") {
          await this.gateway.push(leg.token, leg.counterparty, leg.amount);
        } else {
          await this.gateway.pull(leg.token, leg.counterparty, leg.amount);
        }
      } catch (error) {
        log.error("Transfer compensation failed", {
          direction: reversal,
          reverses: leg.direction,
          unreversed: this.completed.length,
          token: leg.token,
          counterparty: leg.counterparty,
          amount: leg.amount,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new TransferRollbackError(cause, error);
      }
      this.completed.pop();
      log.warn("Transfer compensated", {
        direction: leg.direction,
        token: leg.token,
        amount: leg.amount,
      });
    }
  }
}
