/**
 * Owner Gate
 *
 * Authorizes privileged venue operations. Ownership moves in two
 * steps: the owner proposes, the proposed key accepts.
 */

import { PublicKey } from "@solana/web3.js";
import { IdoError } from "./errors";
import { createLogger } from "../utils/logger";

const log = createLogger("owner");

export class OwnerGate {
  private owner: PublicKey;
  private pendingOwner: PublicKey | null;

  constructor(owner: PublicKey, pendingOwner: PublicKey | null = null) {
    this.owner = owner;
    this.pendingOwner = pendingOwner;
  }

  assertOwner(caller: PublicKey): void {
    if (!caller.equals(this.owner)) {
      throw new IdoError("Unauthorized", "caller is not the venue owner", {
        caller: caller.toBase58(),
      });
    }
  }

  proposeOwner(caller: PublicKey, next: PublicKey): void {
    this.assertOwner(caller);
    this.pendingOwner = next;
    log.info("Ownership transfer proposed", { owner: this.owner, pendingOwner: next });
  }

  acceptOwnership(caller: PublicKey): void {
    if (!this.pendingOwner || !caller.equals(this.pendingOwner)) {
      throw new IdoError("Unauthorized", "caller is not the pending owner", {
        caller: caller.toBase58(),
      });
    }
    log.info("Ownership transferred", { from: this.owner, to: caller });
    this.owner = caller;
    this.pendingOwner = null;
  }

  getOwner(): PublicKey {
    return this.owner;
  }

  getPendingOwner(): PublicKey | null {
    return this.pendingOwner;
  }
}
