/**
 * In-process stand-ins for the chain, used by the test suites
 */

import { Keypair, PublicKey } from "@solana/web3.js";
import { IdoError, TokenTransferError } from "../core/errors";
import { Clock, TokenMetadataReader, TokenTransferGateway } from "../core/types";

export interface RecordedTransfer {
  direction: "pull" | "push";
  token: string;
  counterparty: string;
  amount: bigint;
}

interface FailureRule {
  direction: "pull" | "push";
  token?: string;
}

/**
 * Token balances per (holder, mint). Pulls move funds from a holder
 * into the pool, pushes from the pool to a holder.
 */
export class InMemoryTokenBank implements TokenTransferGateway, TokenMetadataReader {
  readonly pool: PublicKey;
  readonly transfers: RecordedTransfer[] = [];
  private balances: Map<string, bigint> = new Map();
  private tokenDecimals: Map<string, number> = new Map();
  private failures: FailureRule[] = [];

  constructor(pool: PublicKey = Keypair.generate().publicKey) {
    this.pool = pool;
  }

  private key(holder: PublicKey, token: PublicKey): string {
    return `${holder.toBase58()}:${token.toBase58()}`;
  }

  /**
   * Register a mint and return its address
   */
  createToken(decimals: number): PublicKey {
    const token = Keypair.generate().publicKey;
    this.tokenDecimals.set(token.toBase58(), decimals);
    return token;
  }

  mint(holder: PublicKey, token: PublicKey, amount: bigint): void {
    const key = this.key(holder, token);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  balance(holder: PublicKey, token: PublicKey): bigint {
    return this.balances.get(this.key(holder, token)) ?? 0n;
  }

  /**
   * Make the next matching transfer fail
   */
  failNext(direction: "pull" | "push", token?: PublicKey): void {
    this.failures.push({ direction, token: token?.toBase58() });
  }

  async decimals(token: PublicKey): Promise<number> {
    const decimals = this.tokenDecimals.get(token.toBase58());
    if (decimals === undefined) {
      throw new Error(`Unknown mint ${token.toBase58()}`);
    }
    return decimals;
  }

  async balanceOf(holder: PublicKey, token: PublicKey): Promise<bigint> {
    return this.balance(holder, token);
  }

  async pull(token: PublicKey, from: PublicKey, amount: bigint): Promise<void> {
    this.move("pull", token, from, this.pool, amount);
    this.transfers.push({ direction: "pull", token: token.toBase58(), counterparty: from.toBase58(), amount });
  }

  async push(token: PublicKey, to: PublicKey, amount: bigint): Promise<void> {
    this.move("push", token, this.pool, to, amount);
    this.transfers.push({ direction: "push", token: token.toBase58(), counterparty: to.toBase58(), amount });
  }

  private move(
    direction: "pull" | "push",
    token: PublicKey,
    from: PublicKey,
    to: PublicKey,
    amount: bigint
  ): void {
    const index = this.failures.findIndex(
      (f) => f.direction === direction && (f.token === undefined || f.token === token.toBase58())
    );
    if (index !== -1) {
      this.failures.splice(index, 1);
      throw new TokenTransferError(`injected ${direction} failure`, token.toBase58(), amount);
    }

    const available = this.balance(from, token);
    if (available < amount) {
      throw new TokenTransferError(
        `insufficient funds: ${available} < ${amount}`,
        token.toBase58(),
        amount
      );
    }
    this.balances.set(this.key(from, token), available - amount);
    this.mint(to, token, amount);
  }
}

/**
 * Clock the test moves by hand
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }
}

/**
 * The value a promise rejects with; fails when it resolves
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the operation to reject");
}

function codeFrom(error: unknown): string {
  if (error instanceof IdoError) return error.code;
  throw new Error(`expected an IdoError, got ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * IdoError code an async operation rejects with
 */
export async function rejectedCode(promise: Promise<unknown>): Promise<string> {
  return codeFrom(await rejectionOf(promise));
}

/**
 * IdoError code a synchronous call throws
 */
export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    return codeFrom(error);
  }
  throw new Error("expected the call to throw");
}
