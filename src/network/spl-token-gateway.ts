/**
 * SPL Token Gateway
 *
 * Moves and reads SPL token balances for the venue. The pool keypair
 * owns the custody accounts and signs every transfer:
 * - push: pool ATA → recipient ATA (created on demand, pool pays rent)
 * - pull: participant ATA → pool ATA, spending an allowance the
 *   participant delegated to the pool beforehand
 */

import { Commitment, Connection, Keypair, PublicKey } from "@solana/web3.js";
import {
  getAccount,
  getAssociatedTokenAddressSync,
  getMint,
  getOrCreateAssociatedTokenAccount,
  TokenAccountNotFoundError,
  transferChecked,
} from "@solana/spl-token";
import { TokenTransferError } from "../core/errors";
import { TokenMetadataReader, TokenTransferGateway } from "../core/types";
import { createLogger } from "../utils/logger";
import { RetryConfig, withRetryAndTimeout } from "./rpc-utils";

const log = createLogger("spl");

export interface SplTokenGatewayOptions {
  commitment?: Commitment;
  retry?: Partial<RetryConfig>;
}

export class SplTokenGateway implements TokenTransferGateway, TokenMetadataReader {
  private decimalsCache: Map<string, number> = new Map();
  private commitment: Commitment;
  private retry: Partial<RetryConfig>;

  constructor(
    private readonly connection: Connection,
    private readonly pool: Keypair,
    options: SplTokenGatewayOptions = {}
  ) {
    this.commitment = options.commitment ?? "confirmed";
    this.retry = options.retry ?? {};
  }

  get poolAddress(): PublicKey {
    return this.pool.publicKey;
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetryAndTimeout(fn, this.retry, undefined, (attempt, error, delayMs) => {
      log.warn(`${label} retry ${attempt}`, { error: error.message, delayMs: Math.round(delayMs) });
    });
  }

  async decimals(token: PublicKey): Promise<number> {
    const key = token.toBase58();
    const cached = this.decimalsCache.get(key);
    if (cached !== undefined) return cached;

    const mint = await this.read("getMint", () => getMint(this.connection, token, this.commitment));
    this.decimalsCache.set(key, mint.decimals);
    return mint.decimals;
  }

  /**
   * Balance of the holder's associated token account; 0 when it does not exist
   */
  async balanceOf(holder: PublicKey, token: PublicKey): Promise<bigint> {
    const ata = getAssociatedTokenAddressSync(token, holder, true);
    try {
      const account = await this.read("getAccount", () => getAccount(this.connection, ata, this.commitment));
      return account.amount;
    } catch (error) {
      if (error instanceof TokenAccountNotFoundError) {
        return 0n;
      }
      throw error;
    }
  }

  async pull(token: PublicKey, from: PublicKey, amount: bigint): Promise<void> {
    await this.transfer("pull", token, from, amount, async (decimals) => {
      const source = getAssociatedTokenAddressSync(token, from, true);
      const destination = await this.ensureAta(token, this.pool.publicKey);
      return transferChecked(
        this.connection,
        this.pool,
        source,
        token,
        destination,
        this.pool,
        amount,
        decimals,
        [],
        { commitment: this.commitment }
      );
    });
  }

  async push(token: PublicKey, to: PublicKey, amount: bigint): Promise<void> {
    await this.transfer("push", token, to, amount, async (decimals) => {
      const source = getAssociatedTokenAddressSync(token, this.pool.publicKey, true);
      const destination = await this.ensureAta(token, to);
      return transferChecked(
        this.connection,
        this.pool,
        source,
        token,
        destination,
        this.pool,
        amount,
        decimals,
        [],
        { commitment: this.commitment }
      );
    });
  }

  private async ensureAta(token: PublicKey, owner: PublicKey): Promise<PublicKey> {
    const account = await getOrCreateAssociatedTokenAccount(
      this.connection,
      this.pool,
      token,
      owner,
      true,
      this.commitment
    );
    return account.address;
  }

  private async transfer(
    direction: "pull" | "push",
    token: PublicKey,
    counterparty: PublicKey,
    amount: bigint,
    send: (decimals: number) => Promise<string>
  ): Promise<void> {
    try {
      const decimals = await this.decimals(token);
      const signature = await send(decimals);
      log.info(`Transfer ${direction} confirmed`, { token, counterparty, amount, signature });
    } catch (error) {
      throw new TokenTransferError(
        `${direction} of ${amount} failed: ${error instanceof Error ? error.message : String(error)}`,
        token.toBase58(),
        amount,
        { cause: error }
      );
    }
  }
}
