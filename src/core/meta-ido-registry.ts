/**
 * MetaIDO Registry
 *
 * Groups rounds under a shared participant rank/multiplier table.
 * IDs start at 1 and are never reused.
 */

import { PublicKey } from "@solana/web3.js";
import { FIRST_ID } from "./constants";
import { IdoError } from "./errors";
import { MetaIdo, RankEntry } from "./types";

export class MetaIdoRegistry {
  private entries: Map<number, MetaIdo> = new Map();
  private nextId: number;

  constructor(entries: MetaIdo[] = [], nextId: number = FIRST_ID) {
    for (const entry of entries) {
      this.entries.set(entry.id, entry);
    }
    this.nextId = nextId;
  }

  create(): MetaIdo {
    const metaIdo: MetaIdo = {
      id: this.nextId,
      roundIds: [],
      registered: new Set(),
      ranks: new Map(),
      multipliers: new Map(),
    };
    this.entries.set(metaIdo.id, metaIdo);
    this.nextId++;
    return metaIdo;
  }

  get(id: number): MetaIdo {
    const metaIdo = this.entries.get(id);
    if (!metaIdo) {
      throw new IdoError("MetaIDONotFound", `MetaIDO ${id} does not exist`, { metaIdoId: id });
    }
    return metaIdo;
  }

  find(id: number | null): MetaIdo | null {
    if (id === null) return null;
    return this.entries.get(id) ?? null;
  }

  addRound(metaIdo: MetaIdo, roundId: number): void {
    metaIdo.roundIds.push(roundId);
  }

  /**
   * Linear search, then swap with the last element and pop.
   * Membership order carries no meaning.
   */
  removeRound(metaIdo: MetaIdo, roundId: number): void {
    const index = metaIdo.roundIds.indexOf(roundId);
    if (index === -1) {
      throw new IdoError("RoundNotInMetaIDO", `round ${roundId} is not in MetaIDO ${metaIdo.id}`, {
        metaIdoId: metaIdo.id,
        roundId,
      });
    }
    const last = metaIdo.roundIds.length - 1;
    metaIdo.roundIds[index] = metaIdo.roundIds[last];
    metaIdo.roundIds.pop();
  }

  register(metaIdo: MetaIdo, participant: PublicKey): boolean {
    const key = participant.toBase58();
    if (metaIdo.registered.has(key)) return false;
    metaIdo.registered.add(key);
    return true;
  }

  setRanks(metaIdo: MetaIdo, entries: RankEntry[]): void {
    if (entries.length === 0) {
      throw new IdoError("EmptyAddressList", "no rank entries given", { metaIdoId: metaIdo.id });
    }
    for (const entry of entries) {
      if (!Number.isSafeInteger(entry.rank) || entry.rank < 0 || entry.multiplier < 0n) {
        throw new IdoError("InvalidParameter", "rank and multiplier must be non-negative", {
          participant: entry.participant.toBase58(),
          rank: entry.rank,
          multiplier: entry.multiplier,
        });
      }
    }
    for (const entry of entries) {
      const key = entry.participant.toBase58();
      metaIdo.ranks.set(key, entry.rank);
      metaIdo.multipliers.set(key, entry.multiplier);
    }
  }

  all(): MetaIdo[] {
    return Array.from(this.entries.values());
  }

  count(): number {
    return this.entries.size;
  }

  peekNextId(): number {
    return this.nextId;
  }
}
