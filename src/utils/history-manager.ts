/**
 * Venue History Chain
 *
 * Append-only audit trail of committed venue events. Each entry links
 * to the previous one via SHA-256, so a retroactive edit breaks every
 * hash after it.
 *
 * Structure:
 * Genesis → Entry1 → Entry2 → ... → EntryN
 *   ↓         ↓         ↓           ↓
 * hash0   hash1     hash2       hashN
 *           ↑         ↑           ↑
 *        prevHash  prevHash   prevHash
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { z } from "zod";
import { DEFAULT_HISTORY_DIR } from "../core/constants";
import { VenueEventName, VenueEventPayload, VenueEvents, VENUE_EVENT_NAMES } from "../core/events";
import { createLogger, Logger, logReplacer } from "./logger";

export const GENESIS_HASH = "0000000000000000000000000000000000000000000000000000000000000000";

export type EventType = VenueEventName | "venue_start" | "venue_stop" | "error";

const EVENT_TYPES: readonly EventType[] = [...VENUE_EVENT_NAMES, "venue_start", "venue_stop", "error"];

const HistoryEntrySchema = z.object({
  sequence: z.number().int().positive(),
  prevHash: z.string().length(64),
  hash: z.string().length(64),
  timestamp: z.number(),
  event: z.string().refine((v): v is EventType => EVENT_TYPES.some((t) => t === v), {
    message: "unknown event type",
  }),
  data: z.record(z.unknown()),
});

const ChainMetadataSchema = z.object({
  version: z.number().int(),
  createdAt: z.number(),
  lastUpdated: z.number(),
  totalEntries: z.number().int().nonnegative(),
  latestHash: z.string().length(64),
  eventCounts: z.record(z.number().int().nonnegative()),
});

export interface HistoryEntry {
  sequence: number;
  prevHash: string;
  hash: string;
  timestamp: number;
  event: EventType;
  data: Record<string, unknown>;
}

export type ChainMetadata = z.infer<typeof ChainMetadataSchema>;

export interface ValidationResult {
  valid: boolean;
  entriesChecked: number;
  corruptionIndex?: number;
  corruptionDetails?: string;
}

export interface HistoryManagerConfig {
  dataDir?: string;
  historyFile?: string;
  metadataFile?: string;
  maxEntriesInMemory?: number;
  /** Timestamp source, milliseconds */
  now?: () => number;
}

/**
 * Bigints and keys become strings so that hashing the in-memory entry
 * and hashing the parsed line give the same digest.
 */
function toJsonRecord(data: object): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(JSON.parse(JSON.stringify(data, logReplacer)));
  return parsed.success ? parsed.data : {};
}

function parseEntry(line: string, lineNumber: number): HistoryEntry {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new Error(`Failed to parse entry at line ${lineNumber}`, { cause: error });
  }
  const result = HistoryEntrySchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Malformed entry at line ${lineNumber}: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}

export class HistoryManager {
  private dataDir: string;
  private historyFile: string;
  private metadataFile: string;
  private metadata: ChainMetadata;
  private recentEntries: HistoryEntry[] = [];
  private maxEntriesInMemory: number;
  private now: () => number;
  private logger: Logger;
  private initialized = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(config: HistoryManagerConfig = {}) {
    this.dataDir = config.dataDir ?? DEFAULT_HISTORY_DIR;
    this.historyFile = config.historyFile ?? path.join(this.dataDir, "chain.jsonl");
    this.metadataFile = config.metadataFile ?? path.join(this.dataDir, "metadata.json");
    this.maxEntriesInMemory = config.maxEntriesInMemory ?? 1000;
    this.now = config.now ?? Date.now;
    this.logger = createLogger("history");

    const createdAt = this.now();
    this.metadata = {
      version: 1,
      createdAt,
      lastUpdated: createdAt,
      totalEntries: 0,
      latestHash: GENESIS_HASH,
      eventCounts: {},
    };
  }

  /**
   * Create the data directory, load the existing chain and verify it
   */
  async initialize(): Promise<void> {
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
      this.logger.info(`Created history directory: ${this.dataDir}`);
    }

    if (fs.existsSync(this.metadataFile)) {
      const parsed = ChainMetadataSchema.safeParse(JSON.parse(fs.readFileSync(this.metadataFile, "utf-8")));
      if (parsed.success) {
        this.metadata = parsed.data;
        this.logger.info(`Loaded metadata: ${this.metadata.totalEntries} entries`);
      } else {
        this.logger.warn("Invalid metadata, rebuilding from chain", {
          issue: parsed.error.issues[0]?.message,
        });
      }
    }

    const entries = this.readAllEntries();
    this.recentEntries = entries.slice(-this.maxEntriesInMemory);

    const validation = this.validateEntries(entries);
    if (!validation.valid) {
      this.logger.error("Chain corruption detected!", {
        index: validation.corruptionIndex,
        details: validation.corruptionDetails,
      });
      throw new Error(`Chain corruption at entry ${validation.corruptionIndex}`);
    }

    const last = entries[entries.length - 1];
    if (last && (last.sequence !== this.metadata.totalEntries || last.hash !== this.metadata.latestHash)) {
      this.logger.warn("Metadata behind chain, resyncing", {
        metadataEntries: this.metadata.totalEntries,
        chainEntries: last.sequence,
      });
      this.metadata.totalEntries = last.sequence;
      this.metadata.latestHash = last.hash;
      this.metadata.lastUpdated = last.timestamp;
      this.metadata.eventCounts = {};
      for (const entry of entries) {
        this.metadata.eventCounts[entry.event] = (this.metadata.eventCounts[entry.event] ?? 0) + 1;
      }
      this.writeMetadata();
    }

    this.initialized = true;
    this.logger.info("History manager initialized", { entries: entries.length });
  }

  private computeEntryHash(entry: Omit<HistoryEntry, "hash">): string {
    const data = JSON.stringify({
      sequence: entry.sequence,
      prevHash: entry.prevHash,
      timestamp: entry.timestamp,
      event: entry.event,
      data: entry.data,
    });
    return crypto.createHash("sha256").update(data).digest("hex");
  }

  private writeMetadata(): void {
    fs.writeFileSync(this.metadataFile, JSON.stringify(this.metadata, null, 2));
  }

  /**
   * Append a new entry to the chain
   */
  async append(event: EventType, data: object): Promise<HistoryEntry> {
    if (!this.initialized) {
      throw new Error("HistoryManager not initialized. Call initialize() first.");
    }

    const entry: Omit<HistoryEntry, "hash"> = {
      sequence: this.metadata.totalEntries + 1,
      prevHash: this.metadata.latestHash,
      timestamp: this.now(),
      event,
      data: toJsonRecord(data),
    };
    const fullEntry: HistoryEntry = { ...entry, hash: this.computeEntryHash(entry) };

    fs.appendFileSync(this.historyFile, JSON.stringify(fullEntry) + "\n");

    this.metadata.totalEntries = fullEntry.sequence;
    this.metadata.latestHash = fullEntry.hash;
    this.metadata.lastUpdated = fullEntry.timestamp;
    this.metadata.eventCounts[event] = (this.metadata.eventCounts[event] ?? 0) + 1;
    this.writeMetadata();

    this.recentEntries.push(fullEntry);
    if (this.recentEntries.length > this.maxEntriesInMemory) {
      this.recentEntries.shift();
    }

    this.logger.debug(`Appended entry #${fullEntry.sequence}`, { event, hash: fullEntry.hash.slice(0, 12) });
    return fullEntry;
  }

  /**
   * Record every committed venue event, in publication order.
   * @returns a function that stops recording
   */
  attach(events: VenueEvents): () => void {
    return events.onAny((name, payload) => this.enqueue(name, payload));
  }

  private enqueue(name: VenueEventName, payload: VenueEventPayload): void {
    this.pending = this.pending
      .then(() => this.append(name, payload))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error("Failed to record event", {
            event: name,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      );
  }

  /**
   * Resolve once every event received so far is written
   */
  async flush(): Promise<void> {
    await this.pending;
  }

  private readAllEntries(): HistoryEntry[] {
    if (!fs.existsSync(this.historyFile)) {
      return [];
    }
    const content = fs.readFileSync(this.historyFile, "utf-8");
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line, i) => parseEntry(line, i + 1));
  }

  private validateEntries(entries: HistoryEntry[]): ValidationResult {
    let prevHash = GENESIS_HASH;

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];

      if (entry.prevHash !== prevHash) {
        return {
          valid: false,
          entriesChecked: i,
          corruptionIndex: entry.sequence,
          corruptionDetails: `prevHash mismatch at entry ${entry.sequence}`,
        };
      }

      const { hash, ...entryWithoutHash } = entry;
      const computedHash = this.computeEntryHash(entryWithoutHash);
      if (hash !== computedHash) {
        return {
          valid: false,
          entriesChecked: i,
          corruptionIndex: entry.sequence,
          corruptionDetails: `Hash mismatch at entry ${entry.sequence}: expected ${computedHash.slice(0, 12)}..., got ${hash.slice(0, 12)}...`,
        };
      }

      prevHash = entry.hash;
    }

    return { valid: true, entriesChecked: entries.length };
  }

  /**
   * Verify hash linkage of the whole chain file
   */
  async validateChain(): Promise<ValidationResult> {
    return this.validateEntries(this.readAllEntries());
  }

  getRecentEntries(count?: number): HistoryEntry[] {
    if (!count) return [...this.recentEntries];
    return this.recentEntries.slice(-count);
  }

  getEntriesByType(eventType: EventType, count = 100): HistoryEntry[] {
    return this.recentEntries.filter((e) => e.event === eventType).slice(-count);
  }

  /**
   * Entries that mention a round
   */
  getEntriesForRound(roundId: number, count = 100): HistoryEntry[] {
    return this.recentEntries.filter((e) => e.data.roundId === roundId).slice(-count);
  }

  getMetadata(): ChainMetadata {
    return { ...this.metadata, eventCounts: { ...this.metadata.eventCounts } };
  }

  async recordVenueStart(details: Record<string, unknown> = {}): Promise<HistoryEntry> {
    return this.append("venue_start", { message: "Venue started", pid: process.pid, ...details });
  }

  async recordVenueStop(details: Record<string, unknown> = {}): Promise<HistoryEntry> {
    return this.append("venue_stop", { message: "Venue stopped", pid: process.pid, ...details });
  }

  async recordError(message: string, details?: Record<string, unknown>): Promise<HistoryEntry> {
    return this.append("error", { message, details });
  }
}
