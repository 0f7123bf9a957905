#!/usr/bin/env node
/**
 * IDO Venue CLI
 *
 * Operator entry point: loads the persisted venue, runs one command,
 * records the resulting events and saves the new state.
 * Usage: ido-venue <command> [args] [options]
 */

import { Connection, PublicKey } from "@solana/web3.js";
import * as fs from "fs";
import { z } from "zod";
import { isIdoError, TransferRollbackError } from "./core/errors";
import { OwnerGate } from "./core/owner-gate";
import { CreateRoundParams } from "./core/types";
import { RoundManager } from "./managers/round-manager";
import { SplTokenGateway } from "./network/spl-token-gateway";
import { loadKeypair } from "./network/wallet";
import { loadEnvFiles, logConfig, resolveRpcUrl, validateVenueEnv, VenueEnv } from "./utils/env-validator";
import { HistoryManager } from "./utils/history-manager";
import { createLogger, isLogLevel, logReplacer, setGlobalLogLevel } from "./utils/logger";
import { loadState, saveState, serializeRound } from "./utils/state-persistence";

const log = createLogger("cli");

export const COMMANDS = [
  "status",
  "create-round",
  "finalize",
  "participate",
  "claim",
  "withdraw-spare",
  "eligibility",
] as const;

export type Command = (typeof COMMANDS)[number];

const READ_ONLY: ReadonlySet<Command> = new Set<Command>(["status", "eligibility"]);

export interface CliArgs {
  command?: Command;
  positionals: string[];
  network?: VenueEnv["IDO_NETWORK"];
  rpcUrl?: string;
  stateFile?: string;
  historyDir?: string;
  keypairPath?: string;
  caller?: string;
  logLevel?: string;
  restoreBackup: boolean;
  verbose: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { positionals: [], restoreBackup: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--network":
      case "-n":
        if (next === "devnet" || next === "mainnet" || next === "localnet") {
          result.network = next;
        } else {
          throw new Error(`Unknown network: ${next ?? "(missing)"}`);
        }
        i++;
        break;
      case "--rpc":
        result.rpcUrl = next;
        i++;
        break;
      case "--state-file":
        result.stateFile = next;
        i++;
        break;
      case "--history-dir":
        result.historyDir = next;
        i++;
        break;
      case "--keypair":
      case "-k":
        result.keypairPath = next;
        i++;
        break;
      case "--caller":
        result.caller = next;
        i++;
        break;
      case "--log-level":
        result.logLevel = next;
        i++;
        break;
      case "--restore-backup":
        result.restoreBackup = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (!result.command) {
          if (!isCommand(arg)) {
            throw new Error(`Unknown command: ${arg}`);
          }
          result.command = arg;
        } else {
          result.positionals.push(arg);
        }
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
IDO Venue - token sale rounds on SPL tokens

Usage: ido-venue <command> [args] [options]

Commands:
  status [roundId]                       Venue summary, or one round
  create-round <file.json>               Create a round from a parameter file
  finalize <roundId>                     Freeze size and raised value
  participate <roundId> <mint> <amount>  Contribute as --caller (base units)
  claim <roundId> <participant>          Settle a participant's position
  withdraw-spare <roundId>               Recover unsold sale tokens to the owner
  eligibility <participant> <roundId...> Advisory eligibility per round

Options:
  --network, -n     devnet | mainnet | localnet (default: devnet)
  --rpc             RPC endpoint
  --state-file      State persistence file (default: .ido-venue-state.json)
  --history-dir     Audit chain directory (default: ./data/history)
  --keypair, -k     Pool authority keypair file
  --restore-backup  Load the newest valid state backup instead of the current file
  --caller          Acting public key (default: venue owner)
  --log-level       debug | info | warn | error
  --verbose, -v     Same as --log-level debug
  --help, -h        Show this help message

Environment Variables:
  IDO_NETWORK, RPC_URL, OWNER_PUBKEY, TREASURY_PUBKEY,
  POOL_KEYPAIR_PATH, STATE_FILE, HISTORY_DIR, LOG_LEVEL
`);
}

// ============================================================================
// Argument helpers
// ============================================================================

export function parseAmount(value: string | undefined, label: string): bigint {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`${label} must be a non-negative integer, got ${value ?? "(missing)"}`);
  }
  return BigInt(value);
}

export function parseId(value: string | undefined, label: string): number {
  const id = value === undefined ? NaN : Number(value);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new Error(`${label} must be a positive integer, got ${value ?? "(missing)"}`);
  }
  return id;
}

export function parseKey(value: string | undefined, label: string): PublicKey {
  if (value === undefined) {
    throw new Error(`${label} is required`);
  }
  try {
    return new PublicKey(value);
  } catch (error) {
    throw new Error(`${label} is not a valid public key: ${value}`, { cause: error });
  }
}

const RoundFileSchema = z.object({
  idoToken: z.string(),
  primaryToken: z.string(),
  secondaryToken: z.string(),
  idoPrice: z.union([z.string(), z.number().int()]),
  idoSize: z.union([z.string(), z.number().int()]),
  minimumFundingGoal: z.union([z.string(), z.number().int()]),
  secondaryCapBps: z.number().int(),
  startTime: z.number().int(),
  endTime: z.number().int(),
  claimableTime: z.number().int(),
  hasWhitelist: z.boolean().default(false),
});

/**
 * Round parameters from a JSON document. Amounts may be strings to
 * carry values beyond 2^53.
 */
export function parseRoundFile(raw: unknown): CreateRoundParams {
  const result = RoundFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid round file: ${issues}`);
  }
  const file = result.data;
  return {
    idoToken: parseKey(file.idoToken, "idoToken"),
    primaryToken: parseKey(file.primaryToken, "primaryToken"),
    secondaryToken: parseKey(file.secondaryToken, "secondaryToken"),
    idoPrice: parseAmount(String(file.idoPrice), "idoPrice"),
    idoSize: parseAmount(String(file.idoSize), "idoSize"),
    minimumFundingGoal: parseAmount(String(file.minimumFundingGoal), "minimumFundingGoal"),
    secondaryCapBps: file.secondaryCapBps,
    startTime: file.startTime,
    endTime: file.endTime,
    claimableTime: file.claimableTime,
    hasWhitelist: file.hasWhitelist,
  };
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, logReplacer, 2));
}

// ============================================================================
// Commands
// ============================================================================

interface CommandContext {
  manager: RoundManager;
  owner: OwnerGate;
  caller: PublicKey;
  network: VenueEnv["IDO_NETWORK"];
  pool: PublicKey;
}

export async function runCommand(command: Command, positionals: string[], ctx: CommandContext): Promise<unknown> {
  const { manager, caller } = ctx;
  const [first, second, third] = positionals;

  switch (command) {
    case "status": {
      if (first !== undefined) {
        return serializeRound(manager.getRound(parseId(first, "roundId")));
      }
      return {
        network: ctx.network,
        owner: ctx.owner.getOwner().toBase58(),
        pendingOwner: ctx.owner.getPendingOwner()?.toBase58() ?? null,
        pool: ctx.pool.toBase58(),
        rounds: manager.getRoundCount(),
        metaIdos: manager.getMetaIdoCount(),
      };
    }
    case "create-round": {
      if (first === undefined) throw new Error("create-round needs a parameter file");
      const params = parseRoundFile(JSON.parse(fs.readFileSync(first, "utf-8")));
      return { roundId: await manager.createRound(caller, params) };
    }
    case "finalize": {
      const roundId = parseId(first, "roundId");
      await manager.finalizeRound(caller, roundId);
      return manager.getSettlementSummary(roundId);
    }
    case "participate": {
      const allocation = await manager.participate(
        caller,
        parseId(first, "roundId"),
        parseKey(second, "mint"),
        parseAmount(third, "amount")
      );
      return { allocation };
    }
    case "claim":
      return manager.claim(parseId(first, "roundId"), parseKey(second, "participant"));
    case "withdraw-spare":
      return { amount: await manager.withdrawSpareTokens(caller, parseId(first, "roundId")) };
    case "eligibility": {
      const participant = parseKey(first, "participant");
      const roundIds = positionals.slice(1).map((id) => parseId(id, "roundId"));
      if (roundIds.length === 0) throw new Error("eligibility needs at least one roundId");
      return manager.getEligibility(participant, roundIds);
    }
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    printHelp();
    process.exit(args.help ? 0 : 1);
  }
  const command = args.command;

  loadEnvFiles();
  const env = validateVenueEnv();

  const level = args.verbose ? "debug" : args.logLevel ?? env.LOG_LEVEL;
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level: ${level}`);
  }
  setGlobalLogLevel(level);
  logConfig(env, log);

  const network = args.network ?? env.IDO_NETWORK;
  const keypairPath = args.keypairPath ?? env.POOL_KEYPAIR_PATH;
  if (!keypairPath) {
    throw new Error("Pool keypair required: set POOL_KEYPAIR_PATH or pass --keypair");
  }
  const pool = loadKeypair(keypairPath);
  const stateFile = args.stateFile ?? env.STATE_FILE;

  const connection = new Connection(args.rpcUrl ?? resolveRpcUrl(env), "confirmed");
  const gateway = new SplTokenGateway(connection, pool);

  const loaded = await loadState(stateFile, { restoreBackup: args.restoreBackup });
  const configuredOwner = env.OWNER_PUBKEY ? new PublicKey(env.OWNER_PUBKEY) : pool.publicKey;
  const owner = new OwnerGate(loaded?.owner ?? configuredOwner, loaded?.pendingOwner ?? null);
  const treasury = env.TREASURY_PUBKEY ? new PublicKey(env.TREASURY_PUBKEY) : owner.getOwner();

  const manager = new RoundManager({
    owner,
    transfers: gateway,
    metadata: gateway,
    pool: gateway.poolAddress,
    treasury,
    state: loaded?.venue,
  });

  const history = new HistoryManager({ dataDir: args.historyDir ?? env.HISTORY_DIR });
  await history.initialize();
  history.attach(manager.events);
  await history.recordVenueStart({ command, network });

  const caller = args.caller ? parseKey(args.caller, "--caller") : owner.getOwner();

  const persist = () =>
    saveState(stateFile, {
      network,
      owner: owner.getOwner(),
      pendingOwner: owner.getPendingOwner(),
      venue: manager.exportState(),
    });

  try {
    const result = await runCommand(command, args.positionals, {
      manager,
      owner,
      caller,
      network,
      pool: gateway.poolAddress,
    });
    await history.flush();

    if (!READ_ONLY.has(command)) {
      await persist();
    }
    print(result);
  } catch (error) {
    await history.flush();
    // Funds moved and could not be moved back: the ledger records that
    if (error instanceof TransferRollbackError) {
      await persist();
    }
    await history.recordError(`${command} failed`, {
      code: isIdoError(error) ? error.code : undefined,
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    await history.recordVenueStop({ command });
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
