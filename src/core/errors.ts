/**
 * IDO Venue Error Taxonomy
 *
 * Every guard in the venue either passes or throws an IdoError whose
 * `code` names the exact reason. Collaborator failures are reported as
 * TokenTransferError; a failed compensation as TransferRollbackError.
 */

export type ErrorCategory =
  | "window"
  | "state"
  | "validation"
  | "authorization"
  | "ledger"
  | "lookup";

const ERROR_CATEGORIES = {
  // Window
  NotStarted: "window",
  NotClaimable: "window",
  IDONotEnded: "window",
  WindowClosed: "window",

  // State
  AlreadyFinalized: "state",
  NotFinalized: "state",
  WhitelistNotEnabled: "state",
  WhitelistAlreadyEnabled: "state",

  // Validation
  InvalidToken: "validation",
  InvalidWindow: "validation",
  InvalidDelay: "validation",
  InvalidBasisPoints: "validation",
  InvalidAmount: "validation",
  InvalidParameter: "validation",
  EmptyAddressList: "validation",

  // Authorization
  Unauthorized: "authorization",
  NotWhitelisted: "authorization",

  // Ledger
  NoPosition: "ledger",
  SecondaryCapExceeded: "ledger",
  FundingGoalNotReached: "ledger",
  FundingGoalReached: "ledger",
  NoSpareTokens: "ledger",

  // Lookup
  RoundNotFound: "lookup",
  MetaIDONotFound: "lookup",
  RoundNotInMetaIDO: "lookup",
  RoundAlreadyInMetaIDO: "lookup",
} as const satisfies Record<string, ErrorCategory>;

export type IdoErrorCode = keyof typeof ERROR_CATEGORIES;

export class IdoError extends Error {
  readonly code: IdoErrorCode;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(code: IdoErrorCode, message: string, details?: Record<string, unknown>) {
    super(`${code}: ${message}`);
    this.name = "IdoError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.details = details;
  }
}

/**
 * Narrow an unknown throwable to IdoError, optionally of a given code
 */
export function isIdoError(error: unknown, code?: IdoErrorCode): error is IdoError {
  return error instanceof IdoError && (code === undefined || error.code === code);
}

/**
 * A transfer collaborator refused or failed a movement of funds
 */
export class TokenTransferError extends Error {
  readonly token: string;
  readonly amount: bigint;

  constructor(message: string, token: string, amount: bigint, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenTransferError";
    this.token = token;
    this.amount = amount;
  }
}

/**
 * An operation failed and reversing its completed transfers failed too.
 * Funds may sit in the wrong custody; operator attention required.
 */
export class TransferRollbackError extends Error {
  readonly original: unknown;
  readonly compensation: unknown;

  constructor(original: unknown, compensation: unknown) {
    super(
      `Rollback failed after ${describe(original)}: ${describe(compensation)}`,
      { cause: original }
    );
    this.name = "TransferRollbackError";
    this.original = original;
    this.compensation = compensation;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
