/**
 * IDO Venue Constants
 *
 * Single source of truth for protocol constants.
 * Import from here instead of declaring locally.
 */

// ============================================================================
// Fixed-point scales
// ============================================================================

/** Basis point denominator (100% = 10_000 bps) */
export const BPS_DENOMINATOR = 10_000n;

/** Upper bound accepted for any basis-point setting */
export const MAX_BPS = 10_000;

/** 8-decimal scale applied to rank × spec allocation multipliers */
export const MULTIPLIER_SCALE = 100_000_000n;

// ============================================================================
// Lifecycle
// ============================================================================

/** Maximum distance a delayed end/claimable time may sit past its initial value */
export const MAX_DELAY_SECONDS = 14 * 24 * 60 * 60;

/** First round ID and first MetaIDO ID */
export const FIRST_ID = 1;

// ============================================================================
// State & Persistence
// ============================================================================

/** Current persisted state version */
export const STATE_VERSION = 1;

/** Rotating backups kept beside the state file */
export const STATE_BACKUP_COUNT = 3;

/** Default state file path */
export const DEFAULT_STATE_FILE = ".ido-venue-state.json";

/** Default audit history directory */
export const DEFAULT_HISTORY_DIR = "./data/history";
