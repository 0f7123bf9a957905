/**
 * Utility modules
 * @module utils
 */

// Logger exports
export { createLogger, setGlobalLogLevel, isLogLevel, logReplacer, type LogLevel, type LogData } from './logger';

// Env validator exports
export {
  loadEnvFiles,
  validateVenueEnv,
  resolveRpcUrl,
  logConfig,
  VenueEnvSchema,
  type VenueEnv,
} from './env-validator';

// Execution lock exports
export {
  ExecutionLock,
  LockError,
  ScopedLockManager,
  type LockInfo,
  type LockStatus,
  type ExecutionLockOptions,
} from './execution-lock';

// State persistence exports
export * from './state-persistence';

// History manager exports
export {
  HistoryManager,
  GENESIS_HASH,
  type EventType,
  type HistoryEntry,
  type ChainMetadata,
  type ValidationResult,
  type HistoryManagerConfig,
} from './history-manager';
