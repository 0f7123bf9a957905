/**
 * Core module - Round model, allocation math, eligibility, settlement
 * @module core
 */

// Constants (single source of truth)
export * from './constants';

// Type definitions
export * from './types';

// Error taxonomy
export * from './errors';

// Round windows and delays
export * from './clock';

// Allocation and spec math
export * from './allocation-calculator';

// Contribution bookkeeping
export * from './funding-ledger';
export * from './eligibility';
export * from './settlement';
export * from './transfer-journal';

// MetaIDO groups and venue ownership
export * from './meta-ido-registry';
export * from './owner-gate';

// Committed event stream
export * from './events';
