/**
 * IDO Venue - Main Entry Point
 * Fixed-price token sale rounds settled in SPL tokens
 */

export * from './core';
export * from './network';
export * from './utils';

export { RoundManager, type RoundManagerConfig, type VenueState } from './managers/round-manager';
