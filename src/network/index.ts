/**
 * Network and RPC module
 * @module network
 */

// RPC utilities exports
export {
  withRetry,
  withTimeout,
  withRetryAndTimeout,
  sleep,
  isRetryableError,
  RpcError,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
  type RetryConfig,
} from './rpc-utils';

// SPL token custody
export { SplTokenGateway, type SplTokenGatewayOptions } from './spl-token-gateway';

export { loadKeypair } from './wallet';
