export { loadRelayConfig } from './config.js';
export type { RelayConfig, TransportKind } from './config.js';
export * from './stream/index.js';
export * from './memory/index.js';
export * from './redis/index.js';
