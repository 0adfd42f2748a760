/**
 * @narrator/core: message model, error taxonomy, observer contract and shared utilities.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './messages/index.js';
export * from './utils/index.js';
export type { IBridgeObserver, LogLevel, FaultKind, RunMeta } from './interfaces/observer.js';
