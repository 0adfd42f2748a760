/**
 * @narrator/engines: engine entrypoints the runner can host.
 */

export { SubprocessEngine } from './subprocess.js';
export type { SubprocessEngineConfig } from './subprocess.js';
