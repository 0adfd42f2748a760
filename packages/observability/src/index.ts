/**
 * @narrator/observability: console and JSONL observers plus the config-driven factory.
 */

import type { BridgeConfig, IBridgeObserver } from '@narrator/core';
import { ConfigError } from '@narrator/core';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';

export { ConsoleObserver } from './console-observer.js';
export type { ConsoleObserverOptions } from './console-observer.js';
export { FileObserver } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';
export { MultiObserver, NoopObserver } from './multi-observer.js';

export type ObservabilityConfig = BridgeConfig['observability'];

/**
 * Build the observer described by config. Unknown observer names are a ConfigError.
 * An empty list yields a NoopObserver; a single entry is returned unwrapped.
 */
export function createObserver(config: ObservabilityConfig): IBridgeObserver {
  const observers: IBridgeObserver[] = config.observers.map((name) => {
    switch (name) {
      case 'console':
        return new ConsoleObserver({ logLevel: config.logLevel });
      case 'file':
        return new FileObserver({ filePath: config.logFile });
      default:
        throw new ConfigError(`Unknown observer "${name}"`, { observer: name });
    }
  });

  const [first] = observers;
  if (!first) return new NoopObserver();
  if (observers.length === 1) return first;
  return new MultiObserver(observers);
}
