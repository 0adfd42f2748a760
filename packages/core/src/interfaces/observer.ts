/**
 * IBridgeObserver: logging and diagnostics contract.
 *
 * Every bridge component reports through this interface instead of writing
 * to the console directly: while an engine run is active the process
 * streams are owned by the classifier, and log lines written there would be
 * classified as engine output.
 */

import type { RunOutcome } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Which failure site produced a fault. */
export type FaultKind = 'transport' | 'classification' | 'engine' | 'broadcast';

export interface RunMeta {
  runId: string;
  engine: string;
  startedAt: Date;
}

export interface IBridgeObserver {
  onRunStart(meta: RunMeta): void;
  onRunEnd(meta: RunMeta, outcome: RunOutcome): void;
  onFault(kind: FaultKind, error: Error, context?: Record<string, unknown>): void;
  onObserverAttached(sinkId: string, observerCount: number): void;
  onObserverDetached(sinkId: string, observerCount: number): void;
  log(level: LogLevel, message: string, data?: Record<string, unknown>): void;
  /** Write out anything buffered. */
  flush(): void;
}
