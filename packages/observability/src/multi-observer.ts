/**
 * MultiObserver: fans every event out to several observers.
 * A throwing observer is skipped; the rest still receive the event.
 */

import type { IBridgeObserver, LogLevel, FaultKind, RunMeta, RunOutcome } from '@narrator/core';

export class MultiObserver implements IBridgeObserver {
  /** Bound at construction so a later patch of process.stderr.write is not used. */
  private readonly stderrWrite = process.stderr.write.bind(process.stderr);

  constructor(private readonly observers: IBridgeObserver[]) {}

  private each(fn: (observer: IBridgeObserver) => void): void {
    for (const observer of this.observers) {
      try {
        fn(observer);
      } catch (err) {
        this.stderrWrite(`[narrator] observer failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  }

  onRunStart(meta: RunMeta): void {
    this.each((o) => o.onRunStart(meta));
  }

  onRunEnd(meta: RunMeta, outcome: RunOutcome): void {
    this.each((o) => o.onRunEnd(meta, outcome));
  }

  onFault(kind: FaultKind, error: Error, context?: Record<string, unknown>): void {
    this.each((o) => o.onFault(kind, error, context));
  }

  onObserverAttached(sinkId: string, observerCount: number): void {
    this.each((o) => o.onObserverAttached(sinkId, observerCount));
  }

  onObserverDetached(sinkId: string, observerCount: number): void {
    this.each((o) => o.onObserverDetached(sinkId, observerCount));
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.each((o) => o.log(level, message, data));
  }

  flush(): void {
    this.each((o) => o.flush());
  }
}

/** Observer that discards everything. Default for library consumers and tests. */
export class NoopObserver implements IBridgeObserver {
  onRunStart(): void {}
  onRunEnd(): void {}
  onFault(): void {}
  onObserverAttached(): void {}
  onObserverDetached(): void {}
  log(): void {}
  flush(): void {}
}
