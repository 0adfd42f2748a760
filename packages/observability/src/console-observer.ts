/**
 * ConsoleObserver: level-filtered, human-readable log lines.
 *
 * The writer is captured at construction time. Constructed before an engine
 * run installs its classifiers, it keeps writing to the real terminal instead
 * of feeding log lines back into the bridge.
 */

import type { IBridgeObserver, LogLevel, FaultKind, RunMeta, RunOutcome } from '@narrator/core';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleObserverOptions {
  /** Minimum level to print (default 'info'). */
  logLevel?: LogLevel;
  /** Line writer (default: the current process.stderr.write). */
  write?: (line: string) => void;
}

export class ConsoleObserver implements IBridgeObserver {
  private readonly minLevel: number;
  private readonly writeLine: (line: string) => void;

  constructor(opts: ConsoleObserverOptions = {}) {
    this.minLevel = LEVEL_ORDER[opts.logLevel ?? 'info'];
    if (opts.write) {
      this.writeLine = opts.write;
    } else {
      const stderrWrite = process.stderr.write.bind(process.stderr);
      this.writeLine = (line) => {
        stderrWrite(line);
      };
    }
  }

  onRunStart(meta: RunMeta): void {
    this.log('info', `Engine run ${meta.runId} started (${meta.engine})`);
  }

  onRunEnd(meta: RunMeta, outcome: RunOutcome): void {
    const seconds = ((outcome.endedAt.getTime() - outcome.startedAt.getTime()) / 1000).toFixed(1);
    if (outcome.status === 'completed') {
      this.log('info', `Engine run ${meta.runId} completed after ${seconds}s`);
    } else {
      this.log('error', `Engine run ${meta.runId} faulted after ${seconds}s: ${outcome.error?.message ?? 'unknown error'}`);
    }
  }

  onFault(kind: FaultKind, error: Error, context?: Record<string, unknown>): void {
    // Broadcast faults are per-observer and usually mean a client went away.
    const level: LogLevel = kind === 'broadcast' || kind === 'classification' ? 'warn' : 'error';
    this.log(level, `${kind} fault: ${error.message}`, context);
  }

  onObserverAttached(sinkId: string, observerCount: number): void {
    this.log('debug', `Observer ${sinkId} attached (${observerCount} connected)`);
  }

  onObserverDetached(sinkId: string, observerCount: number): void {
    this.log('debug', `Observer ${sinkId} detached (${observerCount} connected)`);
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.minLevel) return;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    this.writeLine(`[narrator] ${level.toUpperCase().padEnd(5)} ${message}${suffix}\n`);
  }

  flush(): void {
    // Unbuffered.
  }
}
