/**
 * FileObserver: structured JSONL file logging with rotation.
 *
 * Each event is serialised as a single JSON line (JSONL) and appended to the
 * configured log file. When the file exceeds `maxBytes` it is rotated: the
 * current file is renamed with a `.1` suffix (overwriting any previous
 * rotation) and a fresh file is opened.
 *
 * Default path : ~/.narrator/logs/narrator.jsonl
 * Default limit: 10 MB
 */

import { writeFileSync, appendFileSync, renameSync, statSync, mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

import type { IBridgeObserver, LogLevel, FaultKind, RunMeta, RunOutcome } from '@narrator/core';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

export interface FileObserverOptions {
  /** Absolute or ~-relative path to the JSONL log file. */
  filePath?: string;
  /** Max file size in bytes before rotation (default 10 MB). */
  maxBytes?: number;
  /** Delay before buffered lines are written (default 100 ms). */
  flushDelayMs?: number;
}

export class FileObserver implements IBridgeObserver {
  readonly filePath: string;
  private readonly maxBytes: number;
  private readonly flushDelayMs: number;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing = false;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = expandHome(opts.filePath ?? '~/.narrator/logs/narrator.jsonl');
    this.maxBytes = opts.maxBytes ?? 10 * 1024 * 1024; // 10 MB
    this.flushDelayMs = opts.flushDelayMs ?? 100;
    this.ensureDir();
  }

  // ---- internal -----------------------------------------------------------

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private write(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      type,
      ...data,
    });
    this.buffer.push(line);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, this.flushDelayMs);
    this.flushTimer.unref();
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    const stats = statSync(this.filePath);
    if (stats.size >= this.maxBytes) {
      renameSync(this.filePath, this.filePath + '.1');
      writeFileSync(this.filePath, '', { encoding: 'utf-8', mode: 0o600 });
    }
  }

  // ---- IBridgeObserver ----------------------------------------------------

  onRunStart(meta: RunMeta): void {
    this.write('run_start', {
      runId: meta.runId,
      engine: meta.engine,
      startedAt: meta.startedAt.toISOString(),
    });
  }

  onRunEnd(meta: RunMeta, outcome: RunOutcome): void {
    this.write('run_end', {
      runId: meta.runId,
      engine: meta.engine,
      status: outcome.status,
      recoveries: outcome.recoveries,
      duration: outcome.endedAt.getTime() - outcome.startedAt.getTime(),
      ...(outcome.error ? { error: serializeError(outcome.error) } : {}),
    });
  }

  onFault(kind: FaultKind, error: Error, context?: Record<string, unknown>): void {
    this.write('fault', {
      kind,
      error: serializeError(error),
      ...(context ? { context } : {}),
    });
  }

  onObserverAttached(sinkId: string, observerCount: number): void {
    this.write('observer_attached', { sinkId, observerCount });
  }

  onObserverDetached(sinkId: string, observerCount: number): void {
    this.write('observer_detached', { sinkId, observerCount });
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.write('log', { level, message, ...(data ? { data } : {}) });
  }

  /** Write buffered lines synchronously. Also called on shutdown. */
  flush(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.buffer.length === 0 || this.flushing) return;
    this.flushing = true;

    const payload = this.buffer.join('\n') + '\n';
    this.buffer = [];

    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, payload, { encoding: 'utf-8', mode: 0o600 });
    } catch (err) {
      // Lines in this batch are dropped.
      process.stderr.write(`[narrator] log write failed: ${err instanceof Error ? err.message : String(err)}\n`);
    } finally {
      this.flushing = false;
    }
  }
}
