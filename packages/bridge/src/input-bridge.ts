/**
 * InputBridge: a blocking-style `readLine()` for the engine, fed by the
 * asynchronous InputChannel.
 *
 * The engine awaits `readLine()` exactly where a terminal program would block
 * on stdin. The wait is bounded: after `retryCeiling` empty polls the engine
 * gets a bare newline and carries on.
 */

import type { IBridgeObserver } from '@narrator/core';
import { TransportError, toError } from '@narrator/core';
import type { InputChannel, InputEvent } from './channel.js';

export const FALLBACK_LINE = '\n';

export interface InputBridgeOpts {
  input: InputChannel;
  /** Length of one poll in ms (default 100). */
  pollIntervalMs?: number;
  /** Empty polls before the fallback line is returned (default 1000). */
  retryCeiling?: number;
  /** Fired when the engine starts waiting for input. */
  onWaiting?: () => void;
  /** Fired when an input value has been taken. */
  onInput?: (line: string) => void;
  observer?: IBridgeObserver;
}

/**
 * Convert a raw input value to the text the engine reads (without newline).
 * `{input: x}` payloads are unwrapped one level.
 */
export function coerceInput(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  if (typeof value === 'object' && 'input' in value) {
    return coerceInput(value.input);
  }
  return String(value);
}

export class InputBridge {
  private readonly input: InputChannel;
  private readonly pollIntervalMs: number;
  private readonly retryCeiling: number;
  private readonly onWaiting: (() => void) | null;
  private readonly onInput: ((line: string) => void) | null;
  private readonly observer: IBridgeObserver | null;

  constructor(opts: InputBridgeOpts) {
    this.input = opts.input;
    this.pollIntervalMs = opts.pollIntervalMs ?? 100;
    this.retryCeiling = opts.retryCeiling ?? 1000;
    this.onWaiting = opts.onWaiting ?? null;
    this.onInput = opts.onInput ?? null;
    this.observer = opts.observer ?? null;
  }

  /** Resolve with the next input line (newline-terminated) or the fallback line. */
  async readLine(): Promise<string> {
    this.runHook('onWaiting', () => this.onWaiting?.());

    for (let attempt = 0; attempt < this.retryCeiling; attempt++) {
      let event: InputEvent | null;
      try {
        event = await this.input.take(this.pollIntervalMs);
      } catch (err) {
        if (err instanceof TransportError) {
          this.observer?.log('warn', 'Input unavailable, returning empty line', { error: err.message });
          return FALLBACK_LINE;
        }
        throw err;
      }

      if (event) {
        const text = coerceInput(event.value);
        this.runHook('onInput', () => this.onInput?.(text));
        return text + '\n';
      }
    }

    this.observer?.log('debug', 'Input wait exhausted, returning empty line', {
      polls: this.retryCeiling,
      pollIntervalMs: this.pollIntervalMs,
    });
    return FALLBACK_LINE;
  }

  private runHook(name: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.observer?.log('warn', `Input hook ${name} failed`, { error: toError(err).message });
    }
  }
}
