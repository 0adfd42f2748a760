/**
 * Queues shared between the engine task, the broadcast loop and the transport.
 *
 * MessageChannel: unbounded FIFO of classified output. One for narration,
 * one for debug/system output, created fresh for every engine run.
 *
 * InputChannel: FIFO of raw input values from remote clients, read only by
 * the InputBridge. `take()` resolves as soon as a value arrives, so a waiting
 * reader never sits out the remainder of a poll interval.
 */

import type { BridgeMessage, ChannelName } from '@narrator/core';
import { TransportError } from '@narrator/core';

// ---------------------------------------------------------------------------
// MessageChannel
// ---------------------------------------------------------------------------

export class MessageChannel {
  private queue: BridgeMessage[] = [];

  constructor(readonly name: ChannelName) {}

  /** Append a message. Never blocks, never throws. */
  enqueue(message: BridgeMessage): void {
    this.queue.push(message);
  }

  /** Remove and return everything queued, oldest first. */
  drainAll(): BridgeMessage[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  get size(): number {
    return this.queue.length;
  }
}

/** The pair of output channels owned by one engine run. */
export interface OutputChannels {
  narration: MessageChannel;
  debug: MessageChannel;
}

export function createOutputChannels(): OutputChannels {
  return {
    narration: new MessageChannel('narration'),
    debug: new MessageChannel('debug'),
  };
}

// ---------------------------------------------------------------------------
// InputChannel
// ---------------------------------------------------------------------------

/** One queued input value. Wrapped so a pushed `undefined` is distinguishable from a timeout. */
export interface InputEvent {
  value: unknown;
}

interface PendingTake {
  resolve: (event: InputEvent | null) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class InputChannel {
  private queue: InputEvent[] = [];
  private waiters: PendingTake[] = [];
  private closed = false;

  /** Queue a raw input value, handing it straight to a waiting reader if there is one. */
  push(value: unknown): void {
    if (this.closed) {
      throw new TransportError('Input channel is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve({ value });
      return;
    }
    this.queue.push({ value });
  }

  /**
   * Resolve with the next event, or `null` once `timeoutMs` passes with
   * nothing queued. Rejects with TransportError when the channel is closed.
   */
  take(timeoutMs: number): Promise<InputEvent | null> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new TransportError('Input channel is closed'));
    }

    return new Promise<InputEvent | null>((resolve, reject) => {
      const waiter: PendingTake = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Reject pending and future reads. Queued values can still be taken. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new TransportError('Input channel is closed'));
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }
}
