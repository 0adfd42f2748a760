/**
 * BroadcastLoop: drains the output channels on a fixed cadence and fans
 * every message out to the attached sinks.
 *
 * Each sweep drains Narration first, then Debug, so FIFO order holds within
 * a channel. A failing sink is reported and skipped for that message only.
 *
 * Attaching a sink sweeps immediately: whatever is still queued reaches the
 * newcomer (and everyone else) exactly once before anything produced later.
 * With no sink attached nothing is drained, so the first observer to join
 * receives the output it missed.
 *
 * The timer is `.unref()`ed so it doesn't keep the process alive.
 */

import type { BridgeMessage, IBridgeObserver } from '@narrator/core';
import { BroadcastError, toError } from '@narrator/core';
import type { OutputChannels } from './channel.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A remote observer as seen by the loop. */
export interface MessageSink {
  readonly id: string;
  send(message: BridgeMessage): void;
}

export interface BroadcastLoopOpts {
  channels: OutputChannels;
  /** Sweep interval in milliseconds. Default: 100. */
  intervalMs?: number;
  observer?: IBridgeObserver;
}

// ---------------------------------------------------------------------------
// BroadcastLoop
// ---------------------------------------------------------------------------

export class BroadcastLoop {
  private readonly sinks = new Map<string, MessageSink>();
  private readonly intervalMs: number;
  private readonly observer: IBridgeObserver | null;
  private channels: OutputChannels;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: BroadcastLoopOpts) {
    this.channels = opts.channels;
    this.intervalMs = opts.intervalMs ?? 100;
    this.observer = opts.observer ?? null;
  }

  /** Register a sink and sweep at once. Returns a function that detaches it. */
  attach(sink: MessageSink): () => void {
    this.sinks.set(sink.id, sink);
    this.observer?.onObserverAttached(sink.id, this.sinks.size);
    this.sweep();
    return () => this.detach(sink.id);
  }

  detach(sinkId: string): boolean {
    const removed = this.sinks.delete(sinkId);
    if (removed) {
      this.observer?.onObserverDetached(sinkId, this.sinks.size);
    }
    return removed;
  }

  get sinkCount(): number {
    return this.sinks.size;
  }

  /** Point the loop at a new run's channels. */
  useChannels(channels: OutputChannels): void {
    this.channels = channels;
  }

  /**
   * Start the sweep timer. Idempotent: calling start() while running is a no-op.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Stop the sweep timer. Safe to call when not running.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One pass: Narration, then Debug. Messages stay queued while no sink is attached. */
  sweep(): void {
    if (this.sinks.size === 0) return;
    this.deliver(this.channels.narration.drainAll());
    this.deliver(this.channels.debug.drainAll());
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private deliver(messages: BridgeMessage[]): void {
    if (messages.length === 0) return;
    // Snapshot so a sink detaching mid-sweep doesn't disturb iteration.
    const sinks = [...this.sinks.values()];

    for (const message of messages) {
      for (const sink of sinks) {
        try {
          sink.send(message);
        } catch (err) {
          const cause = toError(err);
          this.observer?.onFault('broadcast', new BroadcastError(cause.message, sink.id), {
            channel: message.channel,
            kind: message.kind,
          });
        }
      }
    }
  }
}
