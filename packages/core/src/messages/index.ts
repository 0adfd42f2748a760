/**
 * BridgeMessage construction and wire serialisation.
 */

import type { BridgeMessage, ChannelName, MessageKind, WireMessage } from '../types/index.js';

export interface CreateMessageOpts {
  isError?: boolean;
  /** Override the creation time (tests, replayed events). */
  timestamp?: Date;
}

/** Build a frozen BridgeMessage. */
export function createMessage(
  channel: ChannelName,
  kind: MessageKind,
  content: string,
  opts: CreateMessageOpts = {},
): BridgeMessage {
  return Object.freeze({
    channel,
    kind,
    content,
    timestamp: (opts.timestamp ?? new Date()).toISOString(),
    isError: opts.isError ?? false,
  });
}

/** Convert to the observer-facing shape. Narration messages carry no `isError` field. */
export function toWireMessage(msg: BridgeMessage): WireMessage {
  const wire: WireMessage = {
    type: msg.kind,
    content: msg.content,
    timestamp: msg.timestamp,
  };
  if (msg.channel === 'debug') {
    wire.isError = msg.isError;
  }
  return wire;
}
