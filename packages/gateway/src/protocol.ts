/**
 * Wire protocol between the gateway and remote observers.
 *
 * Every frame is a JSON envelope `{event, data}`.
 */

import type { EngineStatus, WireMessage } from '@narrator/core';

// ---------------------------------------------------------------------------
// Server → client
// ---------------------------------------------------------------------------

export type GatewayErrorCode = 'PARSE_ERROR' | 'ALREADY_RUNNING' | 'UNKNOWN_EVENT' | 'START_FAILED';

export interface StatusUpdate {
  message: string;
  isProcessing: boolean;
}

export type ServerEnvelope =
  | { event: 'connected'; data: { message: string } }
  | { event: 'game_output'; data: WireMessage }
  | { event: 'debug_output'; data: WireMessage }
  | { event: 'status_update'; data: StatusUpdate }
  | { event: 'game_started'; data: { message: string } }
  | { event: 'exit_acknowledged'; data: { message: string } }
  | { event: 'pong'; data: { timestamp: string } }
  | { event: 'error'; data: { code: GatewayErrorCode; message: string } };

export type ServerEvent = ServerEnvelope['event'];

const STATUS_UPDATES: Record<EngineStatus, StatusUpdate> = {
  started: { message: 'Starting game...', isProcessing: true },
  ready: { message: 'Ready for your input', isProcessing: false },
  processing: { message: 'Processing...', isProcessing: true },
  stopped: { message: 'Game stopped', isProcessing: false },
};

export function statusUpdateFor(status: EngineStatus): StatusUpdate {
  return STATUS_UPDATES[status];
}

export function encodeEnvelope(envelope: ServerEnvelope): string {
  return JSON.stringify(envelope);
}

// ---------------------------------------------------------------------------
// Client → server
// ---------------------------------------------------------------------------

export interface ClientEnvelope {
  event: string;
  data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw client frame. Returns null when the frame is not JSON or not
 * an envelope with a string `event`. A missing `data` becomes `{}`.
 */
export function parseClientFrame(raw: string): ClientEnvelope | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.event !== 'string') return null;

  const data = parsed.data ?? {};
  if (!isRecord(data)) return null;
  return { event: parsed.event, data };
}
