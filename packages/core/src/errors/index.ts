/**
 * Structured error types for narrator.
 */

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

/** Broken pipe, closed socket, closed input channel. Recoverable once per run. */
export class TransportError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', context);
    this.name = 'TransportError';
  }
}

export class EngineError extends BridgeError {
  constructor(message: string, public readonly engine: string, context?: Record<string, unknown>) {
    super(message, 'ENGINE_ERROR', { ...context, engine });
    this.name = 'EngineError';
  }
}

/** start() was called while a run is still in progress. */
export class EngineBusyError extends EngineError {
  constructor(engine: string, context?: Record<string, unknown>) {
    super('Engine is already running', engine, context);
    this.name = 'EngineBusyError';
  }
}

/** A send to one remote observer failed. Never halts a broadcast sweep. */
export class BroadcastError extends BridgeError {
  constructor(message: string, public readonly sinkId: string, context?: Record<string, unknown>) {
    super(message, 'BROADCAST_ERROR', { ...context, sinkId });
    this.name = 'BroadcastError';
  }
}

/** Unexpected failure while classifying a line. The line still reaches debug. */
export class ClassificationError extends BridgeError {
  constructor(message: string, public readonly stream: string, context?: Record<string, unknown>) {
    super(message, 'CLASSIFICATION_ERROR', { ...context, stream });
    this.name = 'ClassificationError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

const TRANSPORT_ERROR_CODES = new Set([
  'EPIPE',
  'ECONNRESET',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

/** True for a TransportError or a Node stream/socket error with a transport errno code. */
export function isTransportFault(err: unknown): boolean {
  if (err instanceof TransportError) return true;
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return TRANSPORT_ERROR_CODES.has(err.code);
  }
  return false;
}

/** Normalise a thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
