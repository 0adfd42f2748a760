import { describe, it, expect } from 'vitest';
import {
  BridgeError,
  TransportError,
  EngineError,
  BroadcastError,
  ClassificationError,
  ConfigError,
  isTransportFault,
  toError,
} from './index.js';

describe('error hierarchy', () => {
  it('tags each subclass with its code and name', () => {
    const cases: Array<[BridgeError, string, string]> = [
      [new TransportError('pipe closed'), 'TRANSPORT_ERROR', 'TransportError'],
      [new EngineError('boom', 'subprocess'), 'ENGINE_ERROR', 'EngineError'],
      [new BroadcastError('send failed', 'sink-1'), 'BROADCAST_ERROR', 'BroadcastError'],
      [new ClassificationError('bad line', 'stdout'), 'CLASSIFICATION_ERROR', 'ClassificationError'],
      [new ConfigError('bad port'), 'CONFIG_ERROR', 'ConfigError'],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(BridgeError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('merges identifying fields into the context', () => {
    const err = new BroadcastError('send failed', 'sink-7', { kind: 'narration' });
    expect(err.sinkId).toBe('sink-7');
    expect(err.context).toEqual({ kind: 'narration', sinkId: 'sink-7' });
  });
});

describe('isTransportFault', () => {
  it('recognises TransportError', () => {
    expect(isTransportFault(new TransportError('closed'))).toBe(true);
  });

  it('recognises errno-coded stream errors', () => {
    for (const code of ['EPIPE', 'ECONNRESET', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END']) {
      const err = Object.assign(new Error('write failed'), { code });
      expect(isTransportFault(err)).toBe(true);
    }
  });

  it('rejects other errors and non-errors', () => {
    expect(isTransportFault(new Error('plain'))).toBe(false);
    expect(isTransportFault(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(false);
    expect(isTransportFault(new EngineError('boom', 'x'))).toBe(false);
    expect(isTransportFault('EPIPE')).toBe(false);
  });
});

describe('toError', () => {
  it('passes errors through and wraps other values', () => {
    const err = new Error('x');
    expect(toError(err)).toBe(err);
    expect(toError('oops').message).toBe('oops');
  });
});
