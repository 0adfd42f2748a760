/**
 * ObserverBridge tests.
 *
 * Uses a mock WebSocket and an in-memory host backed by a real
 * BroadcastLoop to test sink registration, catch-up, client events and
 * teardown.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import type { WebSocket } from 'ws';
import type { BridgeMessage } from '@narrator/core';
import { EngineBusyError, EngineError, createMessage } from '@narrator/core';
import { BroadcastLoop, createOutputChannels, type MessageSink } from '@narrator/bridge';
import { ObserverBridge, type ObserverHost } from './ws-bridge.js';
import type { ServerEnvelope } from './protocol.js';

// ---------------------------------------------------------------------------
// Mock WebSocket
// ---------------------------------------------------------------------------

class MockWebSocket extends EventEmitter {
  readyState = 1; // OPEN
  sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.readyState = 3; // CLOSED
  }

  /** Helper: parse all sent frames. */
  getSentFrames(): ServerEnvelope[] {
    return this.sent.map((s) => JSON.parse(s) as ServerEnvelope);
  }

  lastFrame(): ServerEnvelope | undefined {
    return this.getSentFrames().at(-1);
  }

  /** Helper: simulate receiving a client frame. */
  simulateFrame(frame: unknown): void {
    this.emit('message', Buffer.from(typeof frame === 'string' ? frame : JSON.stringify(frame)));
  }
}

// ---------------------------------------------------------------------------
// In-memory host
// ---------------------------------------------------------------------------

class FakeHost implements ObserverHost {
  readonly channels = createOutputChannels();
  readonly loop = new BroadcastLoop({ channels: this.channels });
  readonly inputs: unknown[] = [];
  accepting = true;
  running = false;
  startResult: Promise<void> = Promise.resolve();

  attach(sink: MessageSink): () => void {
    return this.loop.attach(sink);
  }

  submitInput(value: unknown): boolean {
    this.inputs.push(value);
    return this.accepting;
  }

  start(): Promise<void> {
    return this.startResult;
  }

  publish(message: BridgeMessage): void {
    (message.channel === 'narration' ? this.channels.narration : this.channels.debug).enqueue(message);
    this.loop.sweep();
  }

  isRunning(): boolean {
    return this.running;
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================================================
// ObserverBridge
// ============================================================================

describe('ObserverBridge', () => {
  let ws: MockWebSocket;
  let host: FakeHost;
  let bridge: ObserverBridge;

  beforeEach(() => {
    ws = new MockWebSocket();
    host = new FakeHost();
    bridge = new ObserverBridge(ws as unknown as WebSocket, host, { id: 'observer-1' });
  });

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  describe('lifecycle', () => {
    it('greets the client, then replays queued output', () => {
      const timestamp = new Date('2024-05-01T12:00:00.000Z');
      host.channels.narration.enqueue(createMessage('narration', 'narration', 'Welcome', { timestamp }));
      host.channels.debug.enqueue(createMessage('debug', 'debug', 'Graph built: 3 nodes', { timestamp }));

      bridge.start();

      expect(ws.getSentFrames()).toEqual([
        { event: 'connected', data: { message: 'Connected to narrator' } },
        {
          event: 'game_output',
          data: { type: 'narration', content: 'Welcome', timestamp: '2024-05-01T12:00:00.000Z' },
        },
        {
          event: 'debug_output',
          data: {
            type: 'debug',
            content: 'Graph built: 3 nodes',
            timestamp: '2024-05-01T12:00:00.000Z',
            isError: false,
          },
        },
      ]);
      expect(bridge.isAlive()).toBe(true);
      expect(host.loop.sinkCount).toBe(1);
    });

    it('detaches when the socket closes', () => {
      bridge.start();
      ws.emit('close');
      expect(bridge.isAlive()).toBe(false);
      expect(host.loop.sinkCount).toBe(0);
      expect(ws.listenerCount('message')).toBe(0);
    });

    it('detaches when the socket errors', () => {
      bridge.start();
      ws.emit('error', new Error('reset'));
      expect(host.loop.sinkCount).toBe(0);
    });

    it('does not deliver to a socket that is no longer open', () => {
      bridge.start();
      ws.close();
      const before = ws.sent.length;
      host.channels.narration.enqueue(createMessage('narration', 'narration', 'lost'));
      expect(() => host.loop.sweep()).not.toThrow();
      expect(ws.sent).toHaveLength(before);
    });
  });

  // -------------------------------------------------------------------------
  // Client events
  // -------------------------------------------------------------------------

  describe('client events', () => {
    beforeEach(() => {
      bridge.start();
    });

    it('submits user input and echoes it to every observer', () => {
      const other = new MockWebSocket();
      new ObserverBridge(other as unknown as WebSocket, host, { id: 'observer-2' }).start();

      ws.simulateFrame({ event: 'user_input', data: { input: 'open the chest' } });

      expect(host.inputs).toEqual(['open the chest']);
      for (const socket of [ws, other]) {
        expect(socket.lastFrame()).toMatchObject({
          event: 'game_output',
          data: { type: 'user-input', content: 'open the chest' },
        });
      }
    });

    it('still echoes input when no engine is running', () => {
      host.accepting = false;
      ws.simulateFrame({ event: 'user_input', data: { input: 42 } });
      expect(ws.lastFrame()).toMatchObject({ event: 'game_output', data: { content: '42' } });
    });

    it('acknowledges start_game', async () => {
      ws.simulateFrame({ event: 'start_game' });
      await settle();
      expect(ws.lastFrame()).toEqual({ event: 'game_started', data: { message: 'Game started successfully' } });
    });

    it('reports ALREADY_RUNNING when the runner refuses to start', async () => {
      host.running = true;
      host.startResult = Promise.reject(new EngineBusyError('test'));
      ws.simulateFrame({ event: 'start_game', data: {} });
      await settle();
      expect(ws.lastFrame()).toEqual({
        event: 'error',
        data: { code: 'ALREADY_RUNNING', message: 'Game is already running' },
      });
    });

    it('reports START_FAILED with the message for any other engine error', async () => {
      host.startResult = Promise.reject(new EngineError('spawn dm ENOENT', 'dm'));
      ws.simulateFrame({ event: 'start_game', data: {} });
      await settle();
      expect(ws.lastFrame()).toEqual({
        event: 'error',
        data: { code: 'START_FAILED', message: 'spawn dm ENOENT' },
      });
    });

    it('acknowledges user_exit without stopping anything', () => {
      ws.simulateFrame({ event: 'user_exit' });
      expect(ws.lastFrame()).toEqual({ event: 'exit_acknowledged', data: { message: 'Exit acknowledged' } });
      expect(bridge.isAlive()).toBe(true);
    });

    it('answers ping with pong', () => {
      ws.simulateFrame({ event: 'ping' });
      const frame = ws.lastFrame();
      expect(frame?.event).toBe('pong');
      expect(frame?.data).toEqual({ timestamp: expect.any(String) });
    });

    it('rejects malformed frames', () => {
      ws.simulateFrame('not json');
      expect(ws.lastFrame()).toEqual({
        event: 'error',
        data: { code: 'PARSE_ERROR', message: 'Invalid message format' },
      });

      ws.simulateFrame({ data: {} });
      expect(ws.lastFrame()?.event).toBe('error');
    });

    it('rejects unknown events', () => {
      ws.simulateFrame({ event: 'fly', data: {} });
      expect(ws.lastFrame()).toEqual({
        event: 'error',
        data: { code: 'UNKNOWN_EVENT', message: 'Unknown event: fly' },
      });
    });
  });

  it('pushes status updates', () => {
    bridge.start();
    bridge.sendStatus('ready');
    expect(ws.lastFrame()).toEqual({
      event: 'status_update',
      data: { message: 'Ready for your input', isProcessing: false },
    });
  });
});
