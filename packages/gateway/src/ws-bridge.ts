/**
 * ObserverBridge: connects one WebSocket client to the engine runner.
 *
 * Responsibilities:
 *   1. Register a sink with the broadcast loop → forward messages as
 *      game_output / debug_output frames
 *   2. Receive client frames → submit input, start the engine, answer pings
 *   3. Push status updates pushed by the gateway
 *
 * One bridge instance per connected WebSocket.
 */

import type { WebSocket } from 'ws';
import type { BridgeMessage, EngineStatus, IBridgeObserver } from '@narrator/core';
import { EngineBusyError, TransportError, createMessage, generateId, toError, toWireMessage } from '@narrator/core';
import type { MessageSink } from '@narrator/bridge';
import { coerceInput } from '@narrator/bridge';
import {
  encodeEnvelope,
  parseClientFrame,
  statusUpdateFor,
  type ClientEnvelope,
  type ServerEnvelope,
} from './protocol.js';

/** The part of EngineRunner a bridge talks to. */
export interface ObserverHost {
  attach(sink: MessageSink): () => void;
  submitInput(value: unknown): boolean;
  start(): Promise<void>;
  /** Queue a message for every observer and deliver it now. */
  publish(message: BridgeMessage): void;
  /** True while a run is in progress. */
  isRunning(): boolean;
}

export interface ObserverBridgeOpts {
  /** Sink id (default: generated). */
  id?: string;
  observer?: IBridgeObserver;
}

const WS_OPEN = 1;

export class ObserverBridge {
  readonly id: string;
  private readonly observer: IBridgeObserver | null;
  private alive = false;
  private detach: (() => void) | null = null;
  private messageHandler: ((data: Buffer | ArrayBuffer | Buffer[]) => void) | null = null;
  private closeHandler: (() => void) | null = null;
  private errorHandler: (() => void) | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly host: ObserverHost,
    opts: ObserverBridgeOpts = {},
  ) {
    this.id = opts.id ?? `ws-${generateId(8)}`;
    this.observer = opts.observer ?? null;
  }

  /** Greet the client, attach the sink (which replays queued output) and listen. */
  start(): void {
    this.alive = true;
    this.send({ event: 'connected', data: { message: 'Connected to narrator' } });

    const sink: MessageSink = {
      id: this.id,
      send: (message) => this.forward(message),
    };
    this.detach = this.host.attach(sink);

    this.messageHandler = (data: Buffer | ArrayBuffer | Buffer[]) => {
      const raw = Buffer.isBuffer(data)
        ? data.toString('utf-8')
        : Array.isArray(data)
          ? Buffer.concat(data).toString('utf-8')
          : Buffer.from(data).toString('utf-8');
      const frame = parseClientFrame(raw);
      if (!frame) {
        this.send({ event: 'error', data: { code: 'PARSE_ERROR', message: 'Invalid message format' } });
        return;
      }
      this.handleClient(frame);
    };
    this.closeHandler = () => this.stop();
    this.errorHandler = () => this.stop();

    this.ws.on('message', this.messageHandler);
    this.ws.on('close', this.closeHandler);
    this.ws.on('error', this.errorHandler);
  }

  /** Detach from the broadcast loop and remove WS listeners. */
  stop(): void {
    if (!this.alive) return;
    this.alive = false;
    this.detach?.();
    this.detach = null;
    if (this.messageHandler) { this.ws.off('message', this.messageHandler); this.messageHandler = null; }
    if (this.closeHandler) { this.ws.off('close', this.closeHandler); this.closeHandler = null; }
    if (this.errorHandler) { this.ws.off('error', this.errorHandler); this.errorHandler = null; }
  }

  isAlive(): boolean {
    return this.alive;
  }

  sendStatus(status: EngineStatus): void {
    this.send({ event: 'status_update', data: statusUpdateFor(status) });
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private handleClient(frame: ClientEnvelope): void {
    switch (frame.event) {
      case 'user_input': {
        const text = coerceInput(frame.data.input);
        if (!this.host.submitInput(frame.data.input)) {
          this.observer?.log('debug', 'Input received with no engine running', { sinkId: this.id });
        }
        this.host.publish(createMessage('narration', 'user-input', text));
        break;
      }

      case 'start_game': {
        const wasRunning = this.host.isRunning();
        this.host.start().then(
          () => {
            this.send({ event: 'game_started', data: { message: 'Game started successfully' } });
          },
          (err: unknown) => {
            const error = toError(err);
            const alreadyRunning = wasRunning || error instanceof EngineBusyError;
            this.send({
              event: 'error',
              data: alreadyRunning
                ? { code: 'ALREADY_RUNNING', message: 'Game is already running' }
                : { code: 'START_FAILED', message: error.message },
            });
          },
        );
        break;
      }

      case 'user_exit':
        // Other observers may still be playing; the server keeps running.
        this.observer?.log('info', 'Observer initiated exit', { sinkId: this.id });
        this.send({ event: 'exit_acknowledged', data: { message: 'Exit acknowledged' } });
        break;

      case 'ping':
        this.send({ event: 'pong', data: { timestamp: new Date().toISOString() } });
        break;

      default:
        this.send({ event: 'error', data: { code: 'UNKNOWN_EVENT', message: `Unknown event: ${frame.event}` } });
        break;
    }
  }

  /** Sink side: a failure here is reported by the broadcast loop. */
  private forward(message: BridgeMessage): void {
    if (this.ws.readyState !== WS_OPEN) {
      throw new TransportError('WebSocket is not open', { sinkId: this.id });
    }
    this.ws.send(
      encodeEnvelope({
        event: message.channel === 'narration' ? 'game_output' : 'debug_output',
        data: toWireMessage(message),
      }),
    );
  }

  private send(envelope: ServerEnvelope): void {
    if (this.alive && this.ws.readyState === WS_OPEN) {
      this.ws.send(encodeEnvelope(envelope));
    }
  }
}
