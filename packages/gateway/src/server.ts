/**
 * GatewayServer: lightweight HTTP control plane with WebSocket observers.
 *
 * Routes:
 *   GET    /health   - liveness probe
 *   GET    /status   - engine run state, outcome and queue depths
 *   WS     /ws       - WebSocket upgrade; one ObserverBridge per client
 *
 * Anything else is a JSON 404.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { EngineStatus, IBridgeObserver, RunOutcome, RunState } from '@narrator/core';
import type { OutputChannels } from '@narrator/bridge';
import { ObserverBridge, type ObserverHost } from './ws-bridge.js';

/** The part of EngineRunner the gateway needs. */
export interface GatewayRunner extends ObserverHost {
  getState(): RunState;
  getOutcome(): RunOutcome | null;
  getChannels(): OutputChannels;
  readonly observerCount: number;
}

export interface GatewayServerOptions {
  port: number;
  host?: string;
  runner: GatewayRunner;
  observer?: IBridgeObserver;
}

export class GatewayServer {
  private server: Server | null = null;
  private wss: InstanceType<typeof WebSocketServer> | null = null;
  private readonly bridges = new Set<ObserverBridge>();
  private readonly port: number;
  private readonly host: string;
  private readonly runner: GatewayRunner;
  private readonly observer: IBridgeObserver | null;

  constructor(options: GatewayServerOptions) {
    this.port = options.port;
    this.host = options.host ?? '127.0.0.1';
    this.runner = options.runner;
    this.observer = options.observer ?? null;
  }

  /** Start listening on the configured port. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res);
      });

      this.wss = new WebSocketServer({ noServer: true });
      this.server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        this.handleUpgrade(req, socket, head);
      });

      this.server.on('error', reject);

      this.server.listen(this.port, this.host, () => {
        this.observer?.log('info', 'Gateway listening', this.getAddress() ?? undefined);
        resolve();
      });
    });
  }

  /** Close every observer connection, then the server. */
  async stop(): Promise<void> {
    for (const bridge of this.bridges) {
      bridge.stop();
    }
    this.bridges.clear();

    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Get the bound address (useful in tests with port 0). */
  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const addr = this.server.address();
    if (typeof addr === 'string' || addr === null) return null;
    return { host: addr.address, port: addr.port };
  }

  /** Push an engine status change to every connected observer. */
  broadcastStatus(status: EngineStatus): void {
    for (const bridge of this.bridges) {
      bridge.sendStatus(status);
    }
  }

  get connectionCount(): number {
    return this.bridges.size;
  }

  // ---------------------------------------------------------------------------
  // WebSocket upgrade handling
  // ---------------------------------------------------------------------------

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const wss = this.wss;
    if (!wss) {
      socket.destroy();
      return;
    }

    const path = (req.url ?? '').split('?')[0];
    if (path !== '/ws') {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const bridge = new ObserverBridge(ws, this.runner, { observer: this.observer ?? undefined });
      this.bridges.add(bridge);
      ws.on('close', () => {
        this.bridges.delete(bridge);
      });
      bridge.start();

      wss.emit('connection', ws, req);
    });
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const method = req.method ?? 'GET';
    const path = (req.url ?? '/').split('?')[0];

    // CORS headers for browser clients.
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // GET /health
    if (method === 'GET' && path === '/health') {
      this.sendJson(res, 200, {
        status: 'ok',
        timestamp: new Date().toISOString(),
        observers: this.runner.observerCount,
      });
      return;
    }

    // GET /status
    if (method === 'GET' && path === '/status') {
      const outcome = this.runner.getOutcome();
      const channels = this.runner.getChannels();
      this.sendJson(res, 200, {
        state: this.runner.getState(),
        outcome: outcome
          ? {
              status: outcome.status,
              recoveries: outcome.recoveries,
              startedAt: outcome.startedAt.toISOString(),
              endedAt: outcome.endedAt.toISOString(),
              ...(outcome.error ? { error: outcome.error.message } : {}),
            }
          : null,
        queued: {
          narration: channels.narration.size,
          debug: channels.debug.size,
        },
        observers: this.runner.observerCount,
      });
      return;
    }

    // Fallback: 404
    this.sendJson(res, 404, { error: 'Not found' });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }
}
