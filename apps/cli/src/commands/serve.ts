/**
 * Serve command -- run an engine behind the observer gateway.
 *
 * Usage:
 *   narrator serve [--port N] [--host H] [-- <engine command> [args...]]
 *
 * Wires config → observer → SubprocessEngine → EngineRunner → GatewayServer.
 * The engine is started by the first observer that sends `start_game`.
 * SIGINT/SIGTERM stop the runner, then the server.
 */

import type { BridgeConfig, IBridgeObserver } from '@narrator/core';
import { ConfigError } from '@narrator/core';
import { EngineRunner } from '@narrator/bridge';
import { SubprocessEngine } from '@narrator/engines';
import { GatewayServer } from '@narrator/gateway';
import { createObserver } from '@narrator/observability';
import { loadConfig } from '../config.js';
import { AMBER, RESET, BOLD, DIM, GREEN, RED, CHECK, CROSS, box, kvRow } from '../ui.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export interface ServeArgs {
  port?: number;
  host?: string;
  /** Engine command and arguments given after `--`. */
  engine?: string[];
}

export function parseServeArgs(args: string[]): ServeArgs {
  const parsed: ServeArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      const engine = args.slice(i + 1);
      if (engine.length > 0) parsed.engine = engine;
      break;
    }

    if (arg === '--port' || arg === '-p') {
      const raw = args[++i];
      const port = Number(raw);
      if (raw === undefined || !Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError(`Invalid --port value: ${raw ?? '(missing)'}`);
      }
      parsed.port = port;
      continue;
    }

    if (arg === '--host') {
      const host = args[++i];
      if (!host) throw new ConfigError('Missing --host value');
      parsed.host = host;
      continue;
    }

    throw new ConfigError(`Unknown serve option: ${arg ?? ''}`);
  }

  return parsed;
}

// ---------------------------------------------------------------------------
// Stack
// ---------------------------------------------------------------------------

export interface ServeStack {
  runner: EngineRunner;
  server: GatewayServer;
  observer: IBridgeObserver;
  /** The engine command line actually used. */
  engine: string[];
  /** Stop the runner, then the server, then flush logs. */
  stop(): Promise<void>;
}

/**
 * Build and start everything. The observer is created before the runner so
 * console logging keeps the original stderr writer.
 */
export async function startServe(
  config: BridgeConfig,
  args: ServeArgs = {},
  observer: IBridgeObserver = createObserver(config.observability),
): Promise<ServeStack> {
  const [command, ...engineArgs] = args.engine ?? [config.engine.command ?? '', ...(config.engine.args ?? [])];
  if (!command) {
    throw new ConfigError('No engine command. Pass one after -- or set engine.command in ~/.narrator/config.json');
  }

  const engine = new SubprocessEngine({
    command,
    args: engineArgs,
    env: config.engine.env,
    cwd: config.engine.cwd,
  });

  // Status hook forwards to the server, which does not exist yet.
  let server: GatewayServer | null = null;

  const runner = new EngineRunner({
    entrypoint: engine.entrypoint,
    engineName: command,
    rules: config.classifier,
    pollIntervalMs: config.input.pollIntervalMs,
    retryCeiling: config.input.retryCeiling,
    broadcastIntervalMs: config.broadcast.intervalMs,
    observer,
    onStatus: (status) => server?.broadcastStatus(status),
  });

  server = new GatewayServer({
    port: args.port ?? config.gateway.port,
    host: args.host ?? config.gateway.host,
    runner,
    observer,
  });
  await server.start();

  const gateway = server;
  let stopping: Promise<void> | null = null;

  return {
    runner,
    server: gateway,
    observer,
    engine: [command, ...engineArgs],
    stop: () => {
      stopping ??= (async () => {
        await runner.stop();
        await gateway.stop();
        observer.flush();
      })();
      return stopping;
    },
  };
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function serve(args: string[]): Promise<void> {
  const parsed = parseServeArgs(args);
  const config = loadConfig();
  const stack = await startServe(config, parsed);

  const address = stack.server.getAddress();
  const url = address ? `http://${address.host}:${address.port}` : '(unknown)';

  console.log('\n' + box('narrator', [
    kvRow('Gateway', `${GREEN}${BOLD}listening${RESET} on ${url}`),
    kvRow('Observers', `${url.replace(/^http/, 'ws')}/ws`),
    kvRow('Engine', stack.engine.join(' ')),
    kvRow('Log level', config.observability.logLevel),
  ]));
  console.log('');
  console.log(`  ${DIM}Routes:${RESET}`);
  console.log(`  ${DIM}  GET    /health   - liveness probe${RESET}`);
  console.log(`  ${DIM}  GET    /status   - run state and queue depths${RESET}`);
  console.log(`  ${DIM}  WS     /ws       - observer connection${RESET}`);
  console.log('');
  console.log(`  ${DIM}Waiting for an observer to send ${AMBER}start_game${DIM}. Press Ctrl+C to stop.${RESET}\n`);

  // Keep the process alive until interrupted.
  await new Promise<void>((resolve) => {
    const shutdown = async () => {
      try {
        await stack.stop();
        console.log(`\n  ${CHECK} ${DIM}Gateway stopped.${RESET}\n`);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`  ${CROSS} ${RED}Shutdown failed:${RESET} ${message}`);
        process.exitCode = 1;
      }
      resolve();
    };

    const onSignal = () => void shutdown();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}
