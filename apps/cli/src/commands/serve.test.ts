/**
 * Tests for the serve command: argument parsing and the assembled stack.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { ConfigError } from '@narrator/core';
import { NoopObserver } from '@narrator/observability';
import { getDefaultConfig } from '../config.js';
import { parseServeArgs, startServe, type ServeStack } from './serve.js';

describe('parseServeArgs', () => {
  it('returns nothing for no arguments', () => {
    expect(parseServeArgs([])).toEqual({});
  });

  it('reads port, host and the engine command after --', () => {
    expect(parseServeArgs(['--port', '9001', '--host', '0.0.0.0', '--', 'dm-engine', '--seed', '7'])).toEqual({
      port: 9001,
      host: '0.0.0.0',
      engine: ['dm-engine', '--seed', '7'],
    });
  });

  it('accepts -p as a port alias', () => {
    expect(parseServeArgs(['-p', '0'])).toEqual({ port: 0 });
  });

  it('ignores a bare --', () => {
    expect(parseServeArgs(['--'])).toEqual({});
  });

  it('rejects a bad port', () => {
    expect(() => parseServeArgs(['--port', 'abc'])).toThrow('Invalid --port value: abc');
    expect(() => parseServeArgs(['--port'])).toThrow('Invalid --port value: (missing)');
    expect(() => parseServeArgs(['--port', '70000'])).toThrow(ConfigError);
  });

  it('rejects unknown options', () => {
    expect(() => parseServeArgs(['--verbose'])).toThrow('Unknown serve option: --verbose');
  });
});

describe('startServe', () => {
  let stack: ServeStack | null = null;

  afterEach(async () => {
    await stack?.stop();
    stack = null;
  });

  it('requires an engine command', async () => {
    await expect(startServe(getDefaultConfig(), { port: 0 }, new NoopObserver())).rejects.toThrow(
      'No engine command. Pass one after -- or set engine.command in ~/.narrator/config.json',
    );
  });

  it('falls back to engine.command and engine.args from config', async () => {
    const config = getDefaultConfig();
    config.engine.command = process.execPath;
    config.engine.args = ['-e', 'process.exit(0)'];

    stack = await startServe(config, { port: 0 }, new NoopObserver());

    expect(stack.engine).toEqual([process.execPath, '-e', 'process.exit(0)']);
    expect(stack.runner.getState()).toBe('not-started');
  });

  it('serves health and runs the engine to completion', async () => {
    stack = await startServe(
      getDefaultConfig(),
      { port: 0, engine: [process.execPath, '-e', 'process.stdout.write("Dungeon Master: Hi\\n")'] },
      new NoopObserver(),
    );

    const address = stack.server.getAddress();
    expect(address).not.toBeNull();
    const res = await fetch(`http://127.0.0.1:${address?.port ?? 0}/health`);
    expect(res.status).toBe(200);

    await stack.runner.start();
    await stack.runner.waitForRun();

    expect(stack.runner.getOutcome()?.status).toBe('completed');
    expect(stack.runner.getChannels().narration.size).toBe(1);
  });

  it('stop is idempotent and closes the server', async () => {
    const config = getDefaultConfig();
    config.engine.command = process.execPath;
    stack = await startServe(config, { port: 0 }, new NoopObserver());

    const first = stack.stop();
    const second = stack.stop();
    expect(second).toBe(first);
    await first;

    expect(stack.server.getAddress()).toBeNull();
  });
});
