/**
 * SubprocessEngine tests. Children are spawned from process.execPath with
 * inline scripts, so nothing outside the test process is required.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { EngineError } from '@narrator/core';
import { EngineRunner, type EngineConsole } from '@narrator/bridge';
import type { BridgeMessage } from '@narrator/core';
import { SubprocessEngine } from './subprocess.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ECHO_SCRIPT = [
  "const rl = require('node:readline').createInterface({ input: process.stdin });",
  "rl.on('line', (line) => {",
  "  if (line === 'quit') { process.exit(0); }",
  "  process.stdout.write('Dungeon Master: You said ' + line + '\\n');",
  '});',
].join('\n');

class FakeStream {
  readonly chunks: string[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/** A console whose stdin hands out `lines` and then waits forever. */
function makeConsole(lines: string[], signal = new AbortController().signal) {
  const stdout = new FakeStream();
  const stderr = new FakeStream();
  const queue = [...lines];
  const con: EngineConsole = {
    stdout,
    stderr,
    signal,
    stdin: {
      readLine: () => {
        const next = queue.shift();
        return next === undefined ? new Promise<string>(() => undefined) : Promise.resolve(next);
      },
    },
  };
  return { con, stdout, stderr };
}

function nodeEngine(script: string): SubprocessEngine {
  return new SubprocessEngine({ id: 'node-script', command: process.execPath, args: ['-e', script] });
}

// ============================================================================
// SubprocessEngine
// ============================================================================

describe('SubprocessEngine', () => {
  describe('constructor', () => {
    it('throws EngineError if command is empty', () => {
      expect(() => new SubprocessEngine({ command: '' })).toThrow(EngineError);
    });

    it('defaults the id', () => {
      expect(new SubprocessEngine({ command: 'true' }).id).toBe('subprocess');
    });
  });

  describe('run', () => {
    it('feeds input lines to the child and pipes its output to the console', async () => {
      const { con, stdout } = makeConsole(['hello\n', 'quit\n']);
      await nodeEngine(ECHO_SCRIPT).run(con);
      expect(stdout.text).toBe('Dungeon Master: You said hello\n');
    });

    it('pipes stderr separately', async () => {
      const { con, stdout, stderr } = makeConsole([]);
      await nodeEngine("process.stderr.write('ERROR: no save file\\n')").run(con);
      expect(stderr.text).toBe('ERROR: no save file\n');
      expect(stdout.text).toBe('');
    });

    it('rejects with EngineError on a nonzero exit code', async () => {
      const { con } = makeConsole([]);
      const run = nodeEngine('process.exit(3)').run(con);
      await expect(run).rejects.toBeInstanceOf(EngineError);
      await expect(run).rejects.toThrow('Engine exited with code 3');
    });

    it('rejects with EngineError when the binary cannot be spawned', async () => {
      const { con } = makeConsole([]);
      const engine = new SubprocessEngine({ command: '/nonexistent/narrator-engine-binary' });
      await expect(engine.run(con)).rejects.toThrow(/Failed to spawn/);
    });

    it('terminates the child and resolves when the signal aborts', async () => {
      const abort = new AbortController();
      const { con } = makeConsole([], abort.signal);
      const run = nodeEngine('setInterval(() => {}, 1000)').run(con);
      setTimeout(() => abort.abort(), 100);
      await expect(run).resolves.toBeUndefined();
    });

    it('does not spawn when already aborted', async () => {
      const abort = new AbortController();
      abort.abort();
      const { con, stdout } = makeConsole([], abort.signal);
      await nodeEngine("process.stdout.write('should not run\\n')").run(con);
      expect(stdout.text).toBe('');
    });
  });

  // -------------------------------------------------------------------------
  // Under the runner
  // -------------------------------------------------------------------------

  describe('under EngineRunner', () => {
    let runner: EngineRunner | null = null;

    afterEach(async () => {
      await runner?.stop();
      runner = null;
    });

    it('classifies child output into narration', async () => {
      const received: BridgeMessage[] = [];
      const stdout = new FakeStream();
      const stderr = new FakeStream();
      runner = new EngineRunner({
        entrypoint: nodeEngine(ECHO_SCRIPT).entrypoint,
        stdout,
        stderr,
        pollIntervalMs: 10,
      });
      runner.attach({ id: 'test', send: (m) => received.push(m) });

      await runner.start();
      runner.submitInput('open the door');
      runner.submitInput('quit');
      await runner.waitForRun();

      expect(received.filter((m) => m.channel === 'narration').map((m) => m.content)).toEqual([
        'You said open the door',
      ]);
      expect(runner.getOutcome()?.status).toBe('completed');
      expect(stdout.text).toBe('Dungeon Master: You said open the door\n');
    });
  });
});
