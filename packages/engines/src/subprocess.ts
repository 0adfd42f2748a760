/**
 * SubprocessEngine: runs an external line-oriented CLI engine under the
 * bridge console.
 *
 * The child's stdout/stderr are piped into the console streams (and so
 * through the classifiers), and every line the InputBridge returns is
 * written to the child's stdin. The run ends when the child exits:
 * exit code 0 (or a stop request) completes it, anything else is an
 * EngineError. A broken stdin pipe surfaces as a TransportError so the
 * runner can restart the child once.
 *
 * Zero external dependencies; uses Node.js child_process only.
 */

import type { EngineConsole, EngineEntrypoint } from '@narrator/bridge';
import { EngineError, TransportError, isTransportFault, toError } from '@narrator/core';
import { spawn, type ChildProcess } from 'node:child_process';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface SubprocessEngineConfig {
  /** Engine ID used in logs and errors. Default: 'subprocess'. */
  id?: string;
  /** Path or name of the binary to spawn. */
  command: string;
  /** Arguments passed to the binary. */
  args?: string[];
  /** Environment variables layered over process.env. */
  env?: Record<string, string>;
  /** Working directory for the subprocess. */
  cwd?: string;
}

interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

// ---------------------------------------------------------------------------
// SubprocessEngine
// ---------------------------------------------------------------------------

export class SubprocessEngine {
  readonly id: string;

  private readonly command: string;
  private readonly args: string[];
  private readonly env: Record<string, string>;
  private readonly cwd?: string;

  constructor(config: SubprocessEngineConfig) {
    if (!config.command) {
      throw new EngineError('SubprocessEngine requires a "command" in config', config.id ?? 'subprocess');
    }

    this.id = config.id ?? 'subprocess';
    this.command = config.command;
    this.args = config.args ?? [];
    this.env = config.env ?? {};
    this.cwd = config.cwd;
  }

  /** The engine as an EngineRunner entrypoint. */
  get entrypoint(): EngineEntrypoint {
    return (con) => this.run(con);
  }

  /** Run one child process to completion against `con`. */
  async run(con: EngineConsole): Promise<void> {
    if (con.signal.aborted) return;

    const child = await this.spawnChild();
    const onAbort = () => {
      child.kill('SIGTERM');
    };
    con.signal.addEventListener('abort', onAbort, { once: true });

    let exited = false;
    const exitPromise = new Promise<ExitInfo>((resolve) => {
      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        exited = true;
        resolve({ code, signal });
      });
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      con.stdout.write(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      con.stderr.write(chunk);
    });
    // Write failures are reported through the write callback below.
    child.stdin?.on('error', () => undefined);

    try {
      while (!exited && !con.signal.aborted) {
        const line = await Promise.race([con.stdin.readLine(), exitPromise.then(() => null)]);
        if (line === null || exited || con.signal.aborted) break;
        await this.writeInput(child, line);
      }

      const exit = await exitPromise;
      if (con.signal.aborted) return;
      if (exit.code !== 0) {
        const reason = exit.code === null ? `signal ${exit.signal ?? 'unknown'}` : `code ${exit.code}`;
        throw new EngineError(`Engine exited with ${reason}`, this.id, { code: exit.code, signal: exit.signal });
      }
    } finally {
      con.signal.removeEventListener('abort', onAbort);
      child.stdout?.removeAllListeners('data');
      child.stderr?.removeAllListeners('data');
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    }
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private writeInput(child: ChildProcess, line: string): Promise<void> {
    const stdin = child.stdin;
    if (!stdin || stdin.destroyed) {
      return Promise.reject(new TransportError('Engine input pipe is closed', { engine: this.id }));
    }
    return new Promise((resolve, reject) => {
      stdin.write(line, (err) => {
        if (!err) {
          resolve();
        } else if (isTransportFault(err)) {
          reject(new TransportError(`Engine input pipe failed: ${err.message}`, { engine: this.id }));
        } else {
          reject(err);
        }
      });
    });
  }

  private spawnChild(): Promise<ChildProcess> {
    return new Promise((resolve, reject) => {
      try {
        const child = spawn(this.command, this.args, {
          env: { ...process.env, ...this.env },
          cwd: this.cwd ?? process.cwd(),
          stdio: ['pipe', 'pipe', 'pipe'],
        });

        child.once('error', (err) => {
          reject(new EngineError(`Failed to spawn "${this.command}": ${err.message}`, this.id));
        });
        child.once('spawn', () => {
          resolve(child);
        });
      } catch (err) {
        reject(new EngineError(`Failed to create subprocess: ${toError(err).message}`, this.id));
      }
    });
  }
}
