/**
 * EngineRunner: owns one engine task at a time, its console wiring and the
 * broadcast loop.
 *
 *   not-started ──start()──▶ running ──▶ completed | faulted ──▶ restored
 *                               ▲                                   │
 *                               └──────────────start()──────────────┘
 *
 * Each run gets fresh channels, input channel and classifiers. The engine
 * entrypoint receives an EngineConsole whose stdout/stderr are the patched
 * stream objects and whose stdin is the InputBridge.
 *
 * A transport fault (broken pipe, closed socket) is survived once per run:
 * the console is rebuilt around the original streams and the entrypoint is
 * invoked again on the same channels. A second one ends the run as faulted.
 * Faults arrive either as a rejection from the entrypoint or as an 'error'
 * event on one of the patched streams; the latter aborts the console that
 * saw it so the superseded invocation winds down.
 */

import type {
  BridgeMessage,
  ClassifierRules,
  EngineStatus,
  IBridgeObserver,
  RunMeta,
  RunOutcome,
  RunState,
} from '@narrator/core';
import { EngineBusyError, TransportError, createMessage, generateId, isTransportFault, toError } from '@narrator/core';
import { BroadcastLoop, type MessageSink } from './broadcast-loop.js';
import { InputChannel, createOutputChannels, type OutputChannels } from './channel.js';
import { DEFAULT_CLASSIFIER_RULES, StreamClassifier } from './classifier.js';
import {
  captureOriginalWrite,
  installWrite,
  restoreWrites,
  type PatchableStream,
  type StreamPatch,
} from './console-install.js';
import { InputBridge } from './input-bridge.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EngineStdin {
  readLine(): Promise<string>;
}

/** What the engine sees in place of a terminal. */
export interface EngineConsole {
  stdout: PatchableStream;
  stderr: PatchableStream;
  stdin: EngineStdin;
  /** Aborted when the runner is asked to stop, or when this console is replaced after a stream fault. */
  signal: AbortSignal;
}

export type EngineEntrypoint = (console: EngineConsole) => Promise<void> | void;

export const RUN_COMPLETED_MESSAGE = 'Engine run completed';
export const CONNECTION_RESTORED_MESSAGE = 'Connection restored. You may continue playing.';

export interface EngineRunnerOpts {
  entrypoint: EngineEntrypoint;
  /** Name used in logs and run metadata. Default: 'engine'. */
  engineName?: string;
  stdout?: PatchableStream;
  stderr?: PatchableStream;
  rules?: ClassifierRules;
  pollIntervalMs?: number;
  retryCeiling?: number;
  broadcastIntervalMs?: number;
  observer?: IBridgeObserver;
  onStatus?: (status: EngineStatus) => void;
}

/** Per-run state. Classifiers and the input bridge are replaced on recovery. */
interface RunContext extends InstalledConsole {
  meta: RunMeta;
  channels: OutputChannels;
  input: InputChannel;
  abort: AbortController;
  recoveries: number;
}

interface InstalledConsole {
  classifiers: StreamClassifier[];
  patches: StreamPatch[];
  console: EngineConsole;
  /** Aborted by stop() or when this console is replaced after a stream fault. */
  scope: AbortController;
  /** Resolves with the first transport fault a patched stream reports. */
  streamFault: Promise<Error>;
}

// ---------------------------------------------------------------------------
// EngineRunner
// ---------------------------------------------------------------------------

export class EngineRunner {
  private readonly entrypoint: EngineEntrypoint;
  private readonly engineName: string;
  private readonly stdout: PatchableStream;
  private readonly stderr: PatchableStream;
  private readonly rules: ClassifierRules;
  private readonly pollIntervalMs: number;
  private readonly retryCeiling: number;
  private readonly observer: IBridgeObserver | null;
  private readonly onStatus: ((status: EngineStatus) => void) | null;
  private readonly broadcast: BroadcastLoop;

  private state: RunState = 'not-started';
  private outcome: RunOutcome | null = null;
  private channels: OutputChannels;
  private ctx: RunContext | null = null;
  private runPromise: Promise<void> | null = null;

  constructor(opts: EngineRunnerOpts) {
    this.entrypoint = opts.entrypoint;
    this.engineName = opts.engineName ?? 'engine';
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
    this.rules = opts.rules ?? DEFAULT_CLASSIFIER_RULES;
    this.pollIntervalMs = opts.pollIntervalMs ?? 100;
    this.retryCeiling = opts.retryCeiling ?? 1000;
    this.observer = opts.observer ?? null;
    this.onStatus = opts.onStatus ?? null;
    this.channels = createOutputChannels();
    this.broadcast = new BroadcastLoop({
      channels: this.channels,
      intervalMs: opts.broadcastIntervalMs,
      observer: opts.observer,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Begin a run. Resolves once the console is installed; the entrypoint
   * itself is invoked on a later tick. Rejects with EngineBusyError while a run
   * is in progress.
   */
  async start(): Promise<void> {
    if (this.runPromise) {
      throw new EngineBusyError(this.engineName, { state: this.state });
    }

    // Output nobody has received yet (no observer attached, or published
    // between runs) moves over to the new run's channels.
    const channels = createOutputChannels();
    for (const message of this.channels.narration.drainAll()) channels.narration.enqueue(message);
    for (const message of this.channels.debug.drainAll()) channels.debug.enqueue(message);
    this.channels = channels;
    this.broadcast.useChannels(channels);

    const input = new InputChannel();
    const abort = new AbortController();
    const ctx: RunContext = {
      meta: { runId: generateId(12), engine: this.engineName, startedAt: new Date() },
      channels,
      input,
      abort,
      recoveries: 0,
      ...this.installConsole(channels, input, abort.signal),
    };
    this.ctx = ctx;
    this.outcome = null;
    this.state = 'running';

    this.broadcast.start();
    this.observer?.onRunStart(ctx.meta);
    this.emitStatus('started');

    this.runPromise = new Promise<void>((resolve) => {
      setImmediate(() => {
        this.execute(ctx).then(resolve, (err: unknown) => {
          // execute() settles every path itself; reaching here is a bug in the runner.
          this.observer?.log('error', 'Engine runner failed unexpectedly', { error: toError(err).message });
          resolve();
        });
      });
    });
  }

  /**
   * Abort the run's signal and close its input channel so a pending read
   * returns, wait for the run to finish, then sweep once more and stop the
   * broadcast loop.
   */
  async stop(): Promise<void> {
    if (this.ctx && this.runPromise) {
      this.ctx.abort.abort();
    }
    this.ctx?.input.close();
    if (this.runPromise) {
      await this.runPromise;
    }
    this.broadcast.sweep();
    this.broadcast.stop();
  }

  /** Resolves when the current run (if any) has finished and its streams are restored. */
  async waitForRun(): Promise<void> {
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  // ---------------------------------------------------------------------------
  // Queries and input
  // ---------------------------------------------------------------------------

  getState(): RunState {
    return this.state;
  }

  getOutcome(): RunOutcome | null {
    return this.outcome;
  }

  getChannels(): OutputChannels {
    return this.channels;
  }

  isRunning(): boolean {
    return this.runPromise !== null;
  }

  get observerCount(): number {
    return this.broadcast.sinkCount;
  }

  /** Queue an input value for the engine. Returns false when no run accepts input. */
  submitInput(value: unknown): boolean {
    const input = this.ctx?.input;
    if (!input || input.isClosed()) {
      this.observer?.log('debug', 'Input dropped, no active run');
      return false;
    }
    input.push(value);
    return true;
  }

  /**
   * Queue a message on the current channels and deliver it right away,
   * whether or not a run is active.
   */
  publish(message: BridgeMessage): void {
    const channel = message.channel === 'narration' ? this.channels.narration : this.channels.debug;
    channel.enqueue(message);
    this.broadcast.sweep();
  }

  /** Register a remote observer. Returns a function that detaches it. */
  attach(sink: MessageSink): () => void {
    return this.broadcast.attach(sink);
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private async execute(ctx: RunContext): Promise<void> {
    let failure: Error | null = null;

    for (;;) {
      try {
        const invocation = (async () => this.entrypoint(ctx.console))();
        const streamFault = await Promise.race([invocation.then(() => null), ctx.streamFault]);
        if (streamFault) {
          ctx.scope.abort();
          invocation.catch((err: unknown) => {
            this.observer?.log('debug', 'Superseded engine invocation failed', { error: toError(err).message });
          });
          throw streamFault;
        }
        break;
      } catch (err) {
        if (isTransportFault(err) && ctx.recoveries === 0) {
          ctx.recoveries++;
          this.observer?.onFault('transport', toError(err), { runId: ctx.meta.runId, recovering: true });
          this.recover(ctx);
          continue;
        }
        failure = isTransportFault(err)
          ? new TransportError(toError(err).message, { runId: ctx.meta.runId, recoveries: ctx.recoveries })
          : toError(err);
        break;
      }
    }

    this.finish(ctx, failure);
  }

  /** Tear down the console and rebuild it around the original streams, keeping the channels. */
  private recover(ctx: RunContext): void {
    restoreWrites(ctx.patches, ctx.classifiers, this.observer ?? undefined);
    Object.assign(ctx, this.installConsole(ctx.channels, ctx.input, ctx.abort.signal));
    ctx.channels.narration.enqueue(createMessage('narration', 'info', CONNECTION_RESTORED_MESSAGE));
  }

  private finish(ctx: RunContext, failure: Error | null): void {
    ctx.input.close();
    restoreWrites(ctx.patches, ctx.classifiers, this.observer ?? undefined);
    ctx.patches = [];
    ctx.classifiers = [];

    const outcome: RunOutcome = {
      status: failure ? 'faulted' : 'completed',
      recoveries: ctx.recoveries,
      startedAt: ctx.meta.startedAt,
      endedAt: new Date(),
      ...(failure ? { error: failure } : {}),
    };
    this.outcome = outcome;
    this.state = outcome.status;

    if (failure) {
      this.observer?.onFault(isTransportFault(failure) ? 'transport' : 'engine', failure, { runId: ctx.meta.runId });
      ctx.channels.debug.enqueue(createMessage('debug', 'error', `Game error: ${failure.message}`, { isError: true }));
    } else {
      ctx.channels.debug.enqueue(createMessage('debug', 'info', RUN_COMPLETED_MESSAGE));
    }

    this.observer?.onRunEnd(ctx.meta, outcome);
    this.broadcast.sweep();

    this.state = 'restored';
    this.runPromise = null;
    this.emitStatus('stopped');
  }

  /** Build classifiers and the input bridge, and patch both streams. */
  private installConsole(channels: OutputChannels, input: InputChannel, signal: AbortSignal): InstalledConsole {
    const observer = this.observer ?? undefined;

    const scope = new AbortController();
    if (signal.aborted) {
      scope.abort();
    } else {
      signal.addEventListener('abort', () => scope.abort(), { once: true });
    }

    let reportFault: (err: Error) => void = () => undefined;
    const streamFault = new Promise<Error>((resolve) => {
      reportFault = resolve;
    });
    const onStreamError = (stream: string) => (err: Error) => {
      if (isTransportFault(err)) {
        reportFault(err);
      } else {
        this.observer?.log('warn', 'Console stream error', { stream, error: err.message });
      }
    };

    const stdoutClassifier = new StreamClassifier({
      streamName: 'stdout',
      channels,
      tee: captureOriginalWrite(this.stdout),
      rules: this.rules,
      observer,
    });
    const stderrClassifier = new StreamClassifier({
      streamName: 'stderr',
      isErrorStream: true,
      channels,
      tee: captureOriginalWrite(this.stderr),
      rules: this.rules,
      observer,
    });

    const inputBridge = new InputBridge({
      input,
      pollIntervalMs: this.pollIntervalMs,
      retryCeiling: this.retryCeiling,
      onWaiting: () => this.emitStatus('ready'),
      onInput: () => this.emitStatus('processing'),
      observer,
    });

    return {
      classifiers: [stdoutClassifier, stderrClassifier],
      patches: [
        installWrite('stdout', this.stdout, stdoutClassifier, onStreamError('stdout')),
        installWrite('stderr', this.stderr, stderrClassifier, onStreamError('stderr')),
      ],
      console: {
        stdout: this.stdout,
        stderr: this.stderr,
        stdin: { readLine: () => inputBridge.readLine() },
        signal: scope.signal,
      },
      scope,
      streamFault,
    };
  }

  private emitStatus(status: EngineStatus): void {
    if (!this.onStatus) return;
    try {
      this.onStatus(status);
    } catch (err) {
      this.observer?.log('warn', 'Status hook failed', { status, error: toError(err).message });
    }
  }
}
