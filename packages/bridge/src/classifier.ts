/**
 * StreamClassifier: recovers narration blocks and diagnostics from raw
 * engine output.
 *
 * One instance wraps one physical output stream (stdout or stderr). Every
 * chunk is teed unaltered to the underlying stream, then reassembled into
 * complete lines and classified:
 *
 *   idle ──(narrative marker)──▶ capturing-block
 *     ▲                               │
 *     └──(log-marker / status line)───┘  block flushed to narration,
 *                                        terminating line routed to debug
 *
 * The engine was never written to emit structured events, so the rules are
 * lexical and positional. The vocabulary lives in ClassifierRules and is
 * overridable from config; anything unmatched defaults to the debug channel.
 */

import type { BridgeMessage, ClassifierRules, IBridgeObserver, MessageKind } from '@narrator/core';
import { ClassificationError, createMessage, stripAnsi, toError } from '@narrator/core';
import type { OutputChannels } from './channel.js';

// ---------------------------------------------------------------------------
// Default vocabulary
// ---------------------------------------------------------------------------

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = {
  narrativeMarker: 'Dungeon Master:',
  statusLine: {
    prefix: '[',
    tokens: ['HP:', 'XP:'],
  },
  severityTags: ['DEBUG:', 'ERROR:', 'WARNING:'],
  promptPrefixes: ['>'],
  trackerMarkers: ['[X]', '[>]', '[ ]', '[D]', '[S]', '[P]', '[U]', '[-]'],
  diagnosticPhrases: [
    'Lightweight chat history updated',
    'System messages removed:',
    'User messages:',
    'Assistant messages:',
    'not found. Skipping',
    'not found. Returning None',
    'has an invalid JSON format',
    'Current Time:',
    'Time Advanced:',
    'New Time:',
    'Days Passed:',
    'Loading module areas',
    'Graph built:',
    '[OK] Loaded',
  ],
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ClassifierMode = 'idle' | 'capturing-block';

/** Anything with a write method; process.stdout and process.stderr qualify. */
export interface TeeTarget {
  write(chunk: string | Uint8Array, ...args: unknown[]): unknown;
}

export interface StreamClassifierOpts {
  /** Label used in logs and fault context ('stdout', 'stderr'). */
  streamName: string;
  /** Lines from an error stream are tagged isError when routed to debug. */
  isErrorStream?: boolean;
  channels: OutputChannels;
  /** Receives every chunk unaltered. */
  tee?: TeeTarget;
  rules?: ClassifierRules;
  observer?: IBridgeObserver;
}

export interface ClassifierSnapshot {
  mode: ClassifierMode;
  lineCarry: string;
  blockBuffer: readonly string[];
}

// ---------------------------------------------------------------------------
// StreamClassifier
// ---------------------------------------------------------------------------

export class StreamClassifier {
  readonly streamName: string;
  private readonly isErrorStream: boolean;
  private readonly channels: OutputChannels;
  private readonly tee: TeeTarget | null;
  private readonly rules: ClassifierRules;
  private readonly observer: IBridgeObserver | null;
  private readonly decoder = new TextDecoder();

  private mode: ClassifierMode = 'idle';
  private lineCarry = '';
  private blockBuffer: string[] = [];

  constructor(opts: StreamClassifierOpts) {
    this.streamName = opts.streamName;
    this.isErrorStream = opts.isErrorStream ?? false;
    this.channels = opts.channels;
    this.tee = opts.tee ?? null;
    this.rules = opts.rules ?? DEFAULT_CLASSIFIER_RULES;
    this.observer = opts.observer ?? null;
  }

  /**
   * Accept a fragment of output. Extra arguments (encoding, callback) are
   * passed through to the tee target. Always returns true.
   */
  write(chunk: string | Uint8Array, ...args: unknown[]): boolean {
    this.teeWrite(chunk, args);

    const text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    const segments = (this.lineCarry + text).split('\n');
    this.lineCarry = segments.pop() ?? '';

    for (const segment of segments) {
      this.processLine(segment);
    }
    return true;
  }

  /**
   * End of stream: classify a pending partial line (including any bytes the
   * decoder still holds), then emit any open block even though no terminating
   * line arrived.
   */
  flush(): void {
    this.lineCarry += this.decoder.decode();
    if (this.lineCarry) {
      const pending = this.lineCarry;
      this.lineCarry = '';
      this.processLine(pending);
    }
    if (this.mode === 'capturing-block') {
      this.flushBlock();
    }
  }

  getSnapshot(): ClassifierSnapshot {
    return {
      mode: this.mode,
      lineCarry: this.lineCarry,
      blockBuffer: [...this.blockBuffer],
    };
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private teeWrite(chunk: string | Uint8Array, args: unknown[]): void {
    if (!this.tee) return;
    try {
      this.tee.write(chunk, ...args);
    } catch (err) {
      this.observer?.onFault('transport', toError(err), { stream: this.streamName, site: 'tee' });
    }
  }

  private processLine(rawLine: string): void {
    const line = stripAnsi(rawLine).replace(/\r$/, '');
    try {
      this.classify(line);
    } catch (err) {
      const cause = toError(err);
      this.observer?.onFault(
        'classification',
        new ClassificationError(cause.message, this.streamName),
        { line },
      );
      if (this.mode === 'capturing-block') this.flushBlock();
      if (line.trim()) {
        this.emitDebug('debug', line, this.lineIsError(line));
      }
    }
  }

  private classify(line: string): void {
    const blank = line.trim() === '';

    if (this.isStatusLine(line)) {
      if (this.mode === 'capturing-block') this.flushBlock();
      this.emitDebug('debug', line, false);
      return;
    }

    if (line.includes(this.rules.narrativeMarker)) {
      if (this.mode === 'capturing-block') this.flushBlock();
      this.mode = 'capturing-block';
      this.blockBuffer = [line];
      return;
    }

    if (this.mode === 'capturing-block') {
      if (blank) {
        this.blockBuffer.push('');
      } else if (this.isLogMarker(line)) {
        this.flushBlock();
        this.emitDebug('debug', line, this.lineIsError(line));
      } else {
        this.blockBuffer.push(line);
      }
      return;
    }

    if (blank) return;

    if (this.isDiagnostic(line)) {
      this.emitDebug('debug', line, false);
    } else {
      this.emitDebug('debug', line, this.lineIsError(line));
    }
  }

  /** Emit the buffered block to narration (unless empty) and return to idle. */
  private flushBlock(): void {
    const content = this.blockBuffer
      .join('\n')
      .replace(this.rules.narrativeMarker, '')
      .trim();
    this.mode = 'idle';
    this.blockBuffer = [];

    if (content) {
      this.channels.narration.enqueue(createMessage('narration', 'narration', content));
    }
  }

  private emitDebug(kind: MessageKind, content: string, isError: boolean): void {
    const message: BridgeMessage = createMessage('debug', kind, content, { isError });
    this.channels.debug.enqueue(message);
  }

  // ---- rule predicates ----------------------------------------------------

  private isStatusLine(line: string): boolean {
    const { prefix, tokens } = this.rules.statusLine;
    return line.startsWith(prefix) && tokens.some((t) => line.includes(t));
  }

  private isDiagnostic(line: string): boolean {
    return this.rules.diagnosticPhrases.some((p) => line.includes(p));
  }

  private isLogMarker(line: string): boolean {
    return (
      this.isDiagnostic(line) ||
      this.rules.severityTags.some((t) => line.includes(t)) ||
      this.isStatusLine(line) ||
      this.rules.promptPrefixes.some((p) => line.startsWith(p)) ||
      this.rules.trackerMarkers.some((m) => line.startsWith(m))
    );
  }

  private lineIsError(line: string): boolean {
    return this.isErrorStream || line.includes('ERROR:');
  }
}
