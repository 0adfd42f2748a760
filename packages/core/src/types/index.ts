/**
 * Shared types used across all narrator packages.
 */

// === Messages ===

/** The two output channels a message can travel on. */
export type ChannelName = 'narration' | 'debug';

export type MessageKind = 'narration' | 'debug' | 'system' | 'error' | 'info' | 'user-input';

/**
 * A classified unit of engine output (or a bridge-generated notice).
 * Instances are frozen by `createMessage` and never mutated afterwards.
 */
export interface BridgeMessage {
  readonly channel: ChannelName;
  readonly kind: MessageKind;
  readonly content: string;
  /** ISO-8601 creation time. */
  readonly timestamp: string;
  readonly isError: boolean;
}

/** Shape delivered to remote observers. `isError` only appears on debug-channel messages. */
export interface WireMessage {
  type: MessageKind;
  content: string;
  timestamp: string;
  isError?: boolean;
}

// === Classifier ===

/**
 * Lexical vocabulary used to recover structure from engine output.
 * Tied to one engine's log phrasing; every field can be overridden from config.
 */
export interface ClassifierRules {
  /** Substring that opens a narrative block. */
  narrativeMarker: string;
  /** Status lines start with `prefix` and contain at least one of `tokens`. */
  statusLine: {
    prefix: string;
    tokens: string[];
  };
  /** Severity tags that end a block and route the line to debug. */
  severityTags: string[];
  /** Line prefixes that identify an input prompt echo. */
  promptPrefixes: string[];
  /** Line prefixes emitted by the initiative tracker. */
  trackerMarkers: string[];
  /** Known diagnostic phrases, matched as substrings. */
  diagnosticPhrases: string[];
}

// === Runner ===

export type RunState = 'not-started' | 'running' | 'completed' | 'faulted' | 'restored';

export interface RunOutcome {
  status: 'completed' | 'faulted';
  /** Present when the run faulted. */
  error?: Error;
  /** Number of transport recoveries performed during the run (0 or 1). */
  recoveries: number;
  startedAt: Date;
  endedAt: Date;
}

/** Engine activity reported to status surfaces. */
export type EngineStatus = 'started' | 'ready' | 'processing' | 'stopped';

// === Configuration ===

export interface BridgeConfig {
  gateway: {
    port: number;
    host: string;
  };
  engine: {
    command?: string;
    args?: string[];
    cwd?: string;
    env?: Record<string, string>;
  };
  input: {
    pollIntervalMs: number;
    retryCeiling: number;
  };
  broadcast: {
    intervalMs: number;
  };
  classifier: ClassifierRules;
  observability: {
    observers: string[];
    logLevel: 'debug' | 'info' | 'warn' | 'error';
    logFile?: string;
  };
}
