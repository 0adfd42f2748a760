/**
 * @narrator/bridge: console-to-network bridge: output classification,
 * channels, blocking-style input and the engine runner.
 */

export { MessageChannel, InputChannel, createOutputChannels } from './channel.js';
export type { OutputChannels, InputEvent } from './channel.js';
export { StreamClassifier, DEFAULT_CLASSIFIER_RULES } from './classifier.js';
export type { ClassifierMode, ClassifierSnapshot, StreamClassifierOpts, TeeTarget } from './classifier.js';
export { InputBridge, coerceInput, FALLBACK_LINE } from './input-bridge.js';
export type { InputBridgeOpts } from './input-bridge.js';
export { BroadcastLoop } from './broadcast-loop.js';
export type { BroadcastLoopOpts, MessageSink } from './broadcast-loop.js';
export { captureOriginalWrite, installWrite, restoreWrites } from './console-install.js';
export type { PatchableStream, StreamPatch } from './console-install.js';
export { EngineRunner, RUN_COMPLETED_MESSAGE, CONNECTION_RESTORED_MESSAGE } from './engine-runner.js';
export type {
  EngineConsole,
  EngineEntrypoint,
  EngineRunnerOpts,
  EngineStdin,
} from './engine-runner.js';
