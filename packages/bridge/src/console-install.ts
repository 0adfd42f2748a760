/**
 * Install and restore classifier-wrapped `write` functions on stream objects.
 *
 * The original write is captured before patching and used as the
 * classifier's tee target, so raw output still reaches the terminal.
 */

import type { IBridgeObserver } from '@narrator/core';
import { toError } from '@narrator/core';
import type { StreamClassifier, TeeTarget } from './classifier.js';

/** A stream whose `write` can be swapped out (process.stdout, process.stderr, test doubles). */
export type PatchableStream = TeeTarget;

type WriteFn = PatchableStream['write'];

type ErrorListener = (err: Error) => void;

/** Streams that report asynchronous failures (EPIPE and friends) as 'error' events. */
interface ErrorEmitter {
  on(event: 'error', listener: ErrorListener): unknown;
  off(event: 'error', listener: ErrorListener): unknown;
}

function emitsErrors(stream: PatchableStream): stream is PatchableStream & ErrorEmitter {
  return (
    'on' in stream && typeof stream.on === 'function' && 'off' in stream && typeof stream.off === 'function'
  );
}

export interface StreamPatch {
  readonly name: string;
  readonly stream: PatchableStream;
  readonly original: WriteFn;
  /** Whether `write` was an own property before patching. */
  readonly hadOwnWrite: boolean;
  /** 'error' listener added by installWrite, removed again on restore. */
  readonly errorListener?: ErrorListener;
}

/** A tee target that always writes through the stream's current (unpatched) write. */
export function captureOriginalWrite(stream: PatchableStream): TeeTarget {
  const original = stream.write;
  return {
    write: (chunk, ...args) => original.call(stream, chunk, ...args),
  };
}

/**
 * Route every write on `stream` through `classifier`. When `onError` is given
 * and the stream is an event emitter, its 'error' events go to `onError`
 * while the patch is installed.
 */
export function installWrite(
  name: string,
  stream: PatchableStream,
  classifier: StreamClassifier,
  onError?: ErrorListener,
): StreamPatch {
  let errorListener: ErrorListener | undefined;
  if (onError && emitsErrors(stream)) {
    errorListener = (err) => onError(err);
    stream.on('error', errorListener);
  }
  const patch: StreamPatch = {
    name,
    stream,
    original: stream.write,
    hadOwnWrite: Object.prototype.hasOwnProperty.call(stream, 'write'),
    ...(errorListener ? { errorListener } : {}),
  };
  stream.write = (chunk, ...args) => classifier.write(chunk, ...args);
  return patch;
}

/**
 * Flush every classifier, then put every original write back. Each step is
 * attempted on its own; a failure is reported and the remaining steps still run.
 * Returns the number of failed steps.
 */
export function restoreWrites(
  patches: readonly StreamPatch[],
  classifiers: readonly StreamClassifier[],
  observer?: IBridgeObserver,
): number {
  let failures = 0;

  for (const classifier of classifiers) {
    try {
      classifier.flush();
    } catch (err) {
      failures++;
      observer?.onFault('transport', toError(err), { stream: classifier.streamName, site: 'flush' });
    }
  }

  for (const patch of patches) {
    try {
      if (patch.hadOwnWrite) {
        patch.stream.write = patch.original;
      } else {
        Reflect.deleteProperty(patch.stream, 'write');
      }
    } catch (err) {
      failures++;
      observer?.onFault('transport', toError(err), { stream: patch.name, site: 'restore' });
    }
    if (patch.errorListener && emitsErrors(patch.stream)) {
      patch.stream.off('error', patch.errorListener);
    }
  }

  return failures;
}
