import { describe, it, expect, vi } from 'vitest';
import type { IBridgeObserver } from '@narrator/core';
import { createOutputChannels } from './channel.js';
import { StreamClassifier } from './classifier.js';
import { captureOriginalWrite, installWrite, restoreWrites } from './console-install.js';

class FakeStream {
  readonly written: string[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.written.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
    return true;
  }
}

function makeObserver() {
  return {
    onRunStart: vi.fn(),
    onRunEnd: vi.fn(),
    onFault: vi.fn(),
    onObserverAttached: vi.fn(),
    onObserverDetached: vi.fn(),
    log: vi.fn(),
    flush: vi.fn(),
  } satisfies IBridgeObserver;
}

function setup(stream: FakeStream) {
  const channels = createOutputChannels();
  const classifier = new StreamClassifier({
    streamName: 'stdout',
    channels,
    tee: captureOriginalWrite(stream),
  });
  const patch = installWrite('stdout', stream, classifier);
  return { channels, classifier, patch };
}

describe('installWrite', () => {
  it('routes writes through the classifier and tees the raw text', () => {
    const stream = new FakeStream();
    const { channels, classifier, patch } = setup(stream);

    expect(patch.hadOwnWrite).toBe(false);
    expect(Object.prototype.hasOwnProperty.call(stream, 'write')).toBe(true);

    stream.write('Dungeon Master: The door creaks.\nDEBUG: tick\n');

    expect(stream.written).toEqual(['Dungeon Master: The door creaks.\nDEBUG: tick\n']);
    expect(channels.narration.drainAll().map((m) => m.content)).toEqual(['The door creaks.']);
    expect(channels.debug.drainAll().map((m) => m.content)).toEqual(['DEBUG: tick']);
    expect(classifier.getSnapshot().mode).toBe('idle');
  });
});

describe('restoreWrites', () => {
  it('flushes pending output and removes the patched write', () => {
    const stream = new FakeStream();
    const { channels, classifier, patch } = setup(stream);

    stream.write('Dungeon Master: Half a sentence');
    expect(channels.narration.size).toBe(0);

    expect(restoreWrites([patch], [classifier])).toBe(0);

    expect(channels.narration.drainAll().map((m) => m.content)).toEqual(['Half a sentence']);
    expect(Object.prototype.hasOwnProperty.call(stream, 'write')).toBe(false);

    // Writes now bypass classification.
    stream.write('Dungeon Master: After\n\n');
    expect(channels.narration.size).toBe(0);
    expect(stream.written).toEqual(['Dungeon Master: Half a sentence', 'Dungeon Master: After\n\n']);
  });

  it('puts back a write that was an own property', () => {
    const stream = new FakeStream();
    const ownWrite = (chunk: string | Uint8Array): boolean => FakeStream.prototype.write.call(stream, chunk);
    Object.assign(stream, { write: ownWrite });
    const { classifier, patch } = setup(stream);

    expect(patch.hadOwnWrite).toBe(true);
    expect(stream.write).not.toBe(ownWrite);

    restoreWrites([patch], [classifier]);
    expect(stream.write).toBe(ownWrite);
  });

  it('reports a failing flush and still restores the stream', () => {
    const stream = new FakeStream();
    const observer = makeObserver();
    const { classifier, patch } = setup(stream);
    const boom = new Error('boom');
    vi.spyOn(classifier, 'flush').mockImplementation(() => {
      throw boom;
    });

    expect(restoreWrites([patch], [classifier], observer)).toBe(1);

    expect(observer.onFault).toHaveBeenCalledWith('transport', boom, { stream: 'stdout', site: 'flush' });
    expect(Object.prototype.hasOwnProperty.call(stream, 'write')).toBe(false);
  });
});
