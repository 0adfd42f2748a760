import { describe, it, expect, afterEach, vi } from 'vitest';
import { TransportError, createMessage } from '@narrator/core';
import { InputChannel, MessageChannel, createOutputChannels } from './channel.js';

describe('MessageChannel', () => {
  it('drains in FIFO order and empties the queue', () => {
    const channel = new MessageChannel('debug');
    channel.enqueue(createMessage('debug', 'debug', 'one'));
    channel.enqueue(createMessage('debug', 'debug', 'two'));
    expect(channel.size).toBe(2);

    expect(channel.drainAll().map((m) => m.content)).toEqual(['one', 'two']);
    expect(channel.size).toBe(0);
    expect(channel.drainAll()).toEqual([]);
  });

  it('creates a fresh named pair per call', () => {
    const a = createOutputChannels();
    const b = createOutputChannels();
    expect(a.narration.name).toBe('narration');
    expect(a.debug.name).toBe('debug');
    expect(a.narration).not.toBe(b.narration);
  });
});

describe('InputChannel', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a queued value without waiting', async () => {
    const input = new InputChannel();
    input.push('look');
    await expect(input.take(1000)).resolves.toEqual({ value: 'look' });
    expect(input.size).toBe(0);
  });

  it('wakes a waiting reader as soon as a value is pushed', async () => {
    vi.useFakeTimers();
    const input = new InputChannel();
    const pending = input.take(1000);
    input.push(undefined);
    await expect(pending).resolves.toEqual({ value: undefined });
  });

  it('resolves null after the timeout', async () => {
    vi.useFakeTimers();
    const input = new InputChannel();
    const pending = input.take(100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toBeNull();

    // A value pushed after the timeout is queued, not lost.
    input.push('late');
    expect(input.size).toBe(1);
  });

  it('rejects pending and future reads once closed', async () => {
    const input = new InputChannel();
    const pending = input.take(1000);
    input.close();

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(input.take(10)).rejects.toBeInstanceOf(TransportError);
    expect(input.isClosed()).toBe(true);
    expect(() => input.push('x')).toThrow(TransportError);
  });

  it('still hands out values queued before close', async () => {
    const input = new InputChannel();
    input.push('queued');
    input.close();
    await expect(input.take(10)).resolves.toEqual({ value: 'queued' });
  });
});
