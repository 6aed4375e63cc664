import { describe, it, expect, vi, afterEach } from 'vitest';
import { MessageReader, ReadDeadlineError, TransportClosedError } from '../../src/bridge/message-reader.js';
import { FakeTransport } from '../helpers/fakes.js';

describe('MessageReader', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns frames that arrived before the read', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    transport.receive('first');
    transport.receive('second');

    await expect(reader.next(100)).resolves.toBe('first');
    await expect(reader.next(100)).resolves.toBe('second');
  });

  it('resolves a pending read when a frame arrives', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    const pending = reader.next(1000);
    transport.receive('hello');
    await expect(pending).resolves.toBe('hello');
  });

  it('rejects with ReadDeadlineError after the timeout', async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    const pending = reader.next(30_000);
    const assertion = expect(pending).rejects.toThrow(ReadDeadlineError);
    await vi.advanceTimersByTimeAsync(30_000);
    await assertion;
  });

  it('clears the deadline once a frame arrives', async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);

    const first = reader.next(100);
    transport.receive('in time');
    await expect(first).resolves.toBe('in time');

    // A later, longer read must not be cut short by the first deadline
    const second = reader.next(10_000);
    await vi.advanceTimersByTimeAsync(500);
    transport.receive('later');
    await expect(second).resolves.toBe('later');
  });

  it('rejects a pending read when the transport closes', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    const pending = reader.next(1000);
    transport.close();
    await expect(pending).rejects.toThrow(TransportClosedError);
    await expect(reader.next(1000)).rejects.toThrow(TransportClosedError);
  });

  it('still returns buffered frames after close', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    transport.receive('queued');
    transport.close();
    await expect(reader.next(1000)).resolves.toBe('queued');
  });

  it('refuses a second concurrent read', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    const first = reader.next(1000);
    await expect(reader.next(1000)).rejects.toThrow('A read is already pending');
    transport.receive('x');
    await expect(first).resolves.toBe('x');
  });

  it('stream() flushes buffered frames and then pushes new ones', () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    transport.receive('a');
    transport.receive('b');

    const seen: string[] = [];
    reader.stream(payload => seen.push(payload));
    transport.receive('c');

    expect(seen).toEqual(['a', 'b', 'c']);
  });

  it('stop() detaches the stream handler', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    const seen: string[] = [];
    reader.stream(payload => seen.push(payload));
    reader.stop();
    transport.receive('ignored');

    expect(seen).toEqual([]);
    await expect(reader.next(1000)).resolves.toBe('ignored');
  });

  it('next() is not allowed while streaming', async () => {
    const transport = new FakeTransport();
    const reader = new MessageReader(transport);
    reader.stream(() => undefined);
    await expect(reader.next(1000)).rejects.toThrow('Reader is in streaming mode');
  });
});
