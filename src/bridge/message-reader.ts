/**
 * Pull-style reads over a push-style transport.
 *
 * During the handshake the bridge awaits one frame at a time with a deadline;
 * once the shell is up it switches to push mode with stream().
 */

import type { Transport } from './transport.js';

export class ReadDeadlineError extends Error {
  constructor(timeoutMs: number) {
    super(`No message received within ${timeoutMs}ms`);
    this.name = 'ReadDeadlineError';
  }
}

export class TransportClosedError extends Error {
  constructor() {
    super('Transport closed');
    this.name = 'TransportClosedError';
  }
}

interface Waiter {
  resolve: (payload: string) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class MessageReader {
  private buffered: string[] = [];
  private waiter: Waiter | null = null;
  private handler: ((payload: string) => void) | null = null;
  private closed = false;

  constructor(transport: Transport) {
    transport.onMessage((payload) => this.push(payload));
    transport.onClose(() => this.end());
  }

  /**
   * Next frame, or ReadDeadlineError after timeoutMs. The deadline is cleared
   * as soon as a frame arrives so it never leaks into later reads.
   */
  next(timeoutMs: number): Promise<string> {
    if (this.handler) {
      return Promise.reject(new Error('Reader is in streaming mode'));
    }
    if (this.waiter) {
      return Promise.reject(new Error('A read is already pending'));
    }
    const queued = this.buffered.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new TransportClosedError());
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ReadDeadlineError(timeoutMs));
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  /**
   * Deliver every frame (buffered ones first) to handler from now on.
   */
  stream(handler: (payload: string) => void): void {
    this.handler = handler;
    const pending = this.buffered;
    this.buffered = [];
    for (const payload of pending) {
      if (this.handler !== handler) return;
      handler(payload);
    }
  }

  stop(): void {
    this.handler = null;
    this.buffered = [];
  }

  private push(payload: string): void {
    if (this.handler) {
      this.handler(payload);
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(payload);
      return;
    }
    this.buffered.push(payload);
  }

  private end(): void {
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(new TransportClosedError());
    }
  }
}
