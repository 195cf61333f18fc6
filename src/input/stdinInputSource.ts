import type { TimedInputSource } from '../core/runner';
import type { Command } from '../core/types';
import { commandFromByte } from './keymap';

/** The parts of `process.stdin` the source relies on. */
export interface InputStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

interface Waiter {
  resolve(command: Command | null): void;
  reject(err: Error): void;
}

/**
 * Reads single bytes from a raw-mode terminal. Keys queue up in arrival
 * order; each poll takes one, or waits for the next until the timeout. Once
 * the stream ends, every poll after the queued keys answers `quit`; a stream
 * error rejects the waiting poll and every later one.
 */
export class StdinInputSource implements TimedInputSource {
  private pending: Command[] = [];
  private waiter: Waiter | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private opened = false;
  private ended = false;
  private failure: Error | null = null;

  constructor(private stream: InputStream) {}

  open(): void {
    if (this.opened) return;
    this.opened = true;
    if (this.stream.isTTY) this.stream.setRawMode?.(true);
    this.stream.on('data', this.onData);
    this.stream.on('end', this.onEnd);
    this.stream.on('error', this.onError);
    this.stream.resume();
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('error', this.onError);
    if (this.stream.isTTY) this.stream.setRawMode?.(false);
    this.stream.pause();
    this.takeWaiter()?.resolve(null);
  }

  poll(timeoutMs: number): Promise<Command | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve('quit');

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.timer = setTimeout(
        () => this.takeWaiter()?.resolve(null),
        Math.max(0, timeoutMs),
      );
    });
  }

  private onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    for (const byte of bytes) this.pending.push(commandFromByte(byte));
    if (!this.waiter) return;
    const next = this.pending.shift();
    if (next !== undefined) this.takeWaiter()?.resolve(next);
  };

  private onEnd = (): void => {
    this.ended = true;
    this.takeWaiter()?.resolve('quit');
  };

  private onError = (err: Error): void => {
    this.failure = err;
    this.takeWaiter()?.reject(err);
  };

  private takeWaiter(): Waiter | null {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}
