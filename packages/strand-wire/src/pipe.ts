// In-memory byte stream pair.
//
// Behaves like a connected socket pair: bytes written on one end are read on
// the other, in order, and closing either end ends the connection for both.

import { ConnectionError } from "./errors.ts";
import type { ByteStream } from "./stream.ts";

export class MemoryStream implements ByteStream {
  private inbound: Uint8Array[] = [];
  private waiting: ((chunk: Uint8Array | null) => void) | null = null;
  private ended = false;
  private closed = false;
  peer: MemoryStream | null = null;

  /** Every chunk this end has written, in order (for tests). */
  readonly written: Uint8Array[] = [];

  write(chunk: Uint8Array): Promise<void> {
    const peer = this.peer;
    if (this.closed || peer === null || peer.ended) {
      return Promise.reject(ConnectionError.closed());
    }
    // Copy so later mutation of the caller's buffer cannot reach the reader
    const copy = chunk.slice();
    this.written.push(copy);
    peer.deliver(copy);
    return Promise.resolve();
  }

  read(): Promise<Uint8Array | null> {
    const next = this.inbound.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.end();
      this.peer?.end();
    }
    return Promise.resolve();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private deliver(chunk: Uint8Array): void {
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(chunk);
    } else {
      this.inbound.push(chunk);
    }
  }

  /** Mark the inbound side finished; buffered chunks are still readable. */
  private end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }
}

/** Create two connected in-memory streams. */
export function memoryPipe(): [MemoryStream, MemoryStream] {
  const a = new MemoryStream();
  const b = new MemoryStream();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
