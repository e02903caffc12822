// Byte stream over a TCP socket.

import type { Duplex } from "node:stream";
import { type ByteStream, ConnectionError } from "@strand/wire";

interface Waiter {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: ConnectionError) => void;
}

/**
 * Adapts a socket (any `Duplex`) to `ByteStream`.
 *
 * Incoming chunks are queued until read. A socket error fails the next read
 * once; after that reads return null.
 */
export class SocketStream implements ByteStream {
  private pendingChunks: Uint8Array[] = [];
  private waiting: Waiter | null = null;
  private ended = false;
  private error: ConnectionError | null = null;

  constructor(private readonly socket: Duplex) {
    socket.on("data", (chunk: Buffer) => {
      const copy = new Uint8Array(chunk);
      if (this.waiting) {
        this.waiting.resolve(copy);
        this.waiting = null;
      } else {
        this.pendingChunks.push(copy);
      }
    });

    socket.on("error", (err: Error) => {
      const error = ConnectionError.io(`socket error: ${err.message}`, err);
      this.ended = true;
      if (this.waiting) {
        this.waiting.reject(error);
        this.waiting = null;
      } else {
        this.error = error;
      }
    });

    socket.on("end", () => this.finish());
    socket.on("close", () => this.finish());
  }

  /** Get the underlying socket. */
  getSocket(): Duplex {
    return this.socket;
  }

  write(chunk: Uint8Array): Promise<void> {
    if (this.socket.destroyed || this.socket.writableEnded) {
      return Promise.reject(ConnectionError.closed());
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(chunk, (err) => {
        if (err) reject(ConnectionError.io(`write failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  read(): Promise<Uint8Array | null> {
    // Check for queued chunks first
    const next = this.pendingChunks.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (this.error) {
      const err = this.error;
      this.error = null;
      return Promise.reject(err);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  close(): Promise<void> {
    this.socket.destroy();
    this.finish();
    return Promise.resolve();
  }

  private finish(): void {
    this.ended = true;
    if (this.waiting) {
      this.waiting.resolve(null);
      this.waiting = null;
    }
  }
}
