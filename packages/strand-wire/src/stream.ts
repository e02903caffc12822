/**
 * Byte stream abstraction.
 *
 * The transport hands strand an ordered, reliable, bidirectional stream of
 * bytes. Chunk boundaries carry no meaning; framing is the codec's job.
 *
 * Implementations:
 * - SocketStream (strand-tcp) for TCP sockets
 * - memoryPipe() for in-process connections
 */

import { ConnectionError } from "./errors.ts";

export interface ByteStream {
  /** Write bytes, resolving once the transport has accepted them. */
  write(chunk: Uint8Array): Promise<void>;

  /**
   * Read the next chunk.
   *
   * Returns null once the stream has ended (peer closed, or closed locally).
   */
  read(): Promise<Uint8Array | null>;

  /** Close both directions. Idempotent. */
  close(): Promise<void>;
}

const EMPTY = new Uint8Array(0);
const NEWLINE = 0x0a;
const MIN_CAPACITY = 4096;

/**
 * A ByteStream with read buffering.
 *
 * The handshake reads one line and the codec then reads frames from the same
 * buffer, so no byte that arrived behind the Option record is lost.
 *
 * Reads are not safe to run concurrently; each connection has one reader.
 */
export class BufferedStream {
  // Unread bytes are store[start, end)
  private store: Uint8Array = EMPTY;
  private start = 0;
  private end = 0;
  private ended = false;
  private closed = false;

  constructor(private readonly inner: ByteStream) {}

  /** Number of bytes received but not yet consumed. */
  get buffered(): number {
    return this.end - this.start;
  }

  /** Pull one more chunk into the buffer. Returns false at end of stream. */
  private async fill(): Promise<boolean> {
    if (this.ended) return false;
    let chunk: Uint8Array | null;
    try {
      chunk = await this.inner.read();
    } catch (e) {
      if (e instanceof ConnectionError) throw e;
      throw ConnectionError.io(`read failed: ${e instanceof Error ? e.message : String(e)}`, e);
    }
    if (chunk === null) {
      this.ended = true;
      return false;
    }
    this.append(chunk);
    return true;
  }

  private append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    if (this.end + chunk.length > this.store.length) {
      const needed = this.buffered + chunk.length;
      if (needed * 2 <= this.store.length) {
        this.store.copyWithin(0, this.start, this.end);
      } else {
        const grown = new Uint8Array(Math.max(needed * 2, MIN_CAPACITY));
        grown.set(this.store.subarray(this.start, this.end));
        this.store = grown;
      }
      this.end -= this.start;
      this.start = 0;
    }
    this.store.set(chunk, this.end);
    this.end += chunk.length;
  }

  private take(n: number): Uint8Array {
    const out = this.store.slice(this.start, this.start + n);
    this.start += n;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
    return out;
  }

  /**
   * Read exactly `n` bytes.
   *
   * Returns null if the stream ends before any of them arrive; throws
   * `unexpected-eof` if it ends part way through.
   */
  async readExact(n: number): Promise<Uint8Array | null> {
    while (this.buffered < n) {
      if (!(await this.fill())) {
        if (this.buffered === 0) return null;
        throw ConnectionError.unexpectedEof();
      }
    }
    return this.take(n);
  }

  /**
   * Read up to and including the next newline, returning the line without it.
   *
   * Returns null if the stream ends first, or if `maxLength` bytes arrive
   * without a newline (the caller treats both as a malformed record).
   */
  async readLine(maxLength: number): Promise<Uint8Array | null> {
    let scanned = 0;
    while (true) {
      const idx = this.store.subarray(this.start, this.end).indexOf(NEWLINE, scanned);
      if (idx >= 0) {
        if (idx + 1 > maxLength) return null;
        const line = this.take(idx + 1);
        return line.subarray(0, idx);
      }
      scanned = this.buffered;
      if (scanned >= maxLength) return null;
      if (!(await this.fill())) return null;
    }
  }

  write(chunk: Uint8Array): Promise<void> {
    if (this.closed) {
      return Promise.reject(ConnectionError.closed());
    }
    return this.inner.write(chunk);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.inner.close();
  }

  isClosed(): boolean {
    return this.closed;
  }
}
