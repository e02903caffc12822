// Codec capability and registry.

import type { Shape } from "@strand/binary";
import type { Header } from "./types.ts";
import type { BufferedStream } from "./stream.ts";

/**
 * Reads and writes messages (Header + Body) on one connection.
 *
 * Bodies are typed per call site: the caller supplies the Shape to encode or
 * decode with.
 */
export interface Codec {
  /**
   * Read the next header.
   *
   * Throws `ConnectionError` kind `eof` at a clean end of stream.
   */
  readHeader(): Promise<Header>;

  /**
   * Read the body that follows the last header.
   *
   * The body is consumed even if it fails to decode (`CodecError` kind
   * `decode`), so the stream stays aligned.
   */
  readBody<T>(shape: Shape<T>): Promise<T>;

  /** Consume and drop the body that follows the last header. */
  discardBody(): Promise<void>;

  /**
   * Write one message and flush it.
   *
   * Any failure closes the codec before the error is thrown.
   */
  write<T>(header: Header, body: T, shape: Shape<T>): Promise<void>;

  close(): Promise<void>;
}

/** Builds a codec over an upgraded stream. */
export type CodecFactory = (stream: BufferedStream) => Codec;

/**
 * Immutable map of codec identifier to factory.
 *
 * Built once and shared by clients and servers; lookups need no locking.
 */
export class CodecRegistry {
  private readonly factories: ReadonlyMap<string, CodecFactory>;

  constructor(entries: Iterable<readonly [string, CodecFactory]>) {
    this.factories = new Map(entries);
  }

  get(codecType: string): CodecFactory | undefined {
    return this.factories.get(codecType);
  }

  has(codecType: string): boolean {
    return this.factories.has(codecType);
  }

  /** Registered identifiers. */
  types(): string[] {
    return [...this.factories.keys()];
  }
}
