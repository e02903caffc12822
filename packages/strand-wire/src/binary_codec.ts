// Length-prefixed binary codec.
//
// Each header and each body is one frame: a 4-byte little-endian payload
// length followed by the payload. Header payloads use HeaderShape; body
// payloads use the shape the caller passes in.

import { type Shape, concat, encodeShape, decodeShape } from "@strand/binary";
import { type Header, HeaderShape, MAX_FRAME_SIZE } from "./types.ts";
import type { Codec } from "./codec.ts";
import type { BufferedStream } from "./stream.ts";
import { CodecError, ConnectionError } from "./errors.ts";

function frame(payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(4 + payload.length);
  new DataView(out.buffer).setUint32(0, payload.length, true);
  out.set(payload, 4);
  return out;
}

export class BinaryCodec implements Codec {
  constructor(
    private readonly stream: BufferedStream,
    private readonly maxFrameSize: number = MAX_FRAME_SIZE,
  ) {}

  /**
   * Read one frame payload.
   *
   * At a message boundary a clean end of stream is `eof`; anywhere else it
   * is `unexpected-eof`.
   */
  private async readFrame(atBoundary: boolean): Promise<Uint8Array> {
    const prefix = await this.stream.readExact(4);
    if (prefix === null) {
      throw atBoundary ? ConnectionError.eof() : ConnectionError.unexpectedEof();
    }
    const len = new DataView(prefix.buffer, prefix.byteOffset, 4).getUint32(0, true);
    if (len > this.maxFrameSize) {
      throw CodecError.frameTooLarge(len, this.maxFrameSize);
    }
    const payload = await this.stream.readExact(len);
    if (payload === null) {
      throw ConnectionError.unexpectedEof();
    }
    return payload;
  }

  async readHeader(): Promise<Header> {
    const payload = await this.readFrame(true);
    try {
      return decodeShape(HeaderShape, payload);
    } catch (e) {
      throw CodecError.decode("header", e);
    }
  }

  async readBody<T>(shape: Shape<T>): Promise<T> {
    const payload = await this.readFrame(false);
    try {
      return decodeShape(shape, payload);
    } catch (e) {
      throw CodecError.decode("body", e);
    }
  }

  async discardBody(): Promise<void> {
    await this.readFrame(false);
  }

  async write<T>(header: Header, body: T, shape: Shape<T>): Promise<void> {
    let message: Uint8Array;
    try {
      message = concat(
        this.encodeFrame("header", HeaderShape, header),
        this.encodeFrame("body", shape, body),
      );
    } catch (e) {
      await this.close();
      throw e;
    }

    // Header and body go out as one chunk, so the write is flushed whole
    try {
      await this.stream.write(message);
    } catch (e) {
      await this.close();
      throw e;
    }
  }

  private encodeFrame<T>(part: "header" | "body", shape: Shape<T>, value: T): Uint8Array {
    let payload: Uint8Array;
    try {
      payload = encodeShape(shape, value);
    } catch (e) {
      throw CodecError.encode(part, e);
    }
    if (payload.length > this.maxFrameSize) {
      throw CodecError.frameTooLarge(payload.length, this.maxFrameSize);
    }
    return frame(payload);
  }

  close(): Promise<void> {
    return this.stream.close();
  }
}
