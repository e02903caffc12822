// Primitive encoders for the strand binary format.
//
// Integers use LEB128 varints (zigzag for signed), floats are little-endian
// IEEE 754, strings and byte arrays are varint length-prefixed.

import { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat } from "./binary/bytes.ts";

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/** Encode a boolean (1 byte: 0x00 or 0x01). */
export function encodeBool(value: boolean): Uint8Array {
  return Uint8Array.of(value ? 1 : 0);
}

export function decodeBool(buf: Uint8Array, offset: number): DecodeResult<boolean> {
  if (offset >= buf.length) throw new Error("bool: eof");
  const byte = buf[offset];
  if (byte > 1) throw new Error(`bool: invalid value ${byte}`);
  return { value: byte === 1, next: offset + 1 };
}

/** Encode a u8 (1 byte). */
export function encodeU8(value: number): Uint8Array {
  return Uint8Array.of(value & 0xff);
}

export function decodeU8(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset >= buf.length) throw new Error("u8: eof");
  return { value: buf[offset], next: offset + 1 };
}

/** Encode a u32 (varint). */
export function encodeU32(value: number): Uint8Array {
  return encodeVarint(value);
}

export function decodeU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarintNumber(buf, offset);
  if (result.value > 0xffffffff) throw new Error("u32: overflow");
  return result;
}

/** Encode a u64 (varint as bigint). */
export function encodeU64(value: bigint): Uint8Array {
  return encodeVarint(value);
}

export function decodeU64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return decodeVarint(buf, offset);
}

/** Zigzag encode a signed integer to unsigned. */
function zigzagEncode(n: bigint): bigint {
  return (n << 1n) ^ (n >> 63n);
}

/** Zigzag decode an unsigned integer to signed. */
function zigzagDecode(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

/** Encode an i32 (zigzag varint). */
export function encodeI32(value: number): Uint8Array {
  return encodeVarint(zigzagEncode(BigInt(value)));
}

export function decodeI32(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarint(buf, offset);
  const signed = zigzagDecode(result.value);
  if (signed > 0x7fffffffn || signed < -0x80000000n) throw new Error("i32: overflow");
  return { value: Number(signed), next: result.next };
}

/** Encode an i64 (zigzag varint). */
export function encodeI64(value: bigint): Uint8Array {
  return encodeVarint(zigzagEncode(value));
}

export function decodeI64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  const result = decodeVarint(buf, offset);
  return { value: zigzagDecode(result.value), next: result.next };
}

/** Encode an f64 (8 bytes little-endian IEEE 754). */
export function encodeF64(value: number): Uint8Array {
  const buf = new ArrayBuffer(8);
  new DataView(buf).setFloat64(0, value, true);
  return new Uint8Array(buf);
}

export function decodeF64(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset + 8 > buf.length) throw new Error("f64: eof");
  const view = new DataView(buf.buffer, buf.byteOffset + offset, 8);
  return { value: view.getFloat64(0, true), next: offset + 8 };
}

/** Encode a string (length-prefixed UTF-8). */
export function encodeString(value: string): Uint8Array {
  const bytes = textEncoder.encode(value);
  return concat(encodeVarint(bytes.length), bytes);
}

export function decodeString(buf: Uint8Array, offset: number): DecodeResult<string> {
  const len = decodeVarintNumber(buf, offset);
  const start = len.next;
  const end = start + len.value;
  if (end > buf.length) throw new Error("string: overrun");
  return { value: textDecoder.decode(buf.subarray(start, end)), next: end };
}

/** Encode bytes (length-prefixed). */
export function encodeBytes(value: Uint8Array): Uint8Array {
  return concat(encodeVarint(value.length), value);
}

export function decodeBytes(buf: Uint8Array, offset: number): DecodeResult<Uint8Array> {
  const len = decodeVarintNumber(buf, offset);
  const start = len.next;
  const end = start + len.value;
  if (end > buf.length) throw new Error("bytes: overrun");
  return { value: buf.slice(start, end), next: end };
}
