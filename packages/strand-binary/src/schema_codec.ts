// Schema-driven encoding/decoding.
//
// Encoding checks every value against its schema before writing a byte, so a
// mismatched value fails with a message naming the offending path instead of
// producing bytes the peer cannot read.

import type { Schema, StructSchema, VecSchema, OptionSchema } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import {
  type DecodeResult,
  encodeBool,
  decodeBool,
  encodeU8,
  decodeU8,
  encodeU32,
  decodeU32,
  encodeU64,
  decodeU64,
  encodeI32,
  decodeI32,
  encodeI64,
  decodeI64,
  encodeF64,
  decodeF64,
  encodeString,
  decodeString,
  encodeBytes,
  decodeBytes,
} from "./primitives.ts";
import { encodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat, hexBytes } from "./binary/bytes.ts";

export const U64_MAX = 0xffff_ffff_ffff_ffffn;
const I64_MIN = -0x8000_0000_0000_0000n;
const I64_MAX = 0x7fff_ffff_ffff_ffffn;

const EMPTY = new Uint8Array(0);

// ============================================================================
// Schema-driven Encoding
// ============================================================================

/**
 * Encode a value according to its schema.
 *
 * @throws TypeError if the value does not fit the schema
 */
export function encodeWithSchema(value: unknown, schema: Schema): Uint8Array {
  return encodeAt(value, schema, "<root>");
}

function mismatch(path: string, schema: Schema, value: unknown): TypeError {
  const got = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new TypeError(`Encode error at ${path}: expected ${schemaToString(schema)}, got ${got}`);
}

function isIntegerIn(value: unknown, min: number, max: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

function encodeAt(value: unknown, schema: Schema, path: string): Uint8Array {
  switch (schema.kind) {
    case "bool":
      if (typeof value !== "boolean") throw mismatch(path, schema, value);
      return encodeBool(value);
    case "u8":
      if (!isIntegerIn(value, 0, 0xff)) throw mismatch(path, schema, value);
      return encodeU8(value);
    case "u32":
      if (!isIntegerIn(value, 0, 0xffffffff)) throw mismatch(path, schema, value);
      return encodeU32(value);
    case "i32":
      if (!isIntegerIn(value, -0x80000000, 0x7fffffff)) throw mismatch(path, schema, value);
      return encodeI32(value);
    case "u64":
      if (typeof value !== "bigint" || value < 0n || value > U64_MAX) {
        throw mismatch(path, schema, value);
      }
      return encodeU64(value);
    case "i64":
      if (typeof value !== "bigint" || value < I64_MIN || value > I64_MAX) {
        throw mismatch(path, schema, value);
      }
      return encodeI64(value);
    case "f64":
      if (typeof value !== "number") throw mismatch(path, schema, value);
      return encodeF64(value);
    case "string":
      if (typeof value !== "string") throw mismatch(path, schema, value);
      return encodeString(value);
    case "bytes":
      if (!(value instanceof Uint8Array)) throw mismatch(path, schema, value);
      return encodeBytes(value);
    case "unit":
      if (value !== null && value !== undefined) throw mismatch(path, schema, value);
      return EMPTY;
    case "vec":
      return encodeVec(value, schema, path);
    case "option":
      return encodeOption(value, schema, path);
    case "struct":
      return encodeStruct(value, schema, path);
  }
}

function encodeVec(value: unknown, schema: VecSchema, path: string): Uint8Array {
  if (!Array.isArray(value)) throw mismatch(path, schema, value);
  const parts: Uint8Array[] = [encodeVarint(value.length)];
  value.forEach((item: unknown, i) => {
    parts.push(encodeAt(item, schema.element, `${path}[${i}]`));
  });
  return concat(...parts);
}

function encodeOption(value: unknown, schema: OptionSchema, path: string): Uint8Array {
  if (value === null || value === undefined) {
    return Uint8Array.of(0);
  }
  return concat(Uint8Array.of(1), encodeAt(value, schema.inner, path));
}

function encodeStruct(value: unknown, schema: StructSchema, path: string): Uint8Array {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw mismatch(path, schema, value);
  }
  const present: Map<string, unknown> = new Map(Object.entries(value));
  const parts: Uint8Array[] = [];
  // Fields go out in schema order (Object.entries preserves insertion order)
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    parts.push(encodeAt(present.get(fieldName), fieldSchema, `${path}.${fieldName}`));
  }
  return concat(...parts);
}

// ============================================================================
// Decode Context - tracks path and buffer for error reporting
// ============================================================================

/**
 * Context for decode operations - tracks the path through the schema
 * and provides rich error messages when decoding fails.
 */
class DecodeContext {
  private path: string[] = [];

  constructor(public readonly buf: Uint8Array) {}

  push(segment: string): void {
    this.path.push(segment);
  }

  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  error(message: string, offset: number, schema: Schema): Error {
    const details = [
      `Error: ${message}`,
      `Path: ${this.currentPath()}`,
      `Offset: ${offset} (0x${offset.toString(16)})`,
      `Buffer length: ${this.buf.length}`,
      `Schema: ${schemaToString(schema)}`,
      `Bytes around offset: ${hexBytes(this.buf, offset - 8, offset + 24, offset)}`,
    ].join("\n  ");

    return new Error(`Decode error:\n  ${details}`);
  }
}

/** Marker so nested failures are wrapped with context only once. */
class NestedDecodeError extends Error {}

// ============================================================================
// Schema-driven Decoding
// ============================================================================

/**
 * Decode a value according to its schema.
 *
 * @param buf - Buffer to decode from
 * @param offset - Starting offset in buffer
 * @returns Decoded value and next offset
 */
export function decodeWithSchema(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
): DecodeResult<unknown> {
  const ctx = new DecodeContext(buf);
  try {
    return decodeAt(buf, offset, schema, ctx);
  } catch (e) {
    if (e instanceof NestedDecodeError) {
      throw new Error(e.message);
    }
    throw e;
  }
}

function decodeAt(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  ctx: DecodeContext,
): DecodeResult<unknown> {
  try {
    switch (schema.kind) {
      case "bool":
        return decodeBool(buf, offset);
      case "u8":
        return decodeU8(buf, offset);
      case "u32":
        return decodeU32(buf, offset);
      case "u64":
        return decodeU64(buf, offset);
      case "i32":
        return decodeI32(buf, offset);
      case "i64":
        return decodeI64(buf, offset);
      case "f64":
        return decodeF64(buf, offset);
      case "string":
        return decodeString(buf, offset);
      case "bytes":
        return decodeBytes(buf, offset);
      case "unit":
        return { value: null, next: offset };
      case "vec":
        return decodeVec(buf, offset, schema, ctx);
      case "option":
        return decodeOption(buf, offset, schema, ctx);
      case "struct":
        return decodeStruct(buf, offset, schema, ctx);
    }
  } catch (e) {
    if (e instanceof NestedDecodeError) throw e;
    const message = e instanceof Error ? e.message : String(e);
    throw new NestedDecodeError(ctx.error(message, offset, schema).message);
  }
}

function decodeVec(
  buf: Uint8Array,
  offset: number,
  schema: VecSchema,
  ctx: DecodeContext,
): DecodeResult<unknown[]> {
  const len = decodeVarintNumber(buf, offset);
  // Every element takes at least one byte, except units
  if (schema.element.kind !== "unit" && len.value > buf.length - len.next) {
    throw new Error(`vec: length ${len.value} exceeds remaining bytes`);
  }
  const items: unknown[] = [];
  let next = len.next;
  for (let i = 0; i < len.value; i++) {
    ctx.push(`[${i}]`);
    const item = decodeAt(buf, next, schema.element, ctx);
    ctx.pop();
    items.push(item.value);
    next = item.next;
  }
  return { value: items, next };
}

function decodeOption(
  buf: Uint8Array,
  offset: number,
  schema: OptionSchema,
  ctx: DecodeContext,
): DecodeResult<unknown> {
  const tag = decodeU8(buf, offset);
  if (tag.value === 0) return { value: null, next: tag.next };
  if (tag.value !== 1) throw new Error(`option: invalid tag ${tag.value}`);
  return decodeAt(buf, tag.next, schema.inner, ctx);
}

function decodeStruct(
  buf: Uint8Array,
  offset: number,
  schema: StructSchema,
  ctx: DecodeContext,
): DecodeResult<Record<string, unknown>> {
  const out: Record<string, unknown> = {};
  let next = offset;
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    ctx.push(fieldName);
    const field = decodeAt(buf, next, fieldSchema, ctx);
    ctx.pop();
    out[fieldName] = field.value;
    next = field.next;
  }
  return { value: out, next };
}
