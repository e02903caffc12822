// Typed shapes: a schema paired with a type guard.
//
// The schema codec works on `unknown`. A Shape<T> carries the static type
// alongside the schema, and its guard checks decoded values so the result
// can be handed out as T.

import type { Schema, PrimitiveKind } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import { encodeWithSchema, decodeWithSchema, U64_MAX } from "./schema_codec.ts";

export interface Shape<T> {
  readonly schema: Schema;
  is(value: unknown): value is T;
}

/** Static type carried by a shape. */
export type Infer<S> = S extends Shape<infer T> ? T : never;

function primitive<T>(kind: PrimitiveKind, is: (value: unknown) => value is T): Shape<T> {
  return { schema: { kind }, is };
}

function isInteger(value: unknown, min: number, max: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

const unit: Shape<null> = {
  schema: { kind: "unit" },
  is: (value): value is null => value === null,
};

export const Shapes = {
  bool: primitive("bool", (v): v is boolean => typeof v === "boolean"),
  u8: primitive("u8", (v): v is number => isInteger(v, 0, 0xff)),
  u32: primitive("u32", (v): v is number => isInteger(v, 0, 0xffffffff)),
  i32: primitive("i32", (v): v is number => isInteger(v, -0x80000000, 0x7fffffff)),
  u64: primitive("u64", (v): v is bigint => typeof v === "bigint" && v >= 0n && v <= U64_MAX),
  i64: primitive("i64", (v): v is bigint => typeof v === "bigint"),
  f64: primitive("f64", (v): v is number => typeof v === "number"),
  string: primitive("string", (v): v is string => typeof v === "string"),
  bytes: primitive("bytes", (v): v is Uint8Array => v instanceof Uint8Array),
  unit,

  vec<T>(element: Shape<T>): Shape<T[]> {
    return {
      schema: { kind: "vec", element: element.schema },
      is: (v): v is T[] => Array.isArray(v) && v.every((item: unknown) => element.is(item)),
    };
  },

  option<T>(inner: Shape<T>): Shape<T | null> {
    return {
      schema: { kind: "option", inner: inner.schema },
      is: (v): v is T | null => v === null || inner.is(v),
    };
  },

  /**
   * Struct with named fields, encoded in the order the fields are listed.
   *
   * @example
   * ```typescript
   * const Point = Shapes.struct({ x: Shapes.i32, y: Shapes.i32 });
   * type Point = Infer<typeof Point>; // { x: number; y: number }
   * ```
   */
  struct<F extends Record<string, unknown>>(fields: { [K in keyof F]: Shape<F[K]> }): Shape<F> {
    const entries: Array<[string, Shape<unknown>]> = [];
    for (const name in fields) {
      entries.push([name, fields[name]]);
    }
    const schemaFields: Record<string, Schema> = {};
    for (const [name, field] of entries) {
      schemaFields[name] = field.schema;
    }
    return {
      schema: { kind: "struct", fields: schemaFields },
      is: (v): v is F => {
        if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
        const present: Map<string, unknown> = new Map(Object.entries(v));
        return entries.every(([name, field]) => field.is(present.get(name)));
      },
    };
  },
};

/** Encode a value with its shape. */
export function encodeShape<T>(shape: Shape<T>, value: T): Uint8Array {
  return encodeWithSchema(value, shape.schema);
}

/**
 * Decode exactly one value from `buf`.
 *
 * @throws Error on malformed bytes, trailing bytes, or a value the shape rejects
 */
export function decodeShape<T>(shape: Shape<T>, buf: Uint8Array): T {
  const { value, next } = decodeWithSchema(buf, 0, shape.schema);
  if (next !== buf.length) {
    throw new Error(`Decode error: ${buf.length - next} trailing bytes after ${schemaToString(shape.schema)}`);
  }
  if (!shape.is(value)) {
    throw new Error(`Decode error: value does not match ${schemaToString(shape.schema)}`);
  }
  return value;
}
