// Schema types for runtime description of encoded values.
//
// A schema says how a value is laid out on the wire. The format is not
// self-describing: both sides must agree on the schema of every value.

/** Primitive types with a fixed encoding. */
export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u32"
  | "u64"
  | "i32"
  | "i64"
  | "f64"
  | "string"
  | "bytes";

/** Zero-byte value, decoded as `null`. */
export interface UnitSchema {
  kind: "unit";
}

/** Schema for a variable-length list. */
export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Schema for an optional value (one tag byte, then the value if present). */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

/** Schema for a struct with named fields. */
export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

export type Schema =
  | { kind: PrimitiveKind }
  | UnitSchema
  | VecSchema
  | OptionSchema
  | StructSchema;

/** Abbreviated, human-readable rendering of a schema. */
export function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "struct": {
      const fields = Object.entries(schema.fields)
        .map(([name, field]) => `${name}: ${schemaToString(field)}`)
        .join(", ");
      return `struct { ${fields} }`;
    }
    case "vec":
      return `vec<${schemaToString(schema.element)}>`;
    case "option":
      return `option<${schemaToString(schema.inner)}>`;
    default:
      return schema.kind;
  }
}
