// @strand/binary - compact binary encoding for strand values
//
// Varint primitives, the runtime schema model, schema-driven encoding and
// the typed Shape layer used by codecs.

export { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
export { concat, hexBytes } from "./binary/bytes.ts";
export {
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
export {
  type PrimitiveKind,
  type UnitSchema,
  type VecSchema,
  type OptionSchema,
  type StructSchema,
  type Schema,
  schemaToString,
} from "./schema.ts";
export { encodeWithSchema, decodeWithSchema, U64_MAX } from "./schema_codec.ts";
export { type Shape, type Infer, Shapes, encodeShape, decodeShape } from "./shape.ts";
