// LEB128 unsigned varints, up to 64 bits.

const MAX_U64 = (1n << 64n) - 1n;

/** Encode a non-negative integer of at most 64 bits, low group first. */
export function encodeVarint(value: number | bigint): Uint8Array {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new Error(`varint: not a safe integer: ${value}`);
  }
  let remaining = BigInt(value);
  if (remaining < 0n) throw new Error("negative varint");
  if (remaining > MAX_U64) throw new Error("varint: exceeds 64 bits");

  const out: number[] = [];
  while (remaining > 0x7fn) {
    out.push(Number(remaining & 0x7fn) | 0x80);
    remaining >>= 7n;
  }
  out.push(Number(remaining));
  return Uint8Array.from(out);
}

/**
 * Decode a varint at `offset`.
 *
 * The tenth byte may only carry the 64th bit; anything more is an overflow.
 */
export function decodeVarint(buf: Uint8Array, offset: number): { value: bigint; next: number } {
  let value = 0n;
  for (let i = offset, group = 0n; ; i++, group++) {
    if (i >= buf.length) throw new Error("varint: eof");
    const byte = buf[i];
    if (group === 9n && byte > 0x01) throw new Error("varint: overflow");
    value |= BigInt(byte & 0x7f) << (group * 7n);
    if ((byte & 0x80) === 0) return { value, next: i + 1 };
  }
}

/** Decode a varint that must fit in a safe JS number (lengths, u32s). */
export function decodeVarintNumber(buf: Uint8Array, offset: number): { value: number; next: number } {
  const { value, next } = decodeVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error("varint too large");
  return { value: Number(value), next };
}
