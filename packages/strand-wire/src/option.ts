// Option record: the handshake that precedes framed messages.
//
// Encoded as one line of JSON so it can be read without knowing the codec
// that follows it.

import { type Option, MAGIC_NUMBER, MAX_OPTION_RECORD, DEFAULT_OPTION } from "./types.ts";
import type { BufferedStream } from "./stream.ts";
import type { CodecFactory, CodecRegistry } from "./codec.ts";
import { HandshakeError } from "./errors.ts";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/** Encode an Option record as a newline-terminated JSON line. */
export function encodeOption(option: Option): Uint8Array {
  const record = { magicNumber: option.magicNumber, codecType: option.codecType };
  return textEncoder.encode(`${JSON.stringify(record)}\n`);
}

/**
 * Read exactly one Option record.
 *
 * Bytes after the newline stay buffered in `stream` for the codec.
 *
 * @throws HandshakeError kind `malformed`
 */
export async function readOption(stream: BufferedStream): Promise<Option> {
  const line = await stream.readLine(MAX_OPTION_RECORD);
  if (line === null) {
    throw HandshakeError.malformed("stream ended or record exceeded size limit");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(line));
  } catch (e) {
    throw HandshakeError.malformed("invalid JSON", e);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw HandshakeError.malformed("expected an object");
  }
  const magicNumber = "magicNumber" in parsed ? parsed.magicNumber : undefined;
  if (typeof magicNumber !== "number") {
    throw HandshakeError.malformed("magicNumber must be a number");
  }
  const codecType = "codecType" in parsed ? parsed.codecType : undefined;
  if (typeof codecType !== "string") {
    throw HandshakeError.malformed("codecType must be a string");
  }
  return { magicNumber, codecType };
}

/**
 * Validate an Option against the protocol and a registry.
 *
 * @returns the factory for the negotiated codec
 * @throws HandshakeError kind `magic` or `codec`
 */
export function negotiateCodec(option: Option, registry: CodecRegistry): CodecFactory {
  if (option.magicNumber !== MAGIC_NUMBER) {
    throw HandshakeError.magic(option.magicNumber);
  }
  const factory = registry.get(option.codecType);
  if (!factory) {
    throw HandshakeError.codec(option.codecType);
  }
  return factory;
}

/**
 * Complete a caller-supplied Option.
 *
 * The magic number is always the protocol's; an empty codec type falls back
 * to the default.
 */
export function parseOptions(option?: Partial<Option> | null): Option {
  if (!option) {
    return DEFAULT_OPTION;
  }
  return {
    magicNumber: MAGIC_NUMBER,
    codecType: option.codecType || DEFAULT_OPTION.codecType,
  };
}
