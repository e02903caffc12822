import { CodecRegistry } from "./codec.ts";
import { BinaryCodec } from "./binary_codec.ts";
import { CodecType } from "./types.ts";

/**
 * Registry with the codecs strand ships.
 *
 * Only `CodecType.Binary` is registered. `CodecType.Json` is reserved and
 * fails the handshake like any unknown identifier.
 */
export function defaultCodecRegistry(): CodecRegistry {
  return new CodecRegistry([[CodecType.Binary, (stream) => new BinaryCodec(stream)]]);
}
