// @strand/wire - wire protocol for strand RPC
//
// Option handshake, message header, byte streams and the codecs that frame
// messages on them.

export {
  MAGIC_NUMBER,
  CodecType,
  type Option,
  DEFAULT_OPTION,
  HeaderShape,
  type Header,
  MAX_FRAME_SIZE,
  MAX_OPTION_RECORD,
} from "./types.ts";

export {
  ConnectionError,
  type ConnectionErrorKind,
  HandshakeError,
  type HandshakeErrorKind,
  CodecError,
  type CodecErrorKind,
  RpcError,
  isMessageScoped,
  errorMessage,
  toError,
} from "./errors.ts";

export { type ByteStream, BufferedStream } from "./stream.ts";
export { MemoryStream, memoryPipe } from "./pipe.ts";

export { type Codec, type CodecFactory, CodecRegistry } from "./codec.ts";
export { BinaryCodec } from "./binary_codec.ts";
export { defaultCodecRegistry } from "./registry.ts";

export { encodeOption, readOption, negotiateCodec, parseOptions } from "./option.ts";
