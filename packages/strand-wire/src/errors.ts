// Error types for strand connections and codecs.

export type ConnectionErrorKind = "io" | "eof" | "unexpected-eof" | "closed" | "shutdown";

/** Failure of the connection itself. Fatal to the direction that saw it. */
export class ConnectionError extends Error {
  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static eof(): ConnectionError {
    return new ConnectionError("eof", "end of stream");
  }

  static unexpectedEof(): ConnectionError {
    return new ConnectionError("unexpected-eof", "unexpected end of stream");
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  static shutdown(): ConnectionError {
    return new ConnectionError("shutdown", "connection is shut down");
  }

  /** True for the errors a call sees because the connection went away. */
  isShutdownClass(): boolean {
    return this.kind === "shutdown" || this.kind === "closed" || this.kind === "eof";
  }
}

export type HandshakeErrorKind = "malformed" | "magic" | "codec";

/** Rejected Option record. The connection is closed without a reply. */
export class HandshakeError extends Error {
  constructor(
    public readonly kind: HandshakeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HandshakeError";
  }

  static malformed(detail: string, cause?: unknown): HandshakeError {
    return new HandshakeError("malformed", `malformed option record: ${detail}`, { cause });
  }

  static magic(magicNumber: number): HandshakeError {
    return new HandshakeError("magic", `invalid magic number 0x${magicNumber.toString(16)}`);
  }

  static codec(codecType: string): HandshakeError {
    return new HandshakeError("codec", `invalid codec type ${codecType}`);
  }
}

export type CodecErrorKind = "encode" | "decode" | "frame-too-large";

/** Encode or decode failure inside a codec. */
export class CodecError extends Error {
  constructor(
    public readonly kind: CodecErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CodecError";
  }

  static encode(part: "header" | "body", cause: unknown): CodecError {
    return new CodecError("encode", `error encoding ${part}: ${errorMessage(cause)}`, { cause });
  }

  static decode(part: "header" | "body", cause: unknown): CodecError {
    return new CodecError("decode", `error decoding ${part}: ${errorMessage(cause)}`, { cause });
  }

  static frameTooLarge(size: number, limit: number): CodecError {
    return new CodecError("frame-too-large", `frame of ${size} bytes exceeds limit of ${limit}`);
  }
}

/**
 * Error reported by the remote side for one call.
 *
 * Affects only that call, never the connection.
 */
export class RpcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RpcError";
  }
}

/** A decode failure leaves the stream aligned; everything else does not. */
export function isMessageScoped(error: unknown): boolean {
  return error instanceof CodecError && error.kind === "decode";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
