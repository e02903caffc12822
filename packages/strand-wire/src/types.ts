// Wire types for the strand protocol.
//
// A connection carries one Option record (a JSON line), then any number of
// messages. A message is a Header frame followed by exactly one Body frame.

import { Shapes, type Infer } from "@strand/binary";

/** Identifies a conforming handshake. */
export const MAGIC_NUMBER = 0x3bef5c;

/** Known codec identifiers. Only `Binary` has a codec behind it. */
export const CodecType = {
  Binary: "application/gob",
  /** Reserved; no codec is registered for it. */
  Json: "application/json",
} as const;

export type CodecType = (typeof CodecType)[keyof typeof CodecType];

/** Handshake record, sent once by the initiator before any message. */
export interface Option {
  readonly magicNumber: number;
  readonly codecType: string;
}

export const DEFAULT_OPTION: Option = Object.freeze({
  magicNumber: MAGIC_NUMBER,
  codecType: CodecType.Binary,
});

/**
 * Per-message envelope.
 *
 * - `serviceMethod`: "Service.Method"
 * - `seq`: sequence number chosen by the client, echoed in the response
 * - `error`: empty unless the response carries an error
 */
export const HeaderShape = Shapes.struct({
  serviceMethod: Shapes.string,
  seq: Shapes.u64,
  error: Shapes.string,
});

export type Header = Infer<typeof HeaderShape>;

/** Upper bound for a single encoded header or body. */
export const MAX_FRAME_SIZE = 16 * 1024 * 1024;

/** Upper bound for the Option line, newline included. */
export const MAX_OPTION_RECORD = 4096;
