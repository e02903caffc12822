import { describe, it, expect } from "vitest";
import { Shapes } from "@strand/binary";
import { BinaryCodec } from "./binary_codec.ts";
import { BufferedStream } from "./stream.ts";
import { memoryPipe } from "./pipe.ts";
import type { Header } from "./types.ts";

function codecPair() {
  const [a, b] = memoryPipe();
  return {
    a,
    b,
    writer: new BinaryCodec(new BufferedStream(a)),
    reader: new BinaryCodec(new BufferedStream(b)),
  };
}

const header = (seq: bigint, serviceMethod = "Foo.Sum"): Header => ({
  serviceMethod,
  seq,
  error: "",
});

describe("BinaryCodec", () => {
  it("frames a header and its body", async () => {
    const { writer, reader } = codecPair();
    await writer.write(header(1n), "req 1", Shapes.string);

    expect(await reader.readHeader()).toEqual({ serviceMethod: "Foo.Sum", seq: 1n, error: "" });
    expect(await reader.readBody(Shapes.string)).toBe("req 1");
  });

  it("writes both frames as one flushed chunk", async () => {
    const { a, writer } = codecPair();
    await writer.write(header(1n, "A.b"), null, Shapes.unit);

    expect(a.written).toHaveLength(1);
    expect(Array.from(a.written[0])).toEqual([
      // header frame: length 6, "A.b", seq 1, empty error
      6, 0, 0, 0, 3, 0x41, 0x2e, 0x62, 1, 0,
      // body frame: unit, zero-length payload
      0, 0, 0, 0,
    ]);
  });

  it("discards a body without losing alignment", async () => {
    const { writer, reader } = codecPair();
    await writer.write(header(1n), "skipped", Shapes.string);
    await writer.write(header(2n), "kept", Shapes.string);

    expect((await reader.readHeader()).seq).toBe(1n);
    await reader.discardBody();
    expect((await reader.readHeader()).seq).toBe(2n);
    expect(await reader.readBody(Shapes.string)).toBe("kept");
  });

  it("consumes a body that fails to decode", async () => {
    const { writer, reader } = codecPair();
    await writer.write(header(1n), 5, Shapes.u32);
    await writer.write(header(2n), "next", Shapes.string);

    await reader.readHeader();
    await expect(reader.readBody(Shapes.string)).rejects.toMatchObject({
      name: "CodecError",
      kind: "decode",
    });
    expect((await reader.readHeader()).seq).toBe(2n);
    expect(await reader.readBody(Shapes.string)).toBe("next");
  });

  it("reports a clean end of stream at a message boundary", async () => {
    const { a, reader } = codecPair();
    await a.close();
    await expect(reader.readHeader()).rejects.toMatchObject({
      name: "ConnectionError",
      kind: "eof",
    });
  });

  it("reports a truncated frame", async () => {
    const { a, reader } = codecPair();
    await a.write(Uint8Array.from([10, 0, 0, 0, 1, 2]));
    await a.close();
    await expect(reader.readHeader()).rejects.toMatchObject({ kind: "unexpected-eof" });
  });

  it("reports a missing body as unexpected end of stream", async () => {
    const { a, writer, reader } = codecPair();
    await writer.write(header(1n), "x", Shapes.string);
    await reader.readHeader();
    await reader.discardBody();
    await a.write(Uint8Array.from([6, 0, 0, 0, 3, 0x41, 0x2e, 0x62, 1, 0]));
    await a.close();

    expect((await reader.readHeader()).serviceMethod).toBe("A.b");
    await expect(reader.readBody(Shapes.string)).rejects.toMatchObject({
      kind: "unexpected-eof",
    });
  });

  it("closes itself when encoding fails", async () => {
    const { a, writer } = codecPair();
    await expect(writer.write(header(1n), -1, Shapes.u32)).rejects.toMatchObject({
      name: "CodecError",
      kind: "encode",
    });
    expect(a.isClosed()).toBe(true);
    expect(a.written).toHaveLength(0);
  });

  it("closes itself when the stream write fails", async () => {
    const { a, b, writer } = codecPair();
    await b.close();
    await expect(writer.write(header(1n), "x", Shapes.string)).rejects.toMatchObject({
      kind: "closed",
    });
    expect(a.isClosed()).toBe(true);
  });

  it("refuses oversized frames", async () => {
    const [a, b] = memoryPipe();
    const reader = new BinaryCodec(new BufferedStream(b), 8);
    await a.write(Uint8Array.from([9, 0, 0, 0]));
    await expect(reader.readHeader()).rejects.toMatchObject({ kind: "frame-too-large" });
  });
});
