import { describe, it, expect } from "vitest";
import { BufferedStream } from "./stream.ts";
import { memoryPipe } from "./pipe.ts";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("BufferedStream", () => {
  it("reads exact byte counts across chunk boundaries", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.write(bytes(1, 2));
    await a.write(bytes(3, 4, 5));

    expect(Array.from((await reader.readExact(3)) ?? [])).toEqual([1, 2, 3]);
    expect(reader.buffered).toBe(2);
    expect(Array.from((await reader.readExact(2)) ?? [])).toEqual([4, 5]);
  });

  it("reassembles many small chunks read in uneven pieces", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    const expected = Array.from({ length: 10_000 }, (_, i) => i % 251);
    for (let i = 0; i < expected.length; i += 10) {
      await a.write(Uint8Array.from(expected.slice(i, i + 10)));
    }
    await a.close();

    const received: number[] = [];
    while (received.length + 7 <= expected.length) {
      received.push(...((await reader.readExact(7)) ?? []));
    }
    expect(reader.buffered).toBe(4);
    received.push(...((await reader.readExact(4)) ?? []));

    expect(received).toEqual(expected);
    expect(reader.buffered).toBe(0);
    expect(await reader.readExact(1)).toBeNull();
  });

  it("takes a chunk larger than the buffer in one read", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.write(bytes(1, 2, 3));
    await a.write(new Uint8Array(20_000).fill(9));

    expect(Array.from((await reader.readExact(2)) ?? [])).toEqual([1, 2]);
    const rest = (await reader.readExact(20_001)) ?? new Uint8Array();
    expect(rest.length).toBe(20_001);
    expect(rest[0]).toBe(3);
    expect(rest.every((byte, i) => i === 0 || byte === 9)).toBe(true);
  });

  it("returns null at a clean end of stream", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.close();
    expect(await reader.readExact(4)).toBeNull();
  });

  it("reports a stream that ends mid-read", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.write(bytes(1, 2));
    await a.close();
    await expect(reader.readExact(4)).rejects.toMatchObject({
      name: "ConnectionError",
      kind: "unexpected-eof",
    });
  });

  it("reads a line and keeps the bytes after it", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.write(new TextEncoder().encode("ab"));
    await a.write(new TextEncoder().encode("c\nxy"));

    const line = await reader.readLine(64);
    expect(new TextDecoder().decode(line ?? new Uint8Array())).toBe("abc");
    expect(Array.from((await reader.readExact(2)) ?? [])).toEqual([0x78, 0x79]);
  });

  it("gives up on lines longer than the limit", async () => {
    const [a, b] = memoryPipe();
    const reader = new BufferedStream(b);
    await a.write(new TextEncoder().encode("abcdefgh\n"));
    expect(await reader.readLine(4)).toBeNull();
  });

  it("refuses writes after close", async () => {
    const [, b] = memoryPipe();
    const stream = new BufferedStream(b);
    await stream.close();
    expect(stream.isClosed()).toBe(true);
    await expect(stream.write(bytes(1))).rejects.toMatchObject({ kind: "closed" });
  });
});

describe("memoryPipe", () => {
  it("ends both directions when either side closes", async () => {
    const [a, b] = memoryPipe();
    await b.close();
    expect(await a.read()).toBeNull();
    await expect(a.write(bytes(1))).rejects.toMatchObject({ kind: "closed" });
  });

  it("delivers chunks buffered before close", async () => {
    const [a, b] = memoryPipe();
    await a.write(bytes(7));
    await a.close();
    expect(Array.from((await b.read()) ?? [])).toEqual([7]);
    expect(await b.read()).toBeNull();
  });
});
