import { describe, it, expect, vi } from "vitest";
import { Shapes } from "@strand/binary";
import {
  BinaryCodec,
  BufferedStream,
  CodecError,
  CodecType,
  ConnectionError,
  DEFAULT_OPTION,
  HandshakeError,
  MAGIC_NUMBER,
  RpcError,
  memoryPipe,
  readOption,
} from "@strand/wire";
import { Client, type ClientOptions, newClient } from "./client.ts";
import { CompletionQueue } from "./completion.ts";
import type { AnyCall } from "./call.ts";
import { silentLogger, type Logger } from "./logging.ts";

const types = { args: Shapes.string, reply: Shapes.string };

/** A client wired to a hand-driven peer codec. */
async function connect(options: ClientOptions = {}) {
  const [clientEnd, serverEnd] = memoryPipe();
  const client = await newClient(clientEnd, DEFAULT_OPTION, { logger: silentLogger, ...options });
  const serverStream = new BufferedStream(serverEnd);
  const option = await readOption(serverStream);
  const peer = new BinaryCodec(serverStream);
  return { client, peer, option, clientEnd, serverEnd };
}

/** Read one request from the peer side. */
async function readRequest(peer: BinaryCodec) {
  const header = await peer.readHeader();
  const body = await peer.readBody(Shapes.string);
  return { header, body };
}

function reply(peer: BinaryCodec, seq: bigint, body: string): Promise<void> {
  return peer.write({ serviceMethod: "Foo.Sum", seq, error: "" }, body, Shapes.string);
}

describe("newClient", () => {
  it("sends the Option record before any message", async () => {
    const { option, clientEnd } = await connect();
    expect(option).toEqual({ magicNumber: MAGIC_NUMBER, codecType: CodecType.Binary });
    expect(new TextDecoder().decode(clientEnd.written[0])).toBe(
      '{"magicNumber":3927900,"codecType":"application/gob"}\n',
    );
  });

  it("refuses an unregistered codec without writing", async () => {
    const [clientEnd] = memoryPipe();
    const option = { magicNumber: MAGIC_NUMBER, codecType: CodecType.Json };

    const err = await newClient(clientEnd, option, { logger: silentLogger }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HandshakeError);
    expect(err).toMatchObject({ kind: "codec", message: "invalid codec type application/json" });
    expect(clientEnd.written).toHaveLength(0);
  });

  it("closes the stream when the Option cannot be written", async () => {
    const [clientEnd, serverEnd] = memoryPipe();
    await serverEnd.close();

    await expect(newClient(clientEnd, DEFAULT_OPTION, { logger: silentLogger })).rejects.toThrow(
      "connection closed",
    );
    expect(clientEnd.isClosed()).toBe(true);
  });
});

describe("Client", () => {
  it("rejects a completion capacity below one", () => {
    const [clientEnd] = memoryPipe();
    const codec = new BinaryCodec(new BufferedStream(clientEnd));
    expect(
      () => new Client(codec, DEFAULT_OPTION, { logger: silentLogger, completionCapacity: 0 }),
    ).toThrow(RangeError);
  });

  it("numbers requests 1..N in send order", async () => {
    const { client, peer } = await connect();
    client.go("Foo.Sum", "a", types);
    client.go("Foo.Sum", "b", types);
    client.go("Foo.Sum", "c", types);

    const requests = [await readRequest(peer), await readRequest(peer), await readRequest(peer)];
    expect(requests.map((r) => r.header.seq)).toEqual([1n, 2n, 3n]);
    expect(requests.map((r) => r.body)).toEqual(["a", "b", "c"]);
    expect(requests[0].header).toEqual({ serviceMethod: "Foo.Sum", seq: 1n, error: "" });
  });

  it("matches responses that arrive out of order", async () => {
    const { client, peer } = await connect();
    const first = client.call("Foo.Sum", "a", types);
    const second = client.call("Foo.Sum", "b", types);
    await readRequest(peer);
    await readRequest(peer);

    await reply(peer, 2n, "two");
    await reply(peer, 1n, "one");

    await expect(first).resolves.toBe("one");
    await expect(second).resolves.toBe("two");
  });

  it("posts finished calls to the queue given to go", async () => {
    const { client, peer } = await connect();
    const done = new CompletionQueue<AnyCall>(2);
    const call = client.go("Foo.Sum", "a", types, done);
    await readRequest(peer);
    await reply(peer, 1n, "one");

    const finished = await done.recv();
    expect(finished).toBe(call);
    expect(call.seq).toBe(1n);
    expect(call.reply).toBe("one");
    expect(call.error).toBeNull();
  });

  it("reports a response error without affecting later calls", async () => {
    const { client, peer } = await connect();
    const failing = client.call("Foo.Sum", "a", types);
    await readRequest(peer);
    await peer.write({ serviceMethod: "Foo.Sum", seq: 1n, error: "no such method" }, null, Shapes.unit);

    const err = await failing.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RpcError);
    expect(err).toMatchObject({ message: "no such method" });

    const next = client.call("Foo.Sum", "b", types);
    await readRequest(peer);
    await reply(peer, 2n, "two");
    await expect(next).resolves.toBe("two");
    expect(client.isAvailable()).toBe(true);
  });

  it("fails only the call whose reply does not decode", async () => {
    const { client, peer } = await connect();
    const bad = client.call("Foo.Sum", "a", types);
    await readRequest(peer);
    // A u32 where a string is expected
    await peer.write({ serviceMethod: "Foo.Sum", seq: 1n, error: "" }, 7, Shapes.u32);

    const err = await bad.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CodecError);
    expect(err).toMatchObject({ kind: "decode" });

    const next = client.call("Foo.Sum", "b", types);
    await readRequest(peer);
    await reply(peer, 2n, "two");
    await expect(next).resolves.toBe("two");
  });

  it("skips responses for unknown sequence numbers", async () => {
    const { client, peer } = await connect();
    const pending = client.call("Foo.Sum", "a", types);
    await readRequest(peer);

    await reply(peer, 99n, "stray");
    await reply(peer, 1n, "one");

    await expect(pending).resolves.toBe("one");
  });

  it("completes every pending call when closed", async () => {
    const { client, peer } = await connect();
    const done = new CompletionQueue<AnyCall>(3);
    const calls = [
      client.go("Foo.Sum", "a", types, done),
      client.go("Foo.Sum", "b", types, done),
      client.go("Foo.Sum", "c", types, done),
    ];
    for (let i = 0; i < 3; i++) await readRequest(peer);

    await client.close();
    await client.terminated;

    const finished = [await done.recv(), await done.recv(), await done.recv()];
    expect(new Set(finished)).toEqual(new Set(calls));
    for (const call of calls) {
      expect(call.error).toBeInstanceOf(ConnectionError);
      expect(call.error).toMatchObject({ kind: "shutdown", message: "connection is shut down" });
    }
    expect(client.isAvailable()).toBe(false);
  });

  it("refuses calls and a second close after closing", async () => {
    const { client } = await connect();
    await client.close();

    const err = await client.call("Foo.Sum", "a", types).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ kind: "shutdown" });

    await expect(client.close()).rejects.toThrow("connection is shut down");
  });

  it("shuts down when the peer hangs up", async () => {
    const { client, peer } = await connect();
    const pending = client.call("Foo.Sum", "a", types);
    await readRequest(peer);

    await peer.close();
    await client.terminated;

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ kind: "eof" });
    expect(client.isAvailable()).toBe(false);

    const late = client.go("Foo.Sum", "b", types);
    const lateErr = await client.call("Foo.Sum", "c", types).catch((e: unknown) => e);
    expect(lateErr).toMatchObject({ kind: "shutdown" });
    expect(late.seq).toBe(0n);
  });

  it("drops a completion when the queue is full", async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const { client, peer } = await connect({ logger });
    const done = new CompletionQueue<AnyCall>(1);
    const first = client.go("Foo.Sum", "a", types, done);
    const second = client.go("Foo.Sum", "b", types, done);
    await readRequest(peer);
    await readRequest(peer);
    await reply(peer, 1n, "one");
    await reply(peer, 2n, "two");

    // Once a later call has its reply, the earlier ones were processed
    const third = client.call("Foo.Sum", "c", types);
    await readRequest(peer);
    await reply(peer, 3n, "three");
    await expect(third).resolves.toBe("three");

    expect(second.isDone).toBe(true);
    expect(second.reply).toBe("two");
    expect(warn).toHaveBeenCalledWith("discarding call completion, queue is full", {
      serviceMethod: "Foo.Sum",
      seq: "2",
    });
    await expect(done.recv()).resolves.toBe(first);
    expect(done.length).toBe(0);
  });
});
