// Client engine: multiplexes concurrent calls over one codec.
//
// Calls are registered under the send lock and matched to responses by
// sequence number, so responses may arrive in any order. A single receive
// loop per client reads responses until the stream fails, then completes
// every call still pending.

import {
  BufferedStream,
  type ByteStream,
  type Codec,
  type CodecRegistry,
  ConnectionError,
  DEFAULT_OPTION,
  HandshakeError,
  type Header,
  type Option,
  RpcError,
  defaultCodecRegistry,
  encodeOption,
  errorMessage,
  isMessageScoped,
  toError,
} from "@strand/wire";
import { Call, type AnyCall, type CallTypes, PendingCalls } from "./call.ts";
import { CompletionQueue } from "./completion.ts";
import { createLogger, type Logger } from "./logging.ts";
import { Mutex } from "./sync.ts";

export interface ClientOptions {
  /** Codecs available to the handshake. Default: `defaultCodecRegistry()`. */
  registry?: CodecRegistry;
  logger?: Logger;
  /** Capacity of the queue `go` creates when none is given. Default: 10. */
  completionCapacity?: number;
}

export const DEFAULT_COMPLETION_CAPACITY = 10;

export class Client {
  private readonly sending = new Mutex();
  private readonly pending = new PendingCalls();
  private readonly logger: Logger;
  private readonly completionCapacity: number;
  private closing = false;
  private shutdown = false;

  /** Resolves once the receive loop has stopped and no call is pending. */
  readonly terminated: Promise<void>;

  constructor(
    private readonly codec: Codec,
    readonly option: Option = DEFAULT_OPTION,
    options: ClientOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("strand:client");
    this.completionCapacity = options.completionCapacity ?? DEFAULT_COMPLETION_CAPACITY;
    if (!Number.isInteger(this.completionCapacity) || this.completionCapacity < 1) {
      throw new RangeError(
        `completionCapacity must be an integer >= 1, got ${this.completionCapacity}`,
      );
    }
    this.terminated = this.receive();
  }

  /** True until the client is closed or its connection fails. */
  isAvailable(): boolean {
    return !this.closing && !this.shutdown;
  }

  /**
   * Start a call and return it immediately.
   *
   * The call is posted to `done` when it finishes. Without a queue, a new one
   * of the configured capacity is created.
   */
  go<A, R>(
    serviceMethod: string,
    args: A,
    types: CallTypes<A, R>,
    done?: CompletionQueue<AnyCall>,
  ): Call<A, R> {
    const call = new Call(
      serviceMethod,
      args,
      types,
      done ?? new CompletionQueue<AnyCall>(this.completionCapacity),
    );
    this.send(call).catch((e: unknown) => {
      this.logger.error("send failed", { serviceMethod, error: errorMessage(e) });
    });
    return call;
  }

  /** Make a call and wait for its reply. Rejects with the call's error. */
  async call<A, R>(serviceMethod: string, args: A, types: CallTypes<A, R>): Promise<R> {
    const done = new CompletionQueue<AnyCall>(1);
    const call = this.go(serviceMethod, args, types, done);
    await done.recv();
    if (call.error) throw call.error;
    if (call.reply === undefined) {
      throw new Error(`call ${serviceMethod} completed without a reply`);
    }
    return call.reply;
  }

  /**
   * Close the connection.
   *
   * Pending calls complete with a shutdown error once the receive loop
   * notices. A second close rejects.
   */
  async close(): Promise<void> {
    if (this.closing) {
      throw ConnectionError.shutdown();
    }
    this.closing = true;
    await this.codec.close();
  }

  private async send(call: AnyCall): Promise<void> {
    await this.sending.runExclusive(async () => {
      if (this.closing || this.shutdown) {
        call.error = ConnectionError.shutdown();
        this.complete(call);
        return;
      }

      const seq = this.pending.register(call);
      const header: Header = { serviceMethod: call.serviceMethod, seq, error: "" };
      this.logger.debug("→ call", { serviceMethod: call.serviceMethod, seq: seq.toString() });

      try {
        await this.codec.write(header, call.args, call.types.args);
      } catch (e) {
        // The response may already have claimed it
        const failed = this.pending.remove(seq);
        if (failed) {
          failed.error = toError(e);
          this.complete(failed);
        }
      }
    });
  }

  private async receive(): Promise<void> {
    const error = await this.readResponses();
    let failure = error;
    if (this.closing) {
      failure = ConnectionError.shutdown();
    } else if (!(error instanceof ConnectionError && error.isShutdownClass())) {
      this.logger.warn("connection failed", { error: error.message });
    }
    await this.terminateCalls(failure);
  }

  /** Read responses until the stream fails. Resolves with the failure. */
  private async readResponses(): Promise<Error> {
    try {
      while (true) {
        const header = await this.codec.readHeader();
        await this.dispatchResponse(header);
      }
    } catch (e) {
      return toError(e);
    }
  }

  /** Handle one response. Throws only when the stream is no longer usable. */
  private async dispatchResponse(header: Header): Promise<void> {
    const seq = header.seq.toString();
    const call = this.pending.remove(header.seq);

    if (!call) {
      // Write failed part way, or the call was already removed
      this.logger.debug("discarding response for unknown call", { seq });
      await this.codec.discardBody();
      return;
    }

    if (header.error !== "") {
      this.logger.debug("← error", { seq, error: header.error });
      call.error = new RpcError(header.error);
      try {
        await this.codec.discardBody();
      } finally {
        this.complete(call);
      }
      return;
    }

    let fatal: unknown = null;
    try {
      call.reply = await this.codec.readBody(call.types.reply);
      this.logger.debug("← reply", { seq });
    } catch (e) {
      call.error = toError(e);
      if (!isMessageScoped(e)) fatal = e;
    }
    this.complete(call);
    if (fatal !== null) throw fatal;
  }

  private async terminateCalls(failure: Error): Promise<void> {
    await this.sending.runExclusive(() => {
      this.shutdown = true;
      for (const call of this.pending.drain()) {
        call.error = failure;
        this.complete(call);
      }
    });
    if (this.closing) return;
    try {
      await this.codec.close();
    } catch (e) {
      this.logger.error("close failed", { error: errorMessage(e) });
    }
  }

  private complete(call: AnyCall): void {
    if (!call.markDone()) return;
    if (!call.done.send(call)) {
      this.logger.warn("discarding call completion, queue is full", {
        serviceMethod: call.serviceMethod,
        seq: call.seq.toString(),
      });
    }
  }
}

/**
 * Run the client side of the handshake on `stream` and build a client.
 *
 * The codec is looked up before anything is written; an unknown codec
 * rejects with a `HandshakeError` and leaves the stream untouched.
 */
export async function newClient(
  stream: ByteStream,
  option: Option = DEFAULT_OPTION,
  options: ClientOptions = {},
): Promise<Client> {
  const logger = options.logger ?? createLogger("strand:client");
  const registry = options.registry ?? defaultCodecRegistry();

  const factory = registry.get(option.codecType);
  if (!factory) {
    const err = HandshakeError.codec(option.codecType);
    logger.error("codec error", { error: err.message });
    throw err;
  }

  const buffered = new BufferedStream(stream);
  try {
    await buffered.write(encodeOption(option));
  } catch (e) {
    logger.error("options error", { error: errorMessage(e) });
    await buffered.close();
    throw e;
  }

  return new Client(factory(buffered), option, { ...options, logger });
}
