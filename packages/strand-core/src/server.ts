// Server dispatcher.
//
// One read loop per connection hands each request to its own worker and goes
// straight back to reading. Workers share the connection's send lock. When
// the read side fails the loop waits for every worker, then closes the codec.

import { Shapes, type Shape } from "@strand/binary";
import {
  BufferedStream,
  type ByteStream,
  type Codec,
  type CodecRegistry,
  ConnectionError,
  type Header,
  defaultCodecRegistry,
  errorMessage,
  isMessageScoped,
  negotiateCodec,
  readOption,
  toError,
} from "@strand/wire";
import { createLogger, type Logger } from "./logging.ts";
import { Mutex, WaitGroup } from "./sync.ts";

/**
 * Resolves and runs the method a request names.
 *
 * `argv` and `replyv` are the shapes request bodies are decoded with and
 * replies are encoded with.
 */
export interface MethodInvoker<A, R> {
  readonly argv: Shape<A>;
  readonly replyv: Shape<R>;
  invoke(serviceMethod: string, argv: A, header: Header): R | Promise<R>;
}

/**
 * Stand-in until method resolution exists: takes one string argument and
 * replies `strand resp <seq>`.
 */
export const placeholderInvoker: MethodInvoker<string, string> = {
  argv: Shapes.string,
  replyv: Shapes.string,
  invoke(_serviceMethod, _argv, header) {
    return `strand resp ${header.seq}`;
  },
};

/** Body sent with every error response. */
const INVALID_REQUEST = null;

export interface ServerOptions {
  /** Codecs a client may select. Default: `defaultCodecRegistry()`. */
  registry?: CodecRegistry;
  /** Default: `placeholderInvoker`. */
  invoker?: MethodInvoker<unknown, unknown>;
  logger?: Logger;
}

interface Request {
  header: Header;
  argv: unknown;
}

type ReadOutcome =
  | { kind: "request"; request: Request }
  | { kind: "invalid"; header: Header; error: Error }
  | { kind: "end" };

export class Server {
  private readonly registry: CodecRegistry;
  private readonly invoker: MethodInvoker<unknown, unknown>;
  private readonly logger: Logger;

  constructor(options: ServerOptions = {}) {
    this.registry = options.registry ?? defaultCodecRegistry();
    this.invoker = options.invoker ?? placeholderInvoker;
    this.logger = options.logger ?? createLogger("strand:server");
  }

  /**
   * Serve one connection: run the handshake, then serve messages until the
   * client goes away.
   *
   * A rejected handshake is logged and the stream closed without a reply.
   */
  async serveConn(stream: ByteStream): Promise<void> {
    const buffered = new BufferedStream(stream);
    let codec: Codec;
    try {
      const option = await readOption(buffered);
      codec = negotiateCodec(option, this.registry)(buffered);
    } catch (e) {
      this.logger.error("handshake failed", { error: errorMessage(e) });
      await buffered.close();
      return;
    }
    await this.serveCodec(codec);
  }

  /** Serve messages on an established codec until the read side fails. */
  async serveCodec(codec: Codec): Promise<void> {
    const sending = new Mutex();
    const workers = new WaitGroup();

    while (true) {
      const outcome = await this.readRequest(codec);
      if (outcome.kind === "end") break;

      // Body failed to decode but the frame was consumed
      if (outcome.kind === "invalid") {
        const header = { ...outcome.header, error: outcome.error.message };
        await this.sendResponse(codec, sending, header, INVALID_REQUEST, Shapes.unit);
        continue;
      }

      workers.track(this.handleRequest(codec, sending, outcome.request));
    }

    await workers.wait();
    await codec.close();
  }

  private async readRequest(codec: Codec): Promise<ReadOutcome> {
    let header: Header;
    try {
      header = await codec.readHeader();
    } catch (e) {
      if (e instanceof ConnectionError && (e.kind === "eof" || e.kind === "unexpected-eof")) {
        this.logger.debug("connection ended", { reason: e.message });
      } else {
        this.logger.error("read header error", { error: errorMessage(e) });
      }
      return { kind: "end" };
    }

    try {
      const argv = await codec.readBody(this.invoker.argv);
      return { kind: "request", request: { header, argv } };
    } catch (e) {
      this.logger.error("read argv error", {
        seq: header.seq.toString(),
        error: errorMessage(e),
      });
      // Past a failed frame the next header cannot be found
      if (!isMessageScoped(e)) return { kind: "end" };
      return { kind: "invalid", header, error: toError(e) };
    }
  }

  private async handleRequest(codec: Codec, sending: Mutex, request: Request): Promise<void> {
    const { header } = request;
    this.logger.debug("← request", {
      serviceMethod: header.serviceMethod,
      seq: header.seq.toString(),
    });

    let replyv: unknown;
    try {
      replyv = await this.invoker.invoke(header.serviceMethod, request.argv, header);
    } catch (e) {
      // An empty error string would read as success
      const error = errorMessage(e) || `${header.serviceMethod} failed`;
      await this.sendResponse(codec, sending, { ...header, error }, INVALID_REQUEST, Shapes.unit);
      return;
    }
    await this.sendResponse(codec, sending, header, replyv, this.invoker.replyv);
  }

  /** Write one response under the send lock. Failures are logged, not thrown. */
  private async sendResponse<T>(
    codec: Codec,
    sending: Mutex,
    header: Header,
    body: T,
    shape: Shape<T>,
  ): Promise<void> {
    try {
      await sending.runExclusive(() => codec.write(header, body, shape));
      this.logger.debug("→ response", { seq: header.seq.toString(), error: header.error });
    } catch (e) {
      this.logger.error("write response error", {
        seq: header.seq.toString(),
        error: errorMessage(e),
      });
    }
  }
}

/** Shared server with the default registry and invoker. */
export const defaultServer = new Server();
