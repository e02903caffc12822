// TCP transport for strand connections.

import net from "node:net";
import {
  type Client,
  type ClientOptions,
  type Logger,
  type Server,
  createLogger,
  defaultServer,
  newClient,
} from "@strand/core";
import { ConnectionError, type Option, errorMessage, parseOptions } from "@strand/wire";
import { SocketStream } from "./socket.ts";

/** Options for dialing a server. */
export interface DialOptions extends ClientOptions {}

/** Split "host:port". The host may be empty, meaning localhost. */
export function parseAddress(address: string): { host: string; port: number } {
  const lastColon = address.lastIndexOf(":");
  if (lastColon < 0) {
    throw new Error(`Invalid address: ${address}`);
  }
  const host = address.slice(0, lastColon).replace(/^\[(.*)\]$/, "$1");
  const portText = address.slice(lastColon + 1);
  const port = Number(portText);
  if (portText === "" || !Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new Error(`Invalid port in address: ${address}`);
  }
  return { host: host || "localhost", port };
}

function connectSocket(host: string, port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(ConnectionError.io(err.message, err));
    };
    const socket = net.createConnection({ host, port }, () => {
      socket.off("error", onError);
      resolve(socket);
    });
    socket.once("error", onError);
  });
}

/**
 * Connect to a server and perform the client handshake.
 *
 * A partial `option` is completed with the defaults. The socket is destroyed
 * if the handshake fails.
 */
export async function dial(
  address: string,
  option?: Partial<Option> | null,
  options: DialOptions = {},
): Promise<Client> {
  const { host, port } = parseAddress(address);
  const socket = await connectSocket(host, port);
  try {
    return await newClient(new SocketStream(socket), parseOptions(option), options);
  } catch (e) {
    socket.destroy();
    throw e;
  }
}

/**
 * Serve every connection the listener accepts until it closes.
 *
 * Accept errors are logged; each connection is served independently.
 */
export function accept(
  server: Server,
  listener: net.Server,
  logger: Logger = createLogger("strand:tcp"),
): Promise<void> {
  return new Promise((resolve) => {
    listener.on("connection", (socket: net.Socket) => {
      logger.debug("accepted", { remote: `${socket.remoteAddress}:${socket.remotePort}` });
      server.serveConn(new SocketStream(socket)).catch((e: unknown) => {
        logger.error("serve error", { error: errorMessage(e) });
      });
    });
    listener.on("error", (err: Error) => {
      logger.error("accept error", { error: err.message });
    });
    listener.once("close", () => resolve());
  });
}

export interface Listener {
  /** Bound address as "host:port". */
  readonly address: string;
  /** Resolves once the listener has closed. */
  readonly served: Promise<void>;
  close(): Promise<void>;
}

/**
 * Listen on `address` ("host:port"; port 0 picks a free one) and serve
 * connections with `server`.
 */
export function listen(
  address: string,
  server: Server = defaultServer,
  logger: Logger = createLogger("strand:tcp"),
): Promise<Listener> {
  const { host, port } = parseAddress(address);
  const listener = net.createServer();
  const served = accept(server, listener, logger);

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(ConnectionError.io(err.message, err));
    };
    listener.once("error", onError);
    listener.listen(port, host, () => {
      listener.off("error", onError);
      const bound = listener.address();
      const boundAddress =
        bound !== null && typeof bound === "object" ? `${bound.address}:${bound.port}` : address;
      logger.debug("listening", { address: boundAddress });
      resolve({
        address: boundAddress,
        served,
        close: () =>
          new Promise<void>((done, fail) => {
            listener.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
