// @strand/tcp - TCP transport for strand RPC (Node.js only)
//
// Provides the socket byte stream, dialing and listening.

export { SocketStream } from "./socket.ts";
export {
  type DialOptions,
  type Listener,
  parseAddress,
  dial,
  accept,
  listen,
} from "./transport.ts";

// Re-export the engines for convenience
export { Client, Server, defaultServer, newClient, type ClientOptions, type ServerOptions } from "@strand/core";
