// @strand/core - client and server engines for strand RPC

export {
  type Logger,
  type LogData,
  type LoggerOptions,
  createLogger,
  isEnabled,
  silentLogger,
} from "./logging.ts";

export { Mutex, WaitGroup } from "./sync.ts";
export { CompletionQueue } from "./completion.ts";
export { Call, type AnyCall, type CallTypes, PendingCalls } from "./call.ts";

export { Client, type ClientOptions, DEFAULT_COMPLETION_CAPACITY, newClient } from "./client.ts";

export {
  Server,
  type ServerOptions,
  type MethodInvoker,
  placeholderInvoker,
  defaultServer,
} from "./server.ts";
