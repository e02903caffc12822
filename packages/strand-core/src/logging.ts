// Namespaced logging for strand clients and servers.
//
// Debug output is off unless the namespace matches the DEBUG environment
// variable (same pattern syntax as npm's debug package). Warnings and errors
// are always written.

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  /**
   * Debug pattern list, e.g. "strand:*" or "*,-strand:codec".
   * Defaults to `process.env.DEBUG`, read on every call.
   */
  debug?: string;

  /** Sink for debug lines. Defaults to console.log. */
  log?: (line: string, data?: LogData) => void;

  /** Sink for warnings and errors. Defaults to console.error. */
  logError?: (line: string, data?: LogData) => void;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, patterns: string | undefined): boolean {
  if (!patterns) return false;

  let enabled = false;
  for (const pattern of patterns.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for one namespace.
 *
 * @example
 * ```typescript
 * // DEBUG=strand:* node app.js
 * const logger = createLogger("strand:server");
 * logger.debug("request", { seq: "1" }); // strand:server request { seq: '1' }
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const log = options.log ?? ((line, data) => console.log(line, data ?? ""));
  const logError = options.logError ?? ((line, data) => console.error(line, data ?? ""));
  const patterns = () => options.debug ?? process.env.DEBUG;

  return {
    debug(message, data) {
      if (!isEnabled(namespace, patterns())) return;
      log(`${namespace} ${message}`, data);
    },
    warn(message, data) {
      logError(`${namespace} warning: ${message}`, data);
    },
    error(message, data) {
      logError(`${namespace} ${message}`, data);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
