/**
 * Scoped console logging for the grammarkit packages.
 *
 * Every line is prefixed with `[grammarkit:<scope>]`. `debug` and `info`
 * lines are only written when the `debug` config flag is set; warnings and
 * errors are always written.
 *
 * @example
 * ```typescript
 * const log = createLogger("compiler");
 * log.warn("Skipping malformed rule line 3");
 * log.debug(`Parsed in ${ms.toFixed(2)}ms`);
 * ```
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives every line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

let activeSink: LogSink = consoleSink;

/**
 * Route log output somewhere other than the console. Call with no argument
 * to restore console output.
 */
export function setLogSink(sink?: LogSink): void {
  activeSink = sink ?? consoleSink;
}

function verbose(): boolean {
  return config.get<boolean>("debug") === true;
}

export function createLogger(scope: string): Logger {
  const prefix = `[grammarkit:${scope}]`;
  const write = (level: LogLevel, message: string): void => {
    activeSink(level, `${prefix} ${message}`);
  };

  return {
    scope,
    debug(message) {
      if (verbose()) write("debug", message);
    },
    info(message) {
      if (verbose()) write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
  };
}
