/**
 * assist-deploy engine -- Structured Logger
 *
 * pino, writing JSON lines to stderr so stdout stays free for the staged
 * CLI output. Silent unless --verbose. Each install run logs through a
 * child bound to its run_id.
 *
 * pino transports run in worker_threads, which do not survive the
 * esbuild bundle; the destination is a synchronous fd instead.
 */

import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level?: LogLevel;
  /** Shorthand for level "debug"; ignored when level is given */
  verbose?: boolean;
  /** Defaults to stderr */
  destination?: pino.DestinationStream;
}

export function levelFor(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  return options.verbose ? "debug" : "silent";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: levelFor(options),
      base: null,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination ?? pino.destination({ fd: 2, sync: true }),
  );
}

/** Child logger whose every line carries the run id */
export function runLogger(parent: Logger, runId: string): Logger {
  return parent.child({ run_id: runId });
}
