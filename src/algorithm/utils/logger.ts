/**
 * Shelf Allocation Engine - Logging Utility
 *
 * Configurable logging with levels. Every engine gets its own logger
 * instance, so runs never share mutable logging state.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

/**
 * Logging interface the engine depends on
 */
export interface EngineLogger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Destination of formatted log lines. Defaults to the console.
 */
export interface LogSink {
  log: (line: string, ...args: unknown[]) => void;
  warn: (line: string, ...args: unknown[]) => void;
  error: (line: string, ...args: unknown[]) => void;
}

const consoleSink: LogSink = {
  log: (line, ...args) => console.log(line, ...args),
  warn: (line, ...args) => console.warn(line, ...args),
  error: (line, ...args) => console.error(line, ...args)
};

/**
 * Logger with a configurable level.
 * Default level is WARN - only warnings and errors are shown.
 * Use DEBUG during development to see every placement decision.
 */
export function createLogger(level: LogLevel = LogLevel.WARN, sink: LogSink = consoleSink): EngineLogger {
  return {
    /**
     * Debug-level logging for algorithm tracing
     * Use for: individual placements, facing reductions, bump-outs, moves
     */
    debug: (msg, ...args) => {
      if (level <= LogLevel.DEBUG) {
        sink.log(`[DEBUG] ${msg}`, ...args);
      }
    },

    /**
     * Info-level logging for major algorithm steps
     * Use for: run start/end, filtering counts, strategy selection
     */
    info: (msg, ...args) => {
      if (level <= LogLevel.INFO) {
        sink.log(`[INFO] ${msg}`, ...args);
      }
    },

    /**
     * Warning-level logging for unexpected but non-fatal conditions
     * Use for: rejected products, abandoned bundles
     */
    warn: (msg, ...args) => {
      if (level <= LogLevel.WARN) {
        sink.warn(`[WARN] ${msg}`, ...args);
      }
    },

    /**
     * Error-level logging for failures
     * Use for: fatal run errors, broken invariants
     */
    error: (msg, ...args) => {
      if (level <= LogLevel.ERROR) {
        sink.error(`[ERROR] ${msg}`, ...args);
      }
    }
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: EngineLogger = createLogger(LogLevel.NONE);
