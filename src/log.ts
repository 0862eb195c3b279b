// src/log.ts

export interface Logger {
  debug: (message: string) => void;
  warn: (message: string) => void;
}

export interface LoggerOptions {
  /** Emit debug lines (off by default) */
  debug?: boolean;
}

/**
 * Prefixed console logger, e.g. `[surveyor:builder] Assumed server.port = 8080`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[surveyor:${scope}]`;
  return {
    debug: (message) => {
      if (options.debug) console.log(`${prefix} ${message}`);
    },
    warn: (message) => {
      console.warn(`${prefix} ${message}`);
    },
  };
}
