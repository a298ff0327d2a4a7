/**
 * Structured console logger shared by every core component.
 */

export interface Logger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
}

export interface LoggerConfig {
  debugMode?: boolean;
  scope?: string;
}

export function createConsoleLogger(config: LoggerConfig = {}): Logger {
  const prefix = config.scope ? ` [${config.scope}]` : "";
  const debugMode = config.debugMode ?? false;

  return {
    info: (msg, data) => {
      if (debugMode) console.log(`[INFO]${prefix} ${msg}`, data || "");
    },
    warn: (msg, data) => console.warn(`[WARN]${prefix} ${msg}`, data || ""),
    error: (msg, data) => console.error(`[ERROR]${prefix} ${msg}`, data || ""),
    debug: (msg, data) => {
      if (debugMode) console.log(`[DEBUG]${prefix} ${msg}`, data || "");
    },
  };
}

/** Logger for tests and callers that want no output */
export function createSilentLogger(): Logger {
  const noop = () => undefined;
  return { info: noop, warn: noop, error: noop, debug: noop };
}

export function childLogger(parent: Logger, scope: string): Logger {
  return {
    info: (msg, data) => parent.info(`[${scope}] ${msg}`, data),
    warn: (msg, data) => parent.warn(`[${scope}] ${msg}`, data),
    error: (msg, data) => parent.error(`[${scope}] ${msg}`, data),
    debug: (msg, data) => parent.debug(`[${scope}] ${msg}`, data),
  };
}
