// Sales Call Scorecard - Logging
//
// Console-based logger with "[LEVEL] [Component] message" lines. Components
// take a Logger through their deps so tests can pass a silent one.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Create a console logger whose lines carry the component name.
 * Debug lines are only written when `LOG_LEVEL=debug`.
 */
export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${ts()}] [${component}]`;
  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.LOG_LEVEL === "debug") {
        console.log(`${prefix("DEBUG")} ${msg}`, ...args);
      }
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
