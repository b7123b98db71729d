/**
 * Simple logger interface for the session relay.
 * @packageDocumentation
 */

export interface Logger {
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export const defaultLogger: Logger = {
  info: (msg, ...args) => console.log(`[session-relay] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[session-relay] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[session-relay] ${msg}`, ...args),
};

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
