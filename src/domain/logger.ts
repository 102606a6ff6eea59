export type Logger = {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
};

export const silentLogger: Logger = {
  debug() {},
  warn() {}
};

/** Console logger with a `[tag]` prefix on every line. */
export function createConsoleLogger(tag = 'chess-engine', sink: Pick<Console, 'debug' | 'warn'> = console): Logger {
  return {
    debug(message, ...args) {
      sink.debug(`[${tag}] ${message}`, ...args);
    },
    warn(message, ...args) {
      sink.warn(`[${tag}] ${message}`, ...args);
    }
  };
}
