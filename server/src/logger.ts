import type { Logger } from "./types";

export type { Logger };

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const prefix = (level: string) => `${new Date().toISOString()} ${level}`;
  return {
    debug: (...args) => {
      if (options.verbose) {
        console.debug(prefix("DEBUG"), ...args);
      }
    },
    info: (...args) => console.info(prefix("INFO"), ...args),
    warn: (...args) => console.warn(prefix("WARN"), ...args),
    error: (...args) => console.error(prefix("ERROR"), ...args)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
