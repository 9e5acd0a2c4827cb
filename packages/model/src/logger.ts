/**
 * Logger used by every viewbind service. Hosts pass their own sink; the
 * default is silent.
 */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Console-backed logger tagging every line, e.g. `[viewbind] ...`.
 */
export function createConsoleLogger(tag = "viewbind"): Logger {
  return {
    log: (m: string) => console.log(`[${tag}] ${m}`),
    info: (m: string) => console.info(`[${tag}] ${m}`),
    warn: (m: string) => console.warn(`[${tag}] ${m}`),
    error: (m: string) => console.error(`[${tag}] ${m}`),
  };
}
