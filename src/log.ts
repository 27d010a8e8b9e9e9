const PREFIX = "[query-cache]";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/* eslint-disable no-console */
export function createLogger({ debug = false }: { debug?: boolean } = {}): Logger {
  return {
    debug: (...args) => {
      if (debug) console.debug(PREFIX, ...args);
    },
    info: (...args) => console.log(...args),
    error: (...args) => console.error(PREFIX, ...args),
  };
}
/* eslint-enable no-console */
