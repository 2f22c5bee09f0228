export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const createLogger = ({ verbose = false }: { verbose?: boolean } = {}): Logger => ({
  debug: (message, ...args) => {
    if (verbose) {
      console.debug(`DEBUG: ${message}`, ...args);
    }
  },
  info: (message, ...args) => console.log(`INFO: ${message}`, ...args),
  warn: (message, ...args) => console.warn(`WARNING: ${message}`, ...args),
  error: (message, ...args) => console.error(`ERROR: ${message}`, ...args),
});
