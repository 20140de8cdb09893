/**
 * Message sink consulted on error paths and on table creation/destruction.
 * Implementations must not throw.
 */
export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  info() {},
  error() {},
};

/**
 * @param debug - When false, nothing is printed.
 * @returns A logger writing `[HashTable]`-prefixed lines to the console.
 */
export function consoleLogger(debug: boolean): Logger {
  if (!debug) return silentLogger;

  return {
    info(message) {
      console.log(`[HashTable] ${message}`);
    },
    error(message) {
      console.error(`[HashTable] ${message}`);
    },
  };
}

/** Reads the `HTABLE_DEBUG` switch. */
export function debugFromEnv(env: NodeJS.ProcessEnv = process.env) {
  const flag = env.HTABLE_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0";
}
