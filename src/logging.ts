export type Logger = (...args: unknown[]) => void;

export const createConsoleLogger = (quiet = false): Logger | undefined => {
  if (quiet) return undefined;
  return (...args: unknown[]) => console.log(...args);
};

/** Prefixes every line with a bracketed tag, the way each component labels its output. */
export const tagLogger = (tag: string, logger?: Logger): Logger => (...args: unknown[]) => {
  if (logger) {
    logger(`[${tag}]`, ...args);
  }
};
