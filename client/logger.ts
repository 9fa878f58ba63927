export interface Logger {
  readonly debug: (message: string, ...details: unknown[]) => void;
  readonly info: (message: string, ...details: unknown[]) => void;
  readonly warn: (message: string, ...details: unknown[]) => void;
  readonly error: (message: string, ...details: unknown[]) => void;
}

export const createConsoleLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => console.debug(`${prefix} ${message}`, ...details),
    info: (message, ...details) => console.info(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
  };
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
