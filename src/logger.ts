export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = "[tabula-reader]";

export const consoleLogger: Logger = {
  debug: message => console.debug(`${PREFIX} ${message}`),
  info: message => console.log(`${PREFIX} ${message}`),
  warn: message => console.warn(`${PREFIX} ${message}`),
  error: message => console.error(`${PREFIX} ${message}`),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
