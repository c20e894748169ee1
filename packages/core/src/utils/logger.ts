import type { Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[tabula] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[tabula] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[tabula] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[tabula] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Logger that drops every message
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
