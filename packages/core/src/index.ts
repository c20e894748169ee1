export * from './types';
export * from './errors';
export * from './constants';
export * from './registry';
export * from './dialect';
export * from './schema';
export { consoleLogger, silentLogger } from './utils/logger';
