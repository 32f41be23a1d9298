export { Logger } from './logger.ts';
export type { LoggerOptions, RequestLogEntry } from './logger.ts';
