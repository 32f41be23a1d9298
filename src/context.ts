import type { Dispatcher } from 'undici';
import type { ComicboxConfig } from './config/mod.ts';
import { EventEmitter } from './events/mod.ts';
import { HttpClient } from './http/client.ts';
import { Logger } from './logger/mod.ts';

/** Everything one CLI run hands down to the operations it performs. */
export interface Context {
  config: ComicboxConfig;
  logger: Logger;
  events: EventEmitter;
  http: HttpClient;
}

/** The archive tools never touch the network. */
export type ArchiveContext = Pick<Context, 'logger' | 'events'>;

export interface ContextOptions {
  dispatcher?: Dispatcher;
  logger?: Logger;
  events?: EventEmitter;
}

export function createContext(config: ComicboxConfig, options: ContextOptions = {}): Context {
  const logger = options.logger ?? new Logger({ verbosity: config.verbosity, logDir: config.logDir });
  return {
    config,
    logger,
    events: options.events ?? new EventEmitter(),
    http: new HttpClient(config, logger, options.dispatcher),
  };
}
