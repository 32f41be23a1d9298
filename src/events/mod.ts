export { EventEmitter } from './emitter.ts';
export { ConsoleProgressListener } from './listeners/console.ts';
export type { EventListener, ProgressEvent } from './types.ts';
