import type { EventListener, ProgressEvent } from './types.ts';

/**
 * Fan-out of progress notifications. Each CLI run owns one emitter and hands it down through the
 * run context; listeners that throw are reported and never interrupt the run.
 */
export class EventEmitter {
  private readonly listeners = new Set<EventListener>();

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('Error in event listener:', error);
      }
    }
  }
}
