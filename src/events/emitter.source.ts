import { EventEmitter } from 'events';
import type { EventSource, FlowEvent } from '../core/types.js';

/**
 * EventSource backed by an EventEmitter. `emit` hands the event to every
 * registered listener on the caller's turn.
 */
export class EmitterEventSource<E extends FlowEvent> implements EventSource<E> {
  private emitter = new EventEmitter();

  onEvent(listener: (event: E) => void): void {
    this.emitter.on('event', listener);
  }

  emit(event: E): boolean {
    return this.emitter.emit('event', event);
  }

  get listenerCount(): number {
    return this.emitter.listenerCount('event');
  }
}
