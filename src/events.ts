/**
 * Connector and model events
 *
 * One emitter is shared by a MongoConnector and every Model it builds, so a
 * single listener sees connects, closes, each finished call and each failure.
 * Payload types come from DocModelEvents.
 */

import { EventEmitter } from 'events';
import type { DocModelEvents } from './types.js';

export class DocModelEventEmitter extends EventEmitter {
  on<E extends keyof DocModelEvents>(
    event: E,
    listener: (payload: DocModelEvents[E]) => void,
  ): this {
    return super.on(event, listener);
  }

  once<E extends keyof DocModelEvents>(
    event: E,
    listener: (payload: DocModelEvents[E]) => void,
  ): this {
    return super.once(event, listener);
  }

  emit<E extends keyof DocModelEvents>(
    event: E,
    payload: DocModelEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof DocModelEvents>(
    event: E,
    listener: (payload: DocModelEvents[E]) => void,
  ): this {
    return super.off(event, listener);
  }

  /** Whether emitting `event` would reach anyone. */
  hasListeners(event: keyof DocModelEvents): boolean {
    return this.listenerCount(event) > 0;
  }
}
