/**
 * Event Bus for session and pipeline lifecycle events
 */

import { Event, EventType } from "../schemas/events.js";
import { EventEmitter } from "events";

export type EventHandler<T extends EventType = EventType> = (
  event: Extract<Event, { type: T }>,
) => void;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100); // Support many concurrent sessions
  }

  /**
   * Subscribe to events by type
   */
  on<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    this.emitter.on(eventType, handler);
  }

  /**
   * Subscribe to every event
   */
  onAny(handler: (event: Event) => void): void {
    this.emitter.on("*", handler);
  }

  /**
   * Emit an event
   */
  emit(event: Event): void {
    // Emit to type-specific handlers
    this.emitter.emit(event.type, event);

    // Emit to wildcard handlers
    this.emitter.emit("*", event);
  }

  /**
   * Remove handler
   */
  off<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    this.emitter.off(eventType, handler);
  }

  /**
   * Remove a wildcard handler
   */
  offAny(handler: (event: Event) => void): void {
    this.emitter.off("*", handler);
  }

  /**
   * Number of handlers registered for an event type
   */
  listenerCount(eventType: EventType): number {
    return this.emitter.listenerCount(eventType);
  }
}

// Singleton instance
export const eventBus = new EventBus();
