// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed bus for workflow telemetry. A single bus may be shared by a workflow
 * and its subflows; every event carries the emitting workflow's id.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit an engine event, filling in the timestamp when it is blank. */
  emitEvent(event: EngineEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
