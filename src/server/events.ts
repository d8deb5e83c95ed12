/**
 * Internal Event Bus
 *
 * Typed event emitter for verification lifecycle events. One bus per
 * verification context. EventTally keeps per-type counts for verify_health;
 * embedders can attach their own listeners for audit logs or notifications.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module server/events
 */
import { EventEmitter } from 'events';

// =============================================================================
// EVENT TYPE DEFINITIONS
// =============================================================================

export type SystemEventType =
  | 'verification.started'
  | 'verification.extracted'
  | 'verification.completed'
  | 'verification.failed'
  | 'verification.cancelled';

/** All valid event type values for runtime validation */
export const VALID_EVENT_TYPES: readonly SystemEventType[] = [
  'verification.started',
  'verification.extracted',
  'verification.completed',
  'verification.failed',
  'verification.cancelled',
] as const;

export interface SystemEvent {
  type: SystemEventType;
  timestamp: string;
  /** Run id */
  runId: string;
  applicationId: string;
  documentId: string;
  data: Record<string, unknown>;
}

// =============================================================================
// EVENT BUS
// =============================================================================

export class EventBus extends EventEmitter {
  constructor() {
    super();
    // Many tool calls may subscribe concurrently
    this.setMaxListeners(100);
  }

  /** Emit a typed system event */
  emitEvent(event: SystemEvent): void {
    console.error(`[EventBus] ${event.type}: ${event.applicationId}/${event.documentId}`);
    this.emit(event.type, event);
    this.emit('*', event); // Wildcard listener for all events
  }

  /** Subscribe to a specific event type */
  onEvent(type: SystemEventType | '*', handler: (event: SystemEvent) => void): void {
    this.on(type, handler);
  }

  /** Subscribe once */
  onceEvent(type: SystemEventType, handler: (event: SystemEvent) => void): void {
    this.once(type, handler);
  }

  offEvent(type: SystemEventType | '*', handler: (event: SystemEvent) => void): void {
    this.off(type, handler);
  }
}

/**
 * Running count of lifecycle events seen on a bus
 */
export class EventTally {
  private readonly counts: Record<SystemEventType, number> = {
    'verification.started': 0,
    'verification.extracted': 0,
    'verification.completed': 0,
    'verification.failed': 0,
    'verification.cancelled': 0,
  };

  constructor(bus: EventBus) {
    bus.onEvent('*', (event) => {
      this.counts[event.type]++;
    });
  }

  snapshot(): Record<SystemEventType, number> {
    return { ...this.counts };
  }
}
