/**
 * @helpdesk/core — Event Bus Adapter
 *
 * Abstracts event emission and subscription.
 * Implementations: FirestoreEventBus (triggers), InMemoryEventBus.
 */

export type HelpdeskEventType =
  | 'ticket.created'
  | 'ticket.status_changed'
  | 'ticket.escalated'
  | 'feedback.received';

export interface HelpdeskEvent {
  /** Unique event ID (generated if not provided). */
  id?: string;

  /** Event type. */
  type: HelpdeskEventType;

  /** When the event occurred. */
  timestamp: Date;

  /** Requester or operator that caused the event. */
  userId?: string;

  /** Event-specific payload. */
  data: Record<string, unknown>;
}

export type EventHandler = (event: HelpdeskEvent) => Promise<void>;

export interface HelpdeskEventBus {
  /** Emit an event to the bus. */
  emit(event: HelpdeskEvent): Promise<void>;

  /** Subscribe to events of a given type. */
  on(eventType: HelpdeskEventType | '*', handler: EventHandler): void;

  /** Remove a subscription. */
  off(eventType: HelpdeskEventType | '*', handler: EventHandler): void;
}
