import * as admin from 'firebase-admin';
import { v4 as uuid } from 'uuid';
import type { DocumentData, EventHandler, HelpdeskEvent, HelpdeskEventBus, HelpdeskEventType } from '@helpdesk/core';

/**
 * Helpdesk events as documents of one Firestore collection, keyed by event id.
 * Ticket id and number are lifted out of the payload so operator
 * notifications can be triggered and queried per ticket. Subscribers added
 * with `on` run in-process once the document is written.
 */
export class FirestoreEventBus implements HelpdeskEventBus {
  private readonly db: admin.firestore.Firestore;
  private readonly subscribers = new Map<HelpdeskEventType | '*', EventHandler[]>();

  constructor(app?: admin.app.App, private readonly collectionName = 'helpdesk_events') {
    this.db = (app ?? admin.app()).firestore();
  }

  async emit(event: HelpdeskEvent): Promise<void> {
    const id = event.id ?? uuid();
    await this.db.collection(this.collectionName).doc(id).set(toEventDocument(id, event));

    const stored: HelpdeskEvent = { ...event, id };
    const handlers = [...(this.subscribers.get(event.type) ?? []), ...(this.subscribers.get('*') ?? [])];
    await Promise.all(handlers.map((handler) => handler(stored)));
  }

  on(eventType: HelpdeskEventType | '*', handler: EventHandler): void {
    this.subscribers.set(eventType, [...(this.subscribers.get(eventType) ?? []), handler]);
  }

  off(eventType: HelpdeskEventType | '*', handler: EventHandler): void {
    this.subscribers.set(
      eventType,
      (this.subscribers.get(eventType) ?? []).filter((h) => h !== handler),
    );
  }
}

export function toEventDocument(id: string, event: HelpdeskEvent): DocumentData {
  const { ticketId, ticketNumber } = event.data;
  return firestoreFields({
    id,
    type: event.type,
    occurredAt: event.timestamp,
    userId: event.userId,
    ticketId: typeof ticketId === 'number' ? ticketId : undefined,
    ticketNumber: typeof ticketNumber === 'string' ? ticketNumber : undefined,
    data: event.data,
  });
}

// Firestore rejects `undefined` field values; absent fields are left out.
function firestoreFields(data: Record<string, unknown>): DocumentData {
  const fields: DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) fields[key] = firestoreValue(value);
  }
  return fields;
}

function firestoreValue(value: unknown): unknown {
  if (value instanceof Date) return admin.firestore.Timestamp.fromDate(value);
  if (Array.isArray(value)) return value.filter((item) => item !== undefined).map(firestoreValue);
  if (isPlainObject(value)) return firestoreFields(value);
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}
