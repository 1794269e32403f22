import { DocumentTicketStore } from '../ticket-store';
import { Classification, Ticket } from '../ticket-model';

export const T0 = new Date('2026-03-01T10:00:00Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function makeClassification(overrides: Partial<Classification> = {}): Classification {
  return {
    theme: 'technical-issue',
    requestKind: 'incident',
    priority: 'medium',
    targetSystem: 'other',
    rationale: 'test',
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: 1,
    ticketNumber: '#001',
    requesterId: 'user-1',
    requesterName: 'Anna',
    title: 'Mail does not sync',
    description: 'Mail does not sync',
    classification: makeClassification(),
    supportLine: 1,
    status: 'new',
    createdAt: T0,
    updatedAt: T0,
    resolved: false,
    tags: [],
    conversationHistory: [],
    statusHistory: [],
    version: 1,
    ...overrides,
  };
}

/** A clock the test moves by hand. */
export function manualClock(start: Date = T0): { now: () => Date; set: (at: Date) => void } {
  let current = start;
  return {
    now: () => current,
    set: (at) => {
      current = at;
    },
  };
}

/** Runs `race` once, between the caller's read and its versioned write. */
export class RacingTicketStore extends DocumentTicketStore {
  race?: () => Promise<void>;

  async update(ticket: Ticket, expectedVersion: number): Promise<Ticket> {
    const race = this.race;
    this.race = undefined;
    if (race) await race();
    return super.update(ticket, expectedVersion);
  }
}
