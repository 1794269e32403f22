/**
 * Unit tests for the Firestore adapters against a mocked firebase-admin
 */

import { FirestoreStore } from '../src/store';
import { FirestoreEventBus } from '../src/events';

type Data = Record<string, unknown>;

const mockDocs = new Map<string, Data>();
const mockCalls: string[] = [];
const mockStats = { transactions: 0 };

// Mirrors firebase-admin's refusal of `undefined` field values.
function mockRejectUndefined(value: unknown, path = ''): void {
  if (value === undefined) throw new Error(`Cannot use "undefined" as a Firestore value (found in field "${path}")`);
  if (Array.isArray(value)) {
    value.forEach((item, i) => mockRejectUndefined(item, `${path}.${i}`));
  } else if (typeof value === 'object' && value !== null) {
    for (const [key, item] of Object.entries(value)) mockRejectUndefined(item, path ? `${path}.${key}` : key);
  }
}

function mockRef(collection: string, id: string) {
  const key = `${collection}/${id}`;
  return {
    key,
    get: async () => ({ id, exists: mockDocs.has(key), data: () => mockDocs.get(key) }),
    create: async (data: Data) => {
      mockRejectUndefined(data);
      if (mockDocs.has(key)) throw new Error('6 ALREADY_EXISTS');
      mockDocs.set(key, data);
    },
    set: async (data: Data) => {
      mockRejectUndefined(data);
      mockDocs.set(key, data);
    },
  };
}

function mockQuery(collection: string) {
  const query = {
    where: (field: string, op: string, value: unknown) => {
      mockCalls.push(`where ${field} ${op} ${JSON.stringify(value)}`);
      return query;
    },
    orderBy: (field: string, direction: string) => {
      mockCalls.push(`orderBy ${field} ${direction}`);
      return query;
    },
    offset: (n: number) => {
      mockCalls.push(`offset ${n}`);
      return query;
    },
    limit: (n: number) => {
      mockCalls.push(`limit ${n}`);
      return query;
    },
    get: async () => ({
      docs: [...mockDocs.entries()]
        .filter(([key]) => key.startsWith(`${collection}/`))
        .map(([key, data]) => ({ id: key.slice(collection.length + 1), data: () => data })),
    }),
    count: () => ({ get: async () => ({ data: () => ({ count: 7 }) }) }),
    doc: (id: string) => mockRef(collection, id),
  };
  return query;
}

jest.mock('firebase-admin', () => ({
  app: () => ({
    firestore: () => ({
      collection: (name: string) => mockQuery(name),
      runTransaction: async <T>(fn: (tx: unknown) => Promise<T>) => {
        mockStats.transactions++;
        return fn({
          get: async (ref: { key: string }) => {
            const data = mockDocs.get(ref.key);
            return { exists: data !== undefined, get: (field: string) => data?.[field] };
          },
          set: (ref: { key: string }, data: Data) => {
            mockRejectUndefined(data);
            mockDocs.set(ref.key, data);
          },
        });
      },
    }),
  }),
  firestore: {
    Timestamp: {
      fromDate: (date: Date) => ({ seconds: Math.floor(date.getTime() / 1000), nanoseconds: 0 }),
    },
  },
}));

beforeEach(() => {
  mockDocs.clear();
  mockCalls.length = 0;
  mockStats.transactions = 0;
});

describe('FirestoreStore', () => {
  it('creates and reads documents', async () => {
    const store = new FirestoreStore();
    await store.create('support_tickets', '1', { title: 'Printer jam' });

    expect(await store.get('support_tickets', '1')).toEqual({ id: '1', data: { title: 'Printer jam' } });
    expect(await store.get('support_tickets', '2')).toBeNull();
  });

  it('surfaces Firestore errors from create', async () => {
    const store = new FirestoreStore();
    await store.create('support_tickets', '1', { title: 'a' });
    await expect(store.create('support_tickets', '1', { title: 'b' })).rejects.toThrow('ALREADY_EXISTS');
  });

  it('writes inside a transaction only when the precondition matches', async () => {
    const store = new FirestoreStore();
    await store.create('support_tickets', '1', { version: 1 });

    await expect(store.updateIfMatch('support_tickets', '1', { version: 2 }, { field: 'version', value: 1 })).resolves.toBe(true);
    await expect(store.updateIfMatch('support_tickets', '1', { version: 3 }, { field: 'version', value: 1 })).resolves.toBe(false);

    expect(mockDocs.get('support_tickets/1')).toEqual({ version: 2 });
    expect(mockStats.transactions).toBe(2);
  });

  it('increments counters transactionally', async () => {
    const store = new FirestoreStore();
    expect(await store.increment('counters', 'support_tickets')).toBe(1);
    expect(await store.increment('counters', 'support_tickets')).toBe(2);
    expect(mockDocs.get('counters/support_tickets')).toEqual({ value: 2 });
  });

  it('translates query options into Firestore calls', async () => {
    const store = new FirestoreStore();
    await store.create('support_tickets', '1', { supportLine: 2 });

    const docs = await store.query('support_tickets', {
      filters: [{ field: 'supportLine', operator: '==', value: 2 }],
      orderBy: [
        { field: 'priorityRank', direction: 'desc' },
        { field: 'createdAt', direction: 'asc' },
      ],
      limit: 50,
    });

    expect(docs).toEqual([{ id: '1', data: { supportLine: 2 } }]);
    expect(mockCalls).toEqual([
      'where supportLine == 2',
      'orderBy priorityRank desc',
      'orderBy createdAt asc',
      'limit 50',
    ]);
  });

  it('counts through an aggregation query', async () => {
    const store = new FirestoreStore();
    const total = await store.count('support_tickets', [{ field: 'status', operator: 'in', value: ['new', 'in-progress'] }]);

    expect(total).toBe(7);
    expect(mockCalls).toEqual(['where status in ["new","in-progress"]']);
  });
});

describe('FirestoreEventBus', () => {
  const at = new Date('2026-03-01T10:00:00.000Z');
  const timestamp = { seconds: 1772359200, nanoseconds: 0 };

  it('stores a ticket event without a user', async () => {
    const bus = new FirestoreEventBus();

    await bus.emit({
      id: 'evt-1',
      type: 'ticket.created',
      timestamp: at,
      data: { ticketId: 1, ticketNumber: '#001', supportLine: 2, priority: 'high' },
    });

    expect(mockDocs.get('helpdesk_events/evt-1')).toEqual({
      id: 'evt-1',
      type: 'ticket.created',
      occurredAt: timestamp,
      ticketId: 1,
      ticketNumber: '#001',
      data: { ticketId: 1, ticketNumber: '#001', supportLine: 2, priority: 'high' },
    });
  });

  it('leaves out undefined payload fields and converts dates', async () => {
    const bus = new FirestoreEventBus(undefined, 'support_events');

    await bus.emit({
      id: 'evt-2',
      type: 'feedback.received',
      timestamp: at,
      userId: 'user-1',
      data: { userId: 'user-1', reply: 'спасибо', outcome: 'satisfied', ticketId: undefined, askedAt: at, tags: ['a', undefined] },
    });

    expect(mockDocs.get('support_events/evt-2')).toEqual({
      id: 'evt-2',
      type: 'feedback.received',
      occurredAt: timestamp,
      userId: 'user-1',
      data: { userId: 'user-1', reply: 'спасибо', outcome: 'satisfied', askedAt: timestamp, tags: ['a'] },
    });
  });

  it('dispatches to type and wildcard subscribers after the write', async () => {
    const bus = new FirestoreEventBus();
    const onEscalated = jest.fn().mockResolvedValue(undefined);
    const onAny = jest.fn().mockResolvedValue(undefined);
    bus.on('ticket.escalated', onEscalated);
    bus.on('*', onAny);

    await bus.emit({ type: 'ticket.escalated', timestamp: at, data: { ticketId: 3, fromLine: 1, toLine: 2 } });

    const [event] = onEscalated.mock.calls[0];
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(mockDocs.has(`helpdesk_events/${event.id}`)).toBe(true);
    expect(onAny).toHaveBeenCalledWith(event);

    bus.off('*', onAny);
    await bus.emit({ type: 'ticket.escalated', timestamp: at, data: { ticketId: 3 } });
    expect(onEscalated).toHaveBeenCalledTimes(2);
    expect(onAny).toHaveBeenCalledTimes(1);
  });
});
