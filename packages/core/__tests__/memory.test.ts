import { InMemoryDocumentStore, InMemoryEventBus } from '../src/adapters/memory';
import type { HelpdeskEvent } from '../src/adapters/events';

describe('InMemoryDocumentStore', () => {
  let store: InMemoryDocumentStore;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
  });

  it('creates and reads back a copy of the document', async () => {
    const data = { title: 'VPN down', tags: ['vpn'] };
    await store.create('tickets', '1', data);
    data.tags.push('mutated');

    const snap = await store.get('tickets', '1');
    expect(snap).toEqual({ id: '1', data: { title: 'VPN down', tags: ['vpn'] } });
  });

  it('rejects creating a document twice', async () => {
    await store.create('tickets', '1', { title: 'a' });
    await expect(store.create('tickets', '1', { title: 'b' })).rejects.toThrow('tickets/1 already exists');
  });

  it('returns null for a missing document', async () => {
    expect(await store.get('tickets', 'nope')).toBeNull();
  });

  it('updates only when the precondition holds', async () => {
    await store.create('tickets', '1', { version: 1, status: 'new' });

    expect(await store.updateIfMatch('tickets', '1', { version: 2, status: 'in-progress' }, { field: 'version', value: 1 })).toBe(true);
    expect(await store.updateIfMatch('tickets', '1', { version: 2, status: 'closed' }, { field: 'version', value: 1 })).toBe(false);

    const snap = await store.get('tickets', '1');
    expect(snap?.data.status).toBe('in-progress');
  });

  it('does not create documents through updateIfMatch', async () => {
    expect(await store.updateIfMatch('tickets', '9', { version: 1 }, { field: 'version', value: 0 })).toBe(false);
    expect(await store.get('tickets', '9')).toBeNull();
  });

  it('increments counters from zero', async () => {
    expect(await store.increment('counters', 'tickets')).toBe(1);
    expect(await store.increment('counters', 'tickets')).toBe(2);
    expect(await store.increment('counters', 'other')).toBe(1);
  });

  it('filters, orders by several fields and paginates', async () => {
    await store.create('t', 'a', { line: 1, rank: 1, createdAt: '2026-01-01T00:00:00.000Z' });
    await store.create('t', 'b', { line: 1, rank: 4, createdAt: '2026-01-03T00:00:00.000Z' });
    await store.create('t', 'c', { line: 1, rank: 4, createdAt: '2026-01-02T00:00:00.000Z' });
    await store.create('t', 'd', { line: 2, rank: 4, createdAt: '2026-01-01T00:00:00.000Z' });

    const ordered = await store.query('t', {
      filters: [{ field: 'line', operator: '==', value: 1 }],
      orderBy: [
        { field: 'rank', direction: 'desc' },
        { field: 'createdAt', direction: 'asc' },
      ],
    });
    expect(ordered.map((d) => d.id)).toEqual(['c', 'b', 'a']);

    const page = await store.query('t', {
      filters: [{ field: 'line', operator: '==', value: 1 }],
      orderBy: [{ field: 'createdAt', direction: 'asc' }],
      offset: 1,
      limit: 1,
    });
    expect(page.map((d) => d.id)).toEqual(['c']);
  });

  it('supports in and array-contains filters', async () => {
    await store.create('t', 'a', { status: 'new', tags: ['vpn'] });
    await store.create('t', 'b', { status: 'closed', tags: [] });
    await store.create('t', 'c', { status: 'in-progress', tags: ['vpn', 'wifi'] });

    const open = await store.query('t', { filters: [{ field: 'status', operator: 'in', value: ['new', 'in-progress'] }] });
    expect(open.map((d) => d.id).sort()).toEqual(['a', 'c']);

    const vpn = await store.query('t', { filters: [{ field: 'tags', operator: 'array-contains', value: 'wifi' }] });
    expect(vpn.map((d) => d.id)).toEqual(['c']);
  });

  it('counts matching documents', async () => {
    await store.create('t', 'a', { line: 1, status: 'new' });
    await store.create('t', 'b', { line: 1, status: 'closed' });
    await store.create('t', 'c', { line: 2, status: 'new' });

    expect(await store.count('t', [{ field: 'line', operator: '==', value: 1 }])).toBe(2);
    expect(await store.count('t', [
      { field: 'line', operator: '==', value: 1 },
      { field: 'status', operator: 'not-in', value: ['closed'] },
    ])).toBe(1);
    expect(await store.count('missing', [])).toBe(0);
  });
});

describe('InMemoryEventBus', () => {
  const event: HelpdeskEvent = {
    type: 'ticket.created',
    timestamp: new Date('2026-01-01T00:00:00.000Z'),
    data: { ticketNumber: '#001' },
  };

  it('dispatches to typed and wildcard handlers and records the event', async () => {
    const bus = new InMemoryEventBus();
    const typed = jest.fn().mockResolvedValue(undefined);
    const wildcard = jest.fn().mockResolvedValue(undefined);
    const other = jest.fn().mockResolvedValue(undefined);
    bus.on('ticket.created', typed);
    bus.on('*', wildcard);
    bus.on('ticket.escalated', other);

    await bus.emit(event);

    expect(typed).toHaveBeenCalledTimes(1);
    expect(wildcard).toHaveBeenCalledTimes(1);
    expect(other).not.toHaveBeenCalled();
    expect(bus.emitted).toHaveLength(1);
    expect(bus.emitted[0].id).toEqual(expect.any(String));
  });

  it('stops dispatching after off', async () => {
    const bus = new InMemoryEventBus();
    const handler = jest.fn().mockResolvedValue(undefined);
    bus.on('ticket.created', handler);
    bus.off('ticket.created', handler);

    await bus.emit(event);
    expect(handler).not.toHaveBeenCalled();
  });
});
