/**
 * In-process implementations of the core adapters.
 *
 * Used for local development and tests. Documents are deep-copied on every
 * read and write, so callers never share references with the store.
 */
import { v4 as uuid } from 'uuid';
import type {
  DocumentData,
  DocumentSnapshot,
  DocumentStore,
  QueryFilter,
  QueryOptions,
  WritePrecondition,
} from './store';
import type { EventHandler, HelpdeskEvent, HelpdeskEventBus, HelpdeskEventType } from './events';

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function matches(data: DocumentData, filter: QueryFilter): boolean {
  const actual = data[filter.field];
  switch (filter.operator) {
    case '==':
      return actual === filter.value;
    case '!=':
      return actual !== filter.value;
    case '<':
      return compareValues(actual, filter.value) < 0;
    case '<=':
      return compareValues(actual, filter.value) <= 0;
    case '>':
      return compareValues(actual, filter.value) > 0;
    case '>=':
      return compareValues(actual, filter.value) >= 0;
    case 'in':
      return Array.isArray(filter.value) && filter.value.includes(actual);
    case 'not-in':
      return Array.isArray(filter.value) && !filter.value.includes(actual);
    case 'array-contains':
      return Array.isArray(actual) && actual.includes(filter.value);
  }
}

export class InMemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, Map<string, DocumentData>>();

  private collection(name: string): Map<string, DocumentData> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    const data = this.collection(collection).get(id);
    if (!data) return null;
    return { id, data: structuredClone(data) };
  }

  async create(collection: string, id: string, data: DocumentData): Promise<void> {
    const docs = this.collection(collection);
    if (docs.has(id)) {
      throw new Error(`Document ${collection}/${id} already exists`);
    }
    docs.set(id, structuredClone(data));
  }

  async updateIfMatch(
    collection: string,
    id: string,
    data: DocumentData,
    precondition: WritePrecondition
  ): Promise<boolean> {
    const docs = this.collection(collection);
    const current = docs.get(id);
    if (!current || current[precondition.field] !== precondition.value) return false;
    docs.set(id, structuredClone(data));
    return true;
  }

  async increment(collection: string, id: string): Promise<number> {
    const docs = this.collection(collection);
    const current = docs.get(id)?.value;
    const next = (typeof current === 'number' ? current : 0) + 1;
    docs.set(id, { value: next });
    return next;
  }

  async query(collection: string, options: QueryOptions): Promise<DocumentSnapshot[]> {
    const filters = options.filters ?? [];
    let results = [...this.collection(collection).entries()]
      .filter(([, data]) => filters.every((f) => matches(data, f)))
      .map(([id, data]) => ({ id, data: structuredClone(data) }));

    const orderBy = options.orderBy ?? [];
    if (orderBy.length) {
      results.sort((a, b) => {
        for (const { field, direction } of orderBy) {
          const diff = compareValues(a.data[field], b.data[field]);
          if (diff !== 0) return direction === 'asc' ? diff : -diff;
        }
        return 0;
      });
    }

    if (options.offset) results = results.slice(options.offset);
    if (options.limit) results = results.slice(0, options.limit);
    return results;
  }

  async count(collection: string, filters: QueryFilter[]): Promise<number> {
    let total = 0;
    for (const data of this.collection(collection).values()) {
      if (filters.every((f) => matches(data, f))) total++;
    }
    return total;
  }
}

export class InMemoryEventBus implements HelpdeskEventBus {
  private handlers: Map<string, EventHandler[]> = new Map();
  readonly emitted: HelpdeskEvent[] = [];

  async emit(event: HelpdeskEvent): Promise<void> {
    const withId = { ...event, id: event.id ?? uuid() };
    this.emitted.push(withId);
    const all = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get('*') ?? [])];
    await Promise.all(all.map((h) => h(withId)));
  }

  on(eventType: HelpdeskEventType | '*', handler: EventHandler): void {
    const existing = this.handlers.get(eventType) ?? [];
    existing.push(handler);
    this.handlers.set(eventType, existing);
  }

  off(eventType: HelpdeskEventType | '*', handler: EventHandler): void {
    const existing = this.handlers.get(eventType) ?? [];
    this.handlers.set(eventType, existing.filter((h) => h !== handler));
  }
}
