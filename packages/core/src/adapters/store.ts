/**
 * @helpdesk/core — Document Store Adapter
 *
 * Abstracts document/collection-based data access for the helpdesk.
 * Implementations: FirestoreStore, InMemoryDocumentStore.
 */

export type WhereOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not-in' | 'array-contains';

export type DocumentData = Record<string, unknown>;

export interface QueryFilter {
  field: string;
  operator: WhereOperator;
  value: unknown;
}

export interface QueryOrder {
  field: string;
  direction: 'asc' | 'desc';
}

export interface QueryOptions {
  filters?: QueryFilter[];
  /** Applied in order; later entries break ties of earlier ones. */
  orderBy?: QueryOrder[];
  limit?: number;
  offset?: number;
}

export interface DocumentSnapshot {
  id: string;
  data: DocumentData;
}

/** Compare-and-set guard for {@link DocumentStore.updateIfMatch}. */
export interface WritePrecondition {
  field: string;
  value: string | number | boolean;
}

export interface DocumentStore {
  /** Retrieve a single document by collection and ID. */
  get(collection: string, id: string): Promise<DocumentSnapshot | null>;

  /** Create a document; rejects if the ID is already taken. */
  create(collection: string, id: string, data: DocumentData): Promise<void>;

  /**
   * Replace a document only if it exists and `precondition.field` still holds
   * `precondition.value`. Resolves `false` when the guard does not match.
   */
  updateIfMatch(collection: string, id: string, data: DocumentData, precondition: WritePrecondition): Promise<boolean>;

  /** Atomically increment a numeric counter document and return the new value. */
  increment(collection: string, id: string): Promise<number>;

  /** Query documents with filters, ordering, and pagination. */
  query(collection: string, options: QueryOptions): Promise<DocumentSnapshot[]>;

  /** Count documents matching all filters. */
  count(collection: string, filters: QueryFilter[]): Promise<number>;
}
