/**
 * Firebase Firestore implementation of DocumentStore.
 *
 * Conditional writes and counters run inside Firestore transactions, which
 * retry on contention and serialize writers to the same document.
 */
import * as admin from 'firebase-admin';
import type {
  DocumentData,
  DocumentSnapshot,
  DocumentStore,
  QueryFilter,
  QueryOptions,
  WritePrecondition,
} from '@helpdesk/core';

export class FirestoreStore implements DocumentStore {
  private db: admin.firestore.Firestore;

  constructor(app?: admin.app.App) {
    this.db = (app ?? admin.app()).firestore();
  }

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    const doc = await this.db.collection(collection).doc(id).get();
    const data = doc.data();
    if (!doc.exists || !data) return null;
    return { id: doc.id, data };
  }

  async create(collection: string, id: string, data: DocumentData): Promise<void> {
    await this.db.collection(collection).doc(id).create(data);
  }

  async updateIfMatch(
    collection: string,
    id: string,
    data: DocumentData,
    precondition: WritePrecondition
  ): Promise<boolean> {
    const ref = this.db.collection(collection).doc(id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (!snap.exists || snap.get(precondition.field) !== precondition.value) return false;
      tx.set(ref, data);
      return true;
    });
  }

  async increment(collection: string, id: string): Promise<number> {
    const ref = this.db.collection(collection).doc(id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      const current = snap.exists ? snap.get('value') : 0;
      const next = (typeof current === 'number' ? current : 0) + 1;
      tx.set(ref, { value: next });
      return next;
    });
  }

  async query(collection: string, options: QueryOptions): Promise<DocumentSnapshot[]> {
    let ref = this.applyFilters(this.db.collection(collection), options.filters ?? []);

    for (const order of options.orderBy ?? []) {
      ref = ref.orderBy(order.field, order.direction);
    }

    if (options.offset) {
      ref = ref.offset(options.offset);
    }

    if (options.limit) {
      ref = ref.limit(options.limit);
    }

    const snapshot = await ref.get();
    return snapshot.docs.map((doc) => ({
      id: doc.id,
      data: doc.data(),
    }));
  }

  async count(collection: string, filters: QueryFilter[]): Promise<number> {
    const snapshot = await this.applyFilters(this.db.collection(collection), filters).count().get();
    return snapshot.data().count;
  }

  private applyFilters(ref: admin.firestore.Query, filters: QueryFilter[]): admin.firestore.Query {
    let query = ref;
    for (const filter of filters) {
      query = query.where(filter.field, filter.operator, filter.value);
    }
    return query;
  }
}
