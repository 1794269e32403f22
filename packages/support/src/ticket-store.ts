import { z } from 'zod';
import { DocumentData, DocumentSnapshot, DocumentStore, QueryFilter } from '@helpdesk/core';
import { ClassificationSchema } from './ai-triage';
import { ConcurrentModificationError, CorruptTicketRecordError, StorageUnavailableError, SupportError } from './errors';
import {
  FEEDBACK_OUTCOMES,
  NewTicket,
  PRIORITY_RANK,
  SupportLine,
  TICKET_EVENTS,
  TICKET_STATUSES,
  Ticket,
  TicketStatus,
  formatTicketNumber,
} from './ticket-model';

export const TICKETS_COLLECTION = 'support_tickets';
export const COUNTERS_COLLECTION = 'counters';
export const TICKET_SEQUENCE = 'support_tickets';

/** Persistence collaborator of the ticket service. */
export interface TicketStore {
  /** Allocate the next id and persist the ticket at version 1. */
  create(ticket: NewTicket): Promise<Ticket>;
  get(id: number): Promise<Ticket | null>;
  getByNumber(ticketNumber: string): Promise<Ticket | null>;
  /**
   * Persist `ticket` if the stored version still equals `expectedVersion`.
   * Throws {@link ConcurrentModificationError} otherwise.
   */
  update(ticket: Ticket, expectedVersion: number): Promise<Ticket>;
  /** Priority descending, then oldest first, then lowest id. */
  listByLine(line: SupportLine, status?: TicketStatus): Promise<Ticket[]>;
  /** Newest first. */
  listByRequester(requesterId: string, limit: number): Promise<Ticket[]>;
  countByLine(line: SupportLine, statuses: readonly TicketStatus[]): Promise<number>;
}

// ─── Record schema ───────────────────────────────────────────────────────────

const IsoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const ConversationMessageRecord = z.object({
  sender: z.enum(['user', 'bot', 'operator']),
  text: z.string(),
  sentAt: IsoDate.optional(),
});

const StatusChangeRecord = z.object({
  from: z.enum(TICKET_STATUSES),
  to: z.enum(TICKET_STATUSES),
  event: z.enum(TICKET_EVENTS),
  at: IsoDate,
  actor: z.string().optional(),
  note: z.string().optional(),
});

export const TicketRecordSchema = z
  .object({
    id: z.number().int().positive(),
    ticketNumber: z.string(),
    requesterId: z.string(),
    requesterName: z.string(),
    title: z.string(),
    description: z.string(),
    classification: ClassificationSchema,
    supportLine: z.union([z.literal(1), z.literal(2), z.literal(3)]),
    status: z.enum(TICKET_STATUSES),
    /** Denormalized from the classification so stores can order by it. */
    priorityRank: z.number().int(),
    createdAt: IsoDate,
    updatedAt: IsoDate,
    resolved: z.boolean(),
    resolution: z.string().optional(),
    resolvedAt: IsoDate.optional(),
    tags: z.array(z.string()),
    assignedTo: z.string().optional(),
    escalationReason: z.string().optional(),
    userSatisfaction: z.enum(FEEDBACK_OUTCOMES).optional(),
    ragAnswer: z.string().optional(),
    conversationHistory: z.array(ConversationMessageRecord),
    statusHistory: z.array(StatusChangeRecord),
    version: z.number().int().positive(),
  })
  .transform(({ priorityRank: _rank, ...ticket }): Ticket => ticket);

function withoutUndefined(data: DocumentData): DocumentData {
  return Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined));
}

export function toRecord(ticket: Ticket): DocumentData {
  return withoutUndefined({
    ...ticket,
    classification: { ...ticket.classification },
    priorityRank: PRIORITY_RANK[ticket.classification.priority],
    createdAt: ticket.createdAt.toISOString(),
    updatedAt: ticket.updatedAt.toISOString(),
    resolvedAt: ticket.resolvedAt?.toISOString(),
    tags: [...ticket.tags],
    conversationHistory: ticket.conversationHistory.map((m) => withoutUndefined({ ...m, sentAt: m.sentAt?.toISOString() })),
    statusHistory: ticket.statusHistory.map((c) => withoutUndefined({ ...c, at: c.at.toISOString() })),
  });
}

export function fromRecord(snapshot: DocumentSnapshot): Ticket {
  const parsed = TicketRecordSchema.safeParse(snapshot.data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new CorruptTicketRecordError(snapshot.id, detail, parsed.error);
  }
  return parsed.data;
}

// ─── DocumentStore implementation ────────────────────────────────────────────

/**
 * {@link TicketStore} over the document adapter. Works against Firestore
 * (`FirestoreStore`) or the in-process store; ids come from an atomic counter
 * document and every update is a compare-and-set on `version`.
 */
export class DocumentTicketStore implements TicketStore {
  constructor(private readonly store: DocumentStore) {}

  async create(input: NewTicket): Promise<Ticket> {
    return this.guard('create', async () => {
      const id = await this.store.increment(COUNTERS_COLLECTION, TICKET_SEQUENCE);
      const ticket: Ticket = { ...input, id, ticketNumber: formatTicketNumber(id), version: 1 };
      await this.store.create(TICKETS_COLLECTION, String(id), toRecord(ticket));
      return ticket;
    });
  }

  async get(id: number): Promise<Ticket | null> {
    return this.guard('get', async () => {
      const snapshot = await this.store.get(TICKETS_COLLECTION, String(id));
      return snapshot ? fromRecord(snapshot) : null;
    });
  }

  async getByNumber(ticketNumber: string): Promise<Ticket | null> {
    return this.guard('getByNumber', async () => {
      const [first] = await this.store.query(TICKETS_COLLECTION, {
        filters: [{ field: 'ticketNumber', operator: '==', value: ticketNumber }],
        limit: 1,
      });
      return first ? fromRecord(first) : null;
    });
  }

  async update(ticket: Ticket, expectedVersion: number): Promise<Ticket> {
    const next: Ticket = { ...ticket, version: expectedVersion + 1 };
    const written = await this.guard('update', () =>
      this.store.updateIfMatch(TICKETS_COLLECTION, String(ticket.id), toRecord(next), {
        field: 'version',
        value: expectedVersion,
      }),
    );
    if (!written) throw new ConcurrentModificationError(ticket.id);
    return next;
  }

  async listByLine(line: SupportLine, status?: TicketStatus): Promise<Ticket[]> {
    const filters: QueryFilter[] = [{ field: 'supportLine', operator: '==', value: line }];
    if (status) filters.push({ field: 'status', operator: '==', value: status });

    return this.guard('listByLine', async () => {
      const docs = await this.store.query(TICKETS_COLLECTION, {
        filters,
        orderBy: [
          { field: 'priorityRank', direction: 'desc' },
          { field: 'createdAt', direction: 'asc' },
          { field: 'id', direction: 'asc' },
        ],
      });
      return docs.map((doc) => fromRecord(doc));
    });
  }

  async listByRequester(requesterId: string, limit: number): Promise<Ticket[]> {
    return this.guard('listByRequester', async () => {
      const docs = await this.store.query(TICKETS_COLLECTION, {
        filters: [{ field: 'requesterId', operator: '==', value: requesterId }],
        orderBy: [
          { field: 'createdAt', direction: 'desc' },
          { field: 'id', direction: 'desc' },
        ],
        limit,
      });
      return docs.map((doc) => fromRecord(doc));
    });
  }

  async countByLine(line: SupportLine, statuses: readonly TicketStatus[]): Promise<number> {
    return this.guard('countByLine', () =>
      this.store.count(TICKETS_COLLECTION, [
        { field: 'supportLine', operator: '==', value: line },
        { field: 'status', operator: 'in', value: [...statuses] },
      ]),
    );
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SupportError) throw error;
      throw new StorageUnavailableError(operation, error);
    }
  }
}
