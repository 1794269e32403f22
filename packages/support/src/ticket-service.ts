import { HelpdeskEventBus, HelpdeskEventType } from '@helpdesk/core';
import { ConcurrentModificationError, InvalidRequestError, InvalidTransitionError, TicketNotFoundError } from './errors';
import { applyEscalation, applyTransition, eventFor } from './ticket-lifecycle';
import { TicketStore } from './ticket-store';
import {
  ConversationMessage,
  CreateTicketRequest,
  FeedbackOutcome,
  LineQueueStats,
  QueueStats,
  SupportLine,
  Ticket,
  TicketStatus,
} from './ticket-model';

export interface TicketServiceOptions {
  events?: HelpdeskEventBus;
  /** Re-reads allowed after losing a versioned write. */
  maxWriteRetries?: number;
  titleMaxLength?: number;
  now?: () => Date;
}

interface TicketChange {
  before: Ticket;
  after: Ticket;
}

export interface StatusUpdateOptions {
  note?: string;
  /** Required when moving to `resolved`. */
  resolution?: string;
  actor?: string;
}

/**
 * Owns ticket creation and every change to a stored ticket.
 *
 * Mutations read the ticket, compute the complete next state and commit it as
 * one versioned write. Losing the write to a concurrent change re-reads and
 * re-applies the operation; a move that is no longer legal on the fresh state
 * fails with {@link InvalidTransitionError}.
 */
export class TicketService {
  private readonly events?: HelpdeskEventBus;
  private readonly maxWriteRetries: number;
  private readonly titleMaxLength: number;
  private readonly now: () => Date;

  constructor(private readonly store: TicketStore, options: TicketServiceOptions = {}) {
    this.events = options.events;
    this.maxWriteRetries = options.maxWriteRetries ?? 3;
    this.titleMaxLength = options.titleMaxLength ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  async createTicket(request: CreateTicketRequest): Promise<Ticket> {
    const description = request.description.trim();
    if (!description) throw new InvalidRequestError('Ticket description must not be empty');
    if (!request.requesterId.trim()) throw new InvalidRequestError('Ticket requester must not be empty');

    const now = this.now();
    const ticket = await this.store.create({
      requesterId: request.requesterId,
      requesterName: request.requesterName,
      title: description.slice(0, this.titleMaxLength),
      description: request.description,
      classification: { ...request.classification },
      supportLine: request.supportLine,
      status: 'new',
      createdAt: now,
      updatedAt: now,
      resolved: false,
      tags: [...new Set(request.tags ?? [])],
      ...(request.ragAnswer !== undefined ? { ragAnswer: request.ragAnswer } : {}),
      ...(request.userSatisfaction !== undefined ? { userSatisfaction: request.userSatisfaction } : {}),
      conversationHistory: [...(request.conversationHistory ?? [])],
      statusHistory: [],
    });

    console.log(
      `[support] created ${ticket.ticketNumber} on line ${ticket.supportLine} (${ticket.classification.theme}, ${ticket.classification.priority})`,
    );
    await this.emit('ticket.created', ticket, { supportLine: ticket.supportLine, priority: ticket.classification.priority });
    return ticket;
  }

  async getTicket(id: number): Promise<Ticket> {
    const ticket = await this.store.get(id);
    if (!ticket) throw new TicketNotFoundError(id);
    return ticket;
  }

  async getTicketByNumber(ticketNumber: string): Promise<Ticket> {
    const ticket = await this.store.getByNumber(ticketNumber);
    if (!ticket) throw new TicketNotFoundError(ticketNumber);
    return ticket;
  }

  async getTicketsByRequester(requesterId: string, limit = 10): Promise<Ticket[]> {
    return this.store.listByRequester(requesterId, limit);
  }

  async updateStatus(ticketId: number, status: TicketStatus, options: StatusUpdateOptions = {}): Promise<Ticket> {
    const { before, after } = await this.mutate(ticketId, (ticket) => {
      const event = eventFor(ticket.status, status);
      if (event === null) {
        throw new InvalidTransitionError(`Ticket ${ticket.ticketNumber} cannot move from ${ticket.status} to ${status}`);
      }
      return applyTransition(ticket, event, { ...options, at: this.now() });
    });

    await this.emitStatusChange(before, after, options.actor);
    return after;
  }

  /** Take a `new` ticket. Of two operators racing for it, one wins. */
  async assignTicket(ticketId: number, operatorId: string): Promise<Ticket> {
    if (!operatorId.trim()) throw new InvalidRequestError('Operator id must not be empty');

    const { before, after } = await this.mutate(ticketId, (ticket) =>
      applyTransition(ticket, 'take', { at: this.now(), actor: operatorId, assignee: operatorId }),
    );

    await this.emitStatusChange(before, after, operatorId);
    return after;
  }

  async escalate(ticketId: number, newLine: SupportLine, reason: string, actor?: string): Promise<Ticket> {
    if (!reason.trim()) throw new InvalidRequestError('Escalation reason must not be empty');

    const { before, after } = await this.mutate(ticketId, (ticket) =>
      applyEscalation(ticket, newLine, reason, { at: this.now(), actor }),
    );

    console.log(`[support] escalated ${after.ticketNumber} from line ${before.supportLine} to ${after.supportLine}: ${reason}`);
    await this.emit(
      'ticket.escalated',
      after,
      { fromLine: before.supportLine, toLine: after.supportLine, reason },
      actor,
    );
    return after;
  }

  async appendMessage(ticketId: number, message: ConversationMessage): Promise<Ticket> {
    const { after } = await this.mutate(ticketId, (ticket) => {
      const at = this.now();
      return {
        ...ticket,
        conversationHistory: [...ticket.conversationHistory, { ...message, sentAt: message.sentAt ?? at }],
        updatedAt: at,
      };
    });
    return after;
  }

  /**
   * Reopen a resolved ticket after negative feedback. The outcome, the reply
   * and the `reopen` transition are committed in one write. Resolves to
   * `null` without writing when the fresh ticket is no longer resolved or
   * was resolved more than `reopenWindowMs` ago.
   */
  async reopenAfterFeedback(
    ticketId: number,
    outcome: FeedbackOutcome,
    reply: ConversationMessage,
    options: { reopenWindowMs: number; actor?: string },
  ): Promise<Ticket | null> {
    const change = await this.mutate(ticketId, (ticket) => {
      const at = this.now();
      if (ticket.status !== 'resolved' || !ticket.resolvedAt) return null;
      if (at.getTime() - ticket.resolvedAt.getTime() > options.reopenWindowMs) return null;

      const reopened = applyTransition(ticket, 'reopen', {
        at,
        actor: options.actor,
        note: 'reopened after negative feedback',
      });
      return {
        ...reopened,
        userSatisfaction: outcome,
        conversationHistory: [...reopened.conversationHistory, { ...reply, sentAt: reply.sentAt ?? at }],
      };
    });
    if (!change) return null;

    await this.emitStatusChange(change.before, change.after, options.actor);
    return change.after;
  }

  /** Record the outcome and close a still-resolved ticket in one write; `null` when it is no longer resolved. */
  async closeAfterFeedback(ticketId: number, outcome: FeedbackOutcome, options: { actor?: string } = {}): Promise<Ticket | null> {
    const change = await this.mutate(ticketId, (ticket) => {
      if (ticket.status !== 'resolved') return null;
      const closed = applyTransition(ticket, 'close', {
        at: this.now(),
        actor: options.actor,
        note: 'confirmed by requester',
      });
      return { ...closed, userSatisfaction: outcome };
    });
    if (!change) return null;

    await this.emitStatusChange(change.before, change.after, options.actor);
    return change.after;
  }

  async recordSatisfaction(ticketId: number, outcome: FeedbackOutcome): Promise<Ticket> {
    const { after } = await this.mutate(ticketId, (ticket) => ({
      ...ticket,
      userSatisfaction: outcome,
      updatedAt: this.now(),
    }));
    return after;
  }

  /** Tickets on a line, most urgent first, then oldest first. */
  async getQueue(line: SupportLine, status?: TicketStatus): Promise<Ticket[]> {
    return this.store.listByLine(line, status);
  }

  async getQueueStats(): Promise<QueueStats> {
    const [line1, line2, line3] = await Promise.all([this.lineStats(1), this.lineStats(2), this.lineStats(3)]);
    return { 1: line1, 2: line2, 3: line3 };
  }

  private async lineStats(supportLine: SupportLine): Promise<LineQueueStats> {
    const [pending, inProgress, waitingForUser, resolved] = await Promise.all([
      this.store.countByLine(supportLine, ['new', 'in-progress']),
      this.store.countByLine(supportLine, ['in-progress']),
      this.store.countByLine(supportLine, ['waiting-for-user']),
      this.store.countByLine(supportLine, ['resolved', 'closed']),
    ]);
    return { supportLine, pending, inProgress, waitingForUser, resolved };
  }

  // `apply` returning null abandons the mutation without writing.
  private async mutate(ticketId: number, apply: (ticket: Ticket) => Ticket): Promise<TicketChange>;
  private async mutate(ticketId: number, apply: (ticket: Ticket) => Ticket | null): Promise<TicketChange | null>;
  private async mutate(ticketId: number, apply: (ticket: Ticket) => Ticket | null): Promise<TicketChange | null> {
    for (let attempt = 0; ; attempt++) {
      const before = await this.getTicket(ticketId);
      const next = apply(before);
      if (next === null) return null;
      try {
        const after = await this.store.update(next, before.version);
        return { before, after };
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError) || attempt >= this.maxWriteRetries) throw error;
        console.warn(`[support] ${before.ticketNumber} changed concurrently, retrying (${attempt + 1}/${this.maxWriteRetries})`);
      }
    }
  }

  private async emitStatusChange(before: Ticket, after: Ticket, actor?: string): Promise<void> {
    console.log(`[support] ${after.ticketNumber}: ${before.status} → ${after.status}`);
    await this.emit('ticket.status_changed', after, { from: before.status, to: after.status }, actor);
  }

  // Called after the write commits; emit failures are logged, not rethrown.
  private async emit(type: HelpdeskEventType, ticket: Ticket, data: Record<string, unknown>, userId?: string): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.emit({
        type,
        timestamp: this.now(),
        ...(userId !== undefined ? { userId } : {}),
        data: { ticketId: ticket.id, ticketNumber: ticket.ticketNumber, ...data },
      });
    } catch (error) {
      console.error(`[support] failed to emit ${type} for ${ticket.ticketNumber}:`, error);
    }
  }
}
