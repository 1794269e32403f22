import { InvalidTransitionError } from './errors';
import { StatusChange, SupportLine, TICKET_EVENTS, Ticket, TicketEvent, TicketStatus } from './ticket-model';

/**
 * Ticket lifecycle.
 *
 * Every legal move is listed here; anything absent is rejected. `escalated`
 * is transient: an escalation enters it and is immediately re-queued as `new`
 * on the higher line, so a stored ticket is never left there.
 *
 *   new ──take──▶ in-progress ──resolve──▶ resolved ──close──▶ closed
 *                   │    ▲                   │
 *          await-user    user-replied        reopen ──▶ in-progress
 *                   ▼    │
 *               waiting-for-user
 */
export const TRANSITIONS: Record<TicketStatus, Partial<Record<TicketEvent, TicketStatus>>> = {
  new: { take: 'in-progress', close: 'closed', escalate: 'escalated' },
  'in-progress': { 'await-user': 'waiting-for-user', resolve: 'resolved', escalate: 'escalated', close: 'closed' },
  'waiting-for-user': { 'user-replied': 'in-progress', resolve: 'resolved', close: 'closed' },
  resolved: { close: 'closed', reopen: 'in-progress' },
  escalated: { requeue: 'new' },
  closed: {},
};

/** Events only {@link applyEscalation} may fire. */
const ESCALATION_EVENTS: ReadonlySet<TicketEvent> = new Set<TicketEvent>(['escalate', 'requeue']);

export function nextStatus(from: TicketStatus, event: TicketEvent): TicketStatus | null {
  return TRANSITIONS[from][event] ?? null;
}

/** The event that moves `from` to `to` outside of an escalation, if any. */
export function eventFor(from: TicketStatus, to: TicketStatus): TicketEvent | null {
  return TICKET_EVENTS.find((event) => !ESCALATION_EVENTS.has(event) && TRANSITIONS[from][event] === to) ?? null;
}

export interface TransitionContext {
  at: Date;
  actor?: string;
  note?: string;
  /** Required by `resolve`. */
  resolution?: string;
  /** Set by `take`. */
  assignee?: string;
}

function change(from: TicketStatus, event: TicketEvent, to: TicketStatus, ctx: TransitionContext): StatusChange {
  const entry: StatusChange = { from, to, event, at: ctx.at };
  if (ctx.actor !== undefined) entry.actor = ctx.actor;
  if (ctx.note !== undefined) entry.note = ctx.note;
  return entry;
}

/**
 * Compute the ticket after `event`. Pure: the input is not modified and the
 * version is left for the store to bump.
 */
export function applyTransition(ticket: Ticket, event: TicketEvent, ctx: TransitionContext): Ticket {
  if (ESCALATION_EVENTS.has(event)) {
    throw new InvalidTransitionError(`Use escalate() to move ticket ${ticket.ticketNumber} between lines`);
  }

  const to = nextStatus(ticket.status, event);
  if (to === null) {
    throw new InvalidTransitionError(`Cannot ${event} ticket ${ticket.ticketNumber} in status ${ticket.status}`);
  }

  const next: Ticket = {
    ...ticket,
    status: to,
    updatedAt: ctx.at,
    statusHistory: [...ticket.statusHistory, change(ticket.status, event, to, ctx)],
  };

  switch (event) {
    case 'take':
      if (ctx.assignee !== undefined) next.assignedTo = ctx.assignee;
      break;
    case 'resolve':
      if (!ctx.resolution?.trim()) {
        throw new InvalidTransitionError(`Resolving ticket ${ticket.ticketNumber} requires a resolution`);
      }
      next.resolved = true;
      next.resolution = ctx.resolution;
      next.resolvedAt = ctx.at;
      break;
    case 'reopen':
      next.resolved = false;
      delete next.resolution;
      delete next.resolvedAt;
      break;
  }

  return next;
}

/**
 * Move a ticket to a higher support line. The ticket passes through
 * `escalated` and lands as `new` on `newLine`, unassigned; both steps are
 * recorded in the status history.
 */
export function applyEscalation(ticket: Ticket, newLine: SupportLine, reason: string, ctx: TransitionContext): Ticket {
  if (newLine <= ticket.supportLine) {
    throw new InvalidTransitionError(
      `Ticket ${ticket.ticketNumber} is on line ${ticket.supportLine}; cannot escalate to line ${newLine}`,
    );
  }

  const escalated = nextStatus(ticket.status, 'escalate');
  if (escalated === null) {
    throw new InvalidTransitionError(`Cannot escalate ticket ${ticket.ticketNumber} in status ${ticket.status}`);
  }
  const requeued = nextStatus(escalated, 'requeue');
  if (requeued === null) {
    throw new InvalidTransitionError(`Escalated ticket ${ticket.ticketNumber} cannot be re-queued`);
  }

  const first = change(ticket.status, 'escalate', escalated, { ...ctx, note: reason });
  const second = change(escalated, 'requeue', requeued, { ...ctx, note: `line ${newLine}` });
  const tag = `escalated-from-line-${ticket.supportLine}`;

  const next: Ticket = {
    ...ticket,
    status: requeued,
    supportLine: newLine,
    escalationReason: reason,
    tags: ticket.tags.includes(tag) ? [...ticket.tags] : [...ticket.tags, tag],
    updatedAt: ctx.at,
    statusHistory: [...ticket.statusHistory, first, second],
  };
  delete next.assignedTo;
  return next;
}
