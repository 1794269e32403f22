import { DocumentStore, HelpdeskEventBus } from '@helpdesk/core';
import { ClassificationProvider, KeywordClassificationProvider, TicketClassifier } from './ai-triage';
import { SupportConfig, loadSupportConfig } from './config';
import { InvalidRequestError } from './errors';
import { FeedbackAnalyzer, PendingFeedback } from './feedback';
import { LLMClassificationProvider } from './llm-classifier';
import { DEFAULT_ROUTING_CONFIG, RoutingConfig, routeTicket } from './routing';
import { DocumentTicketStore } from './ticket-store';
import { TicketService } from './ticket-service';
import { Classification, ConversationMessage, FeedbackOutcome, FeedbackRecord, Ticket } from './ticket-model';

export interface AutomatedAnswer {
  text: string;
  /** The answer source judged the answer good enough to show. */
  adequate: boolean;
  faqMatch: boolean;
}

export interface SupportRequest {
  requesterId: string;
  requesterName: string;
  text: string;
  history?: ConversationMessage[];
  answer?: AutomatedAnswer;
}

export type SupportOutcome =
  | { type: 'answered'; classification: Classification; answer: string; feedbackQuestion?: string }
  | { type: 'ticket'; classification: Classification; ticket: Ticket };

export type FeedbackAction = 'none' | 'ticket-created' | 'ticket-reopened' | 'follow-up-created' | 'ticket-closed';

export interface FeedbackResult {
  record: FeedbackRecord;
  action: FeedbackAction;
  ticket?: Ticket;
}

export interface SupportDeskDeps {
  classifier: TicketClassifier;
  feedback: FeedbackAnalyzer;
  tickets: TicketService;
  routing?: RoutingConfig;
  reopenWindowMs?: number;
  events?: HelpdeskEventBus;
  now?: () => Date;
}

/**
 * Request intake and the feedback cycle: answer or ticket, then escalate,
 * reopen or close depending on what the user says about the outcome.
 */
export class SupportDesk {
  readonly tickets: TicketService;
  readonly feedback: FeedbackAnalyzer;
  private readonly classifier: TicketClassifier;
  private readonly routing: RoutingConfig;
  private readonly reopenWindowMs: number;
  private readonly events?: HelpdeskEventBus;
  private readonly now: () => Date;

  constructor(deps: SupportDeskDeps) {
    this.classifier = deps.classifier;
    this.feedback = deps.feedback;
    this.tickets = deps.tickets;
    this.routing = deps.routing ?? DEFAULT_ROUTING_CONFIG;
    this.reopenWindowMs = deps.reopenWindowMs ?? 72 * 3_600_000;
    this.events = deps.events;
    this.now = deps.now ?? (() => new Date());
  }

  async submitRequest(request: SupportRequest): Promise<SupportOutcome> {
    const history = request.history ?? [];
    const classification = await this.classifier.classify(request.text, history);
    const answer = request.answer;

    if (answer && (answer.adequate || answer.faqMatch)) {
      let feedbackQuestion: string | undefined;
      if (this.feedback.shouldAskFeedback(request.requesterId, answer.adequate, answer.faqMatch)) {
        feedbackQuestion = this.feedback.getFeedbackQuestion();
        this.feedback.registerFeedbackRequest({
          kind: 'answer',
          userId: request.requesterId,
          question: feedbackQuestion,
          request: {
            requesterName: request.requesterName,
            text: request.text,
            classification,
            answer: answer.text,
            history: [...history],
          },
        });
      }
      return { type: 'answered', classification, answer: answer.text, feedbackQuestion };
    }

    const ticket = await this.tickets.createTicket({
      requesterId: request.requesterId,
      requesterName: request.requesterName,
      description: request.text,
      classification,
      supportLine: routeTicket(classification, this.routing),
      ...(answer ? { ragAnswer: answer.text } : {}),
      conversationHistory: [...history, { sender: 'user', text: request.text, sentAt: this.now() }],
    });
    return { type: 'ticket', classification, ticket };
  }

  /** Handle a reply to an open feedback question. `null` when none is open. */
  async submitFeedback(userId: string, reply: string): Promise<FeedbackResult | null> {
    const pending = this.feedback.getPendingFeedback(userId);
    if (!pending) return null;

    const outcome = this.feedback.analyzeFeedback(userId, reply);
    const result =
      pending.kind === 'answer'
        ? await this.afterAnswerFeedback(pending, reply, outcome)
        : await this.afterTicketFeedback(pending, reply, outcome);
    // Cleared only once the follow-up action has committed.
    this.feedback.clearFeedbackRequest(userId);

    await this.emitFeedback(result);
    return result;
  }

  /** Ask the requester of a resolved ticket whether the fix worked. */
  async requestTicketFeedback(ticketId: number): Promise<string> {
    const ticket = await this.tickets.getTicket(ticketId);
    if (ticket.status !== 'resolved') {
      throw new InvalidRequestError(`Ticket ${ticket.ticketNumber} is ${ticket.status}, not resolved`);
    }

    const question = this.feedback.getFeedbackQuestion();
    this.feedback.registerFeedbackRequest({ kind: 'ticket', userId: ticket.requesterId, question, ticketId });
    return question;
  }

  private async afterAnswerFeedback(
    pending: Extract<PendingFeedback, { kind: 'answer' }>,
    reply: string,
    outcome: FeedbackOutcome,
  ): Promise<FeedbackResult> {
    const record: FeedbackRecord = { userId: pending.userId, question: pending.question, reply, outcome };
    const { request } = pending;
    if (!this.feedback.shouldEscalateAfterFeedback(outcome, request.classification.requestKind)) {
      return { record, action: 'none' };
    }

    const ticket = await this.tickets.createTicket({
      requesterId: pending.userId,
      requesterName: request.requesterName,
      description: request.text,
      classification: request.classification,
      supportLine: routeTicket(request.classification, this.routing),
      ragAnswer: request.answer,
      userSatisfaction: outcome,
      conversationHistory: [
        ...request.history,
        { sender: 'user', text: request.text },
        { sender: 'bot', text: request.answer },
        { sender: 'bot', text: pending.question },
        { sender: 'user', text: reply, sentAt: this.now() },
      ],
    });
    return { record: { ...record, ticketId: ticket.id }, action: 'ticket-created', ticket };
  }

  private async afterTicketFeedback(
    pending: Extract<PendingFeedback, { kind: 'ticket' }>,
    reply: string,
    outcome: FeedbackOutcome,
  ): Promise<FeedbackResult> {
    const record: FeedbackRecord = {
      userId: pending.userId,
      ticketId: pending.ticketId,
      question: pending.question,
      reply,
      outcome,
    };
    const original = await this.tickets.getTicket(pending.ticketId);

    if (this.feedback.shouldEscalateAfterFeedback(outcome, original.classification.requestKind)) {
      const reopened = await this.tickets.reopenAfterFeedback(
        original.id,
        outcome,
        { sender: 'user', text: reply },
        { reopenWindowMs: this.reopenWindowMs, actor: pending.userId },
      );
      if (reopened) return { record, action: 'ticket-reopened', ticket: reopened };

      const followUp = await this.tickets.createTicket({
        requesterId: original.requesterId,
        requesterName: original.requesterName,
        description: original.description,
        classification: original.classification,
        supportLine: original.supportLine,
        userSatisfaction: outcome,
        tags: [`follow-up-of-${original.id}`],
        conversationHistory: [{ sender: 'user', text: reply, sentAt: this.now() }],
      });
      await this.tickets.recordSatisfaction(original.id, outcome);
      return { record, action: 'follow-up-created', ticket: followUp };
    }

    if (outcome === 'satisfied') {
      const closed = await this.tickets.closeAfterFeedback(original.id, outcome, { actor: pending.userId });
      if (closed) return { record, action: 'ticket-closed', ticket: closed };
    }
    const updated = await this.tickets.recordSatisfaction(original.id, outcome);
    return { record, action: 'none', ticket: updated };
  }

  private async emitFeedback(result: FeedbackResult): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.emit({
        type: 'feedback.received',
        timestamp: this.now(),
        userId: result.record.userId,
        data: { ...result.record, action: result.action },
      });
    } catch (error) {
      console.error('[support] failed to emit feedback.received:', error);
    }
  }
}

export interface CreateSupportDeskOptions {
  store: DocumentStore;
  events?: HelpdeskEventBus;
  config?: SupportConfig;
  provider?: ClassificationProvider;
  now?: () => Date;
}

/** Wire a support desk from configuration. Reads `SUPPORT_*` env vars when no config is given. */
export function createSupportDesk(options: CreateSupportDeskOptions): SupportDesk {
  const config = options.config ?? loadSupportConfig();
  const provider =
    options.provider ??
    (config.classifier === 'llm' ? new LLMClassificationProvider() : new KeywordClassificationProvider());

  console.log(`[support] desk ready (classifier: ${provider.name})`);

  return new SupportDesk({
    classifier: new TicketClassifier(provider, {
      timeoutMs: config.classifyTimeoutMs,
      retryDelayMs: config.classifyRetryDelayMs,
    }),
    feedback: new FeedbackAnalyzer({ timeoutMs: config.feedbackTimeoutMs, now: options.now }),
    tickets: new TicketService(new DocumentTicketStore(options.store), {
      events: options.events,
      maxWriteRetries: config.maxWriteRetries,
      titleMaxLength: config.titleMaxLength,
      now: options.now,
    }),
    routing: config.routing,
    reopenWindowMs: config.reopenWindowMs,
    events: options.events,
    now: options.now,
  });
}
