import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SupportError, SupportErrorCode } from './errors';
import { SupportDesk } from './support-desk';
import { TICKET_STATUSES } from './ticket-model';

const STATUS_BY_CODE: Record<SupportErrorCode, number> = {
  invalid_request: 400,
  ticket_not_found: 404,
  invalid_transition: 409,
  concurrent_modification: 409,
  storage_unavailable: 503,
  classification_failed: 500,
  corrupt_record: 500,
};

const LineSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const TicketIdParams = z.object({ id: z.coerce.number().int().positive() });

const QueueParams = z.object({ line: z.coerce.number().pipe(LineSchema) });
const QueueQuery = z.object({ status: z.enum(TICKET_STATUSES).optional() });

const SubmitRequestBody = z.object({
  requesterId: z.string().min(1),
  requesterName: z.string().min(1),
  text: z.string().trim().min(1),
  history: z.array(z.object({ sender: z.enum(['user', 'bot', 'operator']), text: z.string() })).optional(),
  answer: z
    .object({
      text: z.string(),
      adequate: z.boolean(),
      faqMatch: z.boolean().default(false),
    })
    .optional(),
});

const FeedbackBody = z.object({
  userId: z.string().min(1),
  reply: z.string().min(1),
});

const StatusBody = z.object({
  status: z.enum(TICKET_STATUSES),
  note: z.string().optional(),
  resolution: z.string().optional(),
  actor: z.string().optional(),
});

const AssignBody = z.object({ operatorId: z.string().min(1) });

const EscalateBody = z.object({
  newLine: LineSchema,
  reason: z.string().trim().min(1),
  actor: z.string().optional(),
});

export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof z.ZodError) {
    const message = error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    res.status(400).json({ error: 'invalid_request', message });
    return;
  }
  if (error instanceof SupportError) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) console.error(`[support] ${context} error:`, error);
    res.status(status).json({ error: error.code, message: error.message });
    return;
  }
  console.error(`[support] ${context} error:`, error);
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}

export type SupportHandler = (req: Request, res: Response) => Promise<void>;

export interface SupportHandlers {
  submitRequest: SupportHandler;
  submitFeedback: SupportHandler;
  getQueue: SupportHandler;
  getStats: SupportHandler;
  getTicket: SupportHandler;
  updateStatus: SupportHandler;
  assignTicket: SupportHandler;
  escalateTicket: SupportHandler;
  requestFeedback: SupportHandler;
}

export function createSupportHandlers(desk: SupportDesk): SupportHandlers {
  const { tickets } = desk;

  return {
    // --- Intake ---

    submitRequest: async (req, res) => {
      try {
        const body = SubmitRequestBody.parse(req.body);
        const outcome = await desk.submitRequest(body);
        res.status(outcome.type === 'ticket' ? 201 : 200).json(outcome);
      } catch (error) {
        sendError(res, error, 'Submit request');
      }
    },

    submitFeedback: async (req, res) => {
      try {
        const { userId, reply } = FeedbackBody.parse(req.body);
        const result = await desk.submitFeedback(userId, reply);
        res.json(result ? { handled: true, ...result } : { handled: false });
      } catch (error) {
        sendError(res, error, 'Submit feedback');
      }
    },

    // --- Operator queues ---

    getQueue: async (req, res) => {
      try {
        const { line } = QueueParams.parse(req.params);
        const { status } = QueueQuery.parse(req.query);
        const queue = await tickets.getQueue(line, status);
        res.json({ supportLine: line, tickets: queue });
      } catch (error) {
        sendError(res, error, 'Queue');
      }
    },

    getStats: async (_req, res) => {
      try {
        res.json(await tickets.getQueueStats());
      } catch (error) {
        sendError(res, error, 'Stats');
      }
    },

    // --- Tickets ---

    getTicket: async (req, res) => {
      try {
        const { id } = TicketIdParams.parse(req.params);
        res.json(await tickets.getTicket(id));
      } catch (error) {
        sendError(res, error, 'Get ticket');
      }
    },

    updateStatus: async (req, res) => {
      try {
        const { id } = TicketIdParams.parse(req.params);
        const { status, ...options } = StatusBody.parse(req.body);
        res.json(await tickets.updateStatus(id, status, options));
      } catch (error) {
        sendError(res, error, 'Update status');
      }
    },

    assignTicket: async (req, res) => {
      try {
        const { id } = TicketIdParams.parse(req.params);
        const { operatorId } = AssignBody.parse(req.body);
        res.json(await tickets.assignTicket(id, operatorId));
      } catch (error) {
        sendError(res, error, 'Assign ticket');
      }
    },

    escalateTicket: async (req, res) => {
      try {
        const { id } = TicketIdParams.parse(req.params);
        const { newLine, reason, actor } = EscalateBody.parse(req.body);
        res.json(await tickets.escalate(id, newLine, reason, actor));
      } catch (error) {
        sendError(res, error, 'Escalate ticket');
      }
    },

    requestFeedback: async (req, res) => {
      try {
        const { id } = TicketIdParams.parse(req.params);
        const question = await desk.requestTicketFeedback(id);
        res.json({ ticketId: id, question });
      } catch (error) {
        sendError(res, error, 'Request feedback');
      }
    },
  };
}

export function createSupportRouter(desk: SupportDesk): Router {
  const handlers = createSupportHandlers(desk);
  const router = Router();

  router.post('/support/requests', handlers.submitRequest);
  router.post('/support/feedback', handlers.submitFeedback);
  router.get('/support/queue/:line', handlers.getQueue);
  router.get('/support/stats', handlers.getStats);
  router.get('/support/tickets/:id', handlers.getTicket);
  router.patch('/support/tickets/:id/status', handlers.updateStatus);
  router.post('/support/tickets/:id/assign', handlers.assignTicket);
  router.post('/support/tickets/:id/escalate', handlers.escalateTicket);
  router.post('/support/tickets/:id/feedback-request', handlers.requestFeedback);

  return router;
}
