export * from './ticket-model';
export * from './errors';
export { SupportConfig, ClassifierKind, DEFAULT_SUPPORT_CONFIG, loadSupportConfig } from './config';

// Classification
export {
  ClassificationProvider,
  ClassificationRequest,
  ClassificationSchema,
  ClassifierOptions,
  DEFAULT_CLASSIFICATION,
  KeywordClassificationProvider,
  TicketClassifier,
} from './ai-triage';
export { LLMClassificationProvider, LLMCall, buildClassificationPrompt, parseModelOutput } from './llm-classifier';

// Feedback
export { FeedbackAnalyzer, FeedbackAnalyzerOptions, FeedbackRequest, PendingFeedback, FeedbackSignals } from './feedback';

// Routing and lifecycle
export { RoutingConfig, DEFAULT_ROUTING_CONFIG, routeTicket, nextSupportLine } from './routing';
export { TRANSITIONS, nextStatus, eventFor } from './ticket-lifecycle';

// Tickets
export { TicketStore, DocumentTicketStore } from './ticket-store';
export { TicketService, TicketServiceOptions, StatusUpdateOptions } from './ticket-service';
export {
  SupportDesk,
  SupportRequest,
  SupportOutcome,
  AutomatedAnswer,
  FeedbackResult,
  FeedbackAction,
  createSupportDesk,
} from './support-desk';

// HTTP
export { createSupportRouter, createSupportHandlers, SupportHandlers } from './routes';
