// ─── Taxonomies ──────────────────────────────────────────────────────────────

export const THEMES = [
  'system-access',
  'technical-issue',
  'software',
  'hardware',
  'security',
  'configuration',
  'system-failure',
  'critical-system-failure',
  'resource-access',
  'network',
  'faq-general',
  'faq-password',
  'faq-antivirus',
] as const;

export type Theme = (typeof THEMES)[number];

export type FaqTheme = Extract<Theme, `faq-${string}`>;

export const REQUEST_KINDS = ['consultation', 'incident'] as const;

export type RequestKind = (typeof REQUEST_KINDS)[number];

/** Listed from most to least severe. */
export const TICKET_PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;

export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export const PRIORITY_RANK: Record<TicketPriority, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export const TARGET_SYSTEMS = [
  'corporate-portal',
  'mail-server',
  'database',
  'network-storage',
  'auth-service',
  'antivirus',
  'printer-scanner',
  'wifi',
  'vpn',
  'other',
] as const;

export type TargetSystem = (typeof TARGET_SYSTEMS)[number];

export const SUPPORT_LINES = [1, 2, 3] as const;

/** 1 = service desk, 2 = technical support, 3 = expert support. */
export type SupportLine = (typeof SUPPORT_LINES)[number];

export const TICKET_STATUSES = [
  'new',
  'in-progress',
  'waiting-for-user',
  'resolved',
  'closed',
  'escalated',
] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const FEEDBACK_OUTCOMES = ['satisfied', 'not-satisfied', 'indeterminate'] as const;

export type FeedbackOutcome = (typeof FEEDBACK_OUTCOMES)[number];

export function isFaqTheme(theme: Theme): theme is FaqTheme {
  return theme.startsWith('faq-');
}

// ─── Classification ──────────────────────────────────────────────────────────

export type Classification = Readonly<{
  theme: Theme;
  requestKind: RequestKind;
  priority: TicketPriority;
  targetSystem: TargetSystem;
  rationale: string;
}>;

// ─── Ticket ──────────────────────────────────────────────────────────────────

export type MessageSender = 'user' | 'bot' | 'operator';

export interface ConversationMessage {
  sender: MessageSender;
  text: string;
  sentAt?: Date;
}

export const TICKET_EVENTS = [
  'take',
  'await-user',
  'user-replied',
  'resolve',
  'close',
  'reopen',
  'escalate',
  'requeue',
] as const;

export type TicketEvent = (typeof TICKET_EVENTS)[number];

export interface StatusChange {
  from: TicketStatus;
  to: TicketStatus;
  event: TicketEvent;
  at: Date;
  actor?: string;
  note?: string;
}

export interface Ticket {
  id: number;
  /** Display form of `id`, e.g. `#007`. */
  ticketNumber: string;
  requesterId: string;
  requesterName: string;
  title: string;
  description: string;
  classification: Classification;
  supportLine: SupportLine;
  status: TicketStatus;
  createdAt: Date;
  updatedAt: Date;
  resolved: boolean;
  resolution?: string;
  resolvedAt?: Date;
  tags: string[];
  assignedTo?: string;
  escalationReason?: string;
  userSatisfaction?: FeedbackOutcome;
  ragAnswer?: string;
  conversationHistory: ConversationMessage[];
  statusHistory: StatusChange[];
  /** Optimistic-concurrency counter; bumped by every committed write. */
  version: number;
}

/** What a store needs to persist a brand-new ticket. */
export type NewTicket = Omit<Ticket, 'id' | 'ticketNumber' | 'version'>;

export interface CreateTicketRequest {
  requesterId: string;
  requesterName: string;
  description: string;
  classification: Classification;
  supportLine: SupportLine;
  ragAnswer?: string;
  conversationHistory?: ConversationMessage[];
  tags?: string[];
  userSatisfaction?: FeedbackOutcome;
}

export function formatTicketNumber(id: number): string {
  return `#${String(id).padStart(3, '0')}`;
}

export interface LineQueueStats {
  supportLine: SupportLine;
  /** `new` + `in-progress` */
  pending: number;
  inProgress: number;
  waitingForUser: number;
  /** `resolved` + `closed` */
  resolved: number;
}

export type QueueStats = Record<SupportLine, LineQueueStats>;

// ─── Feedback ────────────────────────────────────────────────────────────────

export interface FeedbackRecord {
  userId: string;
  ticketId?: number;
  question: string;
  reply: string;
  outcome: FeedbackOutcome;
}
