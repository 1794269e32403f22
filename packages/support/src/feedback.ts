import { z } from 'zod';
import rawSignals from '../data/feedback-signals.json';
import { Classification, ConversationMessage, FeedbackOutcome, RequestKind } from './ticket-model';

const FeedbackSignalsSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
  shortReplies: z.array(z.string().min(1)),
  questions: z.array(z.string().min(1)).nonempty(),
});

export type FeedbackSignals = z.infer<typeof FeedbackSignalsSchema>;

export const DEFAULT_FEEDBACK_SIGNALS: FeedbackSignals = FeedbackSignalsSchema.parse(rawSignals);

/** The automated answer a user was asked about. */
export interface AnsweredRequest {
  requesterName: string;
  text: string;
  classification: Classification;
  answer: string;
  history: ConversationMessage[];
}

export type FeedbackRequest =
  | { kind: 'answer'; userId: string; question: string; request: AnsweredRequest }
  | { kind: 'ticket'; userId: string; question: string; ticketId: number };

export type PendingFeedback = FeedbackRequest & { askedAt: Date };

export interface FeedbackAnalyzerOptions {
  timeoutMs?: number;
  signals?: FeedbackSignals;
  now?: () => Date;
  random?: () => number;
}

interface Phrase {
  words: string[];
  polarity: 'positive' | 'negative';
}

export function normalizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/ё/g, 'е')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .split(' ')
    .filter(Boolean);
}

/**
 * Decides whether a user was satisfied by an automated answer, and keeps the
 * per-user registry of open feedback questions.
 *
 * Replies are scored by lexical phrase matching: words are scanned left to
 * right, the longest phrase that starts at the current word wins and its words
 * are consumed, so "не работает" counts once as negative and never as
 * "работает".
 */
export class FeedbackAnalyzer {
  private readonly pending = new Map<string, PendingFeedback>();
  private readonly phrases: Phrase[];
  private readonly shortReplies: Set<string>;
  private readonly questions: readonly string[];
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(options: FeedbackAnalyzerOptions = {}) {
    const signals = options.signals ?? DEFAULT_FEEDBACK_SIGNALS;
    this.phrases = [
      ...signals.positive.map((p): Phrase => ({ words: normalizeWords(p), polarity: 'positive' })),
      ...signals.negative.map((p): Phrase => ({ words: normalizeWords(p), polarity: 'negative' })),
    ]
      .filter((p) => p.words.length > 0)
      .sort((a, b) => b.words.length - a.words.length);
    this.shortReplies = new Set(signals.shortReplies.flatMap(normalizeWords));
    this.questions = signals.questions;
    this.timeoutMs = options.timeoutMs ?? 30 * 60_000;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  shouldAskFeedback(userId: string, hasGoodAnswer: boolean, isFaq: boolean): boolean {
    return (hasGoodAnswer || isFaq) && this.getPendingFeedback(userId) === null;
  }

  getFeedbackQuestion(): string {
    const index = Math.min(Math.floor(this.random() * this.questions.length), this.questions.length - 1);
    return this.questions[index];
  }

  analyzeFeedback(userId: string, replyText: string): FeedbackOutcome {
    const { positive, negative } = this.countSignals(normalizeWords(replyText));
    const outcome: FeedbackOutcome =
      positive > negative ? 'satisfied' : negative > positive ? 'not-satisfied' : 'indeterminate';
    console.log(`[feedback] user ${userId}: +${positive}/-${negative} → ${outcome}`);
    return outcome;
  }

  shouldEscalateAfterFeedback(outcome: FeedbackOutcome, requestKind: RequestKind): boolean {
    return outcome === 'not-satisfied' || (outcome === 'indeterminate' && requestKind === 'incident');
  }

  /** Registers a question for the user and drops every expired one. */
  registerFeedbackRequest(request: FeedbackRequest): PendingFeedback {
    const now = this.now();
    for (const [userId, entry] of this.pending) {
      if (this.isExpired(entry, now)) this.pending.delete(userId);
    }

    const entry: PendingFeedback = { ...request, askedAt: now };
    this.pending.set(request.userId, entry);
    return entry;
  }

  getPendingFeedback(userId: string): PendingFeedback | null {
    const entry = this.pending.get(userId);
    if (!entry) return null;
    if (this.isExpired(entry, this.now())) {
      this.pending.delete(userId);
      return null;
    }
    return entry;
  }

  /** Open questions, expired ones included until the next sweep. */
  get pendingCount(): number {
    return this.pending.size;
  }

  clearFeedbackRequest(userId: string): void {
    this.pending.delete(userId);
  }

  private isExpired(entry: PendingFeedback, at: Date): boolean {
    return at.getTime() - entry.askedAt.getTime() > this.timeoutMs;
  }

  /** True when `text` looks like an answer to the user's open feedback question. */
  isFeedbackMessage(userId: string, text: string): boolean {
    if (this.getPendingFeedback(userId) === null) return false;

    const words = normalizeWords(text);
    if (words.length <= 3 && words.some((w) => this.shortReplies.has(w))) return true;

    const { positive, negative } = this.countSignals(words);
    return positive + negative > 0;
  }

  private countSignals(words: string[]): { positive: number; negative: number } {
    const counts = { positive: 0, negative: 0 };
    let i = 0;
    while (i < words.length) {
      const hit = this.phrases.find((p) => p.words.every((w, k) => words[i + k] === w));
      if (hit) {
        counts[hit.polarity]++;
        i += hit.words.length;
      } else {
        i++;
      }
    }
    return counts;
  }
}
