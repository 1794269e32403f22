import { FeedbackAnalyzer, normalizeWords } from '../feedback';
import { Classification } from '../ticket-model';

const CLASSIFICATION: Classification = {
  theme: 'faq-password',
  requestKind: 'consultation',
  priority: 'low',
  targetSystem: 'auth-service',
  rationale: 'password question',
};

describe('normalizeWords', () => {
  it('should lower-case, fold ё and drop punctuation', () => {
    expect(normalizeWords('Всё ещё НЕ работает!!! (по-прежнему)')).toEqual(['все', 'еще', 'не', 'работает', 'по', 'прежнему']);
  });
});

describe('FeedbackAnalyzer', () => {
  let logSpy: jest.SpyInstance;
  let clock: Date;
  let analyzer: FeedbackAnalyzer;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    clock = new Date('2026-03-01T10:00:00Z');
    analyzer = new FeedbackAnalyzer({ now: () => clock, random: () => 0 });
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  describe('analyzeFeedback', () => {
    it('should read gratitude as satisfied', () => {
      expect(analyzer.analyzeFeedback('u1', 'спасибо, помогло')).toBe('satisfied');
    });

    it('should read a continuing problem as not satisfied', () => {
      expect(analyzer.analyzeFeedback('u1', 'не работает, все еще проблема')).toBe('not-satisfied');
    });

    it('should not count "работает" inside "не работает" as positive', () => {
      expect(analyzer.analyzeFeedback('u1', 'не работает')).toBe('not-satisfied');
    });

    it('should return indeterminate without signals', () => {
      expect(analyzer.analyzeFeedback('u1', 'ладно')).toBe('indeterminate');
    });

    it('should return indeterminate on a tie', () => {
      expect(analyzer.analyzeFeedback('u1', 'спасибо, но не помогло')).toBe('indeterminate');
    });

    it('should prefer the longer phrase', () => {
      expect(analyzer.analyzeFeedback('u1', 'Проблема решена')).toBe('satisfied');
      expect(analyzer.analyzeFeedback('u1', 'Всё хорошо')).toBe('satisfied');
    });

    it('should understand English replies', () => {
      expect(analyzer.analyzeFeedback('u1', 'Thank you, it works now')).toBe('satisfied');
      expect(analyzer.analyzeFeedback('u1', "Doesn't work, still the same")).toBe('not-satisfied');
    });

    it('should log the score', () => {
      analyzer.analyzeFeedback('u1', 'спасибо, помогло');
      expect(logSpy).toHaveBeenCalledWith('[feedback] user u1: +2/-0 → satisfied');
    });
  });

  describe('shouldEscalateAfterFeedback', () => {
    it('should escalate when not satisfied', () => {
      expect(analyzer.shouldEscalateAfterFeedback('not-satisfied', 'consultation')).toBe(true);
      expect(analyzer.shouldEscalateAfterFeedback('not-satisfied', 'incident')).toBe(true);
    });

    it('should escalate an indeterminate incident but not a consultation', () => {
      expect(analyzer.shouldEscalateAfterFeedback('indeterminate', 'incident')).toBe(true);
      expect(analyzer.shouldEscalateAfterFeedback('indeterminate', 'consultation')).toBe(false);
    });

    it('should not escalate when satisfied', () => {
      expect(analyzer.shouldEscalateAfterFeedback('satisfied', 'incident')).toBe(false);
    });
  });

  describe('pending requests', () => {
    it('should ask only after a good answer or an FAQ match', () => {
      expect(analyzer.shouldAskFeedback('u1', false, false)).toBe(false);
      expect(analyzer.shouldAskFeedback('u1', true, false)).toBe(true);
      expect(analyzer.shouldAskFeedback('u1', false, true)).toBe(true);
    });

    it('should not ask twice while a question is open', () => {
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u1', question: 'Помог ли вам ответ?', ticketId: 7 });

      expect(analyzer.shouldAskFeedback('u1', true, true)).toBe(false);
      expect(analyzer.shouldAskFeedback('u2', true, true)).toBe(true);
    });

    it('should return and clear a pending request', () => {
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u1', question: 'Все ли понятно?', ticketId: 7 });

      expect(analyzer.getPendingFeedback('u1')).toEqual({
        kind: 'ticket',
        userId: 'u1',
        question: 'Все ли понятно?',
        ticketId: 7,
        askedAt: new Date('2026-03-01T10:00:00Z'),
      });

      analyzer.clearFeedbackRequest('u1');
      expect(analyzer.getPendingFeedback('u1')).toBeNull();
    });

    it('should expire a request after the timeout', () => {
      analyzer.registerFeedbackRequest({
        kind: 'answer',
        userId: 'u1',
        question: 'Помог ли вам ответ?',
        request: { requesterName: 'Anna', text: 'Как сменить пароль?', classification: CLASSIFICATION, answer: 'Open settings', history: [] },
      });

      clock = new Date('2026-03-01T10:30:00Z');
      expect(analyzer.getPendingFeedback('u1')).not.toBeNull();

      clock = new Date('2026-03-01T10:30:01Z');
      expect(analyzer.getPendingFeedback('u1')).toBeNull();
    });

    it('should drop expired requests of users who never replied', () => {
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u1', question: 'Все ли понятно?', ticketId: 1 });
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u2', question: 'Все ли понятно?', ticketId: 2 });
      expect(analyzer.pendingCount).toBe(2);

      clock = new Date('2026-03-01T11:00:00Z');
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u3', question: 'Все ли понятно?', ticketId: 3 });

      expect(analyzer.pendingCount).toBe(1);
      expect(analyzer.getPendingFeedback('u3')).toMatchObject({ kind: 'ticket', ticketId: 3 });
    });

    it('should pick a clarification question', () => {
      expect(analyzer.getFeedbackQuestion()).toBe('Помог ли вам ответ?');
      const last = new FeedbackAnalyzer({ random: () => 0.999 });
      expect(last.getFeedbackQuestion()).toBe('Работает ли это сейчас?');
    });
  });

  describe('isFeedbackMessage', () => {
    beforeEach(() => {
      analyzer.registerFeedbackRequest({ kind: 'ticket', userId: 'u1', question: 'Помог ли вам ответ?', ticketId: 3 });
    });

    it('should accept short yes/no replies', () => {
      expect(analyzer.isFeedbackMessage('u1', 'Да')).toBe(true);
      expect(analyzer.isFeedbackMessage('u1', 'нет, увы')).toBe(true);
    });

    it('should accept longer replies with signal phrases', () => {
      expect(analyzer.isFeedbackMessage('u1', 'я попробовал ещё раз и всё равно не работает')).toBe(true);
    });

    it('should reject unrelated messages', () => {
      expect(analyzer.isFeedbackMessage('u1', 'а где находится переговорная на третьем этаже')).toBe(false);
    });

    it('should reject anything without a pending question', () => {
      expect(analyzer.isFeedbackMessage('u2', 'да')).toBe(false);
    });
  });
});
