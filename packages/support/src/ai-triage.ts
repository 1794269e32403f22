import { z } from 'zod';
import { ClassificationFailure, InvalidRequestError } from './errors';
import {
  Classification,
  ConversationMessage,
  REQUEST_KINDS,
  RequestKind,
  TARGET_SYSTEMS,
  THEMES,
  TICKET_PRIORITIES,
  TargetSystem,
  Theme,
  TicketPriority,
} from './ticket-model';

export const ClassificationSchema = z
  .object({
    theme: z.enum(THEMES),
    requestKind: z.enum(REQUEST_KINDS),
    priority: z.enum(TICKET_PRIORITIES),
    targetSystem: z.enum(TARGET_SYSTEMS),
    rationale: z.string(),
  })
  .readonly();

export const DEFAULT_CLASSIFICATION: Classification = Object.freeze({
  theme: 'faq-general',
  requestKind: 'consultation',
  priority: 'low',
  targetSystem: 'other',
  rationale: 'classification failed, defaulted',
});

/** How many trailing history messages a provider sees. */
export const HISTORY_CONTEXT_SIZE = 3;

export interface ClassificationRequest {
  text: string;
  history: readonly ConversationMessage[];
}

export interface ClassificationProvider {
  readonly name: string;
  classify(request: ClassificationRequest, signal: AbortSignal): Promise<Classification>;
}

export interface ClassifierOptions {
  timeoutMs?: number;
  retryDelayMs?: number;
}

const MAX_ATTEMPTS = 2;

/**
 * Classifies free-text requests through a provider, bounded by a per-attempt
 * timeout. One retry, then the default classification; provider errors never
 * reach the caller.
 */
export class TicketClassifier {
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(private readonly provider: ClassificationProvider, options: ClassifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
  }

  async classify(text: string, history: readonly ConversationMessage[] = []): Promise<Classification> {
    if (!text.trim()) {
      throw new InvalidRequestError('Request text must not be empty');
    }

    const request: ClassificationRequest = { text, history: history.slice(-HISTORY_CONTEXT_SIZE) };

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        return await this.attempt(request);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[classifier] ${this.provider.name} attempt ${attempt}/${MAX_ATTEMPTS} failed: ${message}`);
        if (attempt < MAX_ATTEMPTS) await delay(this.retryDelayMs);
      }
    }

    console.error('[classifier] using default classification');
    return DEFAULT_CLASSIFICATION;
  }

  private async attempt(request: ClassificationRequest): Promise<Classification> {
    const raw = await withTimeout(this.timeoutMs, (signal) => this.provider.classify(request, signal));
    const parsed = ClassificationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ClassificationFailure(`Malformed classification from ${this.provider.name}`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

async function withTimeout<T>(timeoutMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ClassificationFailure(`Classification timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Keyword provider ────────────────────────────────────────────────────────

type Rules<T> = ReadonlyArray<readonly [T, readonly RegExp[]]>;

// Checked in order; the first label with a matching pattern wins.
const THEME_RULES: Rules<Theme> = [
  ['critical-system-failure', [/не работает у всех/i, /(вся|весь) (сеть|офис|отдел)/i, /сервер (упал|лежит)/i, /outage/i, /(everyone|whole office|all users)/i, /server is down/i]],
  ['faq-password', [/(забыл|сбросить|сменить|поменять|восстановить)[а-яё ]*парол/i, /парол[а-яё]* (истек|устарел)/i, /(forgot|reset|change)[a-z ]*password/i, /password (expired|reset)/i]],
  ['faq-antivirus', [/(как|где)[а-яё ]*антивирус/i, /антивирус[а-яё]* (обнов|установ)/i, /(update|install)[a-z ]*antivirus/i]],
  ['security', [/вирус/i, /фишинг/i, /взлом/i, /подозрительн/i, /malware/i, /phishing/i, /virus/i, /hacked/i, /suspicious/i]],
  ['system-failure', [/сбой/i, /упал/i, /завис/i, /не запускается/i, /crash/i, /freez/i, /won'?t start/i]],
  ['network', [/интернет/i, /сеть/i, /сети/i, /wi-?fi/i, /вай-?фай/i, /vpn/i, /впн/i, /network/i, /internet/i]],
  ['resource-access', [/доступ к (папке|файлу|диску|ресурсу)/i, /прав[аo]? доступа/i, /access to (the )?(folder|file|share|drive)/i, /permission denied/i]],
  ['system-access', [/не могу (войти|зайти)/i, /доступ к (системе|порталу|почте)/i, /учетн/i, /авторизац/i, /(can'?t|cannot|unable to) (log ?in|sign in)/i, /locked out/i]],
  ['configuration', [/настро/i, /конфигур/i, /configur/i, /settings?/i, /set ?up/i]],
  ['hardware', [/принтер/i, /сканер/i, /монитор/i, /клавиатур/i, /мыш[ьк]/i, /ноутбук/i, /printer/i, /scanner/i, /monitor/i, /keyboard/i, /mouse/i, /laptop/i]],
  ['software', [/программ/i, /приложени/i, /установ/i, /обновлени/i, /outlook/i, /excel/i, /software/i, /install/i, /application/i]],
  ['technical-issue', [/не работает/i, /ошибк/i, /проблем/i, /error/i, /not working/i, /broken/i, /issue/i]],
];

const PRIORITY_RULES: Rules<TicketPriority> = [
  ['critical', [/не работает у всех/i, /(вся|весь) (сеть|офис|отдел)/i, /сервер (упал|лежит)/i, /утечк/i, /outage/i, /(everyone|whole office|all users)/i, /data leak/i]],
  ['high', [/срочно/i, /не могу работать/i, /блокир/i, /urgent/i, /asap/i, /(can'?t|cannot) work/i, /blocker/i]],
  ['medium', [/не работает/i, /ошибк/i, /сбой/i, /не могу/i, /error/i, /not working/i, /broken/i, /(can'?t|cannot)/i]],
];

const INCIDENT_PATTERNS: readonly RegExp[] = [
  /не работает/i, /ошибк/i, /сбой/i, /упал/i, /завис/i, /сломал/i, /не могу/i, /не открывается/i,
  /error/i, /not working/i, /broken/i, /crash/i, /fail/i, /down/i, /can'?t/i, /cannot/i,
];

const TARGET_SYSTEM_RULES: Rules<TargetSystem> = [
  ['vpn', [/vpn/i, /впн/i]],
  ['wifi', [/wi-?fi/i, /вай-?фай/i, /беспроводн/i, /wireless/i]],
  ['antivirus', [/антивирус/i, /antivirus/i]],
  ['printer-scanner', [/принтер/i, /сканер/i, /печат/i, /printer/i, /scanner/i, /print/i]],
  ['network-storage', [/сетев[а-яё]* (диск|папк|хранилищ)/i, /файлов[а-яё]* (сервер|хранилищ)/i, /network (drive|share|storage)/i, /file share/i]],
  ['mail-server', [/почт/i, /outlook/i, /e-?mail/i, /mailbox/i]],
  ['database', [/баз[а-яё]* данных/i, /database/i, /\bsql\b/i]],
  ['corporate-portal', [/портал/i, /portal/i, /intranet/i]],
  ['auth-service', [/парол/i, /авторизац/i, /учетн/i, /войти/i, /password/i, /log ?in/i, /sign in/i, /\bsso\b/i]],
];

function firstMatch<T>(rules: Rules<T>, text: string): { label: T; fragment: string } | null {
  for (const [label, patterns] of rules) {
    for (const pattern of patterns) {
      const match = pattern.exec(text);
      if (match) return { label, fragment: match[0] };
    }
  }
  return null;
}

/** Rule-based classification; no network, no model. */
export class KeywordClassificationProvider implements ClassificationProvider {
  readonly name = 'keyword';

  async classify(request: ClassificationRequest): Promise<Classification> {
    const text = request.text;
    const theme = firstMatch(THEME_RULES, text);
    const priority = firstMatch(PRIORITY_RULES, text);
    const system = firstMatch(TARGET_SYSTEM_RULES, text);
    const requestKind: RequestKind = INCIDENT_PATTERNS.some((p) => p.test(text)) ? 'incident' : 'consultation';

    const matched = [theme, priority, system].flatMap((m) => (m ? [`"${m.fragment}"`] : []));

    return {
      theme: theme?.label ?? 'faq-general',
      requestKind,
      priority: priority?.label ?? 'low',
      targetSystem: system?.label ?? 'other',
      rationale: matched.length > 0 ? `keywords: ${[...new Set(matched)].join(', ')}` : 'no keywords matched',
    };
  }
}
