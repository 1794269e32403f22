import { z } from 'zod';
import { THEMES } from './ticket-model';
import { DEFAULT_ROUTING_CONFIG, RoutingConfig } from './routing';

export type ClassifierKind = 'keyword' | 'llm';

export interface SupportConfig {
  classifier: ClassifierKind;
  /** Upper bound for one classification attempt. */
  classifyTimeoutMs: number;
  /** Pause before the single classification retry. */
  classifyRetryDelayMs: number;
  routing: RoutingConfig;
  /** How long a feedback question stays open. */
  feedbackTimeoutMs: number;
  /** How long after resolution a dissatisfied reply reopens the ticket. */
  reopenWindowMs: number;
  /** Re-reads allowed after losing an optimistic write. */
  maxWriteRetries: number;
  titleMaxLength: number;
}

export const DEFAULT_SUPPORT_CONFIG: SupportConfig = {
  classifier: 'keyword',
  classifyTimeoutMs: 30_000,
  classifyRetryDelayMs: 1_000,
  routing: DEFAULT_ROUTING_CONFIG,
  feedbackTimeoutMs: 30 * 60_000,
  reopenWindowMs: 72 * 3_600_000,
  maxWriteRetries: 3,
  titleMaxLength: 100,
};

const ThemeListSchema = z
  .string()
  .transform((value) => value.split(',').map((t) => t.trim()).filter(Boolean))
  .pipe(z.array(z.enum(THEMES)));

const EnvSchema = z.object({
  SUPPORT_CLASSIFIER: z.enum(['keyword', 'llm']).default('keyword'),
  SUPPORT_CLASSIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SUPPORT_CLASSIFY_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  SUPPORT_LINE2_THEMES: ThemeListSchema.optional(),
  SUPPORT_LINE3_THEMES: ThemeListSchema.optional(),
  SUPPORT_FEEDBACK_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  SUPPORT_REOPEN_WINDOW_HOURS: z.coerce.number().nonnegative().default(72),
  SUPPORT_MAX_WRITE_RETRIES: z.coerce.number().int().nonnegative().default(3),
  SUPPORT_TITLE_MAX_LENGTH: z.coerce.number().int().positive().default(100),
});

/**
 * Read `SUPPORT_*` variables into a typed config. Unset variables keep their
 * defaults; invalid values fail fast.
 */
export function loadSupportConfig(env: NodeJS.ProcessEnv = process.env): SupportConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid support configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    classifier: vars.SUPPORT_CLASSIFIER,
    classifyTimeoutMs: vars.SUPPORT_CLASSIFY_TIMEOUT_MS,
    classifyRetryDelayMs: vars.SUPPORT_CLASSIFY_RETRY_DELAY_MS,
    routing: {
      escalateToLine2Themes: vars.SUPPORT_LINE2_THEMES ?? DEFAULT_ROUTING_CONFIG.escalateToLine2Themes,
      escalateToLine3Themes: vars.SUPPORT_LINE3_THEMES ?? DEFAULT_ROUTING_CONFIG.escalateToLine3Themes,
    },
    feedbackTimeoutMs: vars.SUPPORT_FEEDBACK_TIMEOUT_MINUTES * 60_000,
    reopenWindowMs: vars.SUPPORT_REOPEN_WINDOW_HOURS * 3_600_000,
    maxWriteRetries: vars.SUPPORT_MAX_WRITE_RETRIES,
    titleMaxLength: vars.SUPPORT_TITLE_MAX_LENGTH,
  };
}
