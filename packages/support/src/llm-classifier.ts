import { z } from 'zod';
import { LLMCallOptions, LLMResponse, RequestType, routeLLMCall } from '@helpdesk/llm-router';
import { ClassificationProvider, ClassificationRequest } from './ai-triage';
import { ClassificationFailure } from './errors';
import {
  Classification,
  REQUEST_KINDS,
  TARGET_SYSTEMS,
  THEMES,
  TICKET_PRIORITIES,
  TargetSystem,
  TicketPriority,
} from './ticket-model';

export type LLMCall = (requestType: RequestType, prompt: string, options?: LLMCallOptions) => Promise<LLMResponse>;

const PRIORITY_ALIASES: Record<string, TicketPriority> = {
  P1: 'critical',
  P2: 'high',
  P3: 'medium',
  P4: 'low',
};

const PrioritySchema = z.preprocess(
  (value) => (typeof value === 'string' && value.toUpperCase() in PRIORITY_ALIASES ? PRIORITY_ALIASES[value.toUpperCase()] : value),
  z.enum(TICKET_PRIORITIES),
);

const TargetSystemSchema = z
  .string()
  .nullish()
  .transform((value): TargetSystem => TARGET_SYSTEMS.find((system) => system === value) ?? 'other');

const ModelOutputSchema = z.object({
  theme: z.enum(THEMES),
  requestKind: z.enum(REQUEST_KINDS),
  priority: PrioritySchema,
  targetSystem: TargetSystemSchema,
  rationale: z.string().min(1),
});

const SYSTEM_PROMPT = `You classify IT helpdesk requests. Reply with JSON only, no prose.

Themes:
${THEMES.map((t) => `- ${t}`).join('\n')}

Request kinds:
- consultation: a question, how-to or instruction request
- incident: something is broken, failing or unavailable

Priorities:
- critical (P1): system fully unavailable, data leak, critical failure
- high (P2): unavailable for a group of users, serious problem
- medium (P3): a feature misbehaves, partial unavailability
- low (P4): minor defect, FAQ, general question

Target systems:
${TARGET_SYSTEMS.map((s) => `- ${s}`).join('\n')}

Requests unrelated to IT support get theme "faq-general", kind "consultation", priority "low".

Output shape:
{"theme": "...", "requestKind": "...", "priority": "...", "targetSystem": "... or null", "rationale": "one short sentence"}`;

export function buildClassificationPrompt(request: ClassificationRequest): string {
  if (request.history.length === 0) return `Request: ${request.text}`;
  const context = request.history.map((m) => `${m.sender}: ${m.text}`).join('\n');
  return `Conversation context:\n${context}\n\nRequest: ${request.text}`;
}

/** Strip a surrounding Markdown code fence, with or without a language tag. */
export function stripCodeFence(content: string): string {
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(content.trim());
  return (fenced ? fenced[1] : content).trim();
}

export function parseModelOutput(content: string): Classification {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw new ClassificationFailure('Model output is not valid JSON', { cause: error });
  }

  const parsed = ModelOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClassificationFailure(`Model output failed validation: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export class LLMClassificationProvider implements ClassificationProvider {
  readonly name = 'llm';

  constructor(private readonly call: LLMCall = routeLLMCall) {}

  async classify(request: ClassificationRequest, signal: AbortSignal): Promise<Classification> {
    let response: LLMResponse;
    try {
      response = await this.call('support:classify', buildClassificationPrompt(request), {
        systemPrompt: SYSTEM_PROMPT,
        signal,
        metadata: { feature: 'ticket-classification' },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ClassificationFailure(`LLM call failed: ${message}`, { cause: error });
    }

    return parseModelOutput(response.content);
  }
}
