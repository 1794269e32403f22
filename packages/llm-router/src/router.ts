/**
 * @fileoverview LLM model routing and selection logic
 * @description Routes requests to appropriate models based on request type, falling back across providers
 */

import { v4 as uuidv4 } from 'uuid';
import { LLMCallOptions, LLMError, LLMModel, LLMProvider, LLMProviderClient, LLMResponse, ModelRouting, RequestType } from './types';
import { AnthropicProvider } from './providers/anthropic';
import { OpenAIProvider } from './providers/openai';

/**
 * Model routing table - defines which models to use for each request type
 */
const MODEL_ROUTING: Record<RequestType, ModelRouting> = {
  'support:classify': {
    primary: { provider: 'anthropic', model: 'claude-3-5-haiku-latest' },
    fallbacks: [
      { provider: 'openai', model: 'gpt-4o-mini' },
    ],
    defaultOptions: {
      maxTokens: 300,
      temperature: 0,
    },
  },
};

/**
 * Provider instances (initialized lazily)
 */
const providerInstances: Partial<Record<LLMProvider, LLMProviderClient>> = {};

/**
 * Route an LLM call to the appropriate model and provider
 *
 * @example
 * ```typescript
 * const response = await routeLLMCall('support:classify', prompt, {
 *   systemPrompt,
 *   signal: controller.signal,
 * });
 * ```
 */
export async function routeLLMCall(
  requestType: RequestType,
  prompt: string,
  options: LLMCallOptions = {}
): Promise<LLMResponse> {
  const requestId = uuidv4();
  const routing = MODEL_ROUTING[requestType];

  const finalOptions: LLMCallOptions = {
    ...routing.defaultOptions,
    ...options,
  };

  const chain = finalOptions.modelOverride ? [finalOptions.modelOverride] : [routing.primary, ...routing.fallbacks];
  let lastError: Error | null = null;

  for (const { provider, model } of chain) {
    if (finalOptions.signal?.aborted) break;

    try {
      const instance = getProviderInstance(provider);
      const response = await instance.call(model, prompt, finalOptions);
      return { ...response, requestId };
    } catch (error) {
      console.warn(`[llm-router] ${provider}/${model} failed for ${requestType}${describeCaller(finalOptions.metadata)}:`, error);
      lastError = error instanceof Error ? error : new Error(String(error));

      // Missing credentials fall through to the next provider; API errors
      // only do so when retryable.
      if (error instanceof LLMError && !error.retryable) {
        break;
      }
    }
  }

  throw lastError ?? new Error(`All providers failed for ${requestType} request`);
}

/**
 * Get the configured primary model for a request type
 */
export function getModelForRequestType(requestType: RequestType): { provider: LLMProvider; model: LLMModel } {
  return MODEL_ROUTING[requestType].primary;
}

function describeCaller(metadata: LLMCallOptions['metadata']): string {
  const parts: string[] = [];
  if (metadata?.feature) parts.push(metadata.feature);
  if (metadata?.userId) parts.push(`user ${metadata.userId}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function getProviderInstance(provider: LLMProvider): LLMProviderClient {
  const existing = providerInstances[provider];
  if (existing) return existing;

  const created = provider === 'anthropic' ? new AnthropicProvider() : new OpenAIProvider();
  providerInstances[provider] = created;
  return created;
}
