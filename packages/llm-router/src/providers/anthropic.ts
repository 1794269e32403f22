/**
 * @fileoverview Anthropic API client and provider implementation
 * @description Handles Claude model API calls with error mapping for fallback
 */

import Anthropic from '@anthropic-ai/sdk';
import { AnthropicModel, LLMCallOptions, LLMModel, LLMProviderClient, LLMResponse } from '../types';
import { ProviderFailure, toLLMError } from './errors';

const ANTHROPIC_MODELS: readonly AnthropicModel[] = ['claude-3-5-haiku-latest', 'claude-3-5-sonnet-latest'];

/**
 * Anthropic provider implementation
 */
export class AnthropicProvider implements LLMProviderClient {
  private client: Anthropic;

  constructor(apiKey = process.env.ANTHROPIC_API_KEY) {
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required');
    }

    this.client = new Anthropic({
      apiKey,
      maxRetries: 0, // the router owns retries and fallback
    });
  }

  /**
   * Make an API call to Anthropic's Claude models
   */
  async call(model: LLMModel, prompt: string, options: LLMCallOptions = {}): Promise<LLMResponse> {
    const startTime = Date.now();

    if (!this.isAnthropicModel(model)) {
      throw new Error(`Invalid Anthropic model: ${model}`);
    }

    try {
      const response = await this.client.messages.create(
        {
          model,
          max_tokens: options.maxTokens ?? 1000,
          temperature: options.temperature ?? 0.3,
          system: options.systemPrompt,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal }
      );

      const content = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n');

      return {
        content,
        provider: 'anthropic',
        model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
        latencyMs: Date.now() - startTime,
        timestamp: new Date(),
        requestId: '', // Will be set by router
      };
    } catch (error) {
      console.error(`[llm-router] Anthropic API call failed (${Date.now() - startTime}ms):`, error);
      throw toLLMError('anthropic', model, this.describeFailure(error), error);
    }
  }

  private describeFailure(error: unknown): ProviderFailure {
    if (error instanceof Anthropic.APIUserAbortError) {
      return { message: error.message, aborted: true };
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return { message: error.message, timedOut: true };
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return { message: error.message, connectionFailed: true };
    }
    if (error instanceof Anthropic.APIError) {
      return { message: error.message, status: error.status };
    }
    return { message: error instanceof Error ? error.message : String(error) };
  }

  private isAnthropicModel(model: LLMModel): model is AnthropicModel {
    return ANTHROPIC_MODELS.some((m) => m === model);
  }
}
