/**
 * @fileoverview OpenAI API client and provider implementation
 * @description Handles GPT model API calls with error mapping for fallback
 */

import OpenAI from 'openai';
import { LLMCallOptions, LLMModel, LLMProviderClient, LLMResponse, OpenAIModel } from '../types';
import { ProviderFailure, toLLMError } from './errors';

const OPENAI_MODELS: readonly OpenAIModel[] = ['gpt-4o-mini', 'gpt-4o'];

/**
 * OpenAI provider implementation. `OPENAI_BASE_URL` points it at any
 * OpenAI-compatible endpoint (a local Ollama server, a proxy).
 */
export class OpenAIProvider implements LLMProviderClient {
  private client: OpenAI;

  constructor(apiKey = process.env.OPENAI_API_KEY, baseURL = process.env.OPENAI_BASE_URL) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL,
      maxRetries: 0,
    });
  }

  /**
   * Make an API call to OpenAI's GPT models
   */
  async call(model: LLMModel, prompt: string, options: LLMCallOptions = {}): Promise<LLMResponse> {
    const startTime = Date.now();

    if (!this.isOpenAIModel(model)) {
      throw new Error(`Invalid OpenAI model: ${model}`);
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages,
          max_tokens: options.maxTokens ?? 1000,
          temperature: options.temperature ?? 0.3,
        },
        { signal: options.signal }
      );

      return {
        content: response.choices[0]?.message?.content ?? '',
        provider: 'openai',
        model,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
          totalTokens: response.usage?.total_tokens ?? 0,
        },
        latencyMs: Date.now() - startTime,
        timestamp: new Date(),
        requestId: '', // Will be set by router
      };
    } catch (error) {
      console.error(`[llm-router] OpenAI API call failed (${Date.now() - startTime}ms):`, error);
      throw toLLMError('openai', model, this.describeFailure(error), error);
    }
  }

  private describeFailure(error: unknown): ProviderFailure {
    if (error instanceof OpenAI.APIUserAbortError) {
      return { message: error.message, aborted: true };
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return { message: error.message, timedOut: true };
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return { message: error.message, connectionFailed: true };
    }
    if (error instanceof OpenAI.APIError) {
      return { message: error.message, status: error.status };
    }
    return { message: error instanceof Error ? error.message : String(error) };
  }

  private isOpenAIModel(model: LLMModel): model is OpenAIModel {
    return OPENAI_MODELS.some((m) => m === model);
  }
}
