/**
 * @fileoverview TypeScript types for LLM routing and provider management
 * @description Defines interfaces for model selection, API calls, and provider errors
 */

/**
 * Available LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

/**
 * Available models by provider
 */
export type AnthropicModel =
  | 'claude-3-5-haiku-latest'   // Fast + cheap, good at short structured output
  | 'claude-3-5-sonnet-latest'  // Stronger reasoning for ambiguous requests
  ;

export type OpenAIModel =
  | 'gpt-4o-mini'
  | 'gpt-4o'
  ;

export type LLMModel = AnthropicModel | OpenAIModel;

/**
 * Request types for model routing
 */
export type RequestType =
  | 'support:classify'           // Ticket theme / kind / priority → Haiku
  ;

/**
 * LLM call options and configuration
 */
export interface LLMCallOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature for randomness (0-1) */
  temperature?: number;
  /** System prompt to use */
  systemPrompt?: string;
  /** Aborts the in-flight provider call (timeouts, shutdown) */
  signal?: AbortSignal;
  /** Force a specific model for this call */
  modelOverride?: { provider: LLMProvider; model: LLMModel };
  /** Caller context, logged with failures */
  metadata?: {
    userId?: string;
    feature?: string;
  };
}

/**
 * LLM response from any provider
 */
export interface LLMResponse {
  /** Generated text content */
  content: string;
  /** Provider that handled the request */
  provider: LLMProvider;
  /** Model that generated the response */
  model: LLMModel;
  /** Token usage statistics */
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  /** Response latency in milliseconds */
  latencyMs: number;
  /** Request timestamp */
  timestamp: Date;
  /** Unique request ID for tracking */
  requestId: string;
}

/**
 * Model routing configuration
 */
export interface ModelRouting {
  /** Primary model for this request type */
  primary: {
    provider: LLMProvider;
    model: LLMModel;
  };
  /** Fallback models in order of preference */
  fallbacks: Array<{
    provider: LLMProvider;
    model: LLMModel;
  }>;
  /** Default options for this request type */
  defaultOptions: Partial<LLMCallOptions>;
}

/**
 * Common surface of the provider clients
 */
export interface LLMProviderClient {
  call(model: LLMModel, prompt: string, options?: LLMCallOptions): Promise<LLMResponse>;
}

/**
 * Error types for provider fallback
 */
export enum LLMErrorType {
  RATE_LIMIT = 'rate_limit',
  API_ERROR = 'api_error',
  TIMEOUT = 'timeout',
  ABORTED = 'aborted',
  INVALID_REQUEST = 'invalid_request',
  NETWORK_ERROR = 'network_error',
}

/**
 * LLM error with provider context
 */
export class LLMError extends Error {
  constructor(
    message: string,
    readonly provider: LLMProvider,
    readonly model: LLMModel,
    readonly errorType: LLMErrorType,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LLMError';
  }
}
