import { LLMError, LLMErrorType, LLMModel, LLMProvider } from '../types';

export interface ProviderFailure {
  message: string;
  /** HTTP status returned by the API, if any */
  status?: number;
  timedOut?: boolean;
  aborted?: boolean;
  connectionFailed?: boolean;
}

/**
 * Map a provider SDK failure onto an LLMError. Rate limits, 5xx responses,
 * timeouts and connection failures are retryable on the next provider.
 */
export function toLLMError(
  provider: LLMProvider,
  model: LLMModel,
  failure: ProviderFailure,
  cause: unknown
): LLMError {
  let errorType = LLMErrorType.API_ERROR;
  let retryable = false;

  if (failure.aborted) {
    errorType = LLMErrorType.ABORTED;
  } else if (failure.timedOut) {
    errorType = LLMErrorType.TIMEOUT;
    retryable = true;
  } else if (failure.connectionFailed) {
    errorType = LLMErrorType.NETWORK_ERROR;
    retryable = true;
  } else if (failure.status === 400 || failure.status === 422) {
    errorType = LLMErrorType.INVALID_REQUEST;
  } else if (failure.status === 429) {
    errorType = LLMErrorType.RATE_LIMIT;
    retryable = true;
  } else if (failure.status !== undefined && failure.status >= 500) {
    retryable = true;
  }

  return new LLMError(failure.message || `${provider} API error`, provider, model, errorType, retryable, { cause });
}
