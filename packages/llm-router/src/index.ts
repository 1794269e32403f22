/**
 * @fileoverview Helpdesk LLM Router Module
 * @description Model routing, provider management and fallback handling
 */

export * from './types';
export { routeLLMCall, getModelForRequestType } from './router';
export { AnthropicProvider } from './providers/anthropic';
export { OpenAIProvider } from './providers/openai';
