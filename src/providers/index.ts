// Model client factory
// Builds the upstream client from environment configuration

import { env, isModelConfigured, parseExtraHeaders } from '../env.js';
import { ChatCompletionsProvider } from './chat-completions.js';
import type { ModelClient } from './types.js';

export function createModelClient(): ModelClient {
  if (!isModelConfigured()) {
    throw new Error('MODEL_BASE_URL and MODEL_NAME are required');
  }

  return new ChatCompletionsProvider({
    baseUrl: env.MODEL_BASE_URL,
    apiKey: env.MODEL_API_KEY || undefined,
    model: env.MODEL_NAME,
    maxTokens: env.MODEL_MAX_TOKENS,
    temperature: env.MODEL_TEMPERATURE,
    headers: parseExtraHeaders(env.MODEL_EXTRA_HEADERS),
  });
}

export { ChatCompletionsProvider, toModelReply, toWireMessages, parseRetryAfter } from './chat-completions.js';
export type {
  ModelClient,
  CompleteOptions,
  ProviderMessage,
  ProviderTool,
  ProviderUsage,
  ChatCompletionsConfig,
  WireToolCall,
} from './types.js';
