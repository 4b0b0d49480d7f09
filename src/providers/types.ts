// Model client interface
// Wire types for OpenAI-compatible chat completions and the contract the orchestrator calls

import type { ModelReply, OrchestratorMessage } from '../services/orchestrator/types.js';
import type { OpenAIFunctionDef } from '../services/tools/registry.js';

export interface WireToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface ProviderTool {
  type: 'function';
  function: OpenAIFunctionDef;
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string | null;
  tool_calls?: WireToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompleteOptions {
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
  signal?: AbortSignal;
}

/**
 * Sends the whole conversation upstream and returns the parsed reply.
 * Implementations never retry; retries belong to the orchestrator.
 */
export interface ModelClient {
  name: string;
  complete(conversation: readonly OrchestratorMessage[], options?: CompleteOptions): Promise<ModelReply>;
}

export interface ChatCompletionsConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
  headers?: Record<string, string>;
}
