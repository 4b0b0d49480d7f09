// Chat Completions Provider
// OpenAI-compatible /chat/completions client; also works against a gateway that speaks the same format

import { z } from 'zod';
import {
  MalformedReplyError,
  UpstreamRateLimitedError,
  UpstreamUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { childLogger } from '../utils/logger.js';
import type { ModelReply, OrchestratorMessage, ToolCallRequest } from '../services/orchestrator/types.js';
import type {
  ChatCompletionsConfig,
  CompleteOptions,
  ModelClient,
  ProviderMessage,
  ProviderUsage,
} from './types.js';

const log = childLogger('model-client');

const WireToolCallSchema = z.object({
  id: z.string().min(1),
  type: z.string().optional(),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string().nullable().optional(),
  }),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
          tool_calls: z.array(WireToolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

type WireMessage = z.infer<typeof ChatCompletionSchema>['choices'][number]['message'];

export function toWireMessages(conversation: readonly OrchestratorMessage[]): ProviderMessage[] {
  return conversation.map((m): ProviderMessage => {
    switch (m.role) {
      case 'assistant':
        if (m.tool_calls && m.tool_calls.length > 0) {
          return {
            role: 'assistant',
            content: m.content || null,
            tool_calls: m.tool_calls.map(tc => ({
              id: tc.id,
              type: 'function',
              function: {
                name: tc.name,
                arguments: JSON.stringify(tc.arguments),
              },
            })),
          };
        }
        return { role: 'assistant', content: m.content };
      case 'tool':
        return { role: 'tool', content: m.content, tool_call_id: m.tool_call_id, name: m.name };
      default:
        return { role: m.role, content: m.content };
    }
  });
}

function parseArguments(raw: string | null | undefined, toolName: string): Record<string, unknown> {
  const text = (raw ?? '').trim();
  if (!text) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new MalformedReplyError(`Arguments for tool call "${toolName}" are not valid JSON`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedReplyError(`Arguments for tool call "${toolName}" must be a JSON object`);
  }

  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Classifies an upstream assistant message. Tool calls take precedence over
 * content; a message with neither is malformed.
 */
export function toModelReply(message: WireMessage): ModelReply {
  const content = message.content ?? '';
  const wireCalls = message.tool_calls ?? [];

  if (wireCalls.length === 0) {
    if (!content.trim()) {
      throw new MalformedReplyError('Reply has neither content nor tool calls');
    }
    return { kind: 'final', content };
  }

  const seen = new Set<string>();
  const toolCalls: ToolCallRequest[] = wireCalls.map(tc => {
    if (seen.has(tc.id)) {
      throw new MalformedReplyError(`Reply repeats tool call id "${tc.id}"`);
    }
    seen.add(tc.id);
    return {
      id: tc.id,
      name: tc.function.name,
      arguments: parseArguments(tc.function.arguments, tc.function.name),
    };
  });

  return { kind: 'tool_request', content, toolCalls };
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(header);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }
  return undefined;
}

export class ChatCompletionsProvider implements ModelClient {
  name = 'chat-completions';
  private baseUrl: string;

  constructor(private config: ChatCompletionsConfig) {
    if (!config.baseUrl) {
      throw new Error('Model base URL is not configured');
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async complete(
    conversation: readonly OrchestratorMessage[],
    options: CompleteOptions = {},
  ): Promise<ModelReply> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.config.headers,
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const hasTools = !!options.tools && options.tools.length > 0;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.config.model,
          messages: toWireMessages(conversation),
          max_tokens: this.config.maxTokens ?? 1024,
          temperature: this.config.temperature ?? 0.2,
          stream: false,
          ...(hasTools ? { tools: options.tools, tool_choice: options.tool_choice ?? 'auto' } : {}),
        }),
        signal: options.signal,
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Model endpoint unreachable: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.status === 429) {
      throw new UpstreamRateLimitedError(
        'Model endpoint rate limited the request',
        parseRetryAfter(response.headers.get('retry-after')),
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new UpstreamUnavailableError(
        `Model API error: ${response.status}${body ? ` - ${body.slice(0, 500)}` : ''}`,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new MalformedReplyError(`Model reply is not JSON: ${errorMessage(error)}`);
    }

    const parsed = ChatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedReplyError(`Model reply has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    // The client is shared across runs; usage is logged per call, never stored on it
    const usage: ProviderUsage = {
      promptTokens: parsed.data.usage?.prompt_tokens || 0,
      completionTokens: parsed.data.usage?.completion_tokens || 0,
      totalTokens: parsed.data.usage?.total_tokens || 0,
    };
    log.debug({ model: this.config.model, usage }, 'Model reply received');

    return toModelReply(parsed.data.choices[0].message);
  }
}
