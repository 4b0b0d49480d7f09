// Conversation
// Append-only message log owned by a single run

import { ConversationInvariantError } from '../../utils/errors.js';
import type {
  AssistantMessage,
  ModelReply,
  OrchestratorMessage,
  ToolCallRequest,
  ToolMessage,
} from './types.js';

export class Conversation {
  private readonly log: OrchestratorMessage[] = [];
  // Calls from the latest assistant message that have no result yet, in request order
  private pending: ToolCallRequest[] = [];
  private readonly resolved = new Set<string>();

  constructor(task: string, systemInstruction?: string) {
    if (systemInstruction && systemInstruction.trim()) {
      this.log.push({ role: 'system', content: systemInstruction });
    }
    this.log.push({ role: 'user', content: task });
  }

  get length(): number {
    return this.log.length;
  }

  get messages(): readonly OrchestratorMessage[] {
    return this.log;
  }

  /** Copy safe to hand to callers. */
  snapshot(): OrchestratorMessage[] {
    return this.log.map(cloneMessage);
  }

  /** Messages from `index` onward, copied. */
  since(index: number): OrchestratorMessage[] {
    return this.log.slice(index).map(cloneMessage);
  }

  pendingToolCalls(): readonly ToolCallRequest[] {
    return this.pending;
  }

  hasPendingToolCalls(): boolean {
    return this.pending.length > 0;
  }

  appendAssistant(reply: ModelReply): AssistantMessage {
    if (this.pending.length > 0) {
      throw new ConversationInvariantError(
        `Cannot append an assistant message while ${this.pending.length} tool call(s) are unresolved`,
      );
    }

    if (reply.kind === 'final') {
      const message: AssistantMessage = { role: 'assistant', content: reply.content };
      this.log.push(message);
      return message;
    }

    const batchIds = new Set<string>();
    for (const call of reply.toolCalls) {
      if (this.resolved.has(call.id) || batchIds.has(call.id)) {
        throw new ConversationInvariantError(`Tool call id "${call.id}" was already used in this conversation`);
      }
      batchIds.add(call.id);
    }

    const message: AssistantMessage = {
      role: 'assistant',
      content: reply.content,
      tool_calls: reply.toolCalls.map(cloneCall),
    };
    this.log.push(message);
    this.pending = reply.toolCalls.map(cloneCall);
    return message;
  }

  /**
   * Appends the result for the next unresolved call. Results must arrive in the
   * order the calls were requested.
   */
  appendToolResult(toolCallId: string, toolName: string, content: string): ToolMessage {
    const next = this.pending[0];
    if (!next) {
      throw new ConversationInvariantError(`No unresolved tool call matches "${toolCallId}"`);
    }
    if (next.id !== toolCallId) {
      throw new ConversationInvariantError(
        `Tool result "${toolCallId}" is out of order; expected result for "${next.id}"`,
      );
    }

    const message: ToolMessage = { role: 'tool', content, tool_call_id: toolCallId, name: toolName };
    this.log.push(message);
    this.pending = this.pending.slice(1);
    this.resolved.add(toolCallId);
    return message;
  }
}

function cloneCall(call: ToolCallRequest): ToolCallRequest {
  return { id: call.id, name: call.name, arguments: { ...call.arguments } };
}

function cloneMessage(message: OrchestratorMessage): OrchestratorMessage {
  if (message.role === 'assistant' && message.tool_calls) {
    return { ...message, tool_calls: message.tool_calls.map(cloneCall) };
  }
  return { ...message };
}
