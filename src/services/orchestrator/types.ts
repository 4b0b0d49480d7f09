// Orchestrator Types

import type { AgentErrorCode } from '../../utils/errors.js';

export type MessageRole = 'user' | 'assistant' | 'tool' | 'system';

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  tool_calls?: ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  content: string;
  tool_call_id: string;
  name: string;
}

export type OrchestratorMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type ModelReply =
  | { kind: 'final'; content: string }
  | { kind: 'tool_request'; content: string; toolCalls: ToolCallRequest[] };

export type RunState =
  | 'SEEDED'
  | 'AWAITING_MODEL'
  | 'TOOL_DISPATCH'
  | 'TERMINAL_ANSWER'
  | 'TERMINAL_EXHAUSTED'
  | 'TERMINAL_ERROR';

export type RunErrorKind =
  | 'upstream_unavailable'
  | 'upstream_rate_limited'
  | 'malformed_reply'
  | 'cancelled'
  | 'internal';

export type RunResult =
  | {
      status: 'final_answer';
      content: string;
      steps: number;
      conversation: OrchestratorMessage[];
    }
  | {
      status: 'exhausted';
      reason: 'max_steps' | 'time_budget';
      steps: number;
      conversation: OrchestratorMessage[];
    }
  | {
      status: 'error';
      kind: RunErrorKind;
      detail: string;
      steps: number;
      conversation: OrchestratorMessage[];
    };

export interface RunSnapshot {
  state: RunState;
  step: number;
  /** Messages appended since the previous snapshot. */
  appended: OrchestratorMessage[];
  /** Set on the terminal snapshot only. */
  result?: RunResult;
}

export interface ExecutionResult {
  callId: string;
  tool: string;
  success: boolean;
  result: string;
  error?: { type: string; code: AgentErrorCode | 'tool_reported_failure'; message: string };
  durationMs: number;
}

export interface RunOptions {
  systemInstruction?: string;
  maxSteps?: number;
  signal?: AbortSignal;
  /** Correlates log lines; assigned by the run manager. */
  runId?: string;
  /** Observes every transition; used by the run manager to track live state. */
  onSnapshot?: (snapshot: RunSnapshot) => void;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface OrchestratorOptions {
  maxSteps?: number;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  runTimeBudgetMs?: number;
  parallelToolCalls?: boolean;
  retry?: Partial<RetryPolicy>;
  /** Backoff wait; resolves early once `signal` aborts. Defaults to a timer. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}
