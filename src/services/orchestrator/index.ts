// Orchestrator Module - Main exports

export { AgentOrchestrator, createOrchestrator, isTerminal } from './orchestrator.js';
export { Conversation } from './conversation.js';
export { ToolExecutor, serializeToolError } from './executor.js';
export type {
  OrchestratorOptions,
  OrchestratorMessage,
  ToolCallRequest,
  ExecutionResult,
  ModelReply,
  RunOptions,
  RunResult,
  RunSnapshot,
  RunState,
  RunErrorKind,
  RetryPolicy,
} from './types.js';
