import type {
  OrchestratorMessage,
  RunResult,
  RunSnapshot,
  RunState,
} from '../orchestrator/types.js';

export interface RunCreateInput {
  task: string;
  systemInstruction?: string;
  maxSteps?: number;
}

export type RunStatus = 'running' | RunResult['status'];

export interface RunRecord {
  id: string;
  task: string;
  systemInstruction?: string;
  maxSteps: number;
  state: RunState;
  status: RunStatus;
  step: number;
  cancelRequested: boolean;
  conversation: OrchestratorMessage[];
  result?: RunResult;
  created_at: Date;
  updated_at: Date;
  finished_at?: Date;
}

export interface RunSummary {
  id: string;
  task: string;
  state: RunState;
  status: RunStatus;
  step: number;
  created_at: Date;
  finished_at?: Date;
}

export interface RunHandle {
  runId: string;
  done: Promise<RunResult>;
}

export interface RunStreamHandle {
  runId: string;
  snapshots: AsyncGenerator<RunSnapshot, RunResult, void>;
}

export interface RunOperationResult {
  success: boolean;
  run?: RunRecord;
  error?: string;
  message?: string;
}
