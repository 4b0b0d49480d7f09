export { RunManager } from './RunManager.js';
export type {
  RunCreateInput,
  RunRecord,
  RunSummary,
  RunStatus,
  RunHandle,
  RunStreamHandle,
  RunOperationResult,
} from './types.js';
