import { randomUUID } from 'crypto';
import { env } from '../../env.js';
import { TTLCache } from '../../utils/ttl-cache.js';
import { childLogger } from '../../utils/logger.js';
import type { AgentOrchestrator } from '../orchestrator/orchestrator.js';
import type { RunResult, RunSnapshot, RunState } from '../orchestrator/types.js';
import type {
  RunCreateInput,
  RunHandle,
  RunOperationResult,
  RunRecord,
  RunStreamHandle,
  RunSummary,
} from './types.js';

const log = childLogger('runs');

const TERMINAL_STATE: Record<RunResult['status'], RunState> = {
  final_answer: 'TERMINAL_ANSWER',
  exhausted: 'TERMINAL_EXHAUSTED',
  error: 'TERMINAL_ERROR',
};

interface LiveRun {
  record: RunRecord;
  controller: AbortController;
}

export class RunManager {
  private live = new Map<string, LiveRun>();
  private archive: TTLCache<string, RunRecord>;

  constructor(
    private orchestrator: AgentOrchestrator,
    options: { archiveTtlMs?: number; cleanupMs?: number } = {},
  ) {
    this.archive = new TTLCache<string, RunRecord>(
      options.archiveTtlMs ?? env.RUN_ARCHIVE_TTL_MS,
      options.cleanupMs ?? 60 * 1000,
    );
  }

  /**
   * Start a run in the background
   */
  start(input: RunCreateInput): RunHandle {
    const { record, controller } = this.register(input);

    const done = this.orchestrator
      .run(input.task, {
        systemInstruction: input.systemInstruction,
        maxSteps: record.maxSteps,
        signal: controller.signal,
        runId: record.id,
        onSnapshot: snapshot => this.track(record, snapshot),
      })
      .then(result => {
        this.settle(record, result);
        return result;
      });

    return { runId: record.id, done };
  }

  /**
   * Start a run and wait for its result
   */
  async execute(input: RunCreateInput): Promise<{ runId: string; result: RunResult }> {
    const handle = this.start(input);
    const result = await handle.done;
    return { runId: handle.runId, result };
  }

  /**
   * Start a run whose transitions the caller consumes one by one
   */
  stream(input: RunCreateInput): RunStreamHandle {
    const { record, controller } = this.register(input);
    return { runId: record.id, snapshots: this.follow(input, record, controller) };
  }

  private async *follow(
    input: RunCreateInput,
    record: RunRecord,
    controller: AbortController,
  ): AsyncGenerator<RunSnapshot, RunResult, void> {
    // Also set from the terminal snapshot, before the generator returns
    let result: RunResult | undefined;
    try {
      result = yield* this.orchestrator.stream(input.task, {
        systemInstruction: input.systemInstruction,
        maxSteps: record.maxSteps,
        signal: controller.signal,
        runId: record.id,
        onSnapshot: snapshot => {
          this.track(record, snapshot);
          result = snapshot.result ?? result;
        },
      });
      return result;
    } finally {
      if (result) {
        this.settle(record, result);
      } else {
        // Consumer stopped reading before the run reached a terminal state
        controller.abort();
        this.settle(record, {
          status: 'error',
          kind: 'cancelled',
          detail: 'Stream closed before the run finished',
          steps: record.step,
          conversation: record.conversation,
        });
      }
    }
  }

  /**
   * Get a live or archived run by ID
   */
  get(runId: string): RunOperationResult {
    const run = this.live.get(runId)?.record ?? this.archive.get(runId);
    if (!run) {
      return { success: false, error: 'Run not found' };
    }
    return { success: true, run };
  }

  /**
   * List live runs followed by archived ones, newest first
   */
  list(): RunSummary[] {
    const records = [
      ...Array.from(this.live.values()).map(l => l.record),
      ...this.archive.values(),
    ];
    return records
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map(r => ({
        id: r.id,
        task: r.task,
        state: r.state,
        status: r.status,
        step: r.step,
        created_at: r.created_at,
        finished_at: r.finished_at,
      }));
  }

  /**
   * Request cancellation; takes effect at the run's next boundary
   */
  cancel(runId: string): RunOperationResult {
    const live = this.live.get(runId);
    if (!live) {
      const archived = this.archive.get(runId);
      return archived
        ? { success: false, run: archived, error: 'Run already finished' }
        : { success: false, error: 'Run not found' };
    }

    live.record.cancelRequested = true;
    live.record.updated_at = new Date();
    live.controller.abort();
    log.info({ runId }, 'Cancellation requested');

    return { success: true, run: live.record, message: `Cancellation requested for run ${runId}` };
  }

  get activeCount(): number {
    return this.live.size;
  }

  destroy(): void {
    for (const { controller } of this.live.values()) {
      controller.abort();
    }
    this.archive.destroy();
  }

  private register(input: RunCreateInput): LiveRun {
    const now = new Date();
    const record: RunRecord = {
      id: randomUUID(),
      task: input.task,
      systemInstruction: input.systemInstruction,
      maxSteps: input.maxSteps ?? env.AGENT_MAX_STEPS,
      state: 'SEEDED',
      status: 'running',
      step: 0,
      cancelRequested: false,
      conversation: [],
      created_at: now,
      updated_at: now,
    };
    const live = { record, controller: new AbortController() };
    this.live.set(record.id, live);
    log.info({ runId: record.id, maxSteps: record.maxSteps }, 'Run started');
    return live;
  }

  private track(record: RunRecord, snapshot: RunSnapshot): void {
    record.state = snapshot.state;
    record.step = snapshot.step;
    record.conversation.push(...snapshot.appended);
    record.updated_at = new Date();
  }

  private settle(record: RunRecord, result: RunResult): void {
    if (!this.live.has(record.id)) return;

    record.result = result;
    record.status = result.status;
    record.state = TERMINAL_STATE[result.status];
    record.step = result.steps;
    record.conversation = result.conversation;
    record.finished_at = new Date();
    record.updated_at = record.finished_at;

    this.live.delete(record.id);
    this.archive.set(record.id, record);
  }
}
