// Agent Orchestrator
// Drives the reasoning loop: ask the model, run the tools it requests, feed results back, repeat

import { env } from '../../env.js';
import {
  AgentError,
  ConversationInvariantError,
  MalformedReplyError,
  UpstreamRateLimitedError,
  UpstreamUnavailableError,
  errorMessage,
} from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';
import type { ModelClient, ProviderTool } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { Conversation } from './conversation.js';
import { ToolExecutor } from './executor.js';
import type {
  ModelReply,
  OrchestratorOptions,
  RetryPolicy,
  RunErrorKind,
  RunOptions,
  RunResult,
  RunSnapshot,
  RunState,
} from './types.js';

const log = childLogger('orchestrator');

// Exhaustion and cancellation are decided at the boundary before each model call
// and before each tool batch, so they are reachable from every non-terminal state
const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  SEEDED: ['AWAITING_MODEL', 'TERMINAL_EXHAUSTED', 'TERMINAL_ERROR'],
  AWAITING_MODEL: ['TOOL_DISPATCH', 'TERMINAL_ANSWER', 'TERMINAL_EXHAUSTED', 'TERMINAL_ERROR'],
  TOOL_DISPATCH: ['AWAITING_MODEL', 'TERMINAL_EXHAUSTED', 'TERMINAL_ERROR'],
  TERMINAL_ANSWER: [],
  TERMINAL_EXHAUSTED: [],
  TERMINAL_ERROR: [],
};

export function isTerminal(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

// Control-flow signals raised inside a run; never escape it
class RunCancelled extends Error {}
class RunOutOfTime extends Error {}

// Wakes early when the run is cancelled; the caller's boundary check then ends the run
function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

interface RunContext {
  conversation: Conversation;
  step: number;
  state: RunState;
  emitted: number;
  deadline: number | null;
  signal?: AbortSignal;
  runId?: string;
}

export class AgentOrchestrator {
  private executor: ToolExecutor;
  private maxSteps: number;
  private modelTimeoutMs: number;
  private runTimeBudgetMs: number;
  private retry: RetryPolicy;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private now: () => number;

  constructor(
    private client: ModelClient,
    private registry: ToolRegistry,
    options: OrchestratorOptions = {},
  ) {
    this.executor = new ToolExecutor(registry, {
      timeoutMs: options.toolTimeoutMs ?? env.TOOL_TIMEOUT_MS,
      parallel: options.parallelToolCalls ?? env.PARALLEL_TOOL_CALLS,
    });
    this.maxSteps = assertStepBudget(options.maxSteps ?? env.AGENT_MAX_STEPS);
    this.modelTimeoutMs = options.modelTimeoutMs ?? env.MODEL_TIMEOUT_MS;
    this.runTimeBudgetMs = options.runTimeBudgetMs ?? env.RUN_TIME_BUDGET_MS;
    this.retry = {
      maxRetries: options.retry?.maxRetries ?? env.MODEL_MAX_RETRIES,
      baseDelayMs: options.retry?.baseDelayMs ?? env.MODEL_RETRY_BASE_MS,
      maxDelayMs: options.retry?.maxDelayMs ?? env.MODEL_RETRY_MAX_MS,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Runs a task to completion. Never throws; every outcome is a RunResult. */
  async run(task: string, options: RunOptions = {}): Promise<RunResult> {
    const iterator = this.stream(task, options);
    while (true) {
      const next = await iterator.next();
      if (next.done) {
        return next.value;
      }
    }
  }

  /**
   * Yields one snapshot per state transition and returns the final result.
   * Returning early from the consumer stops the run at that boundary.
   */
  async *stream(task: string, options: RunOptions = {}): AsyncGenerator<RunSnapshot, RunResult, void> {
    const maxSteps = options.maxSteps ?? this.maxSteps;
    const ctx: RunContext = {
      conversation: new Conversation(task, options.systemInstruction),
      step: 0,
      state: 'SEEDED',
      emitted: 0,
      deadline: this.runTimeBudgetMs > 0 ? this.now() + this.runTimeBudgetMs : null,
      signal: options.signal,
      runId: options.runId,
    };
    const tools = this.providerTools();

    const snapshot = (result?: RunResult): RunSnapshot => {
      const snap: RunSnapshot = {
        state: ctx.state,
        step: ctx.step,
        appended: ctx.conversation.since(ctx.emitted),
        ...(result ? { result } : {}),
      };
      ctx.emitted = ctx.conversation.length;
      try {
        options.onSnapshot?.(snap);
      } catch (err) {
        log.warn({ runId: ctx.runId, err }, 'Snapshot observer threw');
      }
      return snap;
    };

    const enter = (next: RunState, result?: RunResult): RunSnapshot => {
      if (!TRANSITIONS[ctx.state].includes(next)) {
        throw new Error(`Illegal run transition ${ctx.state} -> ${next}`);
      }
      ctx.state = next;
      if (result) {
        log.info(
          { runId: ctx.runId, status: result.status, steps: result.steps, messages: ctx.conversation.length },
          'Run finished',
        );
      }
      return snapshot(result);
    };

    yield snapshot();

    let result: RunResult;
    try {
      assertStepBudget(maxSteps);
      while (true) {
        this.checkBoundary(ctx);
        if (ctx.step >= maxSteps) {
          result = this.exhausted(ctx, 'max_steps');
          yield enter('TERMINAL_EXHAUSTED', result);
          return result;
        }

        yield enter('AWAITING_MODEL');
        const reply = await this.callModelWithRetry(ctx, tools);
        ctx.conversation.appendAssistant(reply);
        ctx.step++;

        if (reply.kind === 'final') {
          result = {
            status: 'final_answer',
            content: reply.content,
            steps: ctx.step,
            conversation: ctx.conversation.snapshot(),
          };
          yield enter('TERMINAL_ANSWER', result);
          return result;
        }

        this.checkBoundary(ctx);
        yield enter('TOOL_DISPATCH');

        const calls = ctx.conversation.pendingToolCalls();
        log.debug({ runId: ctx.runId, step: ctx.step, tools: calls.map(c => c.name) }, 'Dispatching tool calls');

        const results = await this.executor.executeAll(calls);
        for (const res of results) {
          ctx.conversation.appendToolResult(res.callId, res.tool, res.result);
        }
      }
    } catch (error) {
      if (error instanceof RunOutOfTime) {
        result = this.exhausted(ctx, 'time_budget');
        yield enter('TERMINAL_EXHAUSTED', result);
        return result;
      }

      const [kind, detail] = classifyFailure(error);
      if (kind === 'internal') {
        log.error({ runId: ctx.runId, err: error }, 'Run failed unexpectedly');
      }
      result = {
        status: 'error',
        kind,
        detail,
        steps: ctx.step,
        conversation: ctx.conversation.snapshot(),
      };
      yield enter('TERMINAL_ERROR', result);
      return result;
    }
  }

  private providerTools(): ProviderTool[] {
    return this.registry.toOpenAIFunctions().map(fn => ({ type: 'function', function: fn }));
  }

  /** Cancellation and the time budget take effect here, never mid-call. */
  private checkBoundary(ctx: RunContext): void {
    if (ctx.signal?.aborted) {
      throw new RunCancelled('Run cancelled');
    }
    if (ctx.deadline !== null && this.now() >= ctx.deadline) {
      throw new RunOutOfTime();
    }
  }

  private exhausted(ctx: RunContext, reason: 'max_steps' | 'time_budget'): RunResult {
    return {
      status: 'exhausted',
      reason,
      steps: ctx.step,
      conversation: ctx.conversation.snapshot(),
    };
  }

  private async callModelWithRetry(ctx: RunContext, tools: ProviderTool[]): Promise<ModelReply> {
    let attempt = 0;

    while (true) {
      try {
        return await this.callModel(ctx, tools);
      } catch (error) {
        if (!isRetryable(error) || attempt >= this.retry.maxRetries) {
          throw error;
        }

        const delay = this.backoffDelay(attempt, error);
        if (ctx.deadline !== null && this.now() + delay >= ctx.deadline) {
          throw new RunOutOfTime();
        }

        attempt++;
        log.warn(
          { runId: ctx.runId, attempt, delayMs: delay, code: error.code },
          `Model call failed, retrying: ${error.message}`,
        );
        await this.sleep(delay, ctx.signal);
        this.checkBoundary(ctx);
      }
    }
  }

  private backoffDelay(attempt: number, error: UpstreamUnavailableError | UpstreamRateLimitedError): number {
    if (error instanceof UpstreamRateLimitedError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.retry.maxDelayMs);
    }
    return Math.min(this.retry.baseDelayMs * 2 ** attempt, this.retry.maxDelayMs);
  }

  private async callModel(ctx: RunContext, tools: ProviderTool[]): Promise<ModelReply> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      if (this.modelTimeoutMs <= 0) return;
      timer = setTimeout(() => {
        controller.abort();
        reject(new UpstreamUnavailableError(`Model call timed out after ${this.modelTimeoutMs}ms`));
      }, this.modelTimeoutMs);
    });

    try {
      return await Promise.race([
        this.client.complete(ctx.conversation.messages, {
          tools: tools.length > 0 ? tools : undefined,
          signal: controller.signal,
        }),
        timeoutPromise,
      ]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}

function assertStepBudget(maxSteps: number): number {
  if (!Number.isInteger(maxSteps) || maxSteps < 0) {
    throw new RangeError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
  }
  return maxSteps;
}

function isRetryable(error: unknown): error is UpstreamUnavailableError | UpstreamRateLimitedError {
  if (error instanceof UpstreamRateLimitedError) return true;
  return error instanceof UpstreamUnavailableError && error.retryable;
}

function classifyFailure(error: unknown): [RunErrorKind, string] {
  if (error instanceof RunCancelled) return ['cancelled', error.message];
  if (error instanceof UpstreamRateLimitedError) return ['upstream_rate_limited', error.message];
  if (error instanceof UpstreamUnavailableError) return ['upstream_unavailable', error.message];
  if (error instanceof MalformedReplyError) return ['malformed_reply', error.message];
  // The model reused a tool call id from an earlier turn
  if (error instanceof ConversationInvariantError) return ['malformed_reply', error.message];
  if (error instanceof AgentError) return ['internal', error.message];
  return ['internal', errorMessage(error)];
}

export function createOrchestrator(
  client: ModelClient,
  registry: ToolRegistry,
  options?: OrchestratorOptions,
): AgentOrchestrator {
  return new AgentOrchestrator(client, registry, options);
}
