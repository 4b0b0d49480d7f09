// Tool Executor
// Runs one batch of tool calls requested by the model and reports every outcome as text

import { AgentError, ToolTimeoutError, errorMessage } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ExecutionResult, ToolCallRequest } from './types.js';

const log = childLogger('executor');

export interface ToolExecutorOptions {
  timeoutMs?: number;
  parallel?: boolean;
}

/** Tool-result content for a failed call, so the model can read what went wrong. */
export function serializeToolError(error: ExecutionResult['error']): string {
  return JSON.stringify({ error });
}

export class ToolExecutor {
  private timeoutMs: number;
  private parallel: boolean;

  constructor(private registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.parallel = options.parallel ?? true;
  }

  async execute(toolCall: ToolCallRequest): Promise<ExecutionResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      if (this.timeoutMs <= 0) return;
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolTimeoutError(toolCall.name, this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      const result = await Promise.race([
        this.registry.invoke(toolCall.name, toolCall.arguments, { signal: controller.signal }),
        timeoutPromise,
      ]);

      if (!result.success) {
        return {
          callId: toolCall.id,
          tool: toolCall.name,
          success: false,
          result: result.content,
          error: { type: 'ToolReportedFailure', code: 'tool_reported_failure', message: result.content },
          durationMs: Date.now() - startTime,
        };
      }

      return {
        callId: toolCall.id,
        tool: toolCall.name,
        success: true,
        result: result.content,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const details = error instanceof AgentError
        ? error.toJSON()
        : { type: 'Error', code: 'tool_execution_failed' as const, message: errorMessage(error) };

      log.warn({ tool: toolCall.name, callId: toolCall.id, code: details.code }, details.message);

      return {
        callId: toolCall.id,
        tool: toolCall.name,
        success: false,
        result: serializeToolError(details),
        error: details,
        durationMs: Date.now() - startTime,
      };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  /**
   * Runs every call in the batch. Results come back in request order whether
   * the calls ran one after another or concurrently.
   */
  async executeAll(toolCalls: readonly ToolCallRequest[]): Promise<ExecutionResult[]> {
    if (this.parallel) {
      return Promise.all(toolCalls.map(call => this.execute(call)));
    }

    const results: ExecutionResult[] = [];
    for (const toolCall of toolCalls) {
      results.push(await this.execute(toolCall));
    }
    return results;
  }
}
