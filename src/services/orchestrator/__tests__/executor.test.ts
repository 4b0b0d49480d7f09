import { describe, it, expect } from 'vitest';
import { ToolExecutor } from '../executor.js';
import type { ToolDefinition } from '../../tools/types.js';
import { call, delay, echoTool, registryWith } from './helpers.js';

function sleeper(finished: string[]): ToolDefinition {
  return {
    name: 'sleep',
    description: 'Waits, then reports its label',
    parameters: [
      { name: 'label', type: 'string', description: 'Label', required: true },
      { name: 'ms', type: 'integer', description: 'Delay', required: true },
    ],
    execute: async args => {
      await delay(Number(args.ms));
      finished.push(String(args.label));
      return { success: true, content: String(args.label) };
    },
  };
}

describe('ToolExecutor', () => {
  it('returns results in request order even when calls finish out of order', async () => {
    const finished: string[] = [];
    const executor = new ToolExecutor(registryWith(sleeper(finished)), { parallel: true });

    const results = await executor.executeAll([
      call('c1', 'sleep', { label: 'c1', ms: 40 }),
      call('c2', 'sleep', { label: 'c2', ms: 0 }),
      call('c3', 'sleep', { label: 'c3', ms: 15 }),
    ]);

    expect(finished).toEqual(['c2', 'c3', 'c1']);
    expect(results.map(r => r.callId)).toEqual(['c1', 'c2', 'c3']);
    expect(results.map(r => r.result)).toEqual(['c1', 'c2', 'c3']);
  });

  it('runs calls one at a time when parallel execution is off', async () => {
    const finished: string[] = [];
    const executor = new ToolExecutor(registryWith(sleeper(finished)), { parallel: false });

    await executor.executeAll([
      call('c1', 'sleep', { label: 'c1', ms: 20 }),
      call('c2', 'sleep', { label: 'c2', ms: 0 }),
    ]);

    expect(finished).toEqual(['c1', 'c2']);
  });

  it('encodes an unknown tool as the call result and still runs its siblings', async () => {
    const executor = new ToolExecutor(registryWith(echoTool()));

    const [unknown, echoed] = await executor.executeAll([
      call('c1', 'get_stock_price', { symbol: 'ACME' }),
      call('c2', 'echo', { text: 'hi' }),
    ]);

    expect(unknown.success).toBe(false);
    expect(unknown.error?.type).toBe('UnknownToolError');
    expect(JSON.parse(unknown.result)).toEqual({
      error: {
        type: 'UnknownToolError',
        code: 'unknown_tool',
        message: 'Tool "get_stock_price" not found',
      },
    });
    expect(echoed).toMatchObject({ success: true, result: '{"echo":"hi"}' });
  });

  it('encodes invalid arguments with the offending fields', async () => {
    const executor = new ToolExecutor(registryWith(echoTool()));

    const [result] = await executor.executeAll([call('c1', 'echo', { text: 5, loud: true })]);

    expect(JSON.parse(result.result)).toEqual({
      error: {
        type: 'InvalidArgumentsError',
        code: 'invalid_arguments',
        message: 'Invalid arguments for "echo": unexpected loud; wrong type for text',
      },
    });
  });

  it('passes through a failure the tool reports itself', async () => {
    const executor = new ToolExecutor(registryWith({
      name: 'flaky',
      description: 'Always reports failure',
      parameters: [],
      execute: async () => ({ success: false, content: '{"error":"quota exceeded"}' }),
    }));

    const [result] = await executor.executeAll([call('c1', 'flaky')]);

    expect(result.success).toBe(false);
    expect(result.result).toBe('{"error":"quota exceeded"}');
    expect(result.error?.code).toBe('tool_reported_failure');
  });

  it('times out a slow tool and aborts its signal', async () => {
    let aborted = false;
    const executor = new ToolExecutor(registryWith({
      name: 'slow',
      description: 'Never finishes on its own',
      parameters: [],
      execute: (_args, context) =>
        new Promise(resolve => {
          context.signal?.addEventListener('abort', () => {
            aborted = true;
            resolve({ success: true, content: 'too late' });
          });
        }),
    }), { timeoutMs: 20 });

    const [result] = await executor.executeAll([call('c1', 'slow')]);

    expect(aborted).toBe(true);
    expect(result.success).toBe(false);
    expect(JSON.parse(result.result).error).toEqual({
      type: 'ToolTimeoutError',
      code: 'tool_timeout',
      message: 'Tool "slow" timed out after 20ms',
    });
  });
});
