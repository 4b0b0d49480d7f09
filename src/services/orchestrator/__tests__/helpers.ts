import { ToolRegistry } from '../../tools/registry.js';
import type { ToolDefinition } from '../../tools/types.js';
import type { CompleteOptions, ModelClient } from '../../../providers/types.js';
import type { ModelReply, OrchestratorMessage, ToolCallRequest } from '../types.js';

export type ScriptStep =
  | ModelReply
  | Error
  | ((conversation: readonly OrchestratorMessage[]) => ModelReply | Promise<ModelReply>);

/**
 * Model client that replays a fixed script. Once the script runs out, the
 * last step repeats.
 */
export class ScriptedModelClient implements ModelClient {
  name = 'scripted';
  calls: OrchestratorMessage[][] = [];
  options: CompleteOptions[] = [];

  constructor(private script: ScriptStep[]) {}

  async complete(conversation: readonly OrchestratorMessage[], options: CompleteOptions = {}): Promise<ModelReply> {
    const index = Math.min(this.calls.length, this.script.length - 1);
    this.calls.push(conversation.map(m => ({ ...m })));
    this.options.push(options);

    const step = this.script[index];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(conversation);
    return step;
  }
}

export function final(content: string): ModelReply {
  return { kind: 'final', content };
}

export function toolRequest(...toolCalls: ToolCallRequest[]): ModelReply {
  return { kind: 'tool_request', content: '', toolCalls };
}

export function call(id: string, name: string, args: Record<string, unknown> = {}): ToolCallRequest {
  return { id, name, arguments: args };
}

export function echoTool(name = 'echo'): ToolDefinition {
  return {
    name,
    description: 'Returns its input',
    parameters: [{ name: 'text', type: 'string', description: 'Text to echo', required: false }],
    execute: async args => ({ success: true, content: JSON.stringify({ echo: args.text ?? null }) }),
  };
}

export function weatherStub(): ToolDefinition {
  return {
    name: 'get_weather',
    description: 'Current weather for a location',
    parameters: [{ name: 'location', type: 'string', description: 'City', required: true }],
    execute: async args => ({
      success: true,
      content: JSON.stringify({ location: args.location, temperature: 18, units: 'celsius' }),
    }),
  };
}

export function registryWith(...tools: ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry();
  tools.forEach(tool => registry.register(tool));
  registry.seal();
  return registry;
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
