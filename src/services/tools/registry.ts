// Tool Registry - Central registry for all available tools
// Tools are registered on startup, then the registry is sealed and only read

import { z } from 'zod';
import {
  DuplicateToolError,
  InvalidArgumentsError,
  RegistrySealedError,
  ToolExecutionError,
  UnknownToolError,
  errorMessage,
  type ArgumentProblems,
} from '../../utils/errors.js';
import type { ToolArgs, ToolContext, ToolDefinition, ToolParameter, ToolResult } from './types.js';

export interface JsonSchemaProperty {
  type: string;
  description: string;
  enum?: string[];
  default?: unknown;
}

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

function schemaForType(param: ToolParameter): z.ZodTypeAny {
  switch (param.type) {
    case 'string':
      return param.enum && param.enum.length > 0
        ? z.string().refine(value => param.enum?.includes(value) ?? true)
        : z.string();
    case 'number':
      return z.number().finite();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

function buildArgsSchema(params: ToolParameter[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    const base = schemaForType(param);
    shape[param.name] = param.required ? base : base.optional();
  }
  return z.object(shape).strict();
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private validators: Map<string, ReturnType<typeof buildArgsSchema>> = new Map();
  private sealed = false;

  register(tool: ToolDefinition): void {
    if (this.sealed) {
      throw new RegistrySealedError(tool.name);
    }
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    this.validators.set(tool.name, buildArgsSchema(tool.parameters));
  }

  /** Freezes the tool set. Runs only read from a sealed registry. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  resolve(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Checks `args` against the tool's parameters and returns them with defaults
   * filled in. Throws InvalidArgumentsError listing every problem found.
   */
  validate(name: string, args: ToolArgs): ToolArgs {
    const tool = this.resolve(name);
    const validator = this.validators.get(name) ?? buildArgsSchema(tool.parameters);
    const parsed = validator.safeParse(args);

    if (!parsed.success) {
      throw new InvalidArgumentsError(name, collectProblems(parsed.error, args));
    }

    const withDefaults: ToolArgs = { ...parsed.data };
    for (const param of tool.parameters) {
      if (withDefaults[param.name] === undefined && param.default !== undefined) {
        withDefaults[param.name] = param.default;
      }
    }
    return withDefaults;
  }

  async invoke(name: string, args: ToolArgs, context: ToolContext = {}): Promise<ToolResult> {
    const tool = this.resolve(name);
    const validArgs = this.validate(name, args);

    try {
      return await tool.execute(validArgs, context);
    } catch (error) {
      throw new ToolExecutionError(name, errorMessage(error), { cause: error });
    }
  }

  toOpenAIFunctions(): OpenAIFunctionDef[] {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: this.parametersToOpenAISchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  private parametersToOpenAISchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}

function collectProblems(error: z.ZodError, args: ToolArgs): ArgumentProblems {
  const missing = new Set<string>();
  const extra = new Set<string>();
  const mistyped = new Set<string>();

  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      issue.keys.forEach(key => extra.add(key));
      continue;
    }

    const field = String(issue.path[0] ?? '');
    if (!field) continue;

    if (args[field] === undefined) {
      missing.add(field);
    } else {
      mistyped.add(field);
    }
  }

  return {
    missing: [...missing].sort(),
    extra: [...extra].sort(),
    mistyped: [...mistyped].sort(),
  };
}
