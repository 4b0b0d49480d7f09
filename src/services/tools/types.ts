// Tool system types and interfaces
// Defines the schema and interfaces for tools the agent can call

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

export type ToolArgs = Record<string, unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: ToolArgs, context: ToolContext) => Promise<ToolResult>;
}

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolResult {
  success: boolean;
  content: string; // JSON stringified result or error message
  metadata?: {
    duration_ms?: number;
    [key: string]: unknown;
  };
}
