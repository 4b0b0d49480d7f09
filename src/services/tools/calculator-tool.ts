// Calculator Tool
// Evaluates arithmetic with mathjs so model-supplied text never reaches eval()

import { evaluate } from 'mathjs';
import type { ToolDefinition, ToolResult } from './types.js';

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description: 'Perform mathematical calculations and unit conversions, e.g. "(72 - 32) * 5 / 9" or "12 inch to cm".',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Mathematical expression to evaluate (e.g., "2 + 2", "sqrt(16)", "5 km to mi")',
      required: true,
    },
  ],
  execute: async (args): Promise<ToolResult> => {
    const expression = String(args.expression ?? '').trim();
    if (!expression) {
      return {
        success: false,
        content: JSON.stringify({ error: 'Expression is required' }),
      };
    }

    try {
      // Units and matrices stringify through their own toString()
      const result: unknown = evaluate(expression);

      return {
        success: true,
        content: JSON.stringify({ expression, result: String(result) }),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        content: JSON.stringify({ error: `Failed to evaluate expression: ${message}` }),
      };
    }
  },
};
