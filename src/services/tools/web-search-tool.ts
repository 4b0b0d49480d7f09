// Web Search Tool
// Wraps the web search service as a tool

import type { ToolDefinition, ToolResult } from './types.js';
import { searchWeb } from '../web-search.js';

export const webSearchTool: ToolDefinition = {
  name: 'web_search',
  description: 'Search the web for current information and recent events. Use this when you need up-to-date information not in your training data.',
  parameters: [
    {
      name: 'query',
      type: 'string',
      description: 'The search query to look up on the web',
      required: true,
    },
    {
      name: 'num_results',
      type: 'integer',
      description: 'Number of results to return (1-10, default: 5)',
      required: false,
      default: 5,
    },
  ],
  execute: async (args, context): Promise<ToolResult> => {
    const query = String(args.query ?? '').trim();
    if (!query) {
      return {
        success: false,
        content: JSON.stringify({ error: 'Query is required' }),
      };
    }

    const requested = typeof args.num_results === 'number' ? args.num_results : 5;
    const numResults = Math.max(1, Math.min(10, requested));
    const result = await searchWeb(query, numResults, context.signal);

    if (!result) {
      return {
        success: false,
        content: JSON.stringify({ error: 'Web search is not enabled or API key is missing' }),
      };
    }

    const formatted = {
      query: result.query,
      results: result.hits.map((hit, idx) => ({
        rank: idx + 1,
        title: hit.title,
        url: hit.url,
        snippet: hit.snippet,
      })),
    };

    return {
      success: true,
      content: JSON.stringify(formatted, null, 2),
    };
  },
};
