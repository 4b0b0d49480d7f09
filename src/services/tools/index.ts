// Tool System Initialization
// Registers the built-in tools on startup and seals the registry

import { env } from '../../env.js';
import { childLogger } from '../../utils/logger.js';
import { ToolRegistry } from './registry.js';
import { weatherTool } from './weather-tool.js';
import { calculatorTool } from './calculator-tool.js';
import { webSearchTool } from './web-search-tool.js';

export { ToolRegistry } from './registry.js';
export type { OpenAIFunctionDef } from './registry.js';
export type { ToolDefinition, ToolResult, ToolParameter, ToolArgs, ToolContext } from './types.js';

const log = childLogger('tools');

export function initializeTools(registry: ToolRegistry = new ToolRegistry()): ToolRegistry {
  log.info('Initializing tool system...');

  if (env.TOOLS_ENABLED) {
    registry.register(weatherTool);
    if (!env.WEATHER_API_URL) {
      log.warn('get_weather registered without WEATHER_API_URL; calls will report it as unconfigured');
    }

    registry.register(calculatorTool);
  }

  if (env.TOOLS_ENABLED && env.WEB_SEARCH_ENABLED && env.BRAVE_SEARCH_API_KEY) {
    registry.register(webSearchTool);
  }

  registry.seal();

  const registeredTools = registry.getAll();
  log.info(
    { tools: registeredTools.map(t => t.name) },
    `Tool system initialized with ${registeredTools.length} tool(s)`,
  );

  return registry;
}
