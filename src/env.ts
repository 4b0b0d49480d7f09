// Environment configuration for the agent API
// Load upstream, budget and tool settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseFloatInRange(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  name: string,
): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Upstream model (OpenAI-compatible chat completions, possibly behind a gateway)
  MODEL_BASE_URL: strEnv(process.env.MODEL_BASE_URL, 'http://localhost:8080/v1'),
  MODEL_API_KEY: strEnv(process.env.MODEL_API_KEY),
  MODEL_NAME: strEnv(process.env.MODEL_NAME, 'gpt-4o-mini'),
  MODEL_MAX_TOKENS: parsePositiveInt(process.env.MODEL_MAX_TOKENS, 1024, 'MODEL_MAX_TOKENS'),
  MODEL_TEMPERATURE: parseFloatInRange(process.env.MODEL_TEMPERATURE, 0.2, 0, 2, 'MODEL_TEMPERATURE'),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 60000, 'MODEL_TIMEOUT_MS'),
  MODEL_MAX_RETRIES: parsePositiveInt(process.env.MODEL_MAX_RETRIES, 2, 'MODEL_MAX_RETRIES'),
  MODEL_RETRY_BASE_MS: parsePositiveInt(process.env.MODEL_RETRY_BASE_MS, 500, 'MODEL_RETRY_BASE_MS'),
  MODEL_RETRY_MAX_MS: parsePositiveInt(process.env.MODEL_RETRY_MAX_MS, 8000, 'MODEL_RETRY_MAX_MS'),
  // Comma-separated "Header-Name: value" pairs forwarded on every upstream call
  MODEL_EXTRA_HEADERS: strEnv(process.env.MODEL_EXTRA_HEADERS),

  // Reasoning loop budgets
  AGENT_MAX_STEPS: parsePositiveInt(process.env.AGENT_MAX_STEPS, 8, 'AGENT_MAX_STEPS'),
  AGENT_MAX_STEPS_LIMIT: parsePositiveInt(process.env.AGENT_MAX_STEPS_LIMIT, 50, 'AGENT_MAX_STEPS_LIMIT'),
  RUN_TIME_BUDGET_MS: parsePositiveInt(process.env.RUN_TIME_BUDGET_MS, 0, 'RUN_TIME_BUDGET_MS'),
  RUN_ARCHIVE_TTL_MS: parsePositiveInt(process.env.RUN_ARCHIVE_TTL_MS, 30 * 60 * 1000, 'RUN_ARCHIVE_TTL_MS'),
  SYSTEM_INSTRUCTION: strEnv(process.env.SYSTEM_INSTRUCTION),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),
  PARALLEL_TOOL_CALLS: process.env.PARALLEL_TOOL_CALLS !== 'false',
  WEATHER_API_URL: strEnv(process.env.WEATHER_API_URL),
  WEATHER_API_KEY: strEnv(process.env.WEATHER_API_KEY),
  WEB_SEARCH_ENABLED: process.env.WEB_SEARCH_ENABLED === 'true',
  BRAVE_SEARCH_API_KEY: process.env.BRAVE_SEARCH_API_KEY || '',

  // Security
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  API_TOKEN: strEnv(process.env.API_TOKEN),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function parseExtraHeaders(raw: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const idx = pair.indexOf(':');
    if (idx <= 0) continue;
    const name = pair.slice(0, idx).trim();
    const value = pair.slice(idx + 1).trim();
    if (name && value) headers[name] = value;
  }
  return headers;
}

export function isModelConfigured(): boolean {
  return !!env.MODEL_BASE_URL && !!env.MODEL_NAME;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(log: (line: string) => void = console.log) {
  log('Agent API Configuration:');
  log(`  Environment: ${env.NODE_ENV}`);
  log(`  Server: ${env.HOST}:${env.PORT}`);
  log(`  Model endpoint: ${env.MODEL_BASE_URL}`);
  log(`  Model: ${env.MODEL_NAME}`);
  log(`  Model API key: ${env.MODEL_API_KEY ? 'set' : 'not set'}`);
  log(`  Model timeout ms: ${env.MODEL_TIMEOUT_MS} (retries: ${env.MODEL_MAX_RETRIES})`);
  log(`  Max steps: ${env.AGENT_MAX_STEPS} (limit ${env.AGENT_MAX_STEPS_LIMIT})`);
  log(`  Run time budget ms: ${env.RUN_TIME_BUDGET_MS || 'unlimited'}`);
  log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  log(`  Parallel tool calls: ${env.PARALLEL_TOOL_CALLS}`);
  log(`  Web search enabled: ${env.WEB_SEARCH_ENABLED}`);
  log(`  Auth enforcement enabled: ${env.AUTH_ENFORCEMENT_ENABLED}`);
}
