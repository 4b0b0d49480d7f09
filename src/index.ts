// Agent API entry point
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { buildServer } from './app.js';
import { createModelClient } from './providers/index.js';
import { initializeTools } from './services/tools/index.js';
import { createOrchestrator } from './services/orchestrator/index.js';
import { RunManager } from './services/runs/index.js';
import { logger } from './utils/logger.js';

const registry = initializeTools();
const orchestrator = createOrchestrator(createModelClient(), registry);
const runs = new RunManager(orchestrator);

const server = await buildServer({ runs, registry });

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'Shutting down');
  await server.close();
  process.exit(0);
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logger.info(`Agent API listening on http://${env.HOST}:${env.PORT}`);
  logConfiguration(line => logger.info(line));
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
