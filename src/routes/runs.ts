// Run routes
// Submit, stream, inspect and cancel reasoning-loop runs

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { AppError } from '../utils/errors.js';
import type { RunManager } from '../services/runs/index.js';
import { requireAuthIfEnabled } from '../security/route-guards.js';

const CreateRunSchema = z.object({
  task: z.string().trim().min(1).max(20000),
  system_instruction: z.string().trim().max(20000).optional(),
  max_steps: z.number().int().min(0).optional(),
});

const RunParamsSchema = z.object({
  id: z.string().min(1),
});

export type RunRoutesOptions = {
  runs: RunManager;
};

function parseCreateRun(body: unknown) {
  const input = CreateRunSchema.parse(body ?? {});

  if (input.max_steps !== undefined && input.max_steps > env.AGENT_MAX_STEPS_LIMIT) {
    throw AppError.validationError(`max_steps must be at most ${env.AGENT_MAX_STEPS_LIMIT}`);
  }

  return {
    task: input.task,
    systemInstruction: input.system_instruction || env.SYSTEM_INSTRUCTION || undefined,
    maxSteps: input.max_steps,
  };
}

export async function runRoutes(server: FastifyInstance, opts: RunRoutesOptions) {
  const { runs } = opts;

  // POST /v1/runs - Run a task to completion and return its result
  server.post('/runs', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const input = parseCreateRun(request.body);
    const { runId, result } = await runs.execute(input);

    return reply.code(200).send({ run_id: runId, result });
  });

  // POST /v1/runs/stream - Same as above, one SSE event per state transition
  server.post('/runs/stream', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const input = parseCreateRun(request.body);
    const { runId, snapshots } = runs.stream(input);

    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const sendEvent = (type: string, data: unknown) => {
      try {
        reply.raw.write(`event: ${type}\n`);
        reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
      } catch (e) {
        server.log.error({ err: e, type }, 'Failed to send SSE event');
      }
    };

    // The request stream closes once the body is read; only the response closing early means the client left
    let clientGone = false;
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        clientGone = true;
      }
    });

    sendEvent('run.started', { run_id: runId });

    for await (const snapshot of snapshots) {
      if (clientGone) {
        // Leaving the loop cancels the run at this boundary
        break;
      }
      if (snapshot.result) {
        sendEvent('run.result', { run_id: runId, result: snapshot.result });
      } else {
        sendEvent('run.snapshot', { run_id: runId, ...snapshot });
      }
    }

    reply.raw.end();
  });

  // GET /v1/runs - Live and recently finished runs
  server.get('/runs', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    return reply.code(200).send({ runs: runs.list(), active: runs.activeCount });
  });

  // GET /v1/runs/:id - One run with its conversation
  server.get('/runs/:id', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const { id } = RunParamsSchema.parse(request.params);
    const result = runs.get(id);
    if (!result.success || !result.run) {
      throw AppError.notFound('Run not found');
    }

    return reply.code(200).send({ run: result.run });
  });

  // POST /v1/runs/:id/cancel - Cooperative cancellation
  server.post('/runs/:id/cancel', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const { id } = RunParamsSchema.parse(request.params);
    const result = runs.cancel(id);

    if (!result.success) {
      if (result.run) {
        throw AppError.conflict(result.error ?? 'Run already finished');
      }
      throw AppError.notFound('Run not found');
    }

    return reply.code(202).send({ run_id: id, message: result.message });
  });
}
