/**
 * RISK SNAPSHOT ROUTES
 * ====================
 *
 * Read the latest snapshot, trigger or cancel a run, list the catalog.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { FieldCatalog } from '../catalog/field.catalog.js';
import type { SnapshotReader } from '../adapters/sink.adapter.js';
import type { RunOutcome } from '../contracts/snapshot.types.js';
import { isIsoDate } from '../engine/dates.js';
import { toOutputRecord } from '../services/snapshot.assembler.js';
import type { SnapshotRunnerService } from '../services/snapshot.runner.service.js';

export interface RiskSnapshotRouteDeps {
  runner: SnapshotRunnerService;
  reader: SnapshotReader;
  catalog: FieldCatalog;
}

const RunBodySchema = z.object({
  asOf: z.string().refine(isIsoDate, 'asOf must be YYYY-MM-DD').optional(),
}).default({});

function statusOf(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'PUBLISHED':
      return 200;
    case 'SKIPPED_OVERLAP':
    case 'CANCELLED':
      return 409;
    case 'FAILED':
      return outcome.code === 'ADAPTER_UNAVAILABLE' ? 503 : 500;
  }
}

export async function registerRiskSnapshotRoutes(app: FastifyInstance, deps: RiskSnapshotRouteDeps): Promise<void> {

  // ═══════════════════════════════════════════════════════════════
  // GET /api/risk/snapshot/latest
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/risk/snapshot/latest', async (_req, reply) => {
    const record = await deps.reader.latest();
    if (!record) {
      return reply.status(404).send({ ok: false, error: 'NOT_FOUND', message: 'No snapshot has been written yet' });
    }
    return reply.send({ ok: true, data: record });
  });

  // ═══════════════════════════════════════════════════════════════
  // POST /api/risk/snapshot/run
  // Manual trigger; same overlap guard as the schedule
  // ═══════════════════════════════════════════════════════════════
  app.post('/api/risk/snapshot/run', async (req, reply) => {
    const body = RunBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: body.error.issues.map(i => i.message).join('; '),
      });
    }

    const outcome = await deps.runner.run({ asOf: body.data.asOf });
    const status = statusOf(outcome);

    switch (outcome.status) {
      case 'PUBLISHED':
        return reply.status(status).send({
          ok: true,
          data: {
            runId: outcome.runId,
            status: outcome.status,
            durationMs: outcome.durationMs,
            write: outcome.write,
            steps: outcome.steps,
            snapshot: toOutputRecord(outcome.snapshot),
          },
        });
      case 'SKIPPED_OVERLAP':
        return reply.status(status).send({
          ok: false,
          error: 'RUN_IN_FLIGHT',
          message: `Run ${outcome.inFlightRunId} is still in flight`,
        });
      case 'CANCELLED':
        return reply.status(status).send({ ok: false, error: 'CANCELLED', message: `Run ${outcome.runId} was cancelled` });
      case 'FAILED':
        return reply.status(status).send({ ok: false, error: outcome.code, message: outcome.error });
    }
  });

  // ═══════════════════════════════════════════════════════════════
  // POST /api/risk/snapshot/cancel
  // ═══════════════════════════════════════════════════════════════
  app.post('/api/risk/snapshot/cancel', async (_req, reply) => {
    const runId = deps.runner.runningRunId;
    if (!deps.runner.cancel()) {
      return reply.status(404).send({ ok: false, error: 'NO_RUN', message: 'No run in flight' });
    }
    return reply.send({ ok: true, data: { runId } });
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/risk/catalog
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/risk/catalog', async (_req, reply) => {
    return reply.send({ ok: true, data: deps.catalog.describe() });
  });

  console.log('[RiskSnapshot] Routes registered');
}
