import { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError, ErrorCode } from '@botm/shared';
import { RunError, RunLedgerError, type RunLedger, type RunOrchestrator, type RunSummary } from '@botm/domain';
import { type createBasicAuth } from '../plugins/basic-auth';

interface RunRouteDeps {
  orchestrator: Pick<RunOrchestrator, 'run'>;
  ledger: Pick<RunLedger, 'history'>;
  authenticate: ReturnType<typeof createBasicAuth>;
  now?: () => Date;
}

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(12),
});

function mapRunError(err: unknown): never {
  if (err instanceof RunError) {
    if (err.kind === 'ALREADY_RUNNING') {
      throw new AppError(ErrorCode.CONFLICT, err.message);
    }
    throw new AppError(ErrorCode.SERVICE_UNAVAILABLE, err.message, err.summary ? { summary: err.summary } : {});
  }
  if (err instanceof RunLedgerError) {
    throw new AppError(ErrorCode.SERVICE_UNAVAILABLE, 'Run ledger unavailable');
  }
  throw err;
}

function statusFor(summary: RunSummary): number {
  return summary.failed === 0 && summary.aborted === 0 ? 200 : 500;
}

export function registerRunRoutes(app: FastifyInstance, deps: RunRouteDeps): void {
  const { orchestrator, ledger, authenticate } = deps;
  const now = deps.now ?? (() => new Date());

  app.post('/generate', { preHandler: [authenticate] }, async (_request, reply) => {
    try {
      const summary = await orchestrator.run({ now: now() });
      return reply.status(statusFor(summary)).send(summary);
    } catch (err) {
      return mapRunError(err);
    }
  });

  app.get('/runs', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = HistoryQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'Invalid query', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
    }

    try {
      const runs = await ledger.history(parsed.data.limit);
      return reply.status(200).send({ runs });
    } catch (err) {
      return mapRunError(err);
    }
  });
}
