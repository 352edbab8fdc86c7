import Fastify from 'fastify';
import { type SafeLogger } from '@botm/shared';
import { type RunLedger, type RunOrchestrator } from '@botm/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createBasicAuth, type BasicCredentials } from './plugins/basic-auth';
import { registerRunRoutes } from './routes/runs';

export interface ServerDeps {
  credentials: BasicCredentials;
  orchestrator: Pick<RunOrchestrator, 'run'>;
  ledger: Pick<RunLedger, 'history'>;
  logger: SafeLogger;
  now?: () => Date;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: false,
    bodyLimit: 16_384,
  });

  registerErrorHandler(app, deps.logger);

  app.addHook('onResponse', async (request, reply) => {
    deps.logger.info(
      { method: request.method, url: request.url, status: reply.statusCode, ms: Math.round(reply.elapsedTime) },
      'Request completed',
    );
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerRunRoutes(app, {
    orchestrator: deps.orchestrator,
    ledger: deps.ledger,
    authenticate: createBasicAuth(deps.credentials),
    now: deps.now,
  });

  return app;
}
