import { RunError } from '@botm/domain';
import { loadConfig, WorkerConfigSchema, createLogger, startHealthBeat } from '@botm/shared';
import { initPool, closePool, createRunServices } from '@botm/db';
import { createMonthlyRunJob } from './jobs/monthly-run';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX });
  const { orchestrator, scheduler } = createRunServices(config, logger);

  const healthBeat = startHealthBeat(config.WORKER_HEALTHCHECK_PATH, logger);

  const monthlyRun = createMonthlyRunJob({
    orchestrator,
    runDayOfMonth: config.RUN_DAY_OF_MONTH,
    logger: logger.child({ job: 'monthly-run' }),
  });

  const runTick = () => {
    monthlyRun.tick().catch(logJobError('monthly-run'));
  };
  runTick();
  const interval = setInterval(runTick, config.RUN_CHECK_INTERVAL_MS);

  logger.info(
    { runDayOfMonth: config.RUN_DAY_OF_MONTH, checkIntervalMs: config.RUN_CHECK_INTERVAL_MS },
    'Worker started',
  );

  const shutdown = async () => {
    logger.info({ pendingJobs: scheduler.pending() }, 'Shutting down worker');
    clearInterval(interval);
    await monthlyRun.stop();
    healthBeat.stop();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    const meta: Record<string, unknown> = { err, job: jobName };
    if (err instanceof RunError) {
      meta.kind = err.kind;
      if (err.summary) {
        meta.committed = err.summary.committed;
        meta.failed = err.summary.failed;
        meta.aborted = err.summary.aborted;
      }
    }
    logger.error(meta, 'Job failed');
  };
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start worker');
  process.exit(1);
});
