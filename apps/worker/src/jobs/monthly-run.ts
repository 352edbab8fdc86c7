import { runDateFor, type RunOrchestrator, type RunSummary, type LoggerPort } from '@botm/domain';

export interface MonthlyRunJobDeps {
  orchestrator: Pick<RunOrchestrator, 'run'>;
  /** UTC day of month on which the run fires. */
  runDayOfMonth: number;
  logger: LoggerPort;
  now?: () => Date;
}

export type TickResult =
  | { kind: 'skipped'; reason: 'not-run-day' | 'in-progress' | 'already-finished' | 'stopped' }
  | { kind: 'completed'; summary: RunSummary };

export interface MonthlyRunJob {
  tick(): Promise<TickResult>;
  /** Aborts the active run, if any, and resolves once it has settled. */
  stop(): Promise<void>;
}

export function createMonthlyRunJob(deps: MonthlyRunJobDeps): MonthlyRunJob {
  const now = deps.now ?? (() => new Date());
  let active: { controller: AbortController; done: Promise<unknown> } | null = null;
  let stopped = false;
  // Run date whose invocation returned a summary; a thrown run leaves it unset so the
  // next tick retries. Kept in memory only, so a restart triggers the date once more.
  let finishedDate: string | null = null;

  async function tick(): Promise<TickResult> {
    if (stopped) return { kind: 'skipped', reason: 'stopped' };

    const at = now();
    if (at.getUTCDate() !== deps.runDayOfMonth) {
      deps.logger.debug({ day: at.getUTCDate(), runDay: deps.runDayOfMonth }, 'Not a run day');
      return { kind: 'skipped', reason: 'not-run-day' };
    }
    if (active) {
      deps.logger.info({}, 'Previous run still in progress, skipping tick');
      return { kind: 'skipped', reason: 'in-progress' };
    }
    const date = runDateFor(at);
    if (finishedDate === date) {
      deps.logger.debug({ date }, 'Run already finished for this date');
      return { kind: 'skipped', reason: 'already-finished' };
    }

    const controller = new AbortController();
    const running = deps.orchestrator.run({ now: at, signal: controller.signal });
    // Failures surface through `await running` below; `done` only tracks settling
    active = { controller, done: running.catch(() => undefined) };
    try {
      const summary = await running;
      finishedDate = summary.date;
      deps.logger.info(
        {
          runId: summary.runId,
          date: summary.date,
          committed: summary.committed,
          failed: summary.failed,
          aborted: summary.aborted,
        },
        'Monthly run finished',
      );
      return { kind: 'completed', summary };
    } finally {
      active = null;
    }
  }

  async function stop(): Promise<void> {
    stopped = true;
    if (!active) return;
    active.controller.abort();
    await active.done;
  }

  return { tick, stop };
}
