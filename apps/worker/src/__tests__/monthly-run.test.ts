import { describe, it, expect, vi } from 'vitest';
import { type RunSummary } from '@botm/domain';
import { createMonthlyRunJob } from '../jobs/monthly-run';

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const SUMMARY: RunSummary = {
  runId: 1,
  date: '2026-09-01',
  selected: 1,
  alreadyCommitted: 0,
  committed: 1,
  failed: 0,
  aborted: 0,
  outcomes: [{ spotifyId: 'u1', status: 'COMMITTED', attempts: 1, reason: null }],
};

type RunInput = { now: Date; signal?: AbortSignal };

describe('monthly run job', () => {
  it('does nothing outside the run day', async () => {
    const run = vi.fn(async (_input: RunInput) => SUMMARY);
    const job = createMonthlyRunJob({
      orchestrator: { run },
      runDayOfMonth: 1,
      logger: createLogger(),
      now: () => new Date('2026-10-02T00:00:00Z'),
    });

    await expect(job.tick()).resolves.toEqual({ kind: 'skipped', reason: 'not-run-day' });
    expect(run).not.toHaveBeenCalled();
  });

  it('runs on the configured UTC day', async () => {
    const at = new Date('2026-10-01T00:30:00Z');
    const run = vi.fn(async (_input: RunInput) => SUMMARY);
    const job = createMonthlyRunJob({ orchestrator: { run }, runDayOfMonth: 1, logger: createLogger(), now: () => at });

    await expect(job.tick()).resolves.toEqual({ kind: 'completed', summary: SUMMARY });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0].now).toBe(at);
  });

  it('does not run a finished date again on later ticks', async () => {
    let at = new Date('2026-10-01T00:00:00Z');
    const run = vi.fn(async (_input: RunInput) => SUMMARY);
    const job = createMonthlyRunJob({ orchestrator: { run }, runDayOfMonth: 1, logger: createLogger(), now: () => at });

    await expect(job.tick()).resolves.toEqual({ kind: 'completed', summary: SUMMARY });
    at = new Date('2026-10-01T01:00:00Z');
    await expect(job.tick()).resolves.toEqual({ kind: 'skipped', reason: 'already-finished' });
    expect(run).toHaveBeenCalledTimes(1);

    at = new Date('2026-11-01T00:00:00Z');
    const october = { ...SUMMARY, runId: 2, date: '2026-10-01' };
    run.mockResolvedValueOnce(october);
    await expect(job.tick()).resolves.toEqual({ kind: 'completed', summary: october });
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: (summary: RunSummary) => void = () => {};
    const run = vi.fn(
      (_input: RunInput) =>
        new Promise<RunSummary>((resolve) => {
          finish = resolve;
        }),
    );
    const job = createMonthlyRunJob({
      orchestrator: { run },
      runDayOfMonth: 1,
      logger: createLogger(),
      now: () => new Date('2026-10-01T00:00:00Z'),
    });

    const first = job.tick();
    await expect(job.tick()).resolves.toEqual({ kind: 'skipped', reason: 'in-progress' });

    finish(SUMMARY);
    await expect(first).resolves.toEqual({ kind: 'completed', summary: SUMMARY });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('aborts the active run on stop and waits for it', async () => {
    let observed: AbortSignal | undefined;
    const run = vi.fn(
      (input: RunInput) =>
        new Promise<RunSummary>((resolve) => {
          observed = input.signal;
          input.signal?.addEventListener('abort', () => resolve({ ...SUMMARY, committed: 0, aborted: 1 }));
        }),
    );
    const job = createMonthlyRunJob({
      orchestrator: { run },
      runDayOfMonth: 1,
      logger: createLogger(),
      now: () => new Date('2026-10-01T00:00:00Z'),
    });

    const ticking = job.tick();
    await job.stop();

    expect(observed?.aborted).toBe(true);
    await expect(ticking).resolves.toMatchObject({ kind: 'completed', summary: { aborted: 1 } });
    await expect(job.tick()).resolves.toEqual({ kind: 'skipped', reason: 'stopped' });
  });

  it('propagates run failures and accepts the next tick', async () => {
    const run = vi
      .fn(async (_input: RunInput) => SUMMARY)
      .mockRejectedValueOnce(new Error('ledger down'));
    const job = createMonthlyRunJob({
      orchestrator: { run },
      runDayOfMonth: 1,
      logger: createLogger(),
      now: () => new Date('2026-10-01T00:00:00Z'),
    });

    await expect(job.tick()).rejects.toThrow('ledger down');
    await expect(job.tick()).resolves.toEqual({ kind: 'completed', summary: SUMMARY });
    expect(run).toHaveBeenCalledTimes(2);
  });
});
