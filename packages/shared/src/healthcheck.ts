import { writeFile } from 'node:fs/promises';
import { type LoggerPort } from '@botm/domain';

export async function touchHealthFile(path: string): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

/** Rewrites the health file every `intervalMs` until stopped. */
export function startHealthBeat(
  path: string,
  logger: LoggerPort,
  intervalMs: number = 5000,
): { stop: () => void } {
  const tick = () => {
    touchHealthFile(path).catch((err: unknown) => {
      logger.warn({ path, err }, 'Failed to write health file');
    });
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}
