import Bottleneck from 'bottleneck';
import { type JobScheduler } from '@botm/domain';

export interface JobSchedulerOptions {
  maxConcurrent: number;
  /** Minimum gap between two job starts. */
  minTime: number;
}

/** Bounded worker pool for per-user jobs. */
export class BottleneckJobScheduler implements JobScheduler {
  private readonly limiter: Bottleneck;

  constructor(opts: JobSchedulerOptions) {
    this.limiter = new Bottleneck({ maxConcurrent: opts.maxConcurrent, minTime: opts.minTime });
  }

  schedule<T>(job: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(job);
  }

  /** Number of jobs that have been submitted but not finished. */
  pending(): number {
    const counts = this.limiter.counts();
    return counts.RECEIVED + counts.QUEUED + counts.RUNNING + counts.EXECUTING;
  }
}
