/**
 * Bounded job pool — a counting semaphore around async jobs.
 *
 * `submit` resolves once the job has been admitted, so a producer that
 * awaits it stops producing while every slot is busy. `drain` is the
 * barrier: it resolves when every admitted job has settled.
 */

import { availableParallelism } from "node:os";

/** Twice the number of processing units. */
export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism() * 2);
}

export class JobPool {
  readonly limit: number;

  private active = 0;
  private readonly waiters: (() => void)[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly failures: unknown[] = [];

  constructor(limit: number = defaultConcurrency()) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`JobPool limit must be a positive integer, got ${String(limit)}`);
    }
    this.limit = limit;
  }

  /** Jobs currently holding a slot. */
  get activeCount(): number {
    return this.active;
  }

  /** Producers waiting for a slot. */
  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Waits for a free slot, then starts `job` without awaiting it.
   *
   * Jobs should handle their own errors. Anything that still rejects is
   * collected and rethrown by `drain`.
   */
  async submit(job: () => Promise<void>): Promise<void> {
    await this.acquire();

    const task = Promise.resolve()
      .then(job)
      .catch((err: unknown) => {
        this.failures.push(err);
      })
      .finally(() => {
        this.running.delete(task);
        this.release();
      });
    this.running.add(task);
  }

  /**
   * Resolves when all admitted jobs have settled.
   *
   * @throws AggregateError if any job rejected
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
    if (this.failures.length > 0) {
      const failures = this.failures.splice(0);
      throw new AggregateError(failures, `${String(failures.length)} job(s) failed`);
    }
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return;
    }
    // The releasing job hands its slot over directly; `active` is unchanged.
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
