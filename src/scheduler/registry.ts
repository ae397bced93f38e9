import type { Job } from './types.js';

/**
 * In-memory map of destination → active job, plus the last scheduled fire
 * per destination. Every method is synchronous.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly lastFires = new Map<string, Date>();

  // Cancels whatever was registered for the destination, then registers `job`.
  replace(destination: string, job: Job): Job | undefined {
    const previous = this.jobs.get(destination);
    if (previous) {
      previous.status = 'cancelled';
    }
    this.jobs.set(destination, job);
    return previous;
  }

  // No-op when nothing is registered.
  remove(destination: string): boolean {
    const job = this.jobs.get(destination);
    if (!job) return false;

    job.status = 'cancelled';
    this.jobs.delete(destination);
    return true;
  }

  get(destination: string): Job | undefined {
    return this.jobs.get(destination);
  }

  /** True while `job` is still the registered job for its destination. */
  isCurrent(job: Job): boolean {
    return this.jobs.get(job.destination) === job;
  }

  // Used by one-shot jobs after they fire; leaves a replacement untouched.
  removeIfCurrent(job: Job): boolean {
    if (!this.isCurrent(job)) return false;
    this.jobs.delete(job.destination);
    return true;
  }

  // Survives replace() and remove().
  recordFire(destination: string, at: Date): void {
    this.lastFires.set(destination, at);
  }

  lastFiredAt(destination: string): Date | null {
    return this.lastFires.get(destination) ?? null;
  }

  list(): Job[] {
    return [...this.jobs.values()];
  }

  get size(): number {
    return this.jobs.size;
  }

  clear(): void {
    for (const job of this.jobs.values()) {
      job.status = 'cancelled';
    }
    this.jobs.clear();
    this.lastFires.clear();
  }
}
