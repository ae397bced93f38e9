import { randomUUID } from 'crypto';
import { toError } from '../errors.js';
import { JobRegistry } from './registry.js';
import {
  alreadyFiredFor,
  describeTrigger,
  firstFireAt,
  nextFireAfter,
  once,
  validateTrigger,
} from './triggers.js';
import type { Clock, Job, JobAction, Trigger } from './types.js';

// Wall-clock resolution of the loop; daily jobs only need minute accuracy.
const DEFAULT_POLL_INTERVAL_MS = 30_000;

export type FireOutcome = { ok: true } | { ok: false; error: Error };

export interface SchedulerOptions {
  registry: JobRegistry;
  action: JobAction;
  pollIntervalMs?: number;
  now?: Clock;
  /** Called with every failure caught at the action boundary */
  onFireError?: (job: Job, error: Error) => void;
}

export class Scheduler {
  readonly registry: JobRegistry;
  private readonly action: JobAction;
  private readonly pollIntervalMs: number;
  private readonly now: Clock;
  private readonly onFireError?: (job: Job, error: Error) => void;

  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly inFlight = new Set<Promise<FireOutcome>>();

  constructor(options: SchedulerOptions) {
    this.registry = options.registry;
    this.action = options.action;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.onFireError = options.onFireError;
  }

  /**
   * Registers a job for the destination, replacing any job already there.
   * Throws InvalidTriggerError before touching the registry.
   */
  arm(destination: string, trigger: Trigger): Job {
    validateTrigger(trigger);

    const now = this.now();
    const lastFiredAt = this.registry.lastFiredAt(destination);
    let nextFireAt = firstFireAt(trigger, now);

    // Re-arming inside a minute that already posted moves on to the next day.
    if (trigger.kind === 'daily_at' && alreadyFiredFor(nextFireAt, lastFiredAt)) {
      const next = nextFireAfter(trigger, nextFireAt, now);
      if (next) nextFireAt = next;
    }

    const job: Job = {
      id: randomUUID(),
      destination,
      trigger,
      status: 'scheduled',
      nextFireAt,
      lastFiredAt,
      createdAt: now,
    };

    const previous = this.registry.replace(destination, job);

    console.log(
      `[Scheduler] Armed job ${job.id} for ${destination}: ${describeTrigger(trigger)}, ` +
      `next fire ${job.nextFireAt.toISOString()}` +
      (previous ? ` (replaced ${previous.id})` : '')
    );

    return job;
  }

  cancel(destination: string): boolean {
    const job = this.registry.get(destination);
    const removed = this.registry.remove(destination);
    if (job && removed) {
      console.log(`[Scheduler] Cancelled job ${job.id} for ${destination}`);
    }
    return removed;
  }

  /**
   * One evaluation pass: fires every scheduled job that is due. Fires run
   * side by side and a job still firing from an earlier pass is skipped.
   * Resolves once the fires launched by this pass have settled.
   */
  async tick(): Promise<void> {
    const now = this.now();
    const fires: Promise<FireOutcome>[] = [];

    for (const job of this.registry.list()) {
      if (job.status !== 'scheduled' || job.nextFireAt.getTime() > now.getTime()) continue;

      if (job.trigger.kind === 'daily_at' && alreadyFiredFor(job.nextFireAt, job.lastFiredAt)) {
        const next = nextFireAfter(job.trigger, job.nextFireAt, now);
        if (next) job.nextFireAt = next;
        continue;
      }

      fires.push(this.fire(job, now));
    }

    await Promise.all(fires);
  }

  /**
   * Runs the action for a destination right away without registering a job,
   * so the destination's schedule stays as it is.
   */
  async fireNow(destination: string, action: JobAction = this.action): Promise<FireOutcome> {
    const now = this.now();
    const job: Job = {
      id: randomUUID(),
      destination,
      trigger: once(0),
      status: 'firing',
      nextFireAt: now,
      lastFiredAt: now,
      createdAt: now,
    };

    console.log(`[Scheduler] Firing one-off job ${job.id} for ${destination}`);

    const outcome = await this.track(this.runAction(job, action));
    job.status = 'completed';
    return outcome;
  }

  start(): void {
    if (this.intervalId !== null) {
      console.log('[Scheduler] Already running');
      return;
    }

    const runTick = (): void => {
      this.tick().catch(err => {
        console.error('[Scheduler] Unexpected error in tick:', err);
      });
    };

    this.intervalId = setInterval(runTick, this.pollIntervalMs);
    console.log(`[Scheduler] Started — polling every ${this.pollIntervalMs / 1000}s`);
    runTick();
  }

  /** Stops polling and waits for fires already in flight. */
  async stop(): Promise<void> {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    await Promise.all([...this.inFlight]);
    console.log('[Scheduler] Stopped');
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  private fire(job: Job, now: Date): Promise<FireOutcome> {
    const dueAt = job.nextFireAt;

    job.status = 'firing';
    job.lastFiredAt = now;
    this.registry.recordFire(job.destination, now);
    // Next fire is computed before the action runs.
    const next = nextFireAfter(job.trigger, dueAt, now);
    if (next) job.nextFireAt = next;

    console.log(`[Scheduler] Firing job ${job.id} for ${job.destination}`);

    return this.track(
      this.runAction(job, this.action).then(outcome => {
        this.settle(job);
        return outcome;
      })
    );
  }

  // Re-arm or retire a job once its action has finished.
  private settle(job: Job): void {
    if (job.status === 'cancelled' || !this.registry.isCurrent(job)) {
      job.status = 'cancelled';
      console.log(`[Scheduler] Job ${job.id} was replaced or stopped while firing — not re-arming`);
      return;
    }

    if (job.trigger.kind === 'once') {
      this.registry.removeIfCurrent(job);
      job.status = 'completed';
      return;
    }

    job.status = 'scheduled';
    console.log(`[Scheduler] Job ${job.id} re-armed, next fire ${job.nextFireAt.toISOString()}`);
  }

  // Action failures stop here: they are logged and handed to onFireError.
  private async runAction(job: Job, action: JobAction): Promise<FireOutcome> {
    try {
      await action(job.destination);
      console.log(`[Scheduler] Job ${job.id} for ${job.destination} completed`);
      return { ok: true };
    } catch (error: unknown) {
      const err = toError(error);
      console.error(`[Scheduler] Job ${job.id} for ${job.destination} failed: ${err.message}`);
      this.reportFailure(job, err);
      return { ok: false, error: err };
    }
  }

  private reportFailure(job: Job, error: Error): void {
    if (!this.onFireError) return;
    try {
      this.onFireError(job, error);
    } catch (hookError) {
      console.error('[Scheduler] onFireError hook threw:', hookError);
    }
  }

  private track(fire: Promise<FireOutcome>): Promise<FireOutcome> {
    const tracked = fire.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
    return tracked;
  }
}

export { JobRegistry } from './registry.js';
export * from './triggers.js';
export type * from './types.js';
