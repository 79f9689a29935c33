/**
 * Scheduler
 * Named background jobs on node-cron: a daily wall-clock trigger and fixed intervals
 */

import * as cron from 'node-cron';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('scheduler');

export type JobCallback = () => Promise<void>;

export type Interval = { minutes: number } | { hours: number };

interface Job {
  name: string;
  expression: string;
  callback: JobCallback;
  task: cron.ScheduledTask;
  running: Promise<void> | null;
}

const CLOCK_TIME = /^(\d{1,2}):(\d{2})$/;

/**
 * Cron expression firing once a day at "HH:MM" local time
 */
export function dailyExpression(time: string): string {
  const match = time.match(CLOCK_TIME);
  if (!match) {
    throw new Error(`Invalid daily time "${time}", expected HH:MM`);
  }

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw new Error(`Invalid daily time "${time}", expected HH:MM`);
  }

  return `${minute} ${hour} * * *`;
}

/**
 * Cron expression for a fixed interval. Steps must divide the hour (minutes) or the
 * day (hours): cron restarts a step at each hour or at midnight.
 */
export function intervalExpression(interval: Interval): string {
  if ('minutes' in interval) {
    const { minutes } = interval;
    if (!Number.isInteger(minutes) || minutes < 1 || 60 % minutes !== 0) {
      throw new Error(`Invalid interval of ${minutes} minutes`);
    }
    return minutes === 1 ? '* * * * *' : `*/${minutes} * * * *`;
  }

  const { hours } = interval;
  if (!Number.isInteger(hours) || hours < 1 || 24 % hours !== 0) {
    throw new Error(`Invalid interval of ${hours} hours`);
  }
  return hours === 1 ? '0 * * * *' : `0 */${hours} * * *`;
}

export class Scheduler {
  private jobs = new Map<string, Job>();
  private inFlight = new Set<Promise<void>>();

  /**
   * Run the callback every day at "HH:MM"
   */
  startDaily(name: string, time: string, callback: JobCallback): void {
    this.start(name, dailyExpression(time), callback);
    logger.info({ job: name, time }, 'Daily job scheduled');
  }

  /**
   * Run the callback on a fixed interval
   */
  startInterval(name: string, interval: Interval, callback: JobCallback): void {
    this.start(name, intervalExpression(interval), callback);
    logger.info({ job: name, interval }, 'Interval job scheduled');
  }

  private start(name: string, expression: string, callback: JobCallback): void {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression "${expression}" for job ${name}`);
    }

    // Rescheduling under the same name replaces the old job
    this.cancel(name);

    const job: Job = {
      name,
      expression,
      callback,
      running: null,
      task: cron.schedule(expression, async () => {
        await this.runJob(job);
      }),
    };
    this.jobs.set(name, job);
  }

  /**
   * Run one iteration. A failing callback is logged and the job keeps its schedule;
   * a tick that arrives while the previous run is in flight is skipped.
   */
  private async runJob(job: Job): Promise<void> {
    if (job.running) {
      logger.warn({ job: job.name }, 'Previous run still in progress, skipping tick');
      return;
    }

    const run = (async () => {
      try {
        await job.callback();
      } catch (error) {
        logger.error({ error, job: job.name }, 'Scheduled job failed');
      }
    })();

    job.running = run;
    this.inFlight.add(run);
    try {
      await run;
    } finally {
      job.running = null;
      this.inFlight.delete(run);
    }
  }

  /**
   * Trigger a job immediately, outside its schedule
   */
  async runNow(name: string): Promise<boolean> {
    const job = this.jobs.get(name);
    if (!job) return false;
    await this.runJob(job);
    return true;
  }

  /**
   * Stop a job. Cancelling an unknown or already cancelled job is a no-op.
   */
  cancel(name: string): boolean {
    const job = this.jobs.get(name);
    if (!job) return false;

    job.task.stop();
    this.jobs.delete(name);
    logger.info({ job: name }, 'Job cancelled');
    return true;
  }

  cancelAll(): void {
    for (const name of [...this.jobs.keys()]) {
      this.cancel(name);
    }
  }

  /**
   * Resolve once every in-flight run has settled, including runs of jobs
   * cancelled after they started
   */
  async waitAll(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  isScheduled(name: string): boolean {
    return this.jobs.has(name);
  }

  getJobNames(): string[] {
    return [...this.jobs.keys()];
  }
}
