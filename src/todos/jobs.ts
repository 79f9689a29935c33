/**
 * Todo background jobs
 * Daily report, deadline/custom reminder checks and overdue notices
 */

import { getConfig, type Config } from '../config/index.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { createLogger } from '../utils/logger.js';
import { getTodoStorage, type TodoStorage } from './storage.js';
import {
  buildCustomReminder,
  buildDailyReport,
  buildDeadlineReminder,
  buildOverdueNotice,
} from './report.js';

const logger = createLogger('todo-jobs');

export interface SendOptions {
  atAll?: boolean;
}

/**
 * Outbound channel of the host chat platform. `target` is a storage key.
 */
export interface MessageSender {
  sendMessage(target: string, text: string, options?: SendOptions): Promise<void>;
}

export const JOB_NAMES = {
  dailyReport: 'daily-report',
  reminderCheck: 'reminder-check',
  overdueCheck: 'overdue-check',
} as const;

/**
 * Reminder check cadence: half the advance window, between 1 and 10 minutes,
 * rounded down to a step that divides the hour
 */
export function reminderCheckMinutes(advanceMinutes: number): number {
  let step = Math.max(1, Math.min(10, Math.floor(advanceMinutes / 2)));
  while (60 % step !== 0) {
    step--;
  }
  return step;
}

export interface TodoJobsOptions {
  sender: MessageSender;
  storage?: TodoStorage;
  scheduler?: Scheduler;
  config?: Config;
}

export class TodoJobs {
  private sender: MessageSender;
  private storage: TodoStorage;
  private scheduler: Scheduler;
  private config: Config;

  constructor(options: TodoJobsOptions) {
    this.sender = options.sender;
    this.storage = options.storage ?? getTodoStorage();
    this.scheduler = options.scheduler ?? new Scheduler();
    this.config = options.config ?? getConfig();
  }

  start(): void {
    const { config } = this;

    if (config.enableDailyReport) {
      this.scheduler.startDaily(JOB_NAMES.dailyReport, config.dailyReportTime, () => this.runDailyReport());
      logger.info({ time: config.dailyReportTime }, 'Daily report enabled');
    }

    if (config.enableDeadlineReminder) {
      this.scheduler.startInterval(
        JOB_NAMES.reminderCheck,
        { minutes: reminderCheckMinutes(config.reminderAdvanceMinutes) },
        () => this.runReminderCheck(),
      );
      logger.info({ advanceMinutes: config.reminderAdvanceMinutes }, 'Deadline reminders enabled');

      this.scheduler.startInterval(
        JOB_NAMES.overdueCheck,
        { hours: config.overdueCheckIntervalHours },
        () => this.runOverdueCheck(),
      );
      logger.info({ intervalHours: config.overdueCheckIntervalHours }, 'Overdue check enabled');
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping todo jobs');
    this.scheduler.cancelAll();
    await this.scheduler.waitAll();
    logger.info('Todo jobs stopped');
  }

  private async send(key: string, text: string, kind: string): Promise<boolean> {
    try {
      const { atAll } = await this.storage.getSettings(key);
      await this.sender.sendMessage(key, text, { atAll });
      return true;
    } catch (error) {
      logger.warn({ error, key, kind }, 'Message delivery failed');
      return false;
    }
  }

  async runDailyReport(now: Date = new Date()): Promise<void> {
    logger.info('Sending daily reports');
    const keys = await this.storage.getAllKeys();

    for (const key of keys) {
      const snapshot = await this.storage.getReportSnapshot(key, this.config.upcomingDays, now);
      const report = buildDailyReport(snapshot, { upcomingDays: this.config.upcomingDays, now });
      if (report) {
        await this.send(key, report, 'daily-report');
      }
    }
  }

  async runReminderCheck(now: Date = new Date()): Promise<void> {
    const keys = await this.storage.getAllKeys();

    for (const key of keys) {
      const dueSoon = await this.storage.getNeedsReminder(key, this.config.reminderAdvanceMinutes, now);
      for (const item of dueSoon) {
        if (await this.send(key, buildDeadlineReminder(item, now), 'deadline-reminder')) {
          await this.storage.setReminded(key, item.id);
        }
      }

      const customDue = await this.storage.getCustomReminderDue(key, now);
      for (const item of customDue) {
        if (await this.send(key, buildCustomReminder(item), 'custom-reminder')) {
          await this.storage.clearCustomReminder(key, item.id);
        }
      }
    }
  }

  async runOverdueCheck(now: Date = new Date()): Promise<void> {
    const keys = await this.storage.getAllKeys();

    for (const key of keys) {
      const overdue = await this.storage.getOverdue(key, now);
      if (overdue.length > 0) {
        await this.send(key, buildOverdueNotice(overdue, now), 'overdue-notice');
      }
    }
  }
}
