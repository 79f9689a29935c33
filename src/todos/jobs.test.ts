import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../utils/logger.js', () => ({
  createLogger: vi.fn(() => mockLogger),
}));

vi.mock('fs/promises', () => ({
  mkdir: vi.fn().mockResolvedValue(undefined),
  readFile: vi.fn(),
  rename: vi.fn().mockResolvedValue(undefined),
  writeFile: vi.fn().mockResolvedValue(undefined),
}));

vi.mock('node-cron', () => ({
  validate: vi.fn(() => true),
  schedule: vi.fn(() => ({ stop: vi.fn() })),
}));

vi.mock('../config/index.js', async () => {
  const { createMockConfig } = await import('../__tests__/test-helpers.js');
  return { getConfig: vi.fn(() => createMockConfig()) };
});

vi.mock('../utils/write-queue.js', () => ({
  getWriteQueue: vi.fn(() => ({
    enqueue: vi.fn((_key: string, fn: () => Promise<void>) => fn()),
  })),
}));

import { TodoJobs, JOB_NAMES, reminderCheckMinutes } from './jobs.js';
import { TodoStorage } from './storage.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { readFile } from 'fs/promises';
import { schedule } from 'node-cron';
import {
  createMockConfig,
  createMockSender,
  createReferenceDate,
  localDate,
} from '../__tests__/test-helpers.js';

const mockReadFile = vi.mocked(readFile);
const mockSchedule = vi.mocked(schedule);

let storage: TodoStorage;
let scheduler: Scheduler;
let sender: ReturnType<typeof createMockSender>;

function createJobs(overrides: Parameters<typeof createMockConfig>[0] = {}): TodoJobs {
  return new TodoJobs({ sender, storage, scheduler, config: createMockConfig(overrides) });
}

beforeEach(() => {
  vi.clearAllMocks();
  mockReadFile.mockRejectedValue(Object.assign(new Error('ENOENT'), { code: 'ENOENT' }));
  storage = new TodoStorage({ basePath: '/test/todos' });
  scheduler = new Scheduler();
  sender = createMockSender();
});

describe('reminderCheckMinutes', () => {
  it('checks at half the advance window, clamped to 1-10 minutes', () => {
    expect(reminderCheckMinutes(30)).toBe(10);
    expect(reminderCheckMinutes(10)).toBe(5);
    expect(reminderCheckMinutes(5)).toBe(2);
    expect(reminderCheckMinutes(1)).toBe(1);
  });

  it('rounds down to a step that divides the hour', () => {
    expect(reminderCheckMinutes(14)).toBe(6);
    expect(reminderCheckMinutes(18)).toBe(6);
    expect(reminderCheckMinutes(16)).toBe(6);
    expect(reminderCheckMinutes(8)).toBe(4);
  });
});

describe('TodoJobs', () => {
  describe('start', () => {
    it('schedules every job with the configured timing', () => {
      createJobs({ dailyReportTime: '07:30', overdueCheckIntervalHours: 3 }).start();

      expect(scheduler.getJobNames()).toEqual([
        JOB_NAMES.dailyReport,
        JOB_NAMES.reminderCheck,
        JOB_NAMES.overdueCheck,
      ]);
      expect(mockSchedule.mock.calls.map((call) => call[0])).toEqual([
        '30 7 * * *',
        '*/10 * * * *',
        '0 */3 * * *',
      ]);
    });

    it('skips disabled jobs', () => {
      createJobs({ enableDailyReport: false, enableDeadlineReminder: false }).start();
      expect(scheduler.getJobNames()).toEqual([]);
    });

    it('schedules only the daily report when reminders are off', () => {
      createJobs({ enableDeadlineReminder: false }).start();
      expect(scheduler.getJobNames()).toEqual([JOB_NAMES.dailyReport]);
    });
  });

  it('stops every job', async () => {
    const jobs = createJobs();
    jobs.start();
    await jobs.stop();

    expect(scheduler.getJobNames()).toEqual([]);
  });

  describe('runDailyReport', () => {
    it('sends a report to conversations with open todos', async () => {
      await storage.addTodo('chat-1', '读书');
      await storage.addTodo('chat-2', '已完成的事');
      await storage.markDone('chat-2', 1);

      await createJobs().runDailyReport(createReferenceDate());

      expect(sender.sendMessage).toHaveBeenCalledTimes(1);
      expect(sender.sendMessage).toHaveBeenCalledWith(
        'chat-1',
        '每日待办早报\n\n[无截止时间] (1 项)：\n   - 读书\n\n待办总计：未完成 1 项 | 已完成 0 项',
        { atAll: false },
      );
    });

    it('mentions everyone when the conversation asked for it', async () => {
      await storage.addTodo('group-1', '读书');
      await storage.setSetting('group-1', 'atAll', true);

      await createJobs().runDailyReport(createReferenceDate());

      expect(sender.sendMessage).toHaveBeenCalledWith('group-1', expect.any(String), { atAll: true });
    });

    it('continues with other conversations after a failed send', async () => {
      await storage.addTodo('chat-1', '读书');
      await storage.addTodo('chat-2', '跑步');
      sender.sendMessage.mockRejectedValueOnce(new Error('offline'));

      await createJobs().runDailyReport(createReferenceDate());

      expect(sender.sendMessage).toHaveBeenCalledTimes(2);
      expect(sender.sendMessage.mock.calls[1][0]).toBe('chat-2');
    });

    it('logs a failed send as a warning', async () => {
      await storage.addTodo('chat-1', '读书');
      sender.sendMessage.mockRejectedValueOnce(new Error('offline'));

      await createJobs().runDailyReport(createReferenceDate());

      expect(mockLogger.warn).toHaveBeenCalledWith(
        { error: expect.any(Error), key: 'chat-1', kind: 'daily-report' },
        'Message delivery failed',
      );
    });
  });

  describe('runReminderCheck', () => {
    const at = localDate(2026, 2, 18, 14, 40);

    it('sends a deadline reminder once', async () => {
      await storage.addTodo('chat-1', '开会', localDate(2026, 2, 18, 15, 0));
      const jobs = createJobs();

      await jobs.runReminderCheck(at);
      await jobs.runReminderCheck(at);

      expect(sender.sendMessage).toHaveBeenCalledTimes(1);
      expect(sender.sendMessage).toHaveBeenCalledWith(
        'chat-1',
        '待办即将到期提醒\n开会\n截止：2026-02-18 15:00 (20分钟后到期)',
        { atAll: false },
      );
    });

    it('retries a reminder whose delivery failed', async () => {
      await storage.addTodo('chat-1', '开会', localDate(2026, 2, 18, 15, 0));
      sender.sendMessage.mockRejectedValueOnce(new Error('offline'));
      const jobs = createJobs();

      await jobs.runReminderCheck(at);
      expect((await storage.getTodos('chat-1'))[0].reminded).toBe(false);

      await jobs.runReminderCheck(at);
      expect((await storage.getTodos('chat-1'))[0].reminded).toBe(true);
      expect(sender.sendMessage).toHaveBeenCalledTimes(2);
    });

    it('sends a due custom reminder and clears it', async () => {
      await storage.addTodo('chat-1', '读书');
      await storage.setCustomReminder('chat-1', 1, localDate(2026, 2, 18, 14, 30));

      await createJobs().runReminderCheck(at);

      expect(sender.sendMessage).toHaveBeenCalledWith('chat-1', '自定义提醒\n读书', { atAll: false });
      expect((await storage.getTodos('chat-1'))[0].customReminder).toBeNull();
    });

    it('leaves future custom reminders alone', async () => {
      await storage.addTodo('chat-1', '读书');
      await storage.setCustomReminder('chat-1', 1, localDate(2026, 2, 18, 16, 0));

      await createJobs().runReminderCheck(at);

      expect(sender.sendMessage).not.toHaveBeenCalled();
    });
  });

  describe('runOverdueCheck', () => {
    it('sends one notice per conversation with overdue todos', async () => {
      await storage.addTodo('chat-1', '交报告', localDate(2026, 2, 18, 8, 0));
      await storage.addTodo('chat-1', '开会', localDate(2026, 2, 18, 15, 0));
      await storage.addTodo('chat-2', '读书');

      await createJobs().runOverdueCheck(createReferenceDate());

      expect(sender.sendMessage).toHaveBeenCalledTimes(1);
      expect(sender.sendMessage).toHaveBeenCalledWith(
        'chat-1',
        '你有 1 条逾期待办：\n\n- 交报告\n   截止：2026-02-18 08:00 (已逾期2小时)',
        { atAll: false },
      );
    });
  });
});
