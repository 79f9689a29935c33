import { z } from 'zod';

const CLOCK_TIME = /^([01]?\d|2[0-3]):[0-5]\d$/;

export const ConfigSchema = z.object({
  // Storage
  storagePath: z.string().min(1).default('./todo-data'),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Daily report
  enableDailyReport: z.boolean().default(true),
  dailyReportTime: z.string().regex(CLOCK_TIME, 'DAILY_REPORT_TIME must be HH:MM').default('08:00'),
  upcomingDays: z.number().int().min(1).max(30).default(3),

  // Deadline reminders
  enableDeadlineReminder: z.boolean().default(true),
  reminderAdvanceMinutes: z.number().int().min(1).max(1440).default(30),
  overdueCheckIntervalHours: z
    .number()
    .int()
    .min(1)
    .max(12)
    .refine((hours) => 24 % hours === 0, 'OVERDUE_CHECK_INTERVAL_HOURS must divide 24')
    .default(2),

  // Lists
  historyLimit: z.number().int().min(1).max(100).default(20),
  groupTodoScope: z.enum(['shared', 'member']).default('shared'),
});

export type Config = z.infer<typeof ConfigSchema>;
