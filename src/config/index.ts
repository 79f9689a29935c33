import { config as dotenvConfig } from 'dotenv';
import { ConfigSchema, type Config } from './schema.js';

dotenvConfig();

function readInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function readBool(value: string | undefined): boolean | undefined {
  return value ? value === 'true' : undefined;
}

function loadConfig(): Config {
  const rawConfig = {
    storagePath: process.env.TODO_STORAGE_PATH,
    logLevel: process.env.LOG_LEVEL,
    enableDailyReport: readBool(process.env.ENABLE_DAILY_REPORT),
    dailyReportTime: process.env.DAILY_REPORT_TIME,
    upcomingDays: readInt(process.env.UPCOMING_DAYS),
    enableDeadlineReminder: readBool(process.env.ENABLE_DEADLINE_REMINDER),
    reminderAdvanceMinutes: readInt(process.env.REMINDER_ADVANCE_MINUTES),
    overdueCheckIntervalHours: readInt(process.env.OVERDUE_CHECK_INTERVAL_HOURS),
    historyLimit: readInt(process.env.HISTORY_LIMIT),
    groupTodoScope: process.env.GROUP_TODO_SCOPE,
  };

  // Remove undefined values so defaults apply
  const cleanedConfig = Object.fromEntries(
    Object.entries(rawConfig).filter(([_, v]) => v !== undefined)
  );

  const result = ConfigSchema.safeParse(cleanedConfig);

  if (!result.success) {
    console.error('Configuration validation failed:');
    result.error.errors.forEach((err) => {
      console.error(`  - ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Drop the cached config so the next getConfig() call re-reads the environment
 */
export function reloadConfig(): void {
  config = null;
}

export * from './schema.js';
