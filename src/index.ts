export { TodoPlugin, type TodoPluginOptions } from './plugin.js';
export { handleTodoCommand, HELP_TEXT, type CommandContext, type CommandResult } from './commands/todo.js';
export {
  TodoJobs,
  JOB_NAMES,
  reminderCheckMinutes,
  type MessageSender,
  type SendOptions,
  type TodoJobsOptions,
} from './todos/jobs.js';
export {
  TodoStorage,
  getTodoStorage,
  makeStorageKey,
  type ConversationRef,
  type ReportSnapshot,
  type TodoItem,
  type TodoSettings,
  type TodoStorageOptions,
} from './todos/storage.js';
export {
  buildCustomReminder,
  buildDailyReport,
  buildDeadlineReminder,
  buildOverdueNotice,
} from './todos/report.js';
export { Scheduler, dailyExpression, intervalExpression, type Interval, type JobCallback } from './scheduler/scheduler.js';
export { getConfig, reloadConfig, ConfigSchema, type Config } from './config/index.js';
export * from './time/index.js';
