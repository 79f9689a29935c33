import { getConfig } from './config/index.js';
import { handleTodoCommand, type CommandContext, type CommandResult } from './commands/todo.js';
import { TodoJobs, type MessageSender } from './todos/jobs.js';
import { getTodoStorage } from './todos/storage.js';
import { Scheduler } from './scheduler/scheduler.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('todo-plugin');

export interface TodoPluginOptions {
  sender: MessageSender;
  scheduler?: Scheduler;
}

/**
 * Entry point for a host chat platform: routes "/todo" messages and owns the
 * background jobs for the lifetime of the plugin
 */
export class TodoPlugin {
  private jobs: TodoJobs;
  private isRunning = false;

  constructor(options: TodoPluginOptions) {
    this.jobs = new TodoJobs({
      sender: options.sender,
      storage: getTodoStorage(),
      scheduler: options.scheduler ?? new Scheduler(),
      config: getConfig(),
    });
  }

  start(): void {
    if (this.isRunning) {
      logger.warn('Todo plugin is already running');
      return;
    }

    logger.info('Starting todo plugin...');
    this.jobs.start();
    this.isRunning = true;
    logger.info('Todo plugin started');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping todo plugin...');
    await this.jobs.stop();
    this.isRunning = false;
    logger.info('Todo plugin stopped');
  }

  isOnline(): boolean {
    return this.isRunning;
  }

  handleMessage(text: string, context: CommandContext): Promise<CommandResult | null> {
    return handleTodoCommand(text, context);
  }
}
