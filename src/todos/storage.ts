/**
 * Todo Storage
 * Persists todo lists per conversation in a single JSON file
 */

import { readFile, writeFile, mkdir, rename } from 'fs/promises';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { getConfig, type Config } from '../config/index.js';
import { getWriteQueue } from '../utils/write-queue.js';
import { createLogger } from '../utils/logger.js';
import { addDays, addMinutes, startOfDay } from '../time/calendar.js';

const logger = createLogger('todo-storage');

export interface TodoItem {
  id: string;
  content: string;
  createdAt: Date;
  deadline: Date | null;
  done: boolean;
  doneAt: Date | null;
  reminded: boolean;
  customReminder: Date | null;
}

export interface TodoSettings {
  atAll: boolean;
}

export interface ReportSnapshot {
  overdue: TodoItem[];
  dueToday: TodoItem[];
  upcoming: TodoItem[];
  noDeadline: TodoItem[];
  undoneCount: number;
  doneCount: number;
}

export interface ConversationRef {
  conversationId: string;
  senderId?: string;
  isGroup: boolean;
}

const DB_VERSION = 1;

const IsoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const TodoRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  createdAt: IsoDate,
  deadline: IsoDate.nullable().default(null),
  done: z.boolean().default(false),
  doneAt: IsoDate.nullable().default(null),
  reminded: z.boolean().default(false),
  customReminder: IsoDate.nullable().default(null),
});

const TodoSettingsSchema = z.object({
  atAll: z.boolean().default(false),
});

const TodoDatabaseSchema = z.object({
  version: z.number().int().default(DB_VERSION),
  todos: z.record(z.array(TodoRecordSchema)).default({}),
  settings: z.record(TodoSettingsSchema).default({}),
});

interface TodoRecord {
  id: string;
  content: string;
  createdAt: string;
  deadline: string | null;
  done: boolean;
  doneAt: string | null;
  reminded: boolean;
  customReminder: string | null;
}

const DEFAULT_SETTINGS: TodoSettings = { atAll: false };

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function toRecord(item: TodoItem): TodoRecord {
  return {
    id: item.id,
    content: item.content,
    createdAt: item.createdAt.toISOString(),
    deadline: toIso(item.deadline),
    done: item.done,
    doneAt: toIso(item.doneAt),
    reminded: item.reminded,
    customReminder: toIso(item.customReminder),
  };
}

/**
 * Storage key for a conversation. Group chats share one list unless the scope
 * is "member", which gives every sender their own list inside the group.
 */
export function makeStorageKey(
  ref: ConversationRef,
  scope: Config['groupTodoScope'] = 'shared',
): string {
  if (ref.isGroup && scope === 'member' && ref.senderId) {
    return `${ref.conversationId}_${ref.senderId}`;
  }
  return ref.conversationId;
}

export interface TodoStorageOptions {
  basePath?: string;
}

export class TodoStorage {
  private filePath: string;
  private todos = new Map<string, TodoItem[]>();
  private settings = new Map<string, TodoSettings>();
  private loading: Promise<void> | null = null;

  constructor(options?: TodoStorageOptions) {
    const basePath = options?.basePath || getConfig().storagePath;
    this.filePath = join(basePath, 'todos.json');
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      this.loading = null;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.error({ error, file: this.filePath }, 'Todo file is not valid JSON');
      await this.setAside();
      return;
    }

    const result = TodoDatabaseSchema.safeParse(raw);
    if (!result.success) {
      logger.error({ issues: result.error.errors, file: this.filePath }, 'Todo file failed validation');
      await this.setAside();
      return;
    }

    for (const [key, items] of Object.entries(result.data.todos)) {
      this.todos.set(key, items);
    }
    for (const [key, settings] of Object.entries(result.data.settings)) {
      this.settings.set(key, settings);
    }

    logger.info({ conversations: this.todos.size }, 'Todos loaded');
  }

  /**
   * Move an unreadable file out of the way so the next save cannot overwrite it
   */
  private async setAside(): Promise<void> {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      await rename(this.filePath, target);
    } catch (error) {
      this.loading = null;
      throw error;
    }
    logger.warn({ file: this.filePath, movedTo: target }, 'Unreadable todo file set aside, starting empty');
  }

  private async save(): Promise<void> {
    const snapshot = {
      version: DB_VERSION,
      todos: Object.fromEntries(
        [...this.todos].map(([key, items]) => [key, items.map(toRecord)]),
      ),
      settings: Object.fromEntries(this.settings),
    };
    const content = JSON.stringify(snapshot, null, 2);

    await getWriteQueue().enqueue(this.filePath, async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, content, 'utf-8');
    });
  }

  private items(key: string): TodoItem[] {
    return this.todos.get(key) ?? [];
  }

  private undone(key: string): TodoItem[] {
    return this.items(key).filter((item) => !item.done);
  }

  private findUndone(key: string, index: number): TodoItem | null {
    const undone = this.undone(key);
    if (!Number.isInteger(index) || index < 1 || index > undone.length) {
      return null;
    }
    return undone[index - 1];
  }

  private generateId(): string {
    return randomUUID().slice(0, 8);
  }

  async addTodo(key: string, content: string, deadline: Date | null = null): Promise<TodoItem> {
    await this.ensureLoaded();

    const item: TodoItem = {
      id: this.generateId(),
      content,
      createdAt: new Date(),
      deadline,
      done: false,
      doneAt: null,
      reminded: false,
      customReminder: null,
    };

    this.todos.set(key, [...this.items(key), item]);
    await this.save();

    logger.info({ key, todoId: item.id }, 'Todo added');
    return item;
  }

  async getTodos(key: string, includeDone = false): Promise<TodoItem[]> {
    await this.ensureLoaded();
    return includeDone ? [...this.items(key)] : this.undone(key);
  }

  /**
   * Mark the index-th undone todo (1-based) as done
   */
  async markDone(key: string, index: number, now: Date = new Date()): Promise<TodoItem | null> {
    await this.ensureLoaded();
    const target = this.findUndone(key, index);
    if (!target) return null;

    target.done = true;
    target.doneAt = now;
    await this.save();

    logger.info({ key, todoId: target.id }, 'Todo done');
    return target;
  }

  /**
   * Delete the index-th undone todo (1-based)
   */
  async deleteTodo(key: string, index: number): Promise<TodoItem | null> {
    await this.ensureLoaded();
    const target = this.findUndone(key, index);
    if (!target) return null;

    this.todos.set(key, this.items(key).filter((item) => item !== target));
    await this.save();

    logger.info({ key, todoId: target.id }, 'Todo deleted');
    return target;
  }

  /**
   * Delete every undone todo, keeping the done history
   */
  async deleteAllTodos(key: string): Promise<number> {
    await this.ensureLoaded();
    const undoneCount = this.undone(key).length;
    if (undoneCount === 0) return 0;

    this.todos.set(key, this.items(key).filter((item) => item.done));
    await this.save();

    logger.info({ key, removed: undoneCount }, 'Undone todos deleted');
    return undoneCount;
  }

  /**
   * Done todos, most recently completed first
   */
  async getHistory(key: string, limit = 20): Promise<TodoItem[]> {
    await this.ensureLoaded();
    return this.items(key)
      .filter((item) => item.done)
      .sort((a, b) => (b.doneAt?.getTime() ?? 0) - (a.doneAt?.getTime() ?? 0))
      .slice(0, limit);
  }

  async clearDone(key: string): Promise<number> {
    await this.ensureLoaded();
    const items = this.items(key);
    const undone = items.filter((item) => !item.done);
    const cleared = items.length - undone.length;
    if (cleared === 0) return 0;

    this.todos.set(key, undone);
    await this.save();

    logger.info({ key, cleared }, 'Done todos cleared');
    return cleared;
  }

  async setCustomReminder(key: string, index: number, reminderTime: Date): Promise<TodoItem | null> {
    await this.ensureLoaded();
    const target = this.findUndone(key, index);
    if (!target) return null;

    target.customReminder = reminderTime;
    await this.save();

    logger.info({ key, todoId: target.id, reminderTime }, 'Custom reminder set');
    return target;
  }

  async clearCustomReminder(key: string, todoId: string): Promise<void> {
    await this.ensureLoaded();
    const target = this.items(key).find((item) => item.id === todoId);
    if (!target || !target.customReminder) return;

    target.customReminder = null;
    await this.save();
  }

  async setReminded(key: string, todoId: string): Promise<void> {
    await this.ensureLoaded();
    const target = this.items(key).find((item) => item.id === todoId);
    if (!target || target.reminded) return;

    target.reminded = true;
    await this.save();
  }

  async getAllKeys(): Promise<string[]> {
    await this.ensureLoaded();
    return [...this.todos.keys()];
  }

  async getDueToday(key: string, now: Date = new Date()): Promise<TodoItem[]> {
    await this.ensureLoaded();
    const todayStart = startOfDay(now);
    const tomorrowStart = addDays(todayStart, 1);
    return this.undone(key).filter(
      (item) => item.deadline && item.deadline >= todayStart && item.deadline < tomorrowStart,
    );
  }

  async getOverdue(key: string, now: Date = new Date()): Promise<TodoItem[]> {
    await this.ensureLoaded();
    return this.undone(key).filter((item) => item.deadline && item.deadline < now);
  }

  /**
   * Todos due within the next `days` days, excluding today
   */
  async getUpcoming(key: string, days = 3, now: Date = new Date()): Promise<TodoItem[]> {
    await this.ensureLoaded();
    const tomorrowStart = addDays(startOfDay(now), 1);
    const horizon = addDays(now, days);
    return this.undone(key).filter(
      (item) => item.deadline && item.deadline >= tomorrowStart && item.deadline <= horizon,
    );
  }

  /**
   * Undone, not yet reminded todos whose deadline falls within the advance window
   */
  async getNeedsReminder(key: string, advanceMinutes: number, now: Date = new Date()): Promise<TodoItem[]> {
    await this.ensureLoaded();
    const threshold = addMinutes(now, advanceMinutes);
    return this.undone(key).filter(
      (item) => !item.reminded && item.deadline && item.deadline >= now && item.deadline <= threshold,
    );
  }

  async getCustomReminderDue(key: string, now: Date = new Date()): Promise<TodoItem[]> {
    await this.ensureLoaded();
    return this.undone(key).filter((item) => item.customReminder && item.customReminder <= now);
  }

  async getUndoneCount(key: string): Promise<number> {
    await this.ensureLoaded();
    return this.undone(key).length;
  }

  async getDoneCount(key: string): Promise<number> {
    await this.ensureLoaded();
    return this.items(key).length - this.undone(key).length;
  }

  async getReportSnapshot(key: string, upcomingDays: number, now: Date = new Date()): Promise<ReportSnapshot> {
    const [overdue, dueToday, upcoming, undone, doneCount] = await Promise.all([
      this.getOverdue(key, now),
      this.getDueToday(key, now),
      this.getUpcoming(key, upcomingDays, now),
      this.getTodos(key),
      this.getDoneCount(key),
    ]);

    return {
      overdue,
      dueToday,
      upcoming,
      noDeadline: undone.filter((item) => !item.deadline),
      undoneCount: undone.length,
      doneCount,
    };
  }

  async getSettings(key: string): Promise<TodoSettings> {
    await this.ensureLoaded();
    return { ...DEFAULT_SETTINGS, ...this.settings.get(key) };
  }

  async setSetting<K extends keyof TodoSettings>(key: string, name: K, value: TodoSettings[K]): Promise<void> {
    await this.ensureLoaded();
    const settings = await this.getSettings(key);
    settings[name] = value;
    this.settings.set(key, settings);
    await this.save();

    logger.info({ key, setting: name, value }, 'Setting updated');
  }
}

// Singleton instance
let instance: TodoStorage | null = null;

export function getTodoStorage(): TodoStorage {
  if (!instance) {
    instance = new TodoStorage();
  }
  return instance;
}
