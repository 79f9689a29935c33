/**
 * Message builders for the daily report and reminder notices
 */

import { formatAbsolute, formatRelative } from '../time/format.js';
import type { ReportSnapshot, TodoItem } from './storage.js';

function section(lines: string[], title: string, items: TodoItem[], describe: (item: TodoItem) => string): void {
  if (items.length === 0) return;
  lines.push(`[${title}] (${items.length} 项)：`);
  for (const item of items) {
    lines.push(`   - ${describe(item)}`);
  }
  lines.push('');
}

/**
 * Daily report text, or null when the conversation has nothing left to do
 */
export function buildDailyReport(
  snapshot: ReportSnapshot,
  options: { title?: string; upcomingDays?: number; now?: Date } = {},
): string | null {
  if (snapshot.undoneCount === 0) return null;

  const title = options.title ?? '每日待办早报';
  const upcomingDays = options.upcomingDays ?? 3;
  const now = options.now ?? new Date();

  const lines = [title, ''];
  section(lines, '已逾期', snapshot.overdue, (item) => `${item.content} (${formatRelative(item.deadline, now)})`);
  section(lines, '今日到期', snapshot.dueToday, (item) => `${item.content} (${formatAbsolute(item.deadline)})`);
  section(lines, `近${upcomingDays}天到期`, snapshot.upcoming, (item) => `${item.content} (${formatAbsolute(item.deadline)})`);
  section(lines, '无截止时间', snapshot.noDeadline, (item) => item.content);
  lines.push(`待办总计：未完成 ${snapshot.undoneCount} 项 | 已完成 ${snapshot.doneCount} 项`);

  return lines.join('\n');
}

export function buildDeadlineReminder(item: TodoItem, now: Date = new Date()): string {
  return [
    '待办即将到期提醒',
    item.content,
    `截止：${formatAbsolute(item.deadline)} (${formatRelative(item.deadline, now)})`,
  ].join('\n');
}

export function buildCustomReminder(item: TodoItem): string {
  const lines = ['自定义提醒', item.content];
  if (item.deadline) {
    lines.push(`截止：${formatAbsolute(item.deadline)}`);
  }
  return lines.join('\n');
}

export function buildOverdueNotice(items: TodoItem[], now: Date = new Date()): string {
  const lines = [`你有 ${items.length} 条逾期待办：`, ''];
  for (const item of items) {
    lines.push(`- ${item.content}`);
    lines.push(`   截止：${formatAbsolute(item.deadline)} (${formatRelative(item.deadline, now)})`);
  }
  return lines.join('\n');
}
