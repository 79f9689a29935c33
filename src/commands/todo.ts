/**
 * Todo Command Handler
 * Handles "/todo <sub-command>" messages and renders the replies
 */

import { getConfig } from '../config/index.js';
import { getTodoStorage, makeStorageKey, type ConversationRef } from '../todos/storage.js';
import { buildDailyReport } from '../todos/report.js';
import { parseTime } from '../time/time-parser.js';
import { splitContentAndTime } from '../time/splitter.js';
import { formatAbsolute, formatRelative } from '../time/format.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('todo-command');

export interface CommandContext extends ConversationRef {
  senderName?: string;
}

export interface CommandResult {
  response: string;
  success: boolean;
  error?: string;
}

type SubCommandHandler = (args: string, context: CommandContext) => Promise<CommandResult>;

const COMMAND_PATTERN = /^\/todo(?:\s+(\S+)(?:\s+([\s\S]*))?)?$/i;
const INDEX_PATTERN = /^\d+$/;

export const HELP_TEXT = `使用帮助

基础指令：

/todo add [截止时间] <内容>
   添加待办事项
   示例：/todo add 明天下午三点 交报告

/todo list
   查看未完成的待办列表

/todo done <序号>
   标记某条待办为已完成

/todo del <序号>
   删除某条待办

/todo del_all
   删除所有未完成的待办

/todo history
   查看已完成记录

/todo history_clear
   清空所有已完成记录

/todo remind <序号> <时间>
   设置自定义提醒（仅私聊）

/todo report
   立即生成一次早报

/todo at_all y/n
   设置群聊提醒是否@全体成员（仅群聊）

支持的时间格式：
   标准格式：2026-02-20 18:00
   中文日期：明天、后天、3天后、下周一、3月5日
   中文时间：下午三点、晚上8点半、10:30
   相对时长：2小时后、30分钟后
   组合使用：明天下午三点、后天晚上8点`;

function reply(response: string): CommandResult {
  return { response, success: true };
}

function storageKey(context: CommandContext): string {
  return makeStorageKey(context, getConfig().groupTodoScope);
}

function notFound(index: number): CommandResult {
  return reply(`序号 ${index} 不存在，请用 /todo list 查看列表。`);
}

async function handleAdd(args: string, context: CommandContext): Promise<CommandResult> {
  if (!args.trim()) {
    return reply('请输入待办内容。\n示例：/todo add 明天下午三点 交报告');
  }

  const config = getConfig();
  const storage = getTodoStorage();
  const key = storageKey(context);

  const { content, time } = splitContentAndTime(args);
  await storage.addTodo(key, content, time);

  const items = await storage.getTodos(key);
  const newIndex = items.length;

  let response = `待办已添加 (序号 ${newIndex})\n${content}`;
  if (time) {
    response += `\n截止：${formatAbsolute(time)}`;
    if (!context.isGroup && config.enableDeadlineReminder) {
      response += `\n将在截止前 ${config.reminderAdvanceMinutes} 分钟提醒`;
    }
  } else {
    response += '\n未设置截止时间';
  }

  response += '\n\n当前待办列表：';
  items.forEach((item, i) => {
    const idx = i + 1;
    let line = `\n${idx}. ${item.content}`;
    if (item.deadline) {
      line += ` (${formatAbsolute(item.deadline)})`;
    }
    if (idx === newIndex) {
      line += ' <-- 新增';
    }
    response += line;
  });

  logger.info({ key, hasDeadline: time !== null }, 'Todo created');
  return reply(response);
}

async function handleList(_args: string, context: CommandContext): Promise<CommandResult> {
  const storage = getTodoStorage();
  const key = storageKey(context);
  const items = await storage.getTodos(key);

  if (items.length === 0) {
    return reply('暂无待办事项！');
  }

  const now = new Date();
  const lines = ['待办事项列表：', ''];
  items.forEach((item, i) => {
    let line = `${i + 1}. ${item.content}`;
    if (item.deadline) {
      line += `\n   ${formatAbsolute(item.deadline)} (${formatRelative(item.deadline, now)})`;
    }
    lines.push(line);
  });

  const doneCount = await storage.getDoneCount(key);
  lines.push(`\n未完成 ${items.length} 项 | 已完成 ${doneCount} 项`);

  return reply(lines.join('\n'));
}

function parseIndex(args: string): number | null {
  const token = args.trim().split(/\s+/)[0] ?? '';
  return INDEX_PATTERN.test(token) ? parseInt(token, 10) : null;
}

async function handleDone(args: string, context: CommandContext): Promise<CommandResult> {
  const index = parseIndex(args);
  if (index === null) {
    return reply('请输入序号。\n示例：/todo done 1');
  }

  const item = await getTodoStorage().markDone(storageKey(context), index);
  return item ? reply(`已完成：${item.content}`) : notFound(index);
}

async function handleDelete(args: string, context: CommandContext): Promise<CommandResult> {
  const index = parseIndex(args);
  if (index === null) {
    return reply('请输入序号。\n示例：/todo del 1');
  }

  const item = await getTodoStorage().deleteTodo(storageKey(context), index);
  return item ? reply(`已删除：${item.content}`) : notFound(index);
}

async function handleDeleteAll(_args: string, context: CommandContext): Promise<CommandResult> {
  const count = await getTodoStorage().deleteAllTodos(storageKey(context));
  return reply(count > 0 ? `已删除全部 ${count} 条待办事项。` : '暂无待办事项可删除。');
}

async function handleHistory(_args: string, context: CommandContext): Promise<CommandResult> {
  const limit = getConfig().historyLimit;
  const items = await getTodoStorage().getHistory(storageKey(context), limit);

  if (items.length === 0) {
    return reply('暂无已完成记录！');
  }

  const lines = [`已完成记录（最近${limit}条）：`, ''];
  items.forEach((item, i) => {
    lines.push(`${i + 1}. ${item.content}`);
    lines.push(`   完成于 ${item.doneAt ? formatAbsolute(item.doneAt) : '未知'}`);
  });

  return reply(lines.join('\n'));
}

async function handleHistoryClear(_args: string, context: CommandContext): Promise<CommandResult> {
  const count = await getTodoStorage().clearDone(storageKey(context));
  return reply(count > 0 ? `已清空 ${count} 条已完成记录。` : '没有需要清空的已完成记录。');
}

async function handleRemind(args: string, context: CommandContext): Promise<CommandResult> {
  if (context.isGroup) {
    return reply('自定义提醒功能仅在私聊中可用。');
  }

  const match = args.trim().match(/^(\d+)\s+([\s\S]+)$/);
  if (!match) {
    return reply('用法：/todo remind <序号> <时间>\n示例：/todo remind 1 明天上午九点');
  }

  const index = parseInt(match[1], 10);
  const timeText = match[2].trim();
  const reminderTime = parseTime(timeText);
  if (!reminderTime) {
    return reply(`无法识别时间：「${timeText}」\n支持：明天下午三点、2026-02-20 18:00、3天后 等`);
  }

  const item = await getTodoStorage().setCustomReminder(storageKey(context), index, reminderTime);
  if (!item) {
    return notFound(index);
  }

  return reply(`已设置提醒\n${item.content}\n提醒时间：${formatAbsolute(reminderTime)}`);
}

async function handleReport(_args: string, context: CommandContext): Promise<CommandResult> {
  const config = getConfig();
  const now = new Date();
  const snapshot = await getTodoStorage().getReportSnapshot(storageKey(context), config.upcomingDays, now);
  const report = buildDailyReport(snapshot, {
    title: '每日待办早报（测试）',
    upcomingDays: config.upcomingDays,
    now,
  });

  return reply(report ?? '暂无待办事项，无需生成早报。');
}

async function handleAtAll(args: string, context: CommandContext): Promise<CommandResult> {
  if (!context.isGroup) {
    return reply('该指令仅在群聊中可用。');
  }

  const choice = args.trim().toLowerCase();
  if (choice !== 'y' && choice !== 'n') {
    return reply('请输入 y 或 n。\n示例：/todo at_all y');
  }

  const enabled = choice === 'y';
  await getTodoStorage().setSetting(storageKey(context), 'atAll', enabled);
  return reply(`群聊提醒@全体成员已${enabled ? '开启' : '关闭'}。`);
}

async function handleHelp(): Promise<CommandResult> {
  return reply(HELP_TEXT);
}

const SUB_COMMANDS: Readonly<Record<string, SubCommandHandler>> = {
  add: handleAdd,
  list: handleList,
  done: handleDone,
  del: handleDelete,
  del_all: handleDeleteAll,
  history: handleHistory,
  history_clear: handleHistoryClear,
  remind: handleRemind,
  report: handleReport,
  at_all: handleAtAll,
  help: handleHelp,
};

/**
 * Handle a "/todo" message. Returns null for any other text.
 */
export async function handleTodoCommand(
  text: string,
  context: CommandContext,
): Promise<CommandResult | null> {
  const match = text.trim().match(COMMAND_PATTERN);
  if (!match) {
    return null;
  }

  const sub = (match[1] ?? 'help').toLowerCase();
  const args = match[2] ?? '';
  const handler = Object.hasOwn(SUB_COMMANDS, sub) ? SUB_COMMANDS[sub] : handleHelp;

  try {
    logger.debug({ sub, conversation: context.conversationId }, 'Handling todo command');
    return await handler(args, context);
  } catch (error) {
    logger.error({ error, sub }, 'Todo command failed');
    return {
      response: '操作失败，请稍后再试。',
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
