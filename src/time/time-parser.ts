/**
 * Time Parser
 * Parses Chinese natural language time expressions into Date objects
 *
 * Supported forms:
 * - 2026-02-20 18:00, 2026/02/20, 2026-02-20 18:00:30
 * - 2026年2月20日下午3点, 2月20日, 3月5号 晚上8点
 * - 今天/明天/后天/大后天, 3天后, 下周一, 本周五, combined with 下午三点, 8:30, 晚上8点半
 * - 2小时后, 两个小时后, 30分钟后, 半小时后
 */

import { cnToInt } from './numerals.js';
import { extractTimeOfDay } from './time-of-day.js';
import {
  resolveRelativeDate,
  DAYS_LATER_SOURCE,
  NEXT_WEEK_SOURCE,
  THIS_WEEK_SOURCE,
} from './relative-date.js';
import {
  addDays,
  addHours,
  addMinutes,
  makeLocalDate,
  withTimeOfDay,
} from './calendar.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('time-parser');

export interface TimeMatcher {
  name: string;
  /** When the text has this matcher's shape, its answer is final, even null */
  claims?: (text: string) => boolean;
  match: (text: string, base: Date) => Date | null;
}

const STRICT_NUMERIC =
  /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})(?:\s+(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?)?$/;

const CN_FULL_DATE = /^(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*[日号]/;

const CN_MONTH_DAY = /^(\d{1,2})\s*月\s*(\d{1,2})\s*[日号]?/;

// Checked in order; the first phrase found decides the date
const RELATIVE_DATE_PATTERNS: RegExp[] = [
  /大后天/,
  /后天/,
  /明天|明日/,
  /今天|今日/,
  new RegExp(DAYS_LATER_SOURCE),
  new RegExp(NEXT_WEEK_SOURCE),
  new RegExp(THIS_WEEK_SOURCE),
];

const HOURS_LATER = /(\d+|[一二三四五六七八九十两]+)\s*(?:个)?小时后/;
const MINUTES_LATER = /(\d+|[一二三四五六七八九十两]+)\s*分钟后/;
const HALF_HOUR_LATER = /(?<!个)半\s*(?:个)?小时后/;

// 2月29日 can be up to eight years away
const MAX_YEAR_ROLLOVER = 8;

function mergeSuffixTime(date: Date, suffix: string): Date {
  const time = extractTimeOfDay(suffix);
  return time ? withTimeOfDay(date, time) : date;
}

function matchStrictNumeric(text: string): Date | null {
  const match = text.match(STRICT_NUMERIC);
  if (!match) return null;

  const [, year, , month, day, hour, minute, second] = match;
  return makeLocalDate(
    parseInt(year, 10),
    parseInt(month, 10),
    parseInt(day, 10),
    hour ? parseInt(hour, 10) : 0,
    minute ? parseInt(minute, 10) : 0,
    second ? parseInt(second, 10) : 0,
  );
}

function matchChineseFullDate(text: string): Date | null {
  const match = text.match(CN_FULL_DATE);
  if (!match) return null;

  const date = makeLocalDate(
    parseInt(match[1], 10),
    parseInt(match[2], 10),
    parseInt(match[3], 10),
  );
  if (!date) return null;

  return mergeSuffixTime(date, text.slice(match[0].length));
}

function matchChineseMonthDay(text: string, base: Date): Date | null {
  const match = text.match(CN_MONTH_DAY);
  if (!match) return null;

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);

  // Dates already behind the base instant mean the next occurrence
  let date: Date | null = null;
  for (let offset = 0; offset <= MAX_YEAR_ROLLOVER && !date; offset++) {
    const candidate = makeLocalDate(base.getFullYear() + offset, month, day);
    if (candidate && candidate >= base) {
      date = candidate;
    }
  }
  if (!date) return null;

  return mergeSuffixTime(date, text.slice(match[0].length));
}

function matchRelative(text: string, base: Date): Date | null {
  let date: Date | null = null;
  for (const pattern of RELATIVE_DATE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      date = resolveRelativeDate(match[0], base);
      break;
    }
  }

  // Date and time are found independently anywhere in the text
  const time = extractTimeOfDay(text);

  if (date && time) {
    return withTimeOfDay(date, time);
  }
  if (date) {
    return date;
  }
  if (time) {
    const result = withTimeOfDay(base, time);
    // A clock time that has already passed today means tomorrow
    return result > base ? result : addDays(result, 1);
  }
  return null;
}

function matchDuration(text: string, base: Date): Date | null {
  if (HALF_HOUR_LATER.test(text)) {
    return addMinutes(base, 30);
  }

  const hoursMatch = text.match(HOURS_LATER);
  if (hoursMatch) {
    const hours = cnToInt(hoursMatch[1]);
    if (hours) return addHours(base, hours);
  }

  const minutesMatch = text.match(MINUTES_LATER);
  if (minutesMatch) {
    const minutes = cnToInt(minutesMatch[1]);
    if (minutes) return addMinutes(base, minutes);
  }

  return null;
}

// First success wins
export const TIME_MATCHERS: readonly TimeMatcher[] = [
  {
    name: 'strict-numeric',
    claims: (text) => STRICT_NUMERIC.test(text),
    match: (text) => matchStrictNumeric(text),
  },
  {
    name: 'cn-full-date',
    claims: (text) => CN_FULL_DATE.test(text),
    match: (text) => matchChineseFullDate(text),
  },
  {
    name: 'cn-month-day',
    claims: (text) => CN_MONTH_DAY.test(text),
    match: matchChineseMonthDay,
  },
  { name: 'relative', match: matchRelative },
  { name: 'duration', match: matchDuration },
];

/**
 * Fold full-width digits, colon and space into their ASCII forms
 */
export function normalizeTimeText(text: string): string {
  return text
    .replace(/[０-９]/g, (ch) => String(ch.charCodeAt(0) - 0xff10))
    .replace(/：/g, ':')
    .replace(/\u3000/g, ' ')
    .trim();
}

/**
 * Parse a Chinese natural language time expression.
 * Returns null when the text holds no recognizable time.
 */
export function parseTime(text: string, referenceTime: Date = new Date()): Date | null {
  const normalized = normalizeTimeText(text);
  if (!normalized) return null;

  for (const { name, claims, match } of TIME_MATCHERS) {
    try {
      const result = match(normalized, referenceTime);
      if (result) {
        logger.debug({ text, matcher: name, result }, 'Time parsed successfully');
        return result;
      }
      if (claims?.(normalized)) {
        logger.debug({ text, matcher: name }, 'Malformed date');
        return null;
      }
    } catch (error) {
      logger.warn({ error, text, matcher: name }, 'Time matcher failed');
    }
  }

  logger.debug({ text }, 'No time pattern matched');
  return null;
}
