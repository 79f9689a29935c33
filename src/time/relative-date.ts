/**
 * Relative date resolution
 * Turns a date phrase (今天, 明天, 后天, 大后天, N天后, 下周X, 本周X) into a
 * local-midnight Date relative to a base instant
 */

import { cnToInt } from './numerals.js';
import { addDays, isoWeekday, startOfDay } from './calendar.js';

// Monday = 0 ... Sunday = 6
const WEEKDAYS: ReadonlyMap<string, number> = new Map([
  ['一', 0],
  ['二', 1],
  ['三', 2],
  ['四', 3],
  ['五', 4],
  ['六', 5],
  ['日', 6],
  ['天', 6],
]);

const FIXED_OFFSETS: ReadonlyMap<string, number> = new Map([
  ['今天', 0],
  ['今日', 0],
  ['明天', 1],
  ['明日', 1],
  ['后天', 2],
  ['大后天', 3],
]);

export const DAYS_LATER_SOURCE = '(\\d+|[零一二三四五六七八九十百两]+)\\s*[天日]后';
export const NEXT_WEEK_SOURCE = '下周[一二三四五六日天]';
export const THIS_WEEK_SOURCE = '(?:这|本)?周[一二三四五六日天]';

const DAYS_LATER = new RegExp(`^${DAYS_LATER_SOURCE}`);
const NEXT_WEEK = /^下周([一二三四五六日天])/;
const THIS_WEEK = /^(?:这|本)?周([一二三四五六日天])/;

function daysUntil(targetWeekday: number, base: Date): number {
  return (((targetWeekday - isoWeekday(base)) % 7) + 7) % 7;
}

/**
 * Resolve a date phrase. Returns null when the phrase is not a relative date.
 */
export function resolveRelativeDate(phrase: string, base: Date): Date | null {
  const today = startOfDay(base);

  const fixed = FIXED_OFFSETS.get(phrase);
  if (fixed !== undefined) {
    return addDays(today, fixed);
  }

  const daysLater = phrase.match(DAYS_LATER);
  if (daysLater) {
    const days = cnToInt(daysLater[1]);
    return days ? addDays(today, days) : null;
  }

  const nextWeek = phrase.match(NEXT_WEEK);
  if (nextWeek) {
    const target = WEEKDAYS.get(nextWeek[1]);
    // Always 7 to 13 days ahead, even when the weekday is still to come this week
    return target === undefined ? null : addDays(today, daysUntil(target, base) + 7);
  }

  const thisWeek = phrase.match(THIS_WEEK);
  if (thisWeek) {
    const target = WEEKDAYS.get(thisWeek[1]);
    return target === undefined ? null : addDays(today, daysUntil(target, base));
  }

  return null;
}
