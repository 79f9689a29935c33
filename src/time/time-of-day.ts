/**
 * Time-of-day extraction
 * Finds a clock time ("18:30", "下午三点", "晚上8点半", "十点二十分") in free text
 */

import { cnToInt } from './numerals.js';
import { isValidTimeOfDay, type TimeOfDay } from './calendar.js';

const PM_WORDS = ['下午', '晚上', '晚', '傍晚'];

const DIGITAL_PATTERN = /(\d{1,2}):(\d{2})/;

const LEXICAL_PATTERN = new RegExp(
  '(?:凌晨|早上|早晨|上午|中午|下午|傍晚|晚上|晚)?' +
    '\\s*' +
    // The glyph after 周 is a weekday, not an hour
    '(?<!周)(\\d{1,2}|[一二三四五六七八九十两]+)' +
    '\\s*[点时]' +
    '(?:\\s*(\\d{1,2}|[一二三四五六七八九十]+)\\s*分?)?' +
    '(半)?',
);

const PERIOD_PATTERN = /(凌晨|早上|早晨|上午|中午|下午|傍晚|晚上|晚)/;

type Period = 'dawn' | 'morning' | 'noon' | 'afternoon';

const PERIODS: Readonly<Record<string, Period>> = {
  凌晨: 'dawn',
  早上: 'morning',
  早晨: 'morning',
  上午: 'morning',
  中午: 'noon',
  下午: 'afternoon',
  傍晚: 'afternoon',
  晚上: 'afternoon',
  晚: 'afternoon',
};

function applyPeriod(hour: number, period: Period | undefined): number {
  switch (period) {
    case 'afternoon':
      return hour < 12 ? hour + 12 : hour;
    case 'dawn':
      return hour === 12 ? 0 : hour;
    default:
      return hour;
  }
}

function matchDigital(text: string): TimeOfDay | null {
  const match = text.match(DIGITAL_PATTERN);
  if (!match) return null;

  let hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);

  if (hour < 12 && PM_WORDS.some((word) => text.includes(word))) {
    hour += 12;
  }

  const time = { hour, minute };
  return isValidTimeOfDay(time) ? time : null;
}

function matchLexical(text: string): TimeOfDay | null {
  const match = text.match(LEXICAL_PATTERN);
  if (!match) return null;

  const hour = cnToInt(match[1]);
  if (hour === null) return null;

  let minute = 0;
  if (match[3]) {
    minute = 30;
  } else if (match[2]) {
    minute = cnToInt(match[2]) ?? 0;
  }

  // The period word may sit anywhere in the text, not only before the hour
  const periodMatch = text.match(PERIOD_PATTERN);
  const period = periodMatch ? PERIODS[periodMatch[1]] : undefined;

  const time = { hour: applyPeriod(hour, period), minute };
  return isValidTimeOfDay(time) ? time : null;
}

/**
 * Extract an (hour, minute) pair from text. Digital clock times are tried
 * before Chinese clock words.
 */
export function extractTimeOfDay(text: string): TimeOfDay | null {
  return matchDigital(text) ?? matchLexical(text);
}
