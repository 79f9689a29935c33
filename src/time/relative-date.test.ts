import { describe, it, expect } from 'vitest';
import { resolveRelativeDate } from './relative-date.js';
import { isoWeekday, startOfDay } from './calendar.js';
import { createReferenceDate, localDate } from '../__tests__/test-helpers.js';

// Wednesday 2026-02-18 10:00
const base = createReferenceDate();

describe('resolveRelativeDate', () => {
  it('resolves fixed offsets to local midnight', () => {
    expect(resolveRelativeDate('今天', base)).toEqual(localDate(2026, 2, 18));
    expect(resolveRelativeDate('明天', base)).toEqual(localDate(2026, 2, 19));
    expect(resolveRelativeDate('明日', base)).toEqual(localDate(2026, 2, 19));
    expect(resolveRelativeDate('后天', base)).toEqual(localDate(2026, 2, 20));
    expect(resolveRelativeDate('大后天', base)).toEqual(localDate(2026, 2, 21));
  });

  it('resolves N days later', () => {
    expect(resolveRelativeDate('3天后', base)).toEqual(localDate(2026, 2, 21));
    expect(resolveRelativeDate('十天后', base)).toEqual(localDate(2026, 2, 28));
    expect(resolveRelativeDate('两日后', base)).toEqual(localDate(2026, 2, 20));
  });

  it('crosses month boundaries', () => {
    expect(resolveRelativeDate('二十天后', base)).toEqual(localDate(2026, 3, 10));
  });

  it('rejects zero days', () => {
    expect(resolveRelativeDate('0天后', base)).toBeNull();
    expect(resolveRelativeDate('零天后', base)).toBeNull();
  });

  it('puts next week 7 to 13 days ahead', () => {
    expect(resolveRelativeDate('下周一', base)).toEqual(localDate(2026, 3, 2));
    expect(resolveRelativeDate('下周三', base)).toEqual(localDate(2026, 2, 25));
    expect(resolveRelativeDate('下周日', base)).toEqual(localDate(2026, 3, 1));
    expect(resolveRelativeDate('下周天', base)).toEqual(localDate(2026, 3, 1));
  });

  it('resolves this week to the next occurrence, today included', () => {
    expect(resolveRelativeDate('周五', base)).toEqual(localDate(2026, 2, 20));
    expect(resolveRelativeDate('本周三', base)).toEqual(localDate(2026, 2, 18));
    expect(resolveRelativeDate('这周日', base)).toEqual(localDate(2026, 2, 22));
    expect(resolveRelativeDate('周一', base)).toEqual(localDate(2026, 2, 23));
  });

  it('returns null for other phrases', () => {
    expect(resolveRelativeDate('昨天', base)).toBeNull();
    expect(resolveRelativeDate('下个月', base)).toBeNull();
  });

  describe('for every base weekday', () => {
    const DAY_MS = 86_400_000;
    // Monday 2026-02-16 ... Sunday 2026-02-22, all at 10:00
    const bases = Array.from({ length: 7 }, (_, i) => localDate(2026, 2, 16 + i, 10, 0));
    const glyphs: Array<[string, number]> = [
      ['一', 0],
      ['二', 1],
      ['三', 2],
      ['四', 3],
      ['五', 4],
      ['六', 5],
      ['日', 6],
      ['天', 6],
    ];

    function daysAhead(result: Date | null, from: Date): number {
      expect(result).not.toBeNull();
      return result ? Math.round((result.getTime() - startOfDay(from).getTime()) / DAY_MS) : NaN;
    }

    it('puts 下周X on the right weekday 7 to 13 days ahead', () => {
      for (const from of bases) {
        for (const [glyph, weekday] of glyphs) {
          const result = resolveRelativeDate(`下周${glyph}`, from);
          const days = daysAhead(result, from);
          expect(days).toBeGreaterThanOrEqual(7);
          expect(days).toBeLessThanOrEqual(13);
          expect(result && isoWeekday(result)).toBe(weekday);
        }
      }
    });

    it('puts 本周X on the right weekday 0 to 6 days ahead', () => {
      for (const from of bases) {
        for (const [glyph, weekday] of glyphs) {
          const result = resolveRelativeDate(`本周${glyph}`, from);
          const days = daysAhead(result, from);
          expect(days).toBeGreaterThanOrEqual(0);
          expect(days).toBeLessThanOrEqual(6);
          expect(result && isoWeekday(result)).toBe(weekday);
        }
      }
    });
  });
});
