import { describe, it, expect } from 'vitest';
import { cnToInt } from './numerals.js';

describe('cnToInt', () => {
  it('parses ASCII digits', () => {
    expect(cnToInt('15')).toBe(15);
    expect(cnToInt('0')).toBe(0);
  });

  it('parses single glyphs', () => {
    expect(cnToInt('三')).toBe(3);
    expect(cnToInt('两')).toBe(2);
    expect(cnToInt('十')).toBe(10);
    expect(cnToInt('零')).toBe(0);
  });

  it('parses formal variants', () => {
    expect(cnToInt('叁')).toBe(3);
    expect(cnToInt('拾')).toBe(10);
    expect(cnToInt('贰拾伍')).toBe(25);
  });

  it('parses tens compounds', () => {
    expect(cnToInt('十五')).toBe(15);
    expect(cnToInt('二十')).toBe(20);
    expect(cnToInt('二十三')).toBe(23);
    expect(cnToInt('九十九')).toBe(99);
  });

  it('parses hundreds compounds', () => {
    expect(cnToInt('百')).toBe(100);
    expect(cnToInt('三百')).toBe(300);
    expect(cnToInt('一百零五')).toBe(105);
    expect(cnToInt('一百二十')).toBe(120);
  });

  it('reads digit runs positionally', () => {
    expect(cnToInt('二三')).toBe(23);
  });

  it('returns null for non-numerals', () => {
    expect(cnToInt('')).toBeNull();
    expect(cnToInt('abc')).toBeNull();
    expect(cnToInt('十十')).toBeNull();
    expect(cnToInt('三十百')).toBeNull();
  });

  it('returns null for multi-glyph zero', () => {
    expect(cnToInt('零零')).toBeNull();
  });
});
