/**
 * Chinese numeral conversion
 * Handles digits, single glyphs (including formal 大写 variants), 十-compounds
 * for 10-99 and 百-compounds for the "N天后" form
 */

const CN_DIGITS: ReadonlyMap<string, number> = new Map([
  ['零', 0], ['〇', 0],
  ['一', 1], ['壹', 1],
  ['二', 2], ['两', 2], ['贰', 2],
  ['三', 3], ['叁', 3],
  ['四', 4], ['肆', 4],
  ['五', 5], ['伍', 5],
  ['六', 6], ['陆', 6],
  ['七', 7], ['柒', 7],
  ['八', 8], ['捌', 8],
  ['九', 9], ['玖', 9],
  ['十', 10], ['拾', 10],
]);

const HUNDRED = '百';

function digitOf(ch: string): number | null {
  const value = CN_DIGITS.get(ch);
  return value !== undefined && value < 10 ? value : null;
}

function convertTens(token: string): number | null {
  const sep = token.includes('十') ? '十' : '拾';
  const parts = token.split(sep);
  if (parts.length !== 2) return null;

  const [before, after] = parts;
  const tens = before ? digitOf(before) : 1;
  const ones = after ? digitOf(after) : 0;
  if (tens === null || ones === null) return null;

  return tens * 10 + ones;
}

function convertHundreds(token: string): number | null {
  const parts = token.split(HUNDRED);
  if (parts.length !== 2) return null;

  const [before, after] = parts;
  const hundreds = before ? digitOf(before) : 1;
  if (hundreds === null) return null;
  if (!after) return hundreds * 100;

  // 一百零五
  const rest = after.startsWith('零') || after.startsWith('〇') ? after.slice(1) : after;
  const remainder = rest ? cnToInt(rest) : 0;
  if (remainder === null || remainder > 99) return null;

  return hundreds * 100 + remainder;
}

function accumulateDigits(token: string): number | null {
  let result = 0;
  for (const ch of token) {
    const digit = digitOf(ch);
    if (digit === null) return null;
    result = result * 10 + digit;
  }
  return result;
}

/**
 * Convert a numeral token ("15", "三", "二十三", "两", "一百零五") to an integer.
 * Returns null when the token is not a numeral.
 */
export function cnToInt(token: string): number | null {
  if (!token) return null;

  if (/^\d+$/.test(token)) {
    return parseInt(token, 10);
  }

  const single = CN_DIGITS.get(token);
  if (single !== undefined) return single;

  let result: number | null;
  if (token.includes(HUNDRED)) {
    result = convertHundreds(token);
  } else if (token.includes('十') || token.includes('拾')) {
    result = convertTens(token);
  } else {
    result = accumulateDigits(token);
  }

  return result !== null && result > 0 ? result : null;
}
