/**
 * Calendar helpers
 * Local wall-clock arithmetic on Date values; every helper returns a new Date
 */

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3_600_000);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

/**
 * Replace hour and minute, zeroing seconds and milliseconds
 */
export function withTimeOfDay(date: Date, time: TimeOfDay): Date {
  const result = new Date(date);
  result.setHours(time.hour, time.minute, 0, 0);
  return result;
}

/**
 * Weekday with Monday = 0 ... Sunday = 6
 */
export function isoWeekday(date: Date): number {
  return (date.getDay() + 6) % 7;
}

export function isValidTimeOfDay(time: TimeOfDay): boolean {
  return time.hour >= 0 && time.hour <= 23 && time.minute >= 0 && time.minute <= 59;
}

/**
 * Build a local date, or null when the fields do not name a real calendar day
 * (month 13, February 30, ...)
 */
export function makeLocalDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(year, month - 1, day, hour, minute, second, 0);
  // Date rolls overflowing days into the next month
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}
