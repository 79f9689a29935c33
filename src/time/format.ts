/**
 * Display formatting for deadlines and reminder times
 */

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const NOT_SET = '未设置';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format as "YYYY-MM-DD HH:MM" in local time
 */
export function formatAbsolute(date: Date | null | undefined): string {
  if (!date) return NOT_SET;
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

/**
 * Format relative to now (e.g., "2小时后到期", "已逾期3天")
 */
export function formatRelative(date: Date | null | undefined, now: Date = new Date()): string {
  if (!date) return '';

  const diffMs = date.getTime() - now.getTime();
  const absMs = Math.abs(diffMs);
  const days = Math.floor(absMs / DAY_MS);
  const hours = Math.floor((absMs % DAY_MS) / HOUR_MS);

  if (diffMs <= 0) {
    if (days > 0) return `已逾期${days}天`;
    if (hours > 0) return `已逾期${hours}小时`;
    return '刚刚逾期';
  }

  if (days > 0) return `${days}天后到期`;
  if (hours > 0) return `${hours}小时后到期`;
  return `${Math.floor(absMs / MINUTE_MS)}分钟后到期`;
}
