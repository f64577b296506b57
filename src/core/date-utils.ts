/**
 * Date helpers shared by the backend mapper, the pickers and the detail view.
 */

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Get start of day (00:00:00, local time)
 */
export function startOfDay(date: Date): Date {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
}

/**
 * Days in a month; `month` is 1-based.
 */
export function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

/**
 * Format a Date to YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * Parse a date string in YYYY-MM-DD format (local midnight).
 */
export function parseDate(dateStr: string): Date | null {
  const match = dateStr.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  // Validate the date is real (e.g., not Feb 30)
  if (date.getFullYear() !== Number(year) || date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    return null;
  }
  return date;
}

/**
 * Parse the backend's compact UTC timestamp (`20251016T120000Z`).
 */
export function parseTaskwarriorDate(value: string): Date | null {
  const match = value.match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/);
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  const date = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Whole calendar days from `now` to `date` (negative when in the past).
 */
export function daysBetween(now: Date, date: Date): number {
  const ms = startOfDay(date).getTime() - startOfDay(now).getTime();
  return Math.round(ms / 86_400_000);
}

export function formatRelative(date: Date, now: Date): string {
  const days = daysBetween(now, date);
  if (days === 0) return 'today';
  if (days === 1) return 'tomorrow';
  if (days === -1) return 'yesterday';
  if (days > 0) return days < 14 ? `in ${days}d` : `in ${Math.round(days / 7)}w`;
  const ago = -days;
  return ago < 14 ? `${ago}d ago` : `${Math.round(ago / 7)}w ago`;
}
