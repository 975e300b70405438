/**
 * Calendar helpers for the timetable. Dates are UTC calendar days formatted YYYY-MM-DD.
 */

export const DEFAULT_TIMETABLE_WINDOW_DAYS = 14;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** A real calendar day from year 1 on: "2025-02-30" and "0000-01-01" are not */
export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value) || value.startsWith('0000')) {
    return false;
  }
  const date = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && toIsoDate(date) === value;
}

export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return toIsoDate(date);
}

/** "9:05" and "09:05:00" both become "09:05:00" */
export function normalizeTime(value: string): string {
  const [hours, minutes, seconds = '00'] = value.split(':');
  return `${hours.padStart(2, '0')}:${minutes}:${seconds}`;
}
