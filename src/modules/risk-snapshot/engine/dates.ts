/**
 * Calendar helpers over YYYY-MM-DD strings (UTC, no time component).
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

export function toIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function parse(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

export function addDays(date: string, days: number): string {
  return toIsoDate(new Date(parse(date).getTime() + days * DAY_MS));
}

/**
 * Shift by whole calendar months, clamping to the last day of the target
 * month (2024-03-31 minus one month is 2024-02-29).
 */
export function addMonths(date: string, months: number): string {
  const d = parse(date);
  const year = d.getUTCFullYear();
  const month = d.getUTCMonth() + months;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(d.getUTCDate(), lastDay);
  return toIsoDate(new Date(Date.UTC(year, month, day)));
}

/** Every calendar day from start to end, inclusive */
export function eachDay(start: string, end: string): string[] {
  const days: string[] = [];
  for (let t = parse(start).getTime(), last = parse(end).getTime(); t <= last; t += DAY_MS) {
    days.push(toIsoDate(new Date(t)));
  }
  return days;
}
