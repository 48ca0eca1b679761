const DAY_MS = 24 * 60 * 60 * 1000;

export function toISO(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

// YYYY-MM-DD as local midnight
export function fromISO(iso: string): Date {
  const [y, m, d] = iso.split('-').map(Number);
  return new Date(y, m - 1, d);
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const d = new Date(date);
  d.setDate(d.getDate() + days);
  return d;
}

export function isSameDay(a: Date, b: Date): boolean {
  return toISO(a) === toISO(b);
}

// Whole calendar days from `a` to `b` (negative when `b` is earlier)
export function dayDiff(a: Date, b: Date): number {
  return Math.round((startOfDay(b).getTime() - startOfDay(a).getTime()) / DAY_MS);
}

// Elapsed 24 h periods between two instants, ignoring the calendar
export function wholeDaysBetween(a: Date, b: Date): number {
  return Math.floor(Math.abs(b.getTime() - a.getTime()) / DAY_MS);
}

// Hour and minute only; seconds are ignored
export function isLocalMidnight(date: Date): boolean {
  return date.getHours() === 0 && date.getMinutes() === 0;
}

export function eachDay(start: Date, end: Date): string[] {
  const res: string[] = [];
  const last = startOfDay(end);
  for (let d = startOfDay(start); d <= last; d = addDays(d, 1)) {
    res.push(toISO(d));
  }
  return res;
}
