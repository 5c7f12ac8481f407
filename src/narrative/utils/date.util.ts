export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

export function toTime(iso: string): number {
  return new Date(iso).getTime();
}

export function hoursBetween(fromIso: string, now: Date): number {
  return (now.getTime() - toTime(fromIso)) / HOUR_MS;
}

export function daysBetween(fromIso: string, now: Date): number {
  return (now.getTime() - toTime(fromIso)) / DAY_MS;
}

export function shiftDays(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function minIso(values: string[]): string {
  return values.reduce((min, value) =>
    toTime(value) < toTime(min) ? value : min,
  );
}

export function maxIso(values: string[]): string {
  return values.reduce((max, value) =>
    toTime(value) > toTime(max) ? value : max,
  );
}

export function formatDateYYYYMMDD(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function endOfUtcDay(dateKey: string): Date {
  return new Date(`${dateKey}T23:59:59.999Z`);
}
