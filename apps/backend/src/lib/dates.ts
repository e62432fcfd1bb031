const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * UTC calendar day of an instant, `YYYY-MM-DD`.
 */
export function toDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Midnight UTC at the start of a day key.
 *
 * @throws Error when the key is not `YYYY-MM-DD`
 */
export function dayStart(dayKey: string): Date {
  if (!isDayKey(dayKey)) {
    throw new Error(`Invalid day key: ${dayKey}`);
  }
  return new Date(`${dayKey}T00:00:00.000Z`);
}

export function addDays(dayKey: string, days: number): string {
  return toDayKey(new Date(dayStart(dayKey).getTime() + days * DAY_MS));
}

/**
 * Inclusive list of day keys from `from` to `to`; empty when `from` is after `to`.
 */
export function daysBetween(from: string, to: string): string[] {
  const days: string[] = [];
  for (let day = from; day <= to; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * True for a `YYYY-MM-DD` key naming a real calendar day (`2026-02-30` is not).
 */
export function isDayKey(value: string): boolean {
  if (!DAY_KEY_PATTERN.test(value)) {
    return false;
  }
  const start = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(start.getTime()) && toDayKey(start) === value;
}

export { DAY_MS };
