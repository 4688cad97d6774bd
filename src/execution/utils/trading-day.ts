/**
 * Trading day helpers. The venue's day runs on server time, expressed as a
 * fixed offset from UTC in minutes.
 */

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Server-day key (YYYY-MM-DD) for an instant.
 */
export function tradingDayKey(instant: Date, utcOffsetMinutes: number): string {
  const shifted = new Date(instant.getTime() + utcOffsetMinutes * MINUTE_MS);
  return shifted.toISOString().slice(0, 10);
}

/**
 * First instant of the next server day.
 */
export function nextDayBoundary(instant: Date, utcOffsetMinutes: number): Date {
  const offsetMs = utcOffsetMinutes * MINUTE_MS;
  const shifted = instant.getTime() + offsetMs;
  const nextShiftedMidnight = Math.floor(shifted / DAY_MS) * DAY_MS + DAY_MS;
  return new Date(nextShiftedMidnight - offsetMs);
}
