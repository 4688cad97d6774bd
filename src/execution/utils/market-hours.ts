/**
 * Market hours of the weekly forex session, in UTC. The week opens on Sunday
 * and closes on Friday, both at a configured hour.
 */

const SUNDAY = 0;
const FRIDAY = 5;
const SATURDAY = 6;

export interface TradingWeek {
  weekOpenHourUtc: number; // 0-23, Sunday
  weekCloseHourUtc: number; // 0-23, Friday
}

export function isMarketOpen(instant: Date, week: TradingWeek): boolean {
  const day = instant.getUTCDay();
  const hour = instant.getUTCHours();

  if (day === SATURDAY) return false;
  if (day === SUNDAY) return hour >= week.weekOpenHourUtc;
  if (day === FRIDAY) return hour < week.weekCloseHourUtc;
  return true;
}

/**
 * UTC date key (YYYY-MM-DD) of the Friday an instant falls on, from the given
 * hour until the week closes. null on any other day or hour.
 */
export function fridayKeyFrom(instant: Date, fromHourUtc: number, week: TradingWeek): string | null {
  if (instant.getUTCDay() !== FRIDAY) return null;
  const hour = instant.getUTCHours();
  if (hour < fromHourUtc || hour >= week.weekCloseHourUtc) return null;
  return instant.toISOString().slice(0, 10);
}
