/**
 * Clock Service - Injectable time source. The engine never reads Date.now() directly.
 */

import type { Clock } from '../interfaces/clock.interface';

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * Manually driven clock for tests and backtests. Time never moves backwards.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = '2024-01-01T00:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(instant: Date | string): void {
    const next = new Date(instant).getTime();
    if (next < this.current) {
      throw new Error(`ManualClock cannot move backwards (${new Date(next).toISOString()})`);
    }
    this.current = next;
  }

  advance(ms: number): Date {
    if (ms < 0) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.current += ms;
    return this.now();
  }

  advanceMinutes(minutes: number): Date {
    return this.advance(minutes * 60 * 1000);
  }

  advanceHours(hours: number): Date {
    return this.advance(hours * 60 * 60 * 1000);
  }
}
