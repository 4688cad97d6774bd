/**
 * Session Guard Service - Market hours for new orders and the Friday weekend
 * review of open positions.
 *
 * The review runs once per Friday from the review hour: losing positions and
 * those beyond the take-profit threshold are closed, the rest are held up to
 * the per-group and total limits, highest R first. Continuous symbols are
 * never touched. From the close hour, a daily drawdown at or above the
 * threshold flattens every non-continuous position and blocks new orders
 * until the week closes.
 */

import type { SessionConfig } from '../../config/engine.config';
import type { Position, Quote } from '../types/execution.types';
import type { SymbolSpecService } from './symbol-spec.service';
import { exitSidePrice } from './position-manager.service';
import { fridayKeyFrom, isMarketOpen } from '../utils/market-hours';
import { getComponentLogger } from '../../config/logger';

export type WeekendAction = 'HOLD' | 'CLOSE';

export type WeekendReason =
  | 'CONTINUOUS_TRADING'
  | 'LOSING'
  | 'TAKE_PROFIT'
  | 'WITHIN_LIMITS'
  | 'CORRELATION_LIMIT'
  | 'WEEKEND_LIMIT'
  | 'DAILY_DRAWDOWN';

export interface WeekendDecision {
  positionId: string;
  symbol: string;
  rMultiple: number;
  action: WeekendAction;
  reason: WeekendReason;
}

export interface WeekendReview {
  // UTC date of the Friday
  week: string;
  flatten: boolean;
  decisions: WeekendDecision[];
}

/**
 * Open R of a position at the given quote, or at its last known price.
 */
export function openRMultiple(position: Position, quote: Quote | undefined): number {
  const risk = Math.abs(position.entryPrice - position.initialStop);
  if (!(risk > 0)) return 0;

  const price = quote ? exitSidePrice(position, quote) : position.lastPrice ?? position.entryPrice;
  const sign = position.direction === 'LONG' ? 1 : -1;
  return Math.round(((sign * (price - position.entryPrice)) / risk) * 100) / 100;
}

export class SessionGuardService {
  private readonly logger = getComponentLogger('SessionGuard');
  private reviewedWeek: string | null = null;
  private flattenedWeek: string | null = null;

  constructor(
    private readonly config: SessionConfig,
    private readonly symbolSpecs: SymbolSpecService
  ) {}

  /**
   * Whether a new order for the symbol may be sent now.
   */
  marketOpen(symbol: string, now: Date): boolean {
    if (this.symbolSpecs.get(symbol).continuousTrading) {
      return true;
    }
    if (this.flattenedWeek !== null && this.flattenedWeek === fridayKeyFrom(now, 0, this.config)) {
      return false;
    }
    return !this.config.marketHoursGating || isMarketOpen(now, this.config);
  }

  /**
   * The review due at this instant, or null. A review only counts as done
   * once completeReview() is called for it.
   */
  weekendReview(
    positions: readonly Position[],
    quotes: ReadonlyMap<string, Quote>,
    now: Date,
    dailyDdPct: number
  ): WeekendReview | null {
    if (!this.config.weekendProtection) {
      return null;
    }

    const closeWeek = fridayKeyFrom(now, this.config.fridayCloseHourUtc, this.config);
    if (
      closeWeek !== null &&
      closeWeek !== this.flattenedWeek &&
      dailyDdPct >= this.config.weekendCloseDailyDdFraction
    ) {
      return { week: closeWeek, flatten: true, decisions: this.flattenDecisions(positions, quotes) };
    }

    const reviewWeek = fridayKeyFrom(now, this.config.fridayReviewHourUtc, this.config);
    if (reviewWeek === null || reviewWeek === this.reviewedWeek || reviewWeek === this.flattenedWeek) {
      return null;
    }
    return { week: reviewWeek, flatten: false, decisions: this.selectDecisions(positions, quotes) };
  }

  completeReview(review: WeekendReview): void {
    this.reviewedWeek = review.week;
    if (review.flatten) {
      this.flattenedWeek = review.week;
    }
    this.logger.info({ week: review.week, flatten: review.flatten }, 'Weekend review complete');
  }

  private flattenDecisions(positions: readonly Position[], quotes: ReadonlyMap<string, Quote>): WeekendDecision[] {
    return positions.map((position) => {
      const rMultiple = openRMultiple(position, quotes.get(position.symbol));
      return this.symbolSpecs.get(position.symbol).continuousTrading
        ? decision(position, rMultiple, 'HOLD', 'CONTINUOUS_TRADING')
        : decision(position, rMultiple, 'CLOSE', 'DAILY_DRAWDOWN');
    });
  }

  private selectDecisions(positions: readonly Position[], quotes: ReadonlyMap<string, Quote>): WeekendDecision[] {
    const decisions: WeekendDecision[] = [];
    const candidates: Array<{ position: Position; rMultiple: number }> = [];

    for (const position of positions) {
      const rMultiple = openRMultiple(position, quotes.get(position.symbol));
      if (this.symbolSpecs.get(position.symbol).continuousTrading) {
        decisions.push(decision(position, rMultiple, 'HOLD', 'CONTINUOUS_TRADING'));
      } else if (rMultiple < 0) {
        decisions.push(decision(position, rMultiple, 'CLOSE', 'LOSING'));
      } else if (rMultiple > this.config.weekendTakeProfitR) {
        decisions.push(decision(position, rMultiple, 'CLOSE', 'TAKE_PROFIT'));
      } else {
        candidates.push({ position, rMultiple });
      }
    }

    // Stable sort: equal R keeps book order
    candidates.sort((a, b) => b.rMultiple - a.rMultiple);

    const perGroup = new Map<string, number>();
    let held = 0;
    for (const { position, rMultiple } of candidates) {
      const group = this.symbolSpecs.get(position.symbol).correlationGroup ?? position.symbol;
      const inGroup = perGroup.get(group) ?? 0;

      if (inGroup >= this.config.maxPositionsPerCorrelationGroup) {
        decisions.push(decision(position, rMultiple, 'CLOSE', 'CORRELATION_LIMIT'));
      } else if (held >= this.config.maxWeekendPositions) {
        decisions.push(decision(position, rMultiple, 'CLOSE', 'WEEKEND_LIMIT'));
      } else {
        perGroup.set(group, inGroup + 1);
        held += 1;
        decisions.push(decision(position, rMultiple, 'HOLD', 'WITHIN_LIMITS'));
      }
    }

    return decisions;
  }
}

function decision(position: Position, rMultiple: number, action: WeekendAction, reason: WeekendReason): WeekendDecision {
  return { positionId: position.id, symbol: position.symbol, rMultiple, action, reason };
}
