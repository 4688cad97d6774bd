/**
 * Drawdown Guard Service - Total and daily drawdown tiers, daily rollover and
 * the close-all command.
 *
 * Total drawdown is measured against the immutable initial balance, daily
 * drawdown against the baseline taken at the last rollover. Both are rounded
 * to a basis point and compared with >=.
 */

import type { DrawdownConfig } from '../../config/engine.config';
import type {
  AccountState,
  DailyDrawdownTier,
  GuardDecision,
  GuardState,
  TotalDrawdownTier,
} from '../types/execution.types';
import type { AccountStateService } from './account-state.service';
import type { EngineStateService } from './engine-state.service';
import type { StateStoreService } from './state-store.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import { DrawdownHaltedError } from '../errors/execution-errors';
import { nextDayBoundary, tradingDayKey } from '../utils/trading-day';
import { roundToBasisPoint } from '../utils/rounding';
import { getComponentLogger } from '../../config/logger';

export type CloseAllReason = 'STOP_OUT' | 'EMERGENCY' | 'DAILY_HALT';

interface RolloverChange {
  day: string;
  previousDay: string | null;
  previousBaseline: number;
  baseline: number;
}

interface Evaluation {
  totalDdPct: number;
  dailyDdPct: number;
  guard: GuardState;
  rollover: RolloverChange | null;
  tradingAllowed: boolean;
  equity: number;
}

export function drawdownFraction(reference: number, equity: number): number {
  if (!(reference > 0)) {
    return 0;
  }
  return roundToBasisPoint(Math.max(0, (reference - equity) / reference));
}

export class DrawdownGuardService {
  private readonly logger = getComponentLogger('DrawdownGuard');

  constructor(
    private readonly config: DrawdownConfig,
    private readonly account: AccountStateService,
    private readonly state: EngineStateService,
    private readonly store: StateStoreService,
    private readonly events: TradeEventLoggerService
  ) {}

  classifyTotal(totalDdPct: number): TotalDrawdownTier {
    if (totalDdPct >= this.config.totalStopOut) return 'STOP_OUT';
    if (totalDdPct >= this.config.totalEmergency) return 'EMERGENCY';
    if (totalDdPct >= this.config.totalWarning) return 'WARNING';
    return 'NORMAL';
  }

  classifyDaily(dailyDdPct: number): DailyDrawdownTier {
    if (dailyDdPct >= this.config.dailyHalt) return 'HALT';
    if (dailyDdPct >= this.config.dailyReduce) return 'REDUCE';
    if (dailyDdPct >= this.config.dailyWarning) return 'WARNING';
    return 'NORMAL';
  }

  /**
   * Risk multiplier of the current tiers, before the risk scaler clamps it.
   */
  riskMultiplier(guard: GuardState = this.state.guardState): number {
    let total = 1;
    if (guard.totalTier === 'WARNING') total = this.config.totalWarningRiskMultiplier;
    if (guard.totalTier === 'EMERGENCY') total = this.config.totalEmergencyRiskMultiplier;

    const daily =
      guard.dailyTier === 'REDUCE' || guard.dailyTier === 'HALT' ? this.config.dailyReduceRiskMultiplier : 1;

    return total * daily;
  }

  /**
   * Lower base risk fraction once the balance has reached the ultra-safe
   * profit threshold with both tiers NORMAL. null keeps the configured base.
   */
  ultraSafeRiskFraction(guard: GuardState = this.state.guardState): number | null {
    const threshold = this.config.ultraSafeProfitFraction;
    if (threshold === null || guard.totalTier !== 'NORMAL' || guard.dailyTier !== 'NORMAL') {
      return null;
    }

    const { balance, initialBalance } = this.account.snapshot();
    const profit = roundToBasisPoint((balance - initialBalance) / initialBalance);
    return profit >= threshold ? this.config.ultraSafeRiskFraction : null;
  }

  /**
   * Blocking state consulted before any new fill. null when fills are allowed.
   */
  haltReason(symbol: string | null = null): DrawdownHaltedError | null {
    const account = this.account.snapshot();
    if (account.stoppedOut) {
      return new DrawdownHaltedError('STOP_OUT', { symbol });
    }
    if (account.haltedUntil !== null) {
      return new DrawdownHaltedError('DAILY_HALT', { symbol });
    }
    return null;
  }

  async evaluate(now: Date): Promise<GuardDecision> {
    const previous = this.state.guardState;
    const evaluation = await this.account.transaction((account) => this.applyEvaluation(account, now));
    const { guard, rollover } = evaluation;
    this.state.setGuardState(guard);

    if (rollover) {
      this.logger.info(rollover, 'Trading day rollover');
      await this.events.record(
        'DAY_ROLLOVER',
        null,
        null,
        { day: rollover.previousDay, dayStartBaseline: rollover.previousBaseline },
        { day: rollover.day, dayStartBaseline: rollover.baseline }
      );
    }

    const totalChanged = guard.totalTier !== previous.totalTier;
    const dailyChanged = guard.dailyTier !== previous.dailyTier;
    if (totalChanged) {
      await this.recordTierChange('total', previous.totalTier, guard.totalTier, evaluation.totalDdPct, evaluation.equity);
    }
    if (dailyChanged) {
      await this.recordTierChange('daily', previous.dailyTier, guard.dailyTier, evaluation.dailyDdPct, evaluation.equity);
    }

    const closeAllReason = this.closeAllReason(previous, guard);
    if (closeAllReason) {
      this.logger.error(
        { reason: closeAllReason, openPositions: this.state.openPositions().length, ...guard },
        'Drawdown guard issued close-all'
      );
    }

    if (rollover || totalChanged || dailyChanged) {
      await this.store.persist('drawdown guard state changed');
    }

    return {
      snapshot: { ...guard, totalDdPct: evaluation.totalDdPct, dailyDdPct: evaluation.dailyDdPct },
      closeAll: closeAllReason !== null,
      closeAllReason: closeAllReason ?? undefined,
      tradingAllowed: evaluation.tradingAllowed,
      riskMultiplier: this.riskMultiplier(guard),
      rolledOver: rollover !== null,
    };
  }

  private applyEvaluation(account: AccountState, now: Date): Evaluation {
    const offset = this.config.dayBoundaryUtcOffsetMinutes;
    let rollover: RolloverChange | null = null;

    const day = tradingDayKey(now, offset);
    if (account.lastRolloverDay !== day) {
      rollover = {
        day,
        previousDay: account.lastRolloverDay,
        previousBaseline: account.dayStartBaseline,
        baseline: Math.max(account.balance, account.equity),
      };
      account.dayStartBaseline = rollover.baseline;
      account.lastRolloverDay = day;
      account.haltedUntil = null;
      account.tradesToday = 0;
    }

    const totalDdPct = drawdownFraction(account.initialBalance, account.equity);
    const dailyDdPct = drawdownFraction(account.dayStartBaseline, account.equity);

    const totalTier = account.stoppedOut ? 'STOP_OUT' : this.classifyTotal(totalDdPct);
    if (totalTier === 'STOP_OUT') {
      account.stoppedOut = true;
    }

    let dailyTier = this.classifyDaily(dailyDdPct);
    // Halt holds until the next rollover
    if (account.haltedUntil !== null) {
      dailyTier = 'HALT';
    } else if (dailyTier === 'HALT') {
      account.haltedUntil = nextDayBoundary(now, offset);
    }

    return {
      totalDdPct,
      dailyDdPct,
      guard: { totalTier, dailyTier },
      rollover,
      tradingAllowed: !account.stoppedOut && account.haltedUntil === null,
      equity: account.equity,
    };
  }

  private closeAllReason(previous: GuardState, current: GuardState): CloseAllReason | null {
    const hasOpenPositions = this.state.openPositions().length > 0;

    if (current.totalTier === 'STOP_OUT' && (previous.totalTier !== 'STOP_OUT' || hasOpenPositions)) {
      return 'STOP_OUT';
    }
    if (current.dailyTier === 'HALT' && (previous.dailyTier !== 'HALT' || hasOpenPositions)) {
      return 'DAILY_HALT';
    }
    // Emergency liquidates once on entry; trading then resumes at reduced risk
    if (current.totalTier === 'EMERGENCY' && previous.totalTier !== 'EMERGENCY' && previous.totalTier !== 'STOP_OUT') {
      return 'EMERGENCY';
    }
    return null;
  }

  private async recordTierChange(
    kind: 'total' | 'daily',
    from: string,
    to: string,
    ddPct: number,
    equity: number
  ): Promise<void> {
    const context = { kind, from, to, ddPct, equity };
    if (to === 'NORMAL') {
      this.logger.info(context, 'Drawdown tier recovered');
    } else if (to === 'WARNING') {
      this.logger.warn(context, 'Drawdown warning tier reached');
    } else {
      this.logger.error(context, 'Drawdown tier escalated');
    }

    await this.events.record(
      'TIER_CHANGED',
      null,
      kind,
      { tier: from },
      { tier: to, ddPct, equity },
      `${kind} drawdown ${from} -> ${to}`
    );
  }
}
