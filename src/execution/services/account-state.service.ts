/**
 * Account State Service - The single serialization point for balance, equity
 * and drawdown baselines. All writers go through transaction().
 */

import type { AccountState } from '../types/execution.types';
import { tradingDayKey } from '../utils/trading-day';
import { roundMoney } from '../utils/rounding';

export function createInitialAccountState(
  initialBalance: number,
  now: Date,
  dayBoundaryUtcOffsetMinutes: number
): AccountState {
  return {
    initialBalance,
    balance: initialBalance,
    equity: initialBalance,
    peakEquity: initialBalance,
    dayStartBaseline: initialBalance,
    lastRolloverDay: tradingDayKey(now, dayBoundaryUtcOffsetMinutes),
    haltedUntil: null,
    stoppedOut: false,
    winStreak: 0,
    lossStreak: 0,
    tradesToday: 0,
  };
}

function copyState(state: AccountState): AccountState {
  return {
    ...state,
    haltedUntil: state.haltedUntil ? new Date(state.haltedUntil.getTime()) : null,
  };
}

export class AccountStateService {
  private state: AccountState;
  private lock: Promise<void> = Promise.resolve();

  constructor(initial: AccountState) {
    this.state = copyState(initial);
  }

  /**
   * Copy of the current state. Mutating it has no effect.
   */
  snapshot(): AccountState {
    return copyState(this.state);
  }

  get balance(): number {
    return this.state.balance;
  }

  get equity(): number {
    return this.state.equity;
  }

  async transaction<T>(work: (state: AccountState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await work(this.state);
    } finally {
      release();
    }
  }

  /**
   * Books realized P&L into balance. Equity moves with it so the next mark starts from a consistent base.
   */
  bookRealized(pnl: number): Promise<AccountState> {
    return this.transaction((state) => {
      state.balance = roundMoney(state.balance + pnl);
      state.equity = roundMoney(state.equity + pnl);
      state.peakEquity = Math.max(state.peakEquity, state.equity);
      return copyState(state);
    });
  }

  markEquity(floatingPnl: number): Promise<AccountState> {
    return this.transaction((state) => {
      state.equity = roundMoney(state.balance + floatingPnl);
      state.peakEquity = Math.max(state.peakEquity, state.equity);
      return copyState(state);
    });
  }

  recordTradeResult(pnl: number): Promise<void> {
    return this.transaction((state) => {
      if (pnl > 0) {
        state.winStreak += 1;
        state.lossStreak = 0;
      } else if (pnl < 0) {
        state.lossStreak += 1;
        state.winStreak = 0;
      }
    });
  }

  incrementTradesToday(): Promise<void> {
    return this.transaction((state) => {
      state.tradesToday += 1;
    });
  }

  restore(state: AccountState): Promise<void> {
    return this.transaction(() => {
      this.state = copyState(state);
    });
  }
}
