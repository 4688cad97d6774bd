/**
 * Fill Engine Service - Sizes an entry from the balance at fill time, places
 * or accepts the fill, and opens the tracked position.
 */

import type { RiskConfig } from '../../config/engine.config';
import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type {
  Fill,
  Position,
  QueuedEntry,
  TakeProfitLevel,
} from '../types/execution.types';
import type { AccountStateService } from './account-state.service';
import type { DrawdownGuardService } from './drawdown-guard.service';
import type { EngineStateService } from './engine-state.service';
import type { PositionSizingService } from './position-sizing.service';
import type { RiskScalingService } from './risk-scaling.service';
import type { SessionGuardService } from './session-guard.service';
import type { StateStoreService } from './state-store.service';
import type { SymbolLockService } from './symbol-lock.service';
import type { SymbolSpecService } from './symbol-spec.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import { riskDistance } from './proximity-classifier.service';
import { degradedPosition } from './reconciliation.service';
import {
  NewOrderBlockedError,
  RejectedOrderError,
  RiskSanityViolationError,
  TransientExecError,
  describeError,
  type FillError,
} from '../errors/execution-errors';
import { err, ok, type Result } from '../types/result';
import { normalizeToStep, roundMoney } from '../utils/rounding';
import { randomUUID } from 'crypto';
import { getComponentLogger } from '../../config/logger';

export interface FillPlan {
  size: number;
  riskAmount: number;
  actualRisk: number;
  effectiveRiskFraction: number;
  balance: number;
}

/**
 * MARKET places a market order now; VENUE_FILL accepts a fill the venue
 * already made (a resting limit, or an order found through lookupOrder).
 */
export type FillRequest =
  | { kind: 'MARKET' }
  | { kind: 'VENUE_FILL'; fill: Fill };

export function marketClientOrderId(entryId: string): string {
  return `${entryId}:MARKET`;
}

export function limitClientOrderId(entryId: string): string {
  return `${entryId}:LIMIT`;
}

export function takeProfitLevels(entry: QueuedEntry): TakeProfitLevel[] {
  const { signal } = entry;
  const sign = signal.direction === 'LONG' ? 1 : -1;
  const r = riskDistance(signal);

  return [...signal.takeProfits]
    .sort((a, b) => a.rMultiple - b.rMultiple)
    .map((tp) => ({
      rMultiple: tp.rMultiple,
      closeFraction: tp.closeFraction,
      targetPrice: signal.entryPrice + sign * tp.rMultiple * r,
      hit: false,
    }));
}

export class FillEngineService {
  private readonly logger = getComponentLogger('FillEngine');

  constructor(
    private readonly config: RiskConfig,
    private readonly gateway: ExecutionAdapter,
    private readonly account: AccountStateService,
    private readonly state: EngineStateService,
    private readonly guard: DrawdownGuardService,
    private readonly session: SessionGuardService,
    private readonly riskScaling: RiskScalingService,
    private readonly sizing: PositionSizingService,
    private readonly symbolSpecs: SymbolSpecService,
    private readonly symbolLocks: SymbolLockService,
    private readonly store: StateStoreService,
    private readonly events: TradeEventLoggerService
  ) {}

  /**
   * Market hours, and for a limit order the pending-order cap. null when a
   * new order may be sent.
   */
  orderBlock(entry: QueuedEntry, kind: 'MARKET' | 'LIMIT', now: Date): NewOrderBlockedError | null {
    const symbol = entry.signal.symbol;
    const errorOptions = { symbol, entityId: entry.id };

    if (!this.session.marketOpen(symbol, now)) {
      return new NewOrderBlockedError('MARKET_CLOSED', `Market closed for ${symbol}`, errorOptions);
    }

    const cap = this.config.maxPendingOrders;
    if (kind === 'LIMIT' && cap !== null) {
      const pending = this.state.activeEntries().filter((active) => active.state === 'PENDING').length;
      if (pending >= cap) {
        return new NewOrderBlockedError('PENDING_ORDER_CAP', `Pending order cap reached (${pending}/${cap})`, errorOptions);
      }
    }
    return null;
  }

  /**
   * Halt check, caps, risk scaling, sizing and the sanity check, all against
   * the balance right now.
   */
  planOrder(entry: QueuedEntry): Result<FillPlan, FillError> {
    const { signal } = entry;
    const symbol = signal.symbol;
    const errorOptions = { symbol, entityId: entry.id };

    const halted = this.guard.haltReason(symbol);
    if (halted) {
      return err(halted);
    }

    const account = this.account.snapshot();
    const openPositions = this.state.openPositions();

    if (this.config.maxOpenPositions !== null && openPositions.length >= this.config.maxOpenPositions) {
      return err(new RejectedOrderError(
        `Open position cap reached (${openPositions.length}/${this.config.maxOpenPositions})`,
        'RISK_CAP',
        errorOptions
      ));
    }

    if (this.config.maxTradesPerDay !== null && account.tradesToday >= this.config.maxTradesPerDay) {
      return err(new RejectedOrderError(
        `Daily trade cap reached (${account.tradesToday}/${this.config.maxTradesPerDay})`,
        'RISK_CAP',
        errorOptions
      ));
    }

    const scaling = this.riskScaling.compute({
      quality: signal.quality,
      winStreak: account.winStreak,
      lossStreak: account.lossStreak,
      drawdownMultiplier: this.guard.riskMultiplier(),
      baseRiskFraction: this.guard.ultraSafeRiskFraction() ?? undefined,
    });

    const sized = this.sizing.calculatePositionSize({
      symbol,
      balance: account.balance,
      effectiveRiskFraction: scaling.effectiveRiskFraction,
      baseRiskFraction: scaling.baseRiskFraction,
      riskSanityMultiple: this.config.riskSanityMultiple,
      entryPrice: signal.entryPrice,
      stopPrice: signal.stopPrice,
    });

    if (sized.sanityViolation) {
      return err(new RiskSanityViolationError(sized.actualRisk, sized.allowedRisk, errorOptions));
    }
    if (!sized.isValid) {
      return err(new RejectedOrderError(sized.errors.join('; '), 'INVALID_SIZE', errorOptions));
    }

    if (this.config.portfolioRiskCapFraction !== null) {
      const openRisk = openPositions.reduce((sum, position) => sum + position.riskAmountAtFill, 0);
      const cap = account.balance * this.config.portfolioRiskCapFraction;
      if (openRisk + sized.actualRisk > cap) {
        return err(new RejectedOrderError(
          `Portfolio risk ${roundMoney(openRisk + sized.actualRisk)} exceeds cap ${roundMoney(cap)}`,
          'RISK_CAP',
          errorOptions
        ));
      }
    }

    return ok({
      size: sized.size,
      riskAmount: sized.riskAmount,
      actualRisk: sized.actualRisk,
      effectiveRiskFraction: scaling.effectiveRiskFraction,
      balance: account.balance,
    });
  }

  async fill(entry: QueuedEntry, request: FillRequest, now: Date): Promise<Result<Position, FillError>> {
    const plan = this.planOrder(entry);

    if (request.kind === 'VENUE_FILL') {
      if (!plan.success) {
        await this.refuseVenueFill(entry, request.fill, plan.error, now);
        return plan;
      }
      return ok(await this.openPosition(entry, request.fill, plan.data, now));
    }

    if (!plan.success) {
      return plan;
    }

    const blocked = this.orderBlock(entry, 'MARKET', now);
    if (blocked) {
      return err(blocked);
    }

    const symbol = entry.signal.symbol;
    const clientOrderId = marketClientOrderId(entry.id);
    entry.inFlight = { kind: 'MARKET', clientOrderId, size: plan.data.size, requestedAt: now };
    entry.updatedAt = now;
    await this.store.persist('market order in flight');

    const placed = await this.gateway.placeMarketOrder({
      symbol,
      direction: entry.signal.direction,
      size: plan.data.size,
      clientOrderId,
    });

    if (!placed.success) {
      // Unless the request provably never left, the order may exist at the venue; lookupOrder settles it next tick
      if (!(placed.error instanceof TransientExecError) || placed.error.safeToResend) {
        entry.inFlight = undefined;
      }
      this.logger.warn(
        { symbol, entryId: entry.id, ...placed.error.toLogObject() },
        'Market order not filled'
      );
      await this.store.persist('market order failed');
      return placed;
    }

    return ok(await this.openPosition(entry, placed.data, plan.data, now));
  }

  /**
   * Opens the tracked position from a venue fill. A fill larger than the
   * fill-time size is reduced at the venue first.
   */
  private async openPosition(entry: QueuedEntry, fill: Fill, plan: FillPlan, now: Date): Promise<Position> {
    const { signal } = entry;
    const symbol = signal.symbol;
    const spec = this.symbolSpecs.get(symbol);
    let size = fill.size;

    const excess = normalizeToStep(fill.size - plan.size, spec.sizeStep);
    if (excess >= spec.sizeStep) {
      const resized = await this.gateway.partialClose(fill.positionHandle, excess, `${entry.id}:RESIZE`);
      if (resized.success) {
        size = normalizeToStep(fill.size - resized.data.size, spec.sizeStep);
        const pnl = this.symbolSpecs.profitAndLoss(
          symbol,
          signal.direction,
          fill.price,
          resized.data.price,
          resized.data.size
        );
        if (pnl !== 0) {
          await this.account.bookRealized(pnl);
        }
        await this.events.record(
          'POSITION_RESIZED',
          symbol,
          entry.id,
          { size: fill.size },
          { size, closedAtPrice: resized.data.price },
          'Filled size exceeded fill-time size'
        );
      } else {
        this.logger.error(
          { symbol, entryId: entry.id, excess, ...resized.error.toLogObject() },
          'Failed to reduce oversized fill, tracking the filled size'
        );
      }
    }

    const position: Position = {
      id: randomUUID(),
      entryId: entry.id,
      symbol,
      direction: signal.direction,
      entryPrice: fill.price,
      originalSize: size,
      remainingSize: size,
      initialStop: signal.stopPrice,
      currentStop: signal.stopPrice,
      riskAmountAtFill: this.symbolSpecs.riskAmount(symbol, fill.price, signal.stopPrice, size),
      levels: takeProfitLevels(entry),
      openedAt: fill.timestamp,
      realizedPnl: 0,
      positionHandle: fill.positionHandle,
      progressiveTrailApplied: false,
      tracking: 'FULL',
    };

    const stopSet = await this.gateway.modifyStop(position.positionHandle, signal.stopPrice);
    if (!stopSet.success) {
      this.logger.error(
        { symbol, positionId: position.id, ...stopSet.error.toLogObject() },
        'Protective stop not set at venue, enforcing it locally'
      );
    }

    const before = { state: entry.state };
    entry.state = 'FILLED';
    entry.closedReason = 'FILLED';
    entry.inFlight = undefined;
    entry.updatedAt = now;
    this.state.putEntry(entry);
    this.state.putPosition(position);
    this.symbolLocks.release(symbol, entry.id);
    await this.account.incrementTradesToday();

    this.logger.info(
      {
        symbol,
        entryId: entry.id,
        positionId: position.id,
        price: fill.price,
        size,
        riskAmount: plan.riskAmount,
        effectiveRiskFraction: plan.effectiveRiskFraction,
      },
      'Position opened'
    );
    await this.events.record('ENTRY_FILLED', symbol, entry.id, before, { state: entry.state, price: fill.price });
    await this.events.record('POSITION_OPENED', symbol, position.id, null, {
      entryId: entry.id,
      direction: position.direction,
      entryPrice: position.entryPrice,
      size,
      stop: position.currentStop,
      riskAmountAtFill: position.riskAmountAtFill,
    });
    await this.store.persist('position opened');
    return position;
  }

  /**
   * The venue filled an order the engine now refuses (halt, cap, sanity):
   * the venue position is closed straight away. One that cannot be closed is
   * tracked in degraded mode, so its stop, close-all and equity still see it.
   */
  private async refuseVenueFill(entry: QueuedEntry, fill: Fill, reason: FillError, now: Date): Promise<void> {
    const { signal } = entry;
    const symbol = signal.symbol;
    this.logger.warn(
      { symbol, entryId: entry.id, positionHandle: fill.positionHandle, ...reason.toLogObject() },
      'Refusing venue fill, closing venue position'
    );

    const clientOrderId = `${entry.id}:REFUSED`;
    const closed = await this.gateway.close(fill.positionHandle, clientOrderId);
    if (closed.success) {
      const pnl = this.symbolSpecs.profitAndLoss(symbol, signal.direction, fill.price, closed.data.price, fill.size);
      if (pnl !== 0) {
        await this.account.bookRealized(pnl);
      }
      return;
    }

    if (closed.error instanceof RejectedOrderError && closed.error.code === 'POSITION_NOT_FOUND') {
      this.logger.warn({ symbol, entryId: entry.id, positionHandle: fill.positionHandle }, 'Refused venue fill already gone');
      return;
    }

    const position = degradedPosition(
      {
        positionHandle: fill.positionHandle,
        symbol,
        direction: signal.direction,
        size: fill.size,
        entryPrice: fill.price,
        stopPrice: signal.stopPrice,
        openedAt: fill.timestamp,
      },
      this.symbolSpecs.riskAmount(symbol, fill.price, signal.stopPrice, fill.size),
      entry.id
    );
    if (closed.error instanceof TransientExecError && !closed.error.safeToResend) {
      position.inFlightClose = { clientOrderId, size: fill.size, levelIndex: null, reason: 'CLOSE_ALL', requestedAt: now };
    }

    const stopSet = await this.gateway.modifyStop(fill.positionHandle, signal.stopPrice);
    if (!stopSet.success) {
      this.logger.error(
        { symbol, positionId: position.id, ...stopSet.error.toLogObject() },
        'Protective stop not set on refused fill, enforcing it locally'
      );
    }
    this.state.putPosition(position);

    this.logger.error(
      { symbol, entryId: entry.id, positionId: position.id, error: describeError(closed.error) },
      'Failed to close refused venue fill, tracking it degraded'
    );
    await this.events.record(
      'POSITION_ADOPTED',
      symbol,
      position.id,
      null,
      {
        positionHandle: position.positionHandle,
        direction: position.direction,
        size: position.remainingSize,
        entryPrice: position.entryPrice,
        stop: position.currentStop,
        tracking: 'DEGRADED',
        adoptedAt: now.toISOString(),
      },
      'Refused fill could not be closed'
    );
    await this.store.persist('refused fill tracked');
  }
}
