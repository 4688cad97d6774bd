/**
 * Position Manager Service - Tracks open positions through their take-profit
 * ladder, ratchets the stop and closes them out.
 *
 * Per bar the stop is checked first, then unmet levels in ascending order.
 * Partial profit is booked into the balance when the level is taken.
 */

import type { ExitConfig } from '../../config/engine.config';
import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type {
  ClosedTradeRecord,
  ExitReason,
  Fill,
  Position,
  Quote,
} from '../types/execution.types';
import type { AccountStateService } from './account-state.service';
import type { EngineStateService } from './engine-state.service';
import type { StateStoreService } from './state-store.service';
import type { SymbolLockService } from './symbol-lock.service';
import type { SymbolSpecService } from './symbol-spec.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import {
  RejectedOrderError,
  TransientExecError,
  type ExecError,
} from '../errors/execution-errors';
import { defaultSleep, type Sleep } from '../utils/retry';
import { normalizeToStep, roundMoney, roundToStep } from '../utils/rounding';
import { getComponentLogger, logError } from '../../config/logger';

export interface PositionUpdate {
  closed: boolean;
  exitReason?: ExitReason;
  levelsHit: number[];
  stopMoved: boolean;
}

export interface CloseAllResult {
  closed: number;
  failed: number;
}

type CloseOutcome = 'CLOSED' | 'PENDING' | 'FAILED';

function directionSign(position: Position): number {
  return position.direction === 'LONG' ? 1 : -1;
}

/**
 * Price a position would exit at: bid for longs, ask for shorts.
 */
export function exitSidePrice(position: Position, quote: Quote): number {
  return position.direction === 'LONG' ? quote.bid : quote.ask;
}

export function isTighterStop(position: Position, candidate: number): boolean {
  if (position.currentStop === null) {
    return true;
  }
  return position.direction === 'LONG' ? candidate > position.currentStop : candidate < position.currentStop;
}

export class PositionManagerService {
  private readonly logger = getComponentLogger('PositionManager');

  constructor(
    private readonly config: ExitConfig,
    private readonly gateway: ExecutionAdapter,
    private readonly account: AccountStateService,
    private readonly state: EngineStateService,
    private readonly symbolSpecs: SymbolSpecService,
    private readonly symbolLocks: SymbolLockService,
    private readonly store: StateStoreService,
    private readonly events: TradeEventLoggerService,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Unrealized P&L of every open position at the given quotes. Positions
   * without a quote are carried at their last known price.
   */
  floatingPnl(quotes: ReadonlyMap<string, Quote>): number {
    return roundMoney(
      this.state.openPositions().reduce((sum, position) => {
        const quote = quotes.get(position.symbol);
        const price = quote ? exitSidePrice(position, quote) : position.lastPrice;
        if (price === undefined) {
          return sum;
        }
        return sum + this.symbolSpecs.profitAndLoss(
          position.symbol,
          position.direction,
          position.entryPrice,
          price,
          position.remainingSize
        );
      }, 0)
    );
  }

  async updateAll(quotes: ReadonlyMap<string, Quote>, now: Date): Promise<void> {
    for (const position of this.state.openPositions()) {
      const quote = quotes.get(position.symbol);
      if (!quote) continue;

      try {
        await this.symbolLocks.runExclusive(position.symbol, async () => {
          position.lastPrice = exitSidePrice(position, quote);
          await this.onPriceUpdate(position, quote.high, quote.low, now);
        });
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        logError(error, { symbol: position.symbol, entityId: position.id, operation: 'onPriceUpdate' });
      }
    }
  }

  async onPriceUpdate(position: Position, high: number, low: number, now: Date): Promise<PositionUpdate> {
    const update: PositionUpdate = { closed: false, levelsHit: [], stopMoved: false };

    if (position.inFlightClose) {
      const settled = await this.resolveInFlightClose(position, now);
      if (!settled || !this.state.getPosition(position.id)) {
        return { ...update, closed: !this.state.getPosition(position.id) };
      }
    }

    if (position.currentStop !== null && this.crossed(position, position.currentStop, high, low, 'STOP')) {
      const outcome = await this.closePosition(position, 'STOP', position.currentStop, now);
      return { ...update, closed: outcome === 'CLOSED', exitReason: outcome === 'CLOSED' ? 'STOP' : undefined };
    }

    // Degraded positions carry no ladder; only the stop is enforced
    if (position.tracking === 'DEGRADED') {
      return update;
    }

    for (let index = 0; index < position.levels.length; index++) {
      const level = position.levels[index];
      if (!level || level.hit) continue;
      if (!this.crossed(position, level.targetPrice, high, low, 'TARGET')) break;

      const spec = this.symbolSpecs.get(position.symbol);
      const closeSize = Math.min(
        roundToStep(level.closeFraction * position.originalSize, spec.sizeStep),
        position.remainingSize
      );
      const remainingAfter = normalizeToStep(position.remainingSize - closeSize, spec.sizeStep);
      const isFinal = index === position.levels.length - 1 || remainingAfter <= 0;

      if (isFinal) {
        level.hit = true;
        const outcome = await this.closePosition(position, 'FINAL_TARGET', level.targetPrice, now);
        if (outcome === 'FAILED') {
          level.hit = false;
          return update;
        }
        update.levelsHit.push(index);
        return { ...update, closed: outcome === 'CLOSED', exitReason: outcome === 'CLOSED' ? 'FINAL_TARGET' : undefined };
      }

      const taken = await this.takeLevel(position, index, closeSize, now);
      if (!taken) {
        // Gone at the venue: finalized as an external close
        return this.state.getPosition(position.id) ? update : { ...update, closed: true, exitReason: 'EXTERNAL' };
      }
      update.levelsHit.push(index);
      update.stopMoved = (await this.ratchetAfterLevel(position, index, now)) || update.stopMoved;
    }

    if (await this.applyProgressiveTrail(position, high, low, now)) {
      update.stopMoved = true;
    }

    return update;
  }

  /**
   * Closes every open position. Positions whose close failed stay open and
   * are retried on the next call.
   */
  async closeAll(reason: string, now: Date): Promise<CloseAllResult> {
    const positions = this.state.openPositions();

    this.logger.warn({ reason, positions: positions.length }, 'Closing all positions');
    await this.events.record('CLOSE_ALL', null, null, { openPositions: positions.length }, null, reason);

    const result = await this.closeEach(positions, 'CLOSE_ALL', now);
    if (result.failed > 0) {
      this.logger.error({ reason, ...result }, 'Close-all incomplete, retrying next tick');
    }
    return result;
  }

  /**
   * Closes the given positions that are still open.
   */
  async closePositions(positionIds: readonly string[], reason: ExitReason, now: Date): Promise<CloseAllResult> {
    const positions = positionIds.flatMap((id) => {
      const position = this.state.getPosition(id);
      return position ? [position] : [];
    });
    return this.closeEach(positions, reason, now);
  }

  private async closeEach(positions: Position[], reason: ExitReason, now: Date): Promise<CloseAllResult> {
    let closed = 0;
    let failed = 0;

    for (const position of positions) {
      const outcome = await this.symbolLocks.runExclusive(position.symbol, () =>
        this.closePosition(position, reason, null, now)
      );
      if (outcome === 'CLOSED') {
        closed += 1;
      } else {
        failed += 1;
      }
    }
    return { closed, failed };
  }

  private crossed(position: Position, price: number, high: number, low: number, kind: 'STOP' | 'TARGET'): boolean {
    const long = position.direction === 'LONG';
    if (kind === 'STOP') {
      return long ? low <= price : high >= price;
    }
    return long ? high >= price : low <= price;
  }

  /**
   * Partial close for one level. A request that never reached the venue is
   * sent again with a linear backoff once the gateway's own retries are spent;
   * a rejection ends the attempt. Either way the level stays unmarked.
   */
  private async takeLevel(position: Position, index: number, size: number, now: Date): Promise<boolean> {
    if (!(size > 0)) {
      // Fraction too small for the size step: nothing to close, the level still counts
      this.markLevelTaken(position, index);
      return true;
    }

    const attempts = this.config.partialCloseAttempts;
    let lastError: ExecError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const clientOrderId = `${position.id}:TP${index + 1}:${attempt}`;
      const result = await this.gateway.partialClose(position.positionHandle, size, clientOrderId);

      if (result.success) {
        await this.applyPartialClose(position, index, size, result.data, now);
        return true;
      }

      lastError = result.error;
      if (result.error instanceof RejectedOrderError && result.error.code === 'POSITION_NOT_FOUND') {
        await this.finalizeExternal(position, now);
        return false;
      }
      if (!(result.error instanceof TransientExecError)) {
        break;
      }
      if (!result.error.safeToResend) {
        position.inFlightClose = { clientOrderId, size, levelIndex: index, requestedAt: now };
        await this.store.persist('partial close in flight');
        return false;
      }

      if (attempt < attempts) {
        this.logger.warn(
          { symbol: position.symbol, positionId: position.id, level: index + 1, attempt, error: result.error.message },
          'Partial close failed, retrying'
        );
        await this.sleep(this.config.partialCloseBaseDelayMs * attempt);
      }
    }

    this.logger.error(
      { symbol: position.symbol, positionId: position.id, level: index + 1, error: lastError?.message },
      'Partial close failed, level left for the next tick'
    );
    return false;
  }

  private markLevelTaken(position: Position, index: number): void {
    const level = position.levels[index];
    if (level) {
      level.hit = true;
    }
  }

  private async applyPartialClose(position: Position, index: number, size: number, fill: Fill, now: Date): Promise<void> {
    const level = position.levels[index];
    if (!level) return;

    const spec = this.symbolSpecs.get(position.symbol);
    const before = { remainingSize: position.remainingSize, realizedPnl: position.realizedPnl };
    const pnl = this.symbolSpecs.profitAndLoss(position.symbol, position.direction, position.entryPrice, level.targetPrice, size);

    level.hit = true;
    position.remainingSize = normalizeToStep(position.remainingSize - size, spec.sizeStep);
    position.realizedPnl = roundMoney(position.realizedPnl + pnl);
    position.inFlightClose = undefined;
    await this.account.bookRealized(pnl);

    this.logger.info(
      { symbol: position.symbol, positionId: position.id, level: index + 1, size, pnl, venuePrice: fill.price },
      'Take-profit level taken'
    );
    await this.events.record('PARTIAL_CLOSE', position.symbol, position.id, before, {
      remainingSize: position.remainingSize,
      realizedPnl: position.realizedPnl,
      level: index + 1,
      size,
      price: level.targetPrice,
      venuePrice: fill.price,
    });
    await this.store.persist('partial close');
  }

  /**
   * Level 1 moves the stop to breakeven, level n to the target of level n-1
   * plus the trail buffer.
   */
  private async ratchetAfterLevel(position: Position, index: number, now: Date): Promise<boolean> {
    let candidate = position.entryPrice;
    const previous = index > 0 ? position.levels[index - 1] : undefined;
    if (previous && position.initialStop !== null) {
      const r = Math.abs(position.entryPrice - position.initialStop);
      candidate = previous.targetPrice + directionSign(position) * this.config.trailBufferR * r;
    }
    return this.tightenStop(position, candidate, `level ${index + 1}`, now);
  }

  private async applyProgressiveTrail(position: Position, high: number, low: number, now: Date): Promise<boolean> {
    const trigger = this.config.progressiveTrailTriggerR;
    const [first, second] = position.levels;
    if (trigger === null || position.progressiveTrailApplied || position.initialStop === null) {
      return false;
    }
    if (!first?.hit || !second || second.hit) {
      return false;
    }

    const r = Math.abs(position.entryPrice - position.initialStop);
    const excursion = position.direction === 'LONG' ? high - position.entryPrice : position.entryPrice - low;
    if (!(r > 0) || excursion / r < trigger) {
      return false;
    }

    position.progressiveTrailApplied = true;
    const moved = await this.tightenStop(position, first.targetPrice, 'progressive trail', now);
    if (!moved) {
      await this.store.persist('progressive trail checked');
    }
    return moved;
  }

  /**
   * Moves the stop only when the candidate is tighter. The local stop is
   * authoritative; a failed venue update is logged and enforced here.
   */
  private async tightenStop(position: Position, candidate: number, cause: string, now: Date): Promise<boolean> {
    if (!isTighterStop(position, candidate)) {
      return false;
    }

    const before = { currentStop: position.currentStop };
    position.currentStop = candidate;

    const result = await this.gateway.modifyStop(position.positionHandle, candidate);
    if (!result.success) {
      this.logger.error(
        { symbol: position.symbol, positionId: position.id, stop: candidate, ...result.error.toLogObject() },
        'Venue stop update failed, enforcing locally'
      );
    }

    this.logger.info({ symbol: position.symbol, positionId: position.id, stop: candidate, cause }, 'Stop moved');
    await this.events.record(
      'STOP_MOVED',
      position.symbol,
      position.id,
      before,
      { currentStop: candidate, at: now.toISOString() },
      cause
    );
    await this.store.persist('stop moved');
    return true;
  }

  /**
   * Full close of the remaining size. exitPrice is the level the close is
   * booked at; null books at the venue fill price.
   */
  private async closePosition(
    position: Position,
    reason: ExitReason,
    exitPrice: number | null,
    now: Date
  ): Promise<CloseOutcome> {
    if (!this.state.getPosition(position.id)) {
      return 'CLOSED';
    }

    const clientOrderId = `${position.id}:CLOSE`;
    const result = await this.gateway.close(position.positionHandle, clientOrderId);

    if (result.success) {
      await this.finalize(position, reason, exitPrice ?? result.data.price, now);
      return 'CLOSED';
    }

    if (result.error instanceof RejectedOrderError && result.error.code === 'POSITION_NOT_FOUND') {
      await this.finalizeExternal(position, now);
      return 'CLOSED';
    }

    if (result.error instanceof TransientExecError && !result.error.safeToResend) {
      position.inFlightClose = {
        clientOrderId,
        size: position.remainingSize,
        levelIndex: null,
        reason,
        requestedAt: now,
      };
      await this.store.persist('close in flight');
      return 'PENDING';
    }

    this.logger.error(
      { positionId: position.id, reason, ...result.error.toLogObject() },
      'Failed to close position'
    );
    return 'FAILED';
  }

  /**
   * The venue no longer holds the position: its server-side stop executed.
   */
  private async finalizeExternal(position: Position, now: Date): Promise<void> {
    const exitPrice = position.currentStop ?? position.lastPrice ?? position.entryPrice;
    this.logger.warn(
      { symbol: position.symbol, positionId: position.id, exitPrice },
      'Position already closed at venue'
    );
    await this.finalize(position, 'EXTERNAL', exitPrice, now);
  }

  private async finalize(position: Position, reason: ExitReason, exitPrice: number, now: Date): Promise<void> {
    const closedSize = position.remainingSize;
    const pnl = this.symbolSpecs.profitAndLoss(
      position.symbol,
      position.direction,
      position.entryPrice,
      exitPrice,
      closedSize
    );
    const before = { remainingSize: closedSize, realizedPnl: position.realizedPnl };

    position.realizedPnl = roundMoney(position.realizedPnl + pnl);
    position.remainingSize = 0;
    position.inFlightClose = undefined;
    this.state.removePosition(position.id);

    await this.account.bookRealized(pnl);
    await this.account.recordTradeResult(position.realizedPnl);

    const record: ClosedTradeRecord = {
      positionId: position.id,
      symbol: position.symbol,
      direction: position.direction,
      entryPrice: position.entryPrice,
      exitPrice,
      exitReason: reason,
      originalSize: position.originalSize,
      realizedPnl: position.realizedPnl,
      rMultiple: position.riskAmountAtFill > 0
        ? Math.round((position.realizedPnl / position.riskAmountAtFill) * 100) / 100
        : null,
      levelsHit: position.levels.filter((level) => level.hit).length,
      tracking: position.tracking,
      openedAt: position.openedAt,
      closedAt: now,
    };
    this.state.recordClosedTrade(record);

    this.logger.info(
      { symbol: position.symbol, positionId: position.id, reason, exitPrice, realizedPnl: record.realizedPnl, rMultiple: record.rMultiple },
      'Position closed'
    );
    await this.events.record('POSITION_CLOSED', position.symbol, position.id, before, {
      ...record,
      openedAt: record.openedAt.toISOString(),
      closedAt: record.closedAt.toISOString(),
    });
    await this.store.persist('position closed');
  }

  /**
   * Settles a close whose outcome was lost in transit. Returns false when the
   * venue could not be asked.
   */
  private async resolveInFlightClose(position: Position, now: Date): Promise<boolean> {
    const inFlight = position.inFlightClose;
    if (!inFlight) return true;

    const lookup = await this.gateway.lookupOrder(inFlight.clientOrderId);
    if (!lookup.success) {
      return false;
    }

    const found = lookup.data;
    if (!found || found.state !== 'FILLED' || !found.fill) {
      const finalLevel = position.levels[position.levels.length - 1];
      if (inFlight.reason === 'FINAL_TARGET' && finalLevel) {
        finalLevel.hit = false;
      }
      position.inFlightClose = undefined;
      await this.store.persist('in-flight close absent at venue');
      return true;
    }

    if (inFlight.levelIndex !== null) {
      await this.applyPartialClose(position, inFlight.levelIndex, inFlight.size, found.fill, now);
      await this.ratchetAfterLevel(position, inFlight.levelIndex, now);
      return true;
    }

    const reason = inFlight.reason ?? 'CLOSE_ALL';
    const finalLevel = position.levels[position.levels.length - 1];
    let exitPrice = found.fill.price;
    if (reason === 'STOP' && position.currentStop !== null) {
      exitPrice = position.currentStop;
    } else if (reason === 'FINAL_TARGET' && finalLevel) {
      exitPrice = finalLevel.targetPrice;
    }
    await this.finalize(position, reason, exitPrice, now);
    return true;
  }
}
