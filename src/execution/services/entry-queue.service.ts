/**
 * Entry Queue Service - Carries queued signals to a fill: proximity
 * classification, spread retry, limit promotion, pending order supervision
 * and resolution of orders whose outcome was lost in transit.
 *
 * At most one entry per symbol is active. The slot is claimed synchronously
 * in enqueue() and released on every terminal transition.
 */

import { randomUUID } from 'crypto';
import type { EntryConfig } from '../../config/engine.config';
import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type {
  EntryCloseReason,
  EntryState,
  Fill,
  OrderHandle,
  QueuedEntry,
  Quote,
  Signal,
} from '../types/execution.types';
import type { EngineStateService } from './engine-state.service';
import type { FillEngineService } from './fill-engine.service';
import { limitClientOrderId } from './fill-engine.service';
import type { ProximityClassifierService } from './proximity-classifier.service';
import { referencePrice, stopBreached } from './proximity-classifier.service';
import type { StateStoreService } from './state-store.service';
import type { SymbolLockService } from './symbol-lock.service';
import type { SymbolSpecService } from './symbol-spec.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import {
  DrawdownHaltedError,
  InvalidSignalError,
  NewOrderBlockedError,
  RejectedOrderError,
  RiskSanityViolationError,
  TransientExecError,
  type FillError,
} from '../errors/execution-errors';
import { parseSignal } from '../schemas/snapshot.schema';
import { err, ok, type Result } from '../types/result';
import { getComponentLogger, logError } from '../../config/logger';

const FRACTION_EPSILON = 1e-9;

export type TerminalState = Extract<EntryState, 'EXPIRED' | 'CANCELLED'>;

export function validateSignal(signal: Signal): string[] {
  const parsed = parseSignal(signal);
  if (!parsed.success) {
    return [parsed.error];
  }

  const errors: string[] = [];
  if (signal.direction === 'LONG' && signal.stopPrice >= signal.entryPrice) {
    errors.push('LONG signal needs its stop below the entry');
  }
  if (signal.direction === 'SHORT' && signal.stopPrice <= signal.entryPrice) {
    errors.push('SHORT signal needs its stop above the entry');
  }

  const fractionSum = signal.takeProfits.reduce((sum, tp) => sum + tp.closeFraction, 0);
  if (fractionSum > 1 + FRACTION_EPSILON) {
    errors.push(`take-profit close fractions sum to ${fractionSum}, above 1`);
  }

  for (let i = 1; i < signal.takeProfits.length; i++) {
    const previous = signal.takeProfits[i - 1];
    const current = signal.takeProfits[i];
    if (previous && current && current.rMultiple <= previous.rMultiple) {
      errors.push('take-profit levels must be strictly ascending by R multiple');
      break;
    }
  }

  return errors;
}

export class EntryQueueService {
  private readonly logger = getComponentLogger('EntryQueue');

  constructor(
    private readonly config: EntryConfig,
    private readonly gateway: ExecutionAdapter,
    private readonly state: EngineStateService,
    private readonly classifier: ProximityClassifierService,
    private readonly fillEngine: FillEngineService,
    private readonly symbolSpecs: SymbolSpecService,
    private readonly symbolLocks: SymbolLockService,
    private readonly store: StateStoreService,
    private readonly events: TradeEventLoggerService
  ) {}

  async enqueue(signal: Signal, now: Date): Promise<Result<QueuedEntry, InvalidSignalError>> {
    const symbol = signal.symbol;
    const entryId = randomUUID();

    // Everything up to the claim is synchronous: no second enqueue can interleave
    const violations = validateSignal(signal);
    let rejection: string | null = violations.length > 0 ? `Invalid signal: ${violations.join('; ')}` : null;
    if (!rejection && this.state.hasOpenPosition(symbol)) {
      rejection = `Position already open for ${symbol}`;
    }
    if (!rejection && !this.symbolLocks.claim(symbol, entryId)) {
      rejection = `Entry already active for ${symbol}`;
    }

    if (rejection) {
      const error = new InvalidSignalError(rejection, { symbol, entityId: signal.id });
      this.logger.warn(error.toLogObject(), 'Signal rejected');
      await this.events.record('ENTRY_REJECTED', symbol, signal.id, null, { signalId: signal.id }, rejection);
      return err(error);
    }

    const entry: QueuedEntry = {
      id: entryId,
      signal,
      queuedAt: now,
      updatedAt: now,
      state: 'AWAITING_PROXIMITY',
    };
    this.state.putEntry(entry);

    this.logger.info(
      { symbol, entryId, signalId: signal.id, direction: signal.direction, entryPrice: signal.entryPrice },
      'Signal queued'
    );
    await this.events.record('ENTRY_QUEUED', symbol, entryId, null, {
      state: entry.state,
      signalId: signal.id,
      entryPrice: signal.entryPrice,
      stopPrice: signal.stopPrice,
    });
    await this.store.persist('entry queued');
    return ok(entry);
  }

  /**
   * One pass over every active entry. A failure for one symbol is logged
   * against that symbol and the others are still evaluated.
   */
  async process(quotes: ReadonlyMap<string, Quote>, now: Date, tradingAllowed: boolean): Promise<void> {
    for (const entry of this.state.activeEntries()) {
      const symbol = entry.signal.symbol;
      try {
        await this.symbolLocks.runExclusive(symbol, () =>
          this.processEntry(entry, quotes.get(symbol), now, tradingAllowed)
        );
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        logError(error, { symbol, entityId: entry.id, operation: 'processEntry' });
      }
    }
  }

  /**
   * Cancels every resting order. Entries still waiting for proximity stay queued.
   */
  async cancelPendingOrders(reason: string, now: Date): Promise<number> {
    let cancelled = 0;
    for (const entry of this.state.activeEntries()) {
      if (entry.state !== 'PENDING') continue;

      await this.symbolLocks.runExclusive(entry.signal.symbol, async () => {
        if (await this.cancelOrderAndClose(entry, 'CANCELLED', 'CLOSE_ALL', now, reason)) {
          cancelled += 1;
        }
      });
    }
    return cancelled;
  }

  /**
   * Startup sweep: expires entries whose wait window passed while the engine was down.
   */
  async cleanupStale(now: Date): Promise<number> {
    let expired = 0;
    for (const entry of this.state.activeEntries()) {
      await this.symbolLocks.runExclusive(entry.signal.symbol, async () => {
        if (entry.state === 'AWAITING_PROXIMITY') {
          if (entry.spreadRetry && now.getTime() - entry.spreadRetry.since.getTime() >= this.config.maxSpreadWaitMs) {
            await this.closeEntry(entry, 'EXPIRED', 'SPREAD_TIMEOUT', now);
            expired += 1;
          } else if (now.getTime() - entry.queuedAt.getTime() >= this.config.maxWaitMs) {
            await this.closeEntry(entry, 'EXPIRED', 'STALE', now);
            expired += 1;
          }
        } else if (entry.state === 'PENDING' && this.pendingTooOld(entry, now)) {
          if (await this.cancelOrderAndClose(entry, 'EXPIRED', 'ORDER_EXPIRED', now)) {
            expired += 1;
          }
        }
      });
    }

    if (expired > 0) {
      this.logger.info({ expired }, 'Expired stale queue entries');
    }
    return expired;
  }

  private async processEntry(
    entry: QueuedEntry,
    quote: Quote | undefined,
    now: Date,
    tradingAllowed: boolean
  ): Promise<void> {
    if (entry.inFlight) {
      const settled = await this.resolveInFlight(entry, now);
      if (!settled || !this.isActive(entry)) return;
    }

    if (entry.state === 'PENDING') {
      await this.supervisePending(entry, quote, now);
      return;
    }

    if (!quote) {
      this.logger.debug({ symbol: entry.signal.symbol, entryId: entry.id }, 'No quote, entry left as is');
      return;
    }

    const price = referencePrice(entry.signal, quote);
    const decision = this.classifier.evaluate(entry, price, now);

    switch (decision.action) {
      case 'EXPIRE':
        await this.closeEntry(entry, 'EXPIRED', decision.expireReason ?? 'MAX_WAIT', now, `distance ${decision.distanceR.toFixed(2)}R`);
        return;

      case 'KEEP':
        return;

      case 'IMMEDIATE':
        if (!tradingAllowed) return;
        if (await this.spreadBlocked(entry, quote, now)) {
          await this.store.persist('entry spread blocked');
          return;
        }
        entry.spreadRetry = undefined;
        await this.handleFillResult(entry, await this.fillEngine.fill(entry, { kind: 'MARKET' }, now), now);
        return;

      case 'PROMOTE_TO_LIMIT':
        if (!tradingAllowed) return;
        await this.placeLimit(entry, now);
        return;
    }
  }

  /**
   * True when the spread is too wide for a market entry; the entry then sits
   * in the spread-retry sub-state.
   */
  private async spreadBlocked(entry: QueuedEntry, quote: Quote, now: Date): Promise<boolean> {
    const symbol = entry.signal.symbol;
    const spreadPoints = this.symbolSpecs.spreadInPoints(symbol, quote.bid, quote.ask);
    const maxSpreadPoints = this.symbolSpecs.get(symbol).maxSpreadPoints;
    if (spreadPoints <= maxSpreadPoints) {
      return false;
    }

    const firstBlock = entry.spreadRetry === undefined;
    entry.spreadRetry = {
      since: entry.spreadRetry?.since ?? now,
      attempts: (entry.spreadRetry?.attempts ?? 0) + 1,
      lastSpreadPoints: spreadPoints,
    };
    entry.updatedAt = now;

    if (firstBlock) {
      this.logger.info({ symbol, entryId: entry.id, spreadPoints, maxSpreadPoints }, 'Spread too wide, entry waiting');
      await this.events.record('ENTRY_SPREAD_BLOCKED', symbol, entry.id, null, { spreadPoints, maxSpreadPoints });
    }
    return true;
  }

  private async placeLimit(entry: QueuedEntry, now: Date): Promise<void> {
    const { signal } = entry;
    const blocked = this.fillEngine.orderBlock(entry, 'LIMIT', now);
    if (blocked) {
      await this.handleFillError(entry, blocked, now);
      return;
    }

    const plan = this.fillEngine.planOrder(entry);
    if (!plan.success) {
      await this.handleFillError(entry, plan.error, now);
      return;
    }

    const clientOrderId = limitClientOrderId(entry.id);
    entry.inFlight = { kind: 'LIMIT', clientOrderId, size: plan.data.size, price: signal.entryPrice, requestedAt: now };
    entry.updatedAt = now;
    await this.store.persist('limit order in flight');

    const placed = await this.gateway.placeLimitOrder({
      symbol: signal.symbol,
      direction: signal.direction,
      size: plan.data.size,
      price: signal.entryPrice,
      clientOrderId,
    });

    if (!placed.success) {
      if (placed.error instanceof TransientExecError) {
        if (placed.error.safeToResend) {
          entry.inFlight = undefined;
        }
        await this.store.persist('limit order failed');
        return;
      }
      await this.closeEntry(entry, 'CANCELLED', 'REJECTED', now, placed.error.message);
      return;
    }

    await this.markPending(entry, placed.data, plan.data.size, now, now);
  }

  private async markPending(
    entry: QueuedEntry,
    handle: OrderHandle,
    size: number,
    placedAt: Date,
    now: Date
  ): Promise<void> {
    const before = { state: entry.state };
    entry.state = 'PENDING';
    entry.orderHandle = handle;
    entry.plannedSize = size;
    entry.limitPlacedAt = placedAt;
    entry.inFlight = undefined;
    entry.spreadRetry = undefined;
    entry.updatedAt = now;

    this.logger.info(
      { symbol: entry.signal.symbol, entryId: entry.id, orderId: handle.orderId, size, price: entry.signal.entryPrice },
      'Limit order placed'
    );
    await this.events.record('ENTRY_PROMOTED', entry.signal.symbol, entry.id, before, {
      state: entry.state,
      orderId: handle.orderId,
      size,
      price: entry.signal.entryPrice,
    });
    await this.store.persist('entry promoted');
  }

  private async supervisePending(entry: QueuedEntry, quote: Quote | undefined, now: Date): Promise<void> {
    const handle = entry.orderHandle;
    if (!handle) {
      await this.closeEntry(entry, 'CANCELLED', 'STALE', now, 'Pending entry without order handle');
      return;
    }

    const status = await this.gateway.getOrderStatus(handle);
    if (!status.success) {
      if (status.error instanceof RejectedOrderError) {
        await this.closeEntry(entry, 'CANCELLED', 'VENUE_CANCELLED', now, status.error.message);
      }
      return;
    }

    const report = status.data;
    if (report.state === 'FILLED' && report.fill) {
      await this.acceptVenueFill(entry, report.fill, now);
      return;
    }
    if (report.state !== 'PENDING') {
      await this.closeEntry(entry, 'CANCELLED', 'VENUE_CANCELLED', now, `Venue order ${report.state}`);
      return;
    }

    if (quote && stopBreached(entry.signal, referencePrice(entry.signal, quote))) {
      await this.cancelOrderAndClose(entry, 'CANCELLED', 'STOP_BREACHED', now);
      return;
    }
    if (this.pendingTooOld(entry, now)) {
      await this.cancelOrderAndClose(entry, 'EXPIRED', 'ORDER_EXPIRED', now);
    }
  }

  private pendingTooOld(entry: QueuedEntry, now: Date): boolean {
    const placedAt = entry.limitPlacedAt ?? entry.updatedAt;
    return now.getTime() - placedAt.getTime() >= this.config.pendingOrderMaxAgeMs;
  }

  /**
   * Cancels the entry's resting order, then closes the entry. When the venue
   * says the order is no longer pending it may have filled in the meantime,
   * so its status decides. Returns false when the entry is still active.
   */
  private async cancelOrderAndClose(
    entry: QueuedEntry,
    terminal: TerminalState,
    reason: EntryCloseReason,
    now: Date,
    message?: string
  ): Promise<boolean> {
    const handle = entry.orderHandle;
    if (!handle) {
      await this.closeEntry(entry, terminal, reason, now, message);
      return true;
    }

    const cancelled = await this.gateway.cancelOrder(handle);
    if (cancelled.success) {
      await this.closeEntry(entry, terminal, reason, now, message);
      return true;
    }
    if (cancelled.error instanceof TransientExecError) {
      return false;
    }

    const status = await this.gateway.getOrderStatus(handle);
    if (status.success && status.data.state === 'FILLED' && status.data.fill) {
      await this.acceptVenueFill(entry, status.data.fill, now);
      return !this.isActive(entry);
    }
    if (!status.success && status.error instanceof TransientExecError) {
      return false;
    }

    await this.closeEntry(entry, terminal, reason, now, message);
    return true;
  }

  private async acceptVenueFill(entry: QueuedEntry, fill: Fill, now: Date): Promise<void> {
    const result = await this.fillEngine.fill(entry, { kind: 'VENUE_FILL', fill }, now);
    if (!result.success) {
      // The fill engine already closed the refused venue position
      await this.closeEntry(entry, 'CANCELLED', 'RISK_REFUSED', now, result.error.message);
    }
  }

  /**
   * Settles an order whose placement outcome was lost. Returns false when
   * the venue could not be asked; the entry then waits for the next tick.
   */
  private async resolveInFlight(entry: QueuedEntry, now: Date): Promise<boolean> {
    const inFlight = entry.inFlight;
    if (!inFlight) return true;

    const lookup = await this.gateway.lookupOrder(inFlight.clientOrderId);
    if (!lookup.success) {
      this.logger.warn(
        { symbol: entry.signal.symbol, entryId: entry.id, clientOrderId: inFlight.clientOrderId },
        'In-flight order still unresolved'
      );
      return false;
    }

    const found = lookup.data;
    this.logger.info(
      { symbol: entry.signal.symbol, entryId: entry.id, clientOrderId: inFlight.clientOrderId, state: found?.state ?? null },
      'Resolved in-flight order'
    );

    if (!found || found.state === 'CANCELLED' || found.state === 'REJECTED' || found.state === 'EXPIRED') {
      entry.inFlight = undefined;
      entry.updatedAt = now;
      await this.store.persist('in-flight order absent at venue');
      return true;
    }

    if (inFlight.kind === 'LIMIT' && found.handle) {
      await this.markPending(entry, found.handle, inFlight.size, inFlight.requestedAt, now);
      if (found.state === 'FILLED' && found.fill) {
        await this.acceptVenueFill(entry, found.fill, now);
      }
      return true;
    }

    if (found.state === 'FILLED' && found.fill) {
      await this.acceptVenueFill(entry, found.fill, now);
      return true;
    }

    // Known to the venue but not filled yet; ask again next tick
    return false;
  }

  private async handleFillResult(
    entry: QueuedEntry,
    result: Result<unknown, FillError>,
    now: Date
  ): Promise<void> {
    if (!result.success) {
      await this.handleFillError(entry, result.error, now);
    }
  }

  private async handleFillError(entry: QueuedEntry, error: FillError, now: Date): Promise<void> {
    const context = { entryId: entry.id, ...error.toLogObject() };

    if (
      error instanceof DrawdownHaltedError ||
      error instanceof NewOrderBlockedError ||
      error instanceof TransientExecError
    ) {
      this.logger.info(context, 'Entry not filled this tick');
      return;
    }

    if (error instanceof RiskSanityViolationError) {
      this.logger.warn(context, 'Fill refused by risk sanity check');
      await this.closeEntry(entry, 'CANCELLED', 'RISK_REFUSED', now, error.message);
      return;
    }

    this.logger.warn(context, 'Order rejected, dropping entry');
    await this.closeEntry(entry, 'CANCELLED', error.code === 'RISK_CAP' ? 'RISK_REFUSED' : 'REJECTED', now, error.message);
  }

  private isActive(entry: QueuedEntry): boolean {
    return entry.state === 'AWAITING_PROXIMITY' || entry.state === 'PENDING';
  }

  /**
   * Terminal transition: releases the symbol slot and drops the entry from the book.
   */
  async closeEntry(
    entry: QueuedEntry,
    terminal: TerminalState,
    reason: EntryCloseReason,
    now: Date,
    message?: string
  ): Promise<void> {
    const symbol = entry.signal.symbol;
    const before = { state: entry.state };

    entry.state = terminal;
    entry.closedReason = reason;
    entry.inFlight = undefined;
    entry.updatedAt = now;
    this.state.putEntry(entry);
    this.symbolLocks.release(symbol, entry.id);

    this.logger.info({ symbol, entryId: entry.id, state: terminal, reason }, 'Entry closed');
    await this.events.record(
      terminal === 'EXPIRED' ? 'ENTRY_EXPIRED' : 'ENTRY_CANCELLED',
      symbol,
      entry.id,
      before,
      { state: terminal, reason },
      message
    );
    await this.store.persist(`entry ${terminal.toLowerCase()}`);
  }
}
