/**
 * Reconciliation Service - Lines the restored book up with the venue on startup.
 *
 * Venue positions the book does not know are adopted in degraded tracking;
 * book positions the venue no longer holds are discarded as stale. Pending
 * orders the venue no longer knows are cancelled. Matching is by position
 * handle first, then by symbol and direction.
 */

import { randomUUID } from 'crypto';
import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type { BrokerPosition, Position } from '../types/execution.types';
import type { EngineStateService } from './engine-state.service';
import type { EntryQueueService } from './entry-queue.service';
import type { StateStoreService } from './state-store.service';
import type { SymbolSpecService } from './symbol-spec.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import { RejectedOrderError } from '../errors/execution-errors';
import { getComponentLogger } from '../../config/logger';

export interface ReconciliationResult {
  venueAvailable: boolean;
  matched: number;
  adopted: number;
  discarded: number;
  cancelledEntries: number;
}

/**
 * Book position for a venue position the engine did not open through its own
 * fill path: no take-profit ladder, only the stop is managed.
 */
export function degradedPosition(venue: BrokerPosition, riskAmountAtFill: number, entryId: string | null): Position {
  return {
    id: randomUUID(),
    entryId,
    symbol: venue.symbol,
    direction: venue.direction,
    entryPrice: venue.entryPrice,
    originalSize: venue.size,
    remainingSize: venue.size,
    initialStop: venue.stopPrice,
    currentStop: venue.stopPrice,
    riskAmountAtFill,
    levels: [],
    openedAt: venue.openedAt,
    realizedPnl: 0,
    positionHandle: venue.positionHandle,
    progressiveTrailApplied: false,
    tracking: 'DEGRADED',
  };
}

export class ReconciliationService {
  private readonly logger = getComponentLogger('Reconciliation');

  constructor(
    private readonly gateway: ExecutionAdapter,
    private readonly state: EngineStateService,
    private readonly entryQueue: EntryQueueService,
    private readonly symbolSpecs: SymbolSpecService,
    private readonly store: StateStoreService,
    private readonly events: TradeEventLoggerService
  ) {}

  async reconcile(now: Date): Promise<ReconciliationResult> {
    const result: ReconciliationResult = {
      venueAvailable: true,
      matched: 0,
      adopted: 0,
      discarded: 0,
      cancelledEntries: 0,
    };

    // Venue positions opened by the book's own orders belong to their entries
    const claimedHandles = new Set<string>();
    result.cancelledEntries = await this.reconcileEntries(now, claimedHandles);

    const listed = await this.gateway.listOpenPositions();
    if (!listed.success) {
      this.logger.error(listed.error.toLogObject(), 'Venue positions unavailable, book kept as restored');
      return { ...result, venueAvailable: false };
    }

    const unmatched = listed.data.filter((venue) => !claimedHandles.has(venue.positionHandle));

    // Pass 1: by handle
    const pending: Position[] = [];
    for (const position of this.state.openPositions()) {
      const index = unmatched.findIndex((venue) => venue.positionHandle === position.positionHandle);
      if (index >= 0) {
        this.syncMatched(position, unmatched.splice(index, 1)[0]);
        result.matched += 1;
      } else {
        pending.push(position);
      }
    }

    // Pass 2: by symbol and direction
    for (const position of pending) {
      const index = unmatched.findIndex(
        (venue) => venue.symbol === position.symbol && venue.direction === position.direction
      );
      if (index >= 0) {
        this.syncMatched(position, unmatched.splice(index, 1)[0]);
        result.matched += 1;
      } else if (position.inFlightClose) {
        // The close went through while the engine was down; the position manager settles it
        result.matched += 1;
      } else {
        await this.discard(position);
        result.discarded += 1;
      }
    }

    for (const venue of unmatched) {
      await this.adopt(venue, now);
      result.adopted += 1;
    }

    this.logger.info(result, 'Reconciliation complete');
    await this.store.persist('reconciliation');
    return result;
  }

  private async reconcileEntries(now: Date, claimedHandles: Set<string>): Promise<number> {
    let cancelled = 0;

    for (const entry of this.state.activeEntries()) {
      if (entry.inFlight) {
        const lookup = await this.gateway.lookupOrder(entry.inFlight.clientOrderId);
        if (lookup.success && lookup.data?.fill) {
          claimedHandles.add(lookup.data.fill.positionHandle);
        }
        continue;
      }

      if (entry.state !== 'PENDING' || !entry.orderHandle) continue;

      const status = await this.gateway.getOrderStatus(entry.orderHandle);
      if (!status.success) {
        if (status.error instanceof RejectedOrderError) {
          await this.entryQueue.closeEntry(entry, 'CANCELLED', 'VENUE_CANCELLED', now, 'Order unknown to venue');
          cancelled += 1;
        }
        continue;
      }

      const report = status.data;
      if (report.state === 'FILLED' && report.fill) {
        claimedHandles.add(report.fill.positionHandle);
      } else if (report.state !== 'PENDING') {
        await this.entryQueue.closeEntry(entry, 'CANCELLED', 'VENUE_CANCELLED', now, `Venue order ${report.state}`);
        cancelled += 1;
      }
    }

    return cancelled;
  }

  private syncMatched(position: Position, venue: BrokerPosition | undefined): void {
    if (!venue) return;

    if (position.positionHandle !== venue.positionHandle) {
      this.logger.warn(
        { symbol: position.symbol, positionId: position.id, from: position.positionHandle, to: venue.positionHandle },
        'Position matched by symbol, handle updated'
      );
      position.positionHandle = venue.positionHandle;
    }

    if (venue.size < position.remainingSize) {
      this.logger.warn(
        { symbol: position.symbol, positionId: position.id, book: position.remainingSize, venue: venue.size },
        'Venue holds less than the book, size synced'
      );
      position.remainingSize = venue.size;
    }
  }

  private async discard(position: Position): Promise<void> {
    this.state.removePosition(position.id);
    this.logger.warn(
      { symbol: position.symbol, positionId: position.id, positionHandle: position.positionHandle },
      'Position not held at venue, discarded as stale'
    );
    await this.events.record(
      'POSITION_DISCARDED',
      position.symbol,
      position.id,
      { remainingSize: position.remainingSize, positionHandle: position.positionHandle },
      null,
      'No matching venue position'
    );
  }

  private async adopt(venue: BrokerPosition, now: Date): Promise<void> {
    const riskAmountAtFill =
      venue.stopPrice === null
        ? 0
        : this.symbolSpecs.riskAmount(venue.symbol, venue.entryPrice, venue.stopPrice, venue.size);
    const position = degradedPosition(venue, riskAmountAtFill, null);
    this.state.putPosition(position);

    this.logger.warn(
      { symbol: venue.symbol, positionId: position.id, positionHandle: venue.positionHandle, stop: venue.stopPrice },
      'Unknown venue position adopted in degraded tracking'
    );
    await this.events.record(
      'POSITION_ADOPTED',
      venue.symbol,
      position.id,
      null,
      {
        positionHandle: venue.positionHandle,
        direction: venue.direction,
        size: venue.size,
        entryPrice: venue.entryPrice,
        stop: venue.stopPrice,
        tracking: 'DEGRADED',
        adoptedAt: now.toISOString(),
      },
      venue.stopPrice === null ? 'No stop at venue: manual handling required' : undefined
    );
  }
}
