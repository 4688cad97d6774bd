/**
 * Proximity Classifier Service - Decides what a queued entry should do at the
 * current price. Pure: no I/O, no state.
 */

import type {
  EntryCloseReason,
  ProximityAction,
  QueuedEntry,
  Quote,
  Signal,
} from '../types/execution.types';
import type { EntryConfig } from '../../config/engine.config';

export interface ProximityDecision {
  action: ProximityAction;
  distanceR: number;
  expireReason?: EntryCloseReason;
}

export function riskDistance(signal: Signal): number {
  return Math.abs(signal.entryPrice - signal.stopPrice);
}

export function distanceInR(signal: Signal, price: number): number {
  return Math.abs(price - signal.entryPrice) / riskDistance(signal);
}

/**
 * Price the entry is judged against: bid for longs, ask for shorts.
 */
export function referencePrice(signal: Signal, quote: Quote): number {
  return signal.direction === 'LONG' ? quote.bid : quote.ask;
}

export function stopBreached(signal: Signal, price: number): boolean {
  return signal.direction === 'LONG' ? price <= signal.stopPrice : price >= signal.stopPrice;
}

export class ProximityClassifierService {
  constructor(private readonly config: EntryConfig) {}

  classify(entry: QueuedEntry, currentPrice: number, now: Date): ProximityAction {
    return this.evaluate(entry, currentPrice, now).action;
  }

  evaluate(entry: QueuedEntry, currentPrice: number, now: Date): ProximityDecision {
    const { signal } = entry;
    const distanceR = distanceInR(signal, currentPrice);

    if (stopBreached(signal, currentPrice)) {
      return { action: 'EXPIRE', distanceR, expireReason: 'STOP_BREACHED' };
    }

    if (entry.spreadRetry) {
      // Waiting on spread: a runaway price always cancels, and the wait has its own window
      if (distanceR > this.config.maxDistanceR) {
        return { action: 'EXPIRE', distanceR, expireReason: 'RUNAWAY' };
      }
      if (now.getTime() - entry.spreadRetry.since.getTime() >= this.config.maxSpreadWaitMs) {
        return { action: 'EXPIRE', distanceR, expireReason: 'SPREAD_TIMEOUT' };
      }
    } else if (this.config.cancelOnRunaway && distanceR > this.config.maxDistanceR) {
      return { action: 'EXPIRE', distanceR, expireReason: 'RUNAWAY' };
    }

    if (distanceR <= this.config.immediateThresholdR) {
      return { action: 'IMMEDIATE', distanceR };
    }

    if (distanceR <= this.config.proximityThresholdR) {
      return { action: 'PROMOTE_TO_LIMIT', distanceR };
    }

    if (now.getTime() - entry.queuedAt.getTime() < this.config.maxWaitMs) {
      return { action: 'KEEP', distanceR };
    }

    return { action: 'EXPIRE', distanceR, expireReason: 'MAX_WAIT' };
  }
}
