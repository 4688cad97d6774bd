/**
 * Engine State Service - In-memory book of queued entries, open positions,
 * drawdown tiers and closed trades. Account money lives in AccountStateService.
 */

import type {
  ClosedTradeRecord,
  GuardState,
  Position,
  QueuedEntry,
} from '../types/execution.types';
import { ACTIVE_ENTRY_STATES } from '../types/execution.types';

export function isActiveEntry(entry: QueuedEntry): boolean {
  return ACTIVE_ENTRY_STATES.includes(entry.state);
}

export function initialGuardState(): GuardState {
  return { totalTier: 'NORMAL', dailyTier: 'NORMAL' };
}

export class EngineStateService {
  private readonly entries: Map<string, QueuedEntry> = new Map();
  private readonly positions: Map<string, Position> = new Map();
  private readonly closedTrades: ClosedTradeRecord[] = [];
  private guard: GuardState = initialGuardState();

  // Entries

  putEntry(entry: QueuedEntry): void {
    if (isActiveEntry(entry)) {
      this.entries.set(entry.id, entry);
    } else {
      this.entries.delete(entry.id);
    }
  }

  activeEntries(): QueuedEntry[] {
    return Array.from(this.entries.values()).filter(isActiveEntry);
  }

  // Positions

  putPosition(position: Position): void {
    this.positions.set(position.id, position);
  }

  getPosition(id: string): Position | undefined {
    return this.positions.get(id);
  }

  removePosition(id: string): boolean {
    return this.positions.delete(id);
  }

  openPositions(): Position[] {
    return Array.from(this.positions.values());
  }

  hasOpenPosition(symbol: string): boolean {
    return this.openPositions().some((position) => position.symbol === symbol);
  }

  // Guard

  get guardState(): GuardState {
    return { ...this.guard };
  }

  setGuardState(guard: GuardState): void {
    this.guard = { ...guard };
  }

  // Closed trades

  recordClosedTrade(record: ClosedTradeRecord): void {
    this.closedTrades.push(record);
  }

  closedTradeRecords(): ClosedTradeRecord[] {
    return [...this.closedTrades];
  }

  /**
   * Replaces the whole book, used when restoring from a snapshot.
   */
  replace(entries: QueuedEntry[], positions: Position[], guard: GuardState): void {
    this.entries.clear();
    this.positions.clear();
    entries.forEach((entry) => this.putEntry(entry));
    positions.forEach((position) => this.putPosition(position));
    this.guard = { ...guard };
  }
}
