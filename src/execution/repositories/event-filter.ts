import type { TradeEvent, TradeEventFilter } from '../types/execution.types';

export function matchesEventFilter(event: TradeEvent, filter: TradeEventFilter = {}): boolean {
  if (filter.symbol !== undefined && event.symbol !== filter.symbol) {
    return false;
  }
  if (filter.type !== undefined && event.type !== filter.type) {
    return false;
  }
  if (filter.since !== undefined && event.timestamp.getTime() < filter.since.getTime()) {
    return false;
  }
  return true;
}
