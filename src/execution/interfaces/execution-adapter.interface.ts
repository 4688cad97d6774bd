/**
 * Execution Adapter Interface - The venue capability the engine depends on.
 * Production and simulated venues both implement it; the engine never branches on type.
 */

import type {
  BrokerPosition,
  Fill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderHandle,
  OrderLookup,
  OrderStatusReport,
  Quote,
} from '../types/execution.types';
import type { ExecError } from '../errors/execution-errors';
import type { Result } from '../types/result';

export type VenueResult<T> = Promise<Result<T, ExecError>>;

export interface ExecutionAdapter {
  /**
   * Current bid/ask plus the high/low range since the previous call
   */
  currentPrice(symbol: string): VenueResult<Quote>;

  placeMarketOrder(request: MarketOrderRequest): VenueResult<Fill>;

  placeLimitOrder(request: LimitOrderRequest): VenueResult<OrderHandle>;

  getOrderStatus(handle: OrderHandle): VenueResult<OrderStatusReport>;

  cancelOrder(handle: OrderHandle): VenueResult<void>;

  partialClose(positionHandle: string, size: number, clientOrderId: string): VenueResult<Fill>;

  close(positionHandle: string, clientOrderId: string): VenueResult<Fill>;

  modifyStop(positionHandle: string, stopPrice: number): VenueResult<void>;

  listOpenPositions(): VenueResult<BrokerPosition[]>;

  /**
   * Finds an order by the id the engine attached when sending it.
   * Resolves to null when the venue never received it.
   */
  lookupOrder(clientOrderId: string): VenueResult<OrderLookup | null>;
}
