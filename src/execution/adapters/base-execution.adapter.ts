/**
 * Base Execution Adapter - Shared validation and logging for venue implementations
 */

import { randomUUID } from 'crypto';
import type { ExecutionAdapter, VenueResult } from '../interfaces/execution-adapter.interface';
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
import { RejectedOrderError } from '../errors/execution-errors';
import { getComponentLogger } from '../../config/logger';

export abstract class BaseExecutionAdapter implements ExecutionAdapter {
  protected readonly logger = getComponentLogger(this.constructor.name);

  abstract currentPrice(symbol: string): VenueResult<Quote>;

  abstract placeMarketOrder(request: MarketOrderRequest): VenueResult<Fill>;

  abstract placeLimitOrder(request: LimitOrderRequest): VenueResult<OrderHandle>;

  abstract getOrderStatus(handle: OrderHandle): VenueResult<OrderStatusReport>;

  abstract cancelOrder(handle: OrderHandle): VenueResult<void>;

  abstract partialClose(positionHandle: string, size: number, clientOrderId: string): VenueResult<Fill>;

  abstract close(positionHandle: string, clientOrderId: string): VenueResult<Fill>;

  abstract modifyStop(positionHandle: string, stopPrice: number): VenueResult<void>;

  abstract listOpenPositions(): VenueResult<BrokerPosition[]>;

  abstract lookupOrder(clientOrderId: string): VenueResult<OrderLookup | null>;

  /**
   * Validate order request parameters
   */
  protected validateOrderRequest(
    request: MarketOrderRequest | LimitOrderRequest
  ): RejectedOrderError | null {
    const options = { symbol: request.symbol, entityId: request.clientOrderId };

    if (!request.symbol || request.symbol.trim().length === 0) {
      return new RejectedOrderError('Order symbol is required', 'UNKNOWN', options);
    }

    if (!(request.size > 0) || !Number.isFinite(request.size)) {
      return new RejectedOrderError('Order size must be positive', 'INVALID_SIZE', options);
    }

    if ('price' in request && !(request.price > 0)) {
      return new RejectedOrderError('Order price must be positive', 'INVALID_PRICE', options);
    }

    if (!request.clientOrderId) {
      return new RejectedOrderError('Client order id is required', 'UNKNOWN', options);
    }

    return null;
  }

  protected generateOrderId(): string {
    return randomUUID();
  }

  protected logOperation(operation: string, params: Record<string, unknown>): void {
    this.logger.debug({ operation, ...params }, `Venue operation: ${operation}`);
  }

  protected logFailure(operation: string, params: Record<string, unknown>, error: Error): void {
    this.logger.warn(
      { operation, ...params, error: error.message, errorName: error.name },
      `Venue operation failed: ${operation}`
    );
  }
}
