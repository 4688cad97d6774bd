/**
 * Resilient Execution Gateway - Wraps a venue adapter with a hard timeout per
 * call and bounded retries of transient failures.
 *
 * Reads, cancels and stop changes are retried on any transient error.
 * Order-creating calls are retried only when the error proves the request never
 * reached the venue. Any other failure of an order leaves its outcome unknown,
 * for the caller to resolve with lookupOrder on the next tick.
 */

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
import { TransientExecError, describeError } from '../errors/execution-errors';
import { err } from '../types/result';
import { retryWithBackoff, TimeoutElapsedError, withTimeout, type Sleep } from '../utils/retry';
import type { VenueConfig } from '../../config/engine.config';
import { getComponentLogger } from '../../config/logger';

type CallPolicy = 'IDEMPOTENT' | 'ORDER';

export class ResilientExecutionGateway implements ExecutionAdapter {
  private readonly logger = getComponentLogger('ExecutionGateway');

  constructor(
    private readonly inner: ExecutionAdapter,
    private readonly config: VenueConfig,
    private readonly sleep?: Sleep
  ) {}

  currentPrice(symbol: string): VenueResult<Quote> {
    return this.call('currentPrice', symbol, 'IDEMPOTENT', () => this.inner.currentPrice(symbol));
  }

  placeMarketOrder(request: MarketOrderRequest): VenueResult<Fill> {
    return this.call('placeMarketOrder', request.symbol, 'ORDER', () => this.inner.placeMarketOrder(request));
  }

  placeLimitOrder(request: LimitOrderRequest): VenueResult<OrderHandle> {
    return this.call('placeLimitOrder', request.symbol, 'ORDER', () => this.inner.placeLimitOrder(request));
  }

  getOrderStatus(handle: OrderHandle): VenueResult<OrderStatusReport> {
    return this.call('getOrderStatus', null, 'IDEMPOTENT', () => this.inner.getOrderStatus(handle));
  }

  cancelOrder(handle: OrderHandle): VenueResult<void> {
    return this.call('cancelOrder', null, 'IDEMPOTENT', () => this.inner.cancelOrder(handle));
  }

  partialClose(positionHandle: string, size: number, clientOrderId: string): VenueResult<Fill> {
    return this.call('partialClose', null, 'ORDER', () =>
      this.inner.partialClose(positionHandle, size, clientOrderId)
    );
  }

  close(positionHandle: string, clientOrderId: string): VenueResult<Fill> {
    return this.call('close', null, 'ORDER', () => this.inner.close(positionHandle, clientOrderId));
  }

  modifyStop(positionHandle: string, stopPrice: number): VenueResult<void> {
    return this.call('modifyStop', null, 'IDEMPOTENT', () => this.inner.modifyStop(positionHandle, stopPrice));
  }

  listOpenPositions(): VenueResult<BrokerPosition[]> {
    return this.call('listOpenPositions', null, 'IDEMPOTENT', () => this.inner.listOpenPositions());
  }

  lookupOrder(clientOrderId: string): VenueResult<OrderLookup | null> {
    return this.call('lookupOrder', null, 'IDEMPOTENT', () => this.inner.lookupOrder(clientOrderId));
  }

  private async call<T>(
    operation: string,
    symbol: string | null,
    policy: CallPolicy,
    invoke: () => VenueResult<T>
  ): VenueResult<T> {
    try {
      return await retryWithBackoff(
        async () => {
          const result = await this.invokeWithTimeout(operation, symbol, invoke);
          if (!result.success && result.error instanceof TransientExecError && this.canRetry(result.error, policy)) {
            throw result.error;
          }
          return result;
        },
        {
          maxAttempts: this.config.retryMaxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          jitterMs: this.config.retryJitterMs,
          sleep: this.sleep,
          onRetry: ({ attempt, nextDelayMs, error }) => {
            this.logger.warn(
              { operation, symbol, attempt, nextDelayMs, error: describeError(error) },
              'Retrying venue call'
            );
          },
        }
      );
    } catch (error) {
      if (error instanceof TransientExecError) {
        this.logger.error({ operation, symbol, ...error.toLogObject() }, 'Venue call failed after retries');
        return err(error);
      }
      throw error;
    }
  }

  private canRetry(error: TransientExecError, policy: CallPolicy): boolean {
    return policy === 'IDEMPOTENT' || error.safeToResend;
  }

  private async invokeWithTimeout<T>(
    operation: string,
    symbol: string | null,
    invoke: () => VenueResult<T>
  ): VenueResult<T> {
    try {
      return await withTimeout(invoke(), this.config.callTimeoutMs);
    } catch (error) {
      if (error instanceof TimeoutElapsedError) {
        return err(new TransientExecError(
          `${operation} timed out after ${error.timeoutMs}ms`,
          'TIMEOUT',
          { symbol, cause: error }
        ));
      }
      // Adapters report failures as results; a throw is an adapter defect
      this.logger.error({ operation, symbol, error: describeError(error) }, 'Venue adapter threw');
      return err(new TransientExecError(`${operation} failed: ${describeError(error)}`, 'UNAVAILABLE', {
        symbol,
        cause: error,
      }));
    }
  }
}
