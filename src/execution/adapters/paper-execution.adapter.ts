/**
 * Paper Execution Adapter - Deterministic simulated venue for backtests and tests.
 *
 * Quotes are pushed in by the caller. Market orders fill at the touch (ask for
 * longs, bid for shorts). Resting limit orders fill at their price once a quote's
 * bar range reaches it. Stops are stored but never executed by the venue.
 */

import type { VenueResult } from '../interfaces/execution-adapter.interface';
import type { Clock } from '../interfaces/clock.interface';
import type {
  BrokerPosition,
  Direction,
  Fill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderHandle,
  OrderLookup,
  OrderStatusReport,
  Quote,
  VenueOrderState,
} from '../types/execution.types';
import { BaseExecutionAdapter } from './base-execution.adapter';
import { RejectedOrderError, TransientExecError, type ExecError } from '../errors/execution-errors';
import { err, ok } from '../types/result';
import { normalizeToStep } from '../utils/rounding';

export type AdapterMethod =
  | 'currentPrice'
  | 'placeMarketOrder'
  | 'placeLimitOrder'
  | 'getOrderStatus'
  | 'cancelOrder'
  | 'partialClose'
  | 'close'
  | 'modifyStop'
  | 'listOpenPositions'
  | 'lookupOrder';

/**
 * FAIL returns the error without touching venue state.
 * DROP_RESPONSE applies the operation, then reports a timeout.
 */
export type PaperFault = { mode: 'FAIL'; error: ExecError } | { mode: 'DROP_RESPONSE' };

export interface PaperQuoteInput {
  bid: number;
  ask: number;
  high?: number;
  low?: number;
}

export interface PaperTradingConfig {
  // Size precision used when reducing positions
  sizePrecision: number;
}

interface PaperOrder {
  handle: OrderHandle;
  request: LimitOrderRequest;
  state: VenueOrderState;
  fill?: Fill;
  createdAt: Date;
}

interface PaperPosition {
  positionHandle: string;
  symbol: string;
  direction: Direction;
  size: number;
  entryPrice: number;
  stopPrice: number | null;
  openedAt: Date;
}

const DEFAULT_PAPER_CONFIG: PaperTradingConfig = {
  sizePrecision: 0.0001,
};

export class PaperExecutionAdapter extends BaseExecutionAdapter {
  private readonly config: PaperTradingConfig;
  private readonly quotes: Map<string, Quote> = new Map();
  private readonly orders: Map<string, PaperOrder> = new Map();
  private readonly positions: Map<string, PaperPosition> = new Map();
  // clientOrderId -> outcome, for lookupOrder
  private readonly lookups: Map<string, OrderLookup> = new Map();
  private readonly faults: Map<AdapterMethod, PaperFault[]> = new Map();
  private readonly calls: Map<AdapterMethod, number> = new Map();

  constructor(
    private readonly clock: Clock,
    config: Partial<PaperTradingConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_PAPER_CONFIG, ...config };
  }

  // Simulation controls

  setQuote(symbol: string, input: PaperQuoteInput): Quote {
    const quote: Quote = {
      symbol,
      bid: input.bid,
      ask: input.ask,
      high: input.high ?? Math.max(input.bid, input.ask),
      low: input.low ?? Math.min(input.bid, input.ask),
      timestamp: this.clock.now(),
    };
    this.quotes.set(symbol, quote);
    this.matchRestingOrders(quote);
    return quote;
  }

  injectFault(method: AdapterMethod, fault: PaperFault, times: number = 1): void {
    const queue = this.faults.get(method) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(fault);
    }
    this.faults.set(method, queue);
  }

  clearFaults(): void {
    this.faults.clear();
  }

  callCount(method: AdapterMethod): number {
    return this.calls.get(method) ?? 0;
  }

  /**
   * Opens a position directly at the venue, as if placed by another client.
   */
  seedPosition(position: BrokerPosition): void {
    this.positions.set(position.positionHandle, { ...position });
  }

  getVenuePosition(positionHandle: string): BrokerPosition | null {
    const position = this.positions.get(positionHandle);
    return position ? { ...position } : null;
  }

  // ExecutionAdapter

  async currentPrice(symbol: string): VenueResult<Quote> {
    const fault = this.takeFault('currentPrice');
    if (fault) return err(this.faultError(fault, symbol));

    const quote = this.quotes.get(symbol);
    if (!quote) {
      return err(new TransientExecError(`No quote for ${symbol}`, 'UNAVAILABLE', { symbol }));
    }
    return ok({ ...quote });
  }

  async placeMarketOrder(request: MarketOrderRequest): VenueResult<Fill> {
    const fault = this.takeFault('placeMarketOrder');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const invalid = this.validateOrderRequest(request);
    if (invalid) return err(invalid);

    const quote = this.quotes.get(request.symbol);
    if (!quote) {
      return err(new RejectedOrderError(`Market closed for ${request.symbol}`, 'MARKET_CLOSED', {
        symbol: request.symbol,
      }));
    }

    const price = request.direction === 'LONG' ? quote.ask : quote.bid;
    const fill = this.openPosition(request, price);
    const handle: OrderHandle = { orderId: this.generateOrderId(), clientOrderId: request.clientOrderId };
    this.lookups.set(request.clientOrderId, {
      clientOrderId: request.clientOrderId,
      state: 'FILLED',
      handle,
      fill,
    });
    this.logOperation('placeMarketOrder', { symbol: request.symbol, size: request.size, price });

    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, request.symbol));
    return ok(fill);
  }

  async placeLimitOrder(request: LimitOrderRequest): VenueResult<OrderHandle> {
    const fault = this.takeFault('placeLimitOrder');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const invalid = this.validateOrderRequest(request);
    if (invalid) return err(invalid);

    const handle: OrderHandle = { orderId: this.generateOrderId(), clientOrderId: request.clientOrderId };
    const order: PaperOrder = {
      handle,
      request: { ...request },
      state: 'PENDING',
      createdAt: this.clock.now(),
    };
    this.orders.set(handle.orderId, order);
    this.lookups.set(request.clientOrderId, {
      clientOrderId: request.clientOrderId,
      state: 'PENDING',
      handle,
    });

    // A marketable limit fills straight away at the touch
    const quote = this.quotes.get(request.symbol);
    if (quote) {
      const marketable =
        request.direction === 'LONG' ? quote.ask <= request.price : quote.bid >= request.price;
      if (marketable) {
        this.fillOrder(order, request.direction === 'LONG' ? quote.ask : quote.bid);
      }
    }
    this.logOperation('placeLimitOrder', { symbol: request.symbol, size: request.size, price: request.price });

    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, request.symbol));
    return ok(handle);
  }

  async getOrderStatus(handle: OrderHandle): VenueResult<OrderStatusReport> {
    const fault = this.takeFault('getOrderStatus');
    if (fault) return err(this.faultError(fault, null));

    const order = this.orders.get(handle.orderId);
    if (!order) {
      return err(new RejectedOrderError(`Unknown order ${handle.orderId}`, 'ORDER_NOT_FOUND', {
        symbol: null,
        entityId: handle.orderId,
      }));
    }
    return ok({ handle: order.handle, state: order.state, fill: order.fill });
  }

  async cancelOrder(handle: OrderHandle): VenueResult<void> {
    const fault = this.takeFault('cancelOrder');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const order = this.orders.get(handle.orderId);
    if (!order || order.state !== 'PENDING') {
      return err(new RejectedOrderError(`Order ${handle.orderId} is not pending`, 'ORDER_NOT_FOUND', {
        symbol: order?.request.symbol ?? null,
        entityId: handle.orderId,
      }));
    }

    order.state = 'CANCELLED';
    this.lookups.set(handle.clientOrderId, { clientOrderId: handle.clientOrderId, state: 'CANCELLED', handle });
    this.logOperation('cancelOrder', { orderId: handle.orderId });

    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, order.request.symbol));
    return ok(undefined);
  }

  async partialClose(positionHandle: string, size: number, clientOrderId: string): VenueResult<Fill> {
    const fault = this.takeFault('partialClose');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const position = this.positions.get(positionHandle);
    if (!position) {
      return err(this.positionNotFound(positionHandle));
    }
    if (!(size > 0) || size > position.size + 1e-9) {
      return err(new RejectedOrderError(`Invalid close size ${size}`, 'INVALID_SIZE', {
        symbol: position.symbol,
        entityId: positionHandle,
      }));
    }

    const fill = this.reducePosition(position, size, clientOrderId);
    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, position.symbol));
    return ok(fill);
  }

  async close(positionHandle: string, clientOrderId: string): VenueResult<Fill> {
    const fault = this.takeFault('close');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const position = this.positions.get(positionHandle);
    if (!position) {
      return err(this.positionNotFound(positionHandle));
    }

    const fill = this.reducePosition(position, position.size, clientOrderId);
    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, position.symbol));
    return ok(fill);
  }

  async modifyStop(positionHandle: string, stopPrice: number): VenueResult<void> {
    const fault = this.takeFault('modifyStop');
    if (fault?.mode === 'FAIL') return err(fault.error);

    const position = this.positions.get(positionHandle);
    if (!position) {
      return err(this.positionNotFound(positionHandle));
    }
    position.stopPrice = stopPrice;

    if (fault?.mode === 'DROP_RESPONSE') return err(this.faultError(fault, position.symbol));
    return ok(undefined);
  }

  async listOpenPositions(): VenueResult<BrokerPosition[]> {
    const fault = this.takeFault('listOpenPositions');
    if (fault) return err(this.faultError(fault, null));

    return ok(Array.from(this.positions.values()).map((position) => ({ ...position })));
  }

  async lookupOrder(clientOrderId: string): VenueResult<OrderLookup | null> {
    const fault = this.takeFault('lookupOrder');
    if (fault) return err(this.faultError(fault, null));

    const lookup = this.lookups.get(clientOrderId);
    return ok(lookup ? { ...lookup } : null);
  }

  // Internals

  private takeFault(method: AdapterMethod): PaperFault | undefined {
    this.calls.set(method, (this.calls.get(method) ?? 0) + 1);
    const queue = this.faults.get(method);
    return queue?.shift();
  }

  private faultError(fault: PaperFault, symbol: string | null): ExecError {
    if (fault.mode === 'FAIL') {
      return fault.error;
    }
    return new TransientExecError('Response lost after venue accepted the request', 'TIMEOUT', { symbol });
  }

  private positionNotFound(positionHandle: string): RejectedOrderError {
    return new RejectedOrderError(`Unknown position ${positionHandle}`, 'POSITION_NOT_FOUND', {
      symbol: null,
      entityId: positionHandle,
    });
  }

  private openPosition(request: MarketOrderRequest, price: number): Fill {
    const positionHandle = this.generateOrderId();
    const timestamp = this.clock.now();
    this.positions.set(positionHandle, {
      positionHandle,
      symbol: request.symbol,
      direction: request.direction,
      size: request.size,
      entryPrice: price,
      stopPrice: null,
      openedAt: timestamp,
    });
    return { positionHandle, clientOrderId: request.clientOrderId, price, size: request.size, timestamp };
  }

  private reducePosition(position: PaperPosition, size: number, clientOrderId: string): Fill {
    const quote = this.quotes.get(position.symbol);
    const price = quote
      ? position.direction === 'LONG' ? quote.bid : quote.ask
      : position.entryPrice;

    const remaining = normalizeToStep(position.size - size, this.config.sizePrecision);
    if (remaining <= 0) {
      this.positions.delete(position.positionHandle);
    } else {
      position.size = remaining;
    }

    const fill: Fill = {
      positionHandle: position.positionHandle,
      clientOrderId,
      price,
      size,
      timestamp: this.clock.now(),
    };
    this.lookups.set(clientOrderId, { clientOrderId, state: 'FILLED', fill });
    this.logOperation('reducePosition', { symbol: position.symbol, size, remaining, price });
    return fill;
  }

  private fillOrder(order: PaperOrder, price: number): void {
    const fill = this.openPosition(order.request, price);
    order.state = 'FILLED';
    order.fill = fill;
    this.lookups.set(order.handle.clientOrderId, {
      clientOrderId: order.handle.clientOrderId,
      state: 'FILLED',
      handle: order.handle,
      fill,
    });
  }

  private matchRestingOrders(quote: Quote): void {
    for (const order of this.orders.values()) {
      if (order.state !== 'PENDING' || order.request.symbol !== quote.symbol) {
        continue;
      }
      const touched =
        order.request.direction === 'LONG'
          ? quote.low <= order.request.price
          : quote.high >= order.request.price;
      if (touched) {
        this.fillOrder(order, order.request.price);
      }
    }
  }
}
