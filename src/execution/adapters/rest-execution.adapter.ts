/**
 * REST Execution Adapter - Talks to the trading terminal's HTTP bridge.
 *
 * Transport failures, 5xx/429 answers and unreadable 2xx bodies become
 * TransientExecError, other 4xx answers become RejectedOrderError with the
 * bridge's rejection code. Only a connection that was never made is NOT_SENT.
 */

import { z } from 'zod';
import type { VenueResult } from '../interfaces/execution-adapter.interface';
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
import { BaseExecutionAdapter } from './base-execution.adapter';
import {
  RejectedOrderError,
  TransientExecError,
  type ExecError,
  type RejectionCode,
  type TransientKind,
} from '../errors/execution-errors';
import { err, ok, type Result } from '../types/result';

export interface RestAdapterConfig {
  baseUrl: string;
  apiToken: string;
  requestTimeoutMs: number;
  fetch?: typeof fetch;
}

const REJECTION_CODES: readonly RejectionCode[] = [
  'INVALID_PRICE',
  'INVALID_SIZE',
  'INSUFFICIENT_MARGIN',
  'MARKET_CLOSED',
  'ORDER_NOT_FOUND',
  'POSITION_NOT_FOUND',
  'RISK_CAP',
];

const directionSchema = z.enum(['LONG', 'SHORT']);
const orderStateSchema = z.enum(['PENDING', 'FILLED', 'CANCELLED', 'REJECTED', 'EXPIRED']);

const quoteResponseSchema = z.object({
  bid: z.number().positive(),
  ask: z.number().positive(),
  high: z.number().positive(),
  low: z.number().positive(),
  time: z.coerce.date(),
});

const fillResponseSchema = z.object({
  positionHandle: z.string().min(1),
  clientOrderId: z.string().min(1),
  price: z.number().positive(),
  size: z.number().positive(),
  time: z.coerce.date(),
});

const orderResponseSchema = z.object({
  orderId: z.string().min(1),
  clientOrderId: z.string().min(1),
  state: orderStateSchema,
  fill: fillResponseSchema.nullish(),
});

const positionResponseSchema = z.object({
  positionHandle: z.string().min(1),
  symbol: z.string().min(1),
  direction: directionSchema,
  size: z.number().positive(),
  entryPrice: z.number().positive(),
  stopPrice: z.number().positive().nullable(),
  openedAt: z.coerce.date(),
});

const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

type FillResponse = z.infer<typeof fillResponseSchema>;
type OrderResponse = z.infer<typeof orderResponseSchema>;

function toFill(response: FillResponse): Fill {
  return {
    positionHandle: response.positionHandle,
    clientOrderId: response.clientOrderId,
    price: response.price,
    size: response.size,
    timestamp: response.time,
  };
}

function toHandle(response: OrderResponse): OrderHandle {
  return { orderId: response.orderId, clientOrderId: response.clientOrderId };
}

// The request never left the process
const NOT_SENT_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN']);

function connectionErrorCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

function transportFailureKind(error: unknown): TransientKind {
  if (error instanceof Error && error.name === 'AbortError') {
    return 'TIMEOUT';
  }
  const code = connectionErrorCode(error);
  return code !== undefined && NOT_SENT_CODES.has(code) ? 'NOT_SENT' : 'NETWORK';
}

function toRejectionCode(code: string | undefined): RejectionCode {
  return REJECTION_CODES.find((candidate) => candidate === code) ?? 'UNKNOWN';
}

interface RequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  body?: Record<string, unknown>;
  symbol: string | null;
  entityId?: string;
  // 404 resolves to null instead of a rejection
  allowNotFound?: boolean;
}

export class RestExecutionAdapter extends BaseExecutionAdapter {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: RestAdapterConfig) {
    super();
    this.fetchImpl = config.fetch ?? fetch;
  }

  async currentPrice(symbol: string): VenueResult<Quote> {
    const response = await this.request(quoteResponseSchema, {
      method: 'GET',
      path: `/prices/${encodeURIComponent(symbol)}`,
      symbol,
    });
    if (!response.success) return response;
    if (response.data === null) {
      return err(new TransientExecError(`No quote for ${symbol}`, 'UNAVAILABLE', { symbol }));
    }

    const { bid, ask, high, low, time } = response.data;
    return ok({ symbol, bid, ask, high, low, timestamp: time });
  }

  async placeMarketOrder(request: MarketOrderRequest): VenueResult<Fill> {
    const invalid = this.validateOrderRequest(request);
    if (invalid) return err(invalid);

    const response = await this.request(fillResponseSchema, {
      method: 'POST',
      path: '/orders',
      body: { type: 'MARKET', ...request },
      symbol: request.symbol,
      entityId: request.clientOrderId,
    });
    return this.required(response, request.symbol, toFill);
  }

  async placeLimitOrder(request: LimitOrderRequest): VenueResult<OrderHandle> {
    const invalid = this.validateOrderRequest(request);
    if (invalid) return err(invalid);

    const response = await this.request(orderResponseSchema, {
      method: 'POST',
      path: '/orders',
      body: { type: 'LIMIT', ...request },
      symbol: request.symbol,
      entityId: request.clientOrderId,
    });
    return this.required(response, request.symbol, toHandle);
  }

  async getOrderStatus(handle: OrderHandle): VenueResult<OrderStatusReport> {
    const response = await this.request(orderResponseSchema, {
      method: 'GET',
      path: `/orders/${encodeURIComponent(handle.orderId)}`,
      symbol: null,
      entityId: handle.orderId,
    });
    return this.required(response, null, (order) => ({
      handle: toHandle(order),
      state: order.state,
      fill: order.fill ? toFill(order.fill) : undefined,
    }));
  }

  async cancelOrder(handle: OrderHandle): VenueResult<void> {
    const response = await this.request(z.unknown(), {
      method: 'DELETE',
      path: `/orders/${encodeURIComponent(handle.orderId)}`,
      symbol: null,
      entityId: handle.orderId,
    });
    return response.success ? ok(undefined) : response;
  }

  async partialClose(positionHandle: string, size: number, clientOrderId: string): VenueResult<Fill> {
    const response = await this.request(fillResponseSchema, {
      method: 'POST',
      path: `/positions/${encodeURIComponent(positionHandle)}/close`,
      body: { size, clientOrderId },
      symbol: null,
      entityId: positionHandle,
    });
    return this.required(response, null, toFill);
  }

  async close(positionHandle: string, clientOrderId: string): VenueResult<Fill> {
    const response = await this.request(fillResponseSchema, {
      method: 'POST',
      path: `/positions/${encodeURIComponent(positionHandle)}/close`,
      body: { clientOrderId },
      symbol: null,
      entityId: positionHandle,
    });
    return this.required(response, null, toFill);
  }

  async modifyStop(positionHandle: string, stopPrice: number): VenueResult<void> {
    const response = await this.request(z.unknown(), {
      method: 'PUT',
      path: `/positions/${encodeURIComponent(positionHandle)}/stop`,
      body: { stopPrice },
      symbol: null,
      entityId: positionHandle,
    });
    return response.success ? ok(undefined) : response;
  }

  async listOpenPositions(): VenueResult<BrokerPosition[]> {
    const response = await this.request(z.array(positionResponseSchema), {
      method: 'GET',
      path: '/positions',
      symbol: null,
    });
    return this.required(response, null, (positions) => positions);
  }

  async lookupOrder(clientOrderId: string): VenueResult<OrderLookup | null> {
    const response = await this.request(orderResponseSchema, {
      method: 'GET',
      path: `/orders/by-client-id/${encodeURIComponent(clientOrderId)}`,
      symbol: null,
      entityId: clientOrderId,
      allowNotFound: true,
    });
    if (!response.success) return response;
    if (response.data === null) return ok(null);

    const order = response.data;
    return ok({
      clientOrderId,
      state: order.state,
      handle: toHandle(order),
      fill: order.fill ? toFill(order.fill) : undefined,
    });
  }

  private required<T, U>(
    response: Result<T | null, ExecError>,
    symbol: string | null,
    map: (data: T) => U
  ): Result<U, ExecError> {
    if (!response.success) return response;
    if (response.data === null) {
      return err(new TransientExecError('Empty venue response', 'UNAVAILABLE', { symbol }));
    }
    return ok(map(response.data));
  }

  private async request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<Result<T | null, ExecError>> {
    const errorOptions = { symbol: options.symbol, entityId: options.entityId };
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${options.path}`, {
        method: options.method,
        headers: {
          Authorization: `Bearer ${this.config.apiToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      const kind = transportFailureKind(error);
      const failure = new TransientExecError(
        kind === 'TIMEOUT' ? `Request timed out after ${this.config.requestTimeoutMs}ms` : 'Network request failed',
        kind,
        { ...errorOptions, cause: error }
      );
      this.logFailure(options.path, { method: options.method }, failure);
      return err(failure);
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 404 && options.allowNotFound) {
      return ok(null);
    }

    if (!response.ok) {
      return err(await this.toHttpError(response, errorOptions));
    }

    if (response.status === 204) {
      return ok(null);
    }

    // A 2xx means the venue acted on the request; an unreadable answer leaves the outcome unknown
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const failure = new TransientExecError(
        `Unreadable venue response (HTTP ${response.status})`,
        'UNAVAILABLE',
        { ...errorOptions, cause: error }
      );
      this.logFailure(options.path, { method: options.method }, failure);
      return err(failure);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return err(new TransientExecError(
        `Malformed venue response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        'UNAVAILABLE',
        errorOptions
      ));
    }

    return ok(parsed.data);
  }

  private async toHttpError(
    response: Response,
    errorOptions: { symbol: string | null; entityId?: string }
  ): Promise<ExecError> {
    if (response.status >= 500 || response.status === 429) {
      return new TransientExecError(`Venue unavailable (HTTP ${response.status})`, 'UNAVAILABLE', errorOptions);
    }

    const text = await response.text();
    let body: z.infer<typeof errorBodySchema> = {};
    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(text));
      body = parsed.success ? parsed.data : {};
    } catch {
      body = { message: text };
    }

    return new RejectedOrderError(
      body.message ?? `Venue rejected request (HTTP ${response.status})`,
      toRejectionCode(body.code),
      errorOptions
    );
  }
}
