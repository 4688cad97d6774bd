import { describe, it, expect } from 'vitest';
import { AdapterFactory } from '../adapters/adapter-factory';
import { PaperExecutionAdapter } from '../adapters/paper-execution.adapter';
import { ResilientExecutionGateway } from '../adapters/resilient-execution.gateway';
import { RestExecutionAdapter } from '../adapters/rest-execution.adapter';
import { RejectedOrderError, TransientExecError } from '../errors/execution-errors';
import { ManualClock } from '../services/clock.service';
import type { VenueResult } from '../interfaces/execution-adapter.interface';
import type { Fill, MarketOrderRequest, Quote } from '../types/execution.types';
import { noSleep, testConfig, TEST_START } from './setup';

class HangingVenue extends PaperExecutionAdapter {
  override currentPrice(): VenueResult<Quote> {
    return new Promise(() => {});
  }
}

class ThrowingVenue extends PaperExecutionAdapter {
  attempts = 0;

  override async placeMarketOrder(): VenueResult<Fill> {
    this.attempts += 1;
    throw new Error('socket closed');
  }
}

/**
 * Gateway over the REST adapter on a stubbed fetch; counts the requests sent.
 */
function restGateway(...responders: Array<() => Response>) {
  const queue = [...responders];
  const sent: string[] = [];
  const stubFetch: typeof fetch = async (input, init) => {
    sent.push(`${init?.method ?? 'GET'} ${String(input)}`);
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected request');
    }
    return next();
  };
  const adapter = new RestExecutionAdapter({
    baseUrl: 'http://venue.test/api',
    apiToken: 'test-token',
    requestTimeoutMs: 1000,
    fetch: stubFetch,
  });
  return { sent, gateway: new ResilientExecutionGateway(adapter, testConfig().venue, noSleep) };
}

function connectionRefused(): never {
  throw new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
}

const FILL_BODY = {
  positionHandle: 'pos-1',
  clientOrderId: 'entry-1:MARKET',
  price: 1.1001,
  size: 0.1,
  time: '2024-03-04T08:00:00.000Z',
};

const ORDER: MarketOrderRequest = { symbol: 'EUR_USD', direction: 'LONG', size: 0.1, clientOrderId: 'entry-1:MARKET' };

function setup(venue?: PaperExecutionAdapter, callTimeoutMs?: number) {
  const clock = new ManualClock(TEST_START);
  const paper = venue ?? new PaperExecutionAdapter(clock);
  const config = testConfig(callTimeoutMs ? { venue: { callTimeoutMs } } : {}).venue;
  paper.setQuote('EUR_USD', { bid: 1.1, ask: 1.1001 });
  return { paper, gateway: new ResilientExecutionGateway(paper, config, noSleep) };
}

describe('ResilientExecutionGateway', () => {
  it('should retry a read through transient failures', async () => {
    const { paper, gateway } = setup();
    paper.injectFault(
      'currentPrice',
      { mode: 'FAIL', error: new TransientExecError('Bridge down', 'UNAVAILABLE', { symbol: 'EUR_USD' }) },
      2
    );

    const result = await gateway.currentPrice('EUR_USD');

    expect(result.success).toBe(true);
    expect(paper.callCount('currentPrice')).toBe(3);
  });

  it('should give up after the configured attempts', async () => {
    const { paper, gateway } = setup();

    const result = await gateway.currentPrice('GBP_USD');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TransientExecError);
    }
    expect(paper.callCount('currentPrice')).toBe(3);
  });

  it('should resend an order when the request never reached the venue', async () => {
    const { paper, gateway } = setup();
    paper.injectFault('placeMarketOrder', {
      mode: 'FAIL',
      error: new TransientExecError('Connection refused', 'NOT_SENT', { symbol: 'EUR_USD' }),
    });

    const result = await gateway.placeMarketOrder(ORDER);

    expect(result.success).toBe(true);
    expect(paper.callCount('placeMarketOrder')).toBe(2);
  });

  it('should not resend an order after an unavailable venue or a dropped connection', async () => {
    const { paper, gateway } = setup();

    for (const kind of ['UNAVAILABLE', 'NETWORK'] as const) {
      paper.injectFault('placeMarketOrder', {
        mode: 'FAIL',
        error: new TransientExecError('Bridge error', kind, { symbol: 'EUR_USD' }),
      });

      const result = await gateway.placeMarketOrder(ORDER);

      expect(!result.success && result.error instanceof TransientExecError && result.error.kind).toBe(kind);
    }
    expect(paper.callCount('placeMarketOrder')).toBe(2);
  });

  it('should retry a read after a dropped connection', async () => {
    const { paper, gateway } = setup();
    paper.injectFault('lookupOrder', {
      mode: 'FAIL',
      error: new TransientExecError('Connection reset', 'NETWORK', { symbol: null }),
    });

    const result = await gateway.lookupOrder(ORDER.clientOrderId);

    expect(result).toEqual({ success: true, data: null });
    expect(paper.callCount('lookupOrder')).toBe(2);
  });

  it('should never resend an order whose outcome is unknown', async () => {
    const { paper, gateway } = setup();
    paper.injectFault('placeMarketOrder', { mode: 'DROP_RESPONSE' });

    const result = await gateway.placeMarketOrder(ORDER);

    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof TransientExecError) {
      expect(result.error.kind).toBe('TIMEOUT');
      expect(result.error.safeToResend).toBe(false);
    }
    expect(paper.callCount('placeMarketOrder')).toBe(1);

    const lookup = await gateway.lookupOrder(ORDER.clientOrderId);
    expect(lookup.success && lookup.data?.state).toBe('FILLED');
  });

  it('should pass rejections through without retrying', async () => {
    const { paper, gateway } = setup();
    paper.injectFault('placeMarketOrder', {
      mode: 'FAIL',
      error: new RejectedOrderError('Not enough margin', 'INSUFFICIENT_MARGIN', { symbol: 'EUR_USD' }),
    });

    const result = await gateway.placeMarketOrder(ORDER);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(RejectedOrderError);
    }
    expect(paper.callCount('placeMarketOrder')).toBe(1);
  });

  it('should time out a call that never answers', async () => {
    const clock = new ManualClock(TEST_START);
    const { gateway } = setup(new HangingVenue(clock), 20);

    const result = await gateway.currentPrice('EUR_USD');

    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof TransientExecError) {
      expect(result.error.kind).toBe('TIMEOUT');
      expect(result.error.message).toBe('currentPrice timed out after 20ms');
    }
  });

  it('should turn an adapter throw into an unavailable error', async () => {
    const clock = new ManualClock(TEST_START);
    const venue = new ThrowingVenue(clock);
    const { gateway } = setup(venue);

    const result = await gateway.placeMarketOrder(ORDER);

    expect(venue.attempts).toBe(1);

    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof TransientExecError) {
      expect(result.error.kind).toBe('UNAVAILABLE');
      expect(result.error.message).toBe('placeMarketOrder failed: socket closed');
    }
  });
});

describe('ResilientExecutionGateway over the REST bridge', () => {
  it('should send an order once when the bridge answers with a server error', async () => {
    const { sent, gateway } = restGateway(() => new Response('bad gateway', { status: 502 }));

    const result = await gateway.placeMarketOrder(ORDER);

    expect(sent).toEqual(['POST http://venue.test/api/orders']);
    expect(!result.success && result.error instanceof TransientExecError && result.error.kind).toBe('UNAVAILABLE');
  });

  it('should send an order once when an accepted order comes back unreadable', async () => {
    const { sent, gateway } = restGateway(() => new Response('<html>ok</html>', { status: 200 }));

    const result = await gateway.placeMarketOrder(ORDER);

    expect(sent).toHaveLength(1);
    if (!result.success && result.error instanceof TransientExecError) {
      expect(result.error.kind).toBe('UNAVAILABLE');
      expect(result.error.safeToResend).toBe(false);
      expect(result.error.message).toBe('Unreadable venue response (HTTP 200)');
    } else {
      throw new Error('expected a transient error');
    }
  });

  it('should resend an order only while the connection is refused', async () => {
    const { sent, gateway } = restGateway(
      connectionRefused,
      connectionRefused,
      () => new Response(JSON.stringify(FILL_BODY), { status: 201 })
    );

    const result = await gateway.placeMarketOrder(ORDER);

    expect(sent).toHaveLength(3);
    expect(result.success && result.data.positionHandle).toBe('pos-1');
  });
});

describe('AdapterFactory', () => {
  const venue = testConfig().venue;

  it('should create a paper venue behind the gateway', () => {
    const created = AdapterFactory.createExecutionAdapter({
      executionMode: 'PAPER',
      clock: new ManualClock(TEST_START),
      venue,
    });

    expect(created.venue).toBeInstanceOf(PaperExecutionAdapter);
    expect(created.gateway).toBeInstanceOf(ResilientExecutionGateway);
  });

  it('should require the bridge settings in REST mode', () => {
    expect(() =>
      AdapterFactory.createExecutionAdapter({ executionMode: 'REST', clock: new ManualClock(TEST_START), venue })
    ).toThrow('REST execution mode requires restConfig');
  });
});
