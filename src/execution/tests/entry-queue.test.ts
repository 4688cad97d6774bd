import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { validateSignal } from '../services/entry-queue.service';
import { RejectedOrderError, TransientExecError } from '../errors/execution-errors';
import type { Quote, QueuedEntry } from '../types/execution.types';
import {
  createHarness,
  makeAccount,
  makePosition,
  makeSignal,
  majorSymbolArbitrary,
  PROPERTY_TEST_CONFIG,
  type EngineHarness,
} from './setup';

function quoteMap(...quotes: Quote[]): Map<string, Quote> {
  return new Map(quotes.map((quote) => [quote.symbol, quote]));
}

async function queue(harness: EngineHarness, overrides: Parameters<typeof makeSignal>[0] = {}): Promise<QueuedEntry> {
  const result = await harness.engine.entryQueue.enqueue(makeSignal(overrides), harness.clock.now());
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

async function processQuote(harness: EngineHarness, bid: number, ask: number, tradingAllowed = true): Promise<void> {
  const quote = harness.venue.setQuote('EUR_USD', { bid, ask });
  await harness.engine.entryQueue.process(quoteMap(quote), harness.clock.now(), tradingAllowed);
}

describe('validateSignal', () => {
  it('should accept a well-formed signal', () => {
    expect(validateSignal(makeSignal())).toEqual([]);
  });

  it('should require the stop on the losing side of the entry', () => {
    expect(validateSignal(makeSignal({ stopPrice: 1.105 }))).toEqual(['LONG signal needs its stop below the entry']);
    expect(validateSignal(makeSignal({ direction: 'SHORT', stopPrice: 1.095 }))).toEqual([
      'SHORT signal needs its stop above the entry',
    ]);
  });

  it('should reject close fractions above one and unordered levels', () => {
    const errors = validateSignal(
      makeSignal({
        takeProfits: [
          { rMultiple: 2, closeFraction: 0.6 },
          { rMultiple: 1, closeFraction: 0.6 },
        ],
      })
    );

    expect(errors).toEqual([
      'take-profit close fractions sum to 1.2, above 1',
      'take-profit levels must be strictly ascending by R multiple',
    ]);
  });

  it('should report schema violations as a single message', () => {
    const errors = validateSignal(makeSignal({ entryPrice: -1 }));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain('entryPrice');
  });
});

describe('EntryQueueService', () => {
  it('should queue a signal and claim its symbol', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    expect(entry.state).toBe('AWAITING_PROXIMITY');
    expect(harness.engine.symbolLocks.holder('EUR_USD')).toBe(entry.id);
    expect(harness.engine.state.activeEntries()).toEqual([entry]);
    expect(await harness.events.list({ type: 'ENTRY_QUEUED' })).toHaveLength(1);
  });

  it('should reject a second signal for a symbol with an active entry', async () => {
    const harness = createHarness();
    await queue(harness);

    const second = await harness.engine.entryQueue.enqueue(makeSignal(), harness.clock.now());

    expect(second.success).toBe(false);
    if (!second.success) {
      expect(second.error.message).toBe('Entry already active for EUR_USD');
    }
    expect(await harness.events.list({ type: 'ENTRY_REJECTED' })).toHaveLength(1);
  });

  it('should reject a signal for a symbol with an open position', async () => {
    const harness = createHarness();
    harness.engine.state.putPosition(makePosition());

    const result = await harness.engine.entryQueue.enqueue(makeSignal(), harness.clock.now());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Position already open for EUR_USD');
    }
  });

  it('should reject an invalid signal without claiming the symbol', async () => {
    const harness = createHarness();

    const result = await harness.engine.entryQueue.enqueue(makeSignal({ stopPrice: 1.2 }), harness.clock.now());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Invalid signal: LONG signal needs its stop below the entry');
    }
    expect(harness.engine.symbolLocks.holder('EUR_USD')).toBeUndefined();
  });

  it('should fill at market within the immediate threshold and size from the balance', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('FILLED');
    expect(harness.engine.state.activeEntries()).toHaveLength(0);
    expect(harness.engine.symbolLocks.holder('EUR_USD')).toBeUndefined();

    const [position] = harness.engine.state.openPositions();
    expect(position).toMatchObject({
      entryId: entry.id,
      entryPrice: 1.1001,
      originalSize: 0.24,
      remainingSize: 0.24,
      currentStop: 1.095,
      riskAmountAtFill: 122.4,
    });
    expect(harness.venue.getVenuePosition(position?.positionHandle ?? '')).toMatchObject({ size: 0.24, stopPrice: 1.095 });
    expect(harness.engine.account.snapshot().tradesToday).toBe(1);
  });

  it('should size from the balance at fill time rather than at queue time', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    harness.clock.advanceMinutes(90);
    await harness.engine.account.bookRealized(5000);
    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('FILLED');
    const [position] = harness.engine.state.openPositions();
    expect(position?.originalSize).toBe(0.3);
    expect(position?.riskAmountAtFill).toBe(153);
  });

  it('should size a waiting entry exactly as one filled on arrival at the same balance', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 5000, max: 60000 }),
        fc.integer({ min: 1, max: 600 }),
        async (balance, waitMinutes) => {
          const account = makeAccount({ balance, equity: balance, peakEquity: balance, dayStartBaseline: balance });

          const waited = createHarness();
          await queue(waited);
          waited.clock.advanceMinutes(waitMinutes);
          await waited.engine.account.restore(account);
          await processQuote(waited, 1.1, 1.1001);

          const immediate = createHarness();
          await immediate.engine.account.restore(account);
          await queue(immediate);
          await processQuote(immediate, 1.1, 1.1001);

          const sizes = (harness: EngineHarness) =>
            harness.engine.state.openPositions().map((position) => position.originalSize);
          expect(sizes(waited)).toEqual(sizes(immediate));
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should hold a market entry while the spread is too wide', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    await processQuote(harness, 1.1, 1.1005);
    harness.clock.advanceMinutes(1);
    await processQuote(harness, 1.1, 1.1005);

    expect(entry.state).toBe('AWAITING_PROXIMITY');
    expect(entry.spreadRetry?.attempts).toBe(2);
    expect(entry.spreadRetry?.lastSpreadPoints).toBeCloseTo(5, 6);
    expect(harness.venue.callCount('placeMarketOrder')).toBe(0);
    expect(await harness.events.list({ type: 'ENTRY_SPREAD_BLOCKED' })).toHaveLength(1);

    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('FILLED');
    expect(entry.spreadRetry).toBeUndefined();
  });

  it('should not fill while trading is halted', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    await processQuote(harness, 1.1, 1.1001, false);

    expect(entry.state).toBe('AWAITING_PROXIMITY');
    expect(harness.venue.callCount('placeMarketOrder')).toBe(0);
  });

  it('should promote a near entry to a resting limit and open the position once it fills', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    await processQuote(harness, 1.101, 1.1011);

    expect(entry.state).toBe('PENDING');
    expect(entry.plannedSize).toBe(0.24);
    expect(entry.orderHandle?.clientOrderId).toBe(`${entry.id}:LIMIT`);

    await processQuote(harness, 1.0999, 1.1);

    expect(entry.state).toBe('FILLED');
    const [position] = harness.engine.state.openPositions();
    expect(position).toMatchObject({ entryPrice: 1.1, originalSize: 0.24, riskAmountAtFill: 120 });
  });

  it('should keep an entry waiting while the pending order cap is full', async () => {
    const harness = createHarness({ config: { risk: { maxPendingOrders: 1 } } });
    const first = await queue(harness);
    const second = await queue(harness, { symbol: 'GBP_USD', entryPrice: 1.25, stopPrice: 1.245 });
    const processBoth = async (eurBid: number, eurAsk: number) => {
      const quotes = quoteMap(
        harness.venue.setQuote('EUR_USD', { bid: eurBid, ask: eurAsk }),
        harness.venue.setQuote('GBP_USD', { bid: 1.251, ask: 1.2511 })
      );
      await harness.engine.entryQueue.process(quotes, harness.clock.now(), true);
    };

    await processBoth(1.101, 1.1011);

    expect(first.state).toBe('PENDING');
    expect(second.state).toBe('AWAITING_PROXIMITY');
    expect(harness.venue.callCount('placeLimitOrder')).toBe(1);

    await processBoth(1.0999, 1.1);

    expect(first.state).toBe('FILLED');
    expect(second.state).toBe('PENDING');
    expect(harness.venue.callCount('placeLimitOrder')).toBe(2);
  });

  it('should cancel a resting limit once the stop trades', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    await processQuote(harness, 1.101, 1.1011);

    const quote = harness.venue.setQuote('EUR_USD', { bid: 1.094, ask: 1.0941, low: 1.1005, high: 1.1011 });
    await harness.engine.entryQueue.process(quoteMap(quote), harness.clock.now(), true);

    expect(entry.state).toBe('CANCELLED');
    expect(entry.closedReason).toBe('STOP_BREACHED');
    expect(harness.venue.callCount('cancelOrder')).toBe(1);
    expect(harness.engine.symbolLocks.holder('EUR_USD')).toBeUndefined();
  });

  it('should expire a resting limit older than the pending age limit', async () => {
    const harness = createHarness({ config: { entry: { pendingOrderMaxAgeMs: 60_000 } } });
    const entry = await queue(harness);
    await processQuote(harness, 1.101, 1.1011);

    harness.clock.advanceMinutes(2);
    await processQuote(harness, 1.101, 1.1011);

    expect(entry.state).toBe('EXPIRED');
    expect(entry.closedReason).toBe('ORDER_EXPIRED');
  });

  it('should expire an entry that never came close within the wait window', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    await processQuote(harness, 1.105, 1.1051);
    expect(entry.state).toBe('AWAITING_PROXIMITY');

    harness.clock.advanceHours(120);
    await processQuote(harness, 1.105, 1.1051);

    expect(entry.state).toBe('EXPIRED');
    expect(entry.closedReason).toBe('MAX_WAIT');
  });

  it('should take the fill when a cancel races a limit fill', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    await processQuote(harness, 1.101, 1.1011);
    harness.venue.setQuote('EUR_USD', { bid: 1.0999, ask: 1.1 });

    const cancelled = await harness.engine.entryQueue.cancelPendingOrders('DAILY_HALT', harness.clock.now());

    expect(cancelled).toBe(1);
    expect(entry.state).toBe('FILLED');
    expect(harness.engine.state.openPositions()).toHaveLength(1);
  });

  it('should close a racing fill the engine no longer accepts', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    await processQuote(harness, 1.101, 1.1011);
    harness.venue.setQuote('EUR_USD', { bid: 1.0999, ask: 1.1 });
    await harness.engine.account.restore(makeAccount({ haltedUntil: new Date('2024-03-04T22:00:00.000Z') }));

    await harness.engine.entryQueue.cancelPendingOrders('DAILY_HALT', harness.clock.now());

    expect(entry.state).toBe('CANCELLED');
    expect(entry.closedReason).toBe('RISK_REFUSED');
    expect(harness.engine.state.openPositions()).toHaveLength(0);
    expect(harness.venue.callCount('close')).toBe(1);
    expect(harness.engine.account.balance).toBe(19997.6);
  });

  it('should resolve a market order whose response was lost without sending it again', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    harness.venue.injectFault('placeMarketOrder', { mode: 'DROP_RESPONSE' });

    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('AWAITING_PROXIMITY');
    expect(entry.inFlight).toMatchObject({ kind: 'MARKET', clientOrderId: `${entry.id}:MARKET`, size: 0.24 });

    await processQuote(harness, 1.1, 1.1001);

    expect(harness.venue.callCount('placeMarketOrder')).toBe(1);
    expect(entry.state).toBe('FILLED');
    expect(harness.engine.state.openPositions()).toHaveLength(1);
  });

  it('should ask the venue about a market order that failed with an unknown outcome before sending another', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    harness.venue.injectFault('placeMarketOrder', {
      mode: 'FAIL',
      error: new TransientExecError('Venue unavailable (HTTP 502)', 'UNAVAILABLE', { symbol: 'EUR_USD' }),
    });

    await processQuote(harness, 1.1, 1.1001);

    expect(harness.venue.callCount('placeMarketOrder')).toBe(1);
    expect(entry.inFlight).toMatchObject({ kind: 'MARKET', clientOrderId: `${entry.id}:MARKET` });

    await processQuote(harness, 1.1, 1.1001);

    // Unknown at the venue: cleared, then placed again on the same pass
    expect(harness.venue.callCount('lookupOrder')).toBe(1);
    expect(harness.venue.callCount('placeMarketOrder')).toBe(2);
    expect(entry.state).toBe('FILLED');
    expect(harness.engine.state.openPositions()).toHaveLength(1);
  });

  it('should drop an entry whose market order is rejected', async () => {
    const harness = createHarness();
    const entry = await queue(harness);
    harness.venue.injectFault('placeMarketOrder', {
      mode: 'FAIL',
      error: new RejectedOrderError('Not enough margin', 'INSUFFICIENT_MARGIN', { symbol: 'EUR_USD' }),
    });

    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('CANCELLED');
    expect(entry.closedReason).toBe('REJECTED');
    expect(entry.inFlight).toBeUndefined();
  });

  it('should refuse a fill beyond the open position cap', async () => {
    const harness = createHarness();
    for (const symbol of ['GBP_USD', 'AUD_USD', 'USD_CHF']) {
      harness.engine.state.putPosition(makePosition(makeSignal({ symbol })));
    }
    const entry = await queue(harness);

    await processQuote(harness, 1.1, 1.1001);

    expect(entry.state).toBe('CANCELLED');
    expect(entry.closedReason).toBe('RISK_REFUSED');
    expect(harness.venue.callCount('placeMarketOrder')).toBe(0);
  });

  it('should expire entries left stale while the engine was down', async () => {
    const harness = createHarness();
    const entry = await queue(harness);

    harness.clock.advanceHours(121);
    const expired = await harness.engine.entryQueue.cleanupStale(harness.clock.now());

    expect(expired).toBe(1);
    expect(entry.closedReason).toBe('STALE');
  });

  it('should admit exactly one entry per symbol under concurrent enqueues', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(majorSymbolArbitrary, { minLength: 1, maxLength: 12 }), async (symbols) => {
        const harness = createHarness();
        const now = harness.clock.now();

        const results = await Promise.all(
          symbols.map((symbol) => harness.engine.entryQueue.enqueue(makeSignal({ symbol }), now))
        );

        const admitted = results.filter((result) => result.success).length;
        expect(admitted).toBe(new Set(symbols).size);
        expect(harness.engine.state.activeEntries()).toHaveLength(new Set(symbols).size);
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});
