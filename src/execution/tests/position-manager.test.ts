import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RejectedOrderError, TransientExecError } from '../errors/execution-errors';
import {
  createHarness,
  makePosition,
  makeSignal,
  openTrackedPosition,
  PROPERTY_TEST_CONFIG,
  type EngineHarness,
} from './setup';

const NO_TRAIL = { exits: { progressiveTrailTriggerR: null } };

function setEurUsd(harness: EngineHarness, bid: number): void {
  harness.venue.setQuote('EUR_USD', { bid, ask: bid + 0.0001 });
}

describe('PositionManagerService', () => {
  it('should close 20% at the 0.9R level and move the stop to breakeven', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1048);

    const update = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    expect(update).toEqual({ closed: false, levelsHit: [0], stopMoved: true });
    expect(position.remainingSize).toBe(0.32);
    expect(position.realizedPnl).toBe(36);
    expect(position.currentStop).toBe(1.1);
    expect(position.levels.map((level) => level.hit)).toEqual([true, false, false]);
    expect(engine.account.balance).toBe(20036);
    expect(venue.getVenuePosition(position.positionHandle)).toMatchObject({ size: 0.32, stopPrice: 1.1 });

    const partials = await harness.events.list({ type: 'PARTIAL_CLOSE' });
    expect(partials).toHaveLength(1);
    expect(partials[0]?.after).toMatchObject({ level: 1, size: 0.08, remainingSize: 0.32 });
  });

  it('should check the stop before any level on the same bar', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1);

    const update = await engine.positionManager.onPriceUpdate(position, 1.106, 1.094, clock.now());

    expect(update).toMatchObject({ closed: true, exitReason: 'STOP', levelsHit: [] });
    expect(engine.state.getPosition(position.id)).toBeUndefined();
    expect(venue.getVenuePosition(position.positionHandle)).toBeNull();
    expect(engine.account.balance).toBe(19800);

    const [record] = engine.closedTrades();
    expect(record).toMatchObject({ exitReason: 'STOP', exitPrice: 1.095, realizedPnl: -200, rMultiple: -1, levelsHit: 0 });
    expect(engine.account.snapshot().lossStreak).toBe(1);
  });

  it('should walk the whole ladder on one bar and book the final level at its target', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1155);

    const update = await engine.positionManager.onPriceUpdate(position, 1.116, 1.101, clock.now());

    expect(update).toMatchObject({ closed: true, exitReason: 'FINAL_TARGET', levelsHit: [0, 1, 2] });
    expect(engine.account.balance).toBe(20444);

    const [record] = engine.closedTrades();
    expect(record).toMatchObject({ exitReason: 'FINAL_TARGET', realizedPnl: 444, rMultiple: 2.22, levelsHit: 3 });

    const stopMoves = await harness.events.list({ type: 'STOP_MOVED' });
    const stops = stopMoves.map((event) => Number(event.after?.['currentStop']));
    expect(stops).toHaveLength(2);
    expect(stops[0]).toBe(1.1);
    expect(stops[1]).toBeCloseTo(1.107, 10);
  });

  it('should trail the stop to the first target once price runs far enough past it', async () => {
    const harness = createHarness();
    const { engine, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1048);

    const update = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    expect(update.stopMoved).toBe(true);
    expect(position.progressiveTrailApplied).toBe(true);
    expect(position.currentStop).toBeCloseTo(1.1045, 10);
  });

  it('should manage a short position symmetrically', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, clock } = harness;
    const signal = makeSignal({ direction: 'SHORT', entryPrice: 1.1, stopPrice: 1.105 });
    const position = openTrackedPosition(harness, makePosition(signal));
    setEurUsd(harness, 1.0953);

    const update = await engine.positionManager.onPriceUpdate(position, 1.099, 1.095, clock.now());

    expect(update).toEqual({ closed: false, levelsHit: [0], stopMoved: true });
    expect(position.remainingSize).toBe(0.32);
    expect(position.realizedPnl).toBe(36);
    expect(position.currentStop).toBe(1.1);
  });

  it('should leave the level for the next tick after a rejected partial close without retrying it', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1048);
    venue.injectFault('partialClose', {
      mode: 'FAIL',
      error: new RejectedOrderError('Market closed', 'MARKET_CLOSED', { symbol: 'EUR_USD' }),
    });

    const update = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    expect(update).toEqual({ closed: false, levelsHit: [], stopMoved: false });
    expect(venue.callCount('partialClose')).toBe(1);
    expect(position.remainingSize).toBe(0.4);
    expect(position.levels[0]?.hit).toBe(false);
    expect(position.currentStop).toBe(1.095);
  });

  it('should send a partial close again once the gateway gives up on a request that never left', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1048);
    venue.injectFault(
      'partialClose',
      { mode: 'FAIL', error: new TransientExecError('Connection refused', 'NOT_SENT', { symbol: null }) },
      4
    );

    const update = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    // Three gateway attempts for the first level attempt, two for the second
    expect(venue.callCount('partialClose')).toBe(5);
    expect(update).toEqual({ closed: false, levelsHit: [0], stopMoved: true });
    expect(position.remainingSize).toBe(0.32);
    expect(engine.account.balance).toBe(20036);
  });

  it('should finalize a position the venue already closed', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, clock } = harness;
    // Book only: the venue's own stop has closed it
    const position = makePosition();
    engine.state.putPosition(position);
    setEurUsd(harness, 1.1048);

    const update = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    expect(update).toMatchObject({ closed: true, exitReason: 'EXTERNAL' });
    expect(engine.state.openPositions()).toHaveLength(0);
    expect(engine.closedTrades()[0]).toMatchObject({ exitReason: 'EXTERNAL', exitPrice: 1.095, realizedPnl: -200 });
  });

  it('should settle a partial close whose response was lost without sending it twice', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition());
    setEurUsd(harness, 1.1048);
    venue.injectFault('partialClose', { mode: 'DROP_RESPONSE' });

    const first = await engine.positionManager.onPriceUpdate(position, 1.105, 1.101, clock.now());

    expect(first).toEqual({ closed: false, levelsHit: [], stopMoved: false });
    expect(position.inFlightClose).toMatchObject({ clientOrderId: `${position.id}:TP1:1`, size: 0.08, levelIndex: 0 });

    clock.advanceMinutes(1);
    await engine.positionManager.onPriceUpdate(position, 1.102, 1.101, clock.now());

    expect(venue.callCount('partialClose')).toBe(1);
    expect(position.inFlightClose).toBeUndefined();
    expect(position.remainingSize).toBe(0.32);
    expect(position.currentStop).toBe(1.1);
    expect(engine.account.balance).toBe(20036);
  });

  it('should enforce only the stop on a degraded position', async () => {
    const harness = createHarness({ config: NO_TRAIL });
    const { engine, venue, clock } = harness;
    const position = openTrackedPosition(harness, makePosition(makeSignal(), { tracking: 'DEGRADED', levels: [] }));
    setEurUsd(harness, 1.12);

    const update = await engine.positionManager.onPriceUpdate(position, 1.12, 1.11, clock.now());

    expect(update).toEqual({ closed: false, levelsHit: [], stopMoved: false });
    expect(venue.callCount('partialClose')).toBe(0);
  });

  it('should close every position on close-all at the venue price', async () => {
    const harness = createHarness();
    const { engine, clock } = harness;
    openTrackedPosition(harness, makePosition());
    openTrackedPosition(harness, makePosition(makeSignal({ symbol: 'GBP_USD', entryPrice: 1.25, stopPrice: 1.245 })));
    setEurUsd(harness, 1.101);
    harness.venue.setQuote('GBP_USD', { bid: 1.25, ask: 1.2501 });

    const result = await engine.positionManager.closeAll('DAILY_HALT', clock.now());

    expect(result).toEqual({ closed: 2, failed: 0 });
    expect(engine.state.openPositions()).toHaveLength(0);
    const records = engine.closedTrades();
    expect(records.map((record) => record.exitReason)).toEqual(['CLOSE_ALL', 'CLOSE_ALL']);
    expect(records[0]?.exitPrice).toBe(1.101);
    expect(records[1]?.realizedPnl).toBe(0);
  });

  it('should never loosen the stop nor close more than the position holds', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(
          fc.record({
            mid: fc.double({ min: 1.096, max: 1.12, noNaN: true }),
            range: fc.double({ min: 0, max: 0.003, noNaN: true }),
          }),
          { minLength: 1, maxLength: 12 }
        ),
        async (bars) => {
          const harness = createHarness();
          const { engine, venue, clock } = harness;
          const position = openTrackedPosition(harness, makePosition());
          let previousStop = position.currentStop ?? 0;

          for (const bar of bars) {
            setEurUsd(harness, bar.mid);
            clock.advanceMinutes(5);
            await engine.positionManager.onPriceUpdate(position, bar.mid + bar.range, bar.mid - bar.range, clock.now());

            if (!engine.state.getPosition(position.id)) break;

            const stop = position.currentStop ?? 0;
            expect(stop).toBeGreaterThanOrEqual(previousStop);
            previousStop = stop;

            expect(position.remainingSize).toBeGreaterThan(0);
            expect(position.remainingSize).toBeLessThanOrEqual(position.originalSize);
            expect(venue.getVenuePosition(position.positionHandle)?.size).toBeCloseTo(position.remainingSize, 8);
          }
        }
      ),
      { ...PROPERTY_TEST_CONFIG, numRuns: 30 }
    );
  });
});
