import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { PositionSizingService } from '../services/position-sizing.service';
import { RiskScalingService } from '../services/risk-scaling.service';
import { SymbolSpecService } from '../services/symbol-spec.service';
import {
  balanceArbitrary,
  majorSymbolArbitrary,
  riskFractionArbitrary,
  stopPointsArbitrary,
  testConfig,
  PROPERTY_TEST_CONFIG,
} from './setup';

describe('PositionSizingService', () => {
  const specs = new SymbolSpecService();
  const sizing = new PositionSizingService(specs);
  const base = {
    symbol: 'EUR_USD',
    balance: 20000,
    effectiveRiskFraction: 0.01,
    baseRiskFraction: 0.006,
    riskSanityMultiple: 2,
    entryPrice: 1.1,
    stopPrice: 1.095,
  };

  it('should size 1% of 20,000 over a 50 point stop at 10 per point to 0.40', () => {
    const result = sizing.calculatePositionSize(base);

    expect(result.isValid).toBe(true);
    expect(result.size).toBe(0.4);
    expect(result.riskAmount).toBe(200);
    expect(result.actualRisk).toBe(200);
    expect(result.stopDistancePoints).toBeCloseTo(50, 6);
    expect(result.sanityViolation).toBe(false);
  });

  it('should use the contract of the symbol', () => {
    const result = sizing.calculatePositionSize({
      ...base,
      symbol: 'USD_JPY',
      effectiveRiskFraction: 0.006,
      entryPrice: 150,
      stopPrice: 149.5,
    });

    expect(result.size).toBe(0.36);
    expect(result.actualRisk).toBeCloseTo(120.06, 2);
  });

  it('should flag a size whose actual risk exceeds base risk times the sanity multiple', () => {
    const result = sizing.calculatePositionSize({ ...base, effectiveRiskFraction: 0.02 });

    expect(result.size).toBe(0.8);
    expect(result.actualRisk).toBe(400);
    expect(result.allowedRisk).toBeCloseTo(240, 9);
    expect(result.sanityViolation).toBe(true);
    expect(result.isValid).toBe(false);
  });

  it('should flag the minimum size when it over-risks a small balance', () => {
    const result = sizing.calculatePositionSize({ ...base, balance: 100, effectiveRiskFraction: 0.006 });

    expect(result.size).toBe(0.01);
    expect(result.actualRisk).toBe(5);
    expect(result.sanityViolation).toBe(true);
  });

  it('should reject a zero stop distance', () => {
    const result = sizing.calculatePositionSize({ ...base, stopPrice: 1.1 });

    expect(result.isValid).toBe(false);
    expect(result.size).toBe(0);
    expect(result.errors).toEqual(['Stop distance must be positive']);
  });

  it('should size deterministically on the size step within the contract limits', () => {
    fc.assert(
      fc.property(
        majorSymbolArbitrary,
        balanceArbitrary,
        riskFractionArbitrary,
        stopPointsArbitrary,
        (symbol, balance, effectiveRiskFraction, stopPoints) => {
          const params = {
            ...base,
            symbol,
            balance,
            effectiveRiskFraction,
            entryPrice: 1.2,
            stopPrice: 1.2 - stopPoints * 0.0001,
          };
          const first = sizing.calculatePositionSize(params);
          const second = sizing.calculatePositionSize(params);
          const spec = specs.get(symbol);

          expect(second).toEqual(first);
          expect(first.size).toBeGreaterThanOrEqual(spec.minSize);
          expect(first.size).toBeLessThanOrEqual(spec.maxSize);
          expect(Math.abs(first.size / spec.sizeStep - Math.round(first.size / spec.sizeStep))).toBeLessThan(1e-6);
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });
});

describe('RiskScalingService', () => {
  const scaling = new RiskScalingService(testConfig().risk);

  it('should scale confluence around the baseline quality within its bounds', () => {
    expect(scaling.confluenceMultiplier(4)).toBe(1);
    expect(scaling.confluenceMultiplier(6)).toBeCloseTo(1.3, 10);
    expect(scaling.confluenceMultiplier(10)).toBe(1.5);
    expect(scaling.confluenceMultiplier(0)).toBe(0.5);
  });

  it('should only scale on streaks of the minimum length', () => {
    expect(scaling.streakMultiplier(1, 0)).toBe(1);
    expect(scaling.streakMultiplier(2, 0)).toBeCloseTo(1.1, 10);
    expect(scaling.streakMultiplier(5, 0)).toBe(1.3);
    expect(scaling.streakMultiplier(0, 2)).toBeCloseTo(0.85, 10);
    expect(scaling.streakMultiplier(0, 5)).toBe(0.5);
  });

  it('should floor the drawdown multiplier', () => {
    expect(scaling.drawdownMultiplier(0.1)).toBe(0.25);
    expect(scaling.drawdownMultiplier(1.4)).toBe(1);
  });

  it('should multiply the base fraction by every factor', () => {
    expect(scaling.compute({ quality: 4, winStreak: 0, lossStreak: 0, drawdownMultiplier: 1 }).effectiveRiskFraction)
      .toBe(0.006);

    const scaled = scaling.compute({ quality: 6, winStreak: 2, lossStreak: 0, drawdownMultiplier: 0.7 });
    expect(scaled.effectiveRiskFraction).toBeCloseTo(0.006 * 1.3 * 1.1 * 0.7, 12);
  });

  it('should scale from an overriding base fraction', () => {
    const scaled = scaling.compute({
      quality: 4,
      winStreak: 0,
      lossStreak: 0,
      drawdownMultiplier: 1,
      baseRiskFraction: 0.0025,
    });

    expect(scaled.baseRiskFraction).toBe(0.0025);
    expect(scaled.effectiveRiskFraction).toBe(0.0025);
  });
});
