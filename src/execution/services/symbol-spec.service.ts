/**
 * Symbol Spec Service - Contract specifications (point size, value per point,
 * size limits, maximum spread, weekend correlation group) and the contract
 * math built on them.
 */

import { z } from 'zod';
import symbolSpecData from '../data/symbol-specs.json';
import type { Direction, SymbolSpec } from '../types/execution.types';
import { InvalidConfigurationError } from '../errors/execution-errors';
import { formatZodError } from '../schemas/snapshot.schema';
import { roundMoney } from '../utils/rounding';
import { getComponentLogger } from '../../config/logger';

const positive = z.number().finite().positive();

const specFieldsSchema = z
  .object({
    pointSize: positive,
    valuePerPoint: positive,
    minSize: positive,
    maxSize: positive,
    sizeStep: positive,
    maxSpreadPoints: positive,
    correlationGroup: z.string().min(1).optional(),
    continuousTrading: z.boolean().default(false),
  })
  .refine((spec) => spec.minSize <= spec.maxSize, { message: 'minSize exceeds maxSize' });

const specFileSchema = z.object({
  defaults: specFieldsSchema,
  symbols: z.record(specFieldsSchema),
});

type SpecFields = z.infer<typeof specFieldsSchema>;

export class SymbolSpecService {
  private readonly logger = getComponentLogger('SymbolSpecs');
  private readonly specs: Map<string, SymbolSpec> = new Map();
  private readonly defaults: SpecFields;
  private readonly warnedDefaults: Set<string> = new Set();

  constructor(source: unknown = symbolSpecData) {
    const parsed = specFileSchema.safeParse(source);
    if (!parsed.success) {
      throw new InvalidConfigurationError([`symbol specs: ${formatZodError(parsed.error)}`]);
    }

    this.defaults = parsed.data.defaults;
    for (const [symbol, fields] of Object.entries(parsed.data.symbols)) {
      this.specs.set(symbol, { symbol, ...fields });
    }
  }

  has(symbol: string): boolean {
    return this.specs.has(symbol);
  }

  /**
   * Spec for a symbol; unknown symbols fall back to the default forex contract.
   */
  get(symbol: string): SymbolSpec {
    const spec = this.specs.get(symbol);
    if (spec) {
      return spec;
    }

    if (!this.warnedDefaults.has(symbol)) {
      this.warnedDefaults.add(symbol);
      this.logger.warn({ symbol }, 'No contract spec for symbol, using defaults');
    }
    return { symbol, ...this.defaults };
  }

  distanceInPoints(symbol: string, from: number, to: number): number {
    return Math.abs(from - to) / this.get(symbol).pointSize;
  }

  spreadInPoints(symbol: string, bid: number, ask: number): number {
    return (ask - bid) / this.get(symbol).pointSize;
  }

  /**
   * Account-currency loss of `size` stopped out at `stop`.
   */
  riskAmount(symbol: string, entry: number, stop: number, size: number): number {
    return roundMoney(this.distanceInPoints(symbol, entry, stop) * this.get(symbol).valuePerPoint * size);
  }

  /**
   * Account-currency P&L of moving `size` from entry to exit.
   */
  profitAndLoss(symbol: string, direction: Direction, entry: number, exit: number, size: number): number {
    const spec = this.get(symbol);
    const sign = direction === 'LONG' ? 1 : -1;
    return roundMoney(((exit - entry) * sign / spec.pointSize) * spec.valuePerPoint * size);
  }
}
