/**
 * Position Sizing Service - Calculates position sizes from the balance at fill time
 */

import type { SymbolSpecService } from './symbol-spec.service';
import { roundMoney, roundToStep } from '../utils/rounding';
import { getComponentLogger } from '../../config/logger';

export interface PositionSizingParams {
  symbol: string;
  balance: number;
  effectiveRiskFraction: number;
  baseRiskFraction: number;
  riskSanityMultiple: number;
  entryPrice: number;
  stopPrice: number;
}

export interface PositionSizingResult {
  size: number;
  riskAmount: number;
  actualRisk: number;
  allowedRisk: number;
  stopDistancePoints: number;
  sanityViolation: boolean;
  isValid: boolean;
  errors: string[];
}

export class PositionSizingService {
  private readonly logger = getComponentLogger('PositionSizing');

  constructor(private readonly symbolSpecs: SymbolSpecService) {}

  /**
   * size = risk / (stop distance in points x value per point), rounded to the
   * symbol's size step and clamped to its limits. The actual risk of the rounded
   * size is then checked against base risk x sanity multiple.
   */
  calculatePositionSize(params: PositionSizingParams): PositionSizingResult {
    const errors: string[] = [];
    const spec = this.symbolSpecs.get(params.symbol);

    const stopDistancePoints = this.symbolSpecs.distanceInPoints(params.symbol, params.entryPrice, params.stopPrice);
    const riskAmount = params.balance * params.effectiveRiskFraction;
    const allowedRisk = params.baseRiskFraction * params.balance * params.riskSanityMultiple;

    if (!(params.balance > 0)) {
      errors.push('Balance must be positive');
    }
    if (!(stopDistancePoints > 0)) {
      errors.push('Stop distance must be positive');
    }
    if (!(params.effectiveRiskFraction > 0)) {
      errors.push('Effective risk fraction must be positive');
    }
    if (errors.length > 0) {
      return {
        size: 0,
        riskAmount: 0,
        actualRisk: 0,
        allowedRisk,
        stopDistancePoints,
        sanityViolation: false,
        isValid: false,
        errors,
      };
    }

    const rawSize = riskAmount / (stopDistancePoints * spec.valuePerPoint);
    let size = roundToStep(rawSize, spec.sizeStep);

    if (size < spec.minSize) {
      this.logger.warn(
        { symbol: params.symbol, calculated: rawSize, adjusted: spec.minSize },
        'Position size adjusted to minimum'
      );
      size = spec.minSize;
    }
    if (size > spec.maxSize) {
      this.logger.warn(
        { symbol: params.symbol, calculated: rawSize, adjusted: spec.maxSize },
        'Position size capped at maximum'
      );
      size = spec.maxSize;
    }

    const actualRisk = roundMoney(size * stopDistancePoints * spec.valuePerPoint);
    const sanityViolation = actualRisk > allowedRisk;
    if (sanityViolation) {
      errors.push(`Actual risk ${actualRisk.toFixed(2)} exceeds sanity limit ${allowedRisk.toFixed(2)}`);
    }

    return {
      size,
      riskAmount: roundMoney(riskAmount),
      actualRisk,
      allowedRisk,
      stopDistancePoints,
      sanityViolation,
      isValid: errors.length === 0,
      errors,
    };
  }
}
