/**
 * Risk Scaling Service - Turns the base risk fraction into the effective one
 * from signal confluence, the win/loss streak and the drawdown tier.
 */

import type { RiskConfig } from '../../config/engine.config';
import { clamp } from '../utils/rounding';

export interface RiskScalingInputs {
  quality: number;
  winStreak: number;
  lossStreak: number;
  // Product of the drawdown guard's tier multipliers
  drawdownMultiplier: number;
  // Replaces the configured base risk fraction (ultra-safe mode)
  baseRiskFraction?: number;
}

export interface RiskScalingResult {
  baseRiskFraction: number;
  confluenceMultiplier: number;
  streakMultiplier: number;
  drawdownMultiplier: number;
  effectiveRiskFraction: number;
}

export class RiskScalingService {
  constructor(private readonly config: RiskConfig) {}

  confluenceMultiplier(quality: number): number {
    const raw = 1 + (quality - this.config.confluenceBaseline) * this.config.confluenceStep;
    return clamp(raw, this.config.confluenceMin, this.config.confluenceMax);
  }

  streakMultiplier(winStreak: number, lossStreak: number): number {
    const { streakMinLength, winStreakStep, lossStreakStep, streakMin, streakMax } = this.config;
    let raw = 1;

    if (winStreak >= streakMinLength) {
      raw = 1 + winStreakStep * (winStreak - 1);
    } else if (lossStreak >= streakMinLength) {
      raw = 1 - lossStreakStep * (lossStreak - 1);
    }

    return clamp(raw, streakMin, streakMax);
  }

  drawdownMultiplier(multiplier: number): number {
    return clamp(multiplier, this.config.tierMultiplierMin, 1);
  }

  compute(inputs: RiskScalingInputs): RiskScalingResult {
    const confluenceMultiplier = this.confluenceMultiplier(inputs.quality);
    const streakMultiplier = this.streakMultiplier(inputs.winStreak, inputs.lossStreak);
    const drawdownMultiplier = this.drawdownMultiplier(inputs.drawdownMultiplier);
    const baseRiskFraction = inputs.baseRiskFraction ?? this.config.baseRiskFraction;

    return {
      baseRiskFraction,
      confluenceMultiplier,
      streakMultiplier,
      drawdownMultiplier,
      effectiveRiskFraction: baseRiskFraction * confluenceMultiplier * streakMultiplier * drawdownMultiplier,
    };
  }
}
