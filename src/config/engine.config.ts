import { getEnvironmentConfig, type EnvironmentConfig } from './env';
import { InvalidConfigurationError } from '../execution/errors/execution-errors';

const HOUR_MS = 60 * 60 * 1000;

export interface AccountConfig {
  initialBalance: number;
}

export interface SchedulerConfig {
  tickIntervalMs: number;
  // How often the signal inbox is drained
  signalPollIntervalMs: number;
}

export interface EntryConfig {
  immediateThresholdR: number;
  proximityThresholdR: number;
  maxWaitMs: number;
  // Wait window of the spread-retry sub-state, measured from the first blocked attempt
  maxSpreadWaitMs: number;
  maxDistanceR: number;
  // Runaway cancellation for entries still waiting for proximity
  cancelOnRunaway: boolean;
  pendingOrderMaxAgeMs: number;
}

export interface RiskConfig {
  baseRiskFraction: number;
  riskSanityMultiple: number;
  confluenceBaseline: number;
  confluenceStep: number;
  confluenceMin: number;
  confluenceMax: number;
  streakMinLength: number;
  winStreakStep: number;
  lossStreakStep: number;
  streakMin: number;
  streakMax: number;
  tierMultiplierMin: number;
  // null disables the cap
  portfolioRiskCapFraction: number | null;
  maxOpenPositions: number | null;
  maxTradesPerDay: number | null;
  // Resting limit orders at the venue; null disables the cap
  maxPendingOrders: number | null;
}

export interface ExitConfig {
  trailBufferR: number;
  // null disables the progressive trail
  progressiveTrailTriggerR: number | null;
  partialCloseAttempts: number;
  partialCloseBaseDelayMs: number;
}

export interface DrawdownConfig {
  totalWarning: number;
  totalEmergency: number;
  totalStopOut: number;
  totalWarningRiskMultiplier: number;
  totalEmergencyRiskMultiplier: number;
  dailyWarning: number;
  dailyReduce: number;
  dailyHalt: number;
  dailyReduceRiskMultiplier: number;
  dayBoundaryUtcOffsetMinutes: number;
  // Profit over the initial balance at which the lower base risk applies; null disables
  ultraSafeProfitFraction: number | null;
  ultraSafeRiskFraction: number;
}

export interface SessionConfig {
  // Blocks new orders while the market is closed, except for continuous symbols
  marketHoursGating: boolean;
  weekOpenHourUtc: number;
  weekCloseHourUtc: number;
  weekendProtection: boolean;
  fridayReviewHourUtc: number;
  // Friday flatten when the daily drawdown has reached weekendCloseDailyDdFraction
  fridayCloseHourUtc: number;
  weekendCloseDailyDdFraction: number;
  weekendTakeProfitR: number;
  maxPositionsPerCorrelationGroup: number;
  maxWeekendPositions: number;
}

export interface VenueConfig {
  callTimeoutMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitterMs: number;
}

export interface EngineConfig {
  account: AccountConfig;
  scheduler: SchedulerConfig;
  entry: EntryConfig;
  risk: RiskConfig;
  exits: ExitConfig;
  drawdown: DrawdownConfig;
  session: SessionConfig;
  venue: VenueConfig;
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  account: {
    initialBalance: 20000,
  },
  scheduler: {
    tickIntervalMs: 5000,
    signalPollIntervalMs: 1000,
  },
  entry: {
    immediateThresholdR: 0.05,
    proximityThresholdR: 0.3,
    maxWaitMs: 120 * HOUR_MS,
    maxSpreadWaitMs: 120 * HOUR_MS,
    maxDistanceR: 1.5,
    cancelOnRunaway: false,
    pendingOrderMaxAgeMs: 24 * HOUR_MS,
  },
  risk: {
    baseRiskFraction: 0.006, // 0.6%
    riskSanityMultiple: 2,
    confluenceBaseline: 4,
    confluenceStep: 0.15,
    confluenceMin: 0.5,
    confluenceMax: 1.5,
    streakMinLength: 2,
    winStreakStep: 0.1,
    lossStreakStep: 0.15,
    streakMin: 0.5,
    streakMax: 1.3,
    tierMultiplierMin: 0.25,
    portfolioRiskCapFraction: null,
    maxOpenPositions: 3,
    maxTradesPerDay: 10,
    maxPendingOrders: 20,
  },
  exits: {
    trailBufferR: 0.5,
    progressiveTrailTriggerR: 0.9,
    partialCloseAttempts: 3,
    partialCloseBaseDelayMs: 500,
  },
  drawdown: {
    totalWarning: 0.05,
    totalEmergency: 0.07,
    totalStopOut: 0.1,
    totalWarningRiskMultiplier: 0.7,
    totalEmergencyRiskMultiplier: 0.5,
    dailyWarning: 0.02,
    dailyReduce: 0.03,
    dailyHalt: 0.032,
    dailyReduceRiskMultiplier: 0.67,
    dayBoundaryUtcOffsetMinutes: 120, // server time UTC+2
    ultraSafeProfitFraction: null,
    ultraSafeRiskFraction: 0.0025,
  },
  session: {
    marketHoursGating: true,
    weekOpenHourUtc: 22,
    weekCloseHourUtc: 22,
    weekendProtection: true,
    fridayReviewHourUtc: 16,
    fridayCloseHourUtc: 21,
    weekendCloseDailyDdFraction: 0.02,
    weekendTakeProfitR: 1.6,
    maxPositionsPerCorrelationGroup: 2,
    maxWeekendPositions: 5,
  },
  venue: {
    callTimeoutMs: 10000,
    retryMaxAttempts: 3,
    retryBaseDelayMs: 250,
    retryMaxDelayMs: 2000,
    retryJitterMs: 25,
  },
};

export function mergeEngineConfig(
  base: EngineConfig,
  overrides: EngineConfigOverrides = {}
): EngineConfig {
  return {
    account: { ...base.account, ...overrides.account },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    entry: { ...base.entry, ...overrides.entry },
    risk: { ...base.risk, ...overrides.risk },
    exits: { ...base.exits, ...overrides.exits },
    drawdown: { ...base.drawdown, ...overrides.drawdown },
    session: { ...base.session, ...overrides.session },
    venue: { ...base.venue, ...overrides.venue },
  };
}

function isFraction(value: number): boolean {
  return value > 0 && value <= 1;
}

function isHour(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 23;
}

/**
 * Validate engine configuration
 */
export function validateEngineConfig(config: EngineConfig): string[] {
  const errors: string[] = [];
  const { account, scheduler, entry, risk, exits, drawdown, session, venue } = config;

  if (account.initialBalance <= 0) {
    errors.push('Initial balance must be positive');
  }

  if (scheduler.tickIntervalMs <= 0) {
    errors.push('Tick interval must be positive');
  }
  if (scheduler.signalPollIntervalMs <= 0) {
    errors.push('Signal poll interval must be positive');
  }

  // Entry thresholds must be ordered: immediate < proximity < runaway
  if (entry.immediateThresholdR < 0) {
    errors.push('Immediate threshold must not be negative');
  }
  if (entry.proximityThresholdR <= entry.immediateThresholdR) {
    errors.push('Proximity threshold must be greater than the immediate threshold');
  }
  if (entry.maxDistanceR <= entry.proximityThresholdR) {
    errors.push('Maximum entry distance must be greater than the proximity threshold');
  }
  if (entry.maxWaitMs <= 0 || entry.maxSpreadWaitMs <= 0 || entry.pendingOrderMaxAgeMs <= 0) {
    errors.push('Entry wait durations must be positive');
  }

  if (risk.baseRiskFraction <= 0 || risk.baseRiskFraction > 0.05) {
    errors.push('Base risk fraction must be between 0 and 0.05 (5%)');
  }
  if (risk.riskSanityMultiple < 1) {
    errors.push('Risk sanity multiple must be at least 1');
  }
  if (risk.confluenceMin <= 0 || risk.confluenceMin > risk.confluenceMax) {
    errors.push('Confluence multiplier range is invalid');
  }
  if (risk.streakMin <= 0 || risk.streakMin > risk.streakMax) {
    errors.push('Streak multiplier range is invalid');
  }
  if (risk.streakMinLength < 1) {
    errors.push('Streak minimum length must be at least 1');
  }
  if (!isFraction(risk.tierMultiplierMin)) {
    errors.push('Tier multiplier floor must be between 0 and 1');
  }
  if (risk.portfolioRiskCapFraction !== null && !isFraction(risk.portfolioRiskCapFraction)) {
    errors.push('Portfolio risk cap must be between 0 and 1 when set');
  }
  if (risk.maxOpenPositions !== null && risk.maxOpenPositions < 1) {
    errors.push('Max open positions must be at least 1 when set');
  }
  if (risk.maxTradesPerDay !== null && risk.maxTradesPerDay < 1) {
    errors.push('Max trades per day must be at least 1 when set');
  }
  if (risk.maxPendingOrders !== null && risk.maxPendingOrders < 1) {
    errors.push('Max pending orders must be at least 1 when set');
  }

  if (exits.trailBufferR < 0) {
    errors.push('Trail buffer must not be negative');
  }
  if (exits.progressiveTrailTriggerR !== null && exits.progressiveTrailTriggerR <= 0) {
    errors.push('Progressive trail trigger must be positive when set');
  }
  if (exits.partialCloseAttempts < 1) {
    errors.push('Partial close attempts must be at least 1');
  }

  if (!(drawdown.totalWarning < drawdown.totalEmergency && drawdown.totalEmergency < drawdown.totalStopOut)) {
    errors.push('Total drawdown tiers must be strictly increasing');
  }
  if (!(drawdown.dailyWarning < drawdown.dailyReduce && drawdown.dailyReduce < drawdown.dailyHalt)) {
    errors.push('Daily drawdown tiers must be strictly increasing');
  }
  if (!isFraction(drawdown.totalStopOut) || !isFraction(drawdown.dailyHalt)) {
    errors.push('Drawdown limits must be fractions between 0 and 1');
  }
  if (
    !isFraction(drawdown.totalWarningRiskMultiplier) ||
    !isFraction(drawdown.totalEmergencyRiskMultiplier) ||
    !isFraction(drawdown.dailyReduceRiskMultiplier)
  ) {
    errors.push('Drawdown risk multipliers must be between 0 and 1');
  }
  if (Math.abs(drawdown.dayBoundaryUtcOffsetMinutes) > 14 * 60) {
    errors.push('Day boundary offset must be within +/- 14 hours');
  }
  if (drawdown.ultraSafeProfitFraction !== null) {
    if (drawdown.ultraSafeProfitFraction <= 0) {
      errors.push('Ultra-safe profit threshold must be positive when set');
    }
    if (drawdown.ultraSafeRiskFraction <= 0 || drawdown.ultraSafeRiskFraction > risk.baseRiskFraction) {
      errors.push('Ultra-safe risk fraction must be positive and no larger than the base risk fraction');
    }
  }

  if (![session.weekOpenHourUtc, session.weekCloseHourUtc, session.fridayReviewHourUtc, session.fridayCloseHourUtc].every(isHour)) {
    errors.push('Session hours must be whole UTC hours between 0 and 23');
  }
  if (session.fridayReviewHourUtc >= session.weekCloseHourUtc || session.fridayCloseHourUtc >= session.weekCloseHourUtc) {
    errors.push('Friday review and close hours must fall before the week closes');
  }
  if (!isFraction(session.weekendCloseDailyDdFraction)) {
    errors.push('Weekend close drawdown must be between 0 and 1');
  }
  if (session.weekendTakeProfitR <= 0) {
    errors.push('Weekend take-profit threshold must be positive');
  }
  if (session.maxPositionsPerCorrelationGroup < 1 || session.maxWeekendPositions < 1) {
    errors.push('Weekend position limits must be at least 1');
  }

  if (venue.callTimeoutMs <= 0) {
    errors.push('Venue call timeout must be positive');
  }
  if (venue.retryMaxAttempts < 1) {
    errors.push('Venue retry attempts must be at least 1');
  }

  return errors;
}

function environmentOverrides(env: EnvironmentConfig): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};

  if (env.ENGINE_INITIAL_BALANCE !== undefined) {
    overrides.account = { initialBalance: env.ENGINE_INITIAL_BALANCE };
  }
  if (env.ENGINE_TICK_INTERVAL_MS !== undefined) {
    overrides.scheduler = { tickIntervalMs: env.ENGINE_TICK_INTERVAL_MS };
  }
  if (env.ENGINE_CANCEL_ON_RUNAWAY !== undefined) {
    overrides.entry = { cancelOnRunaway: env.ENGINE_CANCEL_ON_RUNAWAY };
  }

  const session: Partial<SessionConfig> = {};
  if (env.ENGINE_MARKET_HOURS_GATING !== undefined) {
    session.marketHoursGating = env.ENGINE_MARKET_HOURS_GATING;
  }
  if (env.ENGINE_WEEKEND_PROTECTION !== undefined) {
    session.weekendProtection = env.ENGINE_WEEKEND_PROTECTION;
  }
  if (Object.keys(session).length > 0) {
    overrides.session = session;
  }

  const risk: Partial<RiskConfig> = {};
  if (env.ENGINE_BASE_RISK_PCT !== undefined) {
    risk.baseRiskFraction = env.ENGINE_BASE_RISK_PCT / 100;
  }
  if (env.ENGINE_PORTFOLIO_RISK_CAP_PCT !== undefined) {
    risk.portfolioRiskCapFraction = env.ENGINE_PORTFOLIO_RISK_CAP_PCT / 100;
  }
  if (Object.keys(risk).length > 0) {
    overrides.risk = risk;
  }

  return overrides;
}

/**
 * Defaults, then environment, then explicit overrides. Throws when the result is invalid.
 */
export function loadEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: EnvironmentConfig = getEnvironmentConfig()
): EngineConfig {
  const fromEnv = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, environmentOverrides(env));
  const config = mergeEngineConfig(fromEnv, overrides);

  const errors = validateEngineConfig(config);
  if (errors.length > 0) {
    throw new InvalidConfigurationError(errors);
  }

  return config;
}
