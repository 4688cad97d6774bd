import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  mergeEngineConfig,
  validateEngineConfig,
} from '../../config/engine.config';
import { EnvironmentError, getEnvironmentConfig, resetEnvironmentConfig } from '../../config/env';
import { InvalidConfigurationError } from '../errors/execution-errors';
import { createEngine } from '../../engine';
import { PaperExecutionAdapter } from '../adapters/paper-execution.adapter';
import { ManualClock } from '../services/clock.service';
import { TEST_START } from './setup';

describe('Engine configuration', () => {
  beforeEach(() => {
    resetEnvironmentConfig();
  });

  afterEach(() => {
    resetEnvironmentConfig();
  });

  describe('validateEngineConfig', () => {
    it('should accept the defaults', () => {
      expect(validateEngineConfig(DEFAULT_ENGINE_CONFIG)).toEqual([]);
    });

    it('should require the entry thresholds in order', () => {
      const config = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { entry: { proximityThresholdR: 0.01 } });

      expect(validateEngineConfig(config)).toEqual([
        'Proximity threshold must be greater than the immediate threshold',
      ]);
    });

    it('should require strictly increasing drawdown tiers', () => {
      const config = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
        drawdown: { totalEmergency: 0.12, dailyReduce: 0.01 },
      });

      expect(validateEngineConfig(config)).toEqual([
        'Total drawdown tiers must be strictly increasing',
        'Daily drawdown tiers must be strictly increasing',
      ]);
    });

    it('should require the Friday review and close before the week closes', () => {
      const config = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { session: { fridayCloseHourUtc: 22 } });

      expect(validateEngineConfig(config)).toEqual(['Friday review and close hours must fall before the week closes']);
    });

    it('should check the ultra-safe risk only while the mode is enabled', () => {
      const disabled = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { risk: { baseRiskFraction: 0.002 } });
      const enabled = mergeEngineConfig(disabled, { drawdown: { ultraSafeProfitFraction: 0.09 } });

      expect(validateEngineConfig(disabled)).toEqual([]);
      expect(validateEngineConfig(enabled)).toEqual([
        'Ultra-safe risk fraction must be positive and no larger than the base risk fraction',
      ]);
    });

    it('should accept disabled optional limits', () => {
      const config = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
        risk: { maxOpenPositions: null, maxTradesPerDay: null, maxPendingOrders: null, portfolioRiskCapFraction: null },
        exits: { progressiveTrailTriggerR: null },
      });

      expect(validateEngineConfig(config)).toEqual([]);
    });
  });

  describe('loadEngineConfig', () => {
    it('should layer environment over defaults and explicit overrides over both', () => {
      const env = getEnvironmentConfig({
        NODE_ENV: 'test',
        ENGINE_BASE_RISK_PCT: '1',
        ENGINE_PORTFOLIO_RISK_CAP_PCT: '3',
        ENGINE_TICK_INTERVAL_MS: '1000',
        ENGINE_CANCEL_ON_RUNAWAY: 'true',
        ENGINE_WEEKEND_PROTECTION: 'false',
      });

      const fromEnv = loadEngineConfig({}, env);
      expect(fromEnv.risk.baseRiskFraction).toBe(0.01);
      expect(fromEnv.risk.portfolioRiskCapFraction).toBe(0.03);
      expect(fromEnv.scheduler.tickIntervalMs).toBe(1000);
      expect(fromEnv.entry.cancelOnRunaway).toBe(true);
      expect(fromEnv.session).toEqual({ ...DEFAULT_ENGINE_CONFIG.session, weekendProtection: false });
      expect(fromEnv.account.initialBalance).toBe(20000);

      const overridden = loadEngineConfig({ risk: { baseRiskFraction: 0.004 } }, env);
      expect(overridden.risk.baseRiskFraction).toBe(0.004);
      expect(overridden.risk.portfolioRiskCapFraction).toBe(0.03);
    });

    it('should throw with every violation listed', () => {
      const env = getEnvironmentConfig({ NODE_ENV: 'test' });

      try {
        loadEngineConfig({ risk: { baseRiskFraction: 0.2 }, venue: { retryMaxAttempts: 0 } }, env);
        throw new Error('expected an invalid configuration');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        if (error instanceof InvalidConfigurationError) {
          expect(error.violations).toEqual([
            'Base risk fraction must be between 0 and 0.05 (5%)',
            'Venue retry attempts must be at least 1',
          ]);
        }
      }
    });
  });

  describe('getEnvironmentConfig', () => {
    it('should apply defaults', () => {
      const env = getEnvironmentConfig({ NODE_ENV: 'test' });

      expect(env).toMatchObject({
        NODE_ENV: 'test',
        LOG_LEVEL: 'silent',
        SNAPSHOT_BACKEND: 'file',
        STATE_DIR: './data',
        EXECUTION_MODE: 'PAPER',
      });
      expect(env.ENGINE_BASE_RISK_PCT).toBeUndefined();
    });

    it('should cache the first result until reset', () => {
      const first = getEnvironmentConfig({ NODE_ENV: 'test', STATE_DIR: '/tmp/one' });
      const cached = getEnvironmentConfig({ NODE_ENV: 'test', STATE_DIR: '/tmp/two' });
      resetEnvironmentConfig();
      const fresh = getEnvironmentConfig({ NODE_ENV: 'test', STATE_DIR: '/tmp/two' });

      expect(cached).toBe(first);
      expect(fresh.STATE_DIR).toBe('/tmp/two');
    });

    it('should reject unknown enumerated values', () => {
      expect(() => getEnvironmentConfig({ SNAPSHOT_BACKEND: 'redis' })).toThrow(
        'SNAPSHOT_BACKEND must be one of: file, supabase, memory. Got: redis'
      );
    });

    it('should reject malformed numbers and booleans', () => {
      expect(() => getEnvironmentConfig({ ENGINE_BASE_RISK_PCT: 'abc' })).toThrow(EnvironmentError);
      expect(() => getEnvironmentConfig({ ENGINE_CANCEL_ON_RUNAWAY: 'maybe' })).toThrow(
        'ENGINE_CANCEL_ON_RUNAWAY must be true or false. Got: maybe'
      );
    });

    it('should require bridge settings in REST mode', () => {
      expect(() => getEnvironmentConfig({ EXECUTION_MODE: 'REST' })).toThrow('EXECUTION_API_URL is required');

      const env = getEnvironmentConfig({
        EXECUTION_MODE: 'REST',
        EXECUTION_API_URL: 'http://venue.test/api',
        EXECUTION_API_TOKEN: 'test-token',
      });
      expect(env.EXECUTION_API_TOKEN).toBe('test-token');
    });

    it('should require supabase credentials only for the supabase backend', () => {
      expect(() =>
        getEnvironmentConfig({
          SNAPSHOT_BACKEND: 'supabase',
          SUPABASE_URL: 'http://supabase.test',
          SUPABASE_SERVICE_ROLE_KEY: 'short',
        })
      ).toThrow('SUPABASE_SERVICE_ROLE_KEY appears to be invalid (too short)');
    });
  });

  describe('createEngine', () => {
    it('should wire a paper venue and memory persistence from the environment', () => {
      const env = getEnvironmentConfig({ NODE_ENV: 'test', SNAPSHOT_BACKEND: 'memory', ENGINE_INITIAL_BALANCE: '50000' });

      const { engine, venue, inbox } = createEngine({ env, clock: new ManualClock(TEST_START) });

      expect(venue).toBeInstanceOf(PaperExecutionAdapter);
      expect(engine.account.balance).toBe(50000);
      expect(engine.running).toBe(false);
      expect(inbox.running).toBe(false);
    });
  });
});
