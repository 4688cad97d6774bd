import { config } from 'dotenv';

// Load environment variables once
config();

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type SnapshotBackend = 'file' | 'supabase' | 'memory';
export type ExecutionMode = 'PAPER' | 'REST';

export interface EnvironmentConfig {
  NODE_ENV: NodeEnv;
  LOG_LEVEL: LogLevel;
  SNAPSHOT_BACKEND: SnapshotBackend;
  STATE_DIR: string;
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
  // Execution venue
  EXECUTION_MODE: ExecutionMode;
  EXECUTION_API_URL?: string;
  EXECUTION_API_TOKEN?: string;
  // Engine overrides (optional, merged over DEFAULT_ENGINE_CONFIG)
  ENGINE_INITIAL_BALANCE?: number;
  ENGINE_BASE_RISK_PCT?: number;
  ENGINE_TICK_INTERVAL_MS?: number;
  ENGINE_CANCEL_ON_RUNAWAY?: boolean;
  ENGINE_PORTFOLIO_RISK_CAP_PCT?: number;
  ENGINE_MARKET_HOURS_GATING?: boolean;
  ENGINE_WEEKEND_PROTECTION?: boolean;
}

class EnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvironmentError';
  }
}

function validateOneOf<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  if (!value) {
    return fallback;
  }

  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new EnvironmentError(
      `${name} must be one of: ${allowed.join(', ')}. Got: ${value}`
    );
  }

  return match;
}

function validateUrl(name: string, value: string | undefined): string {
  if (!value) {
    throw new EnvironmentError(`${name} is required`);
  }

  // Basic URL validation
  try {
    new URL(value);
  } catch {
    throw new EnvironmentError(`${name} must be a valid URL. Got: ${value}`);
  }

  return value;
}

function validateSecret(name: string, value: string | undefined): string {
  if (!value) {
    throw new EnvironmentError(`${name} is required`);
  }

  if (value.length < 10) {
    throw new EnvironmentError(`${name} appears to be invalid (too short)`);
  }

  return value;
}

function validateOptionalNumber(
  name: string,
  value: string | undefined,
  options: { integer?: boolean; min?: number } = {}
): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const parsed = options.integer ? parseInt(value, 10) : parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new EnvironmentError(`${name} must be a valid number. Got: ${value}`);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new EnvironmentError(`${name} must be at least ${options.min}. Got: ${parsed}`);
  }

  return parsed;
}

function validateOptionalBoolean(
  name: string,
  value: string | undefined
): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;

  throw new EnvironmentError(`${name} must be true or false. Got: ${value}`);
}

function readEnvironment(env: NodeJS.ProcessEnv): EnvironmentConfig {
  const nodeEnv = validateOneOf<NodeEnv>(
    'NODE_ENV',
    env['NODE_ENV'],
    ['development', 'production', 'test'],
    'development'
  );
  const backend = validateOneOf<SnapshotBackend>(
    'SNAPSHOT_BACKEND',
    env['SNAPSHOT_BACKEND'],
    ['file', 'supabase', 'memory'],
    'file'
  );
  const executionMode = validateOneOf<ExecutionMode>(
    'EXECUTION_MODE',
    env['EXECUTION_MODE'],
    ['PAPER', 'REST'],
    'PAPER'
  );

  const result: EnvironmentConfig = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: validateOneOf<LogLevel>(
      'LOG_LEVEL',
      env['LOG_LEVEL'],
      ['debug', 'info', 'warn', 'error', 'silent'],
      nodeEnv === 'test' ? 'silent' : 'info'
    ),
    SNAPSHOT_BACKEND: backend,
    STATE_DIR: env['STATE_DIR'] || './data',
    EXECUTION_MODE: executionMode,
    ENGINE_INITIAL_BALANCE: validateOptionalNumber('ENGINE_INITIAL_BALANCE', env['ENGINE_INITIAL_BALANCE'], { min: 0 }),
    ENGINE_BASE_RISK_PCT: validateOptionalNumber('ENGINE_BASE_RISK_PCT', env['ENGINE_BASE_RISK_PCT'], { min: 0 }),
    ENGINE_TICK_INTERVAL_MS: validateOptionalNumber('ENGINE_TICK_INTERVAL_MS', env['ENGINE_TICK_INTERVAL_MS'], {
      integer: true,
      min: 1,
    }),
    ENGINE_CANCEL_ON_RUNAWAY: validateOptionalBoolean('ENGINE_CANCEL_ON_RUNAWAY', env['ENGINE_CANCEL_ON_RUNAWAY']),
    ENGINE_PORTFOLIO_RISK_CAP_PCT: validateOptionalNumber(
      'ENGINE_PORTFOLIO_RISK_CAP_PCT',
      env['ENGINE_PORTFOLIO_RISK_CAP_PCT'],
      { min: 0 }
    ),
    ENGINE_MARKET_HOURS_GATING: validateOptionalBoolean('ENGINE_MARKET_HOURS_GATING', env['ENGINE_MARKET_HOURS_GATING']),
    ENGINE_WEEKEND_PROTECTION: validateOptionalBoolean('ENGINE_WEEKEND_PROTECTION', env['ENGINE_WEEKEND_PROTECTION']),
  };

  // Supabase credentials are only needed by the supabase snapshot backend
  if (backend === 'supabase') {
    result.SUPABASE_URL = validateUrl('SUPABASE_URL', env['SUPABASE_URL']);
    result.SUPABASE_SERVICE_ROLE_KEY = validateSecret(
      'SUPABASE_SERVICE_ROLE_KEY',
      env['SUPABASE_SERVICE_ROLE_KEY']
    );
  }

  if (executionMode === 'REST') {
    result.EXECUTION_API_URL = validateUrl('EXECUTION_API_URL', env['EXECUTION_API_URL']);
    result.EXECUTION_API_TOKEN = validateSecret('EXECUTION_API_TOKEN', env['EXECUTION_API_TOKEN']);
  }

  return result;
}

let environmentConfig: EnvironmentConfig | null = null;

/**
 * Validated, cached environment. Throws EnvironmentError on the first invalid variable.
 */
export function getEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  if (environmentConfig) {
    return environmentConfig;
  }

  environmentConfig = readEnvironment(env);
  return environmentConfig;
}

export function resetEnvironmentConfig(): void {
  environmentConfig = null;
}

export { EnvironmentError };
