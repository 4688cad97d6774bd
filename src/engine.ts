/**
 * Engine bootstrap - builds a ready-to-start engine from the validated
 * environment: configuration, persistence back end, venue adapter and the
 * signal inbox that feeds it.
 */

import { getEnvironmentConfig, type EnvironmentConfig } from './config/env';
import { loadEngineConfig, type EngineConfigOverrides } from './config/engine.config';
import { AdapterFactory } from './execution/adapters/adapter-factory';
import { createRepositories } from './execution/repositories/repository-factory';
import { ExecutionEngineService } from './execution/services/execution-engine.service';
import { SystemClock } from './execution/services/clock.service';
import { SignalInboxService } from './execution/services/signal-inbox.service';
import type { ExecutionAdapter } from './execution/interfaces/execution-adapter.interface';
import type { Clock } from './execution/interfaces/clock.interface';

export interface CreateEngineOptions {
  env?: EnvironmentConfig;
  overrides?: EngineConfigOverrides;
  clock?: Clock;
}

export interface CreatedEngine {
  engine: ExecutionEngineService;
  inbox: SignalInboxService;
  // Raw venue adapter, without the retry layer
  venue: ExecutionAdapter;
}

export function createEngine(options: CreateEngineOptions = {}): CreatedEngine {
  const env = options.env ?? getEnvironmentConfig();
  const config = loadEngineConfig(options.overrides, env);
  const clock = options.clock ?? new SystemClock();
  const repositories = createRepositories(env);

  const { venue, gateway } = AdapterFactory.createExecutionAdapter({
    executionMode: env.EXECUTION_MODE,
    clock,
    venue: config.venue,
    restConfig:
      env.EXECUTION_MODE === 'REST' && env.EXECUTION_API_URL && env.EXECUTION_API_TOKEN
        ? {
            baseUrl: env.EXECUTION_API_URL,
            apiToken: env.EXECUTION_API_TOKEN,
            requestTimeoutMs: config.venue.callTimeoutMs,
          }
        : undefined,
  });

  const engine = new ExecutionEngineService({
    config,
    clock,
    gateway,
    snapshots: repositories.snapshots,
    events: repositories.events,
  });

  const inbox = new SignalInboxService(repositories.inbox, engine, clock, config.scheduler.signalPollIntervalMs);

  return { engine, inbox, venue };
}
