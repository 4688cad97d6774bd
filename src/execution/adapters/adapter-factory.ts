/**
 * Adapter Factory - Creates the venue adapter for the configured execution mode
 */

import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type { Clock } from '../interfaces/clock.interface';
import type { ExecutionMode } from '../../config/env';
import type { VenueConfig } from '../../config/engine.config';
import { PaperExecutionAdapter, type PaperTradingConfig } from './paper-execution.adapter';
import { RestExecutionAdapter, type RestAdapterConfig } from './rest-execution.adapter';
import { ResilientExecutionGateway } from './resilient-execution.gateway';
import type { Sleep } from '../utils/retry';
import { getComponentLogger } from '../../config/logger';

export interface AdapterFactoryConfig {
  executionMode: ExecutionMode;
  clock: Clock;
  venue: VenueConfig;
  paperTradingConfig?: Partial<PaperTradingConfig>;
  restConfig?: RestAdapterConfig;
  sleep?: Sleep;
}

export interface CreatedAdapter {
  // The raw venue, for simulation controls
  venue: ExecutionAdapter;
  // What the engine calls: timeout and retry applied
  gateway: ExecutionAdapter;
}

export class AdapterFactory {
  static createExecutionAdapter(config: AdapterFactoryConfig): CreatedAdapter {
    const logger = getComponentLogger('AdapterFactory');
    logger.info({ executionMode: config.executionMode }, 'Creating execution adapter');

    const venue = AdapterFactory.createVenue(config);
    return {
      venue,
      gateway: new ResilientExecutionGateway(venue, config.venue, config.sleep),
    };
  }

  private static createVenue(config: AdapterFactoryConfig): ExecutionAdapter {
    switch (config.executionMode) {
      case 'PAPER':
        return new PaperExecutionAdapter(config.clock, config.paperTradingConfig);

      case 'REST':
        if (!config.restConfig) {
          throw new Error('REST execution mode requires restConfig');
        }
        return new RestExecutionAdapter(config.restConfig);
    }
  }
}
