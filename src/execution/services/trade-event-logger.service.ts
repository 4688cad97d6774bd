/**
 * Trade Event Logger Service - Creates and persists immutable trade event records
 */

import { randomUUID } from 'crypto';
import type { TradeEventRepository } from '../interfaces/repository.interface';
import type { Clock } from '../interfaces/clock.interface';
import type {
  EventPayload,
  TradeEvent,
  TradeEventFilter,
  TradeEventType,
} from '../types/execution.types';
import { describeError } from '../errors/execution-errors';
import { getComponentLogger } from '../../config/logger';

export class TradeEventLoggerService {
  private readonly logger = getComponentLogger('TradeEventLogger');

  constructor(
    private readonly repository: TradeEventRepository,
    private readonly clock: Clock
  ) {}

  /**
   * Create and persist a trade event record. A failed write is logged and
   * the event is still returned: the event log never aborts a tick.
   */
  async record(
    type: TradeEventType,
    symbol: string | null,
    entityId: string | null,
    before: EventPayload,
    after: EventPayload,
    message?: string
  ): Promise<TradeEvent> {
    const event: TradeEvent = {
      id: randomUUID(),
      timestamp: this.clock.now(),
      type,
      symbol,
      entityId,
      before,
      after,
      message,
    };

    try {
      await this.repository.append(event);
      this.logger.debug({ eventType: type, symbol, entityId }, 'Trade event recorded');
    } catch (error) {
      this.logger.error(
        { eventType: type, symbol, entityId, error: describeError(error) },
        'Failed to persist trade event'
      );
    }

    return event;
  }

  async list(filter?: TradeEventFilter): Promise<TradeEvent[]> {
    return this.repository.list(filter);
  }
}
