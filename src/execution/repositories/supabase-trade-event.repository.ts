/**
 * Supabase Trade Event Repository - Append-only rows in trade_events
 */

import { z } from 'zod';
import type { SupabaseClient } from '../../config/supabase';
import type { TradeEventRepository } from '../interfaces/repository.interface';
import type { TradeEvent, TradeEventFilter } from '../types/execution.types';
import { parseTradeEvent } from '../schemas/snapshot.schema';
import { getComponentLogger } from '../../config/logger';

const tradeEventRowSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  type: z.string(),
  symbol: z.string().nullable(),
  entity_id: z.string().nullable(),
  before: z.unknown(),
  after: z.unknown(),
  message: z.string().nullable(),
});

type TradeEventRow = z.infer<typeof tradeEventRowSchema>;

export class SupabaseTradeEventRepository implements TradeEventRepository {
  private readonly logger = getComponentLogger('SupabaseTradeEventRepository');

  constructor(private readonly supabase: SupabaseClient) {}

  async append(event: TradeEvent): Promise<void> {
    const row: TradeEventRow = {
      id: event.id,
      timestamp: event.timestamp.toISOString(),
      type: event.type,
      symbol: event.symbol,
      entity_id: event.entityId,
      before: event.before,
      after: event.after,
      message: event.message ?? null,
    };

    const { error } = await this.supabase.from('trade_events').insert(row);
    if (error) {
      throw new Error(`Failed to append trade event: ${error.message}`);
    }
  }

  async list(filter: TradeEventFilter = {}): Promise<TradeEvent[]> {
    let query = this.supabase.from('trade_events').select('*');
    if (filter.symbol !== undefined) {
      query = query.eq('symbol', filter.symbol);
    }
    if (filter.type !== undefined) {
      query = query.eq('type', filter.type);
    }
    if (filter.since !== undefined) {
      query = query.gte('timestamp', filter.since.toISOString());
    }

    const { data, error } = await query.order('timestamp', { ascending: true });
    if (error) {
      throw new Error(`Failed to list trade events: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const events: TradeEvent[] = [];
    for (const raw of rows) {
      const row = tradeEventRowSchema.safeParse(raw);
      const parsed = parseTradeEvent(
        row.success
          ? {
              id: row.data.id,
              timestamp: row.data.timestamp,
              type: row.data.type,
              symbol: row.data.symbol,
              entityId: row.data.entity_id,
              before: row.data.before,
              after: row.data.after,
              message: row.data.message ?? undefined,
            }
          : raw
      );

      if (parsed.success) {
        events.push(parsed.data);
      } else {
        this.logger.warn({ reason: parsed.error }, 'Skipping invalid trade event row');
      }
    }
    return events;
  }
}
