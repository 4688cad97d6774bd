/**
 * Supabase Signal Inbox - Rows in signal_inbox with status NEW are pending;
 * settling stamps QUEUED or REJECTED on the row.
 */

import { z } from 'zod';
import type { SupabaseClient } from '../../config/supabase';
import type { InboxMessage, InboxOutcome, SignalInboxRepository } from '../interfaces/repository.interface';
import { getComponentLogger } from '../../config/logger';

const inboxRowSchema = z.object({
  id: z.string(),
  payload: z.unknown(),
});

export class SupabaseSignalInboxRepository implements SignalInboxRepository {
  private readonly logger = getComponentLogger('SupabaseSignalInboxRepository');

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly batchSize: number = 50
  ) {}

  async pending(): Promise<InboxMessage[]> {
    const { data, error } = await this.supabase
      .from('signal_inbox')
      .select('id, payload')
      .eq('status', 'NEW')
      .order('created_at', { ascending: true })
      .limit(this.batchSize);

    if (error) {
      throw new Error(`Failed to read signal inbox: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const messages: InboxMessage[] = [];
    for (const raw of rows) {
      const row = inboxRowSchema.safeParse(raw);
      if (row.success) {
        messages.push({ id: row.data.id, payload: row.data.payload });
      } else {
        this.logger.warn({ row: raw }, 'Skipping signal inbox row without an id');
      }
    }
    return messages;
  }

  async settle(id: string, outcome: InboxOutcome, settledAt: Date): Promise<void> {
    const { error } = await this.supabase
      .from('signal_inbox')
      .update({
        status: outcome.status,
        entry_id: outcome.status === 'QUEUED' ? outcome.entryId : null,
        reason: outcome.status === 'REJECTED' ? outcome.reason : null,
        settled_at: settledAt.toISOString(),
      })
      .eq('id', id);

    if (error) {
      throw new Error(`Failed to settle signal ${id}: ${error.message}`);
    }
  }
}
