/**
 * Supabase Snapshot Repository - Snapshot row in engine_snapshots, corrupt
 * records in engine_quarantine
 */

import { z } from 'zod';
import type { SupabaseClient } from '../../config/supabase';
import type { SerializedSnapshot, SnapshotRepository } from '../interfaces/repository.interface';
import type { QuarantinedRecord, RawSnapshot } from '../types/execution.types';
import { parseRawSnapshot } from '../schemas/snapshot.schema';
import { CorruptPersistedEntryError } from '../errors/execution-errors';

const snapshotRowSchema = z.object({
  payload: z.unknown(),
});

export class SupabaseSnapshotRepository implements SnapshotRepository {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly snapshotId: string = 'primary'
  ) {}

  async load(): Promise<RawSnapshot | null> {
    const { data, error } = await this.supabase
      .from('engine_snapshots')
      .select('payload')
      .eq('id', this.snapshotId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load engine snapshot: ${error.message}`);
    }

    const row: unknown = data;
    if (row === null) {
      return null;
    }

    const parsedRow = snapshotRowSchema.safeParse(row);
    const parsed = parseRawSnapshot(parsedRow.success ? parsedRow.data.payload : null);
    if (!parsed.success) {
      throw new CorruptPersistedEntryError('snapshot', parsed.error, { symbol: null, entityId: this.snapshotId });
    }
    return parsed.data;
  }

  async save(snapshot: SerializedSnapshot): Promise<void> {
    const { error } = await this.supabase.from('engine_snapshots').upsert({
      id: this.snapshotId,
      version: snapshot.version,
      saved_at: snapshot.savedAt,
      payload: snapshot,
    });

    if (error) {
      throw new Error(`Failed to save engine snapshot: ${error.message}`);
    }
  }

  async quarantine(record: QuarantinedRecord): Promise<void> {
    const { error } = await this.supabase.from('engine_quarantine').insert({
      snapshot_id: this.snapshotId,
      kind: record.kind,
      reason: record.reason,
      payload: record.payload,
      quarantined_at: record.quarantinedAt.toISOString(),
    });

    if (error) {
      throw new Error(`Failed to quarantine ${record.kind} record: ${error.message}`);
    }
  }
}
