/**
 * File Snapshot Repository - JSON snapshot and NDJSON quarantine under STATE_DIR.
 *
 * The snapshot is written to a temporary file and renamed over the previous
 * one, so a crash mid-write leaves the last complete snapshot in place.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import type { SerializedSnapshot, SnapshotRepository } from '../interfaces/repository.interface';
import type { QuarantinedRecord, RawSnapshot } from '../types/execution.types';
import { parseRawSnapshot } from '../schemas/snapshot.schema';
import { CorruptPersistedEntryError } from '../errors/execution-errors';
import { getComponentLogger } from '../../config/logger';

export const SNAPSHOT_FILE = 'engine-snapshot.json';
export const QUARANTINE_FILE = 'quarantine.ndjson';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSnapshotRepository implements SnapshotRepository {
  private readonly logger = getComponentLogger('FileSnapshotRepository');
  private readonly snapshotPath: string;
  private readonly quarantinePath: string;

  constructor(private readonly stateDir: string) {
    this.snapshotPath = path.join(stateDir, SNAPSHOT_FILE);
    this.quarantinePath = path.join(stateDir, QUARANTINE_FILE);
  }

  async load(): Promise<RawSnapshot | null> {
    let text: string;
    try {
      text = await readFile(this.snapshotPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info({ path: this.snapshotPath }, 'No snapshot found, starting fresh');
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new CorruptPersistedEntryError('snapshot', `unreadable JSON in ${this.snapshotPath}`, {
        symbol: null,
        cause: error,
      });
    }

    const parsed = parseRawSnapshot(json);
    if (!parsed.success) {
      throw new CorruptPersistedEntryError('snapshot', parsed.error, { symbol: null });
    }
    return parsed.data;
  }

  async save(snapshot: SerializedSnapshot): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });
    // One temp file per write: concurrent writers never rename each other's file
    const tempPath = `${this.snapshotPath}.${randomUUID()}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
    await rename(tempPath, this.snapshotPath);
  }

  async quarantine(record: QuarantinedRecord): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });
    await appendFile(this.quarantinePath, `${JSON.stringify(record)}\n`, 'utf8');
  }
}
