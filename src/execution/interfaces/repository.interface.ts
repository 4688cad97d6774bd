/**
 * Persistence Interfaces - Snapshot and event log storage
 */

import type {
  QuarantinedRecord,
  RawSnapshot,
  TradeEvent,
  TradeEventFilter,
} from '../types/execution.types';

export interface SerializedSnapshot {
  version: number;
  savedAt: string;
  account: unknown;
  guard: unknown;
  entries: unknown[];
  positions: unknown[];
}

export interface SnapshotRepository {
  load(): Promise<RawSnapshot | null>;
  save(snapshot: SerializedSnapshot): Promise<void>;
  quarantine(record: QuarantinedRecord): Promise<void>;
}

export interface TradeEventRepository {
  append(event: TradeEvent): Promise<void>;
  list(filter?: TradeEventFilter): Promise<TradeEvent[]>;
}

/**
 * A signal waiting in the inbox. readError is set when the stored payload
 * could not be read at all.
 */
export interface InboxMessage {
  id: string;
  payload: unknown;
  readError?: string;
}

export type InboxOutcome =
  | { status: 'QUEUED'; entryId: string }
  | { status: 'REJECTED'; reason: string };

export interface SignalInboxRepository {
  pending(): Promise<InboxMessage[]>;
  settle(id: string, outcome: InboxOutcome, settledAt: Date): Promise<void>;
}
