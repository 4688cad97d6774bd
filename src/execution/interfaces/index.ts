/**
 * Execution Engine Interfaces Export
 */

export type { ExecutionAdapter, VenueResult } from './execution-adapter.interface';
export type { Clock } from './clock.interface';
export type {
  InboxMessage,
  InboxOutcome,
  SerializedSnapshot,
  SignalInboxRepository,
  SnapshotRepository,
  TradeEventRepository,
} from './repository.interface';
