/**
 * Memory Repositories - In-process snapshot, event and signal inbox storage for tests and backtests
 */

import type {
  InboxMessage,
  InboxOutcome,
  SerializedSnapshot,
  SignalInboxRepository,
  SnapshotRepository,
  TradeEventRepository,
} from '../interfaces/repository.interface';
import type {
  QuarantinedRecord,
  RawSnapshot,
  TradeEvent,
  TradeEventFilter,
} from '../types/execution.types';
import { matchesEventFilter } from './event-filter';

function cloneJson(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}

export class MemorySnapshotRepository implements SnapshotRepository {
  private stored: RawSnapshot | null = null;
  private readonly quarantined: QuarantinedRecord[] = [];
  saveCount = 0;

  async load(): Promise<RawSnapshot | null> {
    if (!this.stored) {
      return null;
    }
    return {
      version: this.stored.version,
      savedAt: this.stored.savedAt,
      account: cloneJson(this.stored.account),
      guard: cloneJson(this.stored.guard),
      entries: this.stored.entries.map(cloneJson),
      positions: this.stored.positions.map(cloneJson),
    };
  }

  async save(snapshot: SerializedSnapshot): Promise<void> {
    this.saveCount += 1;
    this.stored = {
      version: snapshot.version,
      savedAt: snapshot.savedAt,
      account: cloneJson(snapshot.account),
      guard: cloneJson(snapshot.guard),
      entries: snapshot.entries.map(cloneJson),
      positions: snapshot.positions.map(cloneJson),
    };
  }

  async quarantine(record: QuarantinedRecord): Promise<void> {
    this.quarantined.push(record);
  }

  /**
   * Replaces the stored snapshot with arbitrary content, e.g. a hand-corrupted one.
   */
  setRaw(raw: RawSnapshot | null): void {
    this.stored = raw;
  }

  latest(): RawSnapshot | null {
    return this.stored;
  }

  quarantinedRecords(): QuarantinedRecord[] {
    return [...this.quarantined];
  }
}

export class MemoryTradeEventRepository implements TradeEventRepository {
  private readonly events: TradeEvent[] = [];

  async append(event: TradeEvent): Promise<void> {
    this.events.push(event);
  }

  async list(filter?: TradeEventFilter): Promise<TradeEvent[]> {
    return this.events.filter((event) => matchesEventFilter(event, filter));
  }

  all(): TradeEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class MemorySignalInboxRepository implements SignalInboxRepository {
  private readonly waiting: InboxMessage[] = [];
  private readonly settled = new Map<string, InboxOutcome>();
  private sequence = 0;

  push(payload: unknown): string {
    this.sequence += 1;
    const id = `signal-${this.sequence}`;
    this.waiting.push({ id, payload: cloneJson(payload) });
    return id;
  }

  async pending(): Promise<InboxMessage[]> {
    return [...this.waiting];
  }

  async settle(id: string, outcome: InboxOutcome): Promise<void> {
    const index = this.waiting.findIndex((message) => message.id === id);
    if (index >= 0) {
      this.waiting.splice(index, 1);
    }
    this.settled.set(id, outcome);
  }

  outcome(id: string): InboxOutcome | undefined {
    return this.settled.get(id);
  }
}
