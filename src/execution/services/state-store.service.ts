/**
 * State Store Service - Writes a versioned snapshot after every mutation and
 * restores it record by record on startup.
 *
 * A record that fails validation is quarantined and skipped; everything else
 * in the snapshot still loads.
 */

import type { SerializedSnapshot, SnapshotRepository } from '../interfaces/repository.interface';
import type { Clock } from '../interfaces/clock.interface';
import type {
  AccountState,
  EngineSnapshot,
  GuardState,
  Position,
  QuarantinedRecord,
  QueuedEntry,
} from '../types/execution.types';
import { SNAPSHOT_VERSION } from '../types/execution.types';
import type { AccountStateService } from './account-state.service';
import type { EngineStateService } from './engine-state.service';
import { initialGuardState, isActiveEntry } from './engine-state.service';
import type { SymbolLockService } from './symbol-lock.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import {
  parseAccountState,
  parseGuardState,
  parsePosition,
  parseQueuedEntry,
} from '../schemas/snapshot.schema';
import { CorruptPersistedEntryError, describeError } from '../errors/execution-errors';
import { getComponentLogger } from '../../config/logger';

export interface RestoreSummary {
  found: boolean;
  entries: number;
  positions: number;
  quarantined: number;
  accountRestored: boolean;
}

function toJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

export function serializeSnapshot(snapshot: EngineSnapshot): SerializedSnapshot {
  return {
    version: snapshot.version,
    savedAt: snapshot.savedAt.toISOString(),
    account: toJson(snapshot.account),
    guard: toJson(snapshot.guard),
    entries: snapshot.entries.map(toJson),
    positions: snapshot.positions.map(toJson),
  };
}

export class StateStoreService {
  private readonly logger = getComponentLogger('StateStore');
  private writeLock: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: SnapshotRepository,
    private readonly state: EngineStateService,
    private readonly account: AccountStateService,
    private readonly symbolLocks: SymbolLockService,
    private readonly events: TradeEventLoggerService,
    private readonly clock: Clock
  ) {}

  buildSnapshot(): EngineSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: this.clock.now(),
      account: this.account.snapshot(),
      guard: this.state.guardState,
      entries: this.state.activeEntries(),
      positions: this.state.openPositions(),
    };
  }

  /**
   * Durable snapshot write. Writes run one at a time, each capturing the state
   * when its turn comes, so the last write always holds the latest state.
   * A failed write is logged and reported as false; the next mutation writes
   * the full state again.
   */
  async persist(reason: string): Promise<boolean> {
    const previous = this.writeLock;
    let release: () => void = () => {};

    this.writeLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await this.write(reason);
    } finally {
      release();
    }
  }

  private async write(reason: string): Promise<boolean> {
    const snapshot = this.buildSnapshot();
    try {
      await this.repository.save(serializeSnapshot(snapshot));
      this.logger.debug(
        { reason, entries: snapshot.entries.length, positions: snapshot.positions.length },
        'Snapshot persisted'
      );
      return true;
    } catch (error) {
      this.logger.error({ reason, error: describeError(error) }, 'Failed to persist snapshot');
      return false;
    }
  }

  async restore(): Promise<RestoreSummary> {
    const raw = await this.repository.load();
    if (!raw) {
      return { found: false, entries: 0, positions: 0, quarantined: 0, accountRestored: false };
    }

    if (raw.version !== SNAPSHOT_VERSION) {
      this.logger.warn({ version: raw.version, expected: SNAPSHOT_VERSION }, 'Snapshot version mismatch');
    }

    let quarantined = 0;
    const reject = async (kind: QuarantinedRecord['kind'], reason: string, payload: unknown): Promise<void> => {
      quarantined += 1;
      await this.quarantine(kind, reason, payload);
    };

    let account: AccountState | null = null;
    const parsedAccount = parseAccountState(raw.account);
    if (parsedAccount.success) {
      account = parsedAccount.data;
    } else {
      await reject('account', parsedAccount.error, raw.account);
    }

    let guard: GuardState = initialGuardState();
    const parsedGuard = parseGuardState(raw.guard);
    if (parsedGuard.success) {
      guard = parsedGuard.data;
    } else {
      await reject('guard', parsedGuard.error, raw.guard);
    }

    const entries: QueuedEntry[] = [];
    const claimedSymbols = new Set<string>();
    for (const payload of raw.entries) {
      const parsed = parseQueuedEntry(payload);
      if (!parsed.success) {
        await reject('entry', parsed.error, payload);
        continue;
      }
      const entry = parsed.data;
      if (!isActiveEntry(entry)) {
        continue;
      }
      if (claimedSymbols.has(entry.signal.symbol)) {
        await reject('entry', `second active entry for ${entry.signal.symbol}`, payload);
        continue;
      }
      claimedSymbols.add(entry.signal.symbol);
      entries.push(entry);
    }

    const positions: Position[] = [];
    for (const payload of raw.positions) {
      const parsed = parsePosition(payload);
      if (parsed.success) {
        positions.push(parsed.data);
      } else {
        await reject('position', parsed.error, payload);
      }
    }

    this.state.replace(entries, positions, guard);
    this.symbolLocks.reset();
    entries.forEach((entry) => this.symbolLocks.claim(entry.signal.symbol, entry.id));
    if (account) {
      await this.account.restore(account);
    } else {
      this.logger.warn('Account record unusable, keeping configured initial account state');
    }

    const summary: RestoreSummary = {
      found: true,
      entries: entries.length,
      positions: positions.length,
      quarantined,
      accountRestored: account !== null,
    };
    this.logger.info(summary, 'Snapshot restored');
    return summary;
  }

  private async quarantine(kind: QuarantinedRecord['kind'], reason: string, payload: unknown): Promise<void> {
    const entityId = this.recordId(payload);
    const error = new CorruptPersistedEntryError(kind, reason, { symbol: this.recordSymbol(payload), entityId });
    this.logger.error(error.toLogObject(), 'Quarantining corrupt snapshot record');

    try {
      await this.repository.quarantine({ kind, reason, payload, quarantinedAt: this.clock.now() });
    } catch (writeError) {
      this.logger.error({ kind, entityId, error: describeError(writeError) }, 'Failed to write quarantined record');
    }

    await this.events.record('RECORD_QUARANTINED', error.symbol, entityId ?? null, null, { kind, reason });
  }

  private recordId(payload: unknown): string | undefined {
    if (typeof payload === 'object' && payload !== null && 'id' in payload && typeof payload.id === 'string') {
      return payload.id;
    }
    return undefined;
  }

  private recordSymbol(payload: unknown): string | null {
    if (typeof payload !== 'object' || payload === null) {
      return null;
    }
    if ('symbol' in payload && typeof payload.symbol === 'string') {
      return payload.symbol;
    }
    if ('signal' in payload) {
      return this.recordSymbol(payload.signal);
    }
    return null;
  }
}
