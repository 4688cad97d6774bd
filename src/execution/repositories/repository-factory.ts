/**
 * Repository Factory - Picks the persistence back end named by SNAPSHOT_BACKEND.
 * The signal inbox lives in the same back end.
 */

import type {
  SignalInboxRepository,
  SnapshotRepository,
  TradeEventRepository,
} from '../interfaces/repository.interface';
import type { EnvironmentConfig } from '../../config/env';
import { getSupabaseClient } from '../../config/supabase';
import { getComponentLogger } from '../../config/logger';
import { FileSignalInboxRepository } from './file-signal-inbox.repository';
import { FileSnapshotRepository } from './file-snapshot.repository';
import { FileTradeEventRepository } from './file-trade-event.repository';
import {
  MemorySignalInboxRepository,
  MemorySnapshotRepository,
  MemoryTradeEventRepository,
} from './memory.repository';
import { SupabaseSignalInboxRepository } from './supabase-signal-inbox.repository';
import { SupabaseSnapshotRepository } from './supabase-snapshot.repository';
import { SupabaseTradeEventRepository } from './supabase-trade-event.repository';

export interface EngineRepositories {
  snapshots: SnapshotRepository;
  events: TradeEventRepository;
  inbox: SignalInboxRepository;
}

export function createRepositories(
  env: Pick<EnvironmentConfig, 'SNAPSHOT_BACKEND' | 'STATE_DIR'>
): EngineRepositories {
  getComponentLogger('RepositoryFactory').info(
    { backend: env.SNAPSHOT_BACKEND, stateDir: env.STATE_DIR },
    'Creating persistence repositories'
  );

  switch (env.SNAPSHOT_BACKEND) {
    case 'file':
      return {
        snapshots: new FileSnapshotRepository(env.STATE_DIR),
        events: new FileTradeEventRepository(env.STATE_DIR),
        inbox: new FileSignalInboxRepository(env.STATE_DIR),
      };

    case 'supabase': {
      const client = getSupabaseClient();
      return {
        snapshots: new SupabaseSnapshotRepository(client),
        events: new SupabaseTradeEventRepository(client),
        inbox: new SupabaseSignalInboxRepository(client),
      };
    }

    case 'memory':
      return {
        snapshots: new MemorySnapshotRepository(),
        events: new MemoryTradeEventRepository(),
        inbox: new MemorySignalInboxRepository(),
      };
  }
}
