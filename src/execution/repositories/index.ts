export { createRepositories, type EngineRepositories } from './repository-factory';
export { FileSignalInboxRepository } from './file-signal-inbox.repository';
export { FileSnapshotRepository } from './file-snapshot.repository';
export { FileTradeEventRepository } from './file-trade-event.repository';
export {
  MemorySignalInboxRepository,
  MemorySnapshotRepository,
  MemoryTradeEventRepository,
} from './memory.repository';
export { SupabaseSignalInboxRepository } from './supabase-signal-inbox.repository';
export { SupabaseSnapshotRepository } from './supabase-snapshot.repository';
export { SupabaseTradeEventRepository } from './supabase-trade-event.repository';
