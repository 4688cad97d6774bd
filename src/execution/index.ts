/**
 * Execution Engine - Main Export
 *
 * Turns trade signals into venue orders, manages the open positions through
 * their exits and enforces the account drawdown limits.
 */

// Core Services
export {
  ExecutionEngineService,
  type ExecutionEngineDependencies,
  type EngineStatus,
  type RecoveryReport,
  type TickReport,
} from './services/execution-engine.service';
export { EntryQueueService, validateSignal } from './services/entry-queue.service';
export { FillEngineService, takeProfitLevels, type FillPlan, type FillRequest } from './services/fill-engine.service';
export { PositionManagerService, type PositionUpdate, type CloseAllResult } from './services/position-manager.service';
export { DrawdownGuardService, drawdownFraction } from './services/drawdown-guard.service';
export {
  SessionGuardService,
  openRMultiple,
  type WeekendDecision,
  type WeekendReview,
} from './services/session-guard.service';
export { ReconciliationService, type ReconciliationResult } from './services/reconciliation.service';
export { StateStoreService, serializeSnapshot, type RestoreSummary } from './services/state-store.service';
export { EngineStateService } from './services/engine-state.service';
export { AccountStateService, createInitialAccountState } from './services/account-state.service';
export { TradeEventLoggerService } from './services/trade-event-logger.service';
export { ProximityClassifierService, type ProximityDecision } from './services/proximity-classifier.service';
export { RiskScalingService, type RiskScalingInputs, type RiskScalingResult } from './services/risk-scaling.service';
export {
  PositionSizingService,
  type PositionSizingParams,
  type PositionSizingResult,
} from './services/position-sizing.service';
export { SymbolSpecService } from './services/symbol-spec.service';
export { SymbolLockService } from './services/symbol-lock.service';
export { SystemClock, ManualClock } from './services/clock.service';
export {
  SignalInboxService,
  type InboxDrainReport,
  type SignalSink,
} from './services/signal-inbox.service';

// Venue Adapters
export { BaseExecutionAdapter } from './adapters/base-execution.adapter';
export {
  PaperExecutionAdapter,
  type PaperFault,
  type PaperQuoteInput,
  type PaperTradingConfig,
} from './adapters/paper-execution.adapter';
export { RestExecutionAdapter, type RestAdapterConfig } from './adapters/rest-execution.adapter';
export { ResilientExecutionGateway } from './adapters/resilient-execution.gateway';
export { AdapterFactory, type AdapterFactoryConfig, type CreatedAdapter } from './adapters/adapter-factory';

// Persistence
export * from './repositories';

// Interfaces
export * from './interfaces';

// Errors
export * from './errors/execution-errors';

// Types
export * from './types/execution.types';
export * from './types/result';
