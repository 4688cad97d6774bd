/**
 * Execution Engine Service - Main orchestrator: wires the services, runs the
 * tick loop and the startup recovery.
 *
 * Per tick: quotes -> mark equity -> drawdown guard (rollover, tiers,
 * close-all) -> weekend review -> entry queue -> position manager -> persist.
 */

import type { EngineConfig } from '../../config/engine.config';
import type { ExecutionAdapter } from '../interfaces/execution-adapter.interface';
import type { Clock } from '../interfaces/clock.interface';
import type { SnapshotRepository, TradeEventRepository } from '../interfaces/repository.interface';
import type {
  AccountState,
  ClosedTradeRecord,
  GuardDecision,
  GuardState,
  Position,
  QueuedEntry,
  Quote,
  Signal,
} from '../types/execution.types';
import type { InvalidSignalError } from '../errors/execution-errors';
import type { Result } from '../types/result';
import type { Sleep } from '../utils/retry';
import { AccountStateService, createInitialAccountState } from './account-state.service';
import { DrawdownGuardService } from './drawdown-guard.service';
import { EngineStateService } from './engine-state.service';
import { EntryQueueService } from './entry-queue.service';
import { FillEngineService } from './fill-engine.service';
import { PositionManagerService } from './position-manager.service';
import { PositionSizingService } from './position-sizing.service';
import { ProximityClassifierService } from './proximity-classifier.service';
import { ReconciliationService, type ReconciliationResult } from './reconciliation.service';
import { RiskScalingService } from './risk-scaling.service';
import { SessionGuardService } from './session-guard.service';
import { StateStoreService, type RestoreSummary } from './state-store.service';
import { SymbolLockService } from './symbol-lock.service';
import { SymbolSpecService } from './symbol-spec.service';
import { TradeEventLoggerService } from './trade-event-logger.service';
import { getComponentLogger, logError } from '../../config/logger';

export interface ExecutionEngineDependencies {
  config: EngineConfig;
  clock: Clock;
  gateway: ExecutionAdapter;
  snapshots: SnapshotRepository;
  events: TradeEventRepository;
  symbolSpecs?: SymbolSpecService;
  // Backoff sleep of partial-close retries
  sleep?: Sleep;
}

export interface RecoveryReport {
  restore: RestoreSummary;
  reconciliation: ReconciliationResult;
  staleEntriesExpired: number;
}

export interface TickReport {
  at: Date;
  decision: GuardDecision;
  quotes: number;
  activeEntries: number;
  openPositions: number;
}

export interface EngineStatus {
  running: boolean;
  account: AccountState;
  guard: GuardState;
  entries: QueuedEntry[];
  positions: Position[];
}

export class ExecutionEngineService {
  private readonly logger = getComponentLogger('ExecutionEngine');

  readonly account: AccountStateService;
  readonly state: EngineStateService;
  readonly symbolLocks: SymbolLockService;
  readonly symbolSpecs: SymbolSpecService;
  readonly eventLogger: TradeEventLoggerService;
  readonly store: StateStoreService;
  readonly guard: DrawdownGuardService;
  readonly session: SessionGuardService;
  readonly fillEngine: FillEngineService;
  readonly entryQueue: EntryQueueService;
  readonly positionManager: PositionManagerService;
  readonly reconciliation: ReconciliationService;

  private readonly config: EngineConfig;
  private readonly clock: Clock;
  private readonly gateway: ExecutionAdapter;
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentTick: Promise<TickReport | null> | null = null;
  private tickInProgress = false;
  private closeAllPending: string | null = null;

  constructor(deps: ExecutionEngineDependencies) {
    this.config = deps.config;
    this.clock = deps.clock;
    this.gateway = deps.gateway;

    const { config, clock, gateway } = deps;
    this.account = new AccountStateService(
      createInitialAccountState(config.account.initialBalance, clock.now(), config.drawdown.dayBoundaryUtcOffsetMinutes)
    );
    this.state = new EngineStateService();
    this.symbolLocks = new SymbolLockService();
    this.symbolSpecs = deps.symbolSpecs ?? new SymbolSpecService();
    this.eventLogger = new TradeEventLoggerService(deps.events, clock);
    this.store = new StateStoreService(deps.snapshots, this.state, this.account, this.symbolLocks, this.eventLogger, clock);
    this.guard = new DrawdownGuardService(config.drawdown, this.account, this.state, this.store, this.eventLogger);
    this.session = new SessionGuardService(config.session, this.symbolSpecs);

    this.fillEngine = new FillEngineService(
      config.risk,
      gateway,
      this.account,
      this.state,
      this.guard,
      this.session,
      new RiskScalingService(config.risk),
      new PositionSizingService(this.symbolSpecs),
      this.symbolSpecs,
      this.symbolLocks,
      this.store,
      this.eventLogger
    );

    this.entryQueue = new EntryQueueService(
      config.entry,
      gateway,
      this.state,
      new ProximityClassifierService(config.entry),
      this.fillEngine,
      this.symbolSpecs,
      this.symbolLocks,
      this.store,
      this.eventLogger
    );

    this.positionManager = new PositionManagerService(
      config.exits,
      gateway,
      this.account,
      this.state,
      this.symbolSpecs,
      this.symbolLocks,
      this.store,
      this.eventLogger,
      deps.sleep
    );

    this.reconciliation = new ReconciliationService(
      gateway,
      this.state,
      this.entryQueue,
      this.symbolSpecs,
      this.store,
      this.eventLogger
    );

    this.logger.info(
      { initialBalance: config.account.initialBalance, tickIntervalMs: config.scheduler.tickIntervalMs },
      'Execution engine initialized'
    );
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Restores the snapshot, reconciles with the venue, expires stale entries,
   * then schedules the tick.
   */
  async start(): Promise<RecoveryReport> {
    if (this.timer) {
      throw new Error('Execution engine already started');
    }

    const report = await this.recover();
    this.timer = setInterval(() => {
      this.currentTick = this.tick().catch((error: unknown) => {
        if (error instanceof Error) {
          logError(error, { operation: 'tick' });
        } else {
          this.logger.error({ error }, 'Tick failed');
        }
        return null;
      });
    }, this.config.scheduler.tickIntervalMs);

    this.logger.info({ tickIntervalMs: this.config.scheduler.tickIntervalMs }, 'Execution engine started');
    return report;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.currentTick) {
      await this.currentTick;
      this.currentTick = null;
    }
    await this.store.persist('engine stopped');
    this.logger.info('Execution engine stopped');
  }

  async recover(): Promise<RecoveryReport> {
    const now = this.clock.now();
    const restore = await this.store.restore();
    const reconciliation = await this.reconciliation.reconcile(now);
    const staleEntriesExpired = await this.entryQueue.cleanupStale(now);

    this.logger.info(
      { restore, reconciliation, staleEntriesExpired },
      'Startup recovery complete'
    );
    return { restore, reconciliation, staleEntriesExpired };
  }

  submitSignal(signal: Signal): Promise<Result<QueuedEntry, InvalidSignalError>> {
    return this.entryQueue.enqueue(signal, this.clock.now());
  }

  /**
   * One evaluation pass. Returns null when the previous tick is still running.
   */
  async tick(): Promise<TickReport | null> {
    if (this.tickInProgress) {
      this.logger.warn('Previous tick still running, tick skipped');
      return null;
    }

    this.tickInProgress = true;
    try {
      const now = this.clock.now();
      const quotes = await this.refreshQuotes();
      await this.account.markEquity(this.positionManager.floatingPnl(quotes));

      const decision = await this.guard.evaluate(now);
      const closeAllReason = decision.closeAllReason ?? this.closeAllPending;
      if (closeAllReason) {
        await this.entryQueue.cancelPendingOrders(closeAllReason, now);
        const outcome = await this.positionManager.closeAll(closeAllReason, now);
        this.closeAllPending = outcome.failed > 0 ? closeAllReason : null;
        await this.account.markEquity(this.positionManager.floatingPnl(quotes));
      }

      if (await this.reviewWeekend(quotes, now, decision.snapshot.dailyDdPct)) {
        await this.account.markEquity(this.positionManager.floatingPnl(quotes));
      }

      await this.entryQueue.process(quotes, now, decision.tradingAllowed);
      await this.positionManager.updateAll(quotes, now);
      await this.account.markEquity(this.positionManager.floatingPnl(quotes));
      await this.store.persist('tick');

      return {
        at: now,
        decision,
        quotes: quotes.size,
        activeEntries: this.state.activeEntries().length,
        openPositions: this.state.openPositions().length,
      };
    } finally {
      this.tickInProgress = false;
    }
  }

  /**
   * Runs the Friday review when one is due. True when positions were closed.
   */
  private async reviewWeekend(quotes: ReadonlyMap<string, Quote>, now: Date, dailyDdPct: number): Promise<boolean> {
    const review = this.session.weekendReview(this.state.openPositions(), quotes, now, dailyDdPct);
    if (!review) {
      return false;
    }

    const toClose = review.decisions.filter((item) => item.action === 'CLOSE');
    this.logger.warn(
      { week: review.week, flatten: review.flatten, closing: toClose.length, holding: review.decisions.length - toClose.length },
      'Weekend review'
    );
    await this.eventLogger.record(
      'WEEKEND_REVIEW',
      null,
      null,
      null,
      { week: review.week, flatten: review.flatten, decisions: review.decisions },
      review.flatten ? 'Daily drawdown at the Friday close' : undefined
    );

    const outcome = await this.positionManager.closePositions(
      toClose.map((item) => item.positionId),
      'WEEKEND',
      now
    );
    if (outcome.failed === 0) {
      this.session.completeReview(review);
    } else {
      this.logger.error({ week: review.week, ...outcome }, 'Weekend review incomplete, retrying next tick');
    }
    return outcome.closed > 0;
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      account: this.account.snapshot(),
      guard: this.state.guardState,
      entries: this.state.activeEntries(),
      positions: this.state.openPositions(),
    };
  }

  closedTrades(): ClosedTradeRecord[] {
    return this.state.closedTradeRecords();
  }

  /**
   * Quotes for every symbol with an active entry or an open position. A
   * symbol whose quote fails is skipped this tick.
   */
  private async refreshQuotes(): Promise<Map<string, Quote>> {
    const symbols = new Set<string>([
      ...this.state.activeEntries().map((entry) => entry.signal.symbol),
      ...this.state.openPositions().map((position) => position.symbol),
    ]);

    const quotes = new Map<string, Quote>();
    for (const symbol of symbols) {
      const result = await this.gateway.currentPrice(symbol);
      if (result.success) {
        quotes.set(symbol, result.data);
      } else {
        this.logger.warn({ ...result.error.toLogObject() }, 'Quote unavailable, symbol skipped this tick');
      }
    }
    return quotes;
  }
}
