/**
 * Execution Types - Domain model for the order lifecycle and risk engine
 */

// Core enums and types
export type Direction = 'LONG' | 'SHORT';
export type OrderKind = 'MARKET' | 'LIMIT';

export type EntryState = 'AWAITING_PROXIMITY' | 'PENDING' | 'FILLED' | 'EXPIRED' | 'CANCELLED';

export const ACTIVE_ENTRY_STATES: readonly EntryState[] = ['AWAITING_PROXIMITY', 'PENDING'];

export type EntryCloseReason =
  | 'FILLED'
  | 'MAX_WAIT'
  | 'RUNAWAY'
  | 'SPREAD_TIMEOUT'
  | 'STOP_BREACHED'
  | 'ORDER_EXPIRED'
  | 'REJECTED'
  | 'RISK_REFUSED'
  | 'VENUE_CANCELLED'
  | 'CLOSE_ALL'
  | 'STALE';

export type ProximityAction = 'IMMEDIATE' | 'PROMOTE_TO_LIMIT' | 'KEEP' | 'EXPIRE';

export type TrackingMode = 'FULL' | 'DEGRADED';
export type ExitReason = 'STOP' | 'FINAL_TARGET' | 'CLOSE_ALL' | 'WEEKEND' | 'EXTERNAL';

export type TotalDrawdownTier = 'NORMAL' | 'WARNING' | 'EMERGENCY' | 'STOP_OUT';
export type DailyDrawdownTier = 'NORMAL' | 'WARNING' | 'REDUCE' | 'HALT';

export type VenueOrderState = 'PENDING' | 'FILLED' | 'CANCELLED' | 'REJECTED' | 'EXPIRED';

// Signal (produced upstream, never mutated)
export interface TakeProfitSpec {
  rMultiple: number;
  closeFraction: number;
}

export interface Signal {
  id: string;
  symbol: string;
  direction: Direction;
  entryPrice: number;
  stopPrice: number;
  takeProfits: TakeProfitSpec[];
  quality: number;
  generatedAt: Date;
}

// Venue-facing types
export interface Quote {
  symbol: string;
  bid: number;
  ask: number;
  high: number;
  low: number;
  timestamp: Date;
}

export interface OrderHandle {
  orderId: string;
  clientOrderId: string;
}

export interface MarketOrderRequest {
  symbol: string;
  direction: Direction;
  size: number;
  clientOrderId: string;
}

export interface LimitOrderRequest extends MarketOrderRequest {
  price: number;
}

export interface Fill {
  positionHandle: string;
  clientOrderId: string;
  price: number;
  size: number;
  timestamp: Date;
}

export interface OrderStatusReport {
  handle: OrderHandle;
  state: VenueOrderState;
  fill?: Fill;
}

export interface OrderLookup {
  clientOrderId: string;
  state: VenueOrderState;
  handle?: OrderHandle;
  fill?: Fill;
}

export interface BrokerPosition {
  positionHandle: string;
  symbol: string;
  direction: Direction;
  size: number;
  entryPrice: number;
  stopPrice: number | null;
  openedAt: Date;
}

// Queue
export interface SpreadRetryState {
  since: Date;
  attempts: number;
  lastSpreadPoints: number;
}

/**
 * An order sent to the venue whose outcome is not known yet (the call timed out).
 * Resolved on the next tick through lookupOrder before anything else is sent.
 */
export interface InFlightOrder {
  kind: OrderKind;
  clientOrderId: string;
  size: number;
  price?: number;
  requestedAt: Date;
}

export interface QueuedEntry {
  id: string;
  signal: Signal;
  queuedAt: Date;
  updatedAt: Date;
  state: EntryState;
  orderHandle?: OrderHandle;
  plannedSize?: number;
  limitPlacedAt?: Date;
  spreadRetry?: SpreadRetryState;
  inFlight?: InFlightOrder;
  closedReason?: EntryCloseReason;
}

// Positions
export interface TakeProfitLevel extends TakeProfitSpec {
  targetPrice: number;
  hit: boolean;
}

export interface InFlightClose {
  clientOrderId: string;
  size: number;
  // null for a full close
  levelIndex: number | null;
  reason?: ExitReason;
  requestedAt: Date;
}

export interface Position {
  id: string;
  entryId: string | null;
  symbol: string;
  direction: Direction;
  entryPrice: number;
  originalSize: number;
  remainingSize: number;
  initialStop: number | null;
  currentStop: number | null;
  riskAmountAtFill: number;
  levels: TakeProfitLevel[];
  openedAt: Date;
  realizedPnl: number;
  positionHandle: string;
  progressiveTrailApplied: boolean;
  tracking: TrackingMode;
  inFlightClose?: InFlightClose;
  lastPrice?: number;
}

export interface ClosedTradeRecord {
  positionId: string;
  symbol: string;
  direction: Direction;
  entryPrice: number;
  exitPrice: number;
  exitReason: ExitReason;
  originalSize: number;
  realizedPnl: number;
  rMultiple: number | null;
  levelsHit: number;
  tracking: TrackingMode;
  openedAt: Date;
  closedAt: Date;
}

// Account and drawdown
export interface AccountState {
  readonly initialBalance: number;
  balance: number;
  equity: number;
  peakEquity: number;
  dayStartBaseline: number;
  lastRolloverDay: string | null;
  haltedUntil: Date | null;
  stoppedOut: boolean;
  winStreak: number;
  lossStreak: number;
  tradesToday: number;
}

export interface GuardState {
  totalTier: TotalDrawdownTier;
  dailyTier: DailyDrawdownTier;
}

export interface DrawdownSnapshot extends GuardState {
  totalDdPct: number;
  dailyDdPct: number;
}

export interface GuardDecision {
  snapshot: DrawdownSnapshot;
  closeAll: boolean;
  closeAllReason?: string;
  tradingAllowed: boolean;
  riskMultiplier: number;
  rolledOver: boolean;
}

// Contract specification per symbol
export interface SymbolSpec {
  symbol: string;
  pointSize: number;
  valuePerPoint: number;
  minSize: number;
  maxSize: number;
  sizeStep: number;
  maxSpreadPoints: number;
  // Symbols sharing a group count against one weekend holding limit
  correlationGroup?: string;
  // Trades through the weekend (crypto)
  continuousTrading: boolean;
}

// Event log
export type TradeEventType =
  | 'ENTRY_QUEUED'
  | 'ENTRY_REJECTED'
  | 'ENTRY_SPREAD_BLOCKED'
  | 'ENTRY_PROMOTED'
  | 'ENTRY_FILLED'
  | 'ENTRY_EXPIRED'
  | 'ENTRY_CANCELLED'
  | 'POSITION_OPENED'
  | 'POSITION_RESIZED'
  | 'PARTIAL_CLOSE'
  | 'STOP_MOVED'
  | 'POSITION_CLOSED'
  | 'POSITION_ADOPTED'
  | 'POSITION_DISCARDED'
  | 'TIER_CHANGED'
  | 'DAY_ROLLOVER'
  | 'CLOSE_ALL'
  | 'WEEKEND_REVIEW'
  | 'RECORD_QUARANTINED';

export type EventPayload = Record<string, unknown> | null;

export interface TradeEvent {
  id: string;
  timestamp: Date;
  type: TradeEventType;
  symbol: string | null;
  entityId: string | null;
  before: EventPayload;
  after: EventPayload;
  message?: string;
}

export interface TradeEventFilter {
  symbol?: string;
  type?: TradeEventType;
  since?: Date;
}

// Persistence
export const SNAPSHOT_VERSION = 1;

export interface EngineSnapshot {
  version: number;
  savedAt: Date;
  account: AccountState;
  guard: GuardState;
  entries: QueuedEntry[];
  positions: Position[];
}

/**
 * Snapshot as read back from storage, records not yet validated.
 */
export interface RawSnapshot {
  version?: unknown;
  savedAt?: unknown;
  account?: unknown;
  guard?: unknown;
  entries: unknown[];
  positions: unknown[];
}

export interface QuarantinedRecord {
  kind: 'entry' | 'position' | 'account' | 'guard';
  reason: string;
  payload: unknown;
  quarantinedAt: Date;
}
