/**
 * Snapshot Schemas - Validation of persisted records. Each record is parsed
 * on its own so a single bad record can be quarantined without losing the rest.
 */

import { z } from 'zod';
import type {
  AccountState,
  GuardState,
  Position,
  QueuedEntry,
  RawSnapshot,
  Signal,
  TradeEvent,
} from '../types/execution.types';
import { err, ok, type Result } from '../types/result';

const directionSchema = z.enum(['LONG', 'SHORT']);
const finite = z.number().finite();
const positive = finite.positive();

const takeProfitSpecSchema = z.object({
  rMultiple: positive,
  closeFraction: positive.max(1),
});

export const signalSchema = z
  .object({
    id: z.string().min(1),
    symbol: z.string().min(1),
    direction: directionSchema,
    entryPrice: positive,
    stopPrice: positive,
    takeProfits: z.array(takeProfitSpecSchema),
    quality: finite,
    generatedAt: z.coerce.date(),
  })
  .refine((signal) => signal.entryPrice !== signal.stopPrice, {
    message: 'entryPrice must differ from stopPrice',
  });

const orderHandleSchema = z.object({
  orderId: z.string().min(1),
  clientOrderId: z.string().min(1),
});

export const queuedEntrySchema = z.object({
  id: z.string().min(1),
  signal: signalSchema,
  queuedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  state: z.enum(['AWAITING_PROXIMITY', 'PENDING', 'FILLED', 'EXPIRED', 'CANCELLED']),
  orderHandle: orderHandleSchema.optional(),
  plannedSize: positive.optional(),
  limitPlacedAt: z.coerce.date().optional(),
  spreadRetry: z
    .object({
      since: z.coerce.date(),
      attempts: z.number().int().nonnegative(),
      lastSpreadPoints: finite,
    })
    .optional(),
  inFlight: z
    .object({
      kind: z.enum(['MARKET', 'LIMIT']),
      clientOrderId: z.string().min(1),
      size: positive,
      price: positive.optional(),
      requestedAt: z.coerce.date(),
    })
    .optional(),
  closedReason: z
    .enum([
      'FILLED',
      'MAX_WAIT',
      'RUNAWAY',
      'SPREAD_TIMEOUT',
      'STOP_BREACHED',
      'ORDER_EXPIRED',
      'REJECTED',
      'RISK_REFUSED',
      'VENUE_CANCELLED',
      'CLOSE_ALL',
      'STALE',
    ])
    .optional(),
});

export const positionSchema = z
  .object({
    id: z.string().min(1),
    entryId: z.string().nullable(),
    symbol: z.string().min(1),
    direction: directionSchema,
    entryPrice: positive,
    originalSize: positive,
    remainingSize: finite.nonnegative(),
    initialStop: positive.nullable(),
    currentStop: positive.nullable(),
    riskAmountAtFill: finite.nonnegative(),
    levels: z.array(
      takeProfitSpecSchema.extend({
        targetPrice: positive,
        hit: z.boolean(),
      })
    ),
    openedAt: z.coerce.date(),
    realizedPnl: finite,
    positionHandle: z.string().min(1),
    progressiveTrailApplied: z.boolean(),
    tracking: z.enum(['FULL', 'DEGRADED']),
    inFlightClose: z
      .object({
        clientOrderId: z.string().min(1),
        size: positive,
        levelIndex: z.number().int().nonnegative().nullable(),
        reason: z.enum(['STOP', 'FINAL_TARGET', 'CLOSE_ALL', 'WEEKEND', 'EXTERNAL']).optional(),
        requestedAt: z.coerce.date(),
      })
      .optional(),
    lastPrice: positive.optional(),
  })
  .refine((position) => position.remainingSize <= position.originalSize + 1e-9, {
    message: 'remainingSize exceeds originalSize',
  });

export const accountStateSchema = z.object({
  initialBalance: positive,
  balance: finite,
  equity: finite,
  peakEquity: finite,
  dayStartBaseline: positive,
  lastRolloverDay: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  haltedUntil: z.coerce.date().nullable(),
  stoppedOut: z.boolean(),
  winStreak: z.number().int().nonnegative(),
  lossStreak: z.number().int().nonnegative(),
  tradesToday: z.number().int().nonnegative(),
});

export const guardStateSchema = z.object({
  totalTier: z.enum(['NORMAL', 'WARNING', 'EMERGENCY', 'STOP_OUT']),
  dailyTier: z.enum(['NORMAL', 'WARNING', 'REDUCE', 'HALT']),
});

export const rawSnapshotSchema = z.object({
  version: z.unknown(),
  savedAt: z.unknown(),
  account: z.unknown(),
  guard: z.unknown(),
  entries: z.array(z.unknown()),
  positions: z.array(z.unknown()),
});

export const tradeEventSchema = z.object({
  id: z.string().min(1),
  timestamp: z.coerce.date(),
  type: z.enum([
    'ENTRY_QUEUED',
    'ENTRY_REJECTED',
    'ENTRY_SPREAD_BLOCKED',
    'ENTRY_PROMOTED',
    'ENTRY_FILLED',
    'ENTRY_EXPIRED',
    'ENTRY_CANCELLED',
    'POSITION_OPENED',
    'POSITION_RESIZED',
    'PARTIAL_CLOSE',
    'STOP_MOVED',
    'POSITION_CLOSED',
    'POSITION_ADOPTED',
    'POSITION_DISCARDED',
    'TIER_CHANGED',
    'DAY_ROLLOVER',
    'CLOSE_ALL',
    'WEEKEND_REVIEW',
    'RECORD_QUARANTINED',
  ]),
  symbol: z.string().nullable(),
  entityId: z.string().nullable(),
  before: z.record(z.unknown()).nullable(),
  after: z.record(z.unknown()).nullable(),
  message: z.string().optional(),
});

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): Result<T, string> {
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(formatZodError(parsed.error));
}

export function parseRawSnapshot(value: unknown): Result<RawSnapshot, string> {
  return parseWith(rawSnapshotSchema, value);
}

export function parseTradeEvent(value: unknown): Result<TradeEvent, string> {
  return parseWith(tradeEventSchema, value);
}

export function parseSignal(value: unknown): Result<Signal, string> {
  return parseWith(signalSchema, value);
}

export function parseQueuedEntry(value: unknown): Result<QueuedEntry, string> {
  return parseWith(queuedEntrySchema, value);
}

export function parsePosition(value: unknown): Result<Position, string> {
  return parseWith(positionSchema, value);
}

export function parseAccountState(value: unknown): Result<AccountState, string> {
  return parseWith(accountStateSchema, value);
}

export function parseGuardState(value: unknown): Result<GuardState, string> {
  return parseWith(guardStateSchema, value);
}
