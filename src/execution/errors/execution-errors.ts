/**
 * Execution Errors - Error taxonomy for the engine. Every error names the
 * symbol (and, where known, the entry or position) it belongs to.
 */

export enum ExecutionErrorType {
  TRANSIENT_EXEC_ERROR = 'TRANSIENT_EXEC_ERROR',
  REJECTED_ORDER = 'REJECTED_ORDER',
  RISK_SANITY_VIOLATION = 'RISK_SANITY_VIOLATION',
  DRAWDOWN_HALTED = 'DRAWDOWN_HALTED',
  ORDER_BLOCKED = 'ORDER_BLOCKED',
  CORRUPT_PERSISTED_ENTRY = 'CORRUPT_PERSISTED_ENTRY',
  INVALID_SIGNAL = 'INVALID_SIGNAL',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

export interface EngineErrorOptions {
  symbol: string | null;
  entityId?: string;
  cause?: unknown;
}

export abstract class EngineError extends Error {
  abstract readonly type: ExecutionErrorType;
  abstract readonly severity: ErrorSeverity;
  readonly symbol: string | null;
  readonly entityId?: string;

  constructor(message: string, options: EngineErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.symbol = options.symbol;
    this.entityId = options.entityId;
  }

  get retryable(): boolean {
    return false;
  }

  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      severity: this.severity,
      symbol: this.symbol,
      entityId: this.entityId,
      message: this.message,
    };
  }
}

/**
 * NOT_SENT: the request never left (connection refused, host not resolved).
 * Every other kind leaves the outcome of an order-creating call unknown.
 */
export type TransientKind = 'NOT_SENT' | 'TIMEOUT' | 'NETWORK' | 'UNAVAILABLE';

/**
 * Network failure, timeout or venue unavailability. The only retried error.
 */
export class TransientExecError extends EngineError {
  readonly type = ExecutionErrorType.TRANSIENT_EXEC_ERROR;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly kind: TransientKind;

  constructor(message: string, kind: TransientKind, options: EngineErrorOptions) {
    super(message, options);
    this.name = 'TransientExecError';
    this.kind = kind;
  }

  override get retryable(): boolean {
    return true;
  }

  /**
   * True when the request provably never reached the venue, so resending
   * an order-creating call cannot duplicate it.
   */
  get safeToResend(): boolean {
    return this.kind === 'NOT_SENT';
  }
}

export type RejectionCode =
  | 'INVALID_PRICE'
  | 'INVALID_SIZE'
  | 'INSUFFICIENT_MARGIN'
  | 'MARKET_CLOSED'
  | 'ORDER_NOT_FOUND'
  | 'POSITION_NOT_FOUND'
  | 'RISK_CAP'
  | 'UNKNOWN';

export class RejectedOrderError extends EngineError {
  readonly type = ExecutionErrorType.REJECTED_ORDER;
  readonly severity = ErrorSeverity.HIGH;
  readonly code: RejectionCode;

  constructor(message: string, code: RejectionCode, options: EngineErrorOptions) {
    super(message, options);
    this.name = 'RejectedOrderError';
    this.code = code;
  }
}

export class RiskSanityViolationError extends EngineError {
  readonly type = ExecutionErrorType.RISK_SANITY_VIOLATION;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly actualRisk: number;
  readonly allowedRisk: number;

  constructor(actualRisk: number, allowedRisk: number, options: EngineErrorOptions) {
    super(
      `Computed risk ${actualRisk.toFixed(2)} exceeds sanity limit ${allowedRisk.toFixed(2)}`,
      options
    );
    this.name = 'RiskSanityViolationError';
    this.actualRisk = actualRisk;
    this.allowedRisk = allowedRisk;
  }
}

export class DrawdownHaltedError extends EngineError {
  readonly type = ExecutionErrorType.DRAWDOWN_HALTED;
  readonly severity = ErrorSeverity.LOW;
  readonly reason: 'DAILY_HALT' | 'STOP_OUT';

  constructor(reason: 'DAILY_HALT' | 'STOP_OUT', options: EngineErrorOptions) {
    super(`New fills blocked: ${reason}`, options);
    this.name = 'DrawdownHaltedError';
    this.reason = reason;
  }
}

export type OrderBlockReason = 'MARKET_CLOSED' | 'PENDING_ORDER_CAP';

/**
 * A new order may not be sent right now. The entry keeps waiting.
 */
export class NewOrderBlockedError extends EngineError {
  readonly type = ExecutionErrorType.ORDER_BLOCKED;
  readonly severity = ErrorSeverity.LOW;
  readonly reason: OrderBlockReason;

  constructor(reason: OrderBlockReason, message: string, options: EngineErrorOptions) {
    super(message, options);
    this.name = 'NewOrderBlockedError';
    this.reason = reason;
  }
}

export class CorruptPersistedEntryError extends EngineError {
  readonly type = ExecutionErrorType.CORRUPT_PERSISTED_ENTRY;
  readonly severity = ErrorSeverity.HIGH;
  readonly recordKind: string;

  constructor(recordKind: string, message: string, options: EngineErrorOptions) {
    super(`Corrupt ${recordKind} record: ${message}`, options);
    this.name = 'CorruptPersistedEntryError';
    this.recordKind = recordKind;
  }
}

export class InvalidSignalError extends EngineError {
  readonly type = ExecutionErrorType.INVALID_SIGNAL;
  readonly severity = ErrorSeverity.MEDIUM;

  constructor(message: string, options: EngineErrorOptions) {
    super(message, options);
    this.name = 'InvalidSignalError';
  }
}

export class InvalidConfigurationError extends EngineError {
  readonly type = ExecutionErrorType.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Invalid engine configuration: ${violations.join('; ')}`, { symbol: null });
    this.name = 'InvalidConfigurationError';
    this.violations = violations;
  }
}

export type ExecError = TransientExecError | RejectedOrderError;

export type FillError =
  | ExecError
  | RiskSanityViolationError
  | DrawdownHaltedError
  | NewOrderBlockedError;

export function isTransient(error: unknown): error is TransientExecError {
  return error instanceof TransientExecError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
