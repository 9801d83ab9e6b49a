/**
 * Custom error hierarchy for SensorLink
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'DISCOVERY'
  | 'STREAM'
  | 'CORRELATION'
  | 'SIGNIFICANCE'
  | 'DATABASE'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  bridgeId?: string;
  streamId?: string;
  sessionId?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Base error class for SensorLink
 */
export class SensorLinkError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'SensorLinkError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (malformed records, bad arguments)
 */
export class ValidationError extends SensorLinkError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

// ===========================================
// Discovery errors
// ===========================================

export type DiscoveryErrorKind = 'NotFound' | 'AuthFailed' | 'RateLimited';

export class DiscoveryError extends SensorLinkError {
  public readonly kind: DiscoveryErrorKind;

  constructor(
    kind: DiscoveryErrorKind,
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'DISCOVERY',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'DiscoveryError';
    this.kind = kind;
  }
}

export class BridgeNotFoundError extends DiscoveryError {
  constructor(bridgeId: string, context: Partial<ErrorContext> = {}) {
    super('NotFound', `Bridge '${bridgeId}' is not registered`, 'E2001', {
      severity: 'LOW',
      bridgeId,
      ...context,
    });
    this.name = 'BridgeNotFoundError';
  }
}

export class AuthFailedError extends DiscoveryError {
  constructor(reason: string, context: Partial<ErrorContext> = {}) {
    super('AuthFailed', `Authentication failed: ${reason}`, 'E2002', {
      severity: 'HIGH',
      retryable: false,
      reason,
      ...context,
    });
    this.name = 'AuthFailedError';
  }
}

export class RateLimitedError extends DiscoveryError {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number, context: Partial<ErrorContext> = {}) {
    super('RateLimited', `Rate limit exceeded. Retry in ${Math.ceil(retryAfterMs / 1000)}s`, 'E2003', {
      severity: 'LOW',
      retryable: true,
      ...context,
    });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

// ===========================================
// Stream errors
// ===========================================

export type StreamErrorKind = 'Timeout' | 'Overrun' | 'SyncLost' | 'RejectedParams';

export class StreamError extends SensorLinkError {
  public readonly kind: StreamErrorKind;

  constructor(
    kind: StreamErrorKind,
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'STREAM',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'StreamError';
    this.kind = kind;
  }
}

export class StreamTimeoutError extends StreamError {
  constructor(idleMs: number, context: Partial<ErrorContext> = {}) {
    super('Timeout', `No packet received for ${idleMs}ms`, 'E3001', {
      retryable: true,
      idleMs,
      ...context,
    });
    this.name = 'StreamTimeoutError';
  }
}

export class StreamOverrunError extends StreamError {
  constructor(capacity: number, context: Partial<ErrorContext> = {}) {
    super('Overrun', `Consumer buffer full (${capacity} packets) while bridge kept emitting`, 'E3002', {
      severity: 'HIGH',
      retryable: true,
      capacity,
      ...context,
    });
    this.name = 'StreamOverrunError';
  }
}

export class SyncLostError extends StreamError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super('SyncLost', message, 'E3003', {
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'SyncLostError';
  }
}

export class RejectedParamsError extends StreamError {
  constructor(reason: string, context: Partial<ErrorContext> = {}) {
    super('RejectedParams', `Stream parameters rejected: ${reason}`, 'E3004', {
      severity: 'LOW',
      retryable: false,
      reason,
      ...context,
    });
    this.name = 'RejectedParamsError';
  }
}

// ===========================================
// Correlation errors
// ===========================================

export type CorrelationErrorKind =
  | 'InsufficientData'
  | 'ModeUnavailable'
  | 'ConstraintUnsatisfiable'
  | 'DeadlineExceeded'
  | 'Cancelled';

export class CorrelationError extends SensorLinkError {
  public readonly kind: CorrelationErrorKind;

  constructor(
    kind: CorrelationErrorKind,
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'CORRELATION',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'CorrelationError';
    this.kind = kind;
  }
}

export class InsufficientDataError extends CorrelationError {
  constructor(reason: string, context: Partial<ErrorContext> = {}) {
    super('InsufficientData', `Insufficient data: ${reason}`, 'E4001', {
      severity: 'LOW',
      ...context,
    });
    this.name = 'InsufficientDataError';
  }
}

export class ModeUnavailableError extends CorrelationError {
  constructor(mode: string, reason: string, context: Partial<ErrorContext> = {}) {
    super('ModeUnavailable', `Execution mode '${mode}' unavailable: ${reason}`, 'E4002', {
      mode,
      reason,
      ...context,
    });
    this.name = 'ModeUnavailableError';
  }
}

export class ConstraintUnsatisfiableError extends CorrelationError {
  constructor(reason: string, context: Partial<ErrorContext> = {}) {
    super('ConstraintUnsatisfiable', `No execution mode satisfies the constraints: ${reason}`, 'E4003', {
      severity: 'HIGH',
      reason,
      ...context,
    });
    this.name = 'ConstraintUnsatisfiableError';
  }
}

export class DeadlineExceededError extends CorrelationError {
  constructor(deadlineMs: number, elapsedMs: number, context: Partial<ErrorContext> = {}) {
    super('DeadlineExceeded', `Local correlation exceeded its ${deadlineMs}ms budget (${elapsedMs.toFixed(2)}ms)`, 'E4004', {
      severity: 'HIGH',
      deadlineMs,
      elapsedMs,
      ...context,
    });
    this.name = 'DeadlineExceededError';
  }
}

export class CorrelationCancelledError extends CorrelationError {
  constructor(context: Partial<ErrorContext> = {}) {
    super('Cancelled', 'Correlation cancelled', 'E4005', {
      severity: 'LOW',
      ...context,
    });
    this.name = 'CorrelationCancelledError';
  }
}

// ===========================================
// Significance errors
// ===========================================

export type SignificanceErrorKind = 'InsufficientSamples';

export class SignificanceError extends SensorLinkError {
  public readonly kind: SignificanceErrorKind;

  constructor(
    kind: SignificanceErrorKind,
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'SIGNIFICANCE',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'SignificanceError';
    this.kind = kind;
  }
}

export class InsufficientSamplesError extends SignificanceError {
  constructor(available: number, required: number, context: Partial<ErrorContext> = {}) {
    super('InsufficientSamples', `Need at least ${required} aligned samples, got ${available}`, 'E5001', {
      available,
      required,
      ...context,
    });
    this.name = 'InsufficientSamplesError';
  }
}

// ===========================================
// Infrastructure errors
// ===========================================

export class DatabaseError extends SensorLinkError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'DATABASE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'DatabaseError';
  }
}

export class StateMachineError extends SensorLinkError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StateMachineError';
  }
}

export class InvalidTransitionError extends StateMachineError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E7001', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigurationError extends SensorLinkError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E8001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SensorLinkError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): SensorLinkError {
  if (error instanceof SensorLinkError) {
    return error;
  }

  if (error instanceof Error) {
    return new SensorLinkError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new SensorLinkError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}

/**
 * One-line summary of schema validation issues
 */
export function formatIssues(error: { issues: Array<{ path: (string | number)[]; message: string }> }): string {
  return error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`).join('; ');
}
