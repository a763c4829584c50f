/**
 * Custom Error Classes
 */

import type { LimitKind } from '../contracts/ledger.js';
import type { DeliveryMode } from '../contracts/network.js';
import type { Capability } from '../types/reference.js';
import type { FailureCode, FailureReason } from '../types/task.js';

/**
 * Base error class for all relay errors
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs and configuration
 */
export class ValidationError extends RelayError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends RelayError {
  constructor(
    entityId: string,
    fromState: string,
    toState: string,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { entityId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends RelayError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

export class InvalidReferenceError extends RelayError {
  constructor(input: string, message: string) {
    super(
      `Invalid source reference "${input}": ${message}`,
      'INVALID_REFERENCE',
      { input }
    );
    this.name = 'InvalidReferenceError';
  }
}

/**
 * The requester lacks the session or permission a reference needs
 */
export class AccessDeniedError extends RelayError {
  constructor(requesterId: string, message: string) {
    super(message, 'ACCESS_DENIED', { requesterId });
    this.name = 'AccessDeniedError';
  }
}

/**
 * Upstream back-pressure; never surfaces past the orchestrator
 */
export class ThrottledError extends RelayError {
  public readonly waitMs: number;

  constructor(waitMs: number, message?: string) {
    super(message ?? `Upstream requested a ${waitMs}ms pause`, 'THROTTLED', { waitMs });
    this.name = 'ThrottledError';
    this.waitMs = waitMs;
  }
}

export class QuotaExceededError extends RelayError {
  public readonly limitKind: LimitKind;

  constructor(limitKind: LimitKind, limitBytes: number, usedBytes: number, requestedBytes: number) {
    super(
      `Traffic limit reached (${limitKind}): ${usedBytes} of ${limitBytes} bytes used, ${requestedBytes} requested`,
      'QUOTA_EXCEEDED',
      { limitKind, limitBytes, usedBytes, requestedBytes }
    );
    this.name = 'QuotaExceededError';
    this.limitKind = limitKind;
  }
}

export class DeliveryFailedError extends RelayError {
  constructor(message: string, modes: DeliveryMode[]) {
    super(message, 'DELIVERY_FAILED', { modes });
    this.name = 'DeliveryFailedError';
  }
}

export class RetriesExhaustedError extends RelayError {
  constructor(retries: number, lastCause: string) {
    super(
      `Gave up after ${retries} retries (last cause: ${lastCause})`,
      'RETRIES_EXHAUSTED',
      { retries, lastCause }
    );
    this.name = 'RetriesExhaustedError';
  }
}

export type CapabilityErrorKind = 'NO_PRIVILEGED_SESSION' | 'UNAVAILABLE';

/**
 * Returned by the client pool when no Ready handle matches a request
 */
export class CapabilityError extends RelayError {
  public readonly kind: CapabilityErrorKind;

  constructor(kind: CapabilityErrorKind, capability: Capability, requesterId: string) {
    super(
      kind === 'NO_PRIVILEGED_SESSION'
        ? `Requester ${requesterId} has no privileged session`
        : `No ready ${capability} session for requester ${requesterId}`,
      'CAPABILITY_ERROR',
      { kind, capability, requesterId }
    );
    this.name = 'CapabilityError';
    this.kind = kind;
  }
}

export class CancelledError extends RelayError {
  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled`, 'CANCELLED', { taskId });
    this.name = 'CancelledError';
  }
}

export class QueueFullError extends RelayError {
  constructor(capacity: number) {
    super(`Task queue is full (capacity ${capacity})`, 'QUEUE_FULL', { capacity });
    this.name = 'QueueFullError';
  }
}

export class QueueClosedError extends RelayError {
  constructor() {
    super('Task queue is shutting down', 'QUEUE_CLOSED');
    this.name = 'QueueClosedError';
  }
}

const failureCodes: Record<string, FailureCode> = {
  INVALID_REFERENCE: 'INVALID_REFERENCE',
  ACCESS_DENIED: 'ACCESS_DENIED',
  CAPABILITY_ERROR: 'ACCESS_DENIED',
  NOT_FOUND: 'NOT_FOUND',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  DELIVERY_FAILED: 'DELIVERY_FAILED',
  RETRIES_EXHAUSTED: 'RETRIES_EXHAUSTED',
  CANCELLED: 'CANCELLED',
};

/**
 * Convert any thrown value into the terminal reason stored on a task.
 * Errors outside the taxonomy become FETCH_FAILED.
 */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof RelayError) {
    return {
      code: failureCodes[error.code] ?? 'FETCH_FAILED',
      message: error.message,
      details: error.details,
    };
  }

  return {
    code: 'FETCH_FAILED',
    message: error instanceof Error ? error.message : String(error),
  };
}
