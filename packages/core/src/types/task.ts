/**
 * Task Types
 */

import type { Capability, SourceReference } from './reference.js';

export type TaskState = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED';

export type TerminalTaskState = Extract<TaskState, 'SUCCEEDED' | 'FAILED'>;

export type FailureCode =
  | 'INVALID_REFERENCE'
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'FETCH_FAILED'
  | 'QUOTA_EXCEEDED'
  | 'DELIVERY_FAILED'
  | 'RETRIES_EXHAUSTED'
  | 'CANCELLED';

export interface FailureReason {
  code: FailureCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface Task {
  readonly id: string;
  readonly reference: SourceReference;
  readonly requesterId: string;
  readonly capability: Capability;
  readonly createdAt: Date;
  readonly batchId?: string;
  readonly batchIndex?: number;

  state: TaskState;
  failureReason?: FailureReason;
  byteSize?: number;

  /** Times the task entered RUNNING */
  attempts: number;
  /** Throttle, timeout and connection retries consumed */
  retries: number;
  /** RUNNING -> PENDING loops other than rate-gate deferrals */
  requeues: number;
  /** RUNNING -> PENDING loops spent waiting for a rate-limiter token */
  deferrals: number;
  cancelRequested: boolean;

  startedAt?: Date;
  finishedAt?: Date;
}

export interface TaskInput {
  reference: SourceReference;
  requesterId: string;
  capability?: Capability;
  batchId?: string;
  batchIndex?: number;
}

/**
 * Append-only history entry written once per terminal task
 */
export interface TaskOutcomeRecord {
  taskId: string;
  requesterId: string;
  reference: SourceReference;
  state: TerminalTaskState;
  batchId?: string;
  batchIndex?: number;
  failureReason?: FailureReason;
  byteSize?: number;
  attempts: number;
  finishedAt: Date;
}
