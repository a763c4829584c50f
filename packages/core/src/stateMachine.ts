/**
 * Task and Batch State Machines
 *
 * Task flow:
 * PENDING → RUNNING → SUCCEEDED
 *    ↑         ↓  ↘ FAILED
 *    └─────────┘ (re-enqueue after rate limiting or throttling)
 * PENDING → FAILED (cancelled while queued)
 *
 * Batch flow:
 * ACTIVE → COMPLETED
 * ACTIVE → CANCELLING → CANCELLED
 *
 * Terminal states have no outgoing transitions.
 */

import { StateTransitionError } from './errors/index.js';
import type { BatchJob, BatchState } from './types/batch.js';
import type { FailureReason, Task, TaskState, TerminalTaskState } from './types/task.js';

const taskTransitions: Record<TaskState, ReadonlySet<TaskState>> = {
  PENDING: new Set<TaskState>(['RUNNING', 'FAILED']),
  RUNNING: new Set<TaskState>(['PENDING', 'SUCCEEDED', 'FAILED']),
  SUCCEEDED: new Set<TaskState>(),
  FAILED: new Set<TaskState>(),
};

const batchTransitions: Record<BatchState, ReadonlySet<BatchState>> = {
  ACTIVE: new Set<BatchState>(['CANCELLING', 'COMPLETED']),
  CANCELLING: new Set<BatchState>(['CANCELLED']),
  COMPLETED: new Set<BatchState>(),
  CANCELLED: new Set<BatchState>(),
};

/**
 * Check if a task state transition is valid
 */
export function isValidTaskTransition(from: TaskState, to: TaskState): boolean {
  return taskTransitions[from].has(to);
}

/**
 * Check if a batch state transition is valid
 */
export function isValidBatchTransition(from: BatchState, to: BatchState): boolean {
  return batchTransitions[from].has(to);
}

export function getNextTaskStates(current: TaskState): TaskState[] {
  return Array.from(taskTransitions[current]);
}

export function isTerminalTaskState(state: TaskState): state is TerminalTaskState {
  return taskTransitions[state].size === 0;
}

export function isTerminalBatchState(state: BatchState): boolean {
  return batchTransitions[state].size === 0;
}

/**
 * Move a task to a new state.
 * Throws StateTransitionError if the transition is invalid.
 */
export function transitionTask(
  task: Task,
  to: TaskState,
  options: { failureReason?: FailureReason; now?: Date; deferral?: boolean } = {}
): Task {
  if (!isValidTaskTransition(task.state, to)) {
    throw new StateTransitionError(task.id, task.state, to);
  }

  const now = options.now ?? new Date();

  if (to === 'RUNNING') {
    task.attempts += 1;
    task.startedAt = now;
  }
  if (to === 'PENDING') {
    if (options.deferral) {
      task.deferrals += 1;
    } else {
      task.requeues += 1;
    }
  }
  if (to === 'FAILED') {
    task.failureReason = options.failureReason ?? {
      code: 'FETCH_FAILED',
      message: 'Task failed without a recorded reason',
    };
  }
  if (isTerminalTaskState(to)) {
    task.finishedAt = now;
  }

  task.state = to;
  return task;
}

/**
 * Move a batch job to a new state.
 * Throws StateTransitionError if the transition is invalid.
 */
export function transitionBatch(job: BatchJob, to: BatchState, now: Date = new Date()): BatchJob {
  if (!isValidBatchTransition(job.state, to)) {
    throw new StateTransitionError(job.id, job.state, to);
  }

  if (to === 'CANCELLING') {
    job.cancelRequested = true;
  }

  job.state = to;
  job.updatedAt = now;
  return job;
}
