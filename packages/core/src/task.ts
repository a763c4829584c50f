/**
 * Task Factory
 */

import { randomUUID } from 'node:crypto';
import { requiredCapability } from './reference.js';
import type { Task, TaskInput, TaskOutcomeRecord } from './types/task.js';
import { isTerminalTaskState } from './stateMachine.js';

/**
 * Create a Pending task. Without an explicit capability the reference decides.
 */
export function createTask(input: TaskInput, now: Date = new Date()): Task {
  return {
    id: randomUUID(),
    reference: { chat: input.reference.chat, messageId: input.reference.messageId },
    requesterId: input.requesterId,
    capability: input.capability ?? requiredCapability(input.reference),
    createdAt: now,
    batchId: input.batchId,
    batchIndex: input.batchIndex,
    state: 'PENDING',
    attempts: 0,
    retries: 0,
    requeues: 0,
    deferrals: 0,
    cancelRequested: false,
  };
}

/**
 * History record for a task in a terminal state, or null while it is still live
 */
export function toOutcomeRecord(task: Task): TaskOutcomeRecord | null {
  if (!isTerminalTaskState(task.state)) {
    return null;
  }

  return {
    taskId: task.id,
    requesterId: task.requesterId,
    reference: { ...task.reference },
    state: task.state,
    batchId: task.batchId,
    batchIndex: task.batchIndex,
    failureReason: task.failureReason,
    byteSize: task.byteSize,
    attempts: task.attempts,
    finishedAt: task.finishedAt ?? new Date(),
  };
}
