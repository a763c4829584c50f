/**
 * Storage Contracts
 */

import type { BatchJob, BatchProgress } from '../types/batch.js';
import type { TaskOutcomeRecord } from '../types/task.js';

/**
 * Append-only outcome log, read back for status reports and batch resumption
 */
export interface HistoryStore {
  append(record: TaskOutcomeRecord): Promise<void>;
  listByJob(jobId: string): Promise<TaskOutcomeRecord[]>;
  /** Most recent first */
  listByRequester(requesterId: string, limit?: number): Promise<TaskOutcomeRecord[]>;
}

/**
 * Batch checkpoints. `save` overwrites the previous checkpoint of the job.
 */
export interface BatchStore {
  save(job: BatchJob): Promise<void>;
  load(jobId: string): Promise<BatchJob | null>;
  listUnfinished(): Promise<BatchJob[]>;
  archive(jobId: string): Promise<void>;
}

export interface ProgressReporter {
  report(progress: BatchProgress): Promise<void>;
}
