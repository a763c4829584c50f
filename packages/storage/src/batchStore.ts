/**
 * In-Memory Batch Store
 *
 * Keeps the latest checkpoint of each job. A checkpoint that would move a
 * job's cursor backwards is rejected.
 */

import { ValidationError, type BatchJob, type BatchStore } from '@tg-relay/core';

function copyJob(job: BatchJob): BatchJob {
  return {
    ...job,
    references: job.references.map((reference) => ({ ...reference })),
    createdAt: new Date(job.createdAt),
    updatedAt: new Date(job.updatedAt),
  };
}

export class InMemoryBatchStore implements BatchStore {
  private readonly jobs: Map<string, BatchJob> = new Map();
  private readonly archived: Map<string, BatchJob> = new Map();

  async save(job: BatchJob): Promise<void> {
    const previous = this.jobs.get(job.id);
    if (previous && job.cursor < previous.cursor) {
      throw new ValidationError('cursor', `checkpoint for ${job.id} would move cursor from ${previous.cursor} to ${job.cursor}`);
    }
    this.jobs.set(job.id, copyJob(job));
  }

  async load(jobId: string): Promise<BatchJob | null> {
    const job = this.jobs.get(jobId) ?? this.archived.get(jobId);
    return job ? copyJob(job) : null;
  }

  async listUnfinished(): Promise<BatchJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.state === 'ACTIVE' || job.state === 'CANCELLING')
      .map(copyJob);
  }

  async archive(jobId: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return;
    }
    this.jobs.delete(jobId);
    this.archived.set(jobId, job);
  }
}
