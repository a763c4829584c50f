/**
 * In-Memory History Store
 */

import type { HistoryStore, TaskOutcomeRecord } from '@tg-relay/core';

function copyRecord(record: TaskOutcomeRecord): TaskOutcomeRecord {
  return {
    ...record,
    reference: { ...record.reference },
    failureReason: record.failureReason ? { ...record.failureReason } : undefined,
    finishedAt: new Date(record.finishedAt),
  };
}

export class InMemoryHistoryStore implements HistoryStore {
  private readonly records: TaskOutcomeRecord[] = [];

  constructor(private readonly defaultLimit = 20) {}

  async append(record: TaskOutcomeRecord): Promise<void> {
    this.records.push(copyRecord(record));
  }

  async listByJob(jobId: string): Promise<TaskOutcomeRecord[]> {
    return this.records.filter((record) => record.batchId === jobId).map(copyRecord);
  }

  async listByRequester(requesterId: string, limit = this.defaultLimit): Promise<TaskOutcomeRecord[]> {
    const matches: TaskOutcomeRecord[] = [];
    for (let index = this.records.length - 1; index >= 0 && matches.length < limit; index--) {
      const record = this.records[index];
      if (record && record.requesterId === requesterId) {
        matches.push(copyRecord(record));
      }
    }
    return matches;
  }
}
