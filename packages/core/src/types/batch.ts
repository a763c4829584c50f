/**
 * Batch Job Types
 */

import type { SourceReference } from './reference.js';

export type BatchState = 'ACTIVE' | 'CANCELLING' | 'COMPLETED' | 'CANCELLED';

export interface BatchJob {
  id: string;
  ownerId: string;
  references: SourceReference[];
  /** Index of the next reference not yet submitted; never decreases */
  cursor: number;
  succeeded: number;
  failed: number;
  cancelRequested: boolean;
  state: BatchState;
  createdAt: Date;
  updatedAt: Date;
}

export interface BatchRequest {
  ownerId: string;
  references: SourceReference[];
}

export interface BatchProgress {
  jobId: string;
  ownerId: string;
  state: BatchState;
  total: number;
  cursor: number;
  succeeded: number;
  failed: number;
  inFlight: number;
  updatedAt: Date;
}
