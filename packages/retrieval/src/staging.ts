/**
 * Staging Area
 *
 * Each task fetches into its own scratch directory, removed on every exit path.
 */

import { createTempDir, removePath, sanitizeSegment } from '@tg-relay/utils';

export interface StagedArtifact {
  readonly dir: string;
  dispose(): Promise<void>;
}

export interface StagingArea {
  create(taskId: string): Promise<StagedArtifact>;
}

export class FileStagingArea implements StagingArea {
  constructor(private readonly root: string) {}

  async create(taskId: string): Promise<StagedArtifact> {
    const dir = await createTempDir(this.root, `${sanitizeSegment(taskId)}-`);
    let disposed = false;

    return {
      dir,
      dispose: async () => {
        if (disposed) {
          return;
        }
        disposed = true;
        await removePath(dir);
      },
    };
  }
}
