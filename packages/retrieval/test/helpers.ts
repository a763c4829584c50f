import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '@tg-relay/utils';
import type {
  ClientHandle,
  DeliverRequest,
  DeliverResult,
  FetchRequest,
  FetchResult,
  SessionConnector,
  SourceNetworkClient,
} from '@tg-relay/core';
import type { StagedArtifact, StagingArea } from '../src/index.js';

export interface FakeSession {
  name: string;
}

export const testLogger = createLogger({ component: 'test' });

export class FakeConnector implements SessionConnector<FakeSession> {
  readonly connected: string[] = [];
  readonly disconnected: string[] = [];
  /** Remaining connect failures per identity */
  readonly failures: Map<string, number> = new Map();

  async connect(handle: ClientHandle<FakeSession>): Promise<void> {
    const remaining = this.failures.get(handle.identity) ?? 0;
    if (remaining > 0) {
      this.failures.set(handle.identity, remaining - 1);
      throw new Error(`connect refused for ${handle.identity}`);
    }
    this.connected.push(handle.identity);
  }

  async disconnect(handle: ClientHandle<FakeSession>): Promise<void> {
    this.disconnected.push(handle.identity);
  }
}

type FetchScript = (request: FetchRequest, handle: ClientHandle<FakeSession>) => Promise<FetchResult>;
type DeliverScript = (request: DeliverRequest, handle: ClientHandle<FakeSession>) => Promise<DeliverResult>;

export function mediaOf(byteSize: number): FetchResult {
  return { ok: true, content: { kind: 'media', byteSize, fileName: 'clip.mp4', mimeType: 'video/mp4' } };
}

/**
 * Network client whose answers are scripted per call. Once a script queue
 * is empty the default answer is used.
 */
export class ScriptedNetwork implements SourceNetworkClient<FakeSession> {
  readonly fetches: Array<{ key: string; handle: string; stagingDir: string }> = [];
  readonly deliveries: Array<{ key: string; mode: string; handle: string; targetId: string }> = [];
  private readonly fetchQueue: FetchScript[] = [];
  private readonly deliverQueue: DeliverScript[] = [];
  defaultFetch: FetchScript = async () => mediaOf(1024);
  defaultDeliver: DeliverScript = async () => ({ ok: true, messageIds: [1] });

  onFetch(...scripts: FetchScript[]): this {
    this.fetchQueue.push(...scripts);
    return this;
  }

  onDeliver(...scripts: DeliverScript[]): this {
    this.deliverQueue.push(...scripts);
    return this;
  }

  async fetch(request: FetchRequest, handle: ClientHandle<FakeSession>): Promise<FetchResult> {
    this.fetches.push({ key: request.reference.key, handle: handle.identity, stagingDir: request.stagingDir });
    const script = this.fetchQueue.shift() ?? this.defaultFetch;
    return script(request, handle);
  }

  async deliver(request: DeliverRequest, handle: ClientHandle<FakeSession>): Promise<DeliverResult> {
    this.deliveries.push({
      key: request.reference.key,
      mode: request.mode,
      handle: handle.identity,
      targetId: request.targetId,
    });
    const script = this.deliverQueue.shift() ?? this.defaultDeliver;
    return script(request, handle);
  }
}

/**
 * Staging that only records directory lifetimes
 */
export class RecordingStaging implements StagingArea {
  readonly created: string[] = [];
  readonly disposed: string[] = [];
  private counter = 0;

  async create(taskId: string): Promise<StagedArtifact> {
    this.counter += 1;
    const dir = `/staging/${taskId}-${this.counter}`;
    this.created.push(dir);
    return {
      dir,
      dispose: async () => {
        this.disposed.push(dir);
      },
    };
  }

  live(): string[] {
    return this.created.filter((dir) => !this.disposed.includes(dir));
  }
}

export async function makeTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tg-relay-test-'));
}

/**
 * A promise that can be resolved from the outside
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
