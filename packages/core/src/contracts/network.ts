/**
 * Source Network Client Contract
 *
 * Implemented by the adapter around the upstream protocol library.
 * Results are discriminated unions so the pipeline can tell throttling
 * apart from permanent failures without inspecting exceptions.
 */

import type { ClientHandle } from '../types/client.js';
import type { ResolvedReference } from '../types/reference.js';

export interface FetchedContent {
  kind: 'media' | 'text';
  byteSize: number;
  fileName?: string;
  mimeType?: string;
  caption?: string;
  /** Downloaded file, always inside the request's staging directory */
  localPath?: string;
}

export type FetchError =
  | { kind: 'throttled'; waitMs: number }
  | { kind: 'not_found'; message?: string }
  | { kind: 'access_denied'; message?: string }
  | { kind: 'connection'; message: string }
  | { kind: 'other'; message: string };

export type FetchResult =
  | { ok: true; content: FetchedContent }
  | { ok: false; error: FetchError };

export interface FetchRequest {
  reference: ResolvedReference;
  stagingDir: string;
  signal: AbortSignal;
}

/**
 * `media` sends the content natively; `document` uploads it as a plain file
 */
export type DeliveryMode = 'media' | 'document';

export interface DeliverError {
  kind: 'too_large' | 'transient' | 'fatal';
  message: string;
}

export type DeliverResult =
  | { ok: true; messageIds?: number[] }
  | { ok: false; error: DeliverError };

export interface DeliverRequest {
  content: FetchedContent;
  reference: ResolvedReference;
  targetId: string;
  mode: DeliveryMode;
  signal: AbortSignal;
}

export interface SourceNetworkClient<TSession = unknown> {
  fetch(request: FetchRequest, handle: ClientHandle<TSession>): Promise<FetchResult>;
  deliver(request: DeliverRequest, handle: ClientHandle<TSession>): Promise<DeliverResult>;
}
