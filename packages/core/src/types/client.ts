/**
 * Client Handle Types
 */

import type { Capability } from './reference.js';

export type ConnectivityState = 'DISCONNECTED' | 'CONNECTING' | 'READY' | 'DEGRADED';

/**
 * An authenticated session with the upstream network.
 * `general` handles serve everyone; a `privileged` handle belongs to one requester.
 */
export interface ClientHandle<TSession = unknown> {
  readonly id: string;
  readonly kind: Capability;
  readonly identity: string;
  readonly ownerId?: string;
  readonly session: TSession;
  readonly state: ConnectivityState;
}

export interface HandleStateChange {
  handleId: string;
  kind: Capability;
  ownerId?: string;
  from: ConnectivityState;
  to: ConnectivityState;
  reason?: string;
  at: Date;
}
