/**
 * Session Connector Contract
 *
 * Opens and closes the upstream session behind a handle.
 */

import type { ClientHandle } from '../types/client.js';

export interface SessionConnector<TSession = unknown> {
  connect(handle: ClientHandle<TSession>): Promise<void>;
  disconnect(handle: ClientHandle<TSession>): Promise<void>;
}
