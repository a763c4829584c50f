/**
 * Source Reference Types
 */

export type Capability = 'general' | 'privileged';

/**
 * How a reference addressed its chat before normalization
 * - public_username: `durov`, `@durov`
 * - private_peer_id: `-1001234567890` (already a full peer id)
 * - private_link_id: `1234567890` or `c/1234567890` (needs the -100 prefix)
 */
export type ReferenceForm = 'public_username' | 'private_peer_id' | 'private_link_id';

/**
 * A pointer at one retrievable message, as supplied by a requester
 */
export interface SourceReference {
  chat: string;
  messageId: number;
}

export interface ResolvedReference extends SourceReference {
  form: ReferenceForm;
  /** `@username` for public chats, `-100…` peer id for private ones */
  peer: string;
  capability: Capability;
  /** Stable `peer/messageId` key */
  key: string;
}
