/**
 * Source References
 *
 * Parsing of message links and normalization of (chat, message id) pairs.
 *
 * Accepted links:
 * - https://t.me/<username>/<id>            public channel or group
 * - https://t.me/<username>/<topic>/<id>    public forum topic
 * - https://t.me/c/<internal>/<id>          private chat by internal id
 * - telegram.me and telegram.dog hosts, with or without scheme
 * - tg://resolve?domain=<username>&post=<id>
 * - tg://privatepost?channel=<internal>&post=<id>
 */

import { ValidationError, InvalidReferenceError } from './errors/index.js';
import type {
  Capability,
  ReferenceForm,
  ResolvedReference,
  SourceReference,
} from './types/reference.js';

const PRIVATE_PREFIX = '-100';

const USERNAME_PATTERN = /^@?([A-Za-z][A-Za-z0-9_]{4,31})$/;
const PEER_ID_PATTERN = /^-100(\d{1,15})$/;
const LINK_ID_PATTERN = /^(?:c\/)?(\d{1,15})$/;

const HTTP_LINK_PATTERN =
  /^(?:https?:\/\/)?(?:www\.)?(?:t\.me|telegram\.me|telegram\.dog)\/(c\/)?([A-Za-z0-9_]+)\/(?:\d+\/)?(\d+)\/?(?:[?#].*)?$/i;

function parseMessageId(raw: string | null, input: string): number {
  if (raw === null || !/^\d+$/.test(raw)) {
    throw new InvalidReferenceError(input, 'message id is missing or not numeric');
  }
  return Number.parseInt(raw, 10);
}

function parseDeepLink(input: string): SourceReference {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new InvalidReferenceError(input, 'not a valid tg:// link');
  }

  const post = url.searchParams.get('post');

  if (url.hostname === 'resolve') {
    const domain = url.searchParams.get('domain');
    if (!domain) {
      throw new InvalidReferenceError(input, 'missing domain parameter');
    }
    return { chat: domain, messageId: parseMessageId(post, input) };
  }

  if (url.hostname === 'privatepost') {
    const channel = url.searchParams.get('channel');
    if (!channel) {
      throw new InvalidReferenceError(input, 'missing channel parameter');
    }
    return { chat: `c/${channel}`, messageId: parseMessageId(post, input) };
  }

  throw new InvalidReferenceError(input, `unsupported tg:// action "${url.hostname}"`);
}

/**
 * Parse a message link into a source reference.
 * `offset` is added to the message id, e.g. to step through a batch.
 */
export function parseSourceLink(link: string, offset = 0): SourceReference {
  const input = link.trim();

  let reference: SourceReference;
  if (input.toLowerCase().startsWith('tg://')) {
    reference = parseDeepLink(input);
  } else {
    const match = HTTP_LINK_PATTERN.exec(input);
    if (!match) {
      throw new InvalidReferenceError(input, 'unrecognized link format');
    }
    const [, privateMarker, chat = '', messageId = ''] = match;
    reference = {
      chat: privateMarker ? `c/${chat}` : chat,
      messageId: parseMessageId(messageId, input),
    };
  }

  const shifted = { chat: reference.chat, messageId: reference.messageId + offset };
  if (!Number.isSafeInteger(shifted.messageId) || shifted.messageId < 1) {
    throw new InvalidReferenceError(input, `message id ${shifted.messageId} is out of range`);
  }
  return shifted;
}

function describe(reference: SourceReference): string {
  return `${reference.chat}/${reference.messageId}`;
}

function classifyChat(
  chat: string,
  input: string
): { form: ReferenceForm; peer: string; capability: Capability } {
  const peerId = PEER_ID_PATTERN.exec(chat);
  if (peerId) {
    return { form: 'private_peer_id', peer: chat, capability: 'privileged' };
  }

  const linkId = LINK_ID_PATTERN.exec(chat);
  if (linkId?.[1]) {
    return { form: 'private_link_id', peer: `${PRIVATE_PREFIX}${linkId[1]}`, capability: 'privileged' };
  }

  const username = USERNAME_PATTERN.exec(chat);
  if (username?.[1]) {
    return { form: 'public_username', peer: `@${username[1].toLowerCase()}`, capability: 'general' };
  }

  throw new InvalidReferenceError(input, `chat "${chat}" is neither a username nor a chat id`);
}

/**
 * Validate and normalize a reference.
 * Throws InvalidReferenceError for anything malformed.
 */
export function resolveReference(reference: SourceReference): ResolvedReference {
  const input = describe(reference);
  const chat = reference.chat.trim();

  if (!Number.isSafeInteger(reference.messageId) || reference.messageId < 1) {
    throw new InvalidReferenceError(input, 'message id must be a positive integer');
  }

  const { form, peer, capability } = classifyChat(chat, input);

  return {
    chat,
    messageId: reference.messageId,
    form,
    peer,
    capability,
    key: `${peer}/${reference.messageId}`,
  };
}

/**
 * Capability a reference needs; malformed references report `general`
 * and are rejected later when the pipeline resolves them.
 */
export function requiredCapability(reference: SourceReference): Capability {
  try {
    return resolveReference(reference).capability;
  } catch (error) {
    if (error instanceof InvalidReferenceError) {
      return 'general';
    }
    throw error;
  }
}

/**
 * Expand a start reference into `count` consecutive message ids
 */
export function expandReferenceRange(
  start: SourceReference,
  count: number,
  maxCount: number
): SourceReference[] {
  if (!Number.isInteger(count) || count < 1 || count > maxCount) {
    throw new ValidationError('count', `must be an integer between 1 and ${maxCount}`);
  }

  return Array.from({ length: count }, (_, index) => ({
    chat: start.chat,
    messageId: start.messageId + index,
  }));
}
