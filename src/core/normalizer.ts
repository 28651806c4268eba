import type {
  MediaDescriptor,
  MediaKind,
  MediaMessage,
  NormalizedMessage,
  RawMedia,
  RawMessage,
  SenderResolver,
  ServiceMessage,
  TextMessage,
} from '../types';
import { isMediaKind } from './kinds';
import { describeServiceAction } from './serviceActions';
import { MalformedRecordError } from '../utils/errors';

export const UNKNOWN_SENDER = 'Unknown';

export interface NormalizeOptions {
  /** Stands in for the sender of channel posts and of messages without a sender reference */
  chatTitle?: string;
}

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Converts raw messages into normalized records, dropping entries that have
 * nothing to show (no text, media, service action or deletion flag).
 */
export function normalize(
  rawMessages: readonly RawMessage[],
  resolveSender: SenderResolver,
  options: NormalizeOptions = {}
): NormalizedMessage[] {
  const normalized: NormalizedMessage[] = [];
  for (const raw of rawMessages) {
    const message = normalizeMessage(raw, resolveSender, options);
    if (message) {
      normalized.push(message);
    }
  }
  return normalized;
}

export function normalizeMessage(
  raw: RawMessage,
  resolveSender: SenderResolver,
  options: NormalizeOptions = {}
): NormalizedMessage | undefined {
  const base = {
    id: raw.id,
    timestamp: raw.date,
    senderName: resolveSenderName(raw, resolveSender, options.chatTitle),
    replyToId: raw.replyToId,
    forwardedFrom: raw.forwardedFrom,
    isEdited: raw.editDate !== undefined,
    isDeleted: raw.deleted === true,
  };

  if (raw.deleted) {
    const deleted: TextMessage = { ...base, kind: 'text', text: '' };
    return Object.freeze(deleted);
  }

  if (raw.service) {
    const service: ServiceMessage = {
      ...base,
      kind: 'service',
      text: '',
      serviceAction: describeServiceAction(raw.service),
    };
    return Object.freeze(service);
  }

  if (raw.media) {
    const media = describeMedia(raw.media);
    const withMedia: MediaMessage = { ...base, kind: media.kind, text: raw.text ?? '', media };
    return Object.freeze(withMedia);
  }

  if (!raw.text) {
    return undefined;
  }

  const text: TextMessage = { ...base, kind: 'text', text: raw.text };
  return Object.freeze(text);
}

function resolveSenderName(raw: RawMessage, resolveSender: SenderResolver, chatTitle?: string): string {
  // Channel posts speak for the channel, signed or not
  const title = chatTitle?.trim();
  if (raw.post && title) {
    return title;
  }
  if (raw.senderRef === undefined) {
    return title || UNKNOWN_SENDER;
  }

  let name: string | undefined;
  try {
    name = resolveSender(raw.senderRef);
  } catch {
    name = undefined;
  }
  return name?.trim() || UNKNOWN_SENDER;
}

// ============================================================================
// MEDIA CLASSIFICATION
// ============================================================================

function describeMedia(media: RawMedia): Readonly<MediaDescriptor> {
  const descriptor: MediaDescriptor = { kind: classifyMedia(media) };
  if (media.fileName) descriptor.fileName = media.fileName;
  if (media.size !== undefined) descriptor.size = media.size;
  if (media.mimeType) descriptor.mimeType = media.mimeType;
  return Object.freeze(descriptor);
}

export function classifyMedia(media: RawMedia): MediaKind {
  switch (media.type) {
    case 'photo':
      return 'photo';
    case 'webpage':
      return 'link';
    case 'geo':
      return 'location';
    case 'contact':
      return 'contact';
    case 'poll':
      return 'poll';
    case 'document':
      return classifyDocument(media);
    case 'other':
      // Unrecognised attachments are kept as documents
      return 'document';
  }
}

function classifyDocument(media: RawMedia): MediaKind {
  if (media.sticker) return 'sticker';
  if (media.voice) return 'voice';
  if (media.audio) return 'audio';
  if (media.video) return 'video';

  const mimeType = media.mimeType?.toLowerCase() ?? '';
  if (mimeType.startsWith('video/')) return 'video';
  if (mimeType.startsWith('audio/')) return 'audio';
  return 'document';
}

// ============================================================================
// STRUCTURAL CHECKS
// ============================================================================

/**
 * Rejects records whose fields contradict their kind, e.g. a text record
 * carrying a media descriptor.
 */
export function assertWellFormed(message: NormalizedMessage): void {
  const hasMedia = 'media' in message && message.media !== undefined;

  if (isMediaKind(message.kind)) {
    if (!hasMedia) {
      throw new MalformedRecordError(`${message.kind} record has no media descriptor`, message.id);
    }
  } else if (hasMedia) {
    throw new MalformedRecordError(`${message.kind} record carries a media descriptor`, message.id);
  }

  if (message.kind === 'service' && !message.serviceAction) {
    throw new MalformedRecordError('service record has no action', message.id);
  }

  if ('media' in message && message.media && message.media.kind !== message.kind) {
    throw new MalformedRecordError(
      `media descriptor kind ${message.media.kind} does not match record kind ${message.kind}`,
      message.id
    );
  }
}
