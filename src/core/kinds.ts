import { MEDIA_KINDS, MESSAGE_KINDS } from '../types';
import type { MediaKind, MessageKind } from '../types';
import { MediaKindError } from '../utils/errors';

export const KIND_LABELS: Record<MessageKind, string> = {
  text: 'Text',
  service: 'Service',
  photo: 'Photo',
  video: 'Video',
  document: 'Document',
  audio: 'Audio',
  voice: 'Voice',
  sticker: 'Sticker',
  location: 'Location',
  contact: 'Contact',
  poll: 'Poll',
  link: 'Link',
};

export function isMediaKind(kind: string): kind is MediaKind {
  return MEDIA_KINDS.some((mediaKind) => mediaKind === kind);
}

/**
 * Parses a comma separated list such as "photo,video". "all" selects every
 * media kind and "none" (or an empty list) selects none.
 */
export function parseMediaKinds(input: string | readonly string[]): Set<MediaKind> {
  const names = (typeof input === 'string' ? input.split(',') : input)
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  if (names.length === 1 && names[0] === 'all') {
    return new Set(MEDIA_KINDS);
  }
  if (names.length === 0 || (names.length === 1 && names[0] === 'none')) {
    return new Set();
  }

  const kinds = new Set<MediaKind>();
  for (const name of names) {
    if (!isMediaKind(name)) {
      throw new MediaKindError(`Unknown media kind "${name}" (known: ${MEDIA_KINDS.join(', ')}, all, none)`);
    }
    kinds.add(name);
  }
  return kinds;
}

export function isMessageKind(kind: string): kind is MessageKind {
  return MESSAGE_KINDS.some((messageKind) => messageKind === kind);
}

/**
 * Like parseMediaKinds, but also accepts "text" and "service"
 */
export function parseMessageKinds(input: string): Set<MessageKind> {
  const kinds = new Set<MessageKind>();
  for (const raw of input.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (!isMessageKind(name)) {
      throw new MediaKindError(`Unknown message kind "${name}" (known: ${MESSAGE_KINDS.join(', ')})`);
    }
    kinds.add(name);
  }
  return kinds;
}
