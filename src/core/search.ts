import type { NormalizedMessage, SearchQuery } from '../types';

function searchableText(message: NormalizedMessage): string[] {
  switch (message.kind) {
    case 'text':
      return [message.text];
    case 'service':
      return [message.serviceAction];
    default:
      return message.media.fileName ? [message.text, message.media.fileName] : [message.text];
  }
}

/**
 * Case-insensitive match over text, caption, service action and file name.
 * Every criterion that is set must match; an empty query matches everything.
 * Deleted messages never match a text query.
 */
export function matchesQuery(message: NormalizedMessage, query: SearchQuery): boolean {
  if (query.kinds && !query.kinds.has(message.kind)) {
    return false;
  }

  const sender = query.sender?.trim().toLowerCase();
  if (sender && !message.senderName.toLowerCase().includes(sender)) {
    return false;
  }

  const text = query.text?.trim().toLowerCase();
  if (text) {
    if (message.isDeleted) return false;
    return searchableText(message).some((value) => value.toLowerCase().includes(text));
  }
  return true;
}

export function searchMessages(
  messages: readonly NormalizedMessage[],
  query: SearchQuery
): NormalizedMessage[] {
  return messages.filter((message) => matchesQuery(message, query));
}
