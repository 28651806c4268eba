import type { ChatSummary } from '../types';
import { ChatSourceError } from './errors';

/**
 * Resolves a chat given on the command line. Tried in order: exact id,
 * 1-based position in the list, title (case-insensitive), unique title
 * substring.
 */
export function findChat(chats: readonly ChatSummary[], query: string): ChatSummary {
  const wanted = query.trim();
  if (!wanted) {
    throw new ChatSourceError('Chat name must not be empty');
  }

  const byId = chats.find((chat) => chat.id === wanted);
  if (byId) return byId;

  if (/^\d+$/.test(wanted)) {
    const position = Number(wanted);
    if (position >= 1 && position <= chats.length) {
      return chats[position - 1];
    }
  }

  const lower = wanted.toLowerCase();
  const byTitle = chats.filter((chat) => chat.title.toLowerCase() === lower);
  if (byTitle.length === 1) return byTitle[0];

  const partial = byTitle.length > 1 ? byTitle : chats.filter((chat) => chat.title.toLowerCase().includes(lower));
  if (partial.length === 1) return partial[0];
  if (partial.length > 1) {
    const names = partial
      .slice(0, 5)
      .map((chat) => `"${chat.title}" (${chat.id})`)
      .join(', ');
    throw new ChatSourceError(`"${wanted}" matches ${partial.length} chats: ${names}. Use the chat id instead.`);
  }

  throw new ChatSourceError(`No chat matches "${wanted}"`);
}

export function chatTypeLabel(chat: ChatSummary): string {
  switch (chat.type) {
    case 'user':
      return 'private';
    case 'group':
      return 'group';
    case 'channel':
      return 'channel';
  }
}
