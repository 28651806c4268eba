import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { LogLevel } from 'telegram/extensions/Logger';
import type {
  ChatSource,
  ChatSummary,
  ChatType,
  FetchedHistory,
  FetchOptions,
  RawMedia,
  RawMessage,
  RawServiceAction,
} from '../types';
import { ChatSourceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface TelegramCredentials {
  apiId: number;
  apiHash: string;
  session: string;
}

export type HistoryItem = Api.Message | Api.MessageService;

type UserId = Api.MessageActionChatDeleteUser['userId'];

const PROGRESS_EVERY = 100;

/**
 * Reads TELEGRAM_API_ID, TELEGRAM_API_HASH and TELEGRAM_SESSION
 */
export function credentialsFromEnv(env: Record<string, string | undefined> = process.env): TelegramCredentials {
  const apiIdText = env.TELEGRAM_API_ID?.trim();
  const apiHash = env.TELEGRAM_API_HASH?.trim();
  const session = env.TELEGRAM_SESSION?.trim();

  if (!apiIdText || !apiHash) {
    throw new ChatSourceError('TELEGRAM_API_ID and TELEGRAM_API_HASH must be set (see .env.example)');
  }
  const apiId = Number(apiIdText);
  if (!Number.isInteger(apiId) || apiId <= 0) {
    throw new ChatSourceError(`TELEGRAM_API_ID must be a positive integer, got "${apiIdText}"`);
  }
  if (!session) {
    throw new ChatSourceError('TELEGRAM_SESSION is empty; provide an authorised string session');
  }
  return { apiId, apiHash, session };
}

export class TelegramSource implements ChatSource {
  readonly name = 'Telegram';
  private client: TelegramClient | null = null;
  private readonly peers = new Map<string, Api.TypeInputPeer>();
  // Fetched messages per chat, kept for media downloads until the chat is released
  private readonly fetched = new Map<string, Map<number, HistoryItem>>();

  constructor(private readonly credentials: TelegramCredentials) {}

  async listChats(limit?: number): Promise<ChatSummary[]> {
    const client = await this.connect();
    const dialogs = await client.getDialogs({ limit: limit && limit > 0 ? limit : undefined });

    const chats: ChatSummary[] = [];
    for (const dialog of dialogs) {
      if (!dialog.id) continue;
      const id = dialog.id.toString();
      this.peers.set(id, dialog.inputEntity);

      let type: ChatType = 'user';
      if (dialog.isGroup) type = 'group';
      else if (dialog.isChannel) type = 'channel';

      chats.push({
        id,
        title: dialog.name || dialog.title || `Chat ${id}`,
        type,
        unreadCount: dialog.unreadCount,
        lastMessageDate: dialog.date ? new Date(dialog.date * 1000) : undefined,
      });
    }
    return chats;
  }

  async fetchHistory(chat: ChatSummary, options: FetchOptions): Promise<FetchedHistory> {
    const client = await this.connect();
    const peer = await this.peerFor(chat);

    const items: HistoryItem[] = [];
    const byId = new Map<number, HistoryItem>();
    this.fetched.set(chat.id, byId);
    let truncated = false;
    const iterator = client.iterMessages(peer, {
      limit: options.limit > 0 ? options.limit : undefined,
      offsetDate: options.until ? Math.floor(options.until.getTime() / 1000) : undefined,
    });

    // Newest first
    for await (const message of iterator) {
      if (options.signal?.aborted) {
        truncated = true;
        break;
      }
      const item: HistoryItem = message;
      if (options.since && item.date * 1000 < options.since.getTime()) {
        break;
      }
      items.push(item);
      byId.set(item.id, item);
      if (items.length % PROGRESS_EVERY === 0) {
        options.onProgress?.(items.length);
      }
    }
    options.onProgress?.(items.length);
    items.reverse();

    const names = await this.resolveNames(items);
    const messages = items.map((item) => toRawMessage(item, names));
    return { messages, resolveSender: (ref) => names.get(ref), truncated };
  }

  async fetchMedia(chat: ChatSummary, messageId: number): Promise<Buffer | undefined> {
    const client = await this.connect();
    let message = this.fetched.get(chat.id)?.get(messageId);
    if (!message) {
      const [found] = await client.getMessages(await this.peerFor(chat), { ids: messageId });
      message = found;
    }
    if (!(message instanceof Api.Message) || !message.media) {
      return undefined;
    }

    const data = await client.downloadMedia(message, {});
    return Buffer.isBuffer(data) ? data : undefined;
  }

  releaseChat(chat: ChatSummary): void {
    this.fetched.delete(chat.id);
  }

  async close(): Promise<void> {
    this.fetched.clear();
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.destroy();
    }
  }

  private async connect(): Promise<TelegramClient> {
    if (this.client) {
      return this.client;
    }

    const { apiId, apiHash, session } = this.credentials;
    const client = new TelegramClient(new StringSession(session), apiId, apiHash, { connectionRetries: 5 });
    client.setLogLevel(LogLevel.ERROR);

    try {
      await client.connect();
    } catch (error) {
      throw new ChatSourceError(`Could not connect to Telegram: ${errorMessage(error)}`, { cause: error });
    }

    if (!(await client.checkAuthorization())) {
      await client.destroy();
      throw new ChatSourceError('The Telegram session is not authorised; log in and update TELEGRAM_SESSION');
    }

    logger.debug('Connected to Telegram');
    this.client = client;
    return client;
  }

  private async peerFor(chat: ChatSummary): Promise<Api.TypeInputPeer> {
    if (!this.peers.has(chat.id)) {
      await this.listChats();
    }
    const peer = this.peers.get(chat.id);
    if (!peer) {
      throw new ChatSourceError(`Chat ${chat.title} (${chat.id}) was not found in your dialogs`);
    }
    return peer;
  }

  /**
   * Display names keyed by peer reference for every sender, member and
   * forward origin the messages mention
   */
  private async resolveNames(items: readonly HistoryItem[]): Promise<Map<string, string>> {
    const client = await this.connect();
    const wanted = new Map<string, Api.TypePeer>();

    for (const item of items) {
      if (item.fromId) wanted.set(peerKey(item.fromId), item.fromId);
      if (item instanceof Api.Message && item.fwdFrom?.fromId) {
        wanted.set(peerKey(item.fwdFrom.fromId), item.fwdFrom.fromId);
      }
      if (item instanceof Api.MessageService) {
        for (const userId of actionUserIds(item.action)) {
          const peer = new Api.PeerUser({ userId });
          wanted.set(peerKey(peer), peer);
        }
      }
    }

    const names = new Map<string, string>();
    for (const [key, peer] of wanted) {
      try {
        const name = entityName(await client.getEntity(peer));
        if (name) names.set(key, name);
      } catch (error) {
        logger.debug(`Could not resolve ${key}: ${errorMessage(error)}`);
      }
    }
    return names;
  }
}

export function peerKey(peer: Api.TypePeer): string {
  if (peer instanceof Api.PeerUser) return `user${peer.userId.toString()}`;
  if (peer instanceof Api.PeerChat) return `chat${peer.chatId.toString()}`;
  return `channel${peer.channelId.toString()}`;
}

function userKey(userId: UserId): string {
  return `user${userId.toString()}`;
}

function entityName(entity: unknown): string | undefined {
  if (entity instanceof Api.User) {
    const fullName = [entity.firstName, entity.lastName].filter(Boolean).join(' ');
    return fullName || entity.username || undefined;
  }
  if (entity instanceof Api.Chat || entity instanceof Api.Channel) {
    return entity.title;
  }
  return undefined;
}

function actionUserIds(action: Api.TypeMessageAction): UserId[] {
  if (action instanceof Api.MessageActionChatAddUser || action instanceof Api.MessageActionChatCreate) {
    return action.users;
  }
  if (action instanceof Api.MessageActionChatDeleteUser) {
    return [action.userId];
  }
  return [];
}

export function toServiceAction(action: Api.TypeMessageAction, names: Map<string, string>): RawServiceAction {
  const memberNames = actionUserIds(action)
    .map((userId) => names.get(userKey(userId)))
    .filter((name): name is string => Boolean(name));

  if (action instanceof Api.MessageActionChatCreate) return { type: 'chat_create', title: action.title };
  if (action instanceof Api.MessageActionChatAddUser) return { type: 'add_members', members: memberNames };
  if (action instanceof Api.MessageActionChatDeleteUser) return { type: 'remove_members', members: memberNames };
  if (action instanceof Api.MessageActionChatJoinedByLink) return { type: 'join_by_link' };
  if (action instanceof Api.MessageActionChatEditTitle) return { type: 'edit_title', title: action.title };
  if (action instanceof Api.MessageActionChatEditPhoto) return { type: 'edit_photo' };
  if (action instanceof Api.MessageActionChatDeletePhoto) return { type: 'delete_photo' };
  if (action instanceof Api.MessageActionPinMessage) return { type: 'pin_message' };
  if (action instanceof Api.MessageActionChannelCreate) return { type: 'channel_create', title: action.title };

  const name = action.className
    .replace(/^MessageAction/, '')
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .toLowerCase();
  return { type: 'other', name };
}

export function toMedia(media: Api.TypeMessageMedia | undefined): RawMedia | undefined {
  if (!media || media instanceof Api.MessageMediaEmpty) return undefined;
  if (media instanceof Api.MessageMediaPhoto) return { type: 'photo' };
  if (media instanceof Api.MessageMediaWebPage) return { type: 'webpage' };
  if (media instanceof Api.MessageMediaContact) return { type: 'contact' };
  if (media instanceof Api.MessageMediaPoll) return { type: 'poll' };
  if (
    media instanceof Api.MessageMediaGeo ||
    media instanceof Api.MessageMediaGeoLive ||
    media instanceof Api.MessageMediaVenue
  ) {
    return { type: 'geo' };
  }

  if (media instanceof Api.MessageMediaDocument) {
    const document = media.document;
    if (!(document instanceof Api.Document)) {
      return { type: 'document' };
    }

    const raw: RawMedia = {
      type: 'document',
      mimeType: document.mimeType,
      size: Number(document.size.toString()),
    };
    for (const attribute of document.attributes) {
      if (attribute instanceof Api.DocumentAttributeFilename) raw.fileName = attribute.fileName;
      else if (attribute instanceof Api.DocumentAttributeSticker) raw.sticker = true;
      else if (attribute instanceof Api.DocumentAttributeVideo) raw.video = true;
      else if (attribute instanceof Api.DocumentAttributeAudio) {
        if (attribute.voice) raw.voice = true;
        else raw.audio = true;
      }
    }
    return raw;
  }

  return { type: 'other', className: media.className };
}

export function toRawMessage(item: HistoryItem, names: Map<string, string>): RawMessage {
  const raw: RawMessage = {
    id: item.id,
    date: new Date(item.date * 1000),
    senderRef: item.fromId ? peerKey(item.fromId) : undefined,
    replyToId: item.replyTo instanceof Api.MessageReplyHeader ? item.replyTo.replyToMsgId : undefined,
    post: item.post === true,
  };

  if (item instanceof Api.MessageService) {
    raw.service = toServiceAction(item.action, names);
    return raw;
  }

  raw.text = item.message;
  raw.media = toMedia(item.media);
  if (item.editDate && !item.editHide) {
    raw.editDate = new Date(item.editDate * 1000);
  }
  if (item.fwdFrom) {
    const origin = item.fwdFrom.fromId ? names.get(peerKey(item.fwdFrom.fromId)) : undefined;
    raw.forwardedFrom = item.fwdFrom.fromName ?? origin ?? 'Unknown';
  }
  return raw;
}
