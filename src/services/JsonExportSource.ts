import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type {
  ChatSource,
  ChatSummary,
  ChatType,
  FetchedHistory,
  FetchOptions,
  RawMedia,
  RawMessage,
  RawServiceAction,
  RawServiceActionType,
} from '../types';
import { ChatSourceError, errorMessage } from '../utils/errors';

/**
 * Telegram Desktop JSON export (Settings > Advanced > Export chat history).
 * Either a single chat or a whole account export with `chats.list`.
 */

const textEntitySchema = z.union([
  z.string(),
  z.object({ type: z.string(), text: z.string(), href: z.string().optional() }),
]);

const exportMessageSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  date: z.string(),
  date_unixtime: z.string().optional(),
  from: z.string().nullable().optional(),
  from_id: z.string().optional(),
  actor: z.string().nullable().optional(),
  actor_id: z.string().optional(),
  action: z.string().optional(),
  members: z.array(z.string().nullable()).optional(),
  title: z.string().optional(),
  text: z.union([z.string(), z.array(textEntitySchema)]).default(''),
  photo: z.string().optional(),
  file: z.string().optional(),
  file_name: z.string().optional(),
  file_size: z.number().optional(),
  media_type: z.string().optional(),
  mime_type: z.string().optional(),
  edited: z.string().optional(),
  edited_unixtime: z.string().optional(),
  reply_to_message_id: z.number().int().optional(),
  forwarded_from: z.string().nullable().optional(),
  location_information: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  contact_information: z.record(z.unknown()).optional(),
  poll: z.object({ question: z.string() }).passthrough().optional(),
  sticker_emoji: z.string().optional(),
});

const exportChatSchema = z.object({
  id: z.number(),
  name: z.string().nullable().optional(),
  type: z.string(),
  messages: z.array(exportMessageSchema),
});

const exportFileSchema = z.union([
  exportChatSchema,
  z.object({
    chats: z.object({ list: z.array(exportChatSchema) }),
    left_chats: z.object({ list: z.array(exportChatSchema) }).optional(),
  }),
]);

type ExportMessage = z.infer<typeof exportMessageSchema>;
type ExportChat = z.infer<typeof exportChatSchema>;

// Placeholder Telegram Desktop writes when a file was not exported
const NOT_INCLUDED = /^\(File not included/;

const ACTION_TYPES: Record<string, RawServiceActionType> = {
  create_group: 'chat_create',
  invite_members: 'add_members',
  remove_members: 'remove_members',
  join_group_by_link: 'join_by_link',
  edit_group_title: 'edit_title',
  edit_group_photo: 'edit_photo',
  delete_group_photo: 'delete_photo',
  pin_message: 'pin_message',
  create_channel: 'channel_create',
};

const VIDEO_MEDIA_TYPES = new Set(['video_file', 'video_message', 'animation']);

const CHAT_TYPES: Record<string, ChatType> = {
  personal_chat: 'user',
  bot_chat: 'user',
  saved_messages: 'user',
  private_group: 'group',
  private_supergroup: 'group',
  public_supergroup: 'group',
  private_channel: 'channel',
  public_channel: 'channel',
};

export class JsonExportSource implements ChatSource {
  readonly name = 'Telegram Desktop export';
  private readonly baseDir: string;
  private chats: ExportChat[] | null = null;

  constructor(private readonly filePath: string) {
    this.baseDir = path.dirname(filePath);
  }

  async listChats(limit?: number): Promise<ChatSummary[]> {
    const chats = await this.load();
    const summaries = chats.map((chat) => this.summarize(chat));
    return limit && limit > 0 ? summaries.slice(0, limit) : summaries;
  }

  async fetchHistory(chat: ChatSummary, options: FetchOptions): Promise<FetchedHistory> {
    const exportChat = await this.findChat(chat);
    const senders = new Map<string, string>();
    const messages: RawMessage[] = [];

    for (const message of exportChat.messages) {
      rememberSender(senders, message.from_id, message.from);
      rememberSender(senders, message.actor_id, message.actor);

      const raw = toRawMessage(message, CHAT_TYPES[exportChat.type] === 'channel');
      if (options.since && raw.date < options.since) continue;
      if (options.until && raw.date >= options.until) continue;
      messages.push(raw);
    }

    if (options.signal?.aborted) {
      return { messages: [], resolveSender: (ref) => senders.get(ref), truncated: true };
    }

    // The limit keeps the most recent messages, oldest first
    const limited = options.limit > 0 ? messages.slice(-options.limit) : messages;
    options.onProgress?.(limited.length);
    return { messages: limited, resolveSender: (ref) => senders.get(ref), truncated: false };
  }

  async fetchMedia(chat: ChatSummary, messageId: number): Promise<Buffer | undefined> {
    const exportChat = await this.findChat(chat);
    const message = exportChat.messages.find((candidate) => candidate.id === messageId);
    const relative = message?.photo ?? message?.file;
    if (!relative || NOT_INCLUDED.test(relative)) {
      return undefined;
    }

    try {
      return await fs.readFile(path.resolve(this.baseDir, relative));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.chats = null;
  }

  private async load(): Promise<ExportChat[]> {
    if (this.chats) {
      return this.chats;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ChatSourceError(`Cannot read export file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ChatSourceError(`${this.filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = exportFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
      throw new ChatSourceError(
        `${this.filePath} is not a Telegram Desktop JSON export${where}: ${issue?.message ?? 'invalid'}`
      );
    }

    const data = parsed.data;
    this.chats = 'chats' in data ? [...data.chats.list, ...(data.left_chats?.list ?? [])] : [data];
    return this.chats;
  }

  private async findChat(chat: ChatSummary): Promise<ExportChat> {
    const chats = await this.load();
    const found = chats.find((candidate) => String(candidate.id) === chat.id);
    if (!found) {
      throw new ChatSourceError(`Chat ${chat.title} (${chat.id}) is not in ${this.filePath}`);
    }
    return found;
  }

  private summarize(chat: ExportChat): ChatSummary {
    const last = chat.messages[chat.messages.length - 1];
    return {
      id: String(chat.id),
      title: chat.name?.trim() || (chat.type === 'saved_messages' ? 'Saved Messages' : `Chat ${chat.id}`),
      type: CHAT_TYPES[chat.type] ?? 'group',
      unreadCount: 0,
      lastMessageDate: last ? parseExportDate(last.date_unixtime, last.date) : undefined,
      messageCount: chat.messages.length,
    };
  }
}

function rememberSender(senders: Map<string, string>, id?: string, name?: string | null): void {
  if (id && name && !senders.has(id)) {
    senders.set(id, name);
  }
}

function parseExportDate(unixTime: string | undefined, isoLocal: string): Date {
  if (unixTime && /^\d+$/.test(unixTime)) {
    return new Date(Number(unixTime) * 1000);
  }
  return new Date(isoLocal);
}

function plainText(text: ExportMessage['text']): string {
  if (typeof text === 'string') {
    return text;
  }
  return text.map((entity) => (typeof entity === 'string' ? entity : entity.text)).join('');
}

function hasLink(text: ExportMessage['text']): boolean {
  return (
    Array.isArray(text) &&
    text.some((entity) => typeof entity !== 'string' && (entity.type === 'link' || entity.type === 'text_link'))
  );
}

function toServiceAction(message: ExportMessage): RawServiceAction {
  const action = message.action ?? 'unknown';
  const type = ACTION_TYPES[action] ?? 'other';
  return {
    type,
    title: message.title,
    members: message.members?.filter((member): member is string => Boolean(member)),
    name: type === 'other' ? action.replace(/_/g, ' ') : undefined,
  };
}

function toMedia(message: ExportMessage): RawMedia | undefined {
  if (message.photo) {
    return { type: 'photo', size: message.file_size };
  }

  if (message.file || message.media_type || message.mime_type) {
    const exported = message.file && !NOT_INCLUDED.test(message.file) ? message.file : undefined;
    const fileName = message.file_name ?? (exported ? path.basename(exported) : undefined);
    return {
      type: 'document',
      fileName,
      mimeType: message.mime_type,
      size: message.file_size,
      sticker: message.media_type === 'sticker',
      voice: message.media_type === 'voice_message',
      audio: message.media_type === 'audio_file',
      video: VIDEO_MEDIA_TYPES.has(message.media_type ?? ''),
    };
  }

  if (message.location_information) return { type: 'geo' };
  if (message.contact_information) return { type: 'contact' };
  if (message.poll) return { type: 'poll' };
  if (hasLink(message.text)) return { type: 'webpage' };
  return undefined;
}

function toRawMessage(message: ExportMessage, isChannel: boolean): RawMessage {
  const date = parseExportDate(message.date_unixtime, message.date);
  const raw: RawMessage = {
    id: message.id,
    date,
    text: plainText(message.text),
    replyToId: message.reply_to_message_id,
    forwardedFrom: message.forwarded_from ?? undefined,
    editDate: message.edited ? parseExportDate(message.edited_unixtime, message.edited) : undefined,
  };

  if (message.type === 'service') {
    raw.senderRef = message.actor_id;
    raw.service = toServiceAction(message);
    return raw;
  }

  raw.senderRef = message.from_id;
  raw.post = isChannel;
  raw.media = toMedia(message);
  return raw;
}
