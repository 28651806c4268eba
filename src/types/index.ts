// ============================================================================
// NORMALIZED MESSAGES
// ============================================================================

export const MEDIA_KINDS = [
  'photo',
  'video',
  'document',
  'audio',
  'voice',
  'sticker',
  'location',
  'contact',
  'poll',
  'link',
] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

export type MessageKind = 'text' | 'service' | MediaKind;

export const MESSAGE_KINDS: readonly MessageKind[] = ['text', 'service', ...MEDIA_KINDS];

export interface MediaDescriptor {
  kind: MediaKind;
  fileName?: string;
  size?: number;
  mimeType?: string;
}

interface BaseMessage {
  id: number;
  timestamp: Date;
  senderName: string;
  replyToId?: number;
  forwardedFrom?: string;
  isEdited: boolean;
  isDeleted: boolean;
}

export interface TextMessage extends BaseMessage {
  kind: 'text';
  text: string;
}

export interface MediaMessage extends BaseMessage {
  kind: MediaKind;
  /** Caption, empty when the media was sent without one */
  text: string;
  media: MediaDescriptor;
}

export interface ServiceMessage extends BaseMessage {
  kind: 'service';
  text: '';
  serviceAction: string;
}

export type NormalizedMessage = Readonly<TextMessage> | Readonly<MediaMessage> | Readonly<ServiceMessage>;

// ============================================================================
// RAW MESSAGES (source-neutral shape produced by chat sources)
// ============================================================================

export type RawMediaType = 'photo' | 'document' | 'webpage' | 'geo' | 'contact' | 'poll' | 'other';

export interface RawMedia {
  type: RawMediaType;
  fileName?: string;
  mimeType?: string;
  size?: number;
  sticker?: boolean;
  voice?: boolean;
  audio?: boolean;
  video?: boolean;
  /** Source class name for media the source could not classify */
  className?: string;
}

export type RawServiceActionType =
  | 'chat_create'
  | 'add_members'
  | 'remove_members'
  | 'join_by_link'
  | 'edit_title'
  | 'edit_photo'
  | 'delete_photo'
  | 'pin_message'
  | 'channel_create'
  | 'other';

export interface RawServiceAction {
  type: RawServiceActionType;
  title?: string;
  members?: string[];
  /** Source action name, used for actions without a fixed phrase */
  name?: string;
}

export interface RawMessage {
  id: number;
  date: Date;
  senderRef?: string;
  text?: string;
  media?: RawMedia;
  replyToId?: number;
  forwardedFrom?: string;
  editDate?: Date;
  deleted?: boolean;
  service?: RawServiceAction;
  /** Posted on behalf of a channel; the chat title is shown as sender */
  post?: boolean;
}

/**
 * Looks up a display name for a sender reference. May return undefined or
 * throw when the sender cannot be resolved.
 */
export type SenderResolver = (senderRef: string) => string | undefined;

// ============================================================================
// CHATS & SOURCES
// ============================================================================

export type ChatType = 'user' | 'group' | 'channel';

export interface ChatSummary {
  id: string;
  title: string;
  type: ChatType;
  unreadCount: number;
  lastMessageDate?: Date;
  messageCount?: number;
}

export interface FetchOptions {
  /** 0 fetches the whole history */
  limit: number;
  since?: Date;
  until?: Date;
  signal?: AbortSignal;
  onProgress?: (fetched: number) => void;
}

export interface FetchedHistory {
  /** Oldest first */
  messages: RawMessage[];
  resolveSender: SenderResolver;
  truncated: boolean;
}

export interface ChatSource {
  readonly name: string;
  listChats(limit?: number): Promise<ChatSummary[]>;
  fetchHistory(chat: ChatSummary, options: FetchOptions): Promise<FetchedHistory>;
  fetchMedia(chat: ChatSummary, messageId: number): Promise<Buffer | undefined>;
  /** Drops whatever the source kept of a chat's history once it is exported */
  releaseChat?(chat: ChatSummary): void;
  close(): Promise<void>;
}

// ============================================================================
// FILTERS, TEMPLATES & STATISTICS
// ============================================================================

/** Calendar date written as YYYY-MM-DD */
export type CalendarDate = string;

export interface ExportFilter {
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  includedMediaKinds: ReadonlySet<MediaKind>;
  timeZone?: string;
}

export const BUILT_IN_TEMPLATE_NAMES = ['whatsapp', 'noheader', 'telegram', 'discord', 'simple'] as const;

export type BuiltInTemplateName = (typeof BUILT_IN_TEMPLATE_NAMES)[number];

export type TemplateName = BuiltInTemplateName | 'custom';

export interface FormatTemplate {
  name: TemplateName;
  dateFormat: string;
  timeFormat: string;
  linePattern: string;
  includeHeader: boolean;
  headerText?: string;
  /** Discord-style: one header per run of messages from the same sender */
  groupBySender?: boolean;
  groupHeaderPattern?: string;
  annotateReplies?: boolean;
  annotateForwards?: boolean;
  timeZone?: string;
}

export interface SenderCount {
  sender: string;
  count: number;
}

export interface ExportStatistics {
  total: number;
  byKind: Record<MessageKind, number>;
  bySender: Map<string, number>;
  topSenders: SenderCount[];
  earliest?: Date;
  latest?: Date;
  spanDays: number;
  messagesPerDay: number;
  mediaCount: number;
  editedCount: number;
  deletedCount: number;
}

export interface SearchQuery {
  text?: string;
  sender?: string;
  kinds?: ReadonlySet<MessageKind>;
}
