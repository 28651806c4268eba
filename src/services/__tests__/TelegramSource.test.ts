import { describe, it, expect } from 'vitest';
import bigInt from 'big-integer';
import { Api } from 'telegram';
import { peerKey, toMedia, toRawMessage, toServiceAction } from '../TelegramSource';
import { classifyMedia } from '../../core/normalizer';

const names = new Map([
  ['user42', 'Dana'],
  ['user43', 'Eli'],
]);

// 2023-06-01T10:00:00Z
const TEN_AM = 1685613600;

const user = (id: number) => new Api.PeerUser({ userId: bigInt(id) });

function documentMedia(attributes: Api.TypeDocumentAttribute[], mimeType = 'application/octet-stream') {
  return new Api.MessageMediaDocument({
    document: new Api.Document({
      id: bigInt(1),
      accessHash: bigInt(2),
      fileReference: Buffer.from('ref'),
      date: TEN_AM,
      mimeType,
      size: bigInt(2048),
      dcId: 2,
      attributes,
    }),
  });
}

interface MessageFields {
  peerId?: Api.TypePeer;
  fromId?: Api.TypePeer;
  replyTo?: Api.MessageReplyHeader;
  fwdFrom?: Api.MessageFwdHeader;
  editDate?: number;
  editHide?: boolean;
  post?: boolean;
}

function message(overrides: MessageFields = {}): Api.Message {
  return new Api.Message({
    id: 5,
    peerId: new Api.PeerChat({ chatId: bigInt(7) }),
    date: TEN_AM,
    message: 'ok',
    ...overrides,
  });
}

describe('peerKey', () => {
  it('should key users, chats and channels apart', () => {
    expect(peerKey(user(42))).toBe('user42');
    expect(peerKey(new Api.PeerChat({ chatId: bigInt(7) }))).toBe('chat7');
    expect(peerKey(new Api.PeerChannel({ channelId: bigInt(9) }))).toBe('channel9');
  });
});

describe('toMedia', () => {
  it('should ignore missing and empty media', () => {
    expect(toMedia(undefined)).toBeUndefined();
    expect(toMedia(new Api.MessageMediaEmpty())).toBeUndefined();
  });

  it('should map media classes', () => {
    expect(toMedia(new Api.MessageMediaPhoto({}))).toEqual({ type: 'photo' });
    expect(toMedia(new Api.MessageMediaGeo({ geo: new Api.GeoPointEmpty() }))).toEqual({ type: 'geo' });
    expect(toMedia(new Api.MessageMediaDice({ value: 3, emoticon: '🎲' }))).toEqual({
      type: 'other',
      className: 'MessageMediaDice',
    });
  });

  it('should read file name, mime type and size of documents', () => {
    const pdf = documentMedia([new Api.DocumentAttributeFilename({ fileName: 'a.pdf' })], 'application/pdf');

    expect(toMedia(pdf)).toEqual({
      type: 'document',
      mimeType: 'application/pdf',
      size: 2048,
      fileName: 'a.pdf',
    });
    expect(toMedia(new Api.MessageMediaDocument({}))).toEqual({ type: 'document' });
  });

  it('should sub-type documents by their attributes', () => {
    const sticker = new Api.DocumentAttributeSticker({ alt: '🙂', stickerset: new Api.InputStickerSetEmpty() });
    const voice = new Api.DocumentAttributeAudio({ duration: 3, voice: true });
    const song = new Api.DocumentAttributeAudio({ duration: 180 });
    const video = new Api.DocumentAttributeVideo({ duration: 10, w: 640, h: 480 });

    const kinds = [sticker, voice, song, video].map((attribute) => {
      const media = toMedia(documentMedia([attribute]));
      return media ? classifyMedia(media) : undefined;
    });

    expect(kinds).toEqual(['sticker', 'voice', 'audio', 'video']);
  });
});

describe('toServiceAction', () => {
  it('should map known actions with member names', () => {
    expect(toServiceAction(new Api.MessageActionChatCreate({ title: 'Team', users: [bigInt(42)] }), names)).toEqual({
      type: 'chat_create',
      title: 'Team',
    });
    expect(toServiceAction(new Api.MessageActionChatAddUser({ users: [bigInt(42), bigInt(99)] }), names)).toEqual({
      type: 'add_members',
      members: ['Dana'],
    });
    expect(toServiceAction(new Api.MessageActionChatDeleteUser({ userId: bigInt(43) }), names)).toEqual({
      type: 'remove_members',
      members: ['Eli'],
    });
    expect(toServiceAction(new Api.MessageActionPinMessage(), names)).toEqual({ type: 'pin_message' });
  });

  it('should name other actions after their class', () => {
    expect(toServiceAction(new Api.MessageActionHistoryClear(), names)).toEqual({ type: 'other', name: 'history clear' });
  });
});

describe('toRawMessage', () => {
  it('should map sender, reply, edit and forward headers', () => {
    const raw = toRawMessage(
      message({
        fromId: user(42),
        replyTo: new Api.MessageReplyHeader({ replyToMsgId: 3 }),
        editDate: TEN_AM + 300,
        fwdFrom: new Api.MessageFwdHeader({ date: TEN_AM - 3600, fromName: 'News' }),
      }),
      names
    );

    expect(raw).toEqual({
      id: 5,
      date: new Date('2023-06-01T10:00:00Z'),
      senderRef: 'user42',
      replyToId: 3,
      post: false,
      text: 'ok',
      media: undefined,
      editDate: new Date('2023-06-01T10:05:00Z'),
      forwardedFrom: 'News',
    });
  });

  it('should not mark hidden edits', () => {
    expect(toRawMessage(message({ editDate: TEN_AM + 60, editHide: true }), names).editDate).toBeUndefined();
  });

  it('should name the forward origin from its peer', () => {
    const fromPeer = message({ fwdFrom: new Api.MessageFwdHeader({ date: TEN_AM, fromId: user(43) }) });
    const anonymous = message({ fwdFrom: new Api.MessageFwdHeader({ date: TEN_AM }) });

    expect(toRawMessage(fromPeer, names).forwardedFrom).toBe('Eli');
    expect(toRawMessage(anonymous, names).forwardedFrom).toBe('Unknown');
  });

  it('should flag channel posts', () => {
    const raw = toRawMessage(message({ post: true, peerId: new Api.PeerChannel({ channelId: bigInt(9) }) }), names);

    expect(raw.post).toBe(true);
    expect(raw.senderRef).toBeUndefined();
  });

  it('should map service messages', () => {
    const service = new Api.MessageService({
      id: 1,
      peerId: new Api.PeerChat({ chatId: bigInt(7) }),
      fromId: user(42),
      date: TEN_AM,
      action: new Api.MessageActionChatAddUser({ users: [bigInt(43)] }),
    });

    expect(toRawMessage(service, names)).toEqual({
      id: 1,
      date: new Date('2023-06-01T10:00:00Z'),
      senderRef: 'user42',
      replyToId: undefined,
      post: false,
      service: { type: 'add_members', members: ['Eli'] },
    });
  });
});
