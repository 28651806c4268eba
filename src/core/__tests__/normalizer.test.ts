import { describe, it, expect } from 'vitest';
import type { MediaDescriptor, RawMessage, SenderResolver, TextMessage } from '../../types';
import { assertWellFormed, classifyMedia, normalize, normalizeMessage, UNKNOWN_SENDER } from '../normalizer';
import { MalformedRecordError } from '../../utils/errors';
import { mediaMessage, serviceMessage, textMessage } from './helpers';

const names: Record<string, string> = { user1: 'Alice', user2: 'Bob' };
const resolve: SenderResolver = (ref) => names[ref];
const date = new Date('2023-06-01T10:00:00Z');

function raw(overrides: Partial<RawMessage> = {}): RawMessage {
  return { id: 1, date, senderRef: 'user1', text: 'hello', ...overrides };
}

describe('normalizeMessage', () => {
  it('should turn plain text into a text record with the resolved sender', () => {
    const message = normalizeMessage(raw(), resolve);

    expect(message).toEqual({
      id: 1,
      timestamp: date,
      senderName: 'Alice',
      replyToId: undefined,
      forwardedFrom: undefined,
      isEdited: false,
      isDeleted: false,
      kind: 'text',
      text: 'hello',
    });
  });

  it('should return frozen records', () => {
    const message = normalizeMessage(raw(), resolve);
    expect(Object.isFrozen(message)).toBe(true);
  });

  it('should give deletion precedence over service, media and text', () => {
    const message = normalizeMessage(
      raw({ deleted: true, service: { type: 'pin_message' }, media: { type: 'photo' }, editDate: date }),
      resolve
    );

    expect(message?.kind).toBe('text');
    expect(message?.text).toBe('');
    expect(message?.isDeleted).toBe(true);
    expect(message?.isEdited).toBe(true);
  });

  it('should give a service action precedence over media', () => {
    const message = normalizeMessage(raw({ service: { type: 'edit_title', title: 'Crew' }, media: { type: 'photo' } }), resolve);

    expect(message?.kind).toBe('service');
    expect(message?.kind === 'service' && message.serviceAction).toBe('changed the group name to Crew');
  });

  it('should keep the text as caption of a media record', () => {
    const message = normalizeMessage(
      raw({ text: 'look', media: { type: 'document', fileName: 'a.pdf', size: 12, mimeType: 'application/pdf' } }),
      resolve
    );

    expect(message).toMatchObject({
      kind: 'document',
      text: 'look',
      media: { kind: 'document', fileName: 'a.pdf', size: 12, mimeType: 'application/pdf' },
    });
  });

  it('should skip records with nothing to show', () => {
    expect(normalizeMessage(raw({ text: '' }), resolve)).toBeUndefined();
    expect(normalizeMessage(raw({ text: undefined }), resolve)).toBeUndefined();
  });

  it('should mark records with an edit date as edited', () => {
    expect(normalizeMessage(raw({ editDate: date }), resolve)?.isEdited).toBe(true);
  });

  it('should carry reply and forward references', () => {
    const message = normalizeMessage(raw({ replyToId: 7, forwardedFrom: 'News' }), resolve);
    expect(message?.replyToId).toBe(7);
    expect(message?.forwardedFrom).toBe('News');
  });

  describe('sender resolution', () => {
    it('should fall back to Unknown when the lookup finds nothing', () => {
      expect(normalizeMessage(raw({ senderRef: 'user9' }), resolve)?.senderName).toBe(UNKNOWN_SENDER);
    });

    it('should fall back to Unknown when the lookup throws', () => {
      const failing: SenderResolver = () => {
        throw new Error('lookup failed');
      };
      expect(normalizeMessage(raw(), failing)?.senderName).toBe('Unknown');
    });

    it('should fall back to Unknown for blank names', () => {
      expect(normalizeMessage(raw(), () => '   ')?.senderName).toBe('Unknown');
    });

    it('should use the chat title for messages without a sender', () => {
      const message = normalizeMessage(raw({ senderRef: undefined, post: true }), resolve, { chatTitle: 'Daily News' });
      expect(message?.senderName).toBe('Daily News');
    });

    it('should use the chat title for channel posts that carry a sender', () => {
      const message = normalizeMessage(raw({ senderRef: 'user1', post: true }), resolve, { chatTitle: 'Daily News' });
      expect(message?.senderName).toBe('Daily News');
    });

    it('should resolve the sender of a channel post when the chat title is unknown', () => {
      expect(normalizeMessage(raw({ post: true }), resolve)?.senderName).toBe('Alice');
    });

    it('should use Unknown without sender and chat title', () => {
      expect(normalizeMessage(raw({ senderRef: undefined }), resolve)?.senderName).toBe('Unknown');
    });
  });
});

describe('normalize', () => {
  it('should keep order and drop empty entries', () => {
    const messages = normalize(
      [raw({ id: 1, text: 'a' }), raw({ id: 2, text: '' }), raw({ id: 3, senderRef: 'user2', text: 'c' })],
      resolve
    );

    expect(messages.map((message) => [message.id, message.senderName])).toEqual([
      [1, 'Alice'],
      [3, 'Bob'],
    ]);
  });
});

describe('classifyMedia', () => {
  it('should map media classes to kinds', () => {
    expect(classifyMedia({ type: 'photo' })).toBe('photo');
    expect(classifyMedia({ type: 'webpage' })).toBe('link');
    expect(classifyMedia({ type: 'geo' })).toBe('location');
    expect(classifyMedia({ type: 'contact' })).toBe('contact');
    expect(classifyMedia({ type: 'poll' })).toBe('poll');
  });

  it('should sub-type documents by their attributes', () => {
    expect(classifyMedia({ type: 'document', sticker: true, video: true })).toBe('sticker');
    expect(classifyMedia({ type: 'document', voice: true, audio: true })).toBe('voice');
    expect(classifyMedia({ type: 'document', audio: true })).toBe('audio');
    expect(classifyMedia({ type: 'document', video: true })).toBe('video');
  });

  it('should fall back to the mime type for documents without attributes', () => {
    expect(classifyMedia({ type: 'document', mimeType: 'video/mp4' })).toBe('video');
    expect(classifyMedia({ type: 'document', mimeType: 'Audio/OGG' })).toBe('audio');
    expect(classifyMedia({ type: 'document', mimeType: 'application/zip' })).toBe('document');
  });

  it('should treat unknown media as documents', () => {
    expect(classifyMedia({ type: 'other', className: 'MessageMediaDice' })).toBe('document');
  });
});

describe('assertWellFormed', () => {
  it('should accept normalized records', () => {
    expect(() => assertWellFormed(textMessage(1, '2023-06-01T10:00:00', 'hi'))).not.toThrow();
  });

  it('should reject a text record carrying a media descriptor', () => {
    const broken: TextMessage & { media: MediaDescriptor } = {
      id: 4,
      timestamp: date,
      senderName: 'Alice',
      isEdited: false,
      isDeleted: false,
      kind: 'text',
      text: 'hi',
      media: { kind: 'photo' },
    };
    expect(() => assertWellFormed(broken)).toThrow(MalformedRecordError);
    expect(() => assertWellFormed(broken)).toThrow('Message 4: text record carries a media descriptor');
  });

  it('should reject a descriptor whose kind differs from the record', () => {
    const mismatched = mediaMessage(5, '2023-06-01T10:00:00', 'photo', { media: { kind: 'video' } });
    expect(() => assertWellFormed(mismatched)).toThrow(
      'Message 5: media descriptor kind video does not match record kind photo'
    );
  });

  it('should reject a service record without an action', () => {
    expect(() => assertWellFormed(serviceMessage(6, '2023-06-01T10:00:00', ''))).toThrow(
      'Message 6: service record has no action'
    );
  });
});
