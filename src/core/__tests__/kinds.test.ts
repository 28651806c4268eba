import { describe, it, expect } from 'vitest';
import { isMediaKind, parseMediaKinds, parseMessageKinds } from '../kinds';
import { describeServiceAction } from '../serviceActions';
import { MediaKindError } from '../../utils/errors';

describe('parseMediaKinds', () => {
  it('should parse a comma separated list', () => {
    expect([...parseMediaKinds('photo, Video,photo')]).toEqual(['photo', 'video']);
  });

  it('should accept all and none', () => {
    expect(parseMediaKinds('all').size).toBe(10);
    expect(parseMediaKinds('none').size).toBe(0);
    expect(parseMediaKinds('').size).toBe(0);
  });

  it('should accept a list of names', () => {
    expect([...parseMediaKinds(['poll', 'link'])]).toEqual(['poll', 'link']);
  });

  it('should reject text and unknown names', () => {
    expect(() => parseMediaKinds('text')).toThrow(MediaKindError);
    expect(() => parseMediaKinds('photo,gif')).toThrow('Unknown media kind "gif"');
  });
});

describe('parseMessageKinds', () => {
  it('should accept text and service next to media kinds', () => {
    expect([...parseMessageKinds('text,service,voice')]).toEqual(['text', 'service', 'voice']);
  });

  it('should reject unknown names', () => {
    expect(() => parseMessageKinds('text,gif')).toThrow(MediaKindError);
  });
});

describe('isMediaKind', () => {
  it('should tell media kinds from the rest', () => {
    expect(isMediaKind('sticker')).toBe(true);
    expect(isMediaKind('service')).toBe(false);
  });
});

describe('describeServiceAction', () => {
  it('should use fixed phrases', () => {
    expect(describeServiceAction({ type: 'chat_create' })).toBe('created this group');
    expect(describeServiceAction({ type: 'join_by_link' })).toBe('joined the group by link');
    expect(describeServiceAction({ type: 'edit_photo' })).toBe('changed the group photo');
    expect(describeServiceAction({ type: 'delete_photo' })).toBe('removed the group photo');
    expect(describeServiceAction({ type: 'pin_message' })).toBe('pinned a message');
  });

  it('should name members when they are known', () => {
    expect(describeServiceAction({ type: 'add_members', members: ['Bob', ' ', 'Carol'] })).toBe('added Bob, Carol');
    expect(describeServiceAction({ type: 'add_members' })).toBe('added a participant to the group');
    expect(describeServiceAction({ type: 'remove_members', members: ['Bob'] })).toBe('removed Bob');
  });

  it('should include titles', () => {
    expect(describeServiceAction({ type: 'edit_title', title: 'Crew' })).toBe('changed the group name to Crew');
    expect(describeServiceAction({ type: 'channel_create', title: 'News' })).toBe('created the channel News');
    expect(describeServiceAction({ type: 'channel_create' })).toBe('created the channel');
  });

  it('should name unrecognised actions', () => {
    expect(describeServiceAction({ type: 'other', name: 'MessageActionGameScore' })).toBe(
      'performed action: MessageActionGameScore'
    );
  });
});
