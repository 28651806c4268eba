import type { RawServiceAction } from '../types';

/**
 * Fixed phrase for a service event, as it appears in the transcript
 */
export function describeServiceAction(action: RawServiceAction): string {
  const members = action.members?.filter((member) => member.trim().length > 0) ?? [];

  switch (action.type) {
    case 'chat_create':
      return 'created this group';
    case 'add_members':
      return members.length > 0 ? `added ${members.join(', ')}` : 'added a participant to the group';
    case 'remove_members':
      return members.length > 0 ? `removed ${members.join(', ')}` : 'removed a participant from the group';
    case 'join_by_link':
      return 'joined the group by link';
    case 'edit_title':
      return `changed the group name to ${action.title ?? 'unknown'}`;
    case 'edit_photo':
      return 'changed the group photo';
    case 'delete_photo':
      return 'removed the group photo';
    case 'pin_message':
      return 'pinned a message';
    case 'channel_create':
      return action.title ? `created the channel ${action.title}` : 'created the channel';
    case 'other':
      return `performed action: ${action.name ?? 'unknown'}`;
  }
}
