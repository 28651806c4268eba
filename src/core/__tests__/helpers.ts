import type { MediaKind, MediaMessage, NormalizedMessage, ServiceMessage, TextMessage } from '../../types';

const base = {
  senderName: 'Alice',
  isEdited: false,
  isDeleted: false,
};

export function at(iso: string): Date {
  return new Date(`${iso}Z`);
}

export function textMessage(id: number, timestamp: string, text: string, overrides: Partial<TextMessage> = {}): NormalizedMessage {
  const message: TextMessage = { ...base, id, timestamp: at(timestamp), kind: 'text', text, ...overrides };
  return Object.freeze(message);
}

export function mediaMessage(
  id: number,
  timestamp: string,
  kind: MediaKind,
  overrides: Partial<Omit<MediaMessage, 'kind'>> = {}
): NormalizedMessage {
  const message: MediaMessage = { ...base, id, timestamp: at(timestamp), kind, text: '', media: { kind }, ...overrides };
  return Object.freeze(message);
}

export function serviceMessage(id: number, timestamp: string, action: string, overrides: Partial<ServiceMessage> = {}): NormalizedMessage {
  const message: ServiceMessage = {
    ...base,
    id,
    timestamp: at(timestamp),
    kind: 'service',
    text: '',
    serviceAction: action,
    ...overrides,
  };
  return Object.freeze(message);
}
