import type { FormatTemplate, MediaDescriptor, NormalizedMessage } from '../types';
import { compilePlaceholderPattern } from './placeholders';
import type { CompiledPlaceholderPattern } from './placeholders';
import { LINE_PLACEHOLDERS } from './templates';
import type { LinePlaceholder } from './templates';
import { assertWellFormed } from './normalizer';
import { formatDate } from '../utils/dateFormat';

export const DELETED_MARKER = 'This message was deleted';
export const EDITED_SUFFIX = ' <This message was edited>';
export const MEDIA_MARKER = '<Media omitted>';
export const LINK_MARKER = '<Link omitted>';
export const LOCATION_MARKER = '<Location omitted>';
export const CONTACT_MARKER = '<Contact omitted>';
export const POLL_MARKER = '<Poll omitted>';
export const EMPTY_MARKER = '<Message>';

interface CompiledTemplate {
  line: CompiledPlaceholderPattern<LinePlaceholder>;
  groupHeader?: CompiledPlaceholderPattern<LinePlaceholder>;
}

const compiledTemplates = new WeakMap<FormatTemplate, CompiledTemplate>();

function compileTemplate(template: FormatTemplate): CompiledTemplate {
  let compiled = compiledTemplates.get(template);
  if (!compiled) {
    compiled = {
      line: compilePlaceholderPattern(template.linePattern, LINE_PLACEHOLDERS, 'line pattern'),
      groupHeader:
        template.groupBySender && template.groupHeaderPattern
          ? compilePlaceholderPattern(template.groupHeaderPattern, LINE_PLACEHOLDERS, 'group header pattern')
          : undefined,
    };
    compiledTemplates.set(template, compiled);
  }
  return compiled;
}

// ============================================================================
// MESSAGE CONTENT
// ============================================================================

function fileMarker(media: MediaDescriptor): string {
  return media.fileName ? `<File: ${media.fileName} omitted>` : MEDIA_MARKER;
}

function withCaption(marker: string, caption: string): string {
  return caption ? `${marker} ${caption}` : marker;
}

function messageBody(message: NormalizedMessage): string {
  const { kind } = message;
  switch (kind) {
    case 'text':
      return message.text || EMPTY_MARKER;
    case 'service':
      return message.serviceAction;
    case 'link':
      return message.text || LINK_MARKER;
    case 'photo':
      return withCaption(MEDIA_MARKER, message.text);
    case 'video':
    case 'document':
    case 'audio':
    case 'voice':
    case 'sticker':
      return withCaption(fileMarker(message.media), message.text);
    case 'location':
      return withCaption(LOCATION_MARKER, message.text);
    case 'contact':
      return withCaption(CONTACT_MARKER, message.text);
    case 'poll':
      return withCaption(POLL_MARKER, message.text);
    default: {
      const unhandled: never = kind;
      return unhandled;
    }
  }
}

/**
 * The text substituted for `{message}`. The deletion marker replaces
 * everything else, including the edited suffix.
 */
export function messageContent(message: NormalizedMessage, template: FormatTemplate): string {
  if (message.isDeleted) {
    return DELETED_MARKER;
  }

  let prefix = '';
  if (template.annotateForwards && message.forwardedFrom) {
    prefix += `(forwarded from ${message.forwardedFrom}) `;
  }
  if (template.annotateReplies && message.replyToId !== undefined) {
    prefix += `(reply to #${message.replyToId}) `;
  }

  const suffix = message.isEdited ? EDITED_SUFFIX : '';
  return `${prefix}${messageBody(message)}${suffix}`;
}

// ============================================================================
// RENDERING
// ============================================================================

export function renderHeader(template: FormatTemplate): string | undefined {
  return template.includeHeader && template.headerText ? template.headerText : undefined;
}

/**
 * Renders one message. `previous` is the record rendered just before it and
 * only matters for templates that group consecutive messages by sender.
 */
export function renderMessage(
  message: NormalizedMessage,
  template: FormatTemplate,
  previous?: NormalizedMessage
): string {
  assertWellFormed(message);
  const compiled = compileTemplate(template);
  const content = messageContent(message, template);
  const values: Record<LinePlaceholder, string> = {
    date: formatDate(message.timestamp, template.dateFormat, template.timeZone),
    time: formatDate(message.timestamp, template.timeFormat, template.timeZone),
    sender: message.senderName,
    message: content,
  };

  const line = compiled.line.apply(values) || content;
  if (!compiled.groupHeader) {
    return line;
  }

  if (previous && previous.senderName === message.senderName) {
    return line;
  }
  const header = compiled.groupHeader.apply(values);
  return previous ? `\n${header}\n${line}` : `${header}\n${line}`;
}

/**
 * Streaming variant: yields the header (when enabled) and then one block per
 * message, carrying the previous record for sender grouping.
 */
export function* renderLines(
  messages: Iterable<NormalizedMessage>,
  template: FormatTemplate
): Generator<string> {
  const header = renderHeader(template);
  if (header !== undefined) {
    yield header;
  }

  let previous: NormalizedMessage | undefined;
  for (const message of messages) {
    yield renderMessage(message, template, previous);
    previous = message;
  }
}

export function render(messages: Iterable<NormalizedMessage>, template: FormatTemplate): string {
  return Array.from(renderLines(messages, template)).join('\n');
}
