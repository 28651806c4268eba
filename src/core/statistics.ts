import { MESSAGE_KINDS } from '../types';
import type { ExportStatistics, MessageKind, NormalizedMessage, SenderCount } from '../types';
import { isMediaKind, KIND_LABELS } from './kinds';
import { calendarDaysBetween, toCalendarDate } from '../utils/dateFormat';

export const DEFAULT_TOP_SENDERS = 10;

function emptyKindCounts(): Record<MessageKind, number> {
  return {
    text: 0, service: 0, photo: 0, video: 0, document: 0, audio: 0,
    voice: 0, sticker: 0, location: 0, contact: 0, poll: 0, link: 0,
  };
}

/**
 * Single forward pass over the filtered messages
 */
export function aggregate(
  messages: Iterable<NormalizedMessage>,
  options: { timeZone?: string } = {}
): ExportStatistics {
  const byKind = emptyKindCounts();
  const bySender = new Map<string, number>();
  let total = 0;
  let mediaCount = 0;
  let editedCount = 0;
  let deletedCount = 0;
  let earliest: Date | undefined;
  let latest: Date | undefined;

  for (const message of messages) {
    total++;
    byKind[message.kind]++;
    bySender.set(message.senderName, (bySender.get(message.senderName) ?? 0) + 1);

    if (isMediaKind(message.kind)) mediaCount++;
    if (message.isEdited && !message.isDeleted) editedCount++;
    if (message.isDeleted) deletedCount++;

    if (!earliest || message.timestamp < earliest) earliest = message.timestamp;
    if (!latest || message.timestamp > latest) latest = message.timestamp;
  }

  // Map iteration follows first appearance and Array.prototype.sort is stable,
  // so equal counts keep first-appearance order
  const topSenders: SenderCount[] = Array.from(bySender, ([sender, count]) => ({ sender, count })).sort(
    (a, b) => b.count - a.count
  );

  let spanDays = 0;
  if (earliest && latest) {
    const first = toCalendarDate(earliest, options.timeZone);
    const last = toCalendarDate(latest, options.timeZone);
    spanDays = Math.max(1, calendarDaysBetween(first, last) + 1);
  }

  return {
    total,
    byKind,
    bySender,
    topSenders,
    earliest,
    latest,
    spanDays,
    messagesPerDay: spanDays > 0 ? total / spanDays : 0,
    mediaCount,
    editedCount,
    deletedCount,
  };
}

/**
 * Plain-text report written next to the transcript
 */
export function formatStatistics(
  stats: ExportStatistics,
  chatName: string,
  options: { topSenders?: number; timeZone?: string } = {}
): string {
  const title = `Statistics for ${chatName}`;
  const lines = [title, '='.repeat(title.length), '', `Total messages: ${stats.total}`];

  if (stats.earliest && stats.latest) {
    const first = toCalendarDate(stats.earliest, options.timeZone);
    const last = toCalendarDate(stats.latest, options.timeZone);
    const days = `${stats.spanDays} day${stats.spanDays === 1 ? '' : 's'}`;
    lines.push(`Date range: ${first} to ${last} (${days})`);
  }
  lines.push(`Messages per day: ${stats.messagesPerDay.toFixed(2)}`);
  lines.push(`Media messages: ${stats.mediaCount}`);
  lines.push(`Service messages: ${stats.byKind.service}`);
  lines.push(`Edited messages: ${stats.editedCount}`);
  lines.push(`Deleted messages: ${stats.deletedCount}`);

  lines.push('', 'Messages by type:');
  for (const kind of MESSAGE_KINDS) {
    if (stats.byKind[kind] > 0) {
      lines.push(`  ${KIND_LABELS[kind]}: ${stats.byKind[kind]}`);
    }
  }

  const limit = options.topSenders ?? DEFAULT_TOP_SENDERS;
  lines.push('', 'Top senders:');
  stats.topSenders.slice(0, limit).forEach((entry, index) => {
    lines.push(`  ${index + 1}. ${entry.sender}: ${entry.count}`);
  });

  return lines.join('\n') + '\n';
}
