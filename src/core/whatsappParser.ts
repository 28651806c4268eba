import { zonedTimeToDate } from '../utils/dateFormat';

export interface ParsedLine {
  timestamp: Date;
  sender: string;
  message: string;
}

const LINE = /^(\d{2})\/(\d{2})\/(\d{2}), (\d{2}):(\d{2}) - (.*)$/;
const SEPARATOR = ': ';

/**
 * Splits "sender: message". Known names win, longest first, since a name
 * may itself contain ": ".
 */
function splitSender(rest: string, knownSenders: readonly string[]): [string, string] | undefined {
  for (const name of knownSenders) {
    if (rest.startsWith(`${name}${SEPARATOR}`)) {
      return [name, rest.slice(name.length + SEPARATOR.length)];
    }
  }
  const index = rest.indexOf(SEPARATOR);
  if (index < 0) {
    return undefined;
  }
  return [rest.slice(0, index), rest.slice(index + SEPARATOR.length)];
}

/**
 * Reads a transcript written with the whatsapp or noheader template back
 * into entries. Lines before the first message (the encryption header) are
 * skipped; lines that do not start a message continue the previous one.
 * Sender names containing ": " only read back exactly when listed in
 * `knownSenders`.
 */
export function parseWhatsAppTranscript(
  content: string,
  timeZone?: string,
  knownSenders: readonly string[] = []
): ParsedLine[] {
  const entries: ParsedLine[] = [];
  const senders = [...knownSenders].sort((a, b) => b.length - a.length);

  for (const line of content.split(/\r?\n/)) {
    const match = LINE.exec(line);
    const split = match ? splitSender(match[6], senders) : undefined;
    if (match && split) {
      const [, day, month, year, hour, minute] = match;
      const [sender, message] = split;
      entries.push({
        timestamp: zonedTimeToDate(
          {
            year: 2000 + Number(year),
            month: Number(month),
            day: Number(day),
            hour: Number(hour),
            minute: Number(minute),
            second: 0,
          },
          timeZone
        ),
        sender,
        message,
      });
      continue;
    }

    const last = entries[entries.length - 1];
    if (last) {
      last.message += `\n${line}`;
    }
  }

  // A trailing newline in the file is not part of the last message
  const last = entries[entries.length - 1];
  if (last && content.endsWith('\n')) {
    last.message = last.message.replace(/\n$/, '');
  }
  return entries;
}
