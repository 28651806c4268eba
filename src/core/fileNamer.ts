import { compilePlaceholderPattern } from './placeholders';
import { getDateParts } from '../utils/dateFormat';

export const FILE_NAME_PLACEHOLDERS = ['chat', 'date', 'year', 'month', 'day'] as const;

export type FileNamePlaceholder = (typeof FILE_NAME_PLACEHOLDERS)[number];

export const DEFAULT_FILE_NAME_TEMPLATE = '{chat}_{date}';
export const DEFAULT_FILE_NAME = 'telegram_chat_export';

// Letters, combining marks and digits of any script, space, dash, underscore and dot are kept
const UNSAFE_CHARACTERS = /[^\p{L}\p{M}\p{N} \-_.]/gu;

// File systems cap a name at 255 bytes; the rest is left for _N, _stats.txt, .txt.part and _media
export const MAX_CHAT_NAME_BYTES = 150;
export const MAX_FILE_NAME_BYTES = 200;

export function sanitizeFileName(name: string): string {
  return name.replace(UNSAFE_CHARACTERS, '_');
}

/**
 * Cuts text to at most `maxBytes` of UTF-8 without splitting a code point
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  let bytes = 0;
  let end = 0;
  for (const char of text) {
    bytes += Buffer.byteLength(char, 'utf-8');
    if (bytes > maxBytes) break;
    end += char.length;
  }
  return text.slice(0, end);
}

/**
 * Throws TemplateError when the template uses an unknown placeholder
 */
export function validateFileNameTemplate(template: string): void {
  compilePlaceholderPattern(template, FILE_NAME_PLACEHOLDERS, 'file name template');
}

/**
 * Derives a file-system-safe base name (no extension) for a chat export.
 * Long chat titles are cut so the name stays within MAX_FILE_NAME_BYTES.
 * Falls back to DEFAULT_FILE_NAME when nothing usable is left.
 */
export function nameFile(
  chatName: string,
  date: Date,
  template: string = DEFAULT_FILE_NAME_TEMPLATE,
  timeZone?: string
): string {
  const parts = getDateParts(date, timeZone);
  const year = parts.year.toString().padStart(4, '0');
  const month = parts.month.toString().padStart(2, '0');
  const day = parts.day.toString().padStart(2, '0');

  const compiled = compilePlaceholderPattern(template, FILE_NAME_PLACEHOLDERS, 'file name template');
  const substituted = compiled.apply({
    chat: truncateUtf8(chatName, MAX_CHAT_NAME_BYTES),
    date: `${year}-${month}-${day}`,
    year,
    month,
    day,
  });

  const name = truncateUtf8(sanitizeFileName(substituted), MAX_FILE_NAME_BYTES).trim();
  if (!name || /^\.+$/.test(name)) {
    return DEFAULT_FILE_NAME;
  }
  return name;
}

/**
 * Appends _2, _3, ... to names that already occurred earlier in the list
 */
export function uniqueFileNames(names: readonly string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    let counter = 2;
    while (taken.has(candidate.toLowerCase())) {
      candidate = `${name}_${counter}`;
      counter++;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}
