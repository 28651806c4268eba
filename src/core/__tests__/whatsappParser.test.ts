import { describe, it, expect } from 'vitest';
import { parseWhatsAppTranscript } from '../whatsappParser';
import { WHATSAPP_HEADER } from '../templates';
import { at } from './helpers';

describe('parseWhatsAppTranscript', () => {
  it('should skip the header and read each message line', () => {
    const content = [
      WHATSAPP_HEADER,
      '31/12/22, 23:59 - Alice: happy new year',
      '01/01/23, 00:01 - Bob: you too',
    ].join('\n');

    expect(parseWhatsAppTranscript(content, 'UTC')).toEqual([
      { timestamp: at('2022-12-31T23:59:00'), sender: 'Alice', message: 'happy new year' },
      { timestamp: at('2023-01-01T00:01:00'), sender: 'Bob', message: 'you too' },
    ]);
  });

  it('should join continuation lines to the previous message', () => {
    const parsed = parseWhatsAppTranscript('01/06/23, 10:00 - Alice: one\ntwo\n\nthree\n', 'UTC');

    expect(parsed).toHaveLength(1);
    expect(parsed[0].message).toBe('one\ntwo\n\nthree');
  });

  it('should keep colons after the first separator in the message', () => {
    const [entry] = parseWhatsAppTranscript('01/06/23, 10:00 - Alice: note: bring snacks', 'UTC');
    expect(entry.sender).toBe('Alice');
    expect(entry.message).toBe('note: bring snacks');
  });

  it('should read times in the given zone', () => {
    const [entry] = parseWhatsAppTranscript('01/06/23, 10:00 - Alice: hi', 'Europe/Berlin');
    expect(entry.timestamp).toEqual(at('2023-06-01T08:00:00'));
  });

  it('should accept Windows line endings', () => {
    const parsed = parseWhatsAppTranscript('01/06/23, 10:00 - Alice: a\r\n01/06/23, 10:01 - Bob: b\r\n', 'UTC');
    expect(parsed.map((entry) => entry.message)).toEqual(['a', 'b']);
  });

  it('should return nothing for a header-only transcript', () => {
    expect(parseWhatsAppTranscript(WHATSAPP_HEADER)).toEqual([]);
  });
});
