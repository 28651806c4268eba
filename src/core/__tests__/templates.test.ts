import { describe, it, expect } from 'vitest';
import { createCustomTemplate, getTemplate, isTemplateName, validateTemplate, WHATSAPP_HEADER } from '../templates';
import { compilePlaceholderPattern } from '../placeholders';
import { renderMessage } from '../renderer';
import { TemplateError } from '../../utils/errors';
import { textMessage } from './helpers';

describe('getTemplate', () => {
  it('should resolve every built-in template', () => {
    for (const name of ['whatsapp', 'noheader', 'telegram', 'discord', 'simple']) {
      expect(getTemplate(name).name).toBe(name);
    }
  });

  it('should give the WhatsApp template its verbatim header', () => {
    const template = getTemplate('whatsapp');
    expect(template.includeHeader).toBe(true);
    expect(template.headerText).toBe(WHATSAPP_HEADER);
    expect(getTemplate('noheader').includeHeader).toBe(false);
  });

  it('should carry the time zone and return a frozen copy', () => {
    const template = getTemplate('simple', { timeZone: 'Asia/Tokyo' });
    expect(template.timeZone).toBe('Asia/Tokyo');
    expect(Object.isFrozen(template)).toBe(true);
    expect(getTemplate('simple').timeZone).toBeUndefined();
  });

  it('should reject unknown names', () => {
    expect(() => getTemplate('slack')).toThrow('Unknown format "slack" (known: whatsapp, noheader, telegram, discord, simple, custom)');
  });

  it('should require a configuration for the custom format', () => {
    expect(() => getTemplate('custom')).toThrow(TemplateError);
  });

  it('should build a custom template from its configuration', () => {
    const template = getTemplate('custom', {
      custom: { linePattern: '{time} <{sender}> {message}', dateFormat: '%Y', timeFormat: '%H:%M', includeHeader: false },
      timeZone: 'UTC',
    });

    expect(renderMessage(textMessage(1, '2023-06-01T08:15:00', 'hey'), template)).toBe('08:15 <Alice> hey');
  });
});

describe('validateTemplate', () => {
  const base = getTemplate('simple');

  it('should reject an empty line pattern', () => {
    expect(() => validateTemplate({ ...base, linePattern: '   ' })).toThrow('Line pattern must not be empty');
  });

  it('should reject unknown placeholders', () => {
    expect(() => validateTemplate({ ...base, linePattern: '{sender}: {body}' })).toThrow(TemplateError);
  });

  it('should reject unknown date tokens', () => {
    expect(() => validateTemplate({ ...base, dateFormat: '%Q' })).toThrow('Unknown date token "%Q" in pattern "%Q"');
    expect(() => validateTemplate({ ...base, timeFormat: '%H%' })).toThrow('Date pattern "%H%" ends with a lone "%"');
  });

  it('should reject an enabled header without text', () => {
    expect(() => validateTemplate({ ...base, includeHeader: true, headerText: '' })).toThrow(
      'Header is enabled but header text is empty'
    );
  });

  it('should reject grouping without a group header', () => {
    expect(() => validateTemplate({ ...base, groupBySender: true })).toThrow(
      'Grouped templates need a group header pattern'
    );
  });

  it('should reject unknown time zones', () => {
    expect(() => validateTemplate({ ...base, timeZone: 'Nowhere/City' })).toThrow('Unknown time zone "Nowhere/City"');
  });
});

describe('createCustomTemplate', () => {
  it('should keep the header text', () => {
    const template = createCustomTemplate({
      linePattern: '{message}',
      dateFormat: '%d',
      timeFormat: '%H',
      includeHeader: true,
      headerText: 'Family chat',
    });
    expect(template.name).toBe('custom');
    expect(template.headerText).toBe('Family chat');
  });
});

describe('isTemplateName', () => {
  it('should accept built-in names and custom', () => {
    expect(isTemplateName('discord')).toBe(true);
    expect(isTemplateName('custom')).toBe(true);
    expect(isTemplateName('Discord')).toBe(false);
  });
});

describe('compilePlaceholderPattern', () => {
  const keys = ['a', 'b'] as const;

  it('should substitute values and keep literal text', () => {
    const compiled = compilePlaceholderPattern('<{a}|{b}>', keys);
    expect(compiled.apply({ a: '1', b: '2' })).toBe('<1|2>');
    expect([...compiled.placeholders]).toEqual(['a', 'b']);
  });

  it('should read doubled braces as literal braces', () => {
    expect(compilePlaceholderPattern('{{{a}}}', keys).apply({ a: 'x', b: '' })).toBe('{x}');
  });

  it('should ignore whitespace inside a placeholder', () => {
    expect(compilePlaceholderPattern('{ a }', keys).apply({ a: 'x', b: '' })).toBe('x');
  });

  it('should not substitute inside values', () => {
    expect(compilePlaceholderPattern('{a}', keys).apply({ a: '{b}', b: 'no' })).toBe('{b}');
  });

  it('should name the label and the known placeholders in errors', () => {
    expect(() => compilePlaceholderPattern('{c}', keys, 'line pattern')).toThrow(
      'Unknown placeholder "{c}" in line pattern "{c}" (known: {a}, {b})'
    );
  });
});
