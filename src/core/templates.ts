import { BUILT_IN_TEMPLATE_NAMES } from '../types';
import type { BuiltInTemplateName, FormatTemplate, TemplateName } from '../types';
import type { CustomTemplateConfig } from '../types/config';
import { compilePlaceholderPattern } from './placeholders';
import { isValidTimeZone, validateDatePattern } from '../utils/dateFormat';
import { TemplateError } from '../utils/errors';

export const LINE_PLACEHOLDERS = ['date', 'time', 'sender', 'message'] as const;

export type LinePlaceholder = (typeof LINE_PLACEHOLDERS)[number];

export const WHATSAPP_HEADER =
  'Messages and calls are end-to-end encrypted. No one outside of this chat, not even WhatsApp, can read or listen to them.';

const WHATSAPP: FormatTemplate = {
  name: 'whatsapp',
  dateFormat: '%d/%m/%y',
  timeFormat: '%H:%M',
  linePattern: '{date}, {time} - {sender}: {message}',
  includeHeader: true,
  headerText: WHATSAPP_HEADER,
};

const NO_HEADER: FormatTemplate = { ...WHATSAPP, name: 'noheader', includeHeader: false, headerText: undefined };

const TELEGRAM: FormatTemplate = {
  name: 'telegram',
  dateFormat: '%d.%m.%Y',
  timeFormat: '%H:%M:%S',
  linePattern: '[{date} {time}] {sender}: {message}',
  includeHeader: false,
  annotateReplies: true,
  annotateForwards: true,
};

const DISCORD: FormatTemplate = {
  name: 'discord',
  dateFormat: '%d/%m/%Y',
  timeFormat: '%H:%M',
  linePattern: '{message}',
  includeHeader: false,
  groupBySender: true,
  groupHeaderPattern: '{sender} - {date} {time}',
};

const SIMPLE: FormatTemplate = {
  name: 'simple',
  dateFormat: '%Y-%m-%d',
  timeFormat: '%H:%M',
  linePattern: '{sender}: {message}',
  includeHeader: false,
};

export const BUILT_IN_TEMPLATES: Readonly<Record<BuiltInTemplateName, Readonly<FormatTemplate>>> = {
  whatsapp: WHATSAPP,
  noheader: NO_HEADER,
  telegram: TELEGRAM,
  discord: DISCORD,
  simple: SIMPLE,
};

export const TEMPLATE_DESCRIPTIONS: Record<TemplateName, string> = {
  whatsapp: 'WhatsApp export with encryption notice header',
  noheader: 'WhatsApp export without the header line',
  telegram: 'Telegram Desktop style with reply and forward notes',
  discord: 'Discord style, consecutive messages grouped under the sender',
  simple: 'Sender and message only',
  custom: 'Your own line pattern and date/time formats',
};

export function isBuiltInTemplateName(name: string): name is BuiltInTemplateName {
  return BUILT_IN_TEMPLATE_NAMES.some((builtIn) => builtIn === name);
}

export function isTemplateName(name: string): name is TemplateName {
  return name === 'custom' || isBuiltInTemplateName(name);
}

/**
 * Throws TemplateError for an empty pattern, an unknown placeholder or an
 * unknown date token.
 */
export function validateTemplate(template: FormatTemplate): void {
  if (!template.linePattern.trim()) {
    throw new TemplateError('Line pattern must not be empty');
  }
  compilePlaceholderPattern(template.linePattern, LINE_PLACEHOLDERS, 'line pattern');

  if (template.groupBySender) {
    if (!template.groupHeaderPattern?.trim()) {
      throw new TemplateError('Grouped templates need a group header pattern');
    }
    compilePlaceholderPattern(template.groupHeaderPattern, LINE_PLACEHOLDERS, 'group header pattern');
  }

  validateDatePattern(template.dateFormat);
  validateDatePattern(template.timeFormat);

  if (template.includeHeader && !template.headerText?.trim()) {
    throw new TemplateError('Header is enabled but header text is empty');
  }
  if (template.timeZone !== undefined && !isValidTimeZone(template.timeZone)) {
    throw new TemplateError(`Unknown time zone "${template.timeZone}"`);
  }
}

export function createCustomTemplate(config: CustomTemplateConfig, timeZone?: string): FormatTemplate {
  const template: FormatTemplate = {
    name: 'custom',
    dateFormat: config.dateFormat,
    timeFormat: config.timeFormat,
    linePattern: config.linePattern,
    includeHeader: config.includeHeader,
    headerText: config.headerText,
    timeZone,
  };
  validateTemplate(template);
  return Object.freeze(template);
}

/**
 * Resolves a template by name. Custom templates need their configuration.
 */
export function getTemplate(
  name: string,
  options: { custom?: CustomTemplateConfig; timeZone?: string } = {}
): FormatTemplate {
  if (name === 'custom') {
    if (!options.custom) {
      throw new TemplateError('The custom format needs a line pattern (--pattern or export.customTemplate)');
    }
    return createCustomTemplate(options.custom, options.timeZone);
  }

  if (!isBuiltInTemplateName(name)) {
    const known = [...BUILT_IN_TEMPLATE_NAMES, 'custom'].join(', ');
    throw new TemplateError(`Unknown format "${name}" (known: ${known})`);
  }

  const template: FormatTemplate = { ...BUILT_IN_TEMPLATES[name], timeZone: options.timeZone };
  validateTemplate(template);
  return Object.freeze(template);
}
