import { describe, it, expect, vi } from 'vitest';
import type { AppConfig } from '../../types/config';
import { ConfigManager } from '../../services/ConfigManager';
import { buildTemplate, parseCount, withSpinner } from '../shared';
import { buildSettings } from '../export';
import { formatRelativeDate } from '../list';
import { renderMessage } from '../../core/renderer';
import { DateRangeError, ExportInputError, MediaKindError, TemplateError } from '../../utils/errors';
import { textMessage } from '../../core/__tests__/helpers';

function defaults(overrides: Partial<AppConfig['export']> = {}): AppConfig {
  const config = new ConfigManager('/nonexistent/config.json', {}).getDefaultConfig();
  return { ...config, export: { ...config.export, ...overrides } };
}

describe('buildTemplate', () => {
  it('should use the configured format', () => {
    const template = buildTemplate({}, defaults());
    expect(template.name).toBe('whatsapp');
    expect(template.timeZone).toBeUndefined();
  });

  it('should prefer the command line format and time zone', () => {
    const template = buildTemplate({ format: 'telegram', tz: 'UTC' }, defaults({ timeZone: 'Asia/Tokyo' }));
    expect(template.name).toBe('telegram');
    expect(template.timeZone).toBe('UTC');
  });

  it('should switch to the custom format for a pattern', () => {
    const template = buildTemplate({ format: 'whatsapp', pattern: '{sender} > {message}', tz: 'UTC' }, defaults());

    expect(template.name).toBe('custom');
    expect(template.dateFormat).toBe('%d/%m/%y');
    expect(renderMessage(textMessage(1, '2023-06-01T10:00:00', 'hi'), template)).toBe('Alice > hi');
  });

  it('should combine the configured custom template with flags', () => {
    const config = defaults({
      format: 'custom',
      customTemplate: { linePattern: '{message}', dateFormat: '%d', timeFormat: '%H', includeHeader: false },
    });

    const template = buildTemplate({ headerText: 'Family chat' }, config);

    expect(template.linePattern).toBe('{message}');
    expect(template.includeHeader).toBe(true);
    expect(template.headerText).toBe('Family chat');
  });

  it('should apply date formats and --no-header to built-in formats', () => {
    const template = buildTemplate({ format: 'whatsapp', dateFormat: '%Y-%m-%d', header: false }, defaults());
    expect(template.dateFormat).toBe('%Y-%m-%d');
    expect(template.includeHeader).toBe(false);
    expect(Object.isFrozen(template)).toBe(true);
  });

  it('should reject bad formats', () => {
    expect(() => buildTemplate({ format: 'custom' }, defaults())).toThrow(TemplateError);
    expect(() => buildTemplate({ format: 'whatsapp', timeFormat: '%Q' }, defaults())).toThrow(TemplateError);
  });
});

describe('buildSettings', () => {
  it('should fall back to the configuration', () => {
    const settings = buildSettings({}, defaults());

    expect(settings.outputDir).toBe('exports');
    expect(settings.limit).toBe(0);
    expect(settings.fileNameTemplate).toBe('{chat}_{date}');
    expect(settings.includeStatistics).toBe(false);
    expect(settings.downloadMedia).toBe(false);
    expect(settings.mediaConcurrency).toBe(4);
    expect(settings.filter.includedMediaKinds.size).toBe(10);
    expect(settings.filter.startDate).toBeUndefined();
  });

  it('should take every option from the command line', () => {
    const controller = new AbortController();
    const settings = buildSettings(
      {
        format: 'simple',
        from: '2023-06-01',
        to: '2023-06-02',
        media: 'photo,video',
        limit: '100',
        outputDir: 'out',
        name: '{chat}',
        stats: true,
        downloadMedia: true,
        concurrency: '8',
        tz: 'UTC',
      },
      defaults(),
      controller.signal
    );

    expect(settings.template.name).toBe('simple');
    expect(settings.filter).toMatchObject({ startDate: '2023-06-01', endDate: '2023-06-02', timeZone: 'UTC' });
    expect([...settings.filter.includedMediaKinds]).toEqual(['photo', 'video']);
    expect(settings.limit).toBe(100);
    expect(settings.outputDir).toBe('out');
    expect(settings.fileNameTemplate).toBe('{chat}');
    expect(settings.includeStatistics).toBe(true);
    expect(settings.downloadMedia).toBe(true);
    expect(settings.mediaConcurrency).toBe(8);
    expect(settings.signal).toBe(controller.signal);
  });

  it('should reject invalid input before anything runs', () => {
    const config = defaults();

    expect(() => buildSettings({ from: '2023-06-02', to: '2023-06-01' }, config)).toThrow(DateRangeError);
    expect(() => buildSettings({ media: 'gif' }, config)).toThrow(MediaKindError);
    expect(() => buildSettings({ name: '{title}' }, config)).toThrow(TemplateError);
    expect(() => buildSettings({ limit: '-1' }, config)).toThrow('--limit must be an integer of at least 0, got "-1"');
    expect(() => buildSettings({ concurrency: '0' }, config)).toThrow(
      '--concurrency must be an integer of at least 1, got "0"'
    );
  });
});

describe('parseCount', () => {
  it('should parse integers and use the fallback for missing values', () => {
    expect(parseCount('12', '--limit', 0)).toBe(12);
    expect(parseCount(undefined, '--limit', 7)).toBe(7);
    expect(() => parseCount('abc', '--limit', 0)).toThrow(ExportInputError);
    expect(() => parseCount('1.5', '--limit', 0)).toThrow(ExportInputError);
  });
});

describe('withSpinner', () => {
  it('should stop the spinner after the task', async () => {
    const spinner = { stop: vi.fn(), fail: vi.fn() };

    await expect(withSpinner(spinner, 'Export failed', async () => 3)).resolves.toBe(3);
    expect(spinner.stop).toHaveBeenCalledTimes(1);
    expect(spinner.fail).not.toHaveBeenCalled();
  });

  it('should fail the spinner and rethrow when the task throws', async () => {
    const spinner = { stop: vi.fn(), fail: vi.fn() };
    const error = new Error('connection lost');

    await expect(
      withSpinner(spinner, 'Export failed', async () => {
        throw error;
      })
    ).rejects.toBe(error);
    expect(spinner.fail).toHaveBeenCalledWith('Export failed');
    expect(spinner.stop).not.toHaveBeenCalled();
  });
});

describe('formatRelativeDate', () => {
  const now = new Date('2023-06-10T12:00:00Z');
  const before = (ms: number) => new Date(now.getTime() - ms);
  const MINUTE = 60 * 1000;
  const HOUR = 60 * MINUTE;
  const DAY = 24 * HOUR;

  it('should describe recent dates relative to now', () => {
    expect(formatRelativeDate(before(30 * 1000), now)).toBe('Just now');
    expect(formatRelativeDate(before(MINUTE), now)).toBe('1 minute ago');
    expect(formatRelativeDate(before(5 * MINUTE), now)).toBe('5 minutes ago');
    expect(formatRelativeDate(before(3 * HOUR), now)).toBe('3 hours ago');
    expect(formatRelativeDate(before(30 * HOUR), now)).toBe('Yesterday');
    expect(formatRelativeDate(before(3 * DAY), now)).toBe('3 days ago');
    expect(formatRelativeDate(before(14 * DAY), now)).toBe('2 weeks ago');
  });

  it('should fall back to the calendar date after a month', () => {
    expect(formatRelativeDate(before(40 * DAY), now)).toBe('2023-05-01');
  });
});
