import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { BUILT_IN_TEMPLATE_NAMES, MEDIA_KINDS } from '../types';
import type { ChatSummary, MediaKind, TemplateName } from '../types';
import type { AppConfig } from '../types/config';
import { ChatExporter } from '../services/ChatExporter';
import type { ChatExportResult, ExportProgress, ExportSettings } from '../services/ChatExporter';
import { createExportFilter } from '../core/filter';
import { parseMediaKinds } from '../core/kinds';
import { TEMPLATE_DESCRIPTIONS } from '../core/templates';
import { validateFileNameTemplate } from '../core/fileNamer';
import { parseCalendarDate } from '../utils/dateFormat';
import { findChat } from '../utils/chatSelection';
import { logger } from '../utils/logger';
import {
  buildTemplate,
  loadAppConfig,
  parseCount,
  promptForChat,
  reportFailure,
  withChatSource,
  withSpinner,
} from './shared';
import type { TemplateFlags } from './shared';

export interface ExportOptions extends TemplateFlags {
  from?: string;
  to?: string;
  media?: string;
  limit?: string;
  outputDir?: string;
  name?: string;
  stats?: boolean;
  downloadMedia?: boolean;
  concurrency?: string;
  all?: boolean;
  interactive?: boolean;
  fromFile?: string;
}

export const exportCommand = new Command('export')
  .description('Export a chat (or every chat with --all) to a text transcript')
  .argument('[chat]', 'Chat id, list position or (part of) its title')
  .option('-f, --format <name>', 'whatsapp, noheader, telegram, discord, simple or custom')
  .option('-p, --pattern <pattern>', 'Custom line pattern using {date} {time} {sender} {message}')
  .option('--date-format <pattern>', 'Date format, e.g. %d/%m/%y')
  .option('--time-format <pattern>', 'Time format, e.g. %H:%M')
  .option('--header-text <text>', 'Header line for the custom format')
  .option('--no-header', 'Leave out the header line')
  .option('--from <date>', 'First day to export (YYYY-MM-DD)')
  .option('--to <date>', 'Last day to export (YYYY-MM-DD)')
  .option('-m, --media <kinds>', `Media kinds to keep: all, none or a list of ${MEDIA_KINDS.join(',')}`)
  .option('-l, --limit <number>', 'Most recent messages to fetch per chat (0 = all)')
  .option('-o, --output-dir <dir>', 'Directory for the exported files')
  .option('-n, --name <template>', 'File name template using {chat} {date} {year} {month} {day}')
  .option('--stats', 'Write a statistics report next to each transcript')
  .option('--download-media', 'Download media files next to each transcript')
  .option('--concurrency <number>', 'Parallel media downloads')
  .option('--tz <zone>', 'IANA time zone for dates (default: system zone)')
  .option('-a, --all', 'Export every chat')
  .option('-i, --interactive', 'Ask for format, dates and media kinds')
  .option('--from-file <path>', 'Read chats from a Telegram Desktop result.json instead of the account')
  .action(async (chatQuery: string | undefined, options: ExportOptions) => {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      console.log(chalk.yellow('\nInterrupted, finishing the current file...'));
      controller.abort();
    };

    try {
      const config = await loadAppConfig();
      if (options.interactive) {
        Object.assign(options, await askExportOptions(options, config));
      }

      // Every input is validated before anything is fetched
      const settings = buildSettings(options, config, controller.signal);

      process.once('SIGINT', onInterrupt);
      await withChatSource(options.fromFile, async (source) => {
        const spinner = ora(`Connecting to ${source.name}...`).start();
        const chats = await withSpinner(spinner, 'Failed to load chats', () => source.listChats());

        let selected: ChatSummary[];
        if (options.all) {
          selected = chats;
        } else if (chatQuery) {
          selected = [findChat(chats, chatQuery)];
        } else {
          selected = [await promptForChat(chats, 'Select a chat to export:')];
        }

        const exporter = new ChatExporter(source);
        const progress = ora('Exporting...').start();
        const results = await withSpinner(progress, 'Export failed', () =>
          exporter.exportChats(selected, {
            ...settings,
            onProgress: (event) => {
              progress.text = describeProgress(event);
            },
          })
        );

        for (const result of results) {
          printResult(result);
        }
        if (results.length < selected.length) {
          console.log(chalk.yellow(`${selected.length - results.length} chat(s) skipped after interrupt`));
        }
      });
    } catch (error) {
      reportFailure(error);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

export function buildSettings(options: ExportOptions, config: AppConfig, signal?: AbortSignal): ExportSettings {
  const template = buildTemplate(options, config);
  const filter = createExportFilter({
    startDate: options.from,
    endDate: options.to,
    includedMediaKinds: options.media !== undefined ? parseMediaKinds(options.media) : config.export.mediaKinds,
    timeZone: options.tz ?? config.export.timeZone,
  });

  const fileNameTemplate = options.name ?? config.export.fileNameTemplate;
  validateFileNameTemplate(fileNameTemplate);

  return {
    template,
    filter,
    outputDir: options.outputDir ?? config.export.outputDir,
    limit: parseCount(options.limit, '--limit', config.export.messageLimit),
    fileNameTemplate,
    includeStatistics: options.stats ?? config.export.includeStatistics,
    downloadMedia: options.downloadMedia ?? config.export.downloadMedia,
    mediaConcurrency: parseCount(options.concurrency, '--concurrency', config.export.mediaConcurrency, 1),
    signal,
  };
}

async function askExportOptions(options: ExportOptions, config: AppConfig): Promise<Partial<ExportOptions>> {
  const names: TemplateName[] = [...BUILT_IN_TEMPLATE_NAMES];
  if (options.pattern || config.export.customTemplate) {
    names.push('custom');
  }
  const formats = names.map((name) => ({
    name: `${name.padEnd(9)} ${chalk.gray(TEMPLATE_DESCRIPTIONS[name])}`,
    value: name,
  }));

  const answers = await inquirer.prompt<{ format: string; from: string; to: string; media: MediaKind[] }>([
    {
      type: 'list',
      name: 'format',
      message: 'Output format:',
      choices: formats,
      default: options.format ?? config.export.format,
    },
    {
      type: 'input',
      name: 'from',
      message: 'First day (YYYY-MM-DD, empty for no limit):',
      default: options.from ?? '',
      validate: validateOptionalDate,
    },
    {
      type: 'input',
      name: 'to',
      message: 'Last day (YYYY-MM-DD, empty for no limit):',
      default: options.to ?? '',
      validate: validateOptionalDate,
    },
    {
      type: 'checkbox',
      name: 'media',
      message: 'Media kinds to keep:',
      choices: MEDIA_KINDS.map((kind) => ({ name: kind, value: kind, checked: config.export.mediaKinds.includes(kind) })),
    },
  ]);

  return {
    format: answers.format,
    from: answers.from.trim() || undefined,
    to: answers.to.trim() || undefined,
    media: answers.media.length > 0 ? answers.media.join(',') : 'none',
  };
}

function validateOptionalDate(input: string): true | string {
  if (!input.trim()) return true;
  try {
    parseCalendarDate(input);
    return true;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

function describeProgress(event: ExportProgress): string {
  switch (event.stage) {
    case 'fetching':
      return `${event.chat.title}: fetched ${event.fetched} messages`;
    case 'writing':
      return `${event.chat.title}: writing ${event.written}/${event.total}`;
    case 'media':
      return `${event.chat.title}: media ${event.done}/${event.total}`;
  }
}

function printResult(result: ChatExportResult): void {
  const summary = `${result.chat.title}: ${result.exported} of ${result.fetched} messages`;
  if (result.truncated) {
    console.log(chalk.yellow(`⚠ ${summary} (interrupted, partial history)`));
  } else {
    console.log(chalk.green(`✓ ${summary}`));
  }
  console.log(chalk.gray(`  ${result.filePath}`));
  if (result.statsPath) console.log(chalk.gray(`  ${result.statsPath}`));

  if (result.media && result.mediaDir) {
    const { downloaded, skipped, failed } = result.media;
    console.log(
      chalk.gray(`  ${result.mediaDir}: ${downloaded.length} saved, ${skipped.length} skipped, ${failed.length} failed`)
    );
    for (const failure of failed) {
      logger.warn(`Message ${failure.messageId}: ${failure.error}`);
    }
  }
}
