import chalk from 'chalk';
import inquirer from 'inquirer';
import type { ChatSource, ChatSummary, FormatTemplate } from '../types';
import type { AppConfig, CustomTemplateConfig } from '../types/config';
import { ConfigManager } from '../services/ConfigManager';
import { createChatSource } from '../services/ChatSourceFactory';
import { getTemplate, validateTemplate } from '../core/templates';
import { chatTypeLabel } from '../utils/chatSelection';
import { errorMessage, ExportInputError } from '../utils/errors';
import { logger } from '../utils/logger';

let verbose = false;

/**
 * Set by the global --verbose flag; wins over the configured log level
 */
export function enableVerbose(): void {
  verbose = true;
  logger.setLevel('debug');
}

export async function loadAppConfig(configManager = new ConfigManager()): Promise<AppConfig> {
  const config = await configManager.loadConfig();
  if (!verbose) {
    logger.setLevel(config.logLevel);
  }
  return config;
}

/**
 * Runs `work` against a chat source and always closes it afterwards
 */
export async function withChatSource<T>(fromFile: string | undefined, work: (source: ChatSource) => Promise<T>): Promise<T> {
  const source = createChatSource({ fromFile });
  try {
    return await work(source);
  } finally {
    await source.close();
  }
}

/** The part of an ora spinner a command settles */
export interface TaskSpinner {
  stop(): unknown;
  fail(text?: string): unknown;
}

/**
 * Runs `task` under a started spinner and always settles it; a running
 * spinner keeps the process alive
 */
export async function withSpinner<T>(spinner: TaskSpinner, failText: string, task: () => Promise<T>): Promise<T> {
  try {
    const result = await task();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail(failText);
    throw error;
  }
}

export interface TemplateFlags {
  format?: string;
  pattern?: string;
  dateFormat?: string;
  timeFormat?: string;
  headerText?: string;
  /** false when --no-header was given */
  header?: boolean;
  tz?: string;
}

/**
 * Builds the active template from the command line over the configuration.
 * A --pattern switches to the custom format.
 */
export function buildTemplate(flags: TemplateFlags, config: AppConfig): FormatTemplate {
  const timeZone = flags.tz ?? config.export.timeZone;
  const format = flags.pattern ? 'custom' : flags.format ?? config.export.format;

  let custom: CustomTemplateConfig | undefined = config.export.customTemplate;
  if (format === 'custom' && (flags.pattern || flags.dateFormat || flags.timeFormat || flags.headerText)) {
    custom = {
      linePattern: flags.pattern ?? custom?.linePattern ?? '',
      dateFormat: flags.dateFormat ?? custom?.dateFormat ?? '%d/%m/%y',
      timeFormat: flags.timeFormat ?? custom?.timeFormat ?? '%H:%M',
      includeHeader: flags.headerText ? true : custom?.includeHeader ?? false,
      headerText: flags.headerText ?? custom?.headerText,
    };
  }

  const base = getTemplate(format, { custom, timeZone });
  const template: FormatTemplate = {
    ...base,
    dateFormat: flags.dateFormat ?? base.dateFormat,
    timeFormat: flags.timeFormat ?? base.timeFormat,
    includeHeader: flags.header === false ? false : base.includeHeader,
  };
  validateTemplate(template);
  return Object.freeze(template);
}

export function parseCount(value: string | undefined, label: string, fallback: number, minimum = 0): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new ExportInputError(`${label} must be an integer of at least ${minimum}, got "${value}"`);
  }
  return parsed;
}

export async function promptForChat(chats: readonly ChatSummary[], message = 'Select a chat:'): Promise<ChatSummary> {
  if (chats.length === 0) {
    throw new ExportInputError('No chats available');
  }

  const { chatId } = await inquirer.prompt<{ chatId: string }>([
    {
      type: 'list',
      name: 'chatId',
      message,
      pageSize: 15,
      choices: chats.map((chat, index) => ({
        name: `${(index + 1).toString().padStart(2, ' ')}. ${chat.title} ${chalk.gray(`(${chatTypeLabel(chat)})`)}`,
        value: chat.id,
      })),
    },
  ]);

  const selected = chats.find((chat) => chat.id === chatId);
  if (!selected) {
    throw new ExportInputError(`Unknown chat ${chatId}`);
  }
  return selected;
}

/**
 * Prints the error the way every command does and marks the process failed
 */
export function reportFailure(error: unknown): void {
  console.error(chalk.red('Error:'), errorMessage(error));
  logger.debug(error instanceof Error && error.stack ? error.stack : String(error));
  process.exitCode = 1;
}
