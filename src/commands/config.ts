import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { BUILT_IN_TEMPLATE_NAMES, MEDIA_KINDS } from '../types';
import type { MediaKind, TemplateName } from '../types';
import type { AppConfig, ExportConfig } from '../types/config';
import { ConfigManager } from '../services/ConfigManager';
import { validateFileNameTemplate } from '../core/fileNamer';
import { isValidTimeZone, systemTimeZone } from '../utils/dateFormat';
import { errorMessage } from '../utils/errors';
import { loadAppConfig, reportFailure } from './shared';

interface ConfigOptions {
  edit?: boolean;
  path?: boolean;
}

export const configCommand = new Command('config')
  .description('Show or edit export settings')
  .option('-e, --edit', 'Edit the settings interactively')
  .option('--path', 'Print the configuration file path')
  .action(async (options: ConfigOptions) => {
    try {
      const configManager = new ConfigManager();
      if (options.path) {
        console.log(configManager.getConfigPath());
        return;
      }

      let config = await loadAppConfig(configManager);
      if (options.edit) {
        config = await configManager.updateExportSettings(await askExportConfig(config.export));
        console.log(chalk.green(`✅ Saved ${configManager.getConfigPath()}\n`));
      }
      printConfig(config, configManager.getConfigPath());
    } catch (error) {
      reportFailure(error);
    }
  });

function printConfig(config: AppConfig, configPath: string): void {
  const settings = config.export;
  const rows: Array<[string, string]> = [
    ['Format', settings.format],
    ['Output directory', settings.outputDir],
    ['File name template', settings.fileNameTemplate],
    ['Message limit', settings.messageLimit === 0 ? 'all' : String(settings.messageLimit)],
    ['Media kinds', settings.mediaKinds.length === MEDIA_KINDS.length ? 'all' : settings.mediaKinds.join(', ') || 'none'],
    ['Statistics', settings.includeStatistics ? 'yes' : 'no'],
    ['Download media', settings.downloadMedia ? `yes (${settings.mediaConcurrency} at a time)` : 'no'],
    ['Time zone', settings.timeZone ?? `system (${systemTimeZone()})`],
    ['Log level', config.logLevel],
  ];
  if (settings.customTemplate) {
    rows.splice(1, 0, ['Custom pattern', settings.customTemplate.linePattern]);
  }

  console.log(chalk.bold.cyan('Export settings'));
  console.log(chalk.gray(configPath));
  console.log();
  const width = Math.max(...rows.map(([label]) => label.length));
  for (const [label, value] of rows) {
    console.log(`  ${chalk.gray(label.padEnd(width))}  ${value}`);
  }
}

async function askExportConfig(current: ExportConfig): Promise<Partial<ExportConfig>> {
  const formats: TemplateName[] = [...BUILT_IN_TEMPLATE_NAMES];
  if (current.customTemplate) {
    formats.push('custom');
  }

  const answers = await inquirer.prompt<{
    format: TemplateName;
    outputDir: string;
    fileNameTemplate: string;
    messageLimit: string;
    mediaKinds: MediaKind[];
    includeStatistics: boolean;
    downloadMedia: boolean;
    mediaConcurrency: string;
    timeZone: string;
  }>([
    { type: 'list', name: 'format', message: 'Default format:', choices: formats, default: current.format },
    {
      type: 'input',
      name: 'outputDir',
      message: 'Output directory:',
      default: current.outputDir,
      validate: (input: string) => (input.trim() ? true : 'Please enter a directory.'),
    },
    {
      type: 'input',
      name: 'fileNameTemplate',
      message: 'File name template:',
      default: current.fileNameTemplate,
      validate: (input: string) => {
        try {
          validateFileNameTemplate(input);
          return true;
        } catch (error) {
          return errorMessage(error);
        }
      },
    },
    {
      type: 'input',
      name: 'messageLimit',
      message: 'Messages per chat (0 = all):',
      default: String(current.messageLimit),
      validate: (input: string) => (/^\d+$/.test(input.trim()) ? true : 'Please enter a whole number.'),
    },
    {
      type: 'checkbox',
      name: 'mediaKinds',
      message: 'Media kinds to keep:',
      choices: MEDIA_KINDS.map((kind) => ({ name: kind, value: kind, checked: current.mediaKinds.includes(kind) })),
    },
    { type: 'confirm', name: 'includeStatistics', message: 'Write statistics?', default: current.includeStatistics },
    { type: 'confirm', name: 'downloadMedia', message: 'Download media?', default: current.downloadMedia },
    {
      type: 'input',
      name: 'mediaConcurrency',
      message: 'Parallel media downloads:',
      default: String(current.mediaConcurrency),
      when: (answers: { downloadMedia?: boolean }) => answers.downloadMedia === true,
      validate: (input: string) => (/^[1-9]\d*$/.test(input.trim()) ? true : 'Please enter a positive number.'),
    },
    {
      type: 'input',
      name: 'timeZone',
      message: 'Time zone (empty for the system zone):',
      default: current.timeZone ?? '',
      validate: (input: string) =>
        !input.trim() || isValidTimeZone(input.trim()) ? true : 'Unknown IANA time zone, e.g. Europe/Berlin',
    },
  ]);

  return {
    format: answers.format,
    outputDir: answers.outputDir.trim(),
    fileNameTemplate: answers.fileNameTemplate,
    messageLimit: Number(answers.messageLimit.trim()),
    mediaKinds: answers.mediaKinds,
    includeStatistics: answers.includeStatistics,
    downloadMedia: answers.downloadMedia,
    mediaConcurrency: answers.mediaConcurrency ? Number(answers.mediaConcurrency.trim()) : current.mediaConcurrency,
    timeZone: answers.timeZone.trim() || undefined,
  };
}
