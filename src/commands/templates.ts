import { Command } from 'commander';
import chalk from 'chalk';
import { BUILT_IN_TEMPLATE_NAMES } from '../types';
import type { NormalizedMessage, TemplateName } from '../types';
import { render } from '../core/renderer';
import { TEMPLATE_DESCRIPTIONS } from '../core/templates';
import { buildTemplate, loadAppConfig, reportFailure } from './shared';
import type { TemplateFlags } from './shared';

const base = { isEdited: false, isDeleted: false };

/**
 * Small fixed conversation used for previews
 */
export const SAMPLE_MESSAGES: readonly NormalizedMessage[] = [
  { ...base, id: 1, kind: 'text', timestamp: new Date(Date.UTC(2024, 2, 9, 9, 15)), senderName: 'Alice', text: 'Morning! Are we still on for today?' },
  { ...base, id: 2, kind: 'text', timestamp: new Date(Date.UTC(2024, 2, 9, 9, 17)), senderName: 'Alice', text: 'I can bring the slides.' },
  {
    ...base,
    id: 3,
    kind: 'photo',
    timestamp: new Date(Date.UTC(2024, 2, 9, 9, 20)),
    senderName: 'Bob',
    text: 'Whiteboard from yesterday',
    replyToId: 1,
    media: { kind: 'photo' },
  },
  { ...base, id: 4, kind: 'text', timestamp: new Date(Date.UTC(2024, 2, 9, 9, 22)), senderName: 'Bob', text: 'See you at 10', isEdited: true },
];

interface TemplatesOptions extends TemplateFlags {
  preview: boolean;
}

export const templatesCommand = new Command('templates')
  .description('List output formats with a preview of each')
  .argument('[format]', 'Only show this format')
  .option('--no-preview', 'Only list the formats')
  .option('-p, --pattern <pattern>', 'Preview a custom line pattern')
  .option('--date-format <pattern>', 'Date format for the preview')
  .option('--time-format <pattern>', 'Time format for the preview')
  .option('--tz <zone>', 'IANA time zone for the preview', 'UTC')
  .action(async (format: string | undefined, options: TemplatesOptions) => {
    try {
      const config = await loadAppConfig();
      const names: TemplateName[] = [...BUILT_IN_TEMPLATE_NAMES];
      if (options.pattern || config.export.customTemplate) {
        names.push('custom');
      }
      const shown = format ? [format] : options.pattern ? ['custom'] : names;

      for (const name of shown) {
        const template = buildTemplate({ ...options, format: name }, config);
        const marker = name === config.export.format ? chalk.green(' (default)') : '';
        console.log(`${chalk.bold.cyan(template.name)}${marker}  ${chalk.gray(TEMPLATE_DESCRIPTIONS[template.name])}`);

        if (options.preview) {
          const preview = render(SAMPLE_MESSAGES, template)
            .split('\n')
            .map((line) => `    ${line}`)
            .join('\n');
          console.log(chalk.gray(preview));
        }
        console.log();
      }
    } catch (error) {
      reportFailure(error);
    }
  });
