#!/usr/bin/env node

import dotenv from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { listCommand } from './commands/list';
import { exportCommand } from './commands/export';
import { searchCommand } from './commands/search';
import { templatesCommand } from './commands/templates';
import { configCommand } from './commands/config';
import { enableVerbose } from './commands/shared';

dotenv.config();

const program = new Command();

// ASCII art banner
const banner = `
╭─────────────────────────────────────╮
│                                     │
│    Telegram Chat Transcript CLI     │
│    Version 1.0.0                    │
│                                     │
╰─────────────────────────────────────╯
`;

program
  .name('tg-transcript')
  .description('Export Telegram chats to WhatsApp, Telegram, Discord or custom text transcripts')
  .version('1.0.0')
  .option('-v, --verbose', 'Print debug logging')
  .addHelpText('before', chalk.cyan(banner))
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      enableVerbose();
    }
  });

// Add commands
program.addCommand(listCommand);
program.addCommand(exportCommand);
program.addCommand(searchCommand);
program.addCommand(templatesCommand);
program.addCommand(configCommand);

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
