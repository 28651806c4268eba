import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { NormalizedMessage, SearchQuery } from '../types';
import { ChatExporter } from '../services/ChatExporter';
import type { CollectedHistory } from '../services/ChatExporter';
import { normalize } from '../core/normalizer';
import { searchMessages } from '../core/search';
import { parseMessageKinds } from '../core/kinds';
import { renderMessage } from '../core/renderer';
import { createExportFilter } from '../core/filter';
import { nameFile } from '../core/fileNamer';
import { findChat } from '../utils/chatSelection';
import { buildTemplate, loadAppConfig, parseCount, reportFailure, withChatSource } from './shared';
import type { TemplateFlags } from './shared';

interface SearchOptions extends TemplateFlags {
  sender?: string;
  kinds?: string;
  limit?: string;
  max: string;
  export?: boolean;
  outputDir?: string;
  fromFile?: string;
}

export const searchCommand = new Command('search')
  .description('Search a chat for messages containing some text')
  .argument('<chat>', 'Chat id, list position or (part of) its title')
  .argument('<query>', 'Text to look for (case-insensitive)')
  .option('-s, --sender <name>', 'Only messages from senders whose name contains this')
  .option('-k, --kinds <kinds>', 'Only these kinds, e.g. text,photo,service')
  .option('-l, --limit <number>', 'Most recent messages to search (0 = all)')
  .option('--max <number>', 'Matches to print', '50')
  .option('-f, --format <name>', 'Template used to print and export matches')
  .option('--tz <zone>', 'IANA time zone for dates (default: system zone)')
  .option('-e, --export', 'Write all matches to a transcript file')
  .option('-o, --output-dir <dir>', 'Directory for the exported file')
  .option('--from-file <path>', 'Read chats from a Telegram Desktop result.json instead of the account')
  .action(async (chatQuery: string, text: string, options: SearchOptions) => {
    try {
      const config = await loadAppConfig();
      const template = buildTemplate(options, config);
      const query: SearchQuery = {
        text,
        sender: options.sender,
        kinds: options.kinds ? parseMessageKinds(options.kinds) : undefined,
      };
      const limit = parseCount(options.limit, '--limit', config.export.messageLimit);
      const max = parseCount(options.max, '--max', 50, 1);

      await withChatSource(options.fromFile, async (source) => {
        const chat = findChat(await source.listChats(), chatQuery);
        const spinner = ora(`Searching ${chat.title}...`).start();

        let collected: CollectedHistory;
        let matches: NormalizedMessage[];
        try {
          const history = await source.fetchHistory(chat, {
            limit,
            onProgress: (fetched) => {
              spinner.text = `Searching ${chat.title}... ${fetched} messages`;
            },
          });
          collected = {
            messages: normalize(history.messages, history.resolveSender, { chatTitle: chat.title }),
            fetched: history.messages.length,
            truncated: history.truncated,
          };
          matches = searchMessages(collected.messages, query);
          spinner.succeed(
            `${matches.length} match${matches.length === 1 ? '' : 'es'} in ${collected.messages.length} messages`
          );
        } catch (error) {
          spinner.fail('Search failed');
          throw error;
        }

        for (const message of matches.slice(0, max)) {
          console.log(`${chalk.gray(`#${message.id}`)} ${renderMessage(message, template)}`);
        }
        if (matches.length > max) {
          console.log(chalk.gray(`... ${matches.length - max} more (use --max or --export)`));
        }

        if (options.export && matches.length > 0) {
          const exporter = new ChatExporter(source);
          const timeZone = options.tz ?? config.export.timeZone;
          const result = await exporter.exportCollected(
            chat,
            collected,
            {
              template,
              filter: createExportFilter({ timeZone }),
              outputDir: options.outputDir ?? config.export.outputDir,
              limit,
              query,
            },
            `${nameFile(chat.title, new Date(), config.export.fileNameTemplate, timeZone)}_search`
          );
          console.log(chalk.green(`✓ Saved ${result.exported} matches to ${result.filePath}`));
        }
      });
    } catch (error) {
      reportFailure(error);
    }
  });
