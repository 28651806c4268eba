import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { ChatSummary } from '../types';
import { chatTypeLabel } from '../utils/chatSelection';
import { loadAppConfig, parseCount, reportFailure, withChatSource } from './shared';

interface ListOptions {
  limit: string;
  groups: boolean;
  channels: boolean;
  fromFile?: string;
}

export const listCommand = new Command('list')
  .description('List chats available for export')
  .option('-l, --limit <number>', 'Number of chats to display', '20')
  .option('--no-groups', 'Hide group chats')
  .option('--no-channels', 'Hide channels')
  .option('--from-file <path>', 'Read chats from a Telegram Desktop result.json instead of the account')
  .action(async (options: ListOptions) => {
    try {
      const limit = parseCount(options.limit, '--limit', 20, 1);
      await loadAppConfig();

      await withChatSource(options.fromFile, async (source) => {
        const spinner = ora(`Loading chats from ${source.name}...`).start();
        let chats: ChatSummary[];
        try {
          chats = await source.listChats();
          spinner.succeed(`Loaded ${chats.length} chats`);
        } catch (error) {
          spinner.fail('Failed to load chats');
          throw error;
        }

        const shown = chats.filter(
          (chat) => (options.groups || chat.type !== 'group') && (options.channels || chat.type !== 'channel')
        );
        const displayChats = shown.slice(0, limit);

        console.log(`\n${chalk.bold.cyan('Chats')}\n`);
        if (displayChats.length === 0) {
          console.log(chalk.yellow('No chats found.'));
          return;
        }

        displayChats.forEach((chat, index) => {
          const number = chalk.gray(`${(index + 1).toString().padStart(2, ' ')}.`);
          const name = chalk.bold(chat.title);
          const type = chalk.gray(` (${chatTypeLabel(chat)})`);
          const unread = chat.unreadCount > 0 ? chalk.yellow(` ${chat.unreadCount} unread`) : '';
          const details = [
            chat.lastMessageDate ? formatRelativeDate(chat.lastMessageDate) : undefined,
            chat.messageCount !== undefined ? `${chat.messageCount} messages` : undefined,
          ]
            .filter(Boolean)
            .join(' · ');

          console.log(`${number} ${name}${type}${unread}`);
          if (details) console.log(`    ${chalk.gray(details)}`);
          console.log(`    ${chalk.gray(`id ${chat.id}`)}`);
          console.log();
        });

        console.log(chalk.gray(`Showing ${displayChats.length} of ${shown.length} chats`));
      });
    } catch (error) {
      reportFailure(error);
    }
  });

export function formatRelativeDate(date: Date, now: Date = new Date()): string {
  const diffMs = now.getTime() - date.getTime();
  const diffDays = Math.floor(diffMs / (1000 * 60 * 60 * 24));

  if (diffDays === 0) {
    const diffHours = Math.floor(diffMs / (1000 * 60 * 60));
    if (diffHours === 0) {
      const diffMinutes = Math.floor(diffMs / (1000 * 60));
      if (diffMinutes <= 0) {
        return 'Just now';
      }
      return `${diffMinutes} minute${diffMinutes === 1 ? '' : 's'} ago`;
    }
    return `${diffHours} hour${diffHours === 1 ? '' : 's'} ago`;
  } else if (diffDays === 1) {
    return 'Yesterday';
  } else if (diffDays < 7) {
    return `${diffDays} days ago`;
  } else if (diffDays < 30) {
    const weeks = Math.floor(diffDays / 7);
    return `${weeks} week${weeks === 1 ? '' : 's'} ago`;
  }
  return date.toISOString().slice(0, 10);
}
