import type { ChatSource } from '../types';
import { JsonExportSource } from './JsonExportSource';
import { credentialsFromEnv, TelegramSource } from './TelegramSource';

export interface ChatSourceOptions {
  /** Telegram Desktop result.json; the live account is used when absent */
  fromFile?: string;
  env?: Record<string, string | undefined>;
}

export function createChatSource(options: ChatSourceOptions = {}): ChatSource {
  if (options.fromFile) {
    return new JsonExportSource(options.fromFile);
  }
  return new TelegramSource(credentialsFromEnv(options.env));
}
