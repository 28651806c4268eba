import { promises as fs } from 'fs';
import path from 'path';
import type {
  ChatSource,
  ChatSummary,
  ExportFilter,
  ExportStatistics,
  FormatTemplate,
  NormalizedMessage,
  SearchQuery,
} from '../types';
import { normalize } from '../core/normalizer';
import { filterMessages } from '../core/filter';
import { searchMessages } from '../core/search';
import { renderHeader, renderLines } from '../core/renderer';
import { aggregate, formatStatistics } from '../core/statistics';
import { DEFAULT_FILE_NAME_TEMPLATE, nameFile, uniqueFileNames } from '../core/fileNamer';
import { addCalendarDays, startOfCalendarDate } from '../utils/dateFormat';
import { MediaDownloader } from './MediaDownloader';
import type { MediaDownloadResult } from './MediaDownloader';
import { logger } from '../utils/logger';

const WRITE_CHUNK_LINES = 500;

export type ExportProgress =
  | { stage: 'fetching'; chat: ChatSummary; fetched: number }
  | { stage: 'writing'; chat: ChatSummary; written: number; total: number }
  | { stage: 'media'; chat: ChatSummary; done: number; total: number };

export interface ExportSettings {
  template: FormatTemplate;
  filter: ExportFilter;
  outputDir: string;
  /** 0 exports the whole history */
  limit: number;
  fileNameTemplate?: string;
  query?: SearchQuery;
  includeStatistics?: boolean;
  downloadMedia?: boolean;
  mediaConcurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: ExportProgress) => void;
  /** Date used for file names; defaults to the current time */
  now?: Date;
}

export interface ChatExportResult {
  chat: ChatSummary;
  filePath: string;
  statsPath?: string;
  mediaDir?: string;
  fetched: number;
  exported: number;
  /** The history was cut short by an abort */
  truncated: boolean;
  statistics: ExportStatistics;
  media?: MediaDownloadResult;
}

/** A chat history that was fetched and normalized but not yet filtered */
export interface CollectedHistory {
  messages: readonly NormalizedMessage[];
  /** Raw messages the source returned */
  fetched: number;
  truncated: boolean;
}

export class ChatExporter {
  private readonly downloader: MediaDownloader;

  constructor(private readonly source: ChatSource) {
    this.downloader = new MediaDownloader(source);
  }

  /**
   * Fetches, normalizes, filters and renders one chat into `<name>.txt`
   * under the output directory. `fileName` overrides the name template.
   */
  async exportChat(chat: ChatSummary, settings: ExportSettings, fileName?: string): Promise<ChatExportResult> {
    try {
      const collected = await this.collect(chat, settings);
      return await this.exportCollected(chat, collected, settings, fileName);
    } finally {
      this.source.releaseChat?.(chat);
    }
  }

  /**
   * Writes a history fetched earlier. The filter and query of the settings
   * still apply; `limit` does not.
   */
  async exportCollected(
    chat: ChatSummary,
    collected: CollectedHistory,
    settings: ExportSettings,
    fileName?: string
  ): Promise<ChatExportResult> {
    const { filter, template } = settings;
    const name =
      fileName ??
      nameFile(
        chat.title,
        settings.now ?? new Date(),
        settings.fileNameTemplate ?? DEFAULT_FILE_NAME_TEMPLATE,
        filter.timeZone
      );

    const inRange = filterMessages(collected.messages, filter);
    const filtered = settings.query ? searchMessages(inRange, settings.query) : inRange;
    logger.debug(`${chat.title}: ${collected.fetched} fetched, ${filtered.length} after filtering`);

    await fs.mkdir(settings.outputDir, { recursive: true });
    const filePath = path.join(settings.outputDir, `${name}.txt`);
    const blocks = filtered.length + (renderHeader(template) === undefined ? 0 : 1);
    await this.writeTranscript(filePath, filtered, template, (written) =>
      settings.onProgress?.({ stage: 'writing', chat, written, total: blocks })
    );

    const statistics = aggregate(filtered, { timeZone: filter.timeZone });
    const result: ChatExportResult = {
      chat,
      filePath,
      fetched: collected.fetched,
      exported: filtered.length,
      truncated: collected.truncated,
      statistics,
    };

    if (settings.includeStatistics) {
      result.statsPath = path.join(settings.outputDir, `${name}_stats.txt`);
      const report = formatStatistics(statistics, chat.title, { timeZone: filter.timeZone });
      await fs.writeFile(result.statsPath, report, 'utf-8');
    }

    if (settings.downloadMedia) {
      result.mediaDir = path.join(settings.outputDir, `${name}_media`);
      result.media = await this.downloader.download(chat, filtered, result.mediaDir, {
        concurrency: settings.mediaConcurrency,
        signal: settings.signal,
        onProgress: (done, total) => settings.onProgress?.({ stage: 'media', chat, done, total }),
      });
    }

    return result;
  }

  /**
   * Exports several chats one after another. File names come from the name
   * template and get _2, _3, ... when two chats would share one.
   */
  async exportChats(chats: readonly ChatSummary[], settings: ExportSettings): Promise<ChatExportResult[]> {
    const now = settings.now ?? new Date();
    const template = settings.fileNameTemplate ?? DEFAULT_FILE_NAME_TEMPLATE;
    const names = uniqueFileNames(chats.map((chat) => nameFile(chat.title, now, template, settings.filter.timeZone)));

    const results: ChatExportResult[] = [];
    for (const [index, chat] of chats.entries()) {
      if (settings.signal?.aborted) {
        logger.warn(`Export interrupted; ${chats.length - index} chat(s) not exported`);
        break;
      }
      results.push(await this.exportChat(chat, { ...settings, now }, names[index]));
    }
    return results;
  }

  private async collect(chat: ChatSummary, settings: ExportSettings): Promise<CollectedHistory> {
    const { filter } = settings;
    const history = await this.source.fetchHistory(chat, {
      limit: settings.limit,
      since: filter.startDate ? startOfCalendarDate(filter.startDate, filter.timeZone) : undefined,
      until: filter.endDate ? startOfCalendarDate(addCalendarDays(filter.endDate, 1), filter.timeZone) : undefined,
      signal: settings.signal,
      onProgress: (fetched) => settings.onProgress?.({ stage: 'fetching', chat, fetched }),
    });

    return {
      messages: normalize(history.messages, history.resolveSender, { chatTitle: chat.title }),
      fetched: history.messages.length,
      truncated: history.truncated,
    };
  }

  /**
   * Streams the rendered lines into `<file>.part` and renames it once
   * complete, so the final name never holds a partial transcript.
   */
  private async writeTranscript(
    filePath: string,
    messages: readonly NormalizedMessage[],
    template: FormatTemplate,
    onWritten: (written: number) => void
  ): Promise<void> {
    const partPath = `${filePath}.part`;
    const handle = await fs.open(partPath, 'w');
    let completed = false;

    try {
      let chunk: string[] = [];
      let written = 0;
      for (const block of renderLines(messages, template)) {
        chunk.push(block);
        if (chunk.length >= WRITE_CHUNK_LINES) {
          await handle.write(chunk.join('\n') + '\n');
          written += chunk.length;
          onWritten(written);
          chunk = [];
        }
      }
      if (chunk.length > 0) {
        await handle.write(chunk.join('\n') + '\n');
        written += chunk.length;
        onWritten(written);
      }
      completed = true;
    } finally {
      await handle.close();
      if (!completed) {
        await fs.rm(partPath, { force: true });
      }
    }

    await fs.rename(partPath, filePath);
  }
}
