import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { BUILT_IN_TEMPLATE_NAMES, MEDIA_KINDS } from '../types';
import type { AppConfig, ExportConfig } from '../types/config';
import { LOG_LEVELS } from '../utils/logger';
import { isValidTimeZone } from '../utils/dateFormat';
import { DEFAULT_FILE_NAME_TEMPLATE } from '../core/fileNamer';
import { errorMessage, ExportInputError } from '../utils/errors';

export const CONFIG_FILE_NAME = 'tg-transcript-config.json';

const TEMPLATE_NAMES = [...BUILT_IN_TEMPLATE_NAMES, 'custom'] as const;

const customTemplateSchema = z.object({
  linePattern: z.string().min(1),
  dateFormat: z.string().default('%d/%m/%y'),
  timeFormat: z.string().default('%H:%M'),
  includeHeader: z.boolean().default(false),
  headerText: z.string().optional(),
});

const exportSchema = z.object({
  format: z.enum(TEMPLATE_NAMES),
  customTemplate: customTemplateSchema.optional(),
  outputDir: z.string().min(1),
  fileNameTemplate: z.string().min(1),
  messageLimit: z.number().int().min(0),
  mediaKinds: z.array(z.enum(MEDIA_KINDS)),
  includeStatistics: z.boolean(),
  downloadMedia: z.boolean(),
  mediaConcurrency: z.number().int().min(1).max(32),
  timeZone: z
    .string()
    .refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
    .optional(),
});

// Every key may be missing from the file; missing keys fall back to defaults
const fileSchema = z.object({
  export: exportSchema.partial().default({}),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export class ConfigError extends ExportInputError {}

type Environment = Record<string, string | undefined>;

export class ConfigManager {
  private configPath: string;
  private config: AppConfig | null = null;
  private lastModified: Date | null = null;

  constructor(
    configPath: string = path.join(process.cwd(), CONFIG_FILE_NAME),
    private readonly env: Environment = process.env
  ) {
    this.configPath = configPath;
  }

  /**
   * Load configuration from file (re-read only when the file changed).
   * A missing file is created with defaults; an invalid one is an error and
   * is left untouched.
   */
  async loadConfig(): Promise<AppConfig> {
    let fileModified: Date;
    try {
      fileModified = (await fs.stat(this.configPath)).mtime;
    } catch (error) {
      if (isMissingFile(error)) {
        await this.saveConfig(this.getDefaultConfig());
        return this.withEnvironment(this.getDefaultConfig());
      }
      throw error;
    }

    if (!this.config || !this.lastModified || fileModified > this.lastModified) {
      const configData = await fs.readFile(this.configPath, 'utf-8');
      this.config = this.deserializeConfig(configData);
      this.lastModified = fileModified;
    }

    return this.withEnvironment(this.config);
  }

  /**
   * Save configuration to file. Environment overrides are never written back.
   */
  async saveConfig(config?: AppConfig): Promise<void> {
    if (config) {
      this.config = config;
    }

    if (!this.config) {
      throw new Error('No configuration to save');
    }

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2) + '\n', 'utf-8');

    try {
      const stats = await fs.stat(this.configPath);
      this.lastModified = stats.mtime;
    } catch {
      // Unknown timestamp: re-read next time
      this.lastModified = null;
    }
  }

  async updateExportSettings(settings: Partial<ExportConfig>): Promise<AppConfig> {
    await this.loadConfig();
    const stored = this.config ?? this.getDefaultConfig();
    const next: AppConfig = { ...stored, export: { ...stored.export, ...settings } };
    const parsed = exportSchema.safeParse(next.export);
    if (!parsed.success) {
      throw new ConfigError(formatIssues(parsed.error));
    }
    await this.saveConfig(next);
    return this.withEnvironment(next);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getDefaultConfig(): AppConfig {
    return {
      export: {
        format: 'whatsapp',
        outputDir: 'exports',
        fileNameTemplate: DEFAULT_FILE_NAME_TEMPLATE,
        messageLimit: 0,
        mediaKinds: [...MEDIA_KINDS],
        includeStatistics: false,
        downloadMedia: false,
        mediaConcurrency: 4,
      },
      logLevel: 'info',
    };
  }

  private deserializeConfig(configData: string): AppConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(configData);
    } catch (error) {
      throw new ConfigError(`${this.configPath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`${this.configPath} is invalid: ${formatIssues(parsed.error)}`);
    }

    const defaults = this.getDefaultConfig();
    const merged: AppConfig = {
      export: { ...defaults.export, ...parsed.data.export },
      logLevel: parsed.data.logLevel ?? defaults.logLevel,
    };

    const full = exportSchema.safeParse(merged.export);
    if (!full.success) {
      throw new ConfigError(`${this.configPath} is invalid: ${formatIssues(full.error)}`);
    }
    return merged;
  }

  /**
   * OUTPUT_DIR and MESSAGE_LIMIT take precedence over the file
   */
  private withEnvironment(config: AppConfig): AppConfig {
    const outputDir = this.env.OUTPUT_DIR?.trim();
    const limitText = this.env.MESSAGE_LIMIT?.trim();

    let messageLimit = config.export.messageLimit;
    if (limitText) {
      const parsed = Number(limitText);
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(`MESSAGE_LIMIT must be a non-negative integer, got "${limitText}"`);
      }
      messageLimit = parsed;
    }

    return {
      ...config,
      export: {
        ...config.export,
        outputDir: outputDir || config.export.outputDir,
        messageLimit,
      },
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

