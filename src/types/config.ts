import type { MediaKind, TemplateName } from './index';
import type { LogLevel } from '../utils/logger';

export interface CustomTemplateConfig {
  linePattern: string;
  dateFormat: string;
  timeFormat: string;
  includeHeader: boolean;
  headerText?: string;
}

export interface ExportConfig {
  format: TemplateName;
  customTemplate?: CustomTemplateConfig;
  outputDir: string;
  fileNameTemplate: string;
  messageLimit: number; // 0 = whole history
  mediaKinds: MediaKind[];
  includeStatistics: boolean;
  downloadMedia: boolean;
  mediaConcurrency: number;
  timeZone?: string;
}

export interface AppConfig {
  export: ExportConfig;
  logLevel: LogLevel;
}
