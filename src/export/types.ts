import type { ProgressCallback } from '../progress/types.js';
import type { OutputFormat, TemplateConfig } from '../templates/types.js';

export type ExportFormat = OutputFormat | 'both';

export interface ExportOptions {
  /** Base file name; the format's extension is appended. Default: export_YYYYMMDD_HHMMSS */
  outputName?: string;
  /** Overrides `paths.outputDir` for this call */
  outputDir?: string;
  /** Default: `export.defaultTemplate` */
  templateName?: string;
  /** Used instead of a named template */
  customTemplate?: TemplateConfig;
  onProgress?: ProgressCallback;
}

export interface ExportResult {
  success: boolean;
  operationId: string;
  format: OutputFormat;
  outputPath?: string;
  fileSize?: number;
  error?: string;
  warnings: string[];
}

export interface DualExportResult {
  success: boolean;
  operationId: string;
  pdfResult?: ExportResult;
  wordResult?: ExportResult;
  error?: string;
}
