/**
 * docforge Output Formatter
 *
 * Formats export results, templates and config reports into
 * human-readable strings for CLI output.
 */

import { ErrorHandler } from '../errors/error-handler.js';
import type { ConfigValue, ValidationReport } from '../config/config.js';
import type { DualExportResult, ExportResult } from '../export/types.js';
import type { TemplateConfig, TemplateSummary } from '../templates/types.js';

const LINE = '─'.repeat(60);

const ANSI = {
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  reset: '\x1b[0m',
} as const;

type Tone = keyof typeof ANSI;

export interface FormatterOptions {
  /** ANSI colours (default: true) */
  color?: boolean;
}

export class OutputFormatter {
  private readonly color: boolean;

  constructor(options: FormatterOptions = {}) {
    this.color = options.color ?? true;
  }

  /**
   * Format a single-format export result.
   */
  formatExportResult(result: ExportResult): string {
    const label = result.format === 'pdf' ? 'PDF' : 'Word';
    const lines: string[] = [this.header(`${label} Export`)];
    lines.push(this.field('Operation', result.operationId));
    if (result.success) {
      lines.push(this.field('Status', this.paint('green', '✓ written')));
      lines.push(this.field('File', result.outputPath));
      if (result.fileSize !== undefined) lines.push(this.field('Size', formatBytes(result.fileSize)));
    } else {
      lines.push(this.field('Status', this.paint('red', '✗ failed')));
      lines.push(this.field('Error', result.error));
    }
    for (const warning of result.warnings) {
      lines.push(`  ${this.paint('yellow', '!')} ${warning}`);
    }
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format a dual export: one block per format, then the combined error.
   */
  formatDualResult(result: DualExportResult): string {
    const blocks: string[] = [];
    if (result.pdfResult) blocks.push(this.formatExportResult(result.pdfResult));
    if (result.wordResult) blocks.push(this.formatExportResult(result.wordResult));
    if (!result.success && result.error) {
      blocks.push(`${this.paint('red', 'Export failed:')} ${result.error}`);
    }
    return blocks.join('\n');
  }

  formatTemplateList(templates: TemplateSummary[]): string {
    if (!templates.length) {
      return this.paint('yellow', 'No templates found.');
    }
    const lines: string[] = [this.header(`Templates (${templates.length})`)];
    for (const template of templates) {
      const kind = template.type === 'builtin' ? 'built-in' : 'custom';
      lines.push(`  ${this.paint('bold', template.name.padEnd(22))}${template.displayName} ${this.paint('dim', `[${template.category}, ${kind}]`)}`);
      if (template.description) lines.push(`  ${' '.repeat(22)}${this.paint('dim', template.description)}`);
    }
    return lines.join('\n');
  }

  formatTemplate(name: string, template: TemplateConfig): string {
    return [this.header(`Template ${name}`), JSON.stringify(template, null, 2)].join('\n');
  }

  formatConfigValue(key: string, value: ConfigValue | undefined): string {
    return value === undefined ? `Key not found: ${key}` : JSON.stringify(value, null, 2);
  }

  formatValidation(report: ValidationReport): string {
    if (report.valid) {
      return `${this.paint('green', '✅')} Configuration is valid`;
    }
    return [`${this.paint('red', '❌')} Configuration has errors:`, ...report.errors.map((e) => `  - ${e}`)].join('\n');
  }

  /**
   * Format an error into a message with a hint for common cases.
   */
  formatError(error: unknown): string {
    const lines = [`${this.paint('red', 'Error:')} ${ErrorHandler.toUserMessage(error)}`];
    const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
    if (msg.includes('enoent') || msg.includes('no such file')) {
      lines.push(`${this.paint('yellow', 'Hint:')} The specified file or path does not exist. Check the path and try again.`);
    } else if (msg.includes('eacces') || msg.includes('permission denied')) {
      lines.push(`${this.paint('yellow', 'Hint:')} Permission denied. Check the output directory permissions.`);
    }
    return lines.join('\n');
  }

  // ─── Private helpers ────────────────────────────────────────────────────────

  private header(title: string): string {
    return `${this.paint('bold', title)}\n${LINE}`;
  }

  private field(label: string, value: string | number | undefined): string {
    if (value === undefined) return '';
    return `  ${this.paint('dim', label.padEnd(12))}${value}`;
  }

  private paint(tone: Tone, text: string): string {
    return this.color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
  }
}

/** 1536 → "1.5 KB" */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
