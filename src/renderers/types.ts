import type { Logger } from 'pino';
import type { MarkdownElement } from '../parser/types.js';
import type { OutputFormat, TemplateConfig } from '../templates/types.js';

export interface RenderAssets {
  /** Diagram asset id → PNG path; a missing id means conversion failed */
  diagrams: ReadonlyMap<string, string>;
  /** Image url as written in the markdown → resolved file path */
  images: ReadonlyMap<string, string>;
}

export type RenderProgressCallback = (completed: number, total: number) => void;

export interface RenderRequest {
  elements: readonly MarkdownElement[];
  template: TemplateConfig;
  assets: RenderAssets;
  outputPath: string;
  /** Fired after each element */
  onProgress?: RenderProgressCallback;
}

export interface DocumentRenderer {
  readonly format: OutputFormat;
  /** File extension without the dot */
  readonly extension: string;
  /** False only when the output file could not be written */
  render(request: RenderRequest): Promise<boolean>;
}

export interface RendererOptions {
  /** Stamped on every PDF page and in the DOCX default footer; empty disables it */
  footerText?: string;
  logger?: Logger;
}

/** Asset id of the n-th diagram block (1-based) */
export function diagramAssetId(position: number): string {
  return `diagram_${position}`;
}
