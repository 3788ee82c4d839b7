/**
 * Export Service Tests
 *
 * Orchestration with a fake diagram converter and recording renderers;
 * no external processes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigManager, type DocForgeConfig } from '../config/config.js';
import type { DiagramConverter } from '../diagrams/types.js';
import { MarkdownParser } from '../parser/markdown-parser.js';
import type { OperationStatus } from '../progress/types.js';
import type { DocumentRenderer, RenderRequest } from '../renderers/types.js';
import type { OutputFormat } from '../templates/types.js';
import { ExportService, formatTimestamp } from './export-service.js';
import { ImageResolver } from './image-resolver.js';

// ─── Fakes ────────────────────────────────────────────────────────────────────

class FakeConverter implements DiagramConverter {
  readonly name = 'fake';
  readonly ids: string[] = [];
  readonly cleaned: string[] = [];

  constructor(
    private readonly dir: string,
    private readonly fails: (source: string) => boolean = () => false
  ) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async render(source: string, id: string): Promise<string | null> {
    this.ids.push(id);
    if (this.fails(source)) return null;
    const file = path.join(this.dir, `${id}.png`);
    await writeFile(file, 'png');
    return file;
  }

  async renderToDataUri(): Promise<string | null> {
    return null;
  }

  async cleanup(paths: Iterable<string>): Promise<void> {
    for (const file of paths) {
      this.cleaned.push(file);
      await rm(file, { force: true });
    }
  }
}

class RecordingRenderer implements DocumentRenderer {
  readonly requests: RenderRequest[] = [];

  constructor(
    readonly format: OutputFormat,
    readonly extension: string,
    private readonly behaviour: 'write' | 'fail' | 'throw' = 'write'
  ) {}

  async render(request: RenderRequest): Promise<boolean> {
    this.requests.push(request);
    if (this.behaviour === 'throw') throw new Error('renderer exploded');
    if (this.behaviour === 'fail') return false;
    await mkdir(path.dirname(request.outputPath), { recursive: true });
    await writeFile(request.outputPath, 'x');
    request.onProgress?.(1, 2);
    request.onProgress?.(2, 2);
    return true;
  }
}

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const DIAGRAM_DOC = [
  '# Flow',
  '',
  '```mermaid',
  'graph TD; A-->B',
  '```',
  '',
  '```mermaid',
  'broken',
  '```',
  '',
  'After the diagrams.',
].join('\n');

let workDir: string;
let outDir: string;
let config: DocForgeConfig;
let converter: FakeConverter;
let pdf: RecordingRenderer;
let word: RecordingRenderer;
let service: ExportService;

function makeService(overrides: { pdf?: RecordingRenderer; word?: RecordingRenderer } = {}): ExportService {
  pdf = overrides.pdf ?? new RecordingRenderer('pdf', 'pdf');
  word = overrides.word ?? new RecordingRenderer('word', 'docx');
  return new ExportService(config, {
    diagramConverter: converter,
    renderers: { pdf, word },
    imageResolver: new ImageResolver({ searchPaths: [workDir] }),
    now: () => new Date(2024, 0, 5, 9, 3, 7),
  });
}

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'docforge-export-'));
  outDir = path.join(workDir, 'out');
  config = ConfigManager.defaults();
  config.paths.outputDir = outDir;
  config.paths.templatesDir = path.join(workDir, 'templates');
  config.paths.scratchDir = path.join(workDir, 'scratch');
  converter = new FakeConverter(workDir, (source) => source === 'broken');
  service = makeService();
});

afterEach(async () => {
  service.dispose();
  await rm(workDir, { recursive: true, force: true });
});

// ─── Single format ───────────────────────────────────────────────────────────

describe('ExportService single format', () => {
  it('writes the named file and reports its size', async () => {
    const result = await service.exportToPdf('# Title\n\nBody', { outputName: 'report' });
    expect(result).toEqual({
      success: true,
      operationId: result.operationId,
      format: 'pdf',
      outputPath: path.join(outDir, 'report.pdf'),
      fileSize: 1,
      warnings: [],
    });
    expect(word.requests).toHaveLength(0);
  });

  it('names the file from a timestamp when no name is given', async () => {
    const result = await service.exportToWord('text');
    expect(result.outputPath).toBe(path.join(outDir, 'export_20240105_090307.docx'));
  });

  it('honours a per-call output directory', async () => {
    const dir = path.join(workDir, 'elsewhere');
    const result = await service.export('text', 'pdf', { outputName: 'a', outputDir: dir });
    expect(result.outputPath).toBe(path.join(dir, 'a.pdf'));
  });

  it('converts each diagram once and falls back for failures', async () => {
    const result = await service.exportToPdf(DIAGRAM_DOC, { outputName: 'flow' });
    const id = result.operationId;

    expect(result.success).toBe(true);
    expect(converter.ids).toEqual([`${id}_diagram_1`, `${id}_diagram_2`]);
    expect(result.warnings).toEqual(['Diagram 2 could not be rendered; its source is shown instead']);
    expect(service.getExportStatus(id)?.errors).toEqual([]);

    const { assets, elements } = pdf.requests[0];
    const produced = path.join(workDir, `${id}_diagram_1.png`);
    expect([...assets.diagrams.entries()]).toEqual([['diagram_1', produced]]);
    expect(elements.map((element) => element.type)).toEqual(['header', 'diagram', 'diagram', 'paragraph']);
  });

  it('removes diagram scratch files after generation', async () => {
    const result = await service.exportToPdf(DIAGRAM_DOC, { outputName: 'flow' });
    const produced = path.join(workDir, `${result.operationId}_diagram_1.png`);
    expect(converter.cleaned).toEqual([produced]);
    expect(existsSync(produced)).toBe(false);
  });

  it('drops images that do not resolve and keeps the rest', async () => {
    await writeFile(path.join(workDir, 'logo.png'), 'png');
    const result = await service.exportToWord('![Logo](./logo.png)\n\n![Gone](missing.png)\n\nEnd', {
      outputName: 'imgs',
    });

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(['Image not found: missing.png']);
    expect(service.getExportStatus(result.operationId)?.errors).toEqual([]);
    const { elements, assets } = word.requests[0];
    expect(elements).toEqual([
      { type: 'image', alt: 'Logo', url: './logo.png' },
      { type: 'paragraph', text: 'End' },
    ]);
    expect(assets.images.get('./logo.png')).toBe(path.join(workDir, 'logo.png'));
  });

  it('reports a write failure as data', async () => {
    service = makeService({ pdf: new RecordingRenderer('pdf', 'pdf', 'fail') });
    const result = await service.exportToPdf('text', { outputName: 'r' });
    expect(result.success).toBe(false);
    expect(result.error).toBe(`Failed to write PDF file ${path.join(outDir, 'r.pdf')}`);
    const status = service.getExportStatus(result.operationId);
    expect(status?.currentStage).toBe('failed');
    expect(status?.errors).toEqual([`Failed to write PDF file ${path.join(outDir, 'r.pdf')}`]);
    expect(status?.warnings).toEqual([]);
  });

  it('never rejects when a renderer throws', async () => {
    service = makeService({ word: new RecordingRenderer('word', 'docx', 'throw') });
    const result = await service.exportToWord('text', { outputName: 'r' });
    expect(result.success).toBe(false);
    expect(result.error).toBe(`Failed to write Word file ${path.join(outDir, 'r.docx')}`);
  });

  it('never rejects when parsing throws', async () => {
    const parser = new MarkdownParser();
    vi.spyOn(parser, 'parse').mockImplementation(() => {
      throw new Error('parser broke');
    });
    service = new ExportService(config, { parser, diagramConverter: converter, renderers: { pdf, word } });
    const result = await service.exportToPdf('text');
    expect(result).toEqual({
      success: false,
      operationId: result.operationId,
      format: 'pdf',
      error: 'parser broke',
      warnings: [],
    });
  });
});

// ─── Templates ───────────────────────────────────────────────────────────────

describe('ExportService templates', () => {
  it('renders with the named template', async () => {
    await service.exportToPdf('text', { templateName: 'academic_paper' });
    expect(pdf.requests[0].template.name).toBe('Academic Paper');
  });

  it('prefers a custom template over any name', async () => {
    const whitepaper = await service.getTemplate('whitepaper');
    if (!whitepaper) throw new Error('whitepaper template missing');
    await service.exportToPdf('text', {
      templateName: 'academic_paper',
      customTemplate: { ...whitepaper, name: 'Mine' },
    });
    expect(pdf.requests[0].template.name).toBe('Mine');
  });

  it('falls back to the default template with a warning', async () => {
    const result = await service.exportToPdf('text', { templateName: 'nope' });
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(['Template "nope" not found; using "whitepaper"']);
    expect(pdf.requests[0].template.name).toBe('Whitepaper');
  });

  it('fails when the default template itself is missing', async () => {
    config.export.defaultTemplate = 'nope';
    service = makeService();
    const result = await service.exportToPdf('text');
    expect(result.success).toBe(false);
    expect(result.error).toBe('Template problem: Template "nope" not found');
    expect(pdf.requests).toHaveLength(0);
  });

  it('delegates template management to the registry', async () => {
    const whitepaper = await service.getTemplate('whitepaper');
    expect(whitepaper).toBeDefined();
    expect(await service.createTemplate('house_style', { ...whitepaper, name: 'House Style' })).toBe(true);
    expect((await service.listTemplates()).map((t) => t.name)).toContain('house_style');
    expect(await service.deleteTemplate('house_style')).toBe(true);
    expect(await service.deleteTemplate('whitepaper')).toBe(false);
  });
});

// ─── Dual format ─────────────────────────────────────────────────────────────

describe('ExportService dual format', () => {
  it('parses and converts once for both renderers', async () => {
    const parser = new MarkdownParser();
    const parse = vi.spyOn(parser, 'parse');
    service = new ExportService(config, {
      parser,
      diagramConverter: converter,
      renderers: { pdf, word },
      imageResolver: new ImageResolver({ searchPaths: [workDir] }),
    });

    const result = await service.exportToBoth(DIAGRAM_DOC, { outputName: 'both' });

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(parse).toHaveBeenCalledTimes(1);
    expect(converter.ids).toHaveLength(2);
    expect(pdf.requests[0].elements).toBe(word.requests[0].elements);
    expect(result.pdfResult?.outputPath).toBe(path.join(outDir, 'both.pdf'));
    expect(result.wordResult?.outputPath).toBe(path.join(outDir, 'both.docx'));
    expect(result.pdfResult?.operationId).toBe(result.operationId);
  });

  it('fails overall and names only the failing format', async () => {
    service = makeService({ word: new RecordingRenderer('word', 'docx', 'fail') });
    const result = await service.export('text', 'both', { outputName: 'mixed' });

    expect(result.success).toBe(false);
    expect(result.pdfResult?.success).toBe(true);
    expect(result.wordResult?.success).toBe(false);
    expect(result.error).toBe(`Word: Failed to write Word file ${path.join(outDir, 'mixed.docx')}`);
  });

  it('joins both errors when both formats fail', async () => {
    service = makeService({
      pdf: new RecordingRenderer('pdf', 'pdf', 'fail'),
      word: new RecordingRenderer('word', 'docx', 'fail'),
    });
    const result = await service.exportToBoth('text', { outputName: 'none' });
    expect(result.error).toBe(
      `PDF: Failed to write PDF file ${path.join(outDir, 'none.pdf')}; ` +
        `Word: Failed to write Word file ${path.join(outDir, 'none.docx')}`
    );
  });
});

// ─── Progress ────────────────────────────────────────────────────────────────

describe('ExportService progress', () => {
  it('reports non-decreasing progress ending at 100', async () => {
    const updates: OperationStatus[] = [];
    await service.exportToBoth(DIAGRAM_DOC, { onProgress: (status) => updates.push(status) });

    const percentages = updates.map((status) => status.progressPercentage);
    for (let i = 1; i < percentages.length; i++) {
      expect(percentages[i]).toBeGreaterThanOrEqual(percentages[i - 1]);
    }
    expect(percentages[percentages.length - 1]).toBe(100);

    const stages = [...new Set(updates.map((status) => status.currentStage))];
    expect(stages).toEqual([
      'initializing',
      'parsing_markdown',
      'converting_diagrams',
      'processing_images',
      'generating_pdf',
      'generating_word',
      'finalizing',
      'completed',
    ]);
  });

  it('keeps the status queryable, then evicts it', async () => {
    config.export.statusRetentionMs = 20;
    service = makeService();
    const result = await service.exportToPdf('text');

    expect(service.getExportStatus(result.operationId)?.progressPercentage).toBe(100);
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(service.getExportStatus(result.operationId)).toBeUndefined();
  });

  it('cancels observation without stopping the export', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow = new FakeConverter(workDir);
    const render = slow.render.bind(slow);
    const blocked = vi.spyOn(slow, 'render').mockImplementation(async (source, id) => {
      await gate;
      return render(source, id);
    });
    service = new ExportService(config, { diagramConverter: slow, renderers: { pdf, word } });

    let operationId = '';
    const pending = service.exportToPdf(DIAGRAM_DOC, {
      onProgress: (status) => {
        operationId = status.operationId;
      },
    });
    await vi.waitFor(() => expect(blocked).toHaveBeenCalledTimes(2));

    const frozen = service.getExportStatus(operationId)?.progressPercentage;
    expect(service.cancelExport(operationId)).toBe(true);
    release();
    const result = await pending;

    expect(result.success).toBe(true);
    expect(pdf.requests).toHaveLength(1);
    const status = service.getExportStatus(operationId);
    expect(status?.cancelled).toBe(true);
    expect(status?.currentStage).toBe('completed');
    expect(frozen).toBe(15);
  });

  it('refuses to cancel unknown or finished operations', async () => {
    expect(service.cancelExport('missing')).toBe(false);
    const result = await service.exportToPdf('text');
    expect(service.cancelExport(result.operationId)).toBe(false);
  });
});

describe('formatTimestamp', () => {
  it('pads every field', () => {
    expect(formatTimestamp(new Date(2025, 10, 3, 4, 5, 6))).toBe('20251103_040506');
  });
});
