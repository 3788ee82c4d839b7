import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { MarkdownParser } from '../parser/markdown-parser.js';
import type { MarkdownElement } from '../parser/types.js';
import { BUILTIN_TEMPLATES } from '../templates/builtin-templates.js';
import { listItemText, listLevel, normalizeRows } from './base-renderer.js';
import { fitWithin, readImageSize } from './image-size.js';
import { pdfCodeFont, pdfFontVariant } from './pdf-fonts.js';
import { PdfRenderer } from './pdf-renderer.js';
import { WordRenderer } from './word-renderer.js';
import type { RenderAssets, RenderRequest } from './types.js';

// 1x1 RGBA PNG
const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNk+M9QDwADhgGAWjR9awAAAABJRU5ErkJggg==',
  'base64'
);

const parser = new MarkdownParser();
const template = BUILTIN_TEMPLATES.technical_report;
const noAssets: RenderAssets = { diagrams: new Map(), images: new Map() };
const MEDIA_PART = /^word\/media\/.+/;

/** Embedded media parts, without jszip's directory entries */
function mediaFiles(zip: JSZip): string[] {
  return Object.keys(zip.files).filter((name) => MEDIA_PART.test(name) && !zip.files[name].dir);
}

async function docxPart(file: string, part: RegExp): Promise<string> {
  const zip = await JSZip.loadAsync(await readFile(file));
  const names = Object.keys(zip.files).filter((name) => part.test(name));
  const contents = await Promise.all(names.map((name) => zip.files[name].async('string')));
  return contents.join('\n');
}

describe('format renderers', () => {
  let outDir: string;
  let pngPath: string;

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(os.tmpdir(), 'docforge-render-'));
    pngPath = path.join(outDir, 'pixel.png');
    await writeFile(pngPath, PIXEL_PNG);
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  function request(elements: MarkdownElement[], overrides: Partial<RenderRequest> = {}): RenderRequest {
    return {
      elements,
      template,
      assets: noAssets,
      outputPath: path.join(outDir, 'out'),
      ...overrides,
    };
  }

  const sample = parser.parse(
    [
      '# Title',
      '',
      'Some **bold** and *italic* text with `code`.',
      '',
      '## Section',
      '',
      '- first',
      '  - nested',
      '1. 1. numbered',
      '',
      '| A | B |',
      '|---|---|',
      '| 1 |',
      '',
      '> quoted',
      '',
      '---',
      '',
      'See [docs](https://example.com) here',
      '',
      '```ts',
      'const x = 1;',
      '```',
    ].join('\n')
  );

  describe('PdfRenderer', () => {
    it('writes a PDF and reports progress per element', async () => {
      const outputPath = path.join(outDir, 'sample.pdf');
      const progress: Array<[number, number]> = [];

      const ok = await new PdfRenderer({ footerText: 'Confidential' }).render(
        request(sample, { outputPath, onProgress: (done, total) => progress.push([done, total]) })
      );

      expect(ok).toBe(true);
      const pdf = await readFile(outputPath);
      expect(pdf.subarray(0, 5).toString('ascii')).toBe('%PDF-');
      expect(progress).toHaveLength(sample.length);
      expect(progress[progress.length - 1]).toEqual([sample.length, sample.length]);
    });

    it('lays out long documents over several pages', async () => {
      const outputPath = path.join(outDir, 'long.pdf');
      const elements: MarkdownElement[] = Array.from({ length: 120 }, (_, i) => ({
        type: 'paragraph',
        text: `Paragraph ${i} with enough words to wrap across the line at least once or twice.`,
      }));

      expect(await new PdfRenderer({ footerText: 'Footer' }).render(request(elements, { outputPath }))).toBe(true);
      const pdf = (await readFile(outputPath)).toString('latin1');
      expect((pdf.match(/\/Type \/Page\b/g) ?? []).length).toBeGreaterThan(1);
    });

    it('embeds diagram and image assets', async () => {
      const outputPath = path.join(outDir, 'assets.pdf');
      const elements = parser.parse('```mermaid\ngraph TD\n```\n\n![pixel](pixel.png)');

      const ok = await new PdfRenderer().render(
        request(elements, {
          outputPath,
          assets: {
            diagrams: new Map([['diagram_1', pngPath]]),
            images: new Map([['pixel.png', pngPath]]),
          },
        })
      );

      expect(ok).toBe(true);
      const pdf = (await readFile(outputPath)).toString('latin1');
      expect(pdf).toContain('/Subtype /Image');
    });

    it('returns false when the file cannot be written', async () => {
      const blocker = path.join(outDir, 'blocker');
      await writeFile(blocker, 'x');

      const ok = await new PdfRenderer().render(
        request(sample, { outputPath: path.join(blocker, 'out.pdf') })
      );
      expect(ok).toBe(false);
    });
  });

  describe('WordRenderer', () => {
    it('writes headings, rich text, tables, lists and links', async () => {
      const outputPath = path.join(outDir, 'sample.docx');

      expect(await new WordRenderer().render(request(sample, { outputPath }))).toBe(true);

      const xml = await docxPart(outputPath, /^word\/document\.xml$/);
      expect(xml).toContain('<w:pStyle w:val="Title"/>');
      expect(xml).toContain('<w:pStyle w:val="Heading1"/>');
      expect(xml).toContain('>Title<');
      expect(xml).toContain('>bold<');
      expect(xml).toContain('>docs (https://example.com)<');
      expect(xml).toContain('<w:hyperlink');
      expect(xml).toContain('>numbered<');
      expect(xml).not.toContain('>1. numbered<');
      expect(xml).toContain('<w:numPr>');
      expect(xml).toContain('>const x = 1;<');
      // 2 header cells + ragged row padded to 2
      expect((xml.match(/<w:tc>/g) ?? []).length).toBe(4);
    });

    it('puts the footer text in the default footer', async () => {
      const outputPath = path.join(outDir, 'footer.docx');

      await new WordRenderer({ footerText: 'Internal use only' }).render(request(sample, { outputPath }));

      const footer = await docxPart(outputPath, /^word\/footer\d*\.xml$/);
      expect(footer).toContain('>Internal use only<');
    });

    it('falls back to the diagram source when no asset exists', async () => {
      const outputPath = path.join(outDir, 'fallback.docx');
      const elements = parser.parse('Before\n\n```mermaid\ngraph TD\n```\n\nAfter');

      expect(await new WordRenderer().render(request(elements, { outputPath }))).toBe(true);

      const xml = await docxPart(outputPath, /^word\/document\.xml$/);
      expect(xml).toContain('>graph TD<');
      expect(xml).toContain('>After<');
    });

    it('numbers diagrams by position and embeds the matching asset', async () => {
      const outputPath = path.join(outDir, 'diagrams.docx');
      const elements = parser.parse('```mermaid\nfirst\n```\n\n```mermaid\nsecond\n```');

      await new WordRenderer().render(
        request(elements, {
          outputPath,
          assets: { diagrams: new Map([['diagram_2', pngPath]]), images: new Map() },
        })
      );

      const xml = await docxPart(outputPath, /^word\/document\.xml$/);
      expect(xml).toContain('>first<');
      expect(xml).not.toContain('>second<');
      const zip = await JSZip.loadAsync(await readFile(outputPath));
      expect(mediaFiles(zip)).toHaveLength(1);
    });

    it('omits images without a resolved file', async () => {
      const outputPath = path.join(outDir, 'images.docx');
      const elements = parser.parse('![missing](nowhere.png)\n\nText');

      await new WordRenderer().render(request(elements, { outputPath }));

      const zip = await JSZip.loadAsync(await readFile(outputPath));
      expect(mediaFiles(zip)).toEqual([]);
      const xml = await docxPart(outputPath, /^word\/document\.xml$/);
      expect(xml).not.toContain('missing');
      expect(xml).toContain('>Text<');
    });

    it('keeps rendering after an element fails', async () => {
      const outputPath = path.join(outDir, 'broken.docx');
      const bogus = path.join(outDir, 'bogus.png');
      await writeFile(bogus, 'not an image');
      const elements = parser.parse('![broken](bogus.png)\n\nStill here');

      const ok = await new WordRenderer().render(
        request(elements, {
          outputPath,
          assets: { diagrams: new Map(), images: new Map([['bogus.png', bogus]]) },
        })
      );

      expect(ok).toBe(true);
      const xml = await docxPart(outputPath, /^word\/document\.xml$/);
      expect(xml).toContain('>Still here<');
    });
  });
});

describe('renderer helpers', () => {
  it('strips leading ordinals from list items', () => {
    expect(listItemText({ indent: 0, marker: '1.', text: '2. second' })).toBe('second');
    expect(listItemText({ indent: 0, marker: '-', text: 'plain' })).toBe('plain');
  });

  it('derives list levels from indentation', () => {
    expect(listLevel({ indent: 0, marker: '-', text: 'a' })).toBe(0);
    expect(listLevel({ indent: 4, marker: '-', text: 'a' })).toBe(2);
    expect(listLevel({ indent: 40, marker: '-', text: 'a' })).toBe(8);
  });

  it('pads and truncates rows to the header width', () => {
    expect(
      normalizeRows({ type: 'table', headers: ['A', 'B'], rows: [['1'], ['1', '2', '3']] })
    ).toEqual([
      ['1', ''],
      ['1', '2'],
    ]);
  });

  it('reads PNG and JPEG dimensions', () => {
    expect(readImageSize(PIXEL_PNG)).toEqual({ type: 'png', width: 1, height: 1 });

    const jpeg = Buffer.alloc(40);
    jpeg.set([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10], 0);
    jpeg.set([0xff, 0xc0, 0x00, 0x11, 0x08, 0x00, 0x20, 0x00, 0x40, 0x03], 20);
    expect(readImageSize(jpeg)).toEqual({ type: 'jpg', width: 64, height: 32 });

    expect(readImageSize(Buffer.from('not an image'))).toBeNull();
  });

  it('scales images down but never up', () => {
    expect(fitWithin({ width: 800, height: 600 }, 400, 1000)).toEqual({ width: 400, height: 300 });
    expect(fitWithin({ width: 100, height: 50 }, 400, 1000)).toEqual({ width: 100, height: 50 });
  });

  it('picks standard font faces for emphasis', () => {
    expect(pdfFontVariant('Helvetica', { bold: true })).toBe('Helvetica-Bold');
    expect(pdfFontVariant('Times-Roman', { italic: true })).toBe('Times-Italic');
    expect(pdfFontVariant('Helvetica-Bold', { italic: true })).toBe('Helvetica-BoldOblique');
    expect(pdfFontVariant('Unknown-Face')).toBe('Helvetica');
    expect(pdfCodeFont('Helvetica-Bold')).toBe('Courier-Bold');
  });
});
