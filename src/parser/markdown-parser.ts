/**
 * Markdown Parser
 *
 * Line-cursor scanner producing a flat sequence of MarkdownElements.
 * Covers the subset of markdown the exporters understand; anything it
 * does not recognise ends up in a paragraph, so no input line is lost.
 *
 * Grammar order at each cursor position:
 *   header → horizontal rule → fence → blockquote → table → list
 *   → inline image/link line → paragraph
 */

import type {
  DiagramBlockReference,
  HeaderLevel,
  ImageReference,
  ListItem,
  MarkdownElement,
} from './types.js';

const HEADER_PATTERN = /^(#{1,6})\s+(.+)$/;
const HORIZONTAL_RULE_PATTERN = /^([-*_])\1{2,}$/;
const LIST_PATTERN = /^(\s*)([-*+]|\d+\.)\s+(.+)$/;
const SEPARATOR_PATTERN = /^[\s|:-]+$/;
const SOLE_IMAGE_PATTERN = /^!\[([^\]]*)\]\(([^)]+)\)$/;
const IMAGE_PATTERN = /!\[([^\]]*)\]\(([^)]+)\)/g;
const LINK_PATTERN = /(?<!!)\[([^\]]+)\]\(([^)]+)\)/g;
const FENCE = '```';
const DIAGRAM_LANGUAGE = 'mermaid';

interface Consumed {
  elements: MarkdownElement[];
  next: number;
}

interface InlineSpan {
  start: number;
  end: number;
  element: MarkdownElement;
}

export class MarkdownParser {
  /**
   * Parse markdown text into elements. Never throws.
   */
  parse(text: string): MarkdownElement[] {
    const lines = normalize(text).split('\n').map((line) => line.replace(/\s+$/, ''));
    const elements: MarkdownElement[] = [];
    let i = 0;

    while (i < lines.length) {
      if (lines[i].trim() === '') {
        i++;
        continue;
      }

      const consumed =
        this.parseHeader(lines, i) ??
        this.parseHorizontalRule(lines, i) ??
        this.parseFence(lines, i) ??
        this.parseBlockquote(lines, i) ??
        this.parseTable(lines, i) ??
        this.parseList(lines, i) ??
        this.parseInlineLine(lines, i) ??
        this.parseParagraph(lines, i);

      elements.push(...consumed.elements);
      i = consumed.next;
    }

    return elements;
  }

  /**
   * Every image reference in the document, with its character offset.
   */
  extractImages(text: string): ImageReference[] {
    const refs: ImageReference[] = [];
    for (const match of text.matchAll(new RegExp(IMAGE_PATTERN.source, 'g'))) {
      refs.push({ alt: match[1], url: match[2].trim(), position: match.index ?? 0 });
    }
    return refs;
  }

  /**
   * Every terminated diagram fence, with the offset of its opening line.
   */
  extractDiagramBlocks(text: string): DiagramBlockReference[] {
    const source = normalize(text);
    const lines = source.split('\n');
    const blocks: DiagramBlockReference[] = [];
    let offset = 0;
    let i = 0;

    // Line start offsets, so positions refer to the normalised text
    const starts: number[] = [];
    for (const line of lines) {
      starts.push(offset);
      offset += line.length + 1;
    }

    while (i < lines.length) {
      const line = lines[i].replace(/\s+$/, '');
      if (!line.startsWith(FENCE)) {
        i++;
        continue;
      }
      const language = line.slice(FENCE.length).trim();
      const close = findFenceClose(lines, i + 1);
      if (close === -1) {
        i++;
        continue;
      }
      if (language === DIAGRAM_LANGUAGE) {
        blocks.push({ source: lines.slice(i + 1, close).join('\n'), position: starts[i] });
      }
      i = close + 1;
    }

    return blocks;
  }

  // ─── Grammar rules ─────────────────────────────────────────────────────────

  private parseHeader(lines: string[], i: number): Consumed | null {
    const match = HEADER_PATTERN.exec(lines[i]);
    if (!match) return null;
    return {
      elements: [{ type: 'header', level: toHeaderLevel(match[1].length), text: match[2].trim() }],
      next: i + 1,
    };
  }

  private parseHorizontalRule(lines: string[], i: number): Consumed | null {
    if (!HORIZONTAL_RULE_PATTERN.test(lines[i].trim())) return null;
    return { elements: [{ type: 'horizontal_rule' }], next: i + 1 };
  }

  private parseFence(lines: string[], i: number): Consumed | null {
    const line = lines[i];
    if (!line.startsWith(FENCE)) return null;

    const close = findFenceClose(lines, i + 1);
    if (close === -1) {
      // Unterminated: only the opening fence line is dropped
      return { elements: [], next: i + 1 };
    }

    const language = line.slice(FENCE.length).trim();
    const body = lines.slice(i + 1, close).join('\n');
    const element: MarkdownElement =
      language === DIAGRAM_LANGUAGE
        ? { type: 'diagram', language: DIAGRAM_LANGUAGE, source: body }
        : language
          ? { type: 'code', language, text: body }
          : { type: 'code', text: body };

    return { elements: [element], next: close + 1 };
  }

  private parseBlockquote(lines: string[], i: number): Consumed | null {
    if (!lines[i].startsWith('>')) return null;

    const quoted: string[] = [];
    let j = i;
    while (j < lines.length && lines[j].startsWith('>')) {
      const content = lines[j].slice(1).trim();
      if (content) quoted.push(content);
      j++;
    }

    return {
      elements: quoted.length > 0 ? [{ type: 'blockquote', text: quoted.join('\n') }] : [],
      next: j,
    };
  }

  private parseTable(lines: string[], i: number): Consumed | null {
    if (!isTableStart(lines, i)) return null;

    const headers = splitRow(lines[i]);
    const rows: string[][] = [];
    let j = i + 2;
    while (j < lines.length && lines[j].startsWith('|')) {
      const cells = splitRow(lines[j]);
      if (cells.length > 0) rows.push(cells);
      j++;
    }

    return { elements: [{ type: 'table', headers, rows }], next: j };
  }

  private parseList(lines: string[], i: number): Consumed | null {
    if (!LIST_PATTERN.test(lines[i])) return null;

    const items: ListItem[] = [];
    let j = i;
    while (j < lines.length) {
      const match = LIST_PATTERN.exec(lines[j]);
      if (!match) break;
      items.push({ indent: match[1].length, marker: match[2], text: match[3].trim() });
      j++;
    }

    return { elements: [{ type: 'list', items }], next: j };
  }

  private parseInlineLine(lines: string[], i: number): Consumed | null {
    const line = lines[i];
    if (!hasInlineReference(line)) return null;

    const sole = SOLE_IMAGE_PATTERN.exec(line.trim());
    if (sole) {
      return { elements: [{ type: 'image', alt: sole[1], url: sole[2].trim() }], next: i + 1 };
    }

    return { elements: partitionInline(line), next: i + 1 };
  }

  private parseParagraph(lines: string[], i: number): Consumed {
    const collected = [lines[i]];
    let j = i + 1;
    while (j < lines.length && lines[j].trim() !== '' && !startsConstruct(lines, j)) {
      collected.push(lines[j]);
      j++;
    }

    const text = collected.map((line) => line.trim()).join('\n');
    return { elements: [{ type: 'paragraph', text }], next: j };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function normalize(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

function toHeaderLevel(hashes: number): HeaderLevel {
  switch (hashes) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}

function findFenceClose(lines: string[], from: number): number {
  for (let j = from; j < lines.length; j++) {
    if (lines[j].trim() === FENCE) return j;
  }
  return -1;
}

function isSeparatorRow(line: string): boolean {
  return SEPARATOR_PATTERN.test(line) && line.includes('-');
}

function isTableStart(lines: string[], i: number): boolean {
  const line = lines[i];
  if (!(line.startsWith('|') && line.endsWith('|') && line.length > 1)) return false;
  const separator = lines[i + 1];
  return separator !== undefined && separator.startsWith('|') && isSeparatorRow(separator);
}

/** Cells between the outer pipes, trimmed. */
function splitRow(line: string): string[] {
  const inner = line.trim();
  const withoutLead = inner.startsWith('|') ? inner.slice(1) : inner;
  const body = withoutLead.endsWith('|') ? withoutLead.slice(0, -1) : withoutLead;
  if (body === '') return [];
  return body.split('|').map((cell) => cell.trim());
}

function hasInlineReference(line: string): boolean {
  return (
    new RegExp(IMAGE_PATTERN.source).test(line) || new RegExp(LINK_PATTERN.source).test(line)
  );
}

function partitionInline(line: string): MarkdownElement[] {
  const spans: InlineSpan[] = [];

  for (const match of line.matchAll(new RegExp(IMAGE_PATTERN.source, 'g'))) {
    const start = match.index ?? 0;
    spans.push({
      start,
      end: start + match[0].length,
      element: { type: 'image', alt: match[1], url: match[2].trim() },
    });
  }
  for (const match of line.matchAll(new RegExp(LINK_PATTERN.source, 'g'))) {
    const start = match.index ?? 0;
    spans.push({
      start,
      end: start + match[0].length,
      element: { type: 'link', text: match[1], url: match[2].trim() },
    });
  }
  spans.sort((a, b) => a.start - b.start);

  const elements: MarkdownElement[] = [];
  let cursor = 0;
  for (const span of spans) {
    // A link nested inside an image's alt text overlaps it; the image wins
    if (span.start < cursor) continue;
    pushText(elements, line.slice(cursor, span.start));
    elements.push(span.element);
    cursor = span.end;
  }
  pushText(elements, line.slice(cursor));

  return elements;
}

function pushText(elements: MarkdownElement[], text: string): void {
  const trimmed = text.trim();
  if (trimmed) elements.push({ type: 'text', text: trimmed });
}

/** True when line j would be claimed by a rule other than paragraph. */
function startsConstruct(lines: string[], j: number): boolean {
  const line = lines[j];
  return (
    HEADER_PATTERN.test(line) ||
    HORIZONTAL_RULE_PATTERN.test(line.trim()) ||
    line.startsWith(FENCE) ||
    line.startsWith('>') ||
    isTableStart(lines, j) ||
    LIST_PATTERN.test(line) ||
    hasInlineReference(line)
  );
}
