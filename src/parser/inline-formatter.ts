/**
 * Inline emphasis scanner.
 *
 * Turns paragraph-level text into RichTextRuns carrying bold / italic /
 * code / strike markers. Renderers map the markers onto their own
 * primitives; the scanner knows nothing about either output format.
 */

import type { RichTextRun } from './types.js';

type RunStyle = Omit<RichTextRun, 'text'>;

/**
 * Alternatives, in priority order:
 *   1 `code`   2 ~~strike~~   3 **bold**   4 __bold__   5 *italic*   6 _italic_
 */
const TOKEN_PATTERN =
  /`([^`]+)`|~~(.+?)~~|\*\*(.+?)\*\*|__(.+?)__|\*([^*\s](?:[^*]*?[^*\s])?)\*|(?<![\p{L}\p{N}_])_([^_\s](?:[^_]*?[^_\s])?)_(?![\p{L}\p{N}_])/gu;

export function parseInlineFormatting(text: string): RichTextRun[] {
  const runs: RichTextRun[] = [];
  scan(text, {}, runs);
  return mergeRuns(runs);
}

/** Plain text with every emphasis marker removed. */
export function stripInlineFormatting(text: string): string {
  return parseInlineFormatting(text)
    .map((run) => run.text)
    .join('');
}

function scan(text: string, style: RunStyle, out: RichTextRun[]): void {
  const pattern = new RegExp(TOKEN_PATTERN.source, TOKEN_PATTERN.flags);
  let last = 0;

  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    if (start > last) {
      out.push({ text: text.slice(last, start), ...style });
    }

    const [, code, strike, bold, boldAlt, italic, italicAlt] = match;
    if (code !== undefined) {
      // Code spans are literal: no nested emphasis
      out.push({ text: code, ...style, code: true });
    } else if (strike !== undefined) {
      scan(strike, { ...style, strike: true }, out);
    } else if (bold !== undefined || boldAlt !== undefined) {
      scan(bold ?? boldAlt ?? '', { ...style, bold: true }, out);
    } else if (italic !== undefined || italicAlt !== undefined) {
      scan(italic ?? italicAlt ?? '', { ...style, italic: true }, out);
    }

    last = start + match[0].length;
  }

  if (last < text.length) {
    out.push({ text: text.slice(last), ...style });
  }
}

function sameStyle(a: RichTextRun, b: RichTextRun): boolean {
  return (
    Boolean(a.bold) === Boolean(b.bold) &&
    Boolean(a.italic) === Boolean(b.italic) &&
    Boolean(a.code) === Boolean(b.code) &&
    Boolean(a.strike) === Boolean(b.strike)
  );
}

function mergeRuns(runs: RichTextRun[]): RichTextRun[] {
  const merged: RichTextRun[] = [];
  for (const run of runs) {
    if (!run.text) continue;
    const previous = merged[merged.length - 1];
    if (previous && sameStyle(previous, run)) {
      merged[merged.length - 1] = { ...previous, text: previous.text + run.text };
    } else {
      merged.push(run);
    }
  }
  return merged;
}
