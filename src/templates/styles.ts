/**
 * Style resolution
 *
 * Templates only carry the attributes they care about. Renderers ask for a
 * fully populated style per element kind; missing attributes come from the
 * template's body style and then from the defaults below.
 */

import type { HeaderLevel } from '../parser/types.js';
import type {
  OutputFormat,
  ResolvedTextStyle,
  StyleKey,
  TemplateConfig,
  TextStyle,
} from './types.js';

const TEXT_COLOR = '#2c3e50';
const HEADING_COLOR = '#34495e';

const HEADING_KEYS = ['title', 'heading1', 'heading2', 'heading3', 'heading4', 'heading5'] as const;

type HeadingKey = (typeof HEADING_KEYS)[number];

const DEFAULT_SIZES: Record<StyleKey, number> = {
  title: 20,
  heading1: 16,
  heading2: 14,
  heading3: 12,
  heading4: 11,
  heading5: 10,
  body: 11,
  code: 9,
  blockquote: 11,
  tableHeader: 10,
  tableCell: 9,
  caption: 9,
  link: 11,
  footer: 8,
};

const PDF_FONTS: Record<StyleKey, string> = {
  title: 'Helvetica-Bold',
  heading1: 'Helvetica-Bold',
  heading2: 'Helvetica-Bold',
  heading3: 'Helvetica-Bold',
  heading4: 'Helvetica-Bold',
  heading5: 'Helvetica-Bold',
  body: 'Helvetica',
  code: 'Courier',
  blockquote: 'Helvetica-Oblique',
  tableHeader: 'Helvetica-Bold',
  tableCell: 'Helvetica',
  caption: 'Helvetica-Oblique',
  link: 'Helvetica',
  footer: 'Helvetica',
};

const BASE_STYLES: Partial<Record<StyleKey, TextStyle>> = {
  title: { color: TEXT_COLOR, alignment: 'center', spacingAfter: 20 },
  heading1: { color: HEADING_COLOR, spacingAfter: 14 },
  heading2: { color: HEADING_COLOR, spacingAfter: 12 },
  heading3: { color: HEADING_COLOR, spacingAfter: 10 },
  heading4: { color: HEADING_COLOR, spacingAfter: 8 },
  heading5: { color: HEADING_COLOR, spacingAfter: 8 },
  code: { background: '#f8f9fa', spacingAfter: 10, lineSpacing: 1.1 },
  blockquote: { color: '#555555', indent: 0.5, borderColor: '#3498db' },
  tableHeader: { background: '#ecf0f1', borderColor: '#bdc3c7' },
  tableCell: { borderColor: '#bdc3c7' },
  caption: { color: '#7f8c8d', alignment: 'center', spacingAfter: 10 },
  link: { color: '#1a5fb4' },
  footer: { color: '#7f8c8d', alignment: 'center', spacingAfter: 0 },
};

/** Keys that inherit color and spacing from the body style */
const BODY_DERIVED: ReadonlySet<StyleKey> = new Set(['body', 'tableCell', 'tableHeader', 'link']);

/**
 * Style key for a header level: level 1 is the document title, levels 2-6
 * use heading1-heading5.
 */
export function headingKey(level: HeaderLevel): HeadingKey {
  return HEADING_KEYS[level - 1];
}

export function resolveStyle(
  template: TemplateConfig,
  format: OutputFormat,
  key: StyleKey
): ResolvedTextStyle {
  const body = template.pdf.body ?? {};
  const own = template.pdf[key] ?? {};
  const wordOwn = format === 'word' ? template.word.styles?.[key] ?? {} : {};
  const inherited: TextStyle = BODY_DERIVED.has(key)
    ? { color: body.color, lineSpacing: body.lineSpacing }
    : { lineSpacing: body.lineSpacing };

  const merged: TextStyle = {
    ...definedOnly(BASE_STYLES[key] ?? {}),
    ...definedOnly(inherited),
    ...definedOnly(own),
    ...definedOnly(wordOwn),
  };

  // The Word body size is set per template, ahead of the shared PDF body size
  const wordBodySize =
    format === 'word' && (key === 'body' || key === 'link') && wordOwn.fontSize === undefined
      ? template.word.fontSize
      : undefined;

  return {
    font: format === 'pdf' ? merged.font ?? PDF_FONTS[key] : wordFont(template, key, wordOwn),
    fontSize: wordBodySize ?? merged.fontSize ?? defaultSize(template, format, key),
    color: merged.color ?? TEXT_COLOR,
    background: merged.background,
    borderColor: merged.borderColor,
    alignment: merged.alignment ?? 'left',
    spacingAfter: merged.spacingAfter ?? 8,
    lineSpacing: merged.lineSpacing ?? 1.2,
    indent: merged.indent ?? 0,
  };
}

/**
 * Font sizes for header levels 1-6, clamped so a deeper level is never
 * larger than a shallower one.
 */
export function headingSizes(template: TemplateConfig, format: OutputFormat): number[] {
  const sizes: number[] = [];
  for (const key of HEADING_KEYS) {
    const size = resolveStyle(template, format, key).fontSize;
    const previous = sizes[sizes.length - 1];
    sizes.push(previous === undefined ? size : Math.min(size, previous));
  }
  return sizes;
}

function defaultSize(template: TemplateConfig, format: OutputFormat, key: StyleKey): number {
  const bodySize =
    format === 'word' ? template.word.fontSize ?? template.pdf.body?.fontSize : template.pdf.body?.fontSize;

  switch (key) {
    case 'body':
    case 'link':
    case 'blockquote':
      return bodySize ?? DEFAULT_SIZES[key];
    case 'heading3':
    case 'heading4':
    case 'heading5': {
      // Step down from the nearest explicitly sized heading above
      const index = HEADING_KEYS.indexOf(key);
      for (let i = index - 1; i >= 0; i--) {
        const size = template.pdf[HEADING_KEYS[i]]?.fontSize;
        if (size !== undefined) return Math.max(size - 2 * (index - i), 8);
      }
      return DEFAULT_SIZES[key];
    }
    default:
      return DEFAULT_SIZES[key];
  }
}

function wordFont(template: TemplateConfig, key: StyleKey, wordOwn: TextStyle): string {
  if (wordOwn.font) return wordOwn.font;
  if (key === 'code') return 'Consolas';
  return template.word.fontFamily ?? 'Calibri';
}

function definedOnly(style: TextStyle): TextStyle {
  const out: TextStyle = {};
  for (const [name, value] of Object.entries(style)) {
    if (value !== undefined) Object.assign(out, { [name]: value });
  }
  return out;
}
