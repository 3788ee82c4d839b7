export { MarkdownParser } from './markdown-parser.js';
export { parseInlineFormatting, stripInlineFormatting } from './inline-formatter.js';
export type * from './types.js';
