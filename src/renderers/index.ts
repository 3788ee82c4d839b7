export { BaseRenderer, listItemText, listLevel, normalizeRows } from './base-renderer.js';
export { PdfRenderer } from './pdf-renderer.js';
export { WordRenderer } from './word-renderer.js';
export { readImageSize, fitWithin } from './image-size.js';
export type { ImageInfo, ImageSize, ImageType } from './image-size.js';
export { diagramAssetId } from './types.js';
export type {
  DocumentRenderer,
  RenderAssets,
  RendererOptions,
  RenderProgressCallback,
  RenderRequest,
} from './types.js';
