export { ExportService, formatTimestamp } from './export-service.js';
export type { ExportServiceDependencies } from './export-service.js';
export { ImageResolver } from './image-resolver.js';
export type { ImageResolverOptions } from './image-resolver.js';
export type { DualExportResult, ExportFormat, ExportOptions, ExportResult } from './types.js';
