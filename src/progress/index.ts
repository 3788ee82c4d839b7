export { ProgressTracker, overallProgress } from './progress-tracker.js';
export { OperationRegistry } from './operation-registry.js';
export { EXPORT_STAGES, STAGE_WEIGHTS, TERMINAL_STAGES } from './types.js';
export type { ExportStage, OperationStatus, ProgressCallback } from './types.js';
