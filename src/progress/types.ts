/**
 * Export stages, in order. Weights sum to 100.
 */
export const EXPORT_STAGES = [
  'initializing',
  'parsing_markdown',
  'converting_diagrams',
  'processing_images',
  'generating_pdf',
  'generating_word',
  'finalizing',
  'completed',
  'failed',
] as const;

export type ExportStage = (typeof EXPORT_STAGES)[number];

export const STAGE_WEIGHTS: Readonly<Record<ExportStage, number>> = {
  initializing: 5,
  parsing_markdown: 10,
  converting_diagrams: 25,
  processing_images: 10,
  generating_pdf: 20,
  generating_word: 20,
  finalizing: 10,
  completed: 0,
  failed: 0,
};

export const TERMINAL_STAGES: ReadonlySet<ExportStage> = new Set(['completed', 'failed']);

/** Status snapshot handed to callers and callbacks */
export interface OperationStatus {
  operationId: string;
  currentStage: ExportStage;
  /** Overall progress, 0-100, never decreasing */
  progressPercentage: number;
  /** Progress within the current stage, 0-100 */
  stageProgress: number;
  /** ISO-8601 */
  startTime: string;
  elapsedSeconds: number;
  /** Most recent log lines, oldest first */
  lastMessages: string[];
  errors: string[];
  warnings: string[];
  cancelled: boolean;
}

export type ProgressCallback = (status: OperationStatus) => void;
