/**
 * docforge ProgressReporter
 *
 * Structured console output for CLI operations. `track()` adapts an
 * export's progress callbacks to one line per stage.
 */

import type { ExportStage, OperationStatus, ProgressCallback } from '../progress/types.js';

const STAGE_LABELS: Readonly<Record<ExportStage, string>> = {
  initializing: 'Preparing export',
  parsing_markdown: 'Parsing markdown',
  converting_diagrams: 'Rendering diagrams',
  processing_images: 'Resolving images',
  generating_pdf: 'Writing PDF',
  generating_word: 'Writing Word document',
  finalizing: 'Finalizing',
  completed: 'Export complete',
  failed: 'Export failed',
};

export class ProgressReporter {
  startTask(name: string): void {
    console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    console.log(`✅ ${name}`);
  }

  failTask(name: string, err: Error): void {
    console.error(`❌ ${name}: ${err.message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  /**
   * Progress callback printing each new stage once, and each new warning.
   */
  track(): ProgressCallback {
    let lastStage: ExportStage | undefined;
    let warningsSeen = 0;

    return (status: OperationStatus) => {
      for (const warning of status.warnings.slice(warningsSeen)) {
        this.warn(warning);
      }
      warningsSeen = status.warnings.length;

      if (status.currentStage === lastStage) return;
      lastStage = status.currentStage;
      if (status.currentStage === 'completed' || status.currentStage === 'failed') return;
      this.startTask(`${STAGE_LABELS[status.currentStage]} (${Math.round(status.progressPercentage)}%)`);
    };
  }
}
