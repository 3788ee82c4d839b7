/**
 * Progress Tracker
 *
 * Observable state for one export operation. Overall progress is the sum
 * of the weights of every earlier stage plus the weighted share of the
 * current one, and never moves backwards.
 */

import type { Logger } from 'pino';
import { moduleLogger } from '../logging/logger.js';
import {
  EXPORT_STAGES,
  STAGE_WEIGHTS,
  TERMINAL_STAGES,
  type ExportStage,
  type OperationStatus,
  type ProgressCallback,
} from './types.js';

const MAX_MESSAGES = 100;
const STATUS_MESSAGES = 10;

function clampPercent(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/** Sum of weights of all stages before `stage` plus its weighted share */
export function overallProgress(stage: ExportStage, stagePercent: number): number {
  if (TERMINAL_STAGES.has(stage)) return 100;

  let total = 0;
  for (const candidate of EXPORT_STAGES) {
    if (candidate === stage) break;
    total += STAGE_WEIGHTS[candidate];
  }
  return total + (STAGE_WEIGHTS[stage] * clampPercent(stagePercent)) / 100;
}

export class ProgressTracker {
  readonly operationId: string;

  private stage: ExportStage = 'initializing';
  private stagePercent = 0;
  private overall = 0;
  private readonly startedAt = new Date();
  private readonly messages: string[] = [];
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];
  private readonly callbacks: ProgressCallback[] = [];
  private cancelled = false;
  private readonly logger: Logger;

  constructor(operationId: string, logger?: Logger) {
    this.operationId = operationId;
    this.logger = moduleLogger('progress', logger).child({ operationId });
  }

  get currentStage(): ExportStage {
    return this.stage;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isTerminal(): boolean {
    return TERMINAL_STAGES.has(this.stage);
  }

  /**
   * Move to `stage` at `stagePercent`. Ignored once cancelled or finished.
   */
  updateProgress(stage: ExportStage, stagePercent: number, message?: string): void {
    if (this.cancelled || this.isTerminal) return;

    this.stage = stage;
    this.stagePercent = clampPercent(stagePercent);
    this.overall = Math.max(this.overall, overallProgress(stage, this.stagePercent));

    if (message) {
      this.pushMessage(message);
    }
    this.notify();
  }

  /** Force the terminal stage; overall progress becomes 100. */
  complete(success: boolean): void {
    this.stage = success ? 'completed' : 'failed';
    this.stagePercent = 100;
    this.overall = 100;
    this.pushMessage(success ? 'Export completed' : 'Export failed');
    this.notify();
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.pushMessage('Cancellation requested');
    this.notify();
  }

  addMessage(message: string): void {
    this.pushMessage(message);
    this.notify();
  }

  addError(error: string): void {
    this.errors.push(error);
    this.pushMessage(`ERROR: ${error}`);
    this.logger.error({ stage: this.stage }, error);
    this.notify();
  }

  addWarning(warning: string): void {
    this.warnings.push(warning);
    this.pushMessage(`WARNING: ${warning}`);
    this.logger.warn({ stage: this.stage }, warning);
    this.notify();
  }

  addCallback(callback: ProgressCallback): void {
    this.callbacks.push(callback);
  }

  getStatus(): OperationStatus {
    return {
      operationId: this.operationId,
      currentStage: this.stage,
      progressPercentage: Math.round(this.overall * 10) / 10,
      stageProgress: Math.round(this.stagePercent * 10) / 10,
      startTime: this.startedAt.toISOString(),
      elapsedSeconds: (Date.now() - this.startedAt.getTime()) / 1000,
      lastMessages: this.messages.slice(-STATUS_MESSAGES),
      errors: [...this.errors],
      warnings: [...this.warnings],
      cancelled: this.cancelled,
    };
  }

  private pushMessage(message: string): void {
    this.messages.push(message);
    if (this.messages.length > MAX_MESSAGES) {
      this.messages.splice(0, this.messages.length - MAX_MESSAGES);
    }
    this.logger.debug({ stage: this.stage, progress: this.overall }, message);
  }

  private notify(): void {
    if (this.callbacks.length === 0) return;
    const status = this.getStatus();
    for (const callback of this.callbacks) {
      try {
        callback(status);
      } catch (err) {
        this.logger.error({ err }, 'Progress callback failed');
      }
    }
  }
}
