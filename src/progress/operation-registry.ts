/**
 * Operation Registry
 *
 * Id-keyed store of live progress trackers, injected into the export
 * service. Every mutation runs on the event loop, which serialises
 * access to the map.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { moduleLogger } from '../logging/logger.js';
import { ProgressTracker } from './progress-tracker.js';

export class OperationRegistry {
  private readonly trackers = new Map<string, ProgressTracker>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = moduleLogger('operations', logger);
  }

  get size(): number {
    return this.trackers.size;
  }

  /**
   * Register a new tracker. A fresh UUID is used when no id is given.
   */
  create(operationId: string = randomUUID()): ProgressTracker {
    if (this.trackers.has(operationId)) {
      throw new Error(`Operation ${operationId} already exists`);
    }
    const tracker = new ProgressTracker(operationId, this.logger);
    this.trackers.set(operationId, tracker);
    return tracker;
  }

  get(operationId: string): ProgressTracker | undefined {
    return this.trackers.get(operationId);
  }

  remove(operationId: string): boolean {
    this.clearTimer(operationId);
    return this.trackers.delete(operationId);
  }

  /**
   * Evict the tracker after `delayMs`. Rescheduling replaces the pending
   * eviction. The timer does not keep the process alive.
   */
  scheduleRemoval(operationId: string, delayMs: number): void {
    if (!this.trackers.has(operationId)) return;

    this.clearTimer(operationId);
    const timer = setTimeout(() => {
      this.timers.delete(operationId);
      this.trackers.delete(operationId);
      this.logger.debug({ operationId }, 'Operation status evicted');
    }, delayMs);
    timer.unref();
    this.timers.set(operationId, timer);
  }

  /** Clear every pending eviction and every tracker. */
  dispose(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.trackers.clear();
  }

  private clearTimer(operationId: string): void {
    const timer = this.timers.get(operationId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(operationId);
    }
  }
}
