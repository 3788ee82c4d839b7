import { describe, it, expect, vi, afterEach } from 'vitest';
import { OperationRegistry } from './operation-registry.js';
import { ProgressTracker, overallProgress } from './progress-tracker.js';
import { EXPORT_STAGES, STAGE_WEIGHTS, type OperationStatus } from './types.js';

describe('stage weights', () => {
  it('sum to 100', () => {
    const total = EXPORT_STAGES.reduce((sum, stage) => sum + STAGE_WEIGHTS[stage], 0);
    expect(total).toBe(100);
  });

  it('add earlier stages and the weighted share of the current one', () => {
    expect(overallProgress('initializing', 0)).toBe(0);
    expect(overallProgress('converting_diagrams', 50)).toBe(27.5);
    expect(overallProgress('generating_word', 50)).toBe(80);
    expect(overallProgress('finalizing', 100)).toBe(100);
    expect(overallProgress('failed', 0)).toBe(100);
  });
});

describe('ProgressTracker', () => {
  it('never decreases across ordered updates', () => {
    const tracker = new ProgressTracker('op');
    const seen: number[] = [];
    const steps: Array<[Parameters<ProgressTracker['updateProgress']>[0], number]> = [
      ['initializing', 0],
      ['initializing', 100],
      ['parsing_markdown', 50],
      ['converting_diagrams', 0],
      ['converting_diagrams', 100],
      ['processing_images', 100],
      ['generating_pdf', 40],
      ['finalizing', 0],
    ];

    for (const [stage, percent] of steps) {
      tracker.updateProgress(stage, percent);
      seen.push(tracker.getStatus().progressPercentage);
    }

    expect(seen).toEqual([0, 5, 10, 15, 40, 50, 58, 90]);
  });

  it('keeps the highest value when a stage goes backwards', () => {
    const tracker = new ProgressTracker('op');
    tracker.updateProgress('parsing_markdown', 100);
    tracker.updateProgress('initializing', 0);

    expect(tracker.getStatus().progressPercentage).toBe(15);
    expect(tracker.getStatus().currentStage).toBe('initializing');
  });

  it('clamps stage percentages', () => {
    const tracker = new ProgressTracker('op');
    tracker.updateProgress('initializing', 150);
    expect(tracker.getStatus()).toMatchObject({ stageProgress: 100, progressPercentage: 5 });

    tracker.updateProgress('parsing_markdown', -20);
    expect(tracker.getStatus()).toMatchObject({ stageProgress: 0, progressPercentage: 5 });
  });

  it.each([true, false])('reports exactly 100 after complete(%s)', (success) => {
    const tracker = new ProgressTracker('op');
    tracker.updateProgress('converting_diagrams', 30);
    tracker.complete(success);

    const status = tracker.getStatus();
    expect(status.progressPercentage).toBe(100);
    expect(status.currentStage).toBe(success ? 'completed' : 'failed');
  });

  it('ignores updates after cancel', () => {
    const tracker = new ProgressTracker('op');
    tracker.updateProgress('parsing_markdown', 50);
    tracker.cancel();
    tracker.updateProgress('generating_pdf', 100, 'late');

    const status = tracker.getStatus();
    expect(status.cancelled).toBe(true);
    expect(status.progressPercentage).toBe(10);
    expect(status.currentStage).toBe('parsing_markdown');
    expect(status.lastMessages).not.toContain('late');
  });

  it('ignores updates after a terminal stage', () => {
    const tracker = new ProgressTracker('op');
    tracker.complete(false);
    tracker.updateProgress('generating_word', 10);

    expect(tracker.getStatus().currentStage).toBe('failed');
    expect(tracker.isTerminal).toBe(true);
  });

  it('records errors, warnings and a bounded message tail', () => {
    const tracker = new ProgressTracker('op');
    for (let i = 0; i < 150; i++) {
      tracker.addMessage(`m${i}`);
    }
    tracker.addWarning('image missing');
    tracker.addError('write failed');

    const status = tracker.getStatus();
    expect(status.warnings).toEqual(['image missing']);
    expect(status.errors).toEqual(['write failed']);
    expect(status.lastMessages).toHaveLength(10);
    expect(status.lastMessages.slice(-2)).toEqual(['WARNING: image missing', 'ERROR: write failed']);
    expect(status.lastMessages[0]).toBe('m142');
  });

  it('notifies callbacks and survives one that throws', () => {
    const tracker = new ProgressTracker('op');
    const received: OperationStatus[] = [];
    tracker.addCallback(() => {
      throw new Error('listener bug');
    });
    tracker.addCallback((status) => received.push(status));

    tracker.updateProgress('parsing_markdown', 100, 'Parsed');

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      operationId: 'op',
      currentStage: 'parsing_markdown',
      progressPercentage: 15,
      lastMessages: ['Parsed'],
    });
  });

  it('exposes start time and elapsed seconds', () => {
    const tracker = new ProgressTracker('op');
    const status = tracker.getStatus();
    expect(Number.isNaN(Date.parse(status.startTime))).toBe(false);
    expect(status.elapsedSeconds).toBeGreaterThanOrEqual(0);
  });
});

describe('OperationRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates, finds and removes trackers', () => {
    const registry = new OperationRegistry();
    const tracker = registry.create('export-1');

    expect(registry.get('export-1')).toBe(tracker);
    expect(registry.size).toBe(1);
    expect(registry.remove('export-1')).toBe(true);
    expect(registry.get('export-1')).toBeUndefined();
    expect(registry.remove('export-1')).toBe(false);
  });

  it('generates unique ids and rejects duplicates', () => {
    const registry = new OperationRegistry();
    const a = registry.create();
    const b = registry.create();

    expect(a.operationId).not.toBe(b.operationId);
    expect(() => registry.create(a.operationId)).toThrow(`Operation ${a.operationId} already exists`);
  });

  it('evicts a tracker after the scheduled delay', () => {
    vi.useFakeTimers();
    const registry = new OperationRegistry();
    registry.create('op');

    registry.scheduleRemoval('op', 300_000);
    vi.advanceTimersByTime(299_999);
    expect(registry.get('op')).toBeDefined();

    vi.advanceTimersByTime(1);
    expect(registry.get('op')).toBeUndefined();
  });

  it('replaces a pending eviction when rescheduled', () => {
    vi.useFakeTimers();
    const registry = new OperationRegistry();
    registry.create('op');

    registry.scheduleRemoval('op', 1_000);
    vi.advanceTimersByTime(500);
    registry.scheduleRemoval('op', 1_000);
    vi.advanceTimersByTime(600);

    expect(registry.get('op')).toBeDefined();
    vi.advanceTimersByTime(400);
    expect(registry.get('op')).toBeUndefined();
  });

  it('clears timers and trackers on dispose', () => {
    vi.useFakeTimers();
    const registry = new OperationRegistry();
    registry.create('a');
    registry.create('b');
    registry.scheduleRemoval('a', 1_000);

    registry.dispose();

    expect(registry.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
