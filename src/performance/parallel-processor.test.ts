import { describe, it, expect } from 'vitest';
import { ParallelProcessor } from './parallel-processor.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ParallelProcessor', () => {
  it('returns the handler output for each submission', async () => {
    const processor = new ParallelProcessor<number, number>(
      async (n) => {
        await delay(10);
        return n * 2;
      },
      { concurrency: 2 }
    );

    const output = await Promise.all([1, 2, 3, 4].map((n) => processor.submit(n)));
    expect(output).toEqual([
      { input: 1, output: 2 },
      { input: 2, output: 4 },
      { input: 3, output: 6 },
      { input: 4, output: 8 },
    ]);
  });

  it('never runs more handlers than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const processor = new ParallelProcessor<number, number>(
      async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
        return n;
      },
      { concurrency: 2 }
    );

    await Promise.all([1, 2, 3, 4, 5].map((n) => processor.submit(n)));

    expect(peak).toBe(2);
    expect(inFlight).toBe(0);
  });

  it('captures errors without aborting other tasks', async () => {
    const processor = new ParallelProcessor<number, number>(
      async (n) => {
        if (n === 2) throw new Error('fail on 2');
        return n * 10;
      },
      { concurrency: 1 }
    );

    const [first, second, third] = await Promise.all([1, 2, 3].map((n) => processor.submit(n)));
    expect(second.error?.message).toBe('fail on 2');
    expect(first.output).toBe(10);
    expect(third.output).toBe(30);
  });

  it('frees the slot after a failure', async () => {
    const processor = new ParallelProcessor<string, string>(
      async (s) => {
        if (s === 'bad') throw 'plain string';
        return s.toUpperCase();
      },
      { concurrency: 1 }
    );

    const failed = await processor.submit('bad');
    expect(failed.error?.message).toBe('plain string');
    expect(await processor.submit('ok')).toEqual({ input: 'ok', output: 'OK' });
  });
});
