/**
 * Parallel Processor
 *
 * Concurrency-limited task runner. All submissions share one slot pool,
 * so callers spread across several export operations still never exceed
 * `concurrency` running handlers. Failures are captured as error
 * entries; nothing is thrown.
 */

export interface ProcessorOptions {
  /** Maximum parallel tasks (default: 3) */
  concurrency: number;
}

export interface ProcessorResult<TInput, TOutput> {
  input: TInput;
  output?: TOutput;
  error?: Error;
}

export class ParallelProcessor<TInput, TOutput> {
  private readonly concurrency: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    private readonly handler: (item: TInput) => Promise<TOutput>,
    options: ProcessorOptions = { concurrency: 3 }
  ) {
    this.concurrency = Math.max(1, options.concurrency);
  }

  /**
   * Run a single item once a slot is free.
   */
  async submit(input: TInput): Promise<ProcessorResult<TInput, TOutput>> {
    await this.acquire();
    try {
      return { input, output: await this.handler(input) };
    } catch (err) {
      return { input, error: err instanceof Error ? err : new Error(String(err)) };
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // Slot is handed over directly by release(), active stays constant
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
