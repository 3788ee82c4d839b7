/**
 * Mermaid CLI Renderer
 *
 * Renders diagram source through the `mmdc` executable. Each render writes
 * `<scratch>/<id>.mmd`, runs the tool on the shared bounded executor and
 * yields `<scratch>/<id>.png`. The input file is always removed.
 *
 * Availability is probed once (`mmdc --version`) when the renderer is
 * constructed; if the probe fails, every render resolves to null without
 * spawning anything.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { DiagramConversionError } from '../errors/docforge-error.js';
import { moduleLogger } from '../logging/logger.js';
import { ParallelProcessor } from '../performance/parallel-processor.js';
import { spawnProcess } from './process-runner.js';
import type {
  DiagramConverter,
  DiagramRenderOptions,
  DiagramSettings,
  ProcessResult,
  ProcessRunner,
} from './types.js';

const PROBE_TIMEOUT_MS = 10_000;

export interface MermaidCliOptions {
  settings: DiagramSettings;
  /** Directory for the .mmd input and .png output files */
  scratchDir: string;
  /** Injected process runner (default: child_process spawn) */
  runner?: ProcessRunner;
  logger?: Logger;
}

interface RenderJob {
  args: string[];
}

export class MermaidCliRenderer implements DiagramConverter {
  readonly name = 'mermaid-cli';

  private readonly settings: DiagramSettings;
  private readonly scratchDir: string;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly executor: ParallelProcessor<RenderJob, ProcessResult>;
  private readonly probe: Promise<boolean>;

  constructor(options: MermaidCliOptions) {
    this.settings = options.settings;
    this.scratchDir = options.scratchDir;
    this.runner = options.runner ?? spawnProcess;
    this.logger = moduleLogger('diagrams', options.logger);
    this.executor = new ParallelProcessor<RenderJob, ProcessResult>(
      (job) => this.runner(this.settings.command, job.args, this.settings.timeoutMs),
      { concurrency: this.settings.maxConcurrent }
    );
    this.probe = this.runProbe();
  }

  isAvailable(): Promise<boolean> {
    return this.probe;
  }

  async render(
    source: string,
    id: string,
    options: DiagramRenderOptions = {}
  ): Promise<string | null> {
    if (!(await this.probe)) {
      this.logger.debug({ diagramId: id }, 'Diagram renderer unavailable, skipping');
      return null;
    }

    const inputPath = path.join(this.scratchDir, `${id}.mmd`);
    const outputPath = path.join(this.scratchDir, `${id}.png`);

    try {
      await mkdir(this.scratchDir, { recursive: true });
      await writeFile(inputPath, source, 'utf8');

      const result = await this.executor.submit({
        args: this.buildArgs(inputPath, outputPath, options),
      });
      const failure = await this.describeFailure(result.output, result.error, outputPath);

      if (failure) {
        this.logger.warn(
          { err: new DiagramConversionError(failure, id, { stderr: result.output?.stderr }) },
          'Diagram conversion failed'
        );
        await rm(outputPath, { force: true });
        return null;
      }

      this.logger.debug({ diagramId: id, outputPath }, 'Diagram rendered');
      return outputPath;
    } catch (err) {
      this.logger.warn({ err, diagramId: id }, 'Diagram conversion failed');
      return null;
    } finally {
      await rm(inputPath, { force: true });
    }
  }

  async renderToDataUri(
    source: string,
    id: string,
    options?: DiagramRenderOptions
  ): Promise<string | null> {
    const outputPath = await this.render(source, id, options);
    if (!outputPath) return null;

    try {
      const png = await readFile(outputPath);
      return `data:image/png;base64,${png.toString('base64')}`;
    } finally {
      await rm(outputPath, { force: true });
    }
  }

  async cleanup(paths: Iterable<string>): Promise<void> {
    const results = await Promise.allSettled(
      [...paths].map((file) => rm(file, { force: true }))
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn({ err: result.reason }, 'Failed to remove diagram file');
      }
    }
  }

  private buildArgs(
    inputPath: string,
    outputPath: string,
    options: DiagramRenderOptions
  ): string[] {
    return [
      '-i', inputPath,
      '-o', outputPath,
      '-w', String(options.width ?? this.settings.width),
      '-H', String(options.height ?? this.settings.height),
      '-t', options.theme ?? this.settings.theme,
      '-b', options.background ?? this.settings.background,
    ];
  }

  /** Reason the render produced no image, or null on success. */
  private async describeFailure(
    result: ProcessResult | undefined,
    error: Error | undefined,
    outputPath: string
  ): Promise<string | null> {
    if (!result) return error?.message ?? 'Renderer did not run';
    if (result.timedOut) return `Renderer timed out after ${this.settings.timeoutMs}ms`;
    if (result.exitCode !== 0) {
      return `Renderer exited with code ${result.exitCode ?? 'null'}`;
    }
    if (!(await fileExists(outputPath))) return 'Renderer produced no output file';
    return null;
  }

  private async runProbe(): Promise<boolean> {
    try {
      const result = await this.runner(this.settings.command, ['--version'], PROBE_TIMEOUT_MS);
      const available = result.exitCode === 0 && !result.timedOut;
      if (available) {
        this.logger.debug({ version: result.stdout.trim() }, 'Diagram renderer available');
      } else {
        this.logger.warn(
          { command: this.settings.command },
          'Diagram renderer not reachable; diagrams will render as code blocks'
        );
      }
      return available;
    } catch (err) {
      this.logger.warn({ err, command: this.settings.command }, 'Diagram renderer probe failed');
      return false;
    }
  }
}

async function fileExists(file: string): Promise<boolean> {
  try {
    const info = await stat(file);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}
