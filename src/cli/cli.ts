/**
 * docforge CLI
 *
 * Commands:
 *   docforge export <file> [--format pdf|word|both] [--template name] [--output name] [--out-dir dir]
 *   docforge templates list | show <name> | create <name> <file> | delete <name>
 *   docforge config get [key] | set <key> <value> | validate | reset
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Command, Option } from 'commander';
import type { Logger } from 'pino';
import { ConfigManager, type DocForgeConfig } from '../config/config.js';
import { NotFoundError } from '../errors/docforge-error.js';
import { ExportService } from '../export/export-service.js';
import type { ExportFormat } from '../export/types.js';
import { createLogger } from '../logging/logger.js';
import { TemplateRegistry } from '../templates/template-registry.js';
import { OutputFormatter } from './formatter.js';
import { ProgressReporter } from './progress.js';

export type ServiceFactory = (config: DocForgeConfig, logger: Logger) => ExportService;

export interface CliDependencies {
  configManager?: ConfigManager;
  formatter?: OutputFormatter;
  reporter?: ProgressReporter;
  createService?: ServiceFactory;
}

interface ExportCommandOptions {
  format: ExportFormat;
  template?: string;
  output?: string;
  outDir?: string;
}

export class DocForgeCLI {
  private readonly program: Command;
  private readonly configManager: ConfigManager;
  private readonly formatter: OutputFormatter;
  private readonly reporter: ProgressReporter;
  private readonly createService: ServiceFactory;

  constructor(deps: CliDependencies = {}) {
    this.configManager = deps.configManager ?? new ConfigManager();
    this.formatter = deps.formatter ?? new OutputFormatter();
    this.reporter = deps.reporter ?? new ProgressReporter();
    this.createService = deps.createService ?? ((config, logger) => new ExportService(config, { logger }));
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('docforge')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Export markdown to PDF and Word with rendered diagrams');

    // ── export ─────────────────────────────────────────────────────────────
    program
      .command('export <file>')
      .description('Export a markdown file')
      .addOption(
        new Option('-f, --format <format>', 'Output format').choices(['pdf', 'word', 'both']).default('pdf')
      )
      .option('-t, --template <name>', 'Template name (default: export.defaultTemplate)')
      .option('-o, --output <name>', 'Output base name, without extension (default: input file name)')
      .option('-d, --out-dir <dir>', 'Output directory (default: paths.outputDir)')
      .action(async (file: string, opts: ExportCommandOptions) => {
        await this.exportFile(file, opts);
      });

    // ── templates ──────────────────────────────────────────────────────────
    const templates = program.command('templates').description('Manage document templates');

    templates
      .command('list')
      .description('List built-in and custom templates')
      .action(async () => {
        await this.withTemplates(async (registry) => {
          console.log(this.formatter.formatTemplateList(await registry.list()));
        });
      });

    templates
      .command('show <name>')
      .description('Print a template as JSON')
      .action(async (name: string) => {
        await this.withTemplates(async (registry) => {
          const template = await registry.get(name);
          if (!template) {
            throw new NotFoundError(`Template not found: ${name}`, { template: name });
          }
          console.log(this.formatter.formatTemplate(name, template));
        });
      });

    templates
      .command('create <name> <file>')
      .description('Create or replace a custom template from a JSON file')
      .action(async (name: string, file: string) => {
        await this.withTemplates(async (registry) => {
          const record: unknown = JSON.parse(await readFile(file, 'utf-8'));
          if (await registry.create(name, record)) {
            this.reporter.completeTask(`Template ${name} saved`);
          } else {
            this.reporter.failTask(`Template ${name}`, new Error('rejected; check the name and the template fields'));
            process.exitCode = 1;
          }
        });
      });

    templates
      .command('delete <name>')
      .description('Delete a custom template')
      .action(async (name: string) => {
        await this.withTemplates(async (registry) => {
          if (await registry.delete(name)) {
            this.reporter.completeTask(`Template ${name} deleted`);
          } else {
            this.reporter.failTask(`Template ${name}`, new Error('not found or built-in'));
            process.exitCode = 1;
          }
        });
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Manage docforge configuration');

    config
      .command('get [key]')
      .description('Show full config or a specific key')
      .action((key?: string) => {
        this.guard(() => {
          if (key) {
            console.log(this.formatter.formatConfigValue(key, this.configManager.get(key)));
          } else {
            console.log(JSON.stringify(this.configManager.loadWithEnvOverrides(), null, 2));
          }
        });
      });

    config
      .command('set <key> <value>')
      .description('Set a configuration key')
      .action((key: string, value: string) => {
        this.guard(() => {
          this.configManager.set(key, value);
          this.reporter.completeTask(`Set ${key} = ${value}`);
        });
      });

    config
      .command('validate')
      .description('Validate the current configuration')
      .action(() => {
        this.guard(() => {
          const report = this.configManager.validate(this.configManager.loadWithEnvOverrides());
          const text = this.formatter.formatValidation(report);
          if (report.valid) {
            console.log(text);
          } else {
            console.error(text);
            process.exitCode = 1;
          }
        });
      });

    config
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        this.guard(() => {
          this.configManager.reset();
          this.reporter.completeTask('Configuration reset to defaults');
        });
      });

    return program;
  }

  // ─── Command bodies ───────────────────────────────────────────────────────

  private async exportFile(file: string, opts: ExportCommandOptions): Promise<void> {
    await this.withService(async (service) => {
      const markdown = await readFile(file, 'utf-8');
      const options = {
        outputName: opts.output ?? path.basename(file, path.extname(file)),
        outputDir: opts.outDir,
        templateName: opts.template,
        onProgress: this.reporter.track(),
      };

      if (opts.format === 'both') {
        const result = await service.export(markdown, 'both', options);
        console.log(this.formatter.formatDualResult(result));
        if (!result.success) process.exitCode = 1;
      } else {
        const result = await service.export(markdown, opts.format, options);
        console.log(this.formatter.formatExportResult(result));
        if (!result.success) process.exitCode = 1;
      }
    });
  }

  /** Build a service from the current config, run `fn`, always dispose. */
  private async withService(fn: (service: ExportService) => Promise<void>): Promise<void> {
    let service: ExportService | undefined;
    try {
      const config = this.configManager.loadWithEnvOverrides();
      service = this.createService(config, createLogger({ ...config.logging, stderr: true }));
      await fn(service);
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    } finally {
      service?.dispose();
    }
  }

  /** Run `fn` against the registry under `paths.templatesDir`. */
  private async withTemplates(fn: (registry: TemplateRegistry) => Promise<void>): Promise<void> {
    try {
      const config = this.configManager.loadWithEnvOverrides();
      const logger = createLogger({ ...config.logging, stderr: true });
      await fn(new TemplateRegistry({ templatesDir: config.paths.templatesDir, logger }));
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }

  private guard(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }
}
