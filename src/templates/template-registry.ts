/**
 * Template Registry
 *
 * Built-in presets plus custom templates persisted one record per name
 * as `<templatesDir>/<name>.json`. Lookups check the built-ins first.
 * Every persisted record is validated on the way in and on the way out.
 */

import { mkdir, readdir, readFile, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { TemplateError } from '../errors/docforge-error.js';
import { moduleLogger } from '../logging/logger.js';
import { BUILTIN_TEMPLATES, isBuiltinTemplate } from './builtin-templates.js';
import { templateConfigSchema, templateNameSchema } from './schema.js';
import type { TemplateConfig, TemplateSummary } from './types.js';

const RECORD_EXTENSION = '.json';

export interface TemplateRegistryOptions {
  templatesDir: string;
  logger?: Logger;
}

export class TemplateRegistry {
  private readonly templatesDir: string;
  private readonly logger: Logger;

  constructor(options: TemplateRegistryOptions) {
    this.templatesDir = options.templatesDir;
    this.logger = moduleLogger('templates', options.logger);
  }

  isBuiltin(name: string): boolean {
    return isBuiltinTemplate(name);
  }

  async get(name: string): Promise<TemplateConfig | undefined> {
    if (isBuiltinTemplate(name)) {
      return structuredClone(BUILTIN_TEMPLATES[name]);
    }
    if (!templateNameSchema.safeParse(name).success) {
      return undefined;
    }

    try {
      const raw = await this.readRecord(this.recordPath(name));
      if (raw === undefined) return undefined;
      return this.validate(raw, name);
    } catch (err) {
      this.logger.error({ err, template: name }, 'Invalid custom template');
      return undefined;
    }
  }

  async list(): Promise<TemplateSummary[]> {
    const summaries: TemplateSummary[] = Object.entries(BUILTIN_TEMPLATES).map(
      ([name, template]) => ({
        name,
        displayName: template.name,
        description: template.description,
        category: template.category,
        type: 'builtin',
      })
    );

    for (const file of await this.recordFiles()) {
      const name = path.basename(file, RECORD_EXTENSION);
      try {
        const raw = await this.readRecord(path.join(this.templatesDir, file));
        if (raw === undefined) continue;
        const template = this.validate(raw, name);
        summaries.push({
          name,
          displayName: template.name,
          description: template.description,
          category: template.category,
          type: 'custom',
        });
      } catch (err) {
        this.logger.error({ err, file }, 'Skipping unreadable template file');
      }
    }

    return summaries;
  }

  /**
   * Persist a custom template. Overwrites an existing record of the same
   * name; refuses built-in names.
   */
  async create(name: string, config: unknown): Promise<boolean> {
    if (isBuiltinTemplate(name)) {
      this.logger.warn({ template: name }, 'Cannot overwrite a built-in template');
      return false;
    }

    const nameCheck = templateNameSchema.safeParse(name);
    if (!nameCheck.success) {
      this.logger.warn({ template: name, issues: nameCheck.error.issues }, 'Invalid template name');
      return false;
    }

    const parsed = templateConfigSchema.safeParse(config);
    if (!parsed.success) {
      this.logger.warn({ template: name, issues: parsed.error.issues }, 'Invalid template config');
      return false;
    }

    try {
      await mkdir(this.templatesDir, { recursive: true });
      await writeFile(this.recordPath(name), JSON.stringify(parsed.data, null, 2), 'utf8');
      this.logger.info({ template: name }, 'Created custom template');
      return true;
    } catch (err) {
      this.logger.error({ err, template: name }, 'Failed to write template');
      return false;
    }
  }

  async delete(name: string): Promise<boolean> {
    if (isBuiltinTemplate(name) || !templateNameSchema.safeParse(name).success) {
      return false;
    }

    try {
      await unlink(this.recordPath(name));
      this.logger.info({ template: name }, 'Deleted custom template');
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.warn({ template: name }, 'Template not found');
      } else {
        this.logger.error({ err, template: name }, 'Failed to delete template');
      }
      return false;
    }
  }

  private recordPath(name: string): string {
    return path.join(this.templatesDir, `${name}${RECORD_EXTENSION}`);
  }

  private async recordFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.templatesDir);
      return entries.filter((entry) => entry.endsWith(RECORD_EXTENSION)).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  /** Parsed JSON of a record, or undefined when the file does not exist. */
  private async readRecord(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    return JSON.parse(text);
  }

  private validate(raw: unknown, name: string): TemplateConfig {
    const parsed = templateConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TemplateError(`Template "${name}" failed validation`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
