/**
 * docforge Configuration
 *
 * Manages the config file at ~/.docforge/config.json.
 * Supports environment variable overrides and dotted-key access for the CLI.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { DiagramSettings } from '../diagrams/types.js';
import type { LogLevel } from '../logging/logger.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const configSchema = z.object({
  paths: z.object({
    outputDir: z.string().min(1, 'outputDir must not be empty'),
    templatesDir: z.string().min(1, 'templatesDir must not be empty'),
    scratchDir: z.string().min(1, 'scratchDir must not be empty'),
  }),
  diagram: z.object({
    enabled: z.boolean(),
    command: z.string().min(1, 'command must not be empty'),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    theme: z.string().min(1),
    background: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    maxConcurrent: z.number().int().min(1).max(16),
  }),
  export: z.object({
    defaultTemplate: z.string().regex(/^[A-Za-z0-9_-]+$/, 'defaultTemplate must be a template name'),
    footerText: z.string(),
    statusRetentionMs: z.number().int().nonnegative(),
    imageSearchPaths: z.array(z.string()),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    pretty: z.boolean(),
  }),
});

export interface DocForgeConfig {
  paths: {
    /** Default: ~/docforge-output */
    outputDir: string;
    /** Default: ~/.docforge/templates */
    templatesDir: string;
    /** Default: <tmpdir>/docforge */
    scratchDir: string;
  };
  diagram: DiagramSettings;
  export: {
    /** Default: whitepaper */
    defaultTemplate: string;
    /** Printed on every page; empty disables the footer */
    footerText: string;
    /** How long a finished operation stays queryable. Default: 300000 */
    statusRetentionMs: number;
    /** Directories searched for relative image paths, in order */
    imageSearchPaths: string[];
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

export type ConfigValue = string | number | boolean | string[];

export interface ValidationReport {
  valid: boolean;
  errors: string[];
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.docforge', 'config.json');
  }

  get filePath(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): DocForgeConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    return this.merge(ConfigManager.defaults(), isRecord(parsed) ? parsed : {});
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: DocForgeConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns the errors; an empty list means valid.
   */
  validate(config: unknown): ValidationReport {
    const result = configSchema.safeParse(config);
    if (result.success) {
      return { valid: true, errors: [] };
    }
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return { valid: false, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   DOCFORGE_OUTPUT_DIR, DOCFORGE_TEMPLATES_DIR, DOCFORGE_SCRATCH_DIR,
   *   DOCFORGE_DIAGRAMS_ENABLED, DOCFORGE_MERMAID_COMMAND, DOCFORGE_DIAGRAM_TIMEOUT_MS,
   *   DOCFORGE_DIAGRAM_MAX_CONCURRENT, DOCFORGE_DEFAULT_TEMPLATE, DOCFORGE_FOOTER_TEXT,
   *   DOCFORGE_IMAGE_PATHS (path-delimiter separated), DOCFORGE_LOG_LEVEL, DOCFORGE_LOG_PRETTY
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): DocForgeConfig {
    const config = this.load();

    // Paths
    if (env.DOCFORGE_OUTPUT_DIR) config.paths.outputDir = env.DOCFORGE_OUTPUT_DIR;
    if (env.DOCFORGE_TEMPLATES_DIR) config.paths.templatesDir = env.DOCFORGE_TEMPLATES_DIR;
    if (env.DOCFORGE_SCRATCH_DIR) config.paths.scratchDir = env.DOCFORGE_SCRATCH_DIR;

    // Diagrams
    if (env.DOCFORGE_DIAGRAMS_ENABLED) {
      config.diagram.enabled = parseBoolean(env.DOCFORGE_DIAGRAMS_ENABLED, 'DOCFORGE_DIAGRAMS_ENABLED');
    }
    if (env.DOCFORGE_MERMAID_COMMAND) config.diagram.command = env.DOCFORGE_MERMAID_COMMAND;
    if (env.DOCFORGE_DIAGRAM_TIMEOUT_MS) {
      config.diagram.timeoutMs = parseInteger(env.DOCFORGE_DIAGRAM_TIMEOUT_MS, 'DOCFORGE_DIAGRAM_TIMEOUT_MS');
    }
    if (env.DOCFORGE_DIAGRAM_MAX_CONCURRENT) {
      config.diagram.maxConcurrent = parseInteger(
        env.DOCFORGE_DIAGRAM_MAX_CONCURRENT,
        'DOCFORGE_DIAGRAM_MAX_CONCURRENT'
      );
    }

    // Export
    if (env.DOCFORGE_DEFAULT_TEMPLATE) config.export.defaultTemplate = env.DOCFORGE_DEFAULT_TEMPLATE;
    if (env.DOCFORGE_FOOTER_TEXT !== undefined) config.export.footerText = env.DOCFORGE_FOOTER_TEXT;
    if (env.DOCFORGE_IMAGE_PATHS) {
      config.export.imageSearchPaths = env.DOCFORGE_IMAGE_PATHS.split(path.delimiter).filter(Boolean);
    }

    // Logging
    if (env.DOCFORGE_LOG_LEVEL) {
      const level = LOG_LEVELS.find((candidate) => candidate === env.DOCFORGE_LOG_LEVEL);
      if (!level) {
        throw new ConfigurationError(`DOCFORGE_LOG_LEVEL must be one of ${LOG_LEVELS.join(' | ')}`, {
          value: env.DOCFORGE_LOG_LEVEL,
        });
      }
      config.logging.level = level;
    }
    if (env.DOCFORGE_LOG_PRETTY) {
      config.logging.pretty = parseBoolean(env.DOCFORGE_LOG_PRETTY, 'DOCFORGE_LOG_PRETTY');
    }

    return config;
  }

  /**
   * Read a value by dotted key, e.g. `diagram.width`.
   */
  get(key: string): ConfigValue | undefined {
    const [section, field] = splitKey(key);
    const values: Record<string, unknown> = { ...this.load()[section] };
    const value = values[field];
    return isConfigValue(value) ? value : undefined;
  }

  /**
   * Set a value by dotted key and persist it. The raw string is coerced to
   * the type of the current value; the result must validate.
   */
  set(key: string, raw: string): DocForgeConfig {
    const [section, field] = splitKey(key);
    const config = this.load();
    const values: Record<string, unknown> = { ...config[section] };

    if (!(field in values)) {
      throw new ConfigurationError(`Unknown config key: ${key}`, { key });
    }

    values[field] = coerce(values[field], raw, key);
    const report = this.validate({ ...config, [section]: values });
    if (!report.valid) {
      throw new ConfigurationError(`Invalid value for ${key}: ${report.errors.join('; ')}`, { key });
    }

    const candidate = this.merge(config, { [section]: values });
    this.save(candidate);
    return candidate;
  }

  /**
   * Overwrite the config file with defaults.
   */
  reset(): DocForgeConfig {
    const config = ConfigManager.defaults();
    this.save(config);
    return config;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): DocForgeConfig {
    const home = os.homedir();
    return {
      paths: {
        outputDir: path.join(home, 'docforge-output'),
        templatesDir: path.join(home, '.docforge', 'templates'),
        scratchDir: path.join(os.tmpdir(), 'docforge'),
      },
      diagram: {
        enabled: true,
        command: 'mmdc',
        width: 800,
        height: 600,
        theme: 'default',
        background: 'white',
        timeoutMs: 30_000,
        maxConcurrent: 2,
      },
      export: {
        defaultTemplate: 'whitepaper',
        footerText: '',
        statusRetentionMs: 300_000,
        imageSearchPaths: ['.'],
      },
      logging: {
        level: 'info',
        pretty: false,
      },
    };
  }

  /** Deep-merge source into target (non-destructive); the result is validated. */
  private merge(target: DocForgeConfig, source: Record<string, unknown>): DocForgeConfig {
    const merged = {
      paths: { ...target.paths, ...sectionOf(source, 'paths') },
      diagram: { ...target.diagram, ...sectionOf(source, 'diagram') },
      export: { ...target.export, ...sectionOf(source, 'export') },
      logging: { ...target.logging, ...sectionOf(source, 'logging') },
    };
    const result = configSchema.safeParse(merged);
    if (!result.success) {
      const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid config at ${this.configPath}: ${errors.join('; ')}`, {
        path: this.configPath,
      });
    }
    return result.data;
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

type SectionName = keyof DocForgeConfig;

const SECTIONS: readonly SectionName[] = ['paths', 'diagram', 'export', 'logging'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(source: Record<string, unknown>, name: SectionName): Record<string, unknown> {
  const section = source[name];
  return isRecord(section) ? section : {};
}

function splitKey(key: string): [SectionName, string] {
  const [head, field, ...rest] = key.split('.');
  const section = SECTIONS.find((name) => name === head);
  if (!section || !field || rest.length > 0) {
    throw new ConfigurationError(`Unknown config key: ${key}`, { key });
  }
  return [section, field];
}

function isConfigValue(value: unknown): value is ConfigValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}

function coerce(current: unknown, raw: string, key: string): ConfigValue {
  if (typeof current === 'number') return parseInteger(raw, key);
  if (typeof current === 'boolean') return parseBoolean(raw, key);
  if (Array.isArray(current)) {
    return raw
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return raw;
}

function parseInteger(raw: string, name: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got: ${raw}`, { value: raw });
  }
  return value;
}

function parseBoolean(raw: string, name: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be true or false, got: ${raw}`, { value: raw });
}
