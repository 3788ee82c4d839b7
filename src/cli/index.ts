/**
 * Barrel export for the docforge CLI classes.
 */

export { DocForgeCLI } from './cli.js';
export type { CliDependencies, ServiceFactory } from './cli.js';
export { OutputFormatter, formatBytes } from './formatter.js';
export type { FormatterOptions } from './formatter.js';
export { ProgressReporter } from './progress.js';
