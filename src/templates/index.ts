export { TemplateRegistry } from './template-registry.js';
export type { TemplateRegistryOptions } from './template-registry.js';
export { BUILTIN_TEMPLATES, isBuiltinTemplate } from './builtin-templates.js';
export { headingKey, headingSizes, resolveStyle } from './styles.js';
export { templateConfigSchema, templateNameSchema } from './schema.js';
export type {
  OutputFormat,
  PageSetup,
  ResolvedTextStyle,
  StyleKey,
  TemplateCategory,
  TemplateConfig,
  TemplateSummary,
  TextStyle,
} from './types.js';
