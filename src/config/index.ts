export { ConfigManager, configSchema } from './config.js';
export type { ConfigValue, DocForgeConfig, ValidationReport } from './config.js';
