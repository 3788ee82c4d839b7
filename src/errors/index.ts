/**
 * docforge Errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  DocForgeError,
  DiagramConversionError,
  ImageResolutionError,
  RenderError,
  ExportError,
  TemplateError,
  ConfigurationError,
  NotFoundError,
} from './docforge-error.js';

export { ErrorHandler } from './error-handler.js';
