/**
 * docforge Error Handler
 *
 * Converts thrown values to user-facing messages and classifies
 * the failures an export absorbs as warnings.
 */

import {
  DocForgeError,
  DiagramConversionError,
  ImageResolutionError,
  ConfigurationError,
  TemplateError,
} from './docforge-error.js';

export { DocForgeError } from './docforge-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof DiagramConversionError) {
      return `Diagram ${err.diagramId} could not be rendered; its source is shown instead.`;
    }
    if (err instanceof ConfigurationError) {
      return `Configuration problem: ${err.message}. Run \`docforge config validate\` for details.`;
    }
    if (err instanceof TemplateError) {
      return `Template problem: ${err.message}`;
    }
    if (err instanceof DocForgeError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true for failures that an export absorbs as a warning
   * rather than reporting as a failed operation.
   */
  static isRecoverable(err: unknown): boolean {
    return err instanceof DiagramConversionError || err instanceof ImageResolutionError;
  }
}
