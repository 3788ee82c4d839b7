import type { DiagramConverter } from './types.js';

/**
 * Converter used when diagram rendering is disabled. Diagrams then fall
 * back to code blocks in every output format.
 */
export class NullDiagramRenderer implements DiagramConverter {
  readonly name = 'none';

  async isAvailable(): Promise<boolean> {
    return false;
  }

  async render(): Promise<string | null> {
    return null;
  }

  async renderToDataUri(): Promise<string | null> {
    return null;
  }

  async cleanup(): Promise<void> {
    // Nothing is ever produced
  }
}
