import type { Logger } from 'pino';
import { MermaidCliRenderer } from './mermaid-cli-renderer.js';
import { NullDiagramRenderer } from './null-diagram-renderer.js';
import type { DiagramConverter, DiagramSettings, ProcessRunner } from './types.js';

/**
 * Pick the converter strategy from static settings.
 */
export function createDiagramConverter(
  settings: DiagramSettings,
  scratchDir: string,
  logger?: Logger,
  runner?: ProcessRunner
): DiagramConverter {
  if (!settings.enabled) {
    return new NullDiagramRenderer();
  }
  return new MermaidCliRenderer({ settings, scratchDir, logger, runner });
}
