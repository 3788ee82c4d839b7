export { MermaidCliRenderer } from './mermaid-cli-renderer.js';
export type { MermaidCliOptions } from './mermaid-cli-renderer.js';
export { NullDiagramRenderer } from './null-diagram-renderer.js';
export { createDiagramConverter } from './factory.js';
export { spawnProcess } from './process-runner.js';
export type {
  DiagramConverter,
  DiagramRenderOptions,
  DiagramSettings,
  ProcessResult,
  ProcessRunner,
} from './types.js';
