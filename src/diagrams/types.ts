/**
 * Diagram rendering contracts.
 */

export interface DiagramRenderOptions {
  width?: number;
  height?: number;
  theme?: string;
  background?: string;
}

/**
 * Renders diagram source to a PNG file. A failed render is not an error:
 * every method resolves, and `null` means "no image produced".
 */
export interface DiagramConverter {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  /** Path of the produced PNG, or null */
  render(source: string, id: string, options?: DiagramRenderOptions): Promise<string | null>;
  /** Same render, returned as a `data:image/png;base64,` URI; the PNG is deleted */
  renderToDataUri(source: string, id: string, options?: DiagramRenderOptions): Promise<string | null>;
  /** Remove previously produced files */
  cleanup(paths: Iterable<string>): Promise<void>;
}

/** Static diagram settings, part of the application config */
export interface DiagramSettings {
  enabled: boolean;
  /** Renderer executable (default: mmdc) */
  command: string;
  width: number;
  height: number;
  theme: string;
  background: string;
  timeoutMs: number;
  /** Renderer processes allowed at once across all exports */
  maxConcurrent: number;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => Promise<ProcessResult>;
