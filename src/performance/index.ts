/**
 * Performance utilities
 */

export { ParallelProcessor } from './parallel-processor.js';
export type { ProcessorOptions, ProcessorResult } from './parallel-processor.js';
