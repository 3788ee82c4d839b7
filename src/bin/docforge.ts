#!/usr/bin/env node
/**
 * docforge CLI entry point
 *
 * Compiled to dist/bin/docforge.js by TypeScript.
 * Registered as the `docforge` binary in package.json.
 */

import 'dotenv/config';
import { DocForgeCLI } from '../cli/cli.js';

const cli = new DocForgeCLI();
cli.run(process.argv).catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
