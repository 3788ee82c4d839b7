/**
 * Basic Usage Example
 *
 * Loads the docforge config (with DOCFORGE_* overrides from .env),
 * exports a small document to PDF and Word, and prints the results.
 */

import dotenv from 'dotenv';
import { ConfigManager, ExportService } from '../src/index.js';

dotenv.config();

const MARKDOWN = `# Quarterly Review

Revenue grew **12%** over the quarter.

| Region | Growth |
|--------|--------|
| North  | 9%     |
| South  | 15%    |

\`\`\`mermaid
graph LR; Plan-->Build-->Ship
\`\`\`
`;

async function main() {
  // 1. Load configuration
  const config = new ConfigManager().loadWithEnvOverrides();

  // 2. Create the export service
  const service = new ExportService(config);

  // 3. Export both formats, printing stage changes
  let lastStage = '';
  const result = await service.exportToBoth(MARKDOWN, {
    outputName: 'quarterly-review',
    templateName: 'business_report',
    onProgress: (status) => {
      if (status.currentStage !== lastStage) {
        lastStage = status.currentStage;
        console.log(`${status.progressPercentage.toFixed(0).padStart(3)}% ${status.currentStage}`);
      }
    },
  });

  // 4. Report
  if (result.success) {
    console.log(`PDF:  ${result.pdfResult?.outputPath}`);
    console.log(`Word: ${result.wordResult?.outputPath}`);
  } else {
    console.error(`Export failed: ${result.error}`);
  }

  service.dispose();
}

main().catch(console.error);
