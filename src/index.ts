#!/usr/bin/env node
import 'dotenv/config';
import { USAGE, VERSION, loadConfig, type CliCommand } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { runTriage } from './run.js';
import type { CrawlReport } from './types.js';

const EXIT_UNREACHABLE = 1;
const EXIT_USAGE = 2;

function printSummary(report: CrawlReport, csvPath: string, jsonPath: string) {
  const { totals } = report;
  console.log('\nDone.');
  console.log(`Pages visited: ${report.pagesVisited}${report.pageLimitReached ? ' (page limit reached)' : ''}`);
  console.log(`PDFs found: ${totals.pdfs}`);
  console.log(`Text-based (fonts found): ${totals.byVerdict.has_text}`);
  console.log(`Image-only (no fonts): ${totals.byVerdict.image_only}`);
  console.log(`Unknown/failed: ${totals.byVerdict.unknown}`);
  console.log(`\nReports:\n  ${csvPath}\n  ${jsonPath}`);
  if (report.options.dryRun) {
    console.log('\nDry-run complete (no PDFs downloaded).');
  }
}

async function main() {
  let command: CliCommand;
  try {
    command = loadConfig(process.argv.slice(2));
  } catch (err) {
    console.error(`error: ${errorMessage(err)}\n`);
    console.error(USAGE);
    process.exit(EXIT_USAGE);
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }
  if (command.kind === 'version') {
    console.log(`pdf-a11y-triage ${VERSION}`);
    return;
  }

  try {
    const { report, csvPath, jsonPath } = await runTriage(command.config);
    printSummary(report, csvPath, jsonPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[crawl] aborted: ${err.message}`);
      process.exit(EXIT_UNREACHABLE);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
