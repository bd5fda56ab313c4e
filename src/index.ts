#!/usr/bin/env node

import { CliOptions, USAGE, parseCliArgs } from './cli.js';
import { config } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { loadSelectorOverrides } from './scraper/selector-overrides.js';
import { JobResult, runMapsJob } from './jobs/maps-job.js';
import { runDirectoryJob } from './jobs/directory-job.js';

/**
 * Run the job selected on the command line
 */
async function runHarvest(options: CliOptions): Promise<JobResult> {
  const overrides = await loadSelectorOverrides(config.selectorsFile);

  if (options.source === 'maps') {
    return runMapsJob({
      input: options.url ?? options.query,
      maxResults: options.maxResults,
      overrides,
    });
  }

  return runDirectoryJob({
    strategy: options.strategy,
    search: options.search,
    pages: options.pages,
    maxResults: options.maxResults,
    url: options.url,
    enrich: options.enrich,
    overrides,
  });
}

// Run if called directly
// Check if this is the main module (works with both node and tsx)
const isMainModule = process.argv[1]?.includes('index.ts') || process.argv[1]?.includes('index.js');

if (isMainModule) {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    process.exit(0);
  }

  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    logger.error('Invalid arguments', { error: errorMessage(error) });
    console.error(USAGE);
    process.exit(1);
  }

  runHarvest(options)
    .then(({ stats, outputFile }) => {
      const duration = (stats.durationMs / 1000).toFixed(1);
      logger.info('Job completed successfully', {
        source: stats.source,
        records: stats.recordsKept,
        duplicates: stats.duplicatesSkipped,
        failed: stats.itemsFailed,
        duration: `${duration}s`,
        outputFile,
      });
      process.exit(0);
    })
    .catch(error => {
      logger.error('Job failed', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exit(1);
    });
}

export { runHarvest };
