/**
 * Map search job
 * One search, one browser page, one timestamped CSV file.
 */

import * as path from 'path';
import { HarvestStats } from '../types/index.js';
import { config } from '../utils/config.js';
import { CsvSink, formatRunTimestamp } from '../output/csv-sink.js';
import { Navigator } from '../scraper/navigator.js';
import { puppeteerClient } from '../scraper/puppeteer-client.js';
import { scraperOrchestrator } from '../scraper/scraper-orchestrator.js';
import { SelectorOverrides, applyFieldOverrides } from '../scraper/selector-overrides.js';
import { MapsListingSource, buildMapsSearchUrl } from '../scraper/maps/maps-scraper.js';
import { mapsFieldSpecs, mapsPageSelectors, mapsSchema } from '../scraper/maps/maps-selectors.js';

export interface JobResult {
  stats: HarvestStats;
  /** null when nothing was collected */
  outputFile: string | null;
}

export interface MapsJobOptions {
  /** Free-text query or a search / place URL */
  input: string;
  maxResults: number;
  overrides?: SelectorOverrides;
}

export async function runMapsJob(options: MapsJobOptions): Promise<JobResult> {
  const searchUrl = buildMapsSearchUrl(options.input);
  const overrides = options.overrides?.maps;

  const specs = applyFieldOverrides(mapsFieldSpecs, mapsSchema.fields, overrides?.fields);
  const selectors = { ...mapsPageSelectors, listings: overrides?.listings ?? mapsPageSelectors.listings };

  const sink = new CsvSink(
    mapsSchema,
    path.join(config.output.dir, `maps_results_${formatRunTimestamp(new Date())}.csv`)
  );

  try {
    const page = await puppeteerClient.newPage();
    const navigator = new Navigator(page, config.scrape.waitTimeoutMs);

    const source = new MapsListingSource(
      navigator,
      searchUrl,
      {
        listingAttempts: config.scrape.retryLimit,
        listingRetryDelayMs: config.scrape.retryDelayMs,
        scrollPauseMs: config.scrape.scrollPauseMs,
        maxScrolls: config.scrape.maxScrolls,
      },
      specs,
      selectors
    );

    const stats = await scraperOrchestrator.run(source, sink, {
      pages: 1,
      maxResults: options.maxResults,
      retryLimit: config.scrape.retryLimit,
      retryDelayMs: config.scrape.retryDelayMs,
    });

    return { stats, outputFile: await sink.flush() };
  } finally {
    await puppeteerClient.close();
  }
}
