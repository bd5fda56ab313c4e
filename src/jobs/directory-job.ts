/**
 * Medical directory job
 * Four interchangeable strategies share the same records, sink and
 * pipeline; they differ in how listings and profiles are fetched.
 */

import * as path from 'path';
import { DirectorySearch, DirectoryStrategy, HarvestOptions } from '../types/index.js';
import { config } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { StrategyAttempt } from '../utils/strategy.js';
import { CsvSink } from '../output/csv-sink.js';
import { HttpClient } from '../scraper/http-client.js';
import { Navigator } from '../scraper/navigator.js';
import { puppeteerClient } from '../scraper/puppeteer-client.js';
import { scraperOrchestrator } from '../scraper/scraper-orchestrator.js';
import { SelectorOverrides, applyFieldOverrides } from '../scraper/selector-overrides.js';
import { BrowserDocumentFetcher, DocumentFetcher, HttpDocumentFetcher } from '../scraper/directory/document-fetchers.js';
import { ProfileScraper } from '../scraper/directory/profile-scraper.js';
import { ResultsPageReader } from '../scraper/directory/results-page.js';
import { ApiListingSource, ProfileLinkSource } from '../scraper/directory/directory-sources.js';
import { ApiReplayProvider, createCaptureWithReplay, pageCaptureTarget } from '../scraper/directory/listing-providers.js';
import { buildResultsUrl } from '../scraper/directory/directory-api.js';
import {
  DIRECTORY_ORIGIN,
  DirectoryField,
  DirectoryPageSelectors,
  directoryFieldSpecs,
  directoryPageSelectors,
  directorySchema,
} from '../scraper/directory/directory-selectors.js';
import type { JobResult } from './maps-job.js';

export interface DirectoryJobOptions {
  strategy: DirectoryStrategy;
  search: DirectorySearch;
  pages: number;
  maxResults: number;
  /** Seed results URL for the browser / http strategies; the others replay `search` */
  url?: string;
  /** Visit profiles in the api strategy */
  enrich: boolean;
  overrides?: SelectorOverrides;
}

/**
 * "lat,lng" as numbers
 */
export function parsePoint(point: string): { latitude: number; longitude: number } {
  const parts = point.split(',').map(part => part.trim());
  const latitude = Number(parts[0]);
  const longitude = Number(parts[1]);

  if (
    parts.length !== 2 ||
    !parts[0] ||
    !parts[1] ||
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    throw new ConfigError(`Search point must be "lat,lng", got "${point}"`);
  }

  return { latitude, longitude };
}

export function directoryOutputFile(strategy: DirectoryStrategy): string {
  return path.join(config.output.dir, `directory_results_${strategy}.csv`);
}

function consentAttempts(navigator: Navigator, selectors: DirectoryPageSelectors): StrategyAttempt[] {
  return [navigator.clickAttempt(selectors.consentButton), navigator.buttonTextAttempt(selectors.consentLabels)];
}

export async function runDirectoryJob(options: DirectoryJobOptions): Promise<JobResult> {
  const overrides = options.overrides?.directory;
  const specs = applyFieldOverrides(directoryFieldSpecs, directorySchema.fields, overrides?.fields);
  const selectors: DirectoryPageSelectors = {
    ...directoryPageSelectors,
    profileLinks: overrides?.profileLinks ?? directoryPageSelectors.profileLinks,
  };

  const sink = new CsvSink<DirectoryField>(directorySchema, directoryOutputFile(options.strategy));
  const http = new HttpClient({ timeoutMs: config.scrape.httpTimeoutMs });
  const harvest: HarvestOptions = {
    pages: options.pages,
    maxResults: options.maxResults,
    retryLimit: config.scrape.retryLimit,
    retryDelayMs: config.scrape.retryDelayMs,
  };

  logger.info('Directory job started', { strategy: options.strategy, ...options.search });

  try {
    switch (options.strategy) {
      case 'http': {
        const fetcher = new HttpDocumentFetcher(http);
        const source = new ProfileLinkSource(
          'directory-http',
          options.url ?? buildResultsUrl(options.search, 1),
          new ResultsPageReader(fetcher, selectors),
          new ProfileScraper(fetcher, specs, selectors)
        );
        const stats = await scraperOrchestrator.run(source, sink, { ...harvest, itemDelayMs: 1000, pageDelayMs: 2000 });
        return { stats, outputFile: await sink.flush() };
      }

      case 'browser': {
        const navigator = new Navigator(await puppeteerClient.newPage(), config.scrape.waitTimeoutMs);
        const fetcher = new BrowserDocumentFetcher(navigator, puppeteerClient);
        const source = new ProfileLinkSource(
          'directory-browser',
          options.url ?? buildResultsUrl(options.search, 1),
          new ResultsPageReader(fetcher, selectors),
          new ProfileScraper(fetcher, specs, selectors)
        );
        const stats = await scraperOrchestrator.run(source, sink, { ...harvest, itemDelayMs: 1000, pageDelayMs: 2000 });
        return { stats, outputFile: await sink.flush() };
      }

      case 'capture': {
        const { latitude, longitude } = parsePoint(options.search.point);
        const page = await puppeteerClient.newPage({
          geolocation: { origin: DIRECTORY_ORIGIN, latitude, longitude },
        });
        const navigator = new Navigator(page, config.scrape.waitTimeoutMs);
        const target = pageCaptureTarget(navigator, () =>
          navigator.dismissInterstitial(consentAttempts(navigator, selectors))
        );
        const source = new ApiListingSource(
          'directory-capture',
          createCaptureWithReplay(target, http, options.search, { waitMs: 8000, nudgeWaitMs: 2000 }),
          new ProfileScraper(new BrowserDocumentFetcher(navigator, puppeteerClient), specs, selectors)
        );
        const stats = await scraperOrchestrator.run(source, sink, { ...harvest, itemDelayMs: 600 });
        return { stats, outputFile: await sink.flush() };
      }

      case 'api': {
        parsePoint(options.search.point);
        const provider = new ApiReplayProvider(http, {
          search: options.search,
          attempts: 3,
          retryDelayMs: 500,
        });
        const fetcher: DocumentFetcher = new HttpDocumentFetcher(http);
        const source = new ApiListingSource(
          'directory-api',
          provider,
          options.enrich ? new ProfileScraper(fetcher, specs, selectors) : null
        );
        const stats = await scraperOrchestrator.run(source, sink, { ...harvest, pageDelayMs: 800 });
        return { stats, outputFile: await sink.flush() };
      }
    }
  } finally {
    await puppeteerClient.close();
  }
}
