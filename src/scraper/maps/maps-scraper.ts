/**
 * Map search scraper
 * Loads a search, scrolls the results feed until nothing new arrives, then
 * opens each listing's place panel and extracts it.
 */

import type { ElementHandle } from 'puppeteer-core';
import { ExtractedRecord, FieldSpecs, HarvestSource, RecordSchema } from '../../types/index.js';
import { FieldExtractor } from '../extractor.js';
import { PageSource } from '../extraction-sources.js';
import { Navigator, scrollUntilStable } from '../navigator.js';
import { randomBetween, sleep } from '../../utils/retry.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  MapsField,
  MapsPageSelectors,
  mapsFieldSpecs,
  mapsPageSelectors,
  mapsSchema,
} from './maps-selectors.js';

export const MAPS_SEARCH_BASE = 'https://www.google.com/maps/search/';

export type MapsItem = { kind: 'place' } | { kind: 'listing'; index: number };

export interface MapsScrapeOptions {
  /** Passes over the listing selectors before giving up */
  listingAttempts: number;
  listingRetryDelayMs: number;
  scrollPauseMs: number;
  maxScrolls: number;
}

/**
 * A URL is used as is; a free-text query becomes a search URL
 */
export function buildMapsSearchUrl(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return MAPS_SEARCH_BASE + encodeURIComponent(trimmed).replace(/%20/g, '+');
}

export function isPlaceUrl(url: string): boolean {
  return url.includes('/place/');
}

export class MapsListingSource implements HarvestSource<MapsItem, MapsField> {
  readonly name = 'maps';
  readonly schema: RecordSchema<MapsField> = mapsSchema;
  private readonly extractor: FieldExtractor<MapsField>;
  private listings: Array<ElementHandle<Element>> = [];

  constructor(
    private readonly navigator: Navigator,
    private readonly searchUrl: string,
    private readonly options: MapsScrapeOptions,
    specs: FieldSpecs<MapsField> = mapsFieldSpecs,
    private readonly selectors: MapsPageSelectors = mapsPageSelectors
  ) {
    this.extractor = new FieldExtractor(mapsSchema, specs);
  }

  /**
   * The feed is one infinite list, so everything arrives on page 1
   */
  async listItems(pageNumber: number): Promise<MapsItem[]> {
    if (pageNumber > 1) {
      return [];
    }

    logger.info('Loading map search', { url: this.searchUrl });
    await this.navigator.load(this.searchUrl);
    await this.navigator.dismissInterstitial([
      this.navigator.buttonTextAttempt(this.selectors.consentLabels, this.selectors.consentFrameUrlPart),
      this.navigator.buttonTextAttempt(this.selectors.consentLabels),
    ]);

    if (isPlaceUrl(this.navigator.page.url())) {
      logger.info('Search resolved to a single place');
      return [{ kind: 'place' }];
    }

    await this.navigator.waitFor(this.selectors.resultsReady);
    await this.scrollFeed(this.options.maxScrolls);

    this.listings = await this.findListings(this.options.listingAttempts);
    return this.listings.map((_, index): MapsItem => ({ kind: 'listing', index }));
  }

  async visit(item: MapsItem, attempt: number): Promise<ExtractedRecord<MapsField>> {
    if (item.kind === 'listing') {
      if (attempt > 1) {
        // The feed may have re-rendered since the handles were taken
        this.listings = await this.findListings(1);
      }
      const listing = this.listings[item.index];
      if (!listing) {
        throw new Error(`Listing ${item.index + 1} is no longer in the feed`);
      }
      await this.clickListing(listing);
      await sleep(randomBetween(800, 1600));
    }

    await this.navigator.waitFor(this.selectors.placePanelTitle);
    return this.extractor.extract(new PageSource(this.navigator.page));
  }

  describe(item: MapsItem): string {
    return item.kind === 'place' ? 'place panel' : `listing ${item.index + 1}`;
  }

  private async scrollFeed(maxScrolls: number): Promise<void> {
    const { target, container } = await this.navigator.scrollTarget(this.selectors.feed);
    if (!container) {
      logger.info('Results feed not found, scrolling the window instead');
    }

    await scrollUntilStable(target, {
      // Window height is a coarser signal than the feed offset
      requiredStable: container ? 3 : 1,
      maxIterations: maxScrolls,
      pauseMs: this.options.scrollPauseMs,
    });
  }

  /**
   * Visible listing cards from the first selector that yields any,
   * scrolling for more between passes
   */
  private async findListings(attempts: number): Promise<Array<ElementHandle<Element>>> {
    const page = this.navigator.page;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      for (const selector of this.selectors.listings) {
        try {
          const elements = await page.$$(selector);
          const visible: Array<ElementHandle<Element>> = [];
          for (const element of elements) {
            if (await element.isVisible()) {
              visible.push(element);
            }
          }
          if (visible.length > 0) {
            logger.info('Found listings', { count: visible.length, selector });
            return visible;
          }
        } catch (error) {
          logger.warn('Listing selector failed', { selector, error: errorMessage(error) });
        }
      }

      if (attempt < attempts) {
        logger.info('No listings found yet', { attempt, attempts });
        await sleep(this.options.listingRetryDelayMs);
        await this.scrollFeed(5);
      }
    }

    return [];
  }

  private async clickListing(listing: ElementHandle<Element>): Promise<void> {
    const link = await listing.$(this.selectors.listingLink);
    const target = link ?? listing;

    await target.evaluate(element => element.scrollIntoView({ block: 'center' }));
    await sleep(randomBetween(200, 600));
    await target.evaluate(element => {
      if (element instanceof HTMLElement) {
        element.click();
      }
    });
  }
}
