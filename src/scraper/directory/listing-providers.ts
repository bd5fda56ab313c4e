/**
 * Interchangeable sources of the directory's structured results.
 *
 * The results page is a single-page app that fetches its listing as JSON.
 * Reading that response off the wire is preferred; replaying the request
 * directly is the fallback.
 */

import type { Page } from 'puppeteer-core';
import { DirectorySearch } from '../../types/index.js';
import { HttpClient } from '../http-client.js';
import { Navigator } from '../navigator.js';
import { withRetry, sleep } from '../../utils/retry.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  DirectoryApiItem,
  buildApiHeaders,
  buildApiParams,
  buildResultsUrl,
  parseDirectoryItems,
} from './directory-api.js';
import { DIRECTORY_API_PATTERN, DIRECTORY_API_URL } from './directory-selectors.js';

export interface ListingProvider<TItem> {
  readonly name: string;
  fetchListing(pageNumber: number): Promise<TItem[]>;
}

// Response capture

/** The parts of a network response the capture needs */
export interface CapturedResponse {
  url(): string;
  status(): number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface CaptureTarget {
  /** Register a response listener; returns its removal */
  listen(handler: (response: CapturedResponse) => Promise<void>): () => void;
  open(url: string): Promise<void>;
  /** Poke the page into loading lazily fetched data */
  nudge(): Promise<void>;
}

export interface ResponseCaptureOptions {
  urlPattern: string;
  pageUrl: (pageNumber: number) => string;
  /** Bounded wait for the app to fire its request */
  waitMs: number;
  /** Extra wait after the nudge when nothing was captured */
  nudgeWaitMs: number;
}

export class ResponseCaptureProvider implements ListingProvider<DirectoryApiItem> {
  readonly name = 'response-capture';

  constructor(
    private readonly target: CaptureTarget,
    private readonly options: ResponseCaptureOptions
  ) {}

  async fetchListing(pageNumber: number): Promise<DirectoryApiItem[]> {
    const holder: { body?: unknown } = {};

    const stopListening = this.target.listen(async response => {
      if (!response.url().includes(this.options.urlPattern) || response.status() !== 200) {
        return;
      }
      try {
        holder.body = await response.json();
      } catch {
        try {
          holder.body = JSON.parse(await response.text());
        } catch (error) {
          logger.debug('Captured response was not JSON', { url: response.url(), error: errorMessage(error) });
        }
      }
    });

    try {
      await this.target.open(this.options.pageUrl(pageNumber));
      await sleep(this.options.waitMs);

      if (holder.body === undefined) {
        await this.target.nudge();
        await sleep(this.options.nudgeWaitMs);
      }
    } finally {
      stopListening();
    }

    const items = parseDirectoryItems(holder.body);
    if (items.length === 0) {
      logger.warn('No listing data captured', { pageNumber });
    }
    return items;
  }
}

/**
 * Capture target over a puppeteer page. Consent is dismissed on the first
 * navigation only.
 */
export function pageCaptureTarget(navigator: Navigator, dismiss: () => Promise<boolean>): CaptureTarget {
  const page: Page = navigator.page;
  let consentHandled = false;

  return {
    listen: handler => {
      page.on('response', handler);
      return () => {
        page.off('response', handler);
      };
    },
    open: async url => {
      await navigator.load(url);
      if (!consentHandled) {
        consentHandled = await dismiss();
      }
    },
    nudge: async () => {
      try {
        await navigator.scrollToBottom();
      } catch (error) {
        logger.debug('Scroll nudge failed', { error: errorMessage(error) });
      }
    },
  };
}

// Request replay

export interface ApiReplayOptions {
  search: DirectorySearch;
  attempts: number;
  retryDelayMs: number;
}

export class ApiReplayProvider implements ListingProvider<DirectoryApiItem> {
  readonly name = 'api-replay';

  constructor(
    private readonly http: HttpClient,
    private readonly options: ApiReplayOptions
  ) {}

  async fetchListing(pageNumber: number): Promise<DirectoryApiItem[]> {
    const params = buildApiParams(this.options.search, pageNumber);
    const headers = buildApiHeaders();

    const result = await withRetry(
      async () => {
        const response = await this.http.request(DIRECTORY_API_URL, { params, headers });
        if (response.status !== 200) {
          throw new Error(`Results API returned ${response.status}`);
        }
        return response.data;
      },
      {
        limit: this.options.attempts,
        delayMs: this.options.retryDelayMs,
        label: `results api page ${pageNumber}`,
      }
    );

    if (!result.ok) {
      logger.warn('Results API unavailable for page', { pageNumber, error: result.error.message });
      return [];
    }

    return parseDirectoryItems(result.value);
  }
}

// Fallback chain

/**
 * Tries providers in order; the first non-empty page wins
 */
export class FallbackProvider<TItem> implements ListingProvider<TItem> {
  readonly name: string;

  constructor(private readonly providers: ReadonlyArray<ListingProvider<TItem>>) {
    this.name = providers.map(provider => provider.name).join('>');
  }

  async fetchListing(pageNumber: number): Promise<TItem[]> {
    for (const provider of this.providers) {
      try {
        const items = await provider.fetchListing(pageNumber);
        if (items.length > 0) {
          logger.debug('Listing provided', { provider: provider.name, pageNumber, items: items.length });
          return items;
        }
      } catch (error) {
        logger.warn('Listing provider failed', {
          provider: provider.name,
          pageNumber,
          error: errorMessage(error),
        });
      }
      logger.info('Falling back to next listing provider', { provider: provider.name, pageNumber });
    }
    return [];
  }
}

export function createCaptureWithReplay(
  target: CaptureTarget,
  http: HttpClient,
  search: DirectorySearch,
  waits: { waitMs: number; nudgeWaitMs: number }
): FallbackProvider<DirectoryApiItem> {
  return new FallbackProvider<DirectoryApiItem>([
    new ResponseCaptureProvider(target, {
      urlPattern: DIRECTORY_API_PATTERN,
      pageUrl: pageNumber => buildResultsUrl(search, pageNumber),
      waitMs: waits.waitMs,
      nudgeWaitMs: waits.nudgeWaitMs,
    }),
    new ApiReplayProvider(http, { search, attempts: 3, retryDelayMs: 500 }),
  ]);
}
