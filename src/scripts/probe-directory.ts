#!/usr/bin/env node

import { config } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { Navigator } from '../scraper/navigator.js';
import { puppeteerClient } from '../scraper/puppeteer-client.js';
import { PageSource } from '../scraper/extraction-sources.js';
import { CapturedResponse } from '../scraper/directory/listing-providers.js';
import { buildResultsUrl, parseDirectoryItems } from '../scraper/directory/directory-api.js';
import { parsePoint } from '../jobs/directory-job.js';
import {
  DIRECTORY_API_PATTERN,
  DIRECTORY_ORIGIN,
  defaultDirectorySearch,
  directoryFieldSpecs,
  directoryPageSelectors,
} from '../scraper/directory/directory-selectors.js';

/**
 * Diagnose the directory results page
 * Loads page 1 the way the capture strategy does and reports what the
 * selectors and the results API see. Writes nothing.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describePayload(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    return { type: Array.isArray(body) ? 'array' : typeof body };
  }
  const data = body.data;
  const items = parseDirectoryItems(body);
  const first = items[0];
  return {
    keys: Object.keys(body),
    dataKeys: isRecord(data) ? Object.keys(data) : [],
    itemCount: items.length,
    sample: first
      ? { name: `${first.firstname} ${first.lastname}`.trim(), specialty: first.primaryspecialty_nis, city: first.city }
      : null,
  };
}

async function probe(): Promise<void> {
  const search = defaultDirectorySearch;
  const url = buildResultsUrl(search, 1);
  const { latitude, longitude } = parsePoint(search.point);

  const page = await puppeteerClient.newPage({
    geolocation: { origin: DIRECTORY_ORIGIN, latitude, longitude },
  });
  const navigator = new Navigator(page, config.scrape.waitTimeoutMs);

  const captured: unknown[] = [];
  const onResponse = async (response: CapturedResponse): Promise<void> => {
    if (!response.url().includes(DIRECTORY_API_PATTERN)) {
      return;
    }
    logger.info('Results API response', { status: response.status(), url: response.url() });
    try {
      captured.push(await response.json());
    } catch (error) {
      logger.warn('Results API response was not JSON', { error: errorMessage(error) });
    }
  };
  page.on('response', onResponse);

  try {
    logger.info('Loading results page', { url });
    await navigator.load(url);

    const dismissed = await navigator.dismissInterstitial([
      navigator.clickAttempt(directoryPageSelectors.consentButton),
      navigator.buttonTextAttempt(directoryPageSelectors.consentLabels),
    ]);
    logger.info(dismissed ? '✅ Consent dismissed' : 'No consent dialog found');

    try {
      await navigator.waitFor(directoryPageSelectors.resultsReady, 20000);
      logger.info('✅ Provider cards rendered');
    } catch {
      logger.warn('⚠️  Provider cards did not render', { selector: directoryPageSelectors.resultsReady });
    }

    const selectors = [
      directoryPageSelectors.resultsReady,
      ...directoryPageSelectors.profileLinks,
      ...directoryFieldSpecs.location.candidates.map(candidate => candidate.selector),
      ...directoryFieldSpecs.phone.candidates.map(candidate => candidate.selector),
    ];
    for (const selector of selectors) {
      const count = await page.$$eval(selector, elements => elements.length);
      logger.info(`  ${selector}: ${count}`);
    }

    const source = new PageSource(page);
    for (const selector of directoryPageSelectors.profileLinks) {
      const links = await source.links(selector);
      logger.info(`Sample hrefs for ${selector}`, { hrefs: links.slice(0, 5).map(link => link.href) });
    }

    if (captured.length === 0) {
      await navigator.scrollToBottom();
      await sleep(3000);
    }

    if (captured.length === 0) {
      logger.warn('⚠️  No results API response captured');
    }
    for (const body of captured) {
      logger.info('Captured payload', describePayload(body));
    }
  } finally {
    page.off('response', onResponse);
    await puppeteerClient.close();
  }
}

probe()
  .then(() => process.exit(0))
  .catch(error => {
    logger.error('Probe failed', { error: errorMessage(error) });
    process.exit(1);
  });
