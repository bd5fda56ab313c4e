/**
 * Provider profile scraper
 * Extracts one provider's details and looks up an email address on the
 * provider's own website when the profile links to one.
 */

import { ExtractedRecord, ExtractionSource, FieldSpecs } from '../../types/index.js';
import { FieldExtractor } from '../extractor.js';
import { DocumentFetcher } from './document-fetchers.js';
import { extractEmail } from '../../utils/text.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  DirectoryField,
  DirectoryPageSelectors,
  directoryFieldSpecs,
  directoryPageSelectors,
  directorySchema,
} from './directory-selectors.js';

/**
 * Resolve a possibly relative href; '' for non-web links
 */
export function resolveHref(href: string, baseUrl: string): string {
  if (!href || href.startsWith('#') || href.startsWith('javascript:') || href.startsWith('mailto:')) {
    return '';
  }
  try {
    const url = new URL(href, baseUrl);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : '';
  } catch {
    return '';
  }
}

export class ProfileScraper {
  private readonly extractor: FieldExtractor<DirectoryField>;

  constructor(
    private readonly fetcher: DocumentFetcher,
    specs: FieldSpecs<DirectoryField> = directoryFieldSpecs,
    private readonly selectors: DirectoryPageSelectors = directoryPageSelectors
  ) {
    this.extractor = new FieldExtractor(directorySchema, specs);
  }

  /**
   * Failing to load the profile rejects (the caller retries); missing fields
   * and a failed website lookup only leave fields empty.
   */
  async scrape(profileUrl: string): Promise<ExtractedRecord<DirectoryField>> {
    logger.debug('Visiting profile', { profileUrl });

    const source = await this.fetcher.open(profileUrl, { readySelector: this.selectors.profileReady });
    const record = await this.extractor.extract(source);
    record.profileUrl = profileUrl;

    const website = await this.findWebsite(source, profileUrl);
    if (website) {
      record.email = await this.lookupEmail(website);
    }

    return record;
  }

  async findWebsite(source: ExtractionSource, profileUrl: string): Promise<string> {
    try {
      const links = await source.links(this.selectors.websiteLinks);
      const link = links.find(candidate => this.selectors.websiteLinkText.test(candidate.text));
      return link ? resolveHref(link.href, profileUrl) : '';
    } catch (error) {
      logger.debug('Website link lookup failed', { profileUrl, error: errorMessage(error) });
      return '';
    }
  }

  async lookupEmail(websiteUrl: string): Promise<string> {
    try {
      const html = await this.fetcher.fetchRaw(websiteUrl);
      return extractEmail(html);
    } catch (error) {
      logger.debug('Website email lookup failed', { websiteUrl, error: errorMessage(error) });
      return '';
    }
  }
}
