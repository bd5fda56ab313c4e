/**
 * Results page link harvesting
 * Collects profile links from a directory results page
 */

import { PageLink } from '../../types/index.js';
import { DocumentFetcher } from './document-fetchers.js';
import { resolveHref } from './profile-scraper.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DirectoryPageSelectors, directoryPageSelectors } from './directory-selectors.js';

/**
 * Absolute profile URLs from a set of anchors, first occurrence order kept
 */
export function collectProfileLinks(links: readonly PageLink[], baseUrl: string, pathPart: string): string[] {
  const urls: string[] = [];

  for (const link of links) {
    const absolute = resolveHref(link.href, baseUrl);
    if (absolute && absolute.includes(pathPart) && !urls.includes(absolute)) {
      urls.push(absolute);
    }
  }

  return urls;
}

export class ResultsPageReader {
  constructor(
    private readonly fetcher: DocumentFetcher,
    private readonly selectors: DirectoryPageSelectors = directoryPageSelectors
  ) {}

  /**
   * Profile URLs listed on one results page. Each link selector is tried in
   * turn and their results are merged.
   */
  async read(url: string): Promise<string[]> {
    const source = await this.fetcher.open(url, {
      readySelector: this.selectors.resultsReady,
      readyAttempts: 3,
    });

    const links: PageLink[] = [];
    for (const selector of this.selectors.profileLinks) {
      try {
        links.push(...(await source.links(selector)));
      } catch (error) {
        logger.debug('Profile link selector failed', { selector, error: errorMessage(error) });
      }
    }

    const profiles = collectProfileLinks(links, url, this.selectors.profilePathPart);
    logger.info('Profile links found', { url, count: profiles.length });
    return profiles;
  }
}
