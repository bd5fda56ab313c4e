import { describe, it, expect, vi } from 'vitest';
import { ResultsPageReader, collectProfileLinks } from './results-page.js';
import { DocumentFetcher } from './document-fetchers.js';
import { CheerioSource } from '../extraction-sources.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const RESULTS_URL = 'https://doctor.webmd.com/results?pagenumber=1';

describe('collectProfileLinks', () => {
  it('should resolve, filter and de-duplicate in first-seen order', () => {
    const urls = collectProfileLinks(
      [
        { text: 'Jane', href: '/doctor/jane-roe' },
        { text: 'Top', href: '#top' },
        { text: 'Sam', href: 'https://doctor.webmd.com/doctor/sam-poe' },
        { text: 'Jane again', href: 'https://doctor.webmd.com/doctor/jane-roe' },
        { text: 'Search', href: '/search' },
      ],
      RESULTS_URL,
      '/doctor/'
    );

    expect(urls).toEqual(['https://doctor.webmd.com/doctor/jane-roe', 'https://doctor.webmd.com/doctor/sam-poe']);
  });
});

describe('ResultsPageReader', () => {
  it('should merge the links of every selector', async () => {
    const html = `
      <div class="provider-details"><a href="/doctor/jane-roe">Jane</a><a href="/doctor/jane-roe">Jane</a></div>
      <div class="provider-details"><a href="https://doctor.webmd.com/doctor/sam-poe?tab=about">Sam</a></div>
      <aside><a href="/doctor/lee-kim">Lee</a><a href="/find-a-doctor">Find</a></aside>
    `;
    const fetcher: DocumentFetcher = {
      open: vi.fn(async () => new CheerioSource(html)),
      fetchRaw: vi.fn(async () => ''),
    };

    const urls = await new ResultsPageReader(fetcher).read(RESULTS_URL);

    expect(urls).toEqual([
      'https://doctor.webmd.com/doctor/jane-roe',
      'https://doctor.webmd.com/doctor/sam-poe?tab=about',
      'https://doctor.webmd.com/doctor/lee-kim',
    ]);
    expect(fetcher.open).toHaveBeenCalledWith(RESULTS_URL, { readySelector: '.provider-details', readyAttempts: 3 });
  });

  it('should return nothing for a page without profile links', async () => {
    const fetcher: DocumentFetcher = {
      open: vi.fn(async () => new CheerioSource('<p>No providers match your search</p>')),
      fetchRaw: vi.fn(async () => ''),
    };

    await expect(new ResultsPageReader(fetcher).read(RESULTS_URL)).resolves.toEqual([]);
  });
});
