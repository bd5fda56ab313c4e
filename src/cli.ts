import { DirectorySearch, DirectoryStrategy, SourceName } from './types/index.js';
import { config, parseInteger } from './utils/config.js';
import { ConfigError } from './utils/errors.js';
import { defaultDirectorySearch } from './scraper/directory/directory-selectors.js';
import { searchFromResultsUrl } from './scraper/directory/directory-api.js';

export interface CliOptions {
  source: SourceName;
  strategy: DirectoryStrategy;
  pages: number;
  maxResults: number;
  /** Seed URL; overrides the query / search options */
  url?: string;
  query: string;
  search: DirectorySearch;
  enrich: boolean;
}

export const USAGE = `Usage:
  listing-harvester --source=maps "dentists in Austin TX"
  listing-harvester --source=maps --url=https://www.google.com/maps/search/...
  listing-harvester --source=directory --strategy=capture --pages=3

Options:
  --source=maps|directory        default: maps
  --strategy=browser|http|capture|api   directory only, default: capture
  --pages=N                      results pages to walk (directory), default: 3
  --max-results=N                cap on visited items, default: MAX_RESULTS
  --url=URL                      seed URL instead of a query; a directory
                                 results URL also sets the search
  --city= --state= --pt=lat,lng --distance= --q=   directory search,
                                 over the URL's parameters
  --enrich                       api strategy: also visit each profile`;

const SOURCES: readonly SourceName[] = ['maps', 'directory'];
const STRATEGIES: readonly DirectoryStrategy[] = ['browser', 'http', 'capture', 'api'];

function pick<T extends string>(name: string, raw: string | undefined, allowed: readonly T[], fallback: T): T {
  if (raw === undefined) {
    return fallback;
  }
  const value = allowed.find(option => option === raw);
  if (!value) {
    throw new ConfigError(`--${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const flags = new Map<string, string>();
  const words: string[] = [];

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const [key, ...rest] = arg.slice(2).split('=');
      flags.set(key, rest.length > 0 ? rest.join('=') : 'true');
    } else {
      words.push(arg);
    }
  }

  const source = pick('source', flags.get('source'), SOURCES, 'maps');
  const strategy = pick('strategy', flags.get('strategy'), STRATEGIES, 'capture');

  const pages = parseInteger('--pages', flags.get('pages'), source === 'maps' ? 1 : 3);
  if (pages < 1) {
    throw new ConfigError('--pages must be at least 1');
  }

  const query = words.join(' ').trim();
  const url = flags.get('url');

  if (source === 'maps' && !query && !url) {
    throw new ConfigError('A search query or --url is required for the maps source');
  }

  const maxResults = parseInteger('--max-results', flags.get('max-results'), config.scrape.maxResults);
  if (maxResults < 1) {
    throw new ConfigError('--max-results must be at least 1');
  }

  // A directory URL carries the search the capture and api strategies replay
  const base =
    source === 'directory' && url ? searchFromResultsUrl(url, defaultDirectorySearch) : defaultDirectorySearch;

  return {
    source,
    strategy,
    pages,
    maxResults,
    url,
    query,
    search: {
      city: flags.get('city') ?? base.city,
      state: flags.get('state') ?? base.state,
      point: flags.get('pt') ?? base.point,
      distance: flags.get('distance') ?? base.distance,
      query: flags.get('q') ?? base.query,
    },
    enrich: flags.get('enrich') === 'true',
  };
}
