import { z } from 'zod';
import { DirectorySearch, ExtractedRecord } from '../../types/index.js';
import { config } from '../../utils/config.js';
import { cleanText, extractPhone } from '../../utils/text.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  DIRECTORY_API_URL,
  DIRECTORY_ORIGIN,
  DIRECTORY_PAGE_SIZE,
  DIRECTORY_RESULTS_URL,
  DirectoryField,
  directorySchema,
} from './directory-selectors.js';

// Ids and zip codes come back as numbers on some entries
const looseString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value === null || value === undefined ? '' : String(value)));

const DirectoryApiItemSchema = z.object({
  firstname: looseString,
  lastname: looseString,
  npi: looseString,
  primaryspecialty_nis: looseString,
  phoneno: looseString,
  phone: looseString,
  address: looseString,
  city: looseString,
  state: looseString,
  zip: looseString,
  urlseo: looseString,
  url: looseString,
});

const DirectoryApiResponseSchema = z.object({
  data: z
    .object({
      response: z.array(DirectoryApiItemSchema).nullish(),
    })
    .nullish(),
});

export type DirectoryApiItem = z.infer<typeof DirectoryApiItemSchema>;

/**
 * Items of a results API payload; anything unrecognisable counts as empty
 */
export function parseDirectoryItems(payload: unknown): DirectoryApiItem[] {
  if (payload === null || payload === undefined) {
    return [];
  }
  const parsed = DirectoryApiResponseSchema.safeParse(payload);
  if (!parsed.success) {
    logger.warn('Unexpected results payload shape', { issues: parsed.error.issues.length });
    return [];
  }
  return parsed.data.data?.response ?? [];
}

/**
 * Browser-facing results page URL for a page number
 */
export function buildResultsUrl(search: DirectorySearch, pageNumber: number): string {
  const params = new URLSearchParams({
    entity: 'all',
    q: search.query,
    pagenumber: String(pageNumber),
    pt: search.point,
    d: search.distance,
    city: search.city,
    state: search.state,
  });
  return `${DIRECTORY_RESULTS_URL}?${params.toString()}`;
}

/**
 * Search encoded in a results page URL; parameters it lacks come from the
 * fallback
 */
export function searchFromResultsUrl(url: string, fallback: DirectorySearch): DirectorySearch {
  let params: URLSearchParams;
  try {
    params = new URL(url).searchParams;
  } catch {
    throw new ConfigError(`Not a valid results URL: "${url}"`);
  }

  return {
    city: params.get('city') ?? fallback.city,
    state: params.get('state') ?? fallback.state,
    point: params.get('pt') ?? fallback.point,
    distance: params.get('d') ?? fallback.distance,
    query: params.get('q') ?? fallback.query,
  };
}

/**
 * Query parameters the results page sends to its search API
 */
export function buildApiParams(search: DirectorySearch, pageNumber: number): Record<string, string> {
  return {
    sortby: 'bestmatch',
    entity: 'all',
    gender: 'all',
    distance: search.distance,
    newpatient: '',
    isvirtualvisit: '',
    minrating: '0',
    start: String((pageNumber - 1) * DIRECTORY_PAGE_SIZE),
    pagename: 'serp',
    q: search.query,
    pt: search.point,
    specialtyid: '',
    d: search.distance,
    sid: '',
    pid: '',
    insuranceid: '',
    exp_min: 'min',
    exp_max: 'max',
    state: search.state,
    amagender: 'all',
  };
}

export function buildApiHeaders(): Record<string, string> {
  return {
    referer: `${DIRECTORY_ORIGIN}/`,
    accept: 'application/json, text/plain, */*',
    'user-agent': config.browser.userAgent,
    'sec-ch-ua': '"Not;A=Brand";v="99", "Chromium";v="124"',
    'sec-ch-ua-mobile': '?0',
    'sec-ch-ua-platform': '"Windows"',
  };
}

export function buildApiUrl(search: DirectorySearch, pageNumber: number): string {
  return `${DIRECTORY_API_URL}?${new URLSearchParams(buildApiParams(search, pageNumber)).toString()}`;
}

/**
 * Absolute profile URL from an item's slug; '' when the slug is unusable
 */
export function profileUrlOf(item: DirectoryApiItem): string {
  const slug = item.urlseo || item.url;
  if (slug.startsWith('/')) {
    return `${DIRECTORY_ORIGIN}${slug}`;
  }
  if (slug.startsWith('http')) {
    return slug;
  }
  return '';
}

export function mapDirectoryItem(item: DirectoryApiItem): ExtractedRecord<DirectoryField> {
  const location = [item.address, item.city, item.state, item.zip]
    .map(part => cleanText(part))
    .filter(part => part !== '')
    .join(', ');

  return {
    ...directorySchema.blank,
    name: cleanText(`${item.firstname} ${item.lastname}`),
    business: cleanText(item.primaryspecialty_nis),
    phone: extractPhone(cleanText(item.phoneno) || cleanText(item.phone)),
    location,
    profileUrl: profileUrlOf(item),
  };
}

export function describeDirectoryItem(item: DirectoryApiItem): string {
  return cleanText(`${item.firstname} ${item.lastname}`) || profileUrlOf(item) || 'unnamed provider';
}
