/**
 * Selectors and endpoints for the medical directory search
 */

import { FieldSpecs, RecordSchema, DirectorySearch } from '../../types/index.js';
import { PHONE_PATTERN } from '../../utils/text.js';

export type DirectoryField = 'name' | 'business' | 'email' | 'phone' | 'location' | 'profileUrl';

export const directorySchema: RecordSchema<DirectoryField> = {
  fields: ['name', 'business', 'email', 'phone', 'location', 'profileUrl'],
  labels: {
    name: 'Name',
    business: 'Business Name',
    email: 'Email',
    phone: 'WhatsApp/Phone',
    location: 'Location',
    profileUrl: 'Profile URL',
  },
  identity: ['name', 'location'],
  blank: {
    name: '',
    business: '',
    email: '',
    phone: '',
    location: '',
    profileUrl: '',
  },
};

export const DIRECTORY_ORIGIN = 'https://doctor.webmd.com';
export const DIRECTORY_RESULTS_URL = `${DIRECTORY_ORIGIN}/results`;
export const DIRECTORY_API_URL = 'https://www.webmd.com/kapi/secure/search/care/allresults';
/** Substring identifying the results API among the page's network responses */
export const DIRECTORY_API_PATTERN = 'kapi/secure/search/care/allresults';
export const DIRECTORY_PAGE_SIZE = 10;

export const defaultDirectorySearch: DirectorySearch = {
  city: 'Texas City',
  state: 'TX',
  point: '29.3838,-94.9027',
  distance: '40',
  query: '',
};

export interface DirectoryPageSelectors {
  /** Results page has rendered its provider cards */
  resultsReady: string;
  /** Profile links, most specific first */
  profileLinks: string[];
  /** Only hrefs containing this are profiles */
  profilePathPart: string;
  /** Profile page has rendered */
  profileReady: string;
  /** Anchors scanned for the provider's own website */
  websiteLinks: string;
  websiteLinkText: RegExp;
  consentButton: string;
  consentLabels: string[];
}

export const directoryPageSelectors: DirectoryPageSelectors = {
  resultsReady: '.provider-details',
  profileLinks: [".provider-details a[href*='/doctor/']", "a[href*='/doctor/']"],
  profilePathPart: '/doctor/',
  profileReady: 'h1',
  websiteLinks: 'a',
  websiteLinkText: /website/i,
  consentButton: '#onetrust-accept-btn-handler',
  consentLabels: ['Accept', 'I Agree'],
};

/**
 * Profile page fields. Email is filled from the provider's website and
 * profileUrl from the visited URL, so neither has candidates here.
 */
export const directoryFieldSpecs: FieldSpecs<DirectoryField> = {
  name: {
    candidates: [{ selector: 'h1' }],
  },
  business: {
    candidates: [
      { selector: '.prov-specialty' },
      { selector: '.provider-specialties' },
      { selector: "[data-qa='provider-specialties']" },
    ],
  },
  email: {
    candidates: [],
  },
  phone: {
    candidates: [
      { selector: '.prov-phone' },
      { selector: "a[href^='tel:']" },
      { selector: "[data-qa='provider-phone']" },
    ],
    pattern: PHONE_PATTERN,
  },
  location: {
    candidates: [{ selector: '.adr' }, { selector: 'address' }, { selector: "[itemprop='address']" }],
  },
  profileUrl: {
    candidates: [],
  },
};
