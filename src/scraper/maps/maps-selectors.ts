/**
 * Selectors for the map search results feed and place panel.
 * These are guesses at generated class names and ARIA attributes and will
 * drift; every entry can be replaced through SELECTORS_FILE.
 */

import { FieldSpecs, RecordSchema } from '../../types/index.js';
import {
  COUNT_PATTERN,
  EMAIL_PATTERN,
  PHONE_PATTERN,
  RATING_PATTERN,
} from '../../utils/text.js';

export type MapsField = 'businessName' | 'phone' | 'website' | 'address' | 'rating' | 'reviews' | 'email';

export const mapsSchema: RecordSchema<MapsField> = {
  fields: ['businessName', 'phone', 'website', 'address', 'rating', 'reviews', 'email'],
  labels: {
    businessName: 'Business Name',
    phone: 'Phone Number',
    website: 'Website',
    address: 'Address',
    rating: 'Rating',
    reviews: 'Reviews',
    email: 'Email',
  },
  identity: ['businessName', 'address'],
  blank: {
    businessName: '',
    phone: '',
    website: '',
    address: '',
    rating: '',
    reviews: '',
    email: '',
  },
};

export interface MapsPageSelectors {
  /** Scrollable results list */
  feed: string;
  /** Any of these means the results view has rendered */
  resultsReady: string;
  /** Listing cards inside the feed, most specific first */
  listings: string[];
  /** Place link inside a listing card */
  listingLink: string;
  /** Title of the place panel; its presence means the panel has loaded */
  placePanelTitle: string;
  /** Frames whose URL contains this host a consent dialog */
  consentFrameUrlPart: string;
  consentLabels: string[];
}

export const mapsPageSelectors: MapsPageSelectors = {
  feed: "div[role='feed']",
  resultsReady: "div[role='feed'], div[aria-label*='results']",
  listings: [
    "div[role='feed'] div.Nv2PK",
    "div[role='feed'] div[aria-label][jsaction]",
    'div.Nv2PK',
    "div[role='article']",
  ],
  listingLink: "a.hfPXJ, a[href^='https://www.google.com/maps/place']",
  placePanelTitle: "div[role='main'] h1",
  consentFrameUrlPart: 'consent',
  consentLabels: ['I agree', 'Accept all', 'Agree', 'Accept'],
};

export const mapsFieldSpecs: FieldSpecs<MapsField> = {
  businessName: {
    candidates: [
      { selector: "div[role='main'] h1.DUwDvf" },
      { selector: "div[role='main'] h1[aria-level='1']" },
      { selector: "div[role='main'] h1" },
    ],
  },
  phone: {
    candidates: [
      { selector: "button[data-item-id^='phone']", attribute: 'aria-label' },
      { selector: "button[data-item-id^='phone']" },
      { selector: "a[href^='tel:']", attribute: 'href' },
    ],
    pattern: PHONE_PATTERN,
  },
  website: {
    candidates: [
      { selector: "a[aria-label*='Website']", attribute: 'href' },
      { selector: "a[data-item-id='authority']", attribute: 'href' },
      { selector: "a[href^='http']:not([aria-label*='Directions'])", attribute: 'href' },
    ],
    reject: value => value.includes('google.com'),
  },
  address: {
    candidates: [
      { selector: "button[data-item-id^='address']", attribute: 'aria-label' },
      { selector: "button[data-item-id^='address']" },
      { selector: "button[aria-label*='Address']", attribute: 'aria-label' },
    ],
    normalize: value => value.replace(/^Address:\s*/i, ''),
  },
  rating: {
    candidates: [{ selector: "div[role='main'] span[aria-label*='stars']", attribute: 'aria-label' }],
    pattern: RATING_PATTERN,
  },
  reviews: {
    candidates: [
      { selector: "div[role='main'] button[aria-label*='reviews']" },
      { selector: "div[role='main'] span[aria-label*='reviews']", attribute: 'aria-label' },
    ],
    pattern: COUNT_PATTERN,
    normalize: value => value.replace(/,/g, ''),
  },
  email: {
    candidates: [{ selector: 'html', html: true }],
    pattern: EMAIL_PATTERN,
    normalize: value => value.toLowerCase(),
  },
};
