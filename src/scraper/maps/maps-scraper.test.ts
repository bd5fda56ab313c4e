import { describe, it, expect, vi } from 'vitest';
import { buildMapsSearchUrl, isPlaceUrl } from './maps-scraper.js';
import { mapsFieldSpecs, mapsSchema } from './maps-selectors.js';
import { FieldExtractor } from '../extractor.js';
import { CheerioSource } from '../extraction-sources.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('buildMapsSearchUrl', () => {
  it('should turn a query into a search URL with + for spaces', () => {
    expect(buildMapsSearchUrl('dentists in Austin TX')).toBe(
      'https://www.google.com/maps/search/dentists+in+Austin+TX'
    );
  });

  it('should encode other characters', () => {
    expect(buildMapsSearchUrl(' café & bar ')).toBe('https://www.google.com/maps/search/caf%C3%A9+%26+bar');
  });

  it('should use a URL as is', () => {
    const url = 'https://www.google.com/maps/search/bakeries/@30.26,-97.74,13z';
    expect(buildMapsSearchUrl(url)).toBe(url);
  });
});

describe('isPlaceUrl', () => {
  it('should recognise single place pages', () => {
    expect(isPlaceUrl('https://www.google.com/maps/place/Blue+Door+Cafe/@29.3,-94.8,17z')).toBe(true);
    expect(isPlaceUrl('https://www.google.com/maps/search/cafes')).toBe(false);
  });
});

describe('place panel fields', () => {
  const extractor = new FieldExtractor(mapsSchema, mapsFieldSpecs);

  it('should extract every field from a place panel', async () => {
    const panel = new CheerioSource(`
      <div role="main">
        <h1 class="DUwDvf">Blue Door Cafe</h1>
        <span role="img" aria-label="4.6 stars "></span>
        <button aria-label="1,234 reviews">1,234 reviews</button>
        <button data-item-id="address" aria-label="Address: 1 Bay Rd, Galveston, TX">1 Bay Rd</button>
        <button data-item-id="phone:tel:5551234567" aria-label="Phone: (555) 123-4567">(555) 123-4567</button>
        <a aria-label="Website: bluedoor.example" href="https://bluedoor.example/">bluedoor.example</a>
        <p>Bookings: hello@bluedoor.example</p>
      </div>
    `);

    await expect(extractor.extract(panel)).resolves.toEqual({
      businessName: 'Blue Door Cafe',
      phone: '(555) 123-4567',
      website: 'https://bluedoor.example/',
      address: '1 Bay Rd, Galveston, TX',
      rating: '4.6',
      reviews: '1234',
      email: 'hello@bluedoor.example',
    });
  });

  it('should skip website links that point back at the map', async () => {
    const panel = new CheerioSource(`
      <div role="main">
        <a aria-label="Website" href="https://www.google.com/url?q=bluedoor">Website</a>
        <a data-item-id="authority" href="https://bluedoor.example/">bluedoor.example</a>
      </div>
    `);

    expect(await extractor.extractField(panel, 'website')).toBe('https://bluedoor.example/');
  });

  it('should leave fields empty on a sparse panel', async () => {
    const panel = new CheerioSource('<div role="main"><h1>Pop-up Stall</h1></div>');

    const record = await extractor.extract(panel);

    expect(record.businessName).toBe('Pop-up Stall');
    expect(record.phone).toBe('');
    expect(record.rating).toBe('');
    expect(record.email).toBe('');
  });
});
