import { describe, it, expect } from 'vitest';
import { CheerioSource } from './extraction-sources.js';

describe('CheerioSource', () => {
  const html = `
    <div class="card"><a href="/doctor/jane-roe" class="name">Jane Roe</a></div>
    <div class="card"><a class="name">No link</a></div>
    <span class="stars" aria-label="4.5 stars"></span>
  `;

  it('should read element text by default', async () => {
    const source = new CheerioSource(html);

    expect(await source.values({ selector: '.card .name' })).toEqual(['Jane Roe', 'No link']);
  });

  it('should read attributes, empty when missing', async () => {
    const source = new CheerioSource(html);

    expect(await source.values({ selector: '.card .name', attribute: 'href' })).toEqual(['/doctor/jane-roe', '']);
    expect(await source.values({ selector: '.stars', attribute: 'aria-label' })).toEqual(['4.5 stars']);
  });

  it('should read outer markup when asked for html', async () => {
    const source = new CheerioSource('<p>Mail <b>desk@clinic.example</b></p>');

    expect(await source.values({ selector: 'b', html: true })).toEqual(['<b>desk@clinic.example</b>']);
  });

  it('should list link text and href', async () => {
    const source = new CheerioSource(html);

    expect(await source.links('.card a')).toEqual([
      { text: 'Jane Roe', href: '/doctor/jane-roe' },
      { text: 'No link', href: '' },
    ]);
  });
});
