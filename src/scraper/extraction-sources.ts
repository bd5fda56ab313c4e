import * as cheerio from 'cheerio';
import type { Page } from 'puppeteer-core';
import { ExtractionSource, PageLink, SelectorCandidate } from '../types/index.js';

/**
 * Extraction over raw markup fetched without a browser
 */
export class CheerioSource implements ExtractionSource {
  private readonly $: cheerio.CheerioAPI;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  async values(candidate: SelectorCandidate): Promise<string[]> {
    const $ = this.$;
    return $(candidate.selector)
      .toArray()
      .map(element => {
        if (candidate.html) {
          return $.html(element);
        }
        if (candidate.attribute) {
          return $(element).attr(candidate.attribute) ?? '';
        }
        return $(element).text();
      });
  }

  async links(selector: string): Promise<PageLink[]> {
    const $ = this.$;
    return $(selector)
      .toArray()
      .map(element => ({
        text: $(element).text(),
        href: $(element).attr('href') ?? '',
      }));
  }

  /** Full markup of the document */
  html(): string {
    return this.$.html();
  }
}

/**
 * Extraction over the live DOM of a browser page
 */
export class PageSource implements ExtractionSource {
  constructor(private readonly page: Page) {}

  async values(candidate: SelectorCandidate): Promise<string[]> {
    return this.page.$$eval(
      candidate.selector,
      (elements, attribute, asHtml) =>
        elements.map(element => {
          if (asHtml) {
            return element.outerHTML;
          }
          if (attribute) {
            return element.getAttribute(attribute) ?? '';
          }
          return element instanceof HTMLElement ? element.innerText : element.textContent ?? '';
        }),
      candidate.attribute ?? null,
      candidate.html === true
    );
  }

  async links(selector: string): Promise<PageLink[]> {
    return this.page.$$eval(selector, elements =>
      elements.map(element => ({
        text: element.textContent ?? '',
        href: element.getAttribute('href') ?? '',
      }))
    );
  }
}
