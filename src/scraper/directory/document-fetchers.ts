import { ExtractionSource } from '../../types/index.js';
import { CheerioSource, PageSource } from '../extraction-sources.js';
import { HttpClient } from '../http-client.js';
import { Navigator } from '../navigator.js';
import { PuppeteerClient } from '../puppeteer-client.js';
import { sleep } from '../../utils/retry.js';
import { logger } from '../../utils/logger.js';

export interface OpenOptions {
  /** Selector signalling the page has rendered */
  readySelector?: string;
  /** Reloads while waiting for readySelector before carrying on regardless */
  readyAttempts?: number;
  /** Raise when readySelector never shows up */
  requireReady?: boolean;
}

/**
 * How the directory pages are fetched: plain HTTP with an HTML parser, or a
 * browser page.
 */
export interface DocumentFetcher {
  open(url: string, options?: OpenOptions): Promise<ExtractionSource>;
  /** Raw markup of an arbitrary external page */
  fetchRaw(url: string): Promise<string>;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  constructor(private readonly http: HttpClient) {}

  async open(url: string): Promise<ExtractionSource> {
    return new CheerioSource(await this.http.getText(url));
  }

  async fetchRaw(url: string): Promise<string> {
    return this.http.getText(url);
  }
}

export class BrowserDocumentFetcher implements DocumentFetcher {
  constructor(
    private readonly navigator: Navigator,
    private readonly browser: PuppeteerClient,
    private readonly readyTimeoutMs = 20000
  ) {}

  async open(url: string, options: OpenOptions = {}): Promise<ExtractionSource> {
    await this.navigator.load(url);

    if (options.readySelector) {
      const attempts = Math.max(1, options.readyAttempts ?? 1);
      let ready = false;

      for (let attempt = 1; attempt <= attempts && !ready; attempt++) {
        try {
          await this.navigator.waitFor(options.readySelector, this.readyTimeoutMs);
          ready = true;
        } catch {
          logger.warn('Page content delayed', { url, selector: options.readySelector, attempt, attempts });
          if (attempt < attempts) {
            await sleep(3000);
            await this.navigator.load(url);
          }
        }
      }

      if (!ready && options.requireReady) {
        throw new Error(`Timed out waiting for ${options.readySelector} on ${url}`);
      }
    }

    return new PageSource(this.navigator.page);
  }

  async fetchRaw(url: string): Promise<string> {
    return this.browser.fetchRenderedHtml(url);
  }
}
