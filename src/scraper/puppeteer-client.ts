import puppeteer from 'puppeteer-core';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import { config } from '../utils/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export interface PageOptions {
  userAgent?: string;
  /** Grants geolocation to this origin and pins the position */
  geolocation?: { origin: string; latitude: number; longitude: number };
}

/**
 * Owns the single browser used by a run. Either connects to a running
 * Chrome (BROWSER_WS_ENDPOINT) or launches a local executable
 * (CHROME_EXECUTABLE_PATH).
 */
export class PuppeteerClient {
  private browser: Browser | null = null;

  async initialize(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }

    const { wsEndpoint, executablePath, headless } = config.browser;

    if (wsEndpoint) {
      logger.info('Connecting to remote browser');
      this.browser = await puppeteer.connect({ browserWSEndpoint: wsEndpoint });
      return this.browser;
    }

    if (!executablePath) {
      throw new ConfigError(
        'No browser configured. Set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH in .env'
      );
    }

    logger.info('Launching browser', { executablePath, headless });

    this.browser = await puppeteer.launch({
      executablePath,
      headless,
      defaultViewport: { width: 1920, height: 1080 },
      args: [
        '--disable-gpu',
        '--disable-dev-shm-usage',
        '--no-sandbox',
        '--window-size=1920,1080',
        '--disable-blink-features=AutomationControlled',
      ],
    });

    return this.browser;
  }

  /**
   * New page in a fresh browser context
   */
  async newPage(options: PageOptions = {}): Promise<Page> {
    const browser = await this.initialize();
    const context = await browser.createBrowserContext();

    if (options.geolocation) {
      await context.overridePermissions(options.geolocation.origin, ['geolocation']);
    }

    const page = await context.newPage();
    await page.setViewport({ width: 1920, height: 1080 });
    await page.setUserAgent(options.userAgent ?? config.browser.userAgent);

    if (options.geolocation) {
      await page.setGeolocation({
        latitude: options.geolocation.latitude,
        longitude: options.geolocation.longitude,
      });
    }

    return page;
  }

  /**
   * Rendered HTML of a URL, loaded in its own short-lived context
   */
  async fetchRenderedHtml(url: string, settleMs = 2000): Promise<string> {
    const browser = await this.initialize();
    const context = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await page.setUserAgent(config.browser.userAgent);
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: config.scrape.waitTimeoutMs });
      await sleep(settleMs);
      return await page.content();
    } finally {
      await this.closeContext(context);
    }
  }

  async closeContext(context: BrowserContext): Promise<void> {
    try {
      await context.close();
    } catch (error) {
      logger.debug('Failed to close browser context', { error: errorMessage(error) });
    }
  }

  async close(): Promise<void> {
    if (!this.browser) {
      return;
    }

    const browser = this.browser;
    this.browser = null;

    try {
      if (config.browser.wsEndpoint) {
        await browser.disconnect();
      } else {
        await browser.close();
      }
      logger.info('Browser closed');
    } catch (error) {
      logger.debug('Failed to close browser', { error: errorMessage(error) });
    }
  }
}

export const puppeteerClient = new PuppeteerClient();
