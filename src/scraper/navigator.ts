import type { Frame, Page } from 'puppeteer-core';
import { firstSuccessful, StrategyAttempt } from '../utils/strategy.js';
import { sleep } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

// Scroll-until-stable

export interface ScrollState {
  /** Last observed fingerprint, null before the first observation */
  fingerprint: number | null;
  /** Consecutive observations without change */
  stableCount: number;
  iterations: number;
}

export interface ScrollOptions {
  /** Unchanged observations required before the content counts as loaded */
  requiredStable: number;
  maxIterations: number;
  pauseMs: number;
}

export interface ScrollTarget {
  scroll(): Promise<void>;
  /** Cheap comparable value: scroll offset or document height */
  fingerprint(): Promise<number>;
}

export const initialScrollState: ScrollState = {
  fingerprint: null,
  stableCount: 0,
  iterations: 0,
};

export function nextScrollState(state: ScrollState, fingerprint: number): ScrollState {
  const unchanged = state.fingerprint !== null && state.fingerprint === fingerprint;
  return {
    fingerprint,
    stableCount: unchanged ? state.stableCount + 1 : 0,
    iterations: state.iterations + 1,
  };
}

export function isScrollSettled(state: ScrollState, options: ScrollOptions): boolean {
  return state.stableCount >= options.requiredStable || state.iterations >= options.maxIterations;
}

/**
 * Keep asking for more lazy-loaded content until the fingerprint stops
 * changing or the iteration ceiling is hit.
 */
export async function scrollUntilStable(target: ScrollTarget, options: ScrollOptions): Promise<ScrollState> {
  let state = initialScrollState;

  while (!isScrollSettled(state, options)) {
    await target.scroll();
    await sleep(options.pauseMs);
    state = nextScrollState(state, await target.fingerprint());
  }

  logger.debug('Scrolling settled', { ...state });
  return state;
}

// Pagination

/**
 * Substitute the page number into a results URL
 */
export function buildPageUrl(seedUrl: string, pageNumber: number, param = 'pagenumber'): string {
  const pattern = new RegExp(`([?&]${param}=)\\d*`);
  if (pattern.test(seedUrl)) {
    return seedUrl.replace(pattern, `$1${pageNumber}`);
  }
  const url = new URL(seedUrl);
  url.searchParams.set(param, String(pageNumber));
  return url.toString();
}

// Browser navigation

/**
 * Click the first button whose text contains one of the labels
 */
export async function clickButtonByText(frame: Frame, labels: readonly string[]): Promise<boolean> {
  return frame.evaluate((wanted: string[]) => {
    const buttons = Array.from(document.querySelectorAll('button'));
    const match = buttons.find(button => {
      const text = button.textContent ?? '';
      return wanted.some(label => text.includes(label));
    });
    if (!match) {
      return false;
    }
    match.click();
    return true;
  }, [...labels]);
}

export class Navigator {
  constructor(
    readonly page: Page,
    private readonly timeoutMs: number
  ) {}

  /**
   * Navigate and, when given, wait for the readiness selector.
   * A timeout rejects; callers decide whether that is fatal.
   */
  async load(url: string, readySelector?: string): Promise<void> {
    logger.debug('Loading page', { url, readySelector });

    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });

    if (readySelector) {
      await this.waitFor(readySelector);
    }
  }

  async waitFor(selector: string, timeoutMs = this.timeoutMs): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  /**
   * Best-effort dismissal of a consent dialog or similar interstitial.
   * Always resolves; returns whether something was dismissed.
   */
  async dismissInterstitial(attempts: readonly StrategyAttempt[]): Promise<boolean> {
    const winner = await firstSuccessful(attempts);
    if (winner) {
      logger.info('Dismissed interstitial', { attempt: winner });
      await sleep(1000);
      return true;
    }
    logger.debug('No interstitial dismissed');
    return false;
  }

  /**
   * Attempt that clicks the element matching a CSS selector, if present
   */
  clickAttempt(selector: string): StrategyAttempt {
    return {
      name: selector,
      run: async () => {
        const handle = await this.page.$(selector);
        if (!handle) {
          return false;
        }
        await handle.click();
        return true;
      },
    };
  }

  /**
   * Attempt that clicks a button by its label in the page or a matching frame
   */
  buttonTextAttempt(labels: readonly string[], frameUrlPart?: string): StrategyAttempt {
    return {
      name: frameUrlPart ? `frame:${frameUrlPart} button:${labels.join('|')}` : `button:${labels.join('|')}`,
      run: async () => {
        const frames = frameUrlPart
          ? this.page.frames().filter(frame => frame.url().includes(frameUrlPart))
          : [this.page.mainFrame()];
        for (const frame of frames) {
          if (await clickButtonByText(frame, labels)) {
            return true;
          }
        }
        return false;
      },
    };
  }

  /**
   * Scroll target for a scrollable container; document height when the
   * container is missing.
   */
  async scrollTarget(containerSelector: string): Promise<{ target: ScrollTarget; container: boolean }> {
    const container = await this.page.$(containerSelector);

    if (!container) {
      return {
        container: false,
        target: {
          scroll: async () => {
            await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
          },
          fingerprint: () => this.page.evaluate(() => document.body.scrollHeight),
        },
      };
    }

    return {
      container: true,
      target: {
        scroll: async () => {
          await container.evaluate(element => {
            element.scrollTop = element.scrollHeight;
          });
        },
        fingerprint: () => container.evaluate(element => element.scrollTop),
      },
    };
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }
}
