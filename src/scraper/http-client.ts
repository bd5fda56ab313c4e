import axios, { AxiosInstance } from 'axios';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface HttpResponse<T> {
  status: number;
  data: T;
}

export interface RequestOptions {
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * One HTTP session reused for every request of a run.
 * Status codes never throw at the axios level; callers see them.
 */
export class HttpClient {
  private client: AxiosInstance;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(options: { maxRetries?: number; retryDelayMs?: number; timeoutMs?: number } = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;

    this.client = axios.create({
      timeout: options.timeoutMs ?? config.scrape.httpTimeoutMs,
      headers: {
        'User-Agent': config.browser.userAgent,
        'Accept-Language': 'en-US,en;q=0.9',
        'Cache-Control': 'no-cache',
      },
      validateStatus: () => true,
    });
  }

  /**
   * Single request, no retries
   */
  async request<T = unknown>(url: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    const response = await this.client.get<T>(url, {
      params: options.params,
      headers: options.headers,
    });
    return { status: response.status, data: response.data };
  }

  /**
   * GET a page as text. Network errors and transient statuses are retried
   * with a linear backoff; other non-2xx statuses fail at once.
   */
  async getText(url: string): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.get<string>(url, { responseType: 'text' });

        if (response.status >= 200 && response.status < 300) {
          logger.debug('Fetched page', { url, status: response.status, length: response.data.length });
          return response.data;
        }

        if (!TRANSIENT_STATUSES.has(response.status)) {
          throw new HttpStatusError(url, response.status);
        }

        lastError = new HttpStatusError(url, response.status);
      } catch (error) {
        if (error instanceof HttpStatusError && !TRANSIENT_STATUSES.has(error.status)) {
          throw error;
        }
        lastError = toError(error);
      }

      if (attempt < this.maxRetries) {
        const delay = this.retryDelayMs * attempt;
        logger.warn('Request failed, retrying', {
          url,
          attempt,
          maxRetries: this.maxRetries,
          delayMs: delay,
          error: lastError.message,
        });
        await sleep(delay);
      }
    }

    throw lastError ?? new Error(`Request to ${url} failed`);
  }
}
