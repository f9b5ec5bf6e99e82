/**
 * @file PageFetcher.ts
 * @module scraper/PageFetcher
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Fetches documentation pages over HTTP.
 */

/**
 * Source of HTML pages. Tests substitute an in-memory implementation.
 */
export interface PageFetcher {
  /**
   * Fetch a page.
   * @param url - Absolute page URL
   * @returns Page HTML
   * @throws HttpStatusError for non-2xx responses
   */
  fetchPage(url: string): Promise<string>;
}

/**
 * Raised for a response with a non-2xx status.
 */
export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Statistics for fetch operations.
 */
export interface FetchStats {
  /** Number of requests made */
  attempted: number;
  /** Number of 2xx responses */
  successful: number;
  /** Number of failed requests, including non-2xx responses */
  failed: number;
}

/**
 * Options for HttpPageFetcher.
 */
export interface HttpPageFetcherOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** User-Agent header sent with each request */
  userAgent?: string;
}

/**
 * Fetches pages with the global fetch API.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpPageFetcher({ timeout: 10000 });
 * const html = await fetcher.fetchPage('https://www.loc.gov/marc/bibliographic/concise/bd245.html');
 * console.log(fetcher.getStats());
 * ```
 */
export class HttpPageFetcher implements PageFetcher {
  private timeout: number;
  private userAgent: string;
  private stats: FetchStats = {
    attempted: 0,
    successful: 0,
    failed: 0,
  };

  constructor(options?: HttpPageFetcherOptions) {
    this.timeout = options?.timeout ?? 30000;
    this.userAgent = options?.userAgent ?? 'marc-lookup-scraper/1.0';
  }

  async fetchPage(url: string): Promise<string> {
    this.stats.attempted++;

    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeout),
        headers: { 'User-Agent': this.userAgent },
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, url);
      }

      const html = await response.text();
      this.stats.successful++;
      return html;
    } catch (error) {
      this.stats.failed++;
      throw error;
    }
  }

  /**
   * Get fetch statistics.
   * @returns A copy of the counters
   */
  getStats(): FetchStats {
    return { ...this.stats };
  }
}
