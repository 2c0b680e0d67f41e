import { getLogger } from '../lib/logger.js';

export interface ReviewFetchResult {
  count: number;
  /** Body of the page the count was read from. */
  raw: string;
  url: string;
}

export interface ReviewSource {
  fetch(): Promise<ReviewFetchResult>;
}

export interface CountBounds {
  min?: number;
  max?: number;
}

export interface ReviewSourceOptions {
  urls: string[];
  timeoutMs: number;
  bounds?: CountBounds;
}

// ─── Error Classes ───────────────────────────────────────────────────────────

export class ReviewSourceHttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'ReviewSourceHttpError';
  }
}

export class ReviewSourceError extends Error {
  constructor(
    message: string,
    public readonly attempts: { url: string; error: string }[],
  ) {
    super(message);
    this.name = 'ReviewSourceError';
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

const REVIEW_COUNT_PATTERNS: RegExp[] = [
  /리뷰\s*([\d,]+)/g,
  /([\d,]+)\s*개\s*리뷰/g,
  /"reviewCount"\s*:\s*(\d+)/gi,
  /"totalReviewCount"\s*:\s*(\d+)/gi,
  /후기\s*([\d,]+)/g,
  /reviews?\s*\(?\s*([\d,]+)/gi,
  /([\d,]+)\s*reviews?\b/gi,
];

/**
 * Pull every review-count candidate out of a page and return the largest one
 * inside the bounds, or null when nothing matches.
 */
export function extractReviewCount(html: string, bounds: CountBounds = {}): number | null {
  let largest: number | null = null;

  for (const pattern of REVIEW_COUNT_PATTERNS) {
    for (const match of html.matchAll(pattern)) {
      const digits = match[1]?.replace(/,/g, '');
      if (!digits) continue;
      const value = Number.parseInt(digits, 10);
      if (Number.isNaN(value)) continue;
      if (bounds.min !== undefined && value < bounds.min) continue;
      if (bounds.max !== undefined && value > bounds.max) continue;
      if (largest === null || value > largest) largest = value;
    }
  }

  return largest;
}

// ─── Fetching ────────────────────────────────────────────────────────────────

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'ko-KR,ko;q=0.9,en;q=0.8',
  Referer: 'https://map.naver.com/',
};

async function fetchPageText(url: string, timeoutMs: number): Promise<string> {
  const response = await fetch(url, {
    headers: REQUEST_HEADERS,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new ReviewSourceHttpError(
      `Review page returned HTTP ${response.status}`,
      url,
      response.status,
    );
  }

  return response.text();
}

/**
 * Review source backed by the public listing pages.
 * Each URL is tried once, in order; the first page that yields a count wins.
 */
export function createReviewSource(options: ReviewSourceOptions): ReviewSource {
  if (options.urls.length === 0) {
    throw new Error('Review source needs at least one URL');
  }

  return {
    async fetch(): Promise<ReviewFetchResult> {
      const logger = getLogger();
      const attempts: { url: string; error: string }[] = [];

      for (const [index, url] of options.urls.entries()) {
        const attempt = index + 1;
        const startTime = Date.now();

        try {
          const raw = await fetchPageText(url, options.timeoutMs);
          const count = extractReviewCount(raw, options.bounds);

          if (count === null) {
            logger.warn({ attempt, url, bytes: raw.length }, 'No review count found on page');
            attempts.push({ url, error: 'review count not found' });
            continue;
          }

          logger.info(
            { attempt, url, count, responseTimeMs: Date.now() - startTime },
            `Review count found: ${count}`,
          );
          return { count, raw, url };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.warn({ attempt, url, err }, `Review page fetch failed: ${message}`);
          attempts.push({ url, error: message });
        }
      }

      throw new ReviewSourceError(
        `Review count unavailable after ${attempts.length} attempt(s)`,
        attempts,
      );
    },
  };
}
