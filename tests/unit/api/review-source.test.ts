import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import {
  createReviewSource,
  extractReviewCount,
  ReviewSourceError,
} from '../../../src/api/review-source.js';
import { initTestLogger } from '../../helpers/logger.js';

beforeAll(() => {
  initTestLogger();
});

describe('extractReviewCount', () => {
  it('reads a Korean review label', () => {
    expect(extractReviewCount('<span>방문자 리뷰 663</span>')).toBe(663);
  });

  it('reads counts with thousands separators', () => {
    expect(extractReviewCount('<em>1,204개 리뷰</em>')).toBe(1204);
  });

  it('reads embedded JSON fields', () => {
    const html = '<script>window.__STATE__={"place":{"totalReviewCount": 812,"reviewCount":40}}</script>';
    expect(extractReviewCount(html)).toBe(812);
  });

  it('returns the largest candidate', () => {
    expect(extractReviewCount('후기 12 ... 리뷰 640 ... "reviewCount":639')).toBe(640);
  });

  it('handles pages with a very large number of candidates', () => {
    const html = `${'<li>리뷰 3</li>'.repeat(300_000)}<li>리뷰 9</li>`;
    expect(extractReviewCount(html)).toBe(9);
  });

  it('drops candidates outside the bounds', () => {
    const html = '리뷰 5 리뷰 663 "reviewCount": 98765';
    expect(extractReviewCount(html, { min: 600, max: 700 })).toBe(663);
  });

  it('returns null when nothing matches', () => {
    expect(extractReviewCount('<html><body>No counts here</body></html>')).toBeNull();
  });

  it('returns null when every candidate is out of range', () => {
    expect(extractReviewCount('리뷰 5', { min: 600 })).toBeNull();
  });
});

describe('createReviewSource', () => {
  const fetchMock = vi.fn();

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  function stubFetch() {
    vi.stubGlobal('fetch', fetchMock);
  }

  it('returns the count from the first page that has one', async () => {
    stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('<b>리뷰 663</b>', { status: 200 }));

    const source = createReviewSource({ urls: ['https://example.com/reviews'], timeoutMs: 1000 });
    const result = await source.fetch();

    expect(result).toEqual({
      count: 663,
      raw: '<b>리뷰 663</b>',
      url: 'https://example.com/reviews',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [calledUrl, init] = fetchMock.mock.calls[0] ?? [];
    expect(calledUrl).toBe('https://example.com/reviews');
    expect(init.headers['Accept-Language']).toBe('ko-KR,ko;q=0.9,en;q=0.8');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('falls through to the next URL on HTTP errors and empty pages', async () => {
    stubFetch();
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('<p>nothing</p>', { status: 200 }))
      .mockResolvedValueOnce(new Response('"reviewCount": 121', { status: 200 }));

    const source = createReviewSource({
      urls: ['https://example.com/a', 'https://example.com/b', 'https://example.com/c'],
      timeoutMs: 1000,
    });
    const result = await source.fetch();

    expect(result.count).toBe(121);
    expect(result.url).toBe('https://example.com/c');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('throws with every attempt when no page yields a count', async () => {
    stubFetch();
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('gone', { status: 404 }));

    const source = createReviewSource({
      urls: ['https://example.com/a', 'https://example.com/b'],
      timeoutMs: 1000,
    });

    const error = await source.fetch().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ReviewSourceError);
    if (!(error instanceof ReviewSourceError)) return;
    expect(error.message).toBe('Review count unavailable after 2 attempt(s)');
    expect(error.attempts).toEqual([
      { url: 'https://example.com/a', error: 'fetch failed' },
      { url: 'https://example.com/b', error: 'Review page returned HTTP 404' },
    ]);
  });

  it('requires at least one URL', () => {
    expect(() => createReviewSource({ urls: [], timeoutMs: 1000 })).toThrow(
      'Review source needs at least one URL',
    );
  });
});
