import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BlockableQuoteCache } from '../../cache/blockable-cache.js';
import { QuoteCache } from '../../cache/quote-cache.js';
import type { TagFilter } from '../../cache/types.js';
import type { Quote } from '../../core/quote.js';
import { Possibility } from '../../core/random.js';
import { QuoteErrorCode } from '../../errors.js';
import { CachedQuoteGenerator } from '../../generators/cached-generator.js';
import type { QuoteDownloader } from '../../generators/types.js';
import { captureQuoteErrorAsync, makeQuote, scriptedRandom } from '../helpers.js';

function fakeDownloader() {
  return {
    randomQuote: vi.fn(async () => makeQuote('downloaded', ['x'])),
    randomQuoteWithTag: vi.fn(async (tag: string): Promise<Quote | null> => makeQuote(`tag-${tag}`, [tag])),
    randomQuoteWithTags: vi.fn(async (_tags: TagFilter): Promise<Quote | null> => makeQuote('multi', ['y'])),
    allQuotes: vi.fn(async () => [makeQuote('all-1'), makeQuote('all-2')]),
    allQuotesWithTag: vi.fn(async (tag: string) => [makeQuote(`all-${tag}`, [tag])]),
    allQuotesWithTags: vi.fn(async (_tags: TagFilter) => [makeQuote('all-multi', ['x'])]),
  } satisfies QuoteDownloader<Quote>;
}

// Rolls of 100 always download, rolls of 1 always read the cache
const alwaysDownload = () => new Possibility(scriptedRandom(100));
const neverDownload = () => new Possibility(scriptedRandom(1));

describe('CachedQuoteGenerator', () => {
  let downloader: ReturnType<typeof fakeDownloader>;

  beforeEach(() => {
    downloader = fakeDownloader();
  });

  function create(possibility: Possibility, cache?: QuoteCache<Quote> | BlockableQuoteCache<Quote>) {
    return new CachedQuoteGenerator<Quote>({
      apiName: 'fake',
      source: 'https://fake.test/',
      downloader,
      possibility,
      cache,
    });
  }

  describe('construction', () => {
    it('validates its options', () => {
      expect(() => new CachedQuoteGenerator<Quote>({ apiName: ' ', source: 's', downloader })).toThrow(
        'apiName cannot be null or empty',
      );
      expect(() => new CachedQuoteGenerator<Quote>({ apiName: 'a', source: '', downloader })).toThrow(
        'source cannot be null or empty',
      );
    });

    it('uses a supplied blockable cache as is', () => {
      const blockable = new BlockableQuoteCache<Quote>();
      expect(create(neverDownload(), blockable).cache).toBe(blockable);
    });

    it('wraps a plain cache', () => {
      const plain = new QuoteCache<Quote>();
      const generator = create(neverDownload(), plain);
      expect(generator.cache).toBeInstanceOf(BlockableQuoteCache);
      expect(generator.cache.cache).toBe(plain);
    });
  });

  describe('getRandomQuote', () => {
    it('downloads and caches when the cache is empty', async () => {
      const generator = create(neverDownload());

      const quote = await generator.getRandomQuote();

      expect(quote.id.value).toBe('downloaded');
      expect(generator.cache.isCached('downloaded')).toBe(true);
      expect(downloader.randomQuote).toHaveBeenCalledTimes(1);
    });

    it('serves from the cache when the possibility says so', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached'));

      const quote = await generator.getRandomQuote();

      expect(quote.id.value).toBe('cached');
      expect(downloader.randomQuote).not.toHaveBeenCalled();
    });

    it('downloads when the possibility says so', async () => {
      const generator = create(alwaysDownload());
      generator.cache.cacheQuote(makeQuote('cached'));

      expect((await generator.getRandomQuote()).id.value).toBe('downloaded');
      expect(generator.cache.count).toBe(2);
    });

    it('cached mode fails on an empty cache', async () => {
      const generator = create(alwaysDownload());
      const error = await captureQuoteErrorAsync(() => generator.getRandomQuote('cached'));
      expect(error.code).toBe(QuoteErrorCode.INVALID_OPERATION);
      expect(downloader.randomQuote).not.toHaveBeenCalled();
    });

    it('does not cache downloads while blocked', async () => {
      const generator = create(neverDownload());
      generator.cache.block();

      expect((await generator.getRandomQuote('download')).id.value).toBe('downloaded');
      expect(generator.cache.isEmpty).toBe(true);
    });
  });

  describe('getRandomQuoteWithTag', () => {
    it('falls back to a download on a cache miss', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached', ['other']));

      const quote = await generator.getRandomQuoteWithTag('life');

      expect(quote?.id.value).toBe('tag-life');
      expect(downloader.randomQuoteWithTag).toHaveBeenCalledWith('life');
      expect(generator.cache.getCached('life')).toHaveLength(1);
    });

    it('serves a cached hit', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached', ['life']));

      expect((await generator.getRandomQuoteWithTag('life'))?.id.value).toBe('cached');
      expect(downloader.randomQuoteWithTag).not.toHaveBeenCalled();
    });

    it('cached mode returns null on a miss', async () => {
      const generator = create(alwaysDownload());
      await expect(generator.getRandomQuoteWithTag('life', 'cached')).resolves.toBeNull();
    });

    it('passes through a null download without caching', async () => {
      downloader.randomQuoteWithTag.mockResolvedValueOnce(null);
      const generator = create(alwaysDownload());

      await expect(generator.getRandomQuoteWithTag('life', 'download')).resolves.toBeNull();
      expect(generator.cache.isEmpty).toBe(true);
    });

    it('rejects a blank tag', async () => {
      const generator = create(alwaysDownload());
      const error = await captureQuoteErrorAsync(() => generator.getRandomQuoteWithTag(''));
      expect(error.code).toBe(QuoteErrorCode.INVALID_ARGUMENT);
    });
  });

  describe('getRandomQuoteWithTags', () => {
    it('tries each tag in turn against the cache', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached-y', ['y']));

      const quote = await generator.getRandomQuoteWithTags(['x', null, 'y'], 'cached');

      expect(quote?.id.value).toBe('cached-y');
    });

    it('downloads when no tag is cached', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached', ['z']));

      const quote = await generator.getRandomQuoteWithTags(['x', 'y']);

      expect(quote?.id.value).toBe('multi');
      expect(downloader.randomQuoteWithTags).toHaveBeenCalledWith(['x', 'y']);
    });

    it('cached mode with no tags returns null', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached', ['z']));
      await expect(generator.getRandomQuoteWithTags(null, 'cached')).resolves.toBeNull();
    });
  });

  describe('getAllQuotes', () => {
    it('lists cached quotes before downloaded ones without caching the downloads', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached'));

      const quotes = await generator.getAllQuotes();

      expect(quotes.map((q) => q.id.value)).toEqual(['cached', 'all-1', 'all-2']);
      expect(generator.cache.count).toBe(1);
    });

    it('honours cached and download modes', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuote(makeQuote('cached'));

      expect((await generator.getAllQuotes('cached')).map((q) => q.id.value)).toEqual(['cached']);
      expect((await generator.getAllQuotes('download')).map((q) => q.id.value)).toEqual(['all-1', 'all-2']);
    });

    it('filters by a single tag', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuotes([makeQuote('c1', ['life']), makeQuote('c2', ['work'])]);

      const quotes = await generator.getAllQuotesWithTag('life');

      expect(quotes.map((q) => q.id.value)).toEqual(['c1', 'all-life']);
    });

    it('filters by several tags', async () => {
      const generator = create(neverDownload());
      generator.cache.cacheQuotes([makeQuote('c1', ['x']), makeQuote('c2', ['y']), makeQuote('c3', ['z'])]);

      const quotes = await generator.getAllQuotesWithTags(['x', 'y']);

      expect(quotes.map((q) => q.id.value)).toEqual(['c1', 'c2', 'all-multi']);
    });

    it('rejects a blank tag before downloading', async () => {
      const generator = create(neverDownload());
      const error = await captureQuoteErrorAsync(() => generator.getAllQuotesWithTag('  '));
      expect(error.code).toBe(QuoteErrorCode.INVALID_ARGUMENT);
      expect(downloader.allQuotesWithTag).not.toHaveBeenCalled();
    });
  });
});
