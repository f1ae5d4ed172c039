import { describe, it, expect, beforeEach } from 'vitest';
import { Possibility } from '../../core/random.js';
import { QuoteErrorCode } from '../../errors.js';
import type { ResourceResolver } from '../../resolvers/types.js';
import { TronaldDumpModelConverter } from '../../providers/tronald-dump/converter.js';
import { TronaldDumpDownloader, createTronaldDumpGenerator } from '../../providers/tronald-dump/generator.js';
import { QuoteSearchSchema } from '../../providers/tronald-dump/search.js';
import { TronaldDumpService } from '../../providers/tronald-dump/service.js';
import { FakeResolver, captureQuoteErrorAsync, scriptedRandom } from '../helpers.js';

const CREATED = '2016-11-20T01:30:00.000Z';

const author = {
  author_id: 'a1',
  name: 'Test Speaker',
  slug: 'test-speaker',
  bio: null,
  created_at: CREATED,
  updated_at: CREATED,
  _links: { self: { href: 'https://api.test/author/a1' } },
};

function source(id: string) {
  return {
    quote_source_id: id,
    url: `https://news.test/${id}`,
    filename: null,
    remarks: null,
    created_at: CREATED,
    updated_at: CREATED,
    _links: { self: { href: `https://api.test/quote-source/${id}` } },
  };
}

function quoteModel(id: string, sources = [source(`s-${id}`)]) {
  return {
    quote_id: id,
    value: `Said ${id}`,
    tags: ['Economy'],
    appeared_at: '2016-03-01T00:00:00.000Z',
    created_at: CREATED,
    updated_at: CREATED,
    _embedded: { author: [author], source: sources },
    _links: { self: { href: `https://api.test/quote/${id}` } },
  };
}

function results(ids: string[], total: number) {
  return { count: ids.length, total, _embedded: { quotes: ids.map((id) => quoteModel(id)) } };
}

function ids(prefix: string, from: number, to: number): string[] {
  const list: string[] = [];
  for (let i = from; i <= to; i++) list.push(`${prefix}${i}`);
  return list;
}

describe('tronald dump', () => {
  describe('TronaldDumpModelConverter', () => {
    const converter = new TronaldDumpModelConverter();

    it('converts a quote with its first source', () => {
      const quote = converter.convertQuoteModel(quoteModel('q1'));

      expect(quote.id.value).toBe('q1');
      expect(quote.value).toBe('Said q1');
      expect(quote.author).toBe('Donald Trump');
      expect(quote.source).toBe('https://news.test/s-q1');
      expect(quote.date?.toISOString()).toBe('2016-03-01T00:00:00.000Z');
      expect(quote.createdAt?.toISOString()).toBe(CREATED);
      expect(quote.tags).toEqual(['Economy']);
    });

    it('falls back to the quote link without sources', () => {
      expect(converter.convertQuoteModel(quoteModel('q2', [])).source).toBe('https://api.test/quote/q2');
    });

    it('counts pages of ten', () => {
      expect(converter.countPages({ total: 0 })).toBe(0);
      expect(converter.countPages({ total: 10 })).toBe(1);
      expect(converter.countPages({ total: 11 })).toBe(2);
    });

    it('builds the search query', () => {
      const search = QuoteSearchSchema.parse({ query: ['make', 'progress'], tag: 'Economy', page: 2 });
      expect(converter.getSearchQuery(search)).toBe('query=make+progress&tag=Economy&page=2');
      expect(converter.getSearchQuery(QuoteSearchSchema.parse({ tag: 'Economy' }))).toBe('tag=Economy');
    });

    it('enumerates a quote list', () => {
      const quotes = converter.enumerateQuotes(results(['q1', 'q2'], 2)._embedded);
      expect(quotes.map((quote) => quote.id.value)).toEqual(['q1', 'q2']);
    });
  });

  describe('TronaldDumpService', () => {
    let resolver: FakeResolver;
    let service: TronaldDumpService;

    beforeEach(() => {
      resolver = new FakeResolver();
      service = new TronaldDumpService({ resolver });
    });

    it('resolves single resources', async () => {
      resolver
        .on('random/quote', quoteModel('r1'))
        .on('quote/q1', quoteModel('q1'))
        .on('author/a1', author)
        .on('quote-source/s1', source('s1'))
        .on('tag/Economy', { value: 'Economy', created_at: CREATED, _links: { self: { href: 'https://api.test/tag/Economy' } } });

      expect((await service.getRandomQuote()).quote_id).toBe('r1');
      expect((await service.getQuote('q1')).value).toBe('Said q1');
      expect((await service.getAuthor('a1')).name).toBe('Test Speaker');
      expect((await service.getSource('s1')).url).toBe('https://news.test/s1');
      expect((await service.getTag('Economy')).value).toBe('Economy');
    });

    it('reports missing resources', async () => {
      const messages = [
        (await captureQuoteErrorAsync(() => service.getQuote('x'))).message,
        (await captureQuoteErrorAsync(() => service.getAuthor('x'))).message,
        (await captureQuoteErrorAsync(() => service.getSource('x'))).message,
        (await captureQuoteErrorAsync(() => service.getTag('x'))).message,
      ];

      expect(messages).toEqual([
        "Quote with id 'x' does not exist",
        "Quote author with id 'x' does not exist",
        "Quote source with id 'x' does not exist",
        "Unknown tag: 'x'",
      ]);
    });

    it('lists the available tags', async () => {
      resolver.on('tag', {
        count: 1,
        total: 1,
        _embedded: { tag: [{ value: 'Economy', created_at: CREATED, _links: { self: { href: 'https://api.test/tag/Economy' } } }] },
      });

      const tags = await service.getAvailableTags();

      expect(tags._embedded.tag.map((tag) => tag.value)).toEqual(['Economy']);
    });

    it('requires a query or a tag to search', async () => {
      const error = await captureQuoteErrorAsync(() => service.searchQuotes({}));

      expect(error.code).toBe(QuoteErrorCode.INVALID_ARGUMENT);
      expect(error.message).toBe('search either query or tag must be provided');
    });

    it('downloads the random meme as bytes', async () => {
      resolver.onBytes('random/meme', new Uint8Array([1, 2, 3]));

      expect(Array.from(await service.getRandomMeme())).toEqual([1, 2, 3]);
    });

    it('cannot download memes through a JSON-only resolver', async () => {
      const jsonOnly: ResourceResolver = {
        baseUrl: resolver.baseUrl,
        resolve: (path, schema) => resolver.resolve(path, schema),
        tryResolve: (path, schema) => resolver.tryResolve(path, schema),
      };

      const error = await captureQuoteErrorAsync(() => new TronaldDumpService({ resolver: jsonOnly }).getRandomMeme());

      expect(error.code).toBe(QuoteErrorCode.INVALID_OPERATION);
    });
  });

  describe('TronaldDumpDownloader', () => {
    let resolver: FakeResolver;

    beforeEach(() => {
      resolver = new FakeResolver();
    });

    function create(random = scriptedRandom(0)) {
      return new TronaldDumpDownloader(new TronaldDumpService({ resolver }), { random, concurrency: 2 });
    }

    it('picks a random page, then a random quote on it', async () => {
      resolver
        .on('search/quote?tag=Economy', results(ids('q', 1, 10), 25))
        .on('search/quote?tag=Economy&page=2', results(ids('q', 21, 25), 25));

      const quote = await create(scriptedRandom(2, 1)).randomQuoteWithTag('Economy');

      expect(quote?.id.value).toBe('q22');
      expect(resolver.requests).toEqual(['search/quote?tag=Economy', 'search/quote?tag=Economy&page=2']);
    });

    it('stays on the first page when it is picked', async () => {
      resolver.on('search/quote?tag=Economy', results(ids('q', 1, 10), 25));

      const quote = await create(scriptedRandom(0)).randomQuoteWithTag('Economy');

      expect(quote?.id.value).toBe('q1');
      expect(resolver.requests).toHaveLength(1);
    });

    it('returns null for a tag without quotes', async () => {
      resolver.on('search/quote?tag=Unused', { count: 0, total: 0, _embedded: { quotes: [] } });

      expect(await create().randomQuoteWithTag('Unused')).toBeNull();
      expect(await create().allQuotesWithTag('Unused')).toEqual([]);
    });

    it('reads every page of a tag', async () => {
      resolver
        .on('search/quote?tag=Economy', results(ids('q', 1, 10), 12))
        .on('search/quote?tag=Economy&page=1', results(ids('q', 11, 12), 12));

      const quotes = await create().allQuotesWithTag('Economy');

      expect(quotes.map((quote) => quote.id.value)).toEqual(ids('q', 1, 12));
    });

    it('does not enumerate the whole archive', async () => {
      const error = await captureQuoteErrorAsync(() => create().allQuotes());

      expect(error.code).toBe(QuoteErrorCode.INVALID_OPERATION);
      expect(error.message).toBe('tronald dump does not support quote enumeration');
    });
  });

  describe('generator', () => {
    it('serves tagged quotes and caches them', async () => {
      const resolver = new FakeResolver().on('search/quote?tag=Economy', results(['q1'], 1));
      const generator = createTronaldDumpGenerator({
        resolver,
        possibility: new Possibility(scriptedRandom(100)),
        random: scriptedRandom(0),
      });

      const quote = await generator.getRandomQuoteWithTag('Economy');

      expect(generator.apiName).toBe('tronald dump');
      expect(quote?.id.value).toBe('q1');
      expect(generator.cache.count).toBe(1);
    });
  });
});
