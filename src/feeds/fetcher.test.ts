import { describe, it, expect, vi, afterEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import { extractImage, fetchRSSArticles, fetchWithRetry, itemsFromXml, mapFeedItems } from './fetcher.js';
import type { FeedConfig, FetchResult, RawArticle } from '../types/index.js';
import { logger } from '../shared/logging.js';

vi.mock('../shared/logging.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    banner: vi.fn()
}));

const feed: FeedConfig = { url: 'https://example.com/feed', name: 'Example', category: 'tools' };

describe('mapFeedItems', () => {
    it('cleans links, trims titles and keeps images', () => {
        const articles = mapFeedItems(feed, [
            {
                title: '  Model release  ',
                link: 'https://example.com/a?utm_source=rss#top',
                isoDate: '2026-10-18T08:00:00.000Z',
                enclosure: { url: 'https://example.com/a.jpg', type: 'image/jpeg' }
            }
        ], 5);

        expect(articles).toEqual([{
            title: 'Model release',
            url: 'https://example.com/a',
            sourceCategory: 'tools',
            sourceFeed: 'https://example.com/feed',
            publishDate: new Date('2026-10-18T08:00:00.000Z'),
            imageUrl: 'https://example.com/a.jpg'
        }]);
    });

    it('keeps an unparseable date as the raw string', () => {
        const [article] = mapFeedItems(feed, [
            { title: 'Undated', link: 'https://example.com/b', pubDate: 'someday' }
        ], 5);
        expect(article.publishDate).toBe('someday');
        expect(article.imageUrl).toBeUndefined();
    });

    it('drops items without a title or an http link', () => {
        const articles = mapFeedItems(feed, [
            { link: 'https://example.com/no-title' },
            { title: 'Mail link', link: 'mailto:someone@example.com' },
            { title: 'Kept', link: 'https://example.com/kept' }
        ], 5);
        expect(articles.map(a => a.title)).toEqual(['Kept']);
    });

    it('only looks at the first `limit` items', () => {
        const items = ['one', 'two', 'three'].map(t => ({ title: t, link: `https://example.com/${t}` }));
        expect(mapFeedItems(feed, items, 2).map(a => a.title)).toEqual(['one', 'two']);
    });
});

describe('extractImage', () => {
    it('falls back from enclosure to media to inline img', () => {
        expect(extractImage({ 'media:content': { $: { url: 'https://example.com/m.jpg' } } })).toBe('https://example.com/m.jpg');
        expect(extractImage({ 'content:encoded': '<p><img class="hero" src="https://example.com/i.png"></p>' })).toBe('https://example.com/i.png');
        expect(extractImage({ enclosure: { url: 'https://example.com/a.mp3', type: 'audio/mpeg' } })).toBe('');
    });
});

describe('itemsFromXml', () => {
    it('reads RSS 2.0 items', () => {
        const parsed = {
            rss: {
                version: ['2.0'],
                channel: [{
                    title: ['Example'],
                    item: [{
                        title: ['First'],
                        link: ['https://example.com/first'],
                        pubDate: ['Sat, 17 Oct 2026 10:00:00 GMT'],
                        description: ['Short description']
                    }]
                }]
            }
        };

        expect(itemsFromXml(parsed)).toEqual([{
            title: 'First',
            link: 'https://example.com/first',
            pubDate: 'Sat, 17 Oct 2026 10:00:00 GMT',
            'content:encoded': 'Short description'
        }]);
    });

    it('reads Atom entries and picks the alternate link', () => {
        const parsed = {
            feed: {
                entry: [{
                    title: [{ _: 'Second', type: ['text'] }],
                    link: [
                        { href: ['https://example.com/second'], rel: ['alternate'] },
                        { href: ['https://example.com/second.atom'], rel: ['self'] }
                    ],
                    updated: ['2026-10-17T10:00:00Z'],
                    summary: ['Summary text']
                }]
            }
        };

        expect(itemsFromXml(parsed)).toEqual([{
            title: 'Second',
            link: 'https://example.com/second',
            isoDate: '2026-10-17T10:00:00Z',
            content: 'Summary text'
        }]);
    });

    it('returns nothing for unknown documents', () => {
        expect(itemsFromXml({ html: {} })).toEqual([]);
        expect(itemsFromXml(null)).toEqual([]);
    });
});

describe('fetchRSSArticles', () => {
    const article: RawArticle = {
        title: 'Agent framework release',
        url: 'https://example.com/agent',
        sourceCategory: 'tools',
        sourceFeed: 'https://example.com/feed'
    };

    it('collects successful feeds, skips failures and disabled feeds', async () => {
        const feeds: FeedConfig[] = [
            feed,
            { url: 'https://broken.example.com/feed', name: 'Broken', category: 'research' },
            { url: 'https://off.example.com/feed', name: 'Off', category: 'misc', enabled: false }
        ];
        const fetchFeed = vi.fn(async (f: FeedConfig): Promise<FetchResult> => f.name === 'Example'
            ? { status: 'ok', articles: [article], meta: { feed: f.name, fetchedRaw: 1, kept: 1, durationMs: 3 } }
            : { status: 'error', articles: [], error: { type: 'fetch', message: 'HTTP 500' }, meta: { feed: f.name, fetchedRaw: 0, kept: 0, durationMs: 3 } });
        const sleep = vi.fn(async () => undefined);

        const articles = await fetchRSSArticles(feeds, { articlesPerFeed: 5, delayMs: 2000, sleep, fetchFeed });

        expect(articles).toEqual([article]);
        expect(fetchFeed).toHaveBeenCalledTimes(2);
        expect(fetchFeed).toHaveBeenCalledWith(feed, 5);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(2000);
        expect(logger.error).toHaveBeenCalledWith('❌ Failed to fetch Broken: HTTP 500', {
            source: 'Broken',
            feed: 'https://broken.example.com/feed'
        });
    });

    it('carries on past a feed whose fetcher throws', async () => {
        const feeds: FeedConfig[] = [
            { url: 'https://flaky.example.com/feed', name: 'Flaky', category: 'industry' },
            feed
        ];
        const fetchFeed = vi.fn(async (f: FeedConfig): Promise<FetchResult> => {
            if (f.name === 'Flaky') throw new Error('ECONNRESET');
            return { status: 'ok', articles: [article], meta: { feed: f.name, fetchedRaw: 1, kept: 1, durationMs: 2 } };
        });

        const articles = await fetchRSSArticles(feeds, { articlesPerFeed: 5, delayMs: 0, sleep: async () => undefined, fetchFeed });

        expect(articles).toEqual([article]);
        expect(logger.error).toHaveBeenCalledWith('❌ Failed to fetch Flaky: ECONNRESET', {
            source: 'Flaky',
            feed: 'https://flaky.example.com/feed'
        });
    });
});

describe('fetchWithRetry', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('backs off through the given sleep and rethrows the last error', async () => {
        const get = vi.spyOn(axios, 'get').mockRejectedValue(new Error('socket hang up'));
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(fetchWithRetry('https://example.com/feed', {}, 3, sleep)).rejects.toThrow('socket hang up');
        expect(get).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map(c => c[0])).toEqual([500, 1000]);
    });

    it('does not retry client errors', async () => {
        const notFound = new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', undefined, undefined, {
            data: '',
            status: 404,
            statusText: 'Not Found',
            headers: {},
            config: { headers: new AxiosHeaders() }
        });
        const get = vi.spyOn(axios, 'get').mockRejectedValue(notFound);
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(fetchWithRetry('https://example.com/missing', {}, 3, sleep)).rejects.toBe(notFound);
        expect(get).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });
});
