import { describe, it, expect, vi } from 'vitest';
import { fetchHackerNewsArticles, storyToArticle, type HttpGet } from './hackernews.js';
import { logger } from '../shared/logging.js';

vi.mock('../shared/logging.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    banner: vi.fn()
}));

const BASE = 'https://hn.example.com/v0';

function fakeApi(stories: Record<number, unknown>, top: unknown = Object.keys(stories).map(Number)): HttpGet {
    return async (url) => {
        if (url === `${BASE}/topstories.json`) return top;
        const match = url.match(/\/item\/(\d+)\.json$/);
        if (match && match[1] in stories) return stories[Number(match[1])];
        throw new Error(`unexpected url ${url}`);
    };
}

describe('storyToArticle', () => {
    it('maps score, comments and time', () => {
        expect(storyToArticle({
            id: 1,
            title: 'OpenAI ships a new GPT model',
            url: 'https://example.com/gpt',
            score: 120,
            descendants: 45,
            time: 1792324800
        })).toEqual({
            title: 'OpenAI ships a new GPT model',
            url: 'https://example.com/gpt',
            sourceCategory: 'misc',
            sourceFeed: 'hackernews',
            upvotes: 120,
            comments: 45,
            publishDate: new Date(1792324800 * 1000)
        });
    });

    it('rejects stories that are not about AI or have no link', () => {
        expect(storyToArticle({ id: 2, title: 'Show HN: My garden', url: 'https://example.com/g' })).toBeNull();
        expect(storyToArticle({ id: 3, title: 'Ask HN: GPT or Claude for LLM work?' })).toBeNull();
        expect(storyToArticle(null)).toBeNull();
    });
});

describe('fetchHackerNewsArticles', () => {
    it('keeps AI stories and skips broken items', async () => {
        const httpGet = vi.fn(fakeApi({
            10: { id: 10, title: 'Anthropic releases Claude update', url: 'https://example.com/claude', score: 300, descendants: 80, time: 1792324800 },
            11: { id: 11, title: 'Rust 2.0 is out', url: 'https://example.com/rust', score: 500 },
            12: 'not a story',
            13: null
        }));
        const sleep = vi.fn(async () => undefined);

        const articles = await fetchHackerNewsArticles({ baseUrl: BASE, httpGet, sleep });

        expect(articles.map(a => a.url)).toEqual(['https://example.com/claude']);
        expect(articles[0].upvotes).toBe(300);
        expect(sleep).toHaveBeenCalledTimes(4);
        expect(sleep).toHaveBeenCalledWith(100);
        expect(logger.error).toHaveBeenCalledWith(
            expect.stringContaining('❌ Error fetching HN story 12:'),
            { source: 'hackernews', id: 12 }
        );
    });

    it('only looks at the first 20 top stories', async () => {
        const ids = Array.from({ length: 60 }, (_, i) => i + 1);
        const stories: Record<number, unknown> = {};
        for (const id of ids) stories[id] = { id, title: 'Plain story', url: `https://example.com/${id}` };
        const httpGet = vi.fn(fakeApi(stories, ids));

        await fetchHackerNewsArticles({ baseUrl: BASE, httpGet, sleep: async () => undefined });

        // topstories + 20 items
        expect(httpGet).toHaveBeenCalledTimes(21);
        expect(httpGet).toHaveBeenLastCalledWith(`${BASE}/item/20.json`, { timeout: 10000 });
    });

    it('returns nothing when the top stories request fails', async () => {
        const httpGet: HttpGet = async () => {
            throw new Error('network down');
        };
        await expect(fetchHackerNewsArticles({ baseUrl: BASE, httpGet, sleep: async () => undefined })).resolves.toEqual([]);
        expect(logger.error).toHaveBeenCalledWith('❌ Error fetching from Hacker News: network down', { source: 'hackernews' });
    });
});
