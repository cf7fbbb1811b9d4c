import axios from 'axios';
import { z } from 'zod';
import { HACKER_NEWS_ITEM_DELAY_MS, HACKER_NEWS_SCAN_LIMIT, HACKER_NEWS_TOP_LIMIT } from './config.js';
import type { RawArticle } from '../types/index.js';
import { isAiRelated } from '../filter/relevance.js';
import { cleanArticleUrl } from '../shared/url-utils.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';
import { sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';

export type HttpGet = (url: string, options: { timeout: number }) => Promise<unknown>;

const defaultGet: HttpGet = async (url, options) => {
    const response = await axios.get<unknown>(url, { timeout: options.timeout });
    return response.data;
};

const TopStoriesSchema = z.array(z.number().int());

// Deleted or dead items come back as null or without title/url
const StorySchema = z.object({
    id: z.number(),
    title: z.string().optional(),
    url: z.string().optional(),
    score: z.number().optional(),
    descendants: z.number().optional(),
    time: z.number().optional(),
}).nullable();

export type HackerNewsOptions = {
    baseUrl: string;
    httpGet?: HttpGet;
    sleep?: Sleep;
    timeoutMs?: number;
};

export function storyToArticle(story: z.infer<typeof StorySchema>): RawArticle | null {
    if (!story?.title || !story.url) return null;
    const url = cleanArticleUrl(story.url);
    if (!url || !isAiRelated(story.title)) return null;

    return {
        title: story.title,
        url,
        sourceCategory: 'misc',
        sourceFeed: 'hackernews',
        upvotes: story.score ?? 0,
        comments: story.descendants ?? 0,
        publishDate: new Date((story.time ?? 0) * 1000),
    };
}

/**
 * AI-related stories among the first few Hacker News top stories.
 * A failing item is skipped; a failing top-stories request yields no articles.
 */
export async function fetchHackerNewsArticles(options: HackerNewsOptions): Promise<RawArticle[]> {
    const httpGet = options.httpGet ?? defaultGet;
    const sleep = options.sleep ?? defaultSleep;
    const timeout = options.timeoutMs ?? 10000;
    const articles: RawArticle[] = [];

    logger.info('🔥 Fetching from Hacker News...');

    let storyIds: number[];
    try {
        const top = TopStoriesSchema.parse(await httpGet(`${options.baseUrl}/topstories.json`, { timeout }));
        storyIds = top.slice(0, HACKER_NEWS_TOP_LIMIT).slice(0, HACKER_NEWS_SCAN_LIMIT);
    } catch (err) {
        const error = new SourceError('hackernews', errorMessage(err), { cause: err });
        logger.error(`❌ Error fetching from Hacker News: ${error.message}`, { source: error.source });
        return articles;
    }

    for (const id of storyIds) {
        try {
            const story = StorySchema.parse(await httpGet(`${options.baseUrl}/item/${id}.json`, { timeout }));
            const article = storyToArticle(story);
            if (article) articles.push(article);
        } catch (err) {
            const error = new SourceError('hackernews', errorMessage(err), { cause: err });
            logger.error(`❌ Error fetching HN story ${id}: ${error.message}`, { source: error.source, id });
        }
        await sleep(HACKER_NEWS_ITEM_DELAY_MS);
    }

    logger.info(`✅ Fetched ${articles.length} articles from Hacker News`);
    return articles;
}
