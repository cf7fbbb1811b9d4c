/**
 * Article Pipeline
 *
 * 1. fetchRSSArticles() / fetchHackerNewsArticles()  - raw articles from every source
 * 2. dedupeArticles()                                - one entry per normalized URL
 * 3. processArticles()                               - age check, extraction, relevance,
 *                                                      scoring, categorization
 * 4. curateTopArticles()                             - best per category, then overall
 */

import type { Article, ExtractedContent, FeedConfig, RawArticle } from '../types/index.js';
import type { PipelineConfig } from '../shared/config.js';
import { RSS_FEEDS } from './config.js';
import { fetchRSSArticles, type RSSFetchOptions } from './fetcher.js';
import { fetchHackerNewsArticles, type HttpGet } from './hackernews.js';
import { extractArticleContent } from './extractor.js';
import { isAiRelated } from '../filter/relevance.js';
import { calculatePopularityScore } from '../filter/scorer.js';
import { categorizeArticle } from '../filter/classifier.js';
import { curateTopArticles } from '../filter/curator.js';
import { normalizeUrlForDedupe } from '../shared/url-utils.js';
import { hoursBetween, parseDate, sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';

export type ExtractFn = (url: string) => Promise<ExtractedContent | null>;

export type ProcessOptions = {
    maxAgeHours: number;
    delayMs: number;
    extract: ExtractFn;
    now?: Date;
    sleep?: Sleep;
};

/**
 * Articles without a usable publish date are treated as recent.
 */
export function isRecentArticle(publishDate: Article['publishDate'], maxAgeHours: number, now: Date): boolean {
    if (publishDate === undefined) return true;
    const published = parseDate(publishDate);
    if (!published) return true;
    return hoursBetween(published, now) <= maxAgeHours;
}

/**
 * Keep the first occurrence of each article URL (tracking parameters and fragments ignored).
 */
export function dedupeArticles<T extends Pick<RawArticle, 'url'>>(articles: T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const article of articles) {
        const key = normalizeUrlForDedupe(article.url);
        if (!key || seen.has(key)) continue;
        seen.add(key);
        unique.push(article);
    }
    return unique;
}

// Extracted values take precedence; feed values remain where extraction found nothing
export function mergeArticle(raw: RawArticle, content: ExtractedContent): Omit<Article, 'category' | 'popularityScore'> {
    return {
        ...raw,
        text: content.text,
        imageUrl: content.imageUrl || raw.imageUrl,
        publishDate: content.publishDate ?? raw.publishDate,
        ...(content.authors ? { authors: content.authors } : {}),
        ...(content.metaDescription ? { metaDescription: content.metaDescription } : {}),
    };
}

/**
 * Turn raw articles into scored, categorized articles. An article that fails any step is
 * skipped; nothing here throws.
 */
export async function processArticles(raw: RawArticle[], options: ProcessOptions): Promise<Article[]> {
    const now = options.now ?? new Date();
    const sleep = options.sleep ?? defaultSleep;
    const processed: Article[] = [];

    logger.info('🔄 Processing articles...');

    for (const item of raw) {
        try {
            logger.debug(`🔗 Processing: ${item.title}`);

            if (!isRecentArticle(item.publishDate, options.maxAgeHours, now)) {
                logger.debug('⏭️  Skipping - too old');
                continue;
            }

            const content = await options.extract(item.url);
            if (!content) continue;

            const merged = mergeArticle(item, content);
            if (!isAiRelated(`${merged.title} ${merged.text}`)) {
                logger.debug('⏭️  Skipping - not AI-related');
                continue;
            }

            const article: Article = {
                ...merged,
                popularityScore: calculatePopularityScore(merged, now),
                category: categorizeArticle(merged),
            };
            processed.push(article);
            logger.info(`✅ Added article (score: ${article.popularityScore}, category: ${article.category})`);

            await sleep(options.delayMs);
        } catch (err) {
            logger.error(`❌ Error processing article ${item.title || 'Unknown'}: ${errorMessage(err)}`);
        }
    }

    logger.info(`🎯 Processed ${processed.length} AI-related articles`);
    return processed;
}

export type PipelineDeps = {
    feeds?: FeedConfig[];
    fetchRss?: (feeds: FeedConfig[], options: RSSFetchOptions) => Promise<RawArticle[]>;
    fetchHackerNews?: () => Promise<RawArticle[]>;
    httpGet?: HttpGet;
    extract?: ExtractFn;
    now?: Date;
    sleep?: Sleep;
};

/**
 * Fetch every source, process and curate. `maxArticles` overrides the configured limit.
 */
export async function fetchAndFilterArticles(
    config: PipelineConfig,
    deps: PipelineDeps = {},
    maxArticles: number = config.maxArticles
): Promise<Article[]> {
    logger.info('🚀 Starting article fetching...');
    const sleep = deps.sleep ?? defaultSleep;

    const fetchRss = deps.fetchRss ?? fetchRSSArticles;
    const rssArticles = await fetchRss(deps.feeds ?? RSS_FEEDS, {
        articlesPerFeed: config.articlesPerFeed,
        delayMs: config.delayBetweenRequestsMs,
        sleep
    });

    const hnArticles = deps.fetchHackerNews
        ? await deps.fetchHackerNews()
        : await fetchHackerNewsArticles({ baseUrl: config.hackerNewsUrl, httpGet: deps.httpGet, sleep });

    const unique = dedupeArticles([...rssArticles, ...hnArticles]);
    logger.info(`📰 ${unique.length} unique articles from ${rssArticles.length + hnArticles.length} fetched`);

    const processed = await processArticles(unique, {
        maxAgeHours: config.maxArticleAgeHours,
        delayMs: config.delayBetweenRequestsMs,
        extract: deps.extract ?? (url => extractArticleContent(url, { minLength: config.minArticleLength })),
        now: deps.now,
        sleep
    });

    const curated = curateTopArticles(processed, {
        maxPerCategory: config.maxArticlesPerCategory,
        maxArticles
    });

    logger.info(`🎉 Final selection: ${curated.length} articles`);
    return curated;
}
