import Parser from 'rss-parser';
import axios, { AxiosError, type AxiosRequestConfig } from 'axios';
import * as xml2js from 'xml2js';
import { BROWSER_HEADERS, RSS_TIMEOUT_MS } from './config.js';
import type { FeedConfig, FetchResult, RawArticle, RawRSSItem, RSSMediaContent } from '../types/index.js';
import { cleanArticleUrl } from '../shared/url-utils.js';
import { parseDate, sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';

function createParser(timeout: number, headers: Record<string, string>): Parser<Record<string, unknown>, RawRSSItem> {
    return new Parser<Record<string, unknown>, RawRSSItem>({
        timeout,
        headers,
        customFields: {
            item: ['media:content', 'media:thumbnail', 'content:encoded']
        }
    });
}

// Shared RSS parser instance for feeds without their own timeout/headers
const rssParser = createParser(RSS_TIMEOUT_MS, BROWSER_HEADERS);

export async function fetchWithRetry<T>(
    url: string,
    options: AxiosRequestConfig,
    attempts = 3,
    sleep: Sleep = defaultSleep
): Promise<T> {
    let lastError: unknown;
    for (let i = 0; i < attempts; i++) {
        try {
            const response = await axios.get<T>(url, options);
            return response.data;
        } catch (err) {
            lastError = err;
            const status = err instanceof AxiosError ? err.response?.status : undefined;
            if (status && status >= 400 && status < 500) {
                // 4xx errors are non-retriable
                throw err;
            }
            // For timeouts or 5xx, retry with exponential backoff
            if (i < attempts - 1) {
                await sleep(500 * Math.pow(2, i));
            }
        }
    }
    throw lastError;
}

// =============================================================================
// ITEM NORMALIZATION
// =============================================================================

function mediaUrl(node: RSSMediaContent | RSSMediaContent[] | undefined): string {
    const first = Array.isArray(node) ? node[0] : node;
    if (!first) return '';
    return first.url || first.$?.url || '';
}

export function extractImage(item: RawRSSItem): string {
    if (item.enclosure?.url && (!item.enclosure.type || item.enclosure.type.startsWith('image/'))) {
        return item.enclosure.url;
    }
    const media = mediaUrl(item['media:content']) || mediaUrl(item['media:thumbnail']);
    if (media) return media;

    const content = item['content:encoded'] || item.content || '';
    const match = content.match(/<img[^>]+src="([^"]+)"/i);
    return match ? match[1] : '';
}

function toPublishDate(item: RawRSSItem): Date | string | undefined {
    const raw = item.isoDate || item.pubDate;
    if (!raw) return undefined;
    return parseDate(raw) ?? raw;
}

/**
 * Convert parsed feed items to raw articles: first `limit` entries, valid http(s) links only.
 */
export function mapFeedItems(feed: FeedConfig, items: RawRSSItem[], limit: number): RawArticle[] {
    const articles: RawArticle[] = [];
    for (const item of items.slice(0, limit)) {
        const url = cleanArticleUrl(item.link || item.guid || '');
        const title = (item.title || '').trim();
        if (!url || !title) {
            logger.debug(`[${feed.name}] Skipping item without title or valid link`, { title });
            continue;
        }
        const imageUrl = extractImage(item);
        articles.push({
            title,
            url,
            sourceCategory: feed.category,
            sourceFeed: feed.url,
            publishDate: toPublishDate(item),
            ...(imageUrl ? { imageUrl } : {})
        });
    }
    return articles;
}

// =============================================================================
// FALLBACK XML PARSING
// =============================================================================

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// xml2js wraps everything in arrays and puts text in `_` when a node has attributes
function xmlText(value: unknown): string {
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') return first.trim();
    if (isXmlNode(first)) {
        if (typeof first._ === 'string') return first._.trim();
        const href = xmlText(first.href);
        if (href) return href;
    }
    return '';
}

function xmlList(value: unknown): XmlNode[] {
    return Array.isArray(value) ? value.filter(isXmlNode) : [];
}

function atomLink(entry: XmlNode): string {
    const links = xmlList(entry.link);
    const alternate = links.find(l => !l.rel || xmlText(l.rel) === 'alternate');
    return alternate ? xmlText(alternate.href) : xmlText(entry.link);
}

/**
 * Map the output of xml2js (`mergeAttrs: true`) for RSS 2.0 or Atom into feed items.
 */
export function itemsFromXml(parsed: unknown): RawRSSItem[] {
    if (!isXmlNode(parsed)) return [];

    if (isXmlNode(parsed.rss)) {
        const channel = xmlList(parsed.rss.channel)[0];
        return xmlList(channel?.item).map(raw => ({
            title: xmlText(raw.title),
            link: xmlText(raw.link) || xmlText(raw.guid),
            pubDate: xmlText(raw.pubDate),
            'content:encoded': xmlText(raw['content:encoded']) || xmlText(raw.description)
        }));
    }

    if (isXmlNode(parsed.feed)) {
        return xmlList(parsed.feed.entry).map(raw => ({
            title: xmlText(raw.title),
            link: atomLink(raw),
            isoDate: xmlText(raw.published) || xmlText(raw.updated),
            content: xmlText(raw.content) || xmlText(raw.summary)
        }));
    }

    return [];
}

async function parseManually(feed: FeedConfig): Promise<RawRSSItem[]> {
    const body = await fetchWithRetry<string>(feed.url, {
        timeout: feed.timeout ?? 15000,
        headers: { ...BROWSER_HEADERS, ...feed.headers },
        responseType: 'text'
    });
    const parsed: unknown = await xml2js.parseStringPromise(body, { mergeAttrs: true });
    return itemsFromXml(parsed);
}

// =============================================================================
// FEED FETCHING
// =============================================================================

export async function fetchRSSFeed(feed: FeedConfig, limit: number): Promise<FetchResult> {
    const start = Date.now();
    let items: RawRSSItem[];

    try {
        // First try with rss-parser
        const parser = feed.headers || feed.timeout
            ? createParser(feed.timeout ?? RSS_TIMEOUT_MS, { ...BROWSER_HEADERS, ...feed.headers })
            : rssParser;
        const parsed = await parser.parseURL(feed.url);
        items = parsed.items;
    } catch (parserError) {
        logger.debug(`[${feed.name}] rss-parser failed, trying manual XML parse`, { error: errorMessage(parserError) });
        try {
            items = await parseManually(feed);
        } catch (fallbackError) {
            const httpStatus = fallbackError instanceof AxiosError ? fallbackError.response?.status : undefined;
            return {
                status: 'error',
                articles: [],
                error: {
                    type: 'fetch',
                    message: `RSS Parser failed: ${errorMessage(parserError)}. Manual parse failed: ${errorMessage(fallbackError)}`,
                    httpStatus
                },
                meta: { feed: feed.name, fetchedRaw: 0, kept: 0, durationMs: Date.now() - start }
            };
        }
    }

    const articles = mapFeedItems(feed, items, limit);
    return {
        status: 'ok',
        articles,
        meta: { feed: feed.name, fetchedRaw: items.length, kept: articles.length, durationMs: Date.now() - start }
    };
}

export type RSSFetchOptions = {
    articlesPerFeed: number;
    delayMs: number;
    sleep?: Sleep;
    fetchFeed?: (feed: FeedConfig, limit: number) => Promise<FetchResult>;
};

/**
 * Fetch every enabled feed in sequence with a fixed delay between feeds.
 * A failing feed, whether it reports an error result or throws, is logged and skipped.
 */
export async function fetchRSSArticles(feeds: FeedConfig[], options: RSSFetchOptions): Promise<RawArticle[]> {
    const sleep = options.sleep ?? defaultSleep;
    const fetchFeed = options.fetchFeed ?? fetchRSSFeed;
    const enabled = feeds.filter(f => f.enabled !== false);
    const articles: RawArticle[] = [];

    logger.info(`🔍 Fetching articles from ${enabled.length} RSS feeds...`);

    for (let i = 0; i < enabled.length; i++) {
        const feed = enabled[i];
        logger.info(`📡 [${feed.category}] ${feed.name}`);
        try {
            const result = await fetchFeed(feed, options.articlesPerFeed);
            if (result.status !== 'ok') {
                throw new SourceError(feed.name, result.error?.message ?? 'unknown error', { cause: result.error });
            }
            articles.push(...result.articles);
            logger.debug(`   ${result.meta.kept}/${result.meta.fetchedRaw} items kept in ${result.meta.durationMs}ms`);
        } catch (err) {
            const error = err instanceof SourceError ? err : new SourceError(feed.name, errorMessage(err), { cause: err });
            logger.error(`❌ Failed to fetch ${feed.name}: ${error.message}`, { source: error.source, feed: feed.url });
        }

        if (i < enabled.length - 1) {
            await sleep(options.delayMs);
        }
    }

    logger.info(`✅ Fetched ${articles.length} articles from RSS feeds`);
    return articles;
}
