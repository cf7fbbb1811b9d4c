import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import { fetchWithRetry } from './fetcher.js';
import { PAGE_HEADERS, PAGE_TIMEOUT_MS } from './config.js';
import type { ExtractedContent } from '../types/index.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';
import { parseDate } from '../shared/time-utils.js';
import { resolveUrl } from '../shared/url-utils.js';

export type FetchHtml = (url: string) => Promise<string>;

const defaultFetchHtml: FetchHtml = (url) => fetchWithRetry<string>(url, {
    timeout: PAGE_TIMEOUT_MS,
    headers: PAGE_HEADERS,
    responseType: 'text'
}, 2);

function metaContent(document: Document, ...selectors: string[]): string {
    for (const selector of selectors) {
        const value = document.querySelector(selector)?.getAttribute('content')?.trim();
        if (value) return value;
    }
    return '';
}

function splitAuthors(byline: string): string[] {
    return byline
        .replace(/^by\s+/i, '')
        .split(/,|\band\b/)
        .map(a => a.trim())
        .filter(a => a);
}

/**
 * Main text and metadata of an article page. Returns null when no readable body is found.
 */
export function extractFromHtml(html: string, url: string): ExtractedContent | null {
    const dom = new JSDOM(html, { url });
    const document = dom.window.document;

    // Readability mutates the document, so read metadata first
    const image = metaContent(document, 'meta[property="og:image"]', 'meta[name="twitter:image"]');
    const published = metaContent(document, 'meta[property="article:published_time"]', 'meta[name="pubdate"]');
    const description = metaContent(document, 'meta[name="description"]', 'meta[property="og:description"]');
    const metaAuthor = metaContent(document, 'meta[name="author"]');

    const article = new Readability(document).parse();
    const text = (article?.textContent ?? '').replace(/\s+\n/g, '\n').trim();
    if (!text) return null;

    const result: ExtractedContent = { text };
    const imageUrl = image ? resolveUrl(image, url) : '';
    if (imageUrl) result.imageUrl = imageUrl;

    const authors = splitAuthors(article?.byline || metaAuthor);
    if (authors.length > 0) result.authors = authors;

    const publishDate = published ? parseDate(published) : null;
    if (publishDate) result.publishDate = publishDate;

    const metaDescription = description || article?.excerpt || '';
    if (metaDescription) result.metaDescription = metaDescription;

    return result;
}

export type ExtractOptions = {
    minLength: number;
    fetchHtml?: FetchHtml;
};

/**
 * Download and extract an article. Null when the page fails to load or the body is shorter
 * than `minLength` characters.
 */
export async function extractArticleContent(url: string, options: ExtractOptions): Promise<ExtractedContent | null> {
    const fetchHtml = options.fetchHtml ?? defaultFetchHtml;
    try {
        const html = await fetchHtml(url);
        const content = extractFromHtml(html, url);
        if (!content || content.text.length < options.minLength) {
            logger.debug(`⏭️  Skipping - content too short (${content?.text.length ?? 0} chars)`, { url });
            return null;
        }
        return content;
    } catch (err) {
        const error = new SourceError(url, errorMessage(err), { cause: err });
        logger.error(`❌ Failed to extract content from ${url}: ${error.message}`, { source: error.source });
        return null;
    }
}
