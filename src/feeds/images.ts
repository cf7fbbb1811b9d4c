/**
 * Picks one image per article: the extracted top image, the best reachable candidate on the
 * page, an arXiv placeholder, or the category placeholder. Candidates are checked with a HEAD
 * request; placeholders are not.
 */

import axios from 'axios';
import { JSDOM } from 'jsdom';
import { fetchWithRetry } from './fetcher.js';
import { PAGE_HEADERS } from './config.js';
import type { Article, ImageInfo, ImageSource } from '../types/index.js';
import { getCategoryConfig } from '../shared/categories.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';
import { resolveUrl } from '../shared/url-utils.js';
import { sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';
import type { FetchHtml } from './extractor.js';

const LOGO_INDICATORS = ['logo', 'icon', 'favicon', 'brand', 'header', 'nav', 'avatar', 'profile', 'thumb', 'badge', 'button'];
const ARTICLE_INDICATORS = ['article', 'post', 'content', 'story', 'news', 'featured', 'hero', 'main', 'cover'];
const TECH_TERMS = ['ai', 'tech', 'robot', 'computer', 'data', 'digital'];

const IMAGE_TIMEOUT_MS = 10000;
const IMAGE_DELAY_MS = 500;
const MAX_PAGE_CANDIDATES = 3;

export type ImageSize = { width: number; height: number };

type Candidate = { url: string; score: number; source: ImageSource };

export function isLogoOrIcon(imageUrl: string, size?: ImageSize): boolean {
    const url = imageUrl.toLowerCase();
    if (LOGO_INDICATORS.some(indicator => url.includes(indicator))) return true;
    if (size) {
        if (size.width < 200 || size.height < 150) return true;
        if (size.width === size.height && size.width < 400) return true;
    }
    return false;
}

/**
 * Relevance of an image for an article. Tech terms in the URL only count when there is a title.
 */
export function scoreImage(imageUrl: string, size?: ImageSize, title = ''): number {
    const url = imageUrl.toLowerCase();
    let score = 0;

    if (isLogoOrIcon(imageUrl, size)) score -= 50;
    if (ARTICLE_INDICATORS.some(indicator => url.includes(indicator))) score += 20;

    if (size) {
        if (size.width > size.height && size.width >= 400) score += 15;
        if (size.width >= 600 && size.width <= 1200 && size.height >= 300 && size.height <= 800) score += 10;
    }

    if (title && TECH_TERMS.some(term => url.includes(term))) score += 10;

    return score;
}

function readSize(img: Element): ImageSize | undefined {
    const width = parseInt(img.getAttribute('width') || '', 10);
    const height = parseInt(img.getAttribute('height') || '', 10);
    return Number.isFinite(width) && Number.isFinite(height) ? { width, height } : undefined;
}

/**
 * Images on a page, best first: og:image and twitter:image always compete, content
 * images only with a positive score. Equal scores keep page order.
 */
export function rankPageImages(html: string, pageUrl: string, title = ''): Candidate[] {
    const document = new JSDOM(html).window.document;
    const candidates: Candidate[] = [];

    const metaImages: Array<[string, ImageSource]> = [
        ['meta[property="og:image"]', 'og:image'],
        ['meta[name="twitter:image"]', 'twitter:image'],
    ];
    for (const [selector, source] of metaImages) {
        const content = document.querySelector(selector)?.getAttribute('content')?.trim();
        const url = content ? resolveUrl(content, pageUrl) : '';
        if (url) candidates.push({ url, score: scoreImage(url, undefined, title), source });
    }

    for (const img of Array.from(document.querySelectorAll('img'))) {
        const src = img.getAttribute('src')?.trim();
        if (!src || src.startsWith('data:')) continue;
        const url = resolveUrl(src, pageUrl);
        if (!url) continue;
        const score = scoreImage(url, readSize(img), title);
        if (score > 0) candidates.push({ url, score, source: 'content' });
    }

    const unique = new Map<string, Candidate>();
    for (const candidate of candidates) {
        if (!unique.has(candidate.url)) unique.set(candidate.url, candidate);
    }
    return [...unique.values()].sort((a, b) => b.score - a.score);
}

export function arxivPlaceholder(url: string): string | null {
    const match = url.match(/arxiv\.org\/abs\/(\d+\.\d+)/);
    return match ? `https://via.placeholder.com/600x400/4285f4/ffffff?text=arXiv+${match[1]}` : null;
}

export function categoryPlaceholder(article: Pick<Article, 'category'>): string {
    const config = getCategoryConfig(article.category);
    const label = `${config.emoji} ${config.title}`.replace(/\s+/g, '+');
    return `https://via.placeholder.com/600x300/${config.color}/ffffff?text=${label}`;
}

const defaultFetchHtml: FetchHtml = (url) => fetchWithRetry<string>(url, {
    timeout: IMAGE_TIMEOUT_MS,
    headers: PAGE_HEADERS,
    responseType: 'text'
}, 1);

/** Whether an image URL answers with an image */
export type ImageCheck = (url: string) => Promise<boolean>;

export const isImageReachable: ImageCheck = async (url) => {
    try {
        const response = await axios.head(url, {
            timeout: IMAGE_TIMEOUT_MS,
            headers: PAGE_HEADERS,
            maxRedirects: 5,
        });
        const contentType = String(response.headers['content-type'] ?? '');
        return contentType === '' || contentType.startsWith('image/');
    } catch (err) {
        logger.debug(`Image not reachable: ${url} (${errorMessage(err)})`);
        return false;
    }
};

export type ImageOptions = {
    fetchHtml?: FetchHtml;
    isReachable?: ImageCheck;
    sleep?: Sleep;
};

export async function selectArticleImage(article: Article, options: ImageOptions = {}): Promise<ImageInfo> {
    const fetchHtml = options.fetchHtml ?? defaultFetchHtml;
    const isReachable = options.isReachable ?? isImageReachable;

    if (article.imageUrl && !isLogoOrIcon(article.imageUrl)) {
        if (await isReachable(article.imageUrl)) {
            return { url: article.imageUrl, source: 'article' };
        }
        logger.debug(`Extracted image unreachable, trying the page: ${article.imageUrl}`);
    }

    try {
        const html = await fetchHtml(article.url);
        for (const candidate of rankPageImages(html, article.url, article.title).slice(0, MAX_PAGE_CANDIDATES)) {
            if (await isReachable(candidate.url)) {
                logger.debug(`Selected image with score ${candidate.score} from ${candidate.source}`);
                return { url: candidate.url, source: candidate.source };
            }
        }
    } catch (err) {
        logger.warn(`⚠️ Error extracting page image from ${article.url}: ${errorMessage(err)}`);
    }

    const arxiv = arxivPlaceholder(article.url);
    if (arxiv) return { url: arxiv, source: 'arxiv' };

    return { url: categoryPlaceholder(article), source: 'fallback' };
}

/**
 * Attach `imageInfo` to each article (and point `imageUrl` at the chosen image).
 * Returns the number of articles processed.
 */
export async function fetchArticleImages(articles: Article[], options: ImageOptions = {}): Promise<number> {
    const sleep = options.sleep ?? defaultSleep;
    logger.info(`🎨 Processing images for ${articles.length} articles...`);

    for (let i = 0; i < articles.length; i++) {
        const article = articles[i];
        logger.debug(`🖼️ Fetching image for: ${article.title}`);
        const info = await selectArticleImage(article, options);
        article.imageInfo = info;
        article.imageUrl = info.url;
        if (i < articles.length - 1) await sleep(IMAGE_DELAY_MS);
    }

    logger.info('✅ Completed image processing');
    return articles.length;
}
