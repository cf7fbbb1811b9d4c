/**
 * Popularity scoring: a weighted sum of engagement, keyword relevance, recency,
 * source credibility and body length. Never negative.
 */

import { Article } from '../types/index.js';
import { AI_KEYWORDS, CREDIBLE_SOURCES, HIGH_IMPACT_KEYWORDS } from '../shared/categories.js';
import { getHost } from '../shared/url-utils.js';
import { hoursBetween, parseDate } from '../shared/time-utils.js';
import { countKeywordHits } from './relevance.js';

export const SCORE_WEIGHTS = {
    upvote: 0.3,
    comment: 0.2,
    share: 0.25,
    highImpactKeyword: 15,
    aiKeyword: 5,
    credibleSource: 10,
    unparseableDate: -5,
} as const;

// [max age in hours, bonus], checked in order
const RECENCY_BONUS: ReadonlyArray<readonly [number, number]> = [
    [24, 25],
    [48, 15],
    [72, 5],
];

type Scorable = Pick<Article, 'title' | 'text' | 'url' | 'publishDate' | 'upvotes' | 'comments' | 'shares'>;

export function recencyBonus(publishDate: Article['publishDate'], now: Date): number {
    if (publishDate === undefined) return 0;
    const published = parseDate(publishDate);
    if (!published) return SCORE_WEIGHTS.unparseableDate;

    const hoursOld = hoursBetween(published, now);
    for (const [maxHours, bonus] of RECENCY_BONUS) {
        if (hoursOld <= maxHours) return bonus;
    }
    return 0;
}

export function lengthBonus(text: string): number {
    const length = (text || '').length;
    if (length > 1000) return 10;
    if (length > 500) return 5;
    return 0;
}

export function isCredibleSource(url: string): boolean {
    const host = getHost(url);
    return host !== '' && CREDIBLE_SOURCES.some(domain => host.includes(domain));
}

export function calculatePopularityScore(article: Scorable, now: Date = new Date()): number {
    let score = 0;

    // Engagement (Hacker News and friends)
    score += (article.upvotes ?? 0) * SCORE_WEIGHTS.upvote;
    score += (article.comments ?? 0) * SCORE_WEIGHTS.comment;
    score += (article.shares ?? 0) * SCORE_WEIGHTS.share;

    const content = `${article.title || ''} ${article.text || ''}`;
    score += countKeywordHits(content, HIGH_IMPACT_KEYWORDS) * SCORE_WEIGHTS.highImpactKeyword;
    score += countKeywordHits(content, AI_KEYWORDS) * SCORE_WEIGHTS.aiKeyword;

    score += recencyBonus(article.publishDate, now);

    if (isCredibleSource(article.url)) {
        score += SCORE_WEIGHTS.credibleSource;
    }

    score += lengthBonus(article.text);

    return Math.max(0, score);
}
