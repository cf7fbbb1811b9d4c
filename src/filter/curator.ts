import { Article, CategoryId } from '../types/index.js';
import { logger } from '../shared/logging.js';

export type CurationOptions = {
    maxPerCategory: number;
    maxArticles?: number;
};

const byScoreDesc = (a: Article, b: Article) => b.popularityScore - a.popularityScore;

/**
 * Top articles per category, then globally by score.
 *
 * Sorts by score, keeps the first `maxPerCategory` of each category, re-sorts the union and
 * truncates to `maxArticles`. Categories without articles contribute nothing; there is no
 * per-category minimum. The input array is left untouched.
 */
export function curateTopArticles(articles: Article[], options: CurationOptions): Article[] {
    const sorted = [...articles].sort(byScoreDesc);

    const grouped = new Map<CategoryId, Article[]>();
    for (const article of sorted) {
        const bucket = grouped.get(article.category) ?? [];
        bucket.push(article);
        grouped.set(article.category, bucket);
    }

    const curated: Article[] = [];
    for (const [category, bucket] of grouped) {
        const top = bucket.slice(0, Math.max(0, options.maxPerCategory));
        curated.push(...top);
        logger.debug(`📊 ${category}: ${top.length} articles selected`);
    }

    curated.sort(byScoreDesc);

    const limited = options.maxArticles !== undefined ? curated.slice(0, Math.max(0, options.maxArticles)) : curated;
    logger.info(`🏆 Curated ${limited.length} top articles`);
    return limited;
}
