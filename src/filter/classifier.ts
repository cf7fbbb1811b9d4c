import { Article, CATEGORY_IDS, CategoryId } from '../types/index.js';
import { CATEGORIES } from '../shared/categories.js';
import { countKeywordHits } from './relevance.js';

export const KEYWORD_WEIGHT = 10;
export const SOURCE_WEIGHT = 20;

type Classifiable = Pick<Article, 'title' | 'text' | 'url'>;

/**
 * Per-category match score: 10 per keyword found in title + text, 20 per source found in the URL.
 */
export function scoreCategories(article: Classifiable): Record<CategoryId, number> {
    const content = `${article.title || ''} ${article.text || ''}`;
    const url = (article.url || '').toLowerCase();

    const score = (id: CategoryId): number => {
        const config = CATEGORIES[id];
        const sourceHits = config.sources.filter(source => url.includes(source.toLowerCase())).length;
        return countKeywordHits(content, config.keywords) * KEYWORD_WEIGHT + sourceHits * SOURCE_WEIGHT;
    };

    return {
        research: score('research'),
        tools: score('tools'),
        industry: score('industry'),
        'use-case': score('use-case'),
        misc: score('misc'),
    };
}

/**
 * Best-matching category. Ties go to the category declared first; no match at all is 'misc'.
 */
export function categorizeArticle(article: Classifiable): CategoryId {
    const scores = scoreCategories(article);
    let best: CategoryId = 'misc';
    let bestScore = 0;
    for (const id of CATEGORY_IDS) {
        if (scores[id] > bestScore) {
            best = id;
            bestScore = scores[id];
        }
    }
    return best;
}
