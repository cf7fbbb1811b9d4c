import { AI_KEYWORDS } from '../shared/categories.js';

/**
 * Number of keywords from the list that occur in the text (case-insensitive substring,
 * each keyword counted once).
 */
export function countKeywordHits(text: string, keywords: readonly string[]): number {
    const t = text.toLowerCase();
    return keywords.filter(keyword => t.includes(keyword.toLowerCase())).length;
}

/**
 * AI relevance check. Two distinct keyword hits by default; pass minHits = 1 for the loose check.
 */
export function isAiRelated(text: string, minHits = 2): boolean {
    if (!text) return false;
    return countKeywordHits(text, AI_KEYWORDS) >= minHits;
}
