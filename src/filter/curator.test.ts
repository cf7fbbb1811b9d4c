import { describe, it, expect } from 'vitest';
import { curateTopArticles } from './curator.js';
import { Article, CategoryId } from '../types/index.js';

function createArticle(title: string, category: CategoryId, popularityScore: number): Article {
    return {
        title,
        url: `https://example.com/${title.toLowerCase().replace(/\s+/g, '-')}`,
        text: '',
        sourceCategory: category,
        sourceFeed: 'test',
        category,
        popularityScore,
    };
}

describe('curateTopArticles', () => {
    const articles = [
        createArticle('Research A', 'research', 90),
        createArticle('Research B', 'research', 60),
        createArticle('Tools A', 'tools', 45),
        createArticle('Industry A', 'industry', 30),
        createArticle('Tools B', 'tools', 10),
    ];

    it('keeps the best article of each category up to the overall max', () => {
        const curated = curateTopArticles(articles, { maxPerCategory: 1, maxArticles: 3 });
        expect(curated.map(a => a.title)).toEqual(['Research A', 'Tools A', 'Industry A']);
        expect(curated.map(a => a.popularityScore)).toEqual([90, 45, 30]);
    });

    it('never exceeds the per-category cap', () => {
        const many = [
            ...Array.from({ length: 6 }, (_, i) => createArticle(`Research ${i}`, 'research', 100 - i)),
            ...Array.from({ length: 3 }, (_, i) => createArticle(`Misc ${i}`, 'misc', 20 - i)),
        ];
        const curated = curateTopArticles(many, { maxPerCategory: 2, maxArticles: 10 });
        expect(curated.filter(a => a.category === 'research')).toHaveLength(2);
        expect(curated.filter(a => a.category === 'misc')).toHaveLength(2);
        expect(curated).toHaveLength(4);
    });

    it('never exceeds the overall maximum and stays in descending order', () => {
        const curated = curateTopArticles(articles, { maxPerCategory: 5, maxArticles: 2 });
        expect(curated.map(a => a.popularityScore)).toEqual([90, 60]);
    });

    it('returns everything within caps when no overall maximum is given', () => {
        const curated = curateTopArticles(articles, { maxPerCategory: 5 });
        expect(curated.map(a => a.popularityScore)).toEqual([90, 60, 45, 30, 10]);
    });

    it('does not reorder the input', () => {
        const input = [createArticle('Low', 'misc', 1), createArticle('High', 'misc', 99)];
        curateTopArticles(input, { maxPerCategory: 1 });
        expect(input.map(a => a.title)).toEqual(['Low', 'High']);
    });

    it('handles an empty list', () => {
        expect(curateTopArticles([], { maxPerCategory: 3, maxArticles: 5 })).toEqual([]);
    });
});
