import type { Article, CategoryId, SummaryStyle } from '../types/index.js';
import type { GenerationRequest, TextGenerator } from './types.js';
import {
    basicPrompt,
    editorialPrompt,
    editorsTakePrompt,
    introPrompt,
    rundownPrompt,
    EDITORIAL_TEXT_LIMIT,
    TAKE_TEXT_LIMIT
} from './prompts.js';
import { formatBasicSummary, formatEditorialSummary } from './formatter.js';
import { getCategoryConfig } from '../shared/categories.js';
import { logger } from '../shared/logging.js';

export const EDITORS_TAKE_MIN_SCORE = 50;

const SUMMARY_LENGTH = { maxLength: 120, minLength: 40 };
const TAKE_LENGTH = { maxLength: 80, minLength: 30 };

const TEMPERATURE = {
    summary: 0.7,
    take: 0.8,
    intro: 0.6,
} as const;

/**
 * Top categories by article count (ties keep first-seen order).
 */
export function topCategories(articles: Article[], limit = 3): Array<[CategoryId, number]> {
    const counts = new Map<CategoryId, number>();
    for (const article of articles) {
        counts.set(article.category, (counts.get(article.category) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function joinNames(names: string[]): string {
    if (names.length <= 1) return names[0] ?? 'AI';
    if (names.length === 2) return `${names[0]} and ${names[1]}`;
    return `${names.slice(0, -1).join(', ')}, and ${names[names.length - 1]}`;
}

export function primaryTheme(articles: Article[]): string {
    const titles = articles.slice(0, 5).map(a => a.title.toLowerCase()).join(' ');
    if (['funding', 'raises', 'investment'].some(w => titles.includes(w))) return 'major funding rounds';
    if (['model', 'llm', 'gpt'].some(w => titles.includes(w))) return 'breakthrough model releases';
    if (['tool', 'api', 'platform'].some(w => titles.includes(w))) return 'new developer tools';
    if (['research', 'study', 'paper'].some(w => titles.includes(w))) return 'cutting-edge research';
    return 'industry developments';
}

export function secondaryTheme(articles: Article[]): string {
    const titles = articles.map(a => a.title.toLowerCase()).join(' ');
    if (['partnership', 'acquisition', 'deal'].some(w => titles.includes(w))) return 'strategic partnerships';
    if (['open source', 'open-source'].some(w => titles.includes(w))) return 'open source innovations';
    if (['regulation', 'policy', 'government'].some(w => titles.includes(w))) return 'policy developments';
    return 'technical breakthroughs';
}

/**
 * Intro used when no backend answers.
 */
export function fallbackIntro(articles: Article[]): string {
    const count = articles.length;
    const intensity = count >= 8 ? 'packed' : count >= 5 ? 'busy' : 'focused';
    const names = topCategories(articles).map(([id]) => getCategoryConfig(id).title);

    return `It's a ${intensity} day in AI with ${count} key developments spanning ${joinNames(names)}.\n\n` +
        `From ${primaryTheme(articles)} to ${secondaryTheme(articles)}, today's digest captures the moves shaping AI's trajectory. ` +
        `Here's what developers, founders, and researchers need to know.`;
}

/**
 * Newsletter copy on top of a backend chain: article sections, editor's takes and the intro.
 */
export class Summarizer {
    constructor(private readonly generator: TextGenerator) {}

    private summaryRequest(article: Article, prompt: string): GenerationRequest {
        return {
            prompt,
            temperature: TEMPERATURE.summary,
            sourceText: article.text.substring(0, EDITORIAL_TEXT_LIMIT),
            ...SUMMARY_LENGTH,
        };
    }

    /**
     * Formatted section for one article, or null when no backend answered.
     */
    async summarizeArticle(article: Article, style: SummaryStyle): Promise<string | null> {
        logger.info(`🧠 Generating ${style} summary for: ${article.title}`);

        if (style === 'basic') {
            const raw = await this.generator.generate(this.summaryRequest(article, basicPrompt(article)));
            return raw ? formatBasicSummary(article, raw) : null;
        }

        const prompt = style === 'rundown' ? rundownPrompt(article) : editorialPrompt(article);
        const raw = await this.generator.generate(this.summaryRequest(article, prompt));
        return raw ? formatEditorialSummary(article, raw) : null;
    }

    /**
     * Short opinion for high-scoring stories; null below the score threshold.
     */
    async getEditorsTake(article: Article): Promise<string | null> {
        if (article.popularityScore < EDITORS_TAKE_MIN_SCORE) return null;

        logger.info(`✍️ Generating Editor's Take for: ${article.title}`);
        const take = await this.generator.generate({
            prompt: editorsTakePrompt(article),
            temperature: TEMPERATURE.take,
            sourceText: article.text.substring(0, TAKE_TEXT_LIMIT),
            ...TAKE_LENGTH,
        });
        if (!take) return null;

        // Extractive output is the article's own words; label it as the take
        return this.generator.lastUsed === 'transformer' ? `Editor's Take: ${take}` : take;
    }

    async generateIntro(articles: Article[]): Promise<string> {
        logger.info('✍️ Generating newsletter introduction...');
        const headlines = articles.slice(0, 5).map(a => a.title);
        const intro = await this.generator.generate({
            prompt: introPrompt(topCategories(articles), headlines),
            temperature: TEMPERATURE.intro,
        });
        return intro ?? fallbackIntro(articles);
    }
}
