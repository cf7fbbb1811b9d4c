import { describe, it, expect } from 'vitest';
import { formatBasicSummary, formatEditorialSummary, parseSections, truncateHeadline, whyItMatters } from './formatter.js';
import type { Article } from '../types/index.js';

function makeArticle(overrides: Partial<Article> = {}): Article {
    return {
        title: 'Startup raises $40M to build AI agents for hospitals',
        url: 'https://example.com/agents',
        text: '',
        sourceCategory: 'industry',
        sourceFeed: 'https://example.com/feed',
        category: 'industry',
        popularityScore: 55,
        ...overrides
    };
}

const INDUSTRY_FUNDING_WHY = 'This industry move signals broader market trends that could impact AI funding, partnerships, ' +
    'and strategic decisions for founders and companies. The funding landscape provides signals about which AI ' +
    'approaches investors see as most promising.';

describe('whyItMatters', () => {
    it('adds the first matching title insight', () => {
        expect(whyItMatters('industry', 'Startup raises $40M')).toBe(INDUSTRY_FUNDING_WHY);
        expect(whyItMatters('misc', 'Weekend reading')).toBe(
            'This development highlights emerging trends in the AI ecosystem that could influence future technology decisions.'
        );
    });
});

describe('truncateHeadline', () => {
    it('cuts titles longer than 55 characters', () => {
        expect(truncateHeadline('A very long headline about a new open source model that keeps going on'))
            .toBe('A very long headline about a new open source model that...');
        expect(truncateHeadline('Short title')).toBe('Short title');
    });
});

describe('formatEditorialSummary', () => {
    it('builds every section from a plain summary', () => {
        const raw = 'The company closed a $40M round led by two funds. It will hire engineers in Berlin. ' +
            'Hospitals in three states already use the product. Revenue doubled last year.';

        expect(formatEditorialSummary(makeArticle(), raw)).toBe([
            '## 📢 **Startup raises $40M to build AI agents for hospitals**',
            '',
            '**The Rundown:** The company closed a $40M round led by two funds.',
            '',
            '• It will hire engineers in Berlin.',
            '• Hospitals in three states already use the product.',
            '• Revenue doubled last year.',
            '',
            `**Why it matters:** ${INDUSTRY_FUNDING_WHY}`,
            '',
            '[👉 Read more](https://example.com/agents)',
            '',
            '---'
        ].join('\n'));
    });

    it('adds a context bullet for short summaries and truncates long headlines', () => {
        const article = makeArticle({
            title: 'A very long headline about a new open source model that keeps going on',
            category: 'research'
        });

        const section = formatEditorialSummary(article, 'Short text here');

        expect(section.split('\n').slice(0, 5)).toEqual([
            '## 🧠 **A very long headline about a new open source model that...**',
            '',
            '**The Rundown:** Short text here.',
            '',
            '• Significant development in research'
        ]);
        expect(section).toContain('Open source developments often accelerate innovation');
    });

    it('keeps the sections of structured output but always links the article', () => {
        const raw = [
            '## 🧠 **Agents get hospital contracts**',
            '',
            '**The Rundown:** A startup raised $40M for clinical agents.',
            '',
            '• 🚀 Round led by two funds',
            '• 🏥 Live in three states',
            '',
            '**Why it matters:** Clinical AI is moving from pilots to contracts.',
            '',
            '[👉 Read more](https://wrong.example.com)',
            '',
            '---'
        ].join('\n');

        expect(formatEditorialSummary(makeArticle(), raw)).toBe([
            '## 📢 **Agents get hospital contracts**',
            '',
            '**The Rundown:** A startup raised $40M for clinical agents.',
            '',
            '• 🚀 Round led by two funds',
            '• 🏥 Live in three states',
            '',
            '**Why it matters:** Clinical AI is moving from pilots to contracts.',
            '',
            '[👉 Read more](https://example.com/agents)',
            '',
            '---'
        ].join('\n'));
    });

    it('always ends with the read-more link and a rule', () => {
        const section = formatEditorialSummary(makeArticle(), '');
        expect(section.endsWith('[👉 Read more](https://example.com/agents)\n\n---')).toBe(true);
    });
});

describe('parseSections', () => {
    it('collects multi-line why-it-matters paragraphs', () => {
        const parsed = parseSections('**Why it matters:** First line.\nSecond line.\n\n[Read more](https://example.com)');
        expect(parsed.whyItMatters).toBe('First line. Second line.');
        expect(parsed.body).toBe('');
    });
});

describe('formatBasicSummary', () => {
    it('keeps the summary and why-it-matters from the response', () => {
        const raw = '**Some title**\n\nSummary sentence one. Two.\n\n**Why it matters:** Big deal.\n\n[Read more](https://example.com/x)';

        expect(formatBasicSummary(makeArticle(), raw)).toBe([
            '**Startup raises $40M to build AI agents for hospitals**',
            '',
            'Summary sentence one. Two.',
            '',
            '**Why it matters:** Big deal.',
            '',
            '[Read more](https://example.com/agents)'
        ].join('\n'));
    });
});
