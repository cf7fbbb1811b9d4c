/**
 * Editorial section formatting.
 *
 * LLM output that already follows the section layout keeps its parts; anything missing
 * (or a plain extractive summary) is filled in from the text, the title and the category.
 */

import type { Article, CategoryId } from '../types/index.js';
import { getCategoryConfig } from '../shared/categories.js';
import { splitSentences } from './backends/local-model.js';

export const HEADLINE_MAX = 55;
export const MAX_BULLETS = 3;

const CATEGORY_INSIGHTS: Record<CategoryId, string> = {
    research: 'This research could influence future AI model development and provide insights for developers building next-generation applications.',
    tools: 'This tool development could streamline AI workflows and provide new capabilities for developers and researchers in their projects.',
    industry: 'This industry move signals broader market trends that could impact AI funding, partnerships, and strategic decisions for founders and companies.',
    'use-case': 'This application demonstrates practical AI implementation strategies that developers can adapt for their own use cases.',
    misc: 'This development highlights emerging trends in the AI ecosystem that could influence future technology decisions.',
};

// First matching group wins
const TITLE_INSIGHTS: Array<[string[], string]> = [
    [['funding', 'investment', 'raises'], 'The funding landscape provides signals about which AI approaches investors see as most promising.'],
    [['open source', 'open-source'], 'Open source developments often accelerate innovation and provide accessible alternatives for developers.'],
    [['model', 'llm', 'ai'], 'Model improvements directly impact the capabilities available to AI practitioners and researchers.'],
];

const BASIC_INSIGHT = 'This development has significant implications for the AI community and could influence future research and applications.';

export type ParsedSections = {
    headline?: string;
    rundown?: string;
    bullets: string[];
    whyItMatters?: string;
    /** Text left over once the recognized sections are removed */
    body: string;
};

export function truncateHeadline(title: string): string {
    return title.length > HEADLINE_MAX ? `${title.substring(0, HEADLINE_MAX)}...` : title;
}

export function whyItMatters(category: CategoryId, title: string): string {
    const lower = title.toLowerCase();
    const match = TITLE_INSIGHTS.find(([words]) => words.some(w => lower.includes(w)));
    return match ? `${CATEGORY_INSIGHTS[category]} ${match[1]}` : CATEGORY_INSIGHTS[category];
}

function cleanInline(text: string): string {
    return text.replace(/\*\*/g, '').trim();
}

function withPeriod(sentence: string): string {
    return /[.!?…]$/.test(sentence) ? sentence : `${sentence}.`;
}

/**
 * Pull the headline, rundown, bullets and why-it-matters out of markdown-ish LLM output.
 */
export function parseSections(raw: string): ParsedSections {
    const sections: ParsedSections = { bullets: [], body: '' };
    const bodyLines: string[] = [];
    let inWhy = false;

    for (const line of raw.split('\n')) {
        const trimmed = line.trim();

        const heading = trimmed.match(/^#{1,6}\s+(.+)$/);
        const rundown = trimmed.match(/^\*\*The Rundown:?\*\*:?\s*(.*)$/i);
        const why = trimmed.match(/^\*\*Why it matters:?\*\*:?\s*(.*)$/i);
        const bullet = trimmed.match(/^(?:[•\-]|\*(?!\*))\s+(.+)$/);
        const boldLine = trimmed.match(/^\*\*([^*]+)\*\*$/);
        const isLink = /^\[[^\]]*(?:read more)[^\]]*\]\([^)]*\)$/i.test(trimmed);

        if (why) {
            inWhy = true;
            sections.whyItMatters = why[1].trim();
            continue;
        }
        if (heading || rundown || bullet || boldLine || isLink || trimmed === '---') {
            inWhy = false;
        }
        if (heading) {
            // Drop a leading category emoji and bold markers
            const headline = cleanInline(heading[1]).replace(/^[^\p{L}\p{N}"'“]+/u, '').trim();
            if (headline && !sections.headline) sections.headline = headline;
        } else if (rundown) {
            if (rundown[1].trim()) sections.rundown = cleanInline(rundown[1]);
        } else if (bullet) {
            sections.bullets.push(cleanInline(bullet[1]));
        } else if (boldLine) {
            // A bold line on its own is a title
            if (!sections.headline) sections.headline = boldLine[1].trim();
        } else if (isLink || trimmed === '---') {
            continue;
        } else if (inWhy && trimmed) {
            sections.whyItMatters = `${sections.whyItMatters ?? ''} ${trimmed}`.trim();
        } else if (trimmed) {
            bodyLines.push(trimmed);
        }
    }

    if (sections.whyItMatters === '') delete sections.whyItMatters;
    sections.body = bodyLines.join(' ');
    return sections;
}

/**
 * The editorial section for one article, always in the same order and always ending with the
 * article's read-more link.
 */
export function formatEditorialSummary(article: Article, raw: string): string {
    const category = getCategoryConfig(article.category);
    const parsed = parseSections(raw);
    const sentences = splitSentences(parsed.body);

    const headline = parsed.headline ?? truncateHeadline(article.title);
    const rundown = parsed.rundown ?? (sentences.length > 0 ? withPeriod(sentences[0]) : withPeriod(article.title));

    let bullets: string[];
    if (parsed.bullets.length > 0) {
        bullets = parsed.bullets.slice(0, MAX_BULLETS);
    } else {
        const rest = parsed.rundown ? sentences : sentences.slice(1);
        bullets = rest.slice(0, MAX_BULLETS).filter(s => s.length > 10).map(withPeriod);
        if (sentences.length <= 2) {
            bullets.push(`Significant development in ${category.title.toLowerCase()}`);
        }
    }

    const why = parsed.whyItMatters ?? whyItMatters(article.category, article.title);

    return [
        `## ${category.emoji} **${headline}**`,
        '',
        `**The Rundown:** ${rundown}`,
        '',
        bullets.map(b => `• ${b}`).join('\n'),
        '',
        `**Why it matters:** ${why}`,
        '',
        `[👉 Read more](${article.url})`,
        '',
        '---',
    ].join('\n');
}

export function formatBasicSummary(article: Article, raw: string): string {
    const parsed = parseSections(raw);
    const summary = [parsed.rundown, parsed.body].filter(part => part).join(' ') || article.title;

    return [
        `**${article.title}**`,
        '',
        summary,
        '',
        `**Why it matters:** ${parsed.whyItMatters ?? BASIC_INSIGHT}`,
        '',
        `[Read more](${article.url})`,
    ].join('\n');
}
