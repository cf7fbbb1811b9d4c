import { describe, it, expect, vi } from 'vitest';
import { Summarizer, fallbackIntro, topCategories } from './summarizer.js';
import type { BackendName, GenerationRequest, TextGenerator } from './types.js';
import type { Article, CategoryId } from '../types/index.js';

vi.mock('../shared/logging.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

class FakeGenerator implements TextGenerator {
    lastUsed: BackendName | null = null;
    readonly requests: GenerationRequest[] = [];

    constructor(private readonly answer: string | null, private readonly backend: BackendName = 'openai') {}

    async generate(request: GenerationRequest): Promise<string | null> {
        this.requests.push(request);
        if (this.answer !== null) this.lastUsed = this.backend;
        return this.answer;
    }

    describeUsage(): string {
        return this.lastUsed ?? 'none';
    }
}

function makeArticle(title: string, category: CategoryId, popularityScore = 60): Article {
    return {
        title,
        url: `https://example.com/${encodeURIComponent(title)}`,
        text: 'x'.repeat(2500),
        sourceCategory: category,
        sourceFeed: 'https://example.com/feed',
        category,
        popularityScore
    };
}

describe('Summarizer.getEditorsTake', () => {
    it('skips articles scoring below 50', async () => {
        const generator = new FakeGenerator('A take.');
        const take = await new Summarizer(generator).getEditorsTake(makeArticle('Quiet week', 'misc', 49));

        expect(take).toBeNull();
        expect(generator.requests).toHaveLength(0);
    });

    it('returns the model take unchanged for prompt-following backends', async () => {
        const generator = new FakeGenerator('Watch the pricing.');
        const take = await new Summarizer(generator).getEditorsTake(makeArticle('Big launch', 'tools', 50));

        expect(take).toBe('Watch the pricing.');
        expect(generator.requests[0].temperature).toBe(0.8);
        expect(generator.requests[0].sourceText).toHaveLength(1500);
        expect(generator.requests[0].maxLength).toBe(80);
        expect(generator.requests[0].minLength).toBe(30);
    });

    it('labels extractive takes', async () => {
        const generator = new FakeGenerator('The lab shipped it.', 'transformer');
        const take = await new Summarizer(generator).getEditorsTake(makeArticle('Big launch', 'tools'));

        expect(take).toBe("Editor's Take: The lab shipped it.");
    });
});

describe('Summarizer.summarizeArticle', () => {
    it('returns null when no backend answers', async () => {
        const summary = await new Summarizer(new FakeGenerator(null)).summarizeArticle(makeArticle('Big launch', 'tools'), 'editorial');
        expect(summary).toBeNull();
    });

    it('formats basic summaries and sends the first 2000 characters', async () => {
        const generator = new FakeGenerator('It shipped.\n\n**Why it matters:** Speed.');
        const summary = await new Summarizer(generator).summarizeArticle(makeArticle('Big launch', 'tools'), 'basic');

        expect(summary).toBe([
            '**Big launch**',
            '',
            'It shipped.',
            '',
            '**Why it matters:** Speed.',
            '',
            '[Read more](https://example.com/Big%20launch)'
        ].join('\n'));
        expect(generator.requests[0].sourceText).toHaveLength(2000);
        expect(generator.requests[0].temperature).toBe(0.7);
    });

    it('uses the rundown prompt for the rundown style', async () => {
        const generator = new FakeGenerator('It shipped today.');
        const summary = await new Summarizer(generator).summarizeArticle(makeArticle('Big launch', 'tools'), 'rundown');

        expect(generator.requests[0].prompt.startsWith('Summarize this AI news story as a short newsletter section.')).toBe(true);
        expect(summary?.startsWith('## ⚙️ **Big launch**')).toBe(true);
    });
});

describe('topCategories', () => {
    it('counts categories and keeps first-seen order on ties', () => {
        const articles = [
            makeArticle('a', 'tools'),
            makeArticle('b', 'research'),
            makeArticle('c', 'research'),
            makeArticle('d', 'industry'),
            makeArticle('e', 'misc')
        ];
        expect(topCategories(articles)).toEqual([['research', 2], ['tools', 1], ['industry', 1]]);
    });
});

describe('Summarizer.generateIntro', () => {
    it('uses the backend answer when there is one', async () => {
        const generator = new FakeGenerator('Agents everywhere today.');
        const intro = await new Summarizer(generator).generateIntro([makeArticle('Agents ship', 'tools')]);

        expect(intro).toBe('Agents everywhere today.');
        expect(generator.requests[0].temperature).toBe(0.6);
        expect(generator.requests[0].sourceText).toBeUndefined();
        expect(generator.requests[0].prompt).toContain('Top categories today: Tools (1 story)');
        expect(generator.requests[0].prompt).toContain('• Agents ship');
    });

    it('falls back to a deterministic intro', async () => {
        const articles = [
            makeArticle('Startup raises seed round', 'industry'),
            makeArticle('New agent framework', 'tools'),
            makeArticle('Lab signs partnership deal', 'industry')
        ];

        const intro = await new Summarizer(new FakeGenerator(null)).generateIntro(articles);

        expect(intro).toBe(fallbackIntro(articles));
        expect(intro).toBe(
            "It's a focused day in AI with 3 key developments spanning Industry and Tools.\n\n" +
            "From major funding rounds to strategic partnerships, today's digest captures the moves shaping AI's trajectory. " +
            "Here's what developers, founders, and researchers need to know."
        );
    });

    it('calls eight or more stories a packed day', () => {
        const articles = Array.from({ length: 8 }, (_, i) => makeArticle(`Story ${i}`, 'misc'));
        expect(fallbackIntro(articles).startsWith("It's a packed day in AI with 8 key developments spanning Quick Hits.")).toBe(true);
    });
});
