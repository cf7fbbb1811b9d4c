import type { Article, CategoryId } from '../types/index.js';
import { getCategoryConfig } from '../shared/categories.js';

const EDITORIAL_PROMPT = `You edit a daily AI newsletter for developers, founders and researchers. Readers are technical and short on time.

ARTICLE
Title: {title}
URL: {url}
Category: {category}
Popularity score: {score}

Content:
{text}

Write one newsletter section in exactly this shape:

## {emoji} **<headline, at most 60 characters>**

**The Rundown:** <one sentence with the core news>

• <key detail, with a number if the article has one>
• <impact or implication>
• <context>

**Why it matters:** <two or three sentences on what this changes for people building with AI>

[👉 Read more]({url})

---

Be concrete. Prefer numbers and names over adjectives. No marketing language.`;

const RUNDOWN_PROMPT = `Summarize this AI news story as a short newsletter section.

Use this shape:
## <catchy headline>
**The Rundown:** <one bold summary sentence>
• <emoji> <detail>
• <emoji> <detail>
• <emoji> <detail>
**Why it matters:** <one short paragraph>
[👉 Read more]({url})

Sound like a sharp human editor.

Title: {title}
URL: {url}
Article:
{text}`;

const BASIC_PROMPT = `Summarize this AI article for a tech newsletter in two or three sentences, then add one or two sentences on why it matters to the AI community.

Title: {title}
Content:
{text}

Format:
**{title}**

<summary>

**Why it matters:** <significance>

[Read more]({url})`;

const EDITORS_TAKE_PROMPT = `You are a seasoned AI industry analyst. Give your take on this story in two or three sentences: what it really means, one implication others may miss, and where it sits in the wider AI landscape.

Article: {title}
Content:
{text}

Confident and specific. Output only the take, with no heading or formatting.`;

const INTRO_PROMPT = `Write the opening of today's AI newsletter for busy developers, founders and researchers.

Top categories today: {categories}

Top headlines:
{headlines}

Two or three sentences, under 75 words. Lead with the most important development or trend, say why it matters to a technical audience, and give readers a reason to keep going. No generic newsletter filler.`;

export const EDITORIAL_TEXT_LIMIT = 2000;
export const TAKE_TEXT_LIMIT = 1500;

function fill(template: string, values: Record<string, string>): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

function excerpt(text: string, limit: number): string {
    return text.length > limit ? `${text.substring(0, limit)}...` : text;
}

export function editorialPrompt(article: Article): string {
    const category = getCategoryConfig(article.category);
    return fill(EDITORIAL_PROMPT, {
        title: article.title,
        url: article.url,
        category: category.title,
        emoji: category.emoji,
        score: String(article.popularityScore),
        text: excerpt(article.text, EDITORIAL_TEXT_LIMIT),
    });
}

export function rundownPrompt(article: Article): string {
    return fill(RUNDOWN_PROMPT, {
        title: article.title,
        url: article.url,
        text: excerpt(article.text, EDITORIAL_TEXT_LIMIT),
    });
}

export function basicPrompt(article: Article): string {
    return fill(BASIC_PROMPT, {
        title: article.title,
        url: article.url,
        text: excerpt(article.text, TAKE_TEXT_LIMIT),
    });
}

export function editorsTakePrompt(article: Article): string {
    return fill(EDITORS_TAKE_PROMPT, {
        title: article.title,
        text: excerpt(article.text, TAKE_TEXT_LIMIT),
    });
}

export function introPrompt(topCategories: Array<[CategoryId, number]>, headlines: string[]): string {
    return fill(INTRO_PROMPT, {
        categories: topCategories
            .map(([id, count]) => `${getCategoryConfig(id).title} (${count} ${count === 1 ? 'story' : 'stories'})`)
            .join(', '),
        headlines: headlines.map(h => `• ${h}`).join('\n'),
    });
}
