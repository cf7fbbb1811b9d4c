import { z } from 'zod';
import { CATEGORY_IDS } from '../../types/index.js';
import type { NewsletterContent } from '../../types/index.js';
import { sectionsByCategory, type RenderContext, type Renderer } from './index.js';
import { articleImageUrl } from './html.js';

const JsonArticleSchema = z.object({
    title: z.string(),
    url: z.string(),
    imageUrl: z.string().optional(),
    content: z.string(),
    popularityScore: z.number(),
});

const JsonCategorySchema = z.object({
    title: z.string(),
    emoji: z.string(),
    articles: z.array(JsonArticleSchema),
});

export const NewsletterJsonSchema = z.object({
    metadata: z.object({
        generatedAt: z.string(),
        issueDate: z.string(),
        totalArticles: z.number(),
        categories: z.array(z.enum(CATEGORY_IDS)),
        llmUsed: z.string(),
    }),
    intro: z.string(),
    categories: z.record(z.enum(CATEGORY_IDS), JsonCategorySchema),
    editorsTakes: z.array(z.object({
        title: z.string(),
        url: z.string(),
        take: z.string(),
    })),
});

export type NewsletterJson = z.infer<typeof NewsletterJsonSchema>;

export function toNewsletterJson(content: NewsletterContent, context: RenderContext): NewsletterJson {
    const sections = sectionsByCategory(content);
    const categories: NewsletterJson['categories'] = {};

    for (const section of sections) {
        categories[section.id] = {
            title: section.config.title,
            emoji: section.config.emoji,
            articles: section.entries.map(({ article, content: markdown }) => ({
                title: article.title,
                url: article.url,
                imageUrl: articleImageUrl(article),
                content: markdown,
                popularityScore: article.popularityScore,
            })),
        };
    }

    return {
        metadata: {
            generatedAt: content.generationInfo.timestamp,
            issueDate: context.date.toISOString().slice(0, 10),
            totalArticles: content.generationInfo.totalArticles,
            categories: sections.map(s => s.id),
            llmUsed: content.generationInfo.llmUsed,
        },
        intro: content.intro,
        categories,
        editorsTakes: content.editorsTakes.map(({ title, url, take }) => ({ title, url, take })),
    };
}

/**
 * Parse a file written by the JSON renderer. Throws a ZodError when the shape does not match.
 */
export function parseNewsletterJson(text: string): NewsletterJson {
    return NewsletterJsonSchema.parse(JSON.parse(text));
}

export class JsonRenderer implements Renderer {
    readonly format = 'json';
    readonly fileName = 'newsletter_premium.json';

    render(content: NewsletterContent, context: RenderContext): string {
        return JSON.stringify(toNewsletterJson(content, context), null, 2);
    }
}
