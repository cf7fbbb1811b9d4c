import type {
    Article,
    ArticleSummary,
    CategoryId,
    EditorsTake,
    NewsletterContent,
    SummaryStyle
} from '../types/index.js';
import type { Summarizer } from '../ai/summarizer.js';
import type { TextGenerator } from '../ai/types.js';
import { PipelineError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';
import { sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';

export type AssemblerDeps = {
    summarizer: Summarizer;
    /** The chain behind the summarizer; reports which backends answered */
    generator: Pick<TextGenerator, 'describeUsage'>;
    delayMs: number;
    sleep?: Sleep;
    now?: () => Date;
};

type ArticleResult = {
    summary: ArticleSummary;
    take: EditorsTake | null;
};

async function summarizeOne(article: Article, style: SummaryStyle, summarizer: Summarizer): Promise<ArticleResult | null> {
    const content = await summarizer.summarizeArticle(article, style);
    if (!content) {
        logger.warn(`⚠️ No summary for: ${article.title}`);
        return null;
    }
    const take = await summarizer.getEditorsTake(article);
    return {
        summary: { article, content },
        take: take ? { title: article.title, url: article.url, take } : null,
    };
}

/**
 * Group summaries by the category of the article each one carries, in first-seen order.
 */
export function categorizeSummaries(summaries: ArticleSummary[]): {
    categorized: Partial<Record<CategoryId, string[]>>;
    order: CategoryId[];
} {
    const categorized: Partial<Record<CategoryId, string[]>> = {};
    const order: CategoryId[] = [];
    for (const { article, content } of summaries) {
        const bucket = categorized[article.category];
        if (bucket) {
            bucket.push(content);
        } else {
            categorized[article.category] = [content];
            order.push(article.category);
        }
    }
    return { categorized, order };
}

/**
 * Summarize the curated articles one at a time and build the newsletter content.
 * An article whose summary or take fails is dropped from both; zero summaries is a pipeline error.
 */
export async function generateNewsletterContent(
    articles: Article[],
    style: SummaryStyle,
    deps: AssemblerDeps
): Promise<NewsletterContent> {
    const { summarizer, generator, delayMs } = deps;
    const sleep = deps.sleep ?? defaultSleep;
    const now = deps.now ?? (() => new Date());

    if (articles.length === 0) {
        throw new PipelineError('No articles to summarize');
    }

    logger.info(`📝 Summarizing ${articles.length} articles (${style} style)...`);

    const summaries: ArticleSummary[] = [];
    const editorsTakes: EditorsTake[] = [];

    for (let i = 0; i < articles.length; i++) {
        const article = articles[i];
        if (i > 0 && delayMs > 0) await sleep(delayMs);

        try {
            const result = await summarizeOne(article, style, summarizer);
            if (!result) continue;
            summaries.push(result.summary);
            if (result.take) editorsTakes.push(result.take);
        } catch (error) {
            logger.error(`❌ Error summarizing article ${article.title}: ${errorMessage(error)}`);
        }
    }

    if (summaries.length === 0) {
        throw new PipelineError(`No summaries generated for ${articles.length} articles`);
    }

    logger.info(`✅ Generated ${summaries.length} summaries and ${editorsTakes.length} editor's takes`);

    const intro = await summarizer.generateIntro(summaries.map(s => s.article));
    const { categorized, order } = categorizeSummaries(summaries);

    return {
        intro,
        summaries,
        editorsTakes,
        categorizedSummaries: categorized,
        articles,
        generationInfo: {
            llmUsed: generator.describeUsage(),
            timestamp: now().toISOString(),
            totalArticles: articles.length,
            categories: order,
        },
    };
}
