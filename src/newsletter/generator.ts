/**
 * End-to-end generation: fetch and curate articles, pick images, write summaries,
 * render every format. Sending is a separate step so a failed send never touches the files.
 */

import type {
    Article,
    GenerationResult,
    GenerationStats,
    NewsletterContent,
    OutputFiles,
    SummaryStyle
} from '../types/index.js';
import type { AppConfig } from '../shared/config.js';
import { fetchAndFilterArticles, type PipelineDeps } from '../feeds/pipeline.js';
import { fetchArticleImages, type ImageOptions } from '../feeds/images.js';
import { createBackendProvider, type BackendProvider } from '../ai/ai-provider.js';
import { Summarizer } from '../ai/summarizer.js';
import { generateNewsletterContent } from './assembler.js';
import { saveAllFormats, type Renderer } from './render/index.js';
import { MarkdownRenderer } from './render/markdown.js';
import { PremiumHtmlRenderer } from './render/html.js';
import { EmailHtmlRenderer } from './render/email-html.js';
import { TemplateHtmlRenderer } from './render/template-html.js';
import { JsonRenderer } from './render/json.js';
import { sendNewsletterEmail, type DeliveryOptions } from '../delivery/email.js';
import { getCategoryConfig } from '../shared/categories.js';
import { PipelineError, errorMessage } from '../shared/errors.js';
import { banner, logger } from '../shared/logging.js';
import type { Sleep } from '../shared/time-utils.js';

export type GenerateOptions = {
    maxArticles?: number;
    style?: SummaryStyle;
    outputDir?: string;
    fetchImages?: boolean;
};

export type GeneratorDeps = {
    /** Built from `config.llm` when absent */
    provider?: BackendProvider;
    fetchArticles?: (maxArticles: number) => Promise<Article[]>;
    pipeline?: PipelineDeps;
    images?: ImageOptions;
    renderers?: Renderer[];
    sleep?: Sleep;
    now?: () => Date;
};

export function createDefaultRenderers(templatePath: string): Renderer[] {
    return [
        new PremiumHtmlRenderer(),
        new EmailHtmlRenderer(),
        TemplateHtmlRenderer.fromFile(templatePath),
        new MarkdownRenderer(),
        new JsonRenderer(),
    ];
}

export function computeStats(articles: Article[], content: NewsletterContent): GenerationStats {
    return {
        totalArticles: articles.length,
        summariesGenerated: content.summaries.length,
        editorsTakes: content.editorsTakes.length,
        categories: new Set(articles.map(a => a.category)).size,
        imagesProcessed: articles.filter(a => a.imageInfo).length,
    };
}

/**
 * Run the whole generation. Throws a PipelineError when no articles survive curation or
 * nothing could be summarized.
 */
export async function generateEnhancedNewsletter(
    config: AppConfig,
    options: GenerateOptions = {},
    deps: GeneratorDeps = {}
): Promise<GenerationResult> {
    const now = deps.now ?? (() => new Date());
    const maxArticles = options.maxArticles ?? config.pipeline.maxArticles;
    const style = options.style ?? 'editorial';
    const outputDir = options.outputDir ?? config.outputDir;

    logger.info('🚀 Starting AI newsletter generation...');

    // Step 1: articles
    logger.info('📰 Fetching AI articles from multiple sources...');
    const articles = deps.fetchArticles
        ? await deps.fetchArticles(maxArticles)
        : await fetchAndFilterArticles(config.pipeline, { sleep: deps.sleep, now: now(), ...deps.pipeline }, maxArticles);

    if (articles.length === 0) {
        throw new PipelineError('No AI articles found');
    }
    logger.info(`✅ Found ${articles.length} AI articles`);

    // Step 2: images
    if (options.fetchImages ?? true) {
        logger.info('🖼️ Fetching images for articles...');
        await fetchArticleImages(articles, { sleep: deps.sleep, ...deps.images });
    }

    // Step 3: summaries
    const provider = deps.provider ?? createBackendProvider(config.llm);
    const content = await generateNewsletterContent(articles, style, {
        summarizer: new Summarizer(provider.chain),
        generator: provider.chain,
        delayMs: config.pipeline.delayBetweenSummariesMs,
        sleep: deps.sleep,
        now,
    });
    provider.usage.log('LLM');

    logger.info(`📊 Content generated using: ${content.generationInfo.llmUsed}`);
    logger.info(`📊 Categories covered: ${content.generationInfo.categories.join(', ')}`);

    // Step 4: files
    const files = saveAllFormats(content, {
        outputDir,
        renderers: deps.renderers ?? createDefaultRenderers(config.templatePath),
        now,
    });

    const result: GenerationResult = {
        content,
        articles,
        files,
        timestamp: now().toISOString(),
        stats: computeStats(articles, content),
    };

    logger.info('🎉 Newsletter generation completed successfully!');
    return result;
}

/**
 * The file to email: the inline-styled version, else the premium page.
 */
export function pickEmailFile(files: OutputFiles): string | undefined {
    return files.emailHtml ?? files.premiumHtml;
}

export async function sendEnhancedNewsletter(htmlPath: string, subject: string | undefined, options: DeliveryOptions): Promise<void> {
    logger.info('📧 Sending newsletter email...');
    try {
        await sendNewsletterEmail(htmlPath, subject, options);
        logger.info('✅ Newsletter sent successfully!');
    } catch (error) {
        logger.error(`❌ Failed to send newsletter: ${errorMessage(error)}`);
        throw error;
    }
}

export function printGenerationSummary(result: GenerationResult): void {
    const { stats, files } = result;

    banner('📊 NEWSLETTER GENERATION SUMMARY');
    logger.info(`📰 Articles processed: ${stats.totalArticles}`);
    logger.info(`📝 Summaries generated: ${stats.summariesGenerated}`);
    logger.info(`✍️ Editor's Takes: ${stats.editorsTakes}`);
    logger.info(`🏷️ Categories covered: ${stats.categories}`);
    logger.info(`🖼️ Images processed: ${stats.imagesProcessed}`);
    logger.info(`🤖 LLM used: ${result.content.generationInfo.llmUsed}`);
    logger.info(`⏰ Generated at: ${result.timestamp}`);

    const fileEntries = Object.entries(files);
    if (fileEntries.length > 0) {
        logger.info('');
        logger.info(`📁 Files generated (${fileEntries.length}):`);
        for (const [format, filePath] of fileEntries) {
            logger.info(`  • ${format}: ${filePath}`);
        }
    }

    const counts = new Map<Article['category'], number>();
    for (const article of result.articles) {
        counts.set(article.category, (counts.get(article.category) ?? 0) + 1);
    }
    if (counts.size > 0) {
        logger.info('');
        logger.info('🏷️ Category breakdown:');
        for (const [category, count] of [...counts.entries()].sort((a, b) => b[1] - a[1])) {
            const { emoji, title } = getCategoryConfig(category);
            logger.info(`  • ${emoji} ${title}: ${count} articles`);
        }
    }
    logger.info('═'.repeat(60));
}
