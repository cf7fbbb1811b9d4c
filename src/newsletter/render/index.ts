import * as fs from 'fs';
import path from 'path';
import { CATEGORY_IDS } from '../../types/index.js';
import type {
    ArticleSummary,
    CategoryConfig,
    CategoryId,
    NewsletterContent,
    OutputFiles
} from '../../types/index.js';
import { getCategoryConfig } from '../../shared/categories.js';
import { errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logging.js';

export type OutputFormat = keyof OutputFiles;

export type RenderContext = {
    /** Issue date shown in titles and headers */
    date: Date;
};

/**
 * One output format of the newsletter.
 */
export interface Renderer {
    readonly format: OutputFormat;
    readonly fileName: string;
    render(content: NewsletterContent, context: RenderContext): string;
}

export type CategorySection = {
    id: CategoryId;
    config: CategoryConfig;
    entries: ArticleSummary[];
};

/**
 * Summaries grouped by their article's category, in category declaration order, empty
 * categories left out.
 */
export function sectionsByCategory(content: NewsletterContent): CategorySection[] {
    return CATEGORY_IDS
        .map(id => ({
            id,
            config: getCategoryConfig(id),
            entries: content.summaries.filter(s => s.article.category === id),
        }))
        .filter(section => section.entries.length > 0);
}

export type SaveOptions = {
    outputDir: string;
    renderers: Renderer[];
    now?: () => Date;
};

/**
 * Render every format into the output directory. A renderer that fails is logged and
 * left out of the result; the others are still written.
 */
export function saveAllFormats(content: NewsletterContent, options: SaveOptions): OutputFiles {
    const { outputDir, renderers } = options;
    const context: RenderContext = { date: (options.now ?? (() => new Date()))() };

    logger.info('💾 Saving newsletter in all formats...');
    if (!fs.existsSync(outputDir)) {
        fs.mkdirSync(outputDir, { recursive: true });
    }

    const files: OutputFiles = {};
    for (const renderer of renderers) {
        const filePath = path.join(outputDir, renderer.fileName);
        try {
            fs.writeFileSync(filePath, renderer.render(content, context), 'utf8');
            files[renderer.format] = filePath;
            logger.info(`✅ ${renderer.format} saved to: ${filePath}`);
        } catch (error) {
            logger.error(`❌ Failed to save ${renderer.format}: ${errorMessage(error)}`);
        }
    }

    logger.info(`✅ Saved ${Object.keys(files).length} formats`);
    return files;
}
