import * as fs from 'fs';
import type { NewsletterContent } from '../../types/index.js';
import { formatLongDate } from '../../shared/time-utils.js';
import { logger } from '../../shared/logging.js';
import type { RenderContext, Renderer } from './index.js';
import { categorySectionsHtml, editorsTakesHtml, introHtml } from './html.js';
import { NEWSLETTER_TITLE } from './markdown.js';

export const FALLBACK_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<title>${NEWSLETTER_TITLE} – {{date}}</title>
</head>
<body>
<h1>${NEWSLETTER_TITLE} – {{date}}</h1>
{{#if intro}}<div class="intro">{{intro}}</div>{{/if}}
<div class="content">{{sections}}</div>
{{#if editors_takes}}{{editors_takes}}{{/if}}
</body>
</html>
`;

/**
 * Fill `{{name}}` placeholders and keep `{{#if name}}...{{/if}}` blocks only when the value
 * is non-empty. Unknown placeholders render as nothing. Values are inserted in one pass, so
 * braces inside them are left alone.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
    const withBlocks = template.replace(
        /\{\{#if (\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g,
        (_match, key: string, body: string) => (values[key] ? body : '')
    );
    return withBlocks.replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => values[key] ?? '');
}

export function loadTemplate(templatePath: string): string {
    if (!fs.existsSync(templatePath)) {
        logger.warn(`⚠️ Template not found at ${templatePath}, using the built-in layout`);
        return FALLBACK_TEMPLATE;
    }
    return fs.readFileSync(templatePath, 'utf8');
}

/**
 * HTML from a template file with `{{date}}`, `{{intro}}`, `{{sections}}` and
 * `{{editors_takes}}` placeholders.
 */
export class TemplateHtmlRenderer implements Renderer {
    readonly format = 'templateHtml';
    readonly fileName = 'newsletter_template.html';

    constructor(private readonly template: string) {}

    static fromFile(templatePath: string): TemplateHtmlRenderer {
        return new TemplateHtmlRenderer(loadTemplate(templatePath));
    }

    render(content: NewsletterContent, context: RenderContext): string {
        return renderTemplate(this.template, {
            date: formatLongDate(context.date),
            intro: content.intro ? introHtml(content.intro) : '',
            sections: categorySectionsHtml(content),
            editors_takes: editorsTakesHtml(content),
        });
    }
}
