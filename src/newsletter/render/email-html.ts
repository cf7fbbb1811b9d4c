/**
 * Email version: table layout, inline styles only, no stylesheet or media queries,
 * since most mail clients strip them.
 */

import type { NewsletterContent } from '../../types/index.js';
import { formatLongDate } from '../../shared/time-utils.js';
import { sectionsByCategory, type RenderContext, type Renderer } from './index.js';
import { escapeHtml, markdownToHtml, styleDecorator } from './markup.js';
import { NEWSLETTER_TITLE } from './markdown.js';
import { articleImageUrl, introHtml } from './html.js';

const FONT = "font-family: -apple-system, 'Segoe UI', Roboto, Arial, sans-serif;";

export const EMAIL_STYLES = {
    heading: `${FONT} font-size: 18px; color: #1f2328; margin: 0 0 12px 0;`,
    paragraph: `${FONT} font-size: 15px; line-height: 1.6; color: #333333; margin: 0 0 12px 0;`,
    rundown: `${FONT} font-size: 15px; line-height: 1.6; color: #1f2328; margin: 0 0 12px 0;`,
    why: `${FONT} font-size: 15px; line-height: 1.6; color: #1f2328; background: #eef2ff; border-left: 3px solid #6366f1; padding: 10px 14px; margin: 0 0 12px 0;`,
    list: 'margin: 0 0 12px 0; padding-left: 20px;',
    item: `${FONT} font-size: 15px; line-height: 1.6; color: #333333; margin-bottom: 4px;`,
    link: 'color: #4338ca; font-weight: 600; text-decoration: none;',
    rule: 'border: none; border-top: 1px solid #e5e7eb; margin: 20px 0;',
} as const;

const decorate = styleDecorator(EMAIL_STYLES);

export class EmailHtmlRenderer implements Renderer {
    readonly format = 'emailHtml';
    readonly fileName = 'newsletter_email_premium.html';

    render(content: NewsletterContent, context: RenderContext): string {
        const date = formatLongDate(context.date);

        const sections = sectionsByCategory(content).map(section => {
            const articles = section.entries.map(entry => {
                const image = articleImageUrl(entry.article);
                const imageRow = image
                    ? `<img src="${escapeHtml(image)}" alt="${escapeHtml(entry.article.title)}" width="600" style="display: block; width: 100%; max-width: 600px; height: auto; border-radius: 8px; margin: 0 0 12px 0;">\n`
                    : '';
                return `<tr><td style="padding: 0 24px 8px 24px;">
${imageRow}${markdownToHtml(entry.content, decorate, { headingOffset: 1 })}
</td></tr>`;
            }).join('\n');

            return `<tr><td style="padding: 24px 24px 12px 24px;">
<h2 style="${FONT} font-size: 20px; color: #312e81; margin: 0; padding-bottom: 8px; border-bottom: 3px solid #6366f1;">${section.config.emoji} ${escapeHtml(section.config.title)}</h2>
</td></tr>
${articles}`;
        });

        const takes = content.editorsTakes.length > 0
            ? `<tr><td style="padding: 24px;">
<h2 style="${FONT} font-size: 20px; color: #312e81; margin: 0 0 16px 0;">✍️ Editor's Take</h2>
${content.editorsTakes.map(take => `<div style="background: #fffbeb; border-left: 4px solid #f59e0b; padding: 14px 18px; margin: 0 0 12px 0;">
<p style="${FONT} font-size: 15px; font-weight: 700; margin: 0 0 6px 0;"><a href="${escapeHtml(take.url)}" style="${EMAIL_STYLES.link}">${escapeHtml(take.title)}</a></p>
<p style="${EMAIL_STYLES.paragraph}">${escapeHtml(take.take)}</p>
</div>`).join('\n')}
</td></tr>`
            : '';

        const intro = content.intro
            ? `<tr><td style="padding: 24px 24px 8px 24px;">
${introHtml(content.intro, ` style="${EMAIL_STYLES.paragraph}"`)}
</td></tr>`
            : '';

        return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${NEWSLETTER_TITLE} – ${date}</title>
</head>
<body style="margin: 0; padding: 0; background: #f4f5f7;">
<table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background: #f4f5f7;">
<tr><td align="center" style="padding: 20px 0;">
<table role="presentation" width="640" cellpadding="0" cellspacing="0" style="max-width: 640px; width: 100%; background: #ffffff; border-radius: 12px;">
<tr><td style="background: #312e81; padding: 32px 24px; text-align: center; border-radius: 12px 12px 0 0;">
<h1 style="${FONT} font-size: 26px; color: #ffffff; margin: 0;">${NEWSLETTER_TITLE} – ${date}</h1>
</td></tr>
${intro}
${sections.join('\n')}
${takes}
<tr><td style="${FONT} padding: 20px 24px; text-align: center; font-size: 12px; color: #6b7280; background: #f9fafb; border-radius: 0 0 12px 12px;">
${content.summaries.length} stories · ${escapeHtml(content.generationInfo.llmUsed)}
</td></tr>
</table>
</td></tr>
</table>
</body>
</html>
`;
    }
}
