import type { NewsletterContent } from '../../types/index.js';
import { formatLongDate } from '../../shared/time-utils.js';
import { sectionsByCategory, type RenderContext, type Renderer } from './index.js';

export const NEWSLETTER_TITLE = '🧠 AI Daily Digest';

/**
 * Plain markdown export, for note apps and the plain-text email part.
 */
export class MarkdownRenderer implements Renderer {
    readonly format = 'markdown';
    readonly fileName = 'newsletter_premium.md';

    render(content: NewsletterContent, context: RenderContext): string {
        const lines: string[] = [`# ${NEWSLETTER_TITLE} – ${formatLongDate(context.date)}`, ''];

        if (content.intro) {
            lines.push(content.intro, '');
        }

        for (const section of sectionsByCategory(content)) {
            lines.push(`## ${section.config.emoji} ${section.config.title}`, '');
            for (const entry of section.entries) {
                lines.push(entry.content, '');
            }
        }

        if (content.editorsTakes.length > 0) {
            lines.push("## ✍️ Editor's Take", '');
            for (const take of content.editorsTakes) {
                lines.push(`**${take.title}**`, '', take.take, '');
            }
        }

        return lines.join('\n');
    }
}
