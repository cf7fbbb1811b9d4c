import type { Article, NewsletterContent } from '../../types/index.js';
import { formatLongDate } from '../../shared/time-utils.js';
import { sectionsByCategory, type RenderContext, type Renderer } from './index.js';
import { classDecorator, escapeHtml, inlineMarkdown, markdownToHtml } from './markup.js';
import { NEWSLETTER_TITLE } from './markdown.js';

const decorate = classDecorator({
    heading: 'article-headline',
    rundown: 'article-rundown',
    why: 'article-why-matters',
    list: 'article-points',
    link: 'article-link',
    rule: 'article-divider',
});

const STYLES = `
        * {
            margin: 0;
            padding: 0;
            box-sizing: border-box;
        }

        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            background: #f4f5f7;
            color: #1f2328;
            padding: 20px;
        }

        .container {
            max-width: 760px;
            margin: 0 auto;
            background: white;
            border-radius: 16px;
            overflow: hidden;
            box-shadow: 0 12px 40px rgba(0,0,0,0.12);
        }

        .header {
            background: linear-gradient(135deg, #1e1b4b 0%, #4338ca 100%);
            color: white;
            padding: 40px 30px;
            text-align: center;
        }

        .header h1 {
            font-size: 30px;
            font-weight: 700;
        }

        .intro {
            padding: 24px 30px;
            font-size: 17px;
            line-height: 1.7;
            border-bottom: 1px solid #e5e7eb;
        }

        .intro p + p {
            margin-top: 12px;
        }

        .content {
            padding: 30px;
        }

        .section {
            margin-bottom: 36px;
        }

        .section-title {
            font-size: 22px;
            color: #312e81;
            padding-bottom: 10px;
            margin-bottom: 20px;
            border-bottom: 3px solid #6366f1;
        }

        .article-card {
            margin-bottom: 28px;
        }

        .article-image {
            width: 100%;
            max-height: 320px;
            object-fit: cover;
            border-radius: 10px;
            margin-bottom: 14px;
        }

        .article-headline {
            font-size: 19px;
            margin-bottom: 12px;
        }

        .article-rundown,
        .article-why-matters {
            line-height: 1.7;
            margin-bottom: 12px;
        }

        .article-why-matters {
            background: #eef2ff;
            border-left: 3px solid #6366f1;
            padding: 10px 14px;
            border-radius: 4px;
        }

        .article-points {
            margin: 0 0 12px 20px;
            line-height: 1.7;
        }

        .article-link {
            color: #4338ca;
            font-weight: 600;
            text-decoration: none;
        }

        .article-divider {
            border: none;
            border-top: 1px solid #e5e7eb;
            margin-top: 20px;
        }

        .editors-take {
            background: #fffbeb;
            border-left: 4px solid #f59e0b;
            padding: 16px 20px;
            border-radius: 8px;
            margin-bottom: 16px;
        }

        .editors-take h3 {
            font-size: 16px;
            margin-bottom: 8px;
        }

        .footer {
            padding: 24px 30px;
            text-align: center;
            font-size: 13px;
            color: #6b7280;
            background: #f9fafb;
        }

        @media (max-width: 600px) {
            body {
                padding: 0;
            }

            .content,
            .intro {
                padding: 20px;
            }
        }
`;

export function introHtml(intro: string, paragraphAttrs = ''): string {
    return intro
        .split(/\n\s*\n/)
        .map(p => p.trim())
        .filter(p => p)
        .map(p => `<p${paragraphAttrs}>${inlineMarkdown(p, () => '')}</p>`)
        .join('\n');
}

export function articleImageUrl(article: Article): string | undefined {
    return article.imageInfo?.url ?? article.imageUrl;
}

function articleCard(article: Article, markdown: string): string {
    const image = articleImageUrl(article);
    const imageTag = image
        ? `<img class="article-image" src="${escapeHtml(image)}" alt="${escapeHtml(article.title)}">\n`
        : '';
    return `<div class="article-card">
${imageTag}${markdownToHtml(markdown, decorate, { headingOffset: 1 })}
</div>`;
}

export function categorySectionsHtml(content: NewsletterContent): string {
    return sectionsByCategory(content).map(section => `<div class="section">
<h2 class="section-title">${section.config.emoji} ${escapeHtml(section.config.title)}</h2>
${section.entries.map(entry => articleCard(entry.article, entry.content)).join('\n')}
</div>`).join('\n');
}

export function editorsTakesHtml(content: NewsletterContent): string {
    if (content.editorsTakes.length === 0) return '';
    return `<div class="section">
<h2 class="section-title">✍️ Editor's Take</h2>
${content.editorsTakes.map(take => `<div class="editors-take">
<h3><a class="article-link" href="${escapeHtml(take.url)}">${escapeHtml(take.title)}</a></h3>
<p>${escapeHtml(take.take)}</p>
</div>`).join('\n')}
</div>`;
}

/**
 * Full web page with an embedded stylesheet.
 */
export class PremiumHtmlRenderer implements Renderer {
    readonly format = 'premiumHtml';
    readonly fileName = 'newsletter_premium.html';

    render(content: NewsletterContent, context: RenderContext): string {
        const date = formatLongDate(context.date);

        return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${NEWSLETTER_TITLE} – ${date}</title>
    <style>${STYLES}    </style>
</head>
<body>
<div class="container">
<div class="header">
<h1>${NEWSLETTER_TITLE} – ${date}</h1>
</div>
${content.intro ? `<div class="intro">\n${introHtml(content.intro)}\n</div>` : ''}
<div class="content">
${categorySectionsHtml(content)}
${editorsTakesHtml(content)}
</div>
<div class="footer">
Generated ${escapeHtml(content.generationInfo.timestamp)} · ${content.summaries.length} stories · ${escapeHtml(content.generationInfo.llmUsed)}
</div>
</div>
</body>
</html>
`;
    }
}
