/**
 * Line-based conversion of the summary markdown into HTML.
 *
 * Only the shapes the formatter emits are recognized: headings, bold, links, bullet lines,
 * the Rundown / Why-it-matters paragraphs and horizontal rules. Each element gets its
 * attributes from a decorator, so the same conversion serves the class-based page and
 * the inline-styled email.
 */

export type ElementKind =
    | 'heading'
    | 'paragraph'
    | 'rundown'
    | 'why'
    | 'list'
    | 'item'
    | 'link'
    | 'strong'
    | 'rule';

/** Returns the attribute string for an element, e.g. ` class="article-rundown"` */
export type Decorate = (kind: ElementKind) => string;

export const classDecorator = (classes: Partial<Record<ElementKind, string>>): Decorate =>
    kind => (classes[kind] ? ` class="${classes[kind]}"` : '');

export const styleDecorator = (styles: Partial<Record<ElementKind, string>>): Decorate =>
    kind => (styles[kind] ? ` style="${styles[kind]}"` : '');

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export function inlineMarkdown(text: string, decorate: Decorate): string {
    let html = escapeHtml(text);
    // Links before bold so link text keeps its own markers
    html = html.replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, `<a href="$2"${decorate('link')}>$1</a>`);
    html = html.replace(/\*\*([^*]+)\*\*/g, `<strong${decorate('strong')}>$1</strong>`);
    return html;
}

export type MarkdownOptions = {
    /** Added to the heading level: `##` becomes h3 with an offset of 1 */
    headingOffset?: number;
};

export function markdownToHtml(markdown: string, decorate: Decorate, options: MarkdownOptions = {}): string {
    const offset = options.headingOffset ?? 0;
    const out: string[] = [];
    let inList = false;

    const closeList = () => {
        if (inList) {
            out.push('</ul>');
            inList = false;
        }
    };

    for (const line of markdown.split('\n')) {
        const trimmed = line.trim();
        const bullet = trimmed.match(/^(?:[•\-]|\*(?!\*))\s+(.+)$/);

        if (bullet) {
            if (!inList) {
                out.push(`<ul${decorate('list')}>`);
                inList = true;
            }
            out.push(`<li${decorate('item')}>${inlineMarkdown(bullet[1], decorate)}</li>`);
            continue;
        }
        closeList();

        if (!trimmed) continue;

        const heading = trimmed.match(/^(#{1,6})\s+(.+)$/);
        if (heading) {
            const level = Math.min(6, heading[1].length + offset);
            out.push(`<h${level}${decorate('heading')}>${inlineMarkdown(heading[2], decorate)}</h${level}>`);
        } else if (/^-{3,}$/.test(trimmed)) {
            out.push(`<hr${decorate('rule')}>`);
        } else if (/^\*\*The Rundown:?\*\*/i.test(trimmed)) {
            out.push(`<p${decorate('rundown')}>${inlineMarkdown(trimmed, decorate)}</p>`);
        } else if (/^\*\*Why it matters:?\*\*/i.test(trimmed)) {
            out.push(`<p${decorate('why')}>${inlineMarkdown(trimmed, decorate)}</p>`);
        } else {
            out.push(`<p${decorate('paragraph')}>${inlineMarkdown(trimmed, decorate)}</p>`);
        }
    }
    closeList();

    return out.join('\n');
}
