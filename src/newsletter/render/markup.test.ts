import { describe, it, expect } from 'vitest';
import { classDecorator, escapeHtml, inlineMarkdown, markdownToHtml, styleDecorator } from './markup.js';

const SECTION = [
    '## 📢 **Agents**',
    '',
    '**The Rundown:** A & B.',
    '',
    '• One',
    '• Two',
    '',
    '**Why it matters:** Big.',
    '',
    '[👉 Read more](https://example.com/a?x=1&y=2)',
    '',
    '---'
].join('\n');

describe('markdownToHtml', () => {
    it('converts a formatted section', () => {
        const decorate = classDecorator({ rundown: 'r', list: 'l', link: 'a' });

        expect(markdownToHtml(SECTION, decorate, { headingOffset: 1 })).toBe([
            '<h3>📢 <strong>Agents</strong></h3>',
            '<p class="r"><strong>The Rundown:</strong> A &amp; B.</p>',
            '<ul class="l">',
            '<li>One</li>',
            '<li>Two</li>',
            '</ul>',
            '<p><strong>Why it matters:</strong> Big.</p>',
            '<p><a href="https://example.com/a?x=1&amp;y=2" class="a">👉 Read more</a></p>',
            '<hr>'
        ].join('\n'));
    });

    it('closes a list at the end of the input', () => {
        expect(markdownToHtml('- last item', () => '')).toBe('<ul>\n<li>last item</li>\n</ul>');
    });

    it('caps heading levels at h6', () => {
        expect(markdownToHtml('###### Deep', () => '', { headingOffset: 2 })).toBe('<h6>Deep</h6>');
    });
});

describe('inlineMarkdown', () => {
    it('escapes markup in the text', () => {
        expect(inlineMarkdown('<script>alert("x")</script>', () => '')).toBe(
            '&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;'
        );
    });

    it('applies inline styles through the decorator', () => {
        const decorate = styleDecorator({ strong: 'color: red;' });
        expect(inlineMarkdown('**Hot** take', decorate)).toBe('<strong style="color: red;">Hot</strong> take');
    });
});

describe('escapeHtml', () => {
    it('escapes ampersands first', () => {
        expect(escapeHtml('&lt;')).toBe('&amp;lt;');
    });
});
