import { describe, it, expect, vi } from 'vitest';
import { renderMarkdown, stripMarkdown, escHtml } from '../src/utils/MarkdownRenderer';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

// ─── email_html ──────────────────────────────────────────────────────

describe('renderMarkdown (email_html)', () => {
    it('should wrap inline formatting in a paragraph', () => {
        expect(renderMarkdown('Hello **world**, *really* ~~old~~', 'email_html'))
            .toBe('<p>Hello <strong>world</strong>, <em>really</em> <s>old</s></p>');
    });

    it('should join lines of a paragraph with <br> and split on blank lines', () => {
        expect(renderMarkdown('First line\nsecond line\n\nNext', 'email_html'))
            .toBe('<p>First line<br>\nsecond line</p>\n<p>Next</p>');
    });

    it('should build bullet and numbered lists', () => {
        expect(renderMarkdown('- one\n- two\n1. first', 'email_html'))
            .toBe('<ul>\n<li>one</li>\n<li>two</li>\n</ul>\n<ol>\n<li>first</li>\n</ol>');
    });

    it('should render headings, rules and quotes', () => {
        expect(renderMarkdown('# Title\nintro\n---\n> note', 'email_html'))
            .toBe('<h3>Title</h3>\n<p>intro</p>\n<hr>\n<blockquote>note</blockquote>');
    });

    it('should escape HTML in the text', () => {
        expect(renderMarkdown('a < b & "c"', 'email_html')).toBe('<p>a &lt; b &amp; &quot;c&quot;</p>');
    });

    it('should keep fenced code verbatim, escaped and tagged with its language', () => {
        expect(renderMarkdown('Run:\n```sh\nls <dir>\n```', 'email_html'))
            .toBe('<p>Run:</p>\n<pre class="language-sh"><code>ls &lt;dir&gt;\n</code></pre>');
    });

    it('should not format inside inline code', () => {
        expect(renderMarkdown('Use `a_b_c` now', 'email_html')).toBe('<p>Use <code>a_b_c</code> now</p>');
    });

    it('should not read underscores in link targets as emphasis', () => {
        expect(renderMarkdown('[docs](https://example.com/a_b_c)', 'email_html'))
            .toBe('<p><a href="https://example.com/a_b_c">docs</a></p>');
    });

    it('should turn images into links', () => {
        expect(renderMarkdown('![chart](https://example.com/c.png)', 'email_html'))
            .toBe('<p><a href="https://example.com/c.png">chart</a></p>');
    });
});

// ─── plain ───────────────────────────────────────────────────────────

describe('stripMarkdown', () => {
    it('should uppercase top-level headings and drop emphasis', () => {
        expect(stripMarkdown('# Title\n\nSome **bold** and _quiet_ text'))
            .toBe('TITLE\n\nSome bold and quiet text');
    });

    it('should keep lower headings as written', () => {
        expect(stripMarkdown('### Details')).toBe('Details');
    });

    it('should spell out links and images', () => {
        expect(stripMarkdown('See [docs](https://example.com) or ![chart](https://example.com/c.png)'))
            .toBe('See docs (https://example.com) or chart: https://example.com/c.png');
    });

    it('should indent quotes and keep code text', () => {
        expect(stripMarkdown('> quoted\nRun `make test`')).toBe('  quoted\nRun make test');
    });

    it('should return empty input unchanged', () => {
        expect(stripMarkdown('')).toBe('');
    });
});

// ─── length ──────────────────────────────────────────────────────────

describe('renderMarkdown length', () => {
    it('should keep a long reply whole', () => {
        const reply = 'a'.repeat(500);
        expect(renderMarkdown(reply, 'plain')).toBe(reply);
    });
});

describe('escHtml', () => {
    it('should escape markup characters', () => {
        expect(escHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
    });
});
