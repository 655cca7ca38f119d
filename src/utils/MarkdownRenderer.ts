/**
 * MarkdownRenderer converts the Markdown an assistant replies with into the
 * two bodies of the outgoing email:
 *
 *   - email_html: HTML fragment (paragraphs, lists, headings, inline styles)
 *   - plain:      text/plain alternative with all formatting stripped
 *
 * Code spans and fenced blocks are lifted out first so their contents are
 * never treated as formatting.
 */

import { logger } from './logger';

// ─── Types ───────────────────────────────────────────────────────────

export type RenderTarget =
    | 'email_html' // HTML fragment for the text/html part
    | 'plain';     // Strip all formatting

// ─── Code block extraction/restoration ───────────────────────────────

interface CodeBlock {
    placeholder: string;
    lang?: string;
    code: string;
    inline: boolean;
}

function extractCodeBlocks(text: string): { cleaned: string; blocks: CodeBlock[] } {
    const blocks: CodeBlock[] = [];
    const stash = (code: string, inline: boolean, lang?: string): string => {
        const placeholder = `\x00CB${blocks.length}\x00`;
        blocks.push({ placeholder, lang: lang || undefined, code, inline });
        return placeholder;
    };

    let cleaned = text;

    // Fenced code blocks (```lang\n...\n```)
    cleaned = cleaned.replace(/```(\w*)\n([\s\S]*?)```/g, (_m, lang: string, code: string) => stash(code, false, lang));

    // Inline code (`...`)
    cleaned = cleaned.replace(/`([^`\n]+?)`/g, (_m, code: string) => stash(code, true));

    return { cleaned, blocks };
}

// ─── Email HTML ──────────────────────────────────────────────────────

export function escHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

/** Inline formatting on text that has already been HTML-escaped. */
function renderInline(text: string, anchors: string[]): string {
    const stashAnchor = (html: string): string => {
        anchors.push(html);
        return `\x00A${anchors.length - 1}\x00`;
    };

    let out = text;

    // Images → link (MUST come before links)
    out = out.replace(/!\[([^\]]*)\]\(([^)\s]+)\)/g, (_m, alt: string, url: string) =>
        stashAnchor(`<a href="${url}">${alt || 'image'}</a>`));

    // Links; stashed so underscores in URLs are not read as emphasis
    out = out.replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, (_m, label: string, url: string) =>
        stashAnchor(`<a href="${url}">${label}</a>`));

    // Bold
    out = out.replace(/\*\*(.+?)\*\*/g, '<strong>$1</strong>');
    out = out.replace(/__(.+?)__/g, '<strong>$1</strong>');

    // Italic (after bold)
    out = out.replace(/(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g, '<em>$1</em>');
    out = out.replace(/(?<![_\w])_(?!_)(.+?)(?<!_)_(?![_\w])/g, '<em>$1</em>');

    // Strikethrough
    out = out.replace(/~~(.+?)~~/g, '<s>$1</s>');

    return out.replace(/\x00A(\d+)\x00/g, (_m, index: string) => anchors[Number(index)] ?? '');
}

type ListKind = 'ul' | 'ol';

function renderEmailHTML(text: string, blocks: CodeBlock[]): string {
    const html: string[] = [];
    const anchors: string[] = [];
    let paragraph: string[] = [];
    let list: { kind: ListKind; items: string[] } | undefined;

    const flushParagraph = () => {
        if (paragraph.length > 0) html.push(`<p>${paragraph.join('<br>\n')}</p>`);
        paragraph = [];
    };
    const flushList = () => {
        if (list) html.push(`<${list.kind}>\n${list.items.map(item => `<li>${item}</li>`).join('\n')}\n</${list.kind}>`);
        list = undefined;
    };
    const flush = () => {
        flushParagraph();
        flushList();
    };

    for (const rawLine of escHtml(text).split(/\r?\n/)) {
        const line = rawLine.trimEnd();
        const heading = line.match(/^#{1,6}\s+(.+)$/);
        const bullet = line.match(/^\s*[-*+]\s+(.+)$/);
        const numbered = line.match(/^\s*\d+\.\s+(.+)$/);
        const quote = line.match(/^&gt;\s?(.*)$/);

        if (line.trim() === '') {
            flush();
        } else if (/^\x00CB\d+\x00$/.test(line.trim())) {
            flush();
            html.push(line.trim());
        } else if (heading) {
            flush();
            html.push(`<h3>${renderInline(heading[1].trim(), anchors)}</h3>`);
        } else if (/^[-*_]{3,}$/.test(line.trim())) {
            flush();
            html.push('<hr>');
        } else if (bullet || numbered) {
            const kind: ListKind = bullet ? 'ul' : 'ol';
            const item = (bullet ?? numbered)?.[1] ?? '';
            flushParagraph();
            if (list && list.kind !== kind) flushList();
            list ??= { kind, items: [] };
            list.items.push(renderInline(item, anchors));
        } else if (quote) {
            flush();
            html.push(`<blockquote>${renderInline(quote[1], anchors)}</blockquote>`);
        } else {
            flushList();
            paragraph.push(renderInline(line, anchors));
        }
    }
    flush();

    let out = html.join('\n');

    // Restore code blocks
    for (const block of blocks) {
        const code = escHtml(block.code);
        if (block.inline) {
            out = out.replace(block.placeholder, `<code>${code}</code>`);
        } else {
            const langAttr = block.lang ? ` class="language-${block.lang}"` : '';
            out = out.replace(block.placeholder, `<pre${langAttr}><code>${code}</code></pre>`);
        }
    }

    return out;
}

// ─── Plain text ──────────────────────────────────────────────────────

function renderPlain(text: string, blocks: CodeBlock[]): string {
    let out = text;

    // Headings → just the text (uppercase for h1/h2)
    out = out.replace(/^(#{1,2})\s+(.+)$/gm, (_m, _h, content: string) => content.trim().toUpperCase());
    out = out.replace(/^#{3,6}\s+(.+)$/gm, (_m, content: string) => content.trim());

    // Images (MUST come before links)
    out = out.replace(/!\[([^\]]*)\]\(([^)]+)\)/g, (_m, alt: string, url: string) => `${alt || 'image'}: ${url}`);

    // Links
    out = out.replace(/\[([^\]]+)\]\(([^)]+)\)/g, '$1 ($2)');

    // Bold / italic → plain
    out = out.replace(/\*\*(.+?)\*\*/g, '$1');
    out = out.replace(/__(.+?)__/g, '$1');
    out = out.replace(/(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g, '$1');
    out = out.replace(/(?<![_\w])_(?!_)(.+?)(?<!_)_(?![_\w])/g, '$1');

    // Strikethrough
    out = out.replace(/~~(.+?)~~/g, '$1');

    // Blockquotes
    out = out.replace(/^>\s?(.*)$/gm, '  $1');

    // Horizontal rules
    out = out.replace(/^[-*_]{3,}$/gm, '---');

    // Restore code blocks as plain text
    for (const block of blocks) {
        out = out.replace(block.placeholder, block.code);
    }

    return out;
}

// ─── Public API ──────────────────────────────────────────────────────

/**
 * Convert standard Markdown text to the given email body format.
 * Falls back to the raw text if conversion throws.
 */
export function renderMarkdown(text: string, target: RenderTarget): string {
    if (!text) return text;

    try {
        // Extract code blocks to protect them from formatting transformations
        const { cleaned, blocks } = extractCodeBlocks(text);

        return target === 'email_html'
            ? renderEmailHTML(cleaned, blocks)
            : renderPlain(cleaned, blocks);
    } catch (err) {
        logger.warn(`MarkdownRenderer: Error converting to ${target}, returning raw text: ${err}`);
        return target === 'email_html' ? escHtml(text) : text;
    }
}

/**
 * Strip all Markdown formatting, returning plain text.
 * Convenience wrapper around renderMarkdown(text, 'plain').
 */
export function stripMarkdown(text: string): string {
    return renderMarkdown(text, 'plain');
}
