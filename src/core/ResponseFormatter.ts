import { renderMarkdown, stripMarkdown, escHtml } from '../utils/MarkdownRenderer';
import type { ResolvedAssistant } from '../config/AssistantRegistry';
import type { AIReply } from './AIClient';

export const DEFAULT_ACCENT_COLOR = '#2196F3';

export interface FormattedReply {
    text: string;
    html: string;
}

/** Display name, falling back to the capitalised assistant name. */
export function displayNameOf(assistant: ResolvedAssistant): string {
    if (assistant.displayName) return assistant.displayName;
    const name = assistant.name;
    return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/**
 * Builds both bodies of a reply email from the assistant's Markdown.
 */
export class ResponseFormatter {
    public createTextResponse(reply: AIReply, assistant: ResolvedAssistant): string {
        const body = stripMarkdown(reply.message);
        return assistant.signature ? `${body}\n\n-- \n${assistant.signature}` : body;
    }

    public createHtmlResponse(reply: AIReply, assistant: ResolvedAssistant): string {
        const accent = assistant.accentColor ?? DEFAULT_ACCENT_COLOR;
        const name = escHtml(displayNameOf(assistant));
        const body = renderMarkdown(reply.message, 'email_html');
        const signature = assistant.signature
            ? `\n<div class="signature">${escHtml(assistant.signature).replace(/\r?\n/g, '<br>\n')}</div>`
            : '';

        return [
            '<!DOCTYPE html>',
            '<html>',
            '<head>',
            '<meta charset="utf-8">',
            `<title>Reply from ${name}</title>`,
            '<style>',
            'body { font-family: Arial, Helvetica, sans-serif; line-height: 1.5; color: #222; }',
            `.header { border-bottom: 3px solid ${accent}; color: ${accent}; font-weight: bold; padding-bottom: 8px; }`,
            `a { color: ${accent}; }`,
            'pre { background: #f4f4f4; padding: 8px; overflow-x: auto; }',
            '.signature { margin-top: 24px; color: #666; font-size: 0.9em; }',
            '</style>',
            '</head>',
            '<body>',
            `<div class="header">${name}</div>`,
            `<div class="content">\n${body}\n</div>${signature}`,
            '</body>',
            '</html>'
        ].join('\n');
    }

    public format(reply: AIReply, assistant: ResolvedAssistant): FormattedReply {
        return {
            text: this.createTextResponse(reply, assistant),
            html: this.createHtmlResponse(reply, assistant)
        };
    }
}
