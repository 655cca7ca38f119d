import { describe, it, expect, vi } from 'vitest';
import { ResponseFormatter, displayNameOf } from '../src/core/ResponseFormatter';
import { resolved, testRegistry } from './helpers/assistants';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const formatter = new ResponseFormatter();

describe('displayNameOf', () => {
    it('prefers the configured display name', () => {
        expect(displayNameOf(resolved('sales'))).toBe('Sales Desk');
    });

    it('capitalises the assistant name otherwise', () => {
        expect(displayNameOf(resolved('default'))).toBe('Default');
        expect(displayNameOf(testRegistry().resolve('SUPPORT'))).toBe('Support');
    });
});

describe('ResponseFormatter', () => {
    it('strips Markdown from the text body and appends the signature', () => {
        expect(formatter.createTextResponse({ message: '**Hi**, see [pricing](https://example.com/p)' }, resolved('sales')))
            .toBe('Hi, see pricing (https://example.com/p)\n\n-- \nThe Sales Team\nexample.com');
    });

    it('leaves the text body unsigned without a signature', () => {
        expect(formatter.createTextResponse({ message: 'Thanks!' }, resolved('default'))).toBe('Thanks!');
    });

    it('wraps the HTML body in a branded document', () => {
        const html = formatter.createHtmlResponse({ message: 'Hi **there**' }, resolved('sales'));
        const lines = html.split('\n');
        expect(lines[0]).toBe('<!DOCTYPE html>');
        expect(lines).toContain('<title>Reply from Sales Desk</title>');
        expect(lines).toContain('.header { border-bottom: 3px solid #ff8800; color: #ff8800; font-weight: bold; padding-bottom: 8px; }');
        expect(lines).toContain('<div class="header">Sales Desk</div>');
        expect(html).toContain('<div class="content">\n<p>Hi <strong>there</strong></p>\n</div>\n<div class="signature">The Sales Team<br>\nexample.com</div>\n</body>');
    });

    it('uses the default accent color', () => {
        const html = formatter.createHtmlResponse({ message: 'Hi' }, resolved('default'));
        expect(html.split('\n')).toContain('a { color: #2196F3; }');
        expect(html).toContain('<div class="content">\n<p>Hi</p>\n</div>\n</body>');
    });

    it('formats both bodies at once', () => {
        expect(formatter.format({ message: 'Hi' }, resolved('default')).text).toBe('Hi');
    });
});
