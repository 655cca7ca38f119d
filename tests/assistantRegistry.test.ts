import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { AssistantRegistry } from '../src/config/AssistantRegistry';
import { ConfigError } from '../src/utils/ErrorHandler';
import { ASSISTANTS, testRegistry } from './helpers/assistants';
import { silentLogger } from './helpers/fakeHost';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

describe('AssistantRegistry', () => {
    let tmpDir: string | undefined;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = undefined;
    });

    it('applies defaults to omitted fields', () => {
        const registry = AssistantRegistry.fromObject({ default: { email: { sender: 'bot@example.com' } } });
        expect(registry.getDefault()).toEqual({
            prompt: 'Reply to the following prompt:',
            enhancePrompt: false,
            enhancements: [],
            email: { sender: 'bot@example.com', smtpServer: 'localhost', smtpPort: 587, smtpUser: '', smtpPassword: '' }
        });
    });

    it('keeps the file order of names', () => {
        expect(testRegistry().names()).toEqual(['default', 'sales']);
    });

    it('resolves a configured assistant under its own name', () => {
        const sales = testRegistry().resolve('sales');
        expect(sales.name).toBe('sales');
        expect(sales.displayName).toBe('Sales Desk');
        expect(sales.enhancements).toEqual(['time']);
    });

    it('falls back to the default entry for an unknown name', () => {
        const sink = silentLogger();
        const support = testRegistry(sink).resolve('support');
        expect(support.name).toBe('support');
        expect(support.email.sender).toBe('assistant@example.com');
        expect(sink.info).toHaveBeenCalledWith('Assistant support not found, using default');
    });

    it('accepts "all" as the enhancement selection', () => {
        const registry = AssistantRegistry.fromObject({
            default: { enhancePrompt: true, enhancements: 'all', email: { sender: 'bot@example.com' } }
        });
        expect(registry.getDefault().enhancements).toBe('all');
    });

    it('requires a default assistant', () => {
        expect(() => AssistantRegistry.fromObject({ sales: ASSISTANTS.sales })).toThrow(
            'Invalid assistants configuration: (root): an assistant named "default" is required'
        );
    });

    it('reports invalid fields with their path', () => {
        expect(() => AssistantRegistry.fromObject({ default: { email: { sender: 'bot@example.com' }, accentColor: 'blue' } })).toThrow(
            'Invalid assistants configuration: default.accentColor: expected a #rrggbb color'
        );
    });

    it('lower-cases sender addresses', () => {
        expect(testRegistry().senderAddresses()).toEqual(['assistant@example.com', 'sales@example.com']);
    });

    it('loads from a JSON file', () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'assistants-'));
        const file = path.join(tmpDir, 'assistants.json');
        fs.writeFileSync(file, JSON.stringify(ASSISTANTS));
        expect(AssistantRegistry.load(file).has('sales')).toBe(true);
    });

    it('rejects a missing or malformed file', () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'assistants-'));
        const missing = path.join(tmpDir, 'missing.json');
        expect(() => AssistantRegistry.load(missing)).toThrow(`Assistants configuration file not found at ${missing}`);

        const broken = path.join(tmpDir, 'broken.json');
        fs.writeFileSync(broken, '{ not json');
        expect(() => AssistantRegistry.load(broken)).toThrow(ConfigError);
    });
});
