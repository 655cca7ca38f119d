import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResponderPipeline, ERROR_REPLY } from '../src/core/ResponderPipeline';
import type { ResponderConfig } from '../src/config/ConfigManager';
import { SessionLog } from '../src/utils/SessionLog';
import { testRegistry } from './helpers/assistants';
import { fakeHost } from './helpers/fakeHost';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const AI_URL = 'https://ai.example.test/complete';
const WEBHOOK_URL = 'https://discord.example.test/api/webhooks/1/test-secret';
const NOW = new Date(Date.UTC(2024, 2, 5, 14, 3, 9));
const SIGNATURE = '\n\n-- \nThe Sales Team\nexample.com';

const mockFetch = vi.fn();

function rawEmail(from: string, to: string, subject: string, body: string): string {
    return [`From: ${from}`, `To: ${to}`, `Subject: ${subject}`, 'Content-Type: text/plain; charset=utf-8', '', body, ''].join('\r\n');
}

describe('ResponderPipeline', () => {
    let tmpDir: string;
    let session: SessionLog;
    let sendMail: ReturnType<typeof vi.fn>;
    let pipeline: ResponderPipeline;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
        const config: ResponderConfig = {
            logFile: path.join(tmpDir, 'responder.log'),
            rawEmailLog: path.join(tmpDir, 'raw_emails.log'),
            tempLogDir: path.join(tmpDir, 'tmp'),
            defaultAssistant: 'default',
            apiUrl: AI_URL,
            apiTimeout: 30,
            discordWebhookUrl: WEBHOOK_URL,
            assistantsPath: path.join(tmpDir, 'assistants.json'),
            logLevel: 'info',
            internetProbeUrl: 'https://example.test'
        };
        session = new SessionLog({ ...config, sessionId: 'pipeline-test' });
        sendMail = vi.fn(async () => ({ messageId: '<reply@example.com>' }));
        pipeline = new ResponderPipeline({
            config,
            registry: testRegistry(session),
            session,
            host: fakeHost({ now: NOW, timeZone: 'UTC' }),
            transportFactory: () => ({ sendMail, close: vi.fn() }),
            now: () => NOW
        });

        mockFetch.mockReset();
        mockFetch.mockImplementation(async (url: URL | string) => String(url).startsWith(AI_URL)
            ? new Response(JSON.stringify({ success: true, message: 'It is **free**.' }), { status: 200 })
            : new Response(null, { status: 204 }));
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await session.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('replies as the addressed assistant with an enriched prompt and notifies the webhook', async () => {
        const outcome = await pipeline.processEmail(rawEmail('customer@example.org', 'sales@example.com', 'Pricing question', 'How much?'));
        expect(outcome).toBe('replied');

        const aiUrl: URL = mockFetch.mock.calls[0][0];
        expect(aiUrl.searchParams.get('content')).toBe([
            'You answer questions about pricing.',
            '',
            'Here is real-time information you can use if relevant:',
            'Current time: Tuesday, 05 March 2024 14:03:09 (UTC)',
            'UTC time: 2024-03-05 14:03:09 UTC',
            '',
            'The email is: Reminder: You are talking to the sender (customer@example.org) of this mail! How much?'
        ].join('\n'));

        expect(sendMail).toHaveBeenCalledTimes(1);
        const mail = sendMail.mock.calls[0][0];
        expect(mail.to).toBe('customer@example.org');
        expect(mail.subject).toBe('Re: Pricing question');
        expect(mail.text).toBe(`It is free.${SIGNATURE}`);

        const [webhookUrl, init] = mockFetch.mock.calls[1];
        expect(webhookUrl).toBe(WEBHOOK_URL);
        const payload = JSON.parse(String(init.body.get('payload_json')));
        expect(payload.embeds[0].title).toBe('New response from Sales');
        expect(init.body.get('file').name).toBe(session.tempLogFilename);
    });

    it('uses the default assistant for other recipients', async () => {
        await pipeline.processEmail(rawEmail('customer@example.org', 'help@example.com', 'Hello', 'Hi'));
        const aiUrl: URL = mockFetch.mock.calls[0][0];
        expect(aiUrl.searchParams.get('content')).toBe(
            'Reply to the following prompt: Reminder: You are talking to the sender (customer@example.org) of this mail! Hi'
        );
        expect(sendMail.mock.calls[0][0].from).toEqual({ name: 'Default', address: 'assistant@example.com' });
    });

    it('never answers automated senders', async () => {
        const outcome = await pipeline.processEmail(rawEmail('noreply@example.org', 'sales@example.com', 'Receipt', 'Thanks'));
        expect(outcome).toBe('skipped');
        expect(mockFetch).not.toHaveBeenCalled();
        expect(sendMail).not.toHaveBeenCalled();
    });

    it('apologises and reports the error when the AI cannot be reached', async () => {
        mockFetch.mockImplementation(async (url: URL | string) => {
            if (String(url).startsWith(AI_URL)) throw new Error('connect ECONNREFUSED');
            return new Response(null, { status: 204 });
        });

        const outcome = await pipeline.processEmail(rawEmail('customer@example.org', 'sales@example.com', 'Pricing question', 'How much?'));
        expect(outcome).toBe('failed');
        expect(sendMail.mock.calls[0][0].text).toBe(`${ERROR_REPLY}${SIGNATURE}`);

        const payload = JSON.parse(String(mockFetch.mock.calls[1][1].body.get('payload_json')));
        expect(payload.embeds[0].title).toBe('New response from Error');
        expect(payload.embeds[0].fields[2].value).toBe(ERROR_REPLY);
    });

    it('sends nothing when the email cannot be understood', async () => {
        const outcome = await pipeline.processEmail('Subject: no sender\r\n\r\nbody\r\n');
        expect(outcome).toBe('failed');
        expect(sendMail).not.toHaveBeenCalled();
        expect(mockFetch).not.toHaveBeenCalled();
    });

    it('logs the raw email before processing', async () => {
        const raw = rawEmail('noreply@example.org', 'sales@example.com', 'Receipt', 'Thanks');
        await pipeline.processEmail(raw);
        expect(fs.readFileSync(path.join(tmpDir, 'raw_emails.log'), 'utf8')).toBe(`==== NEW EMAIL BEGIN ====\n${raw}\n==== EMAIL END ====\n\n`);
    });
});
