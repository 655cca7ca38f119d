import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { probe, listKinds, readStdin, respond, reportUnhandledRejection } from '../src/cli/commands';
import { ASSISTANTS } from './helpers/assistants';
import { fakeHost, failingHost, silentLogger } from './helpers/fakeHost';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

describe('readStdin', () => {
    it('concatenates the stream', async () => {
        expect(await readStdin(Readable.from(['From: a@example.org\r\n', '\r\nHi']))).toBe('From: a@example.org\r\n\r\nHi');
    });
});

describe('listKinds', () => {
    it('lists the catalog in order', () => {
        expect(listKinds()).toEqual([
            'time', 'system', 'network', 'locale', 'timezone', 'performance', 'hardware',
            'users', 'network_traffic', 'ports', 'processes', 'filesystem', 'services'
        ]);
    });
});

describe('probe', () => {
    it('enriches the given prompt with the requested kinds', async () => {
        const host = fakeHost({ now: new Date(Date.UTC(2024, 2, 5, 14, 3, 9)), timeZone: 'UTC' });
        expect(await probe(['time'], { prompt: 'Base', host, logger: silentLogger() })).toBe([
            'Base',
            '',
            'Here is real-time information you can use if relevant:',
            'Current time: Tuesday, 05 March 2024 14:03:09 (UTC)',
            'UTC time: 2024-03-05 14:03:09 UTC',
            '',
            'The email is:'
        ].join('\n'));
    });

    it('collects everything when no kind is named, even on an unreadable host', async () => {
        const output = await probe([], { host: failingHost(), logger: silentLogger() });
        const lines = output.split('\n');
        expect(lines[0]).toBe('Reply to the following prompt:');
        expect(lines).toContain('CPU: Unknown CPU (unknown cores, unknown% usage)');
        expect(lines).toContain('Internet connection: Unavailable');
        expect(lines[lines.length - 1]).toBe('The email is:');
    });
});

describe('respond', () => {
    let tmpDir: string | undefined;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = undefined;
    });

    it('loads the configuration and logs the session', async () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'respond-'));
        const configPath = path.join(tmpDir, 'responder.config.yaml');
        fs.writeFileSync(configPath, [
            'apiUrl: https://ai.example.test/complete',
            'logFile: logs/responder.log',
            'rawEmailLog: logs/raw_emails.log',
            'tempLogDir: tmp'
        ].join('\n'));
        fs.writeFileSync(path.join(tmpDir, 'assistants.json'), JSON.stringify(ASSISTANTS));
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

        try {
            const outcome = await respond('From: noreply@example.org\r\nSubject: Receipt\r\n\r\nThanks\r\n', { config: configPath });
            expect(outcome).toBe('skipped');
        } finally {
            stderr.mockRestore();
        }

        const log = fs.readFileSync(path.join(tmpDir, 'logs', 'responder.log'), 'utf8');
        expect(log).toContain('[info]: Script started');
        expect(log).toContain('[info]: Sender is a no-reply address. No response will be sent.');
        expect(fs.readdirSync(path.join(tmpDir, 'tmp'))).toHaveLength(1);
    });
});

describe('reportUnhandledRejection', () => {
    afterEach(() => {
        process.exitCode = undefined;
    });

    it('logs the reason and fails the run', () => {
        const sink = silentLogger();
        reportUnhandledRejection(new Error('socket hang up'), sink);
        expect(sink.error).toHaveBeenCalledWith('Unhandled Promise rejection: socket hang up');
        expect(process.exitCode).toBe(1);
    });
});
