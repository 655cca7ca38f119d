import fs from 'fs';
import type { LogSink } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import type { EmailData } from '../core/EmailParser';
import type { AIReply } from '../core/AIClient';

export const EMBED_COLOR = 0x2196F3;
export const RESPONSE_PREVIEW_LENGTH = 250;

export interface EmbedField {
    name: string;
    value: string;
    inline?: boolean;
}

export interface WebhookPayload {
    content: string;
    embeds: Array<{
        title: string;
        description: string;
        color: number;
        fields: EmbedField[];
        timestamp: string;
    }>;
}

export interface LogAttachment {
    filename: string;
    path: string;
}

function capitalize(name: string): string {
    return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `DD/MM/YYYY HH:MM:SS`, local time. */
export function formatNotificationTime(date: Date): string {
    return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function buildWebhookPayload(email: EmailData, reply: AIReply, assistantName: string, now: Date): WebhookPayload {
    const name = capitalize(assistantName);
    const senderName = email.sender.includes('<') ? email.sender.split('<')[0].trim() : email.sender;
    const response = reply.message.length > RESPONSE_PREVIEW_LENGTH
        ? `${reply.message.slice(0, RESPONSE_PREVIEW_LENGTH)}...`
        : reply.message || 'No response';

    return {
        content: `📧 **New email processed by ${name}** | ${formatNotificationTime(now)}`,
        embeds: [{
            title: `New response from ${name}`,
            description: `${name} replied to an email from **${senderName || 'Unknown'}**`,
            color: EMBED_COLOR,
            fields: [
                { name: 'Subject', value: email.subject || 'No subject', inline: true },
                { name: 'Assistant', value: name, inline: true },
                { name: 'Response', value: response }
            ],
            timestamp: now.toISOString()
        }]
    };
}

/**
 * Posts a summary of each processed email, with the session log attached,
 * to a Discord-compatible webhook.
 */
export class WebhookNotifier {
    constructor(
        private readonly webhookUrl: string | undefined,
        private readonly sink: LogSink,
        private readonly now: () => Date = () => new Date()
    ) {}

    public async notify(email: EmailData, reply: AIReply, assistantName: string, attachment?: LogAttachment): Promise<boolean> {
        this.sink.info('Preparing to send log to webhook...');
        const url = this.webhookUrl;
        if (!url) {
            this.sink.info('Webhook not configured, sending ignored');
            return false;
        }

        return ErrorHandler.withFallback(async () => {
            const form = new FormData();
            form.append('payload_json', JSON.stringify(buildWebhookPayload(email, reply, assistantName, this.now())));
            if (attachment && fs.existsSync(attachment.path)) {
                form.append('file', new Blob([fs.readFileSync(attachment.path, 'utf8')], { type: 'text/plain' }), attachment.filename);
            }

            const response = await fetch(url, { method: 'POST', body: form });
            if (response.status === 200 || response.status === 204) {
                this.sink.info(`Log successfully sent to webhook (Status: ${response.status})`);
                return true;
            }
            this.sink.error(`Error sending to webhook: Status ${response.status}, Response: ${await response.text()}`);
            return false;
        }, () => false, 'notify', this.sink);
    }
}
