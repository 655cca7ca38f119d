import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { LogSink } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import type { EmailSettings, ResolvedAssistant } from '../config/AssistantRegistry';
import type { AIReply } from '../core/AIClient';
import { type ResponseFormatter, displayNameOf } from '../core/ResponseFormatter';

/** The part of a nodemailer transporter the sender uses. */
export interface MailTransport {
    sendMail(mail: SendMailOptions): Promise<unknown>;
    close(): void;
}

export type TransportFactory = (settings: EmailSettings) => MailTransport;

/** SMTP transport: implicit TLS on 465, STARTTLS required on 587, auth only with credentials. */
export function createSmtpTransport(settings: EmailSettings): MailTransport {
    const auth = settings.smtpUser && settings.smtpPassword
        ? { user: settings.smtpUser, pass: settings.smtpPassword }
        : undefined;
    return nodemailer.createTransport({
        host: settings.smtpServer,
        port: settings.smtpPort,
        secure: settings.smtpPort === 465,
        requireTLS: settings.smtpPort === 587,
        auth
    });
}

export function replySubject(originalSubject: string | undefined): string {
    return originalSubject ? `Re: ${originalSubject}` : 'Automatic response';
}

export class EmailSender {
    constructor(
        private readonly formatter: ResponseFormatter,
        private readonly sink: LogSink,
        private readonly createTransport: TransportFactory = createSmtpTransport
    ) {}

    /**
     * Send `reply` to `to` from the assistant's mailbox as multipart/alternative
     * (plain text and HTML). Resolves to false instead of throwing.
     */
    public async sendResponse(
        to: string,
        originalSubject: string | undefined,
        reply: AIReply,
        assistant: ResolvedAssistant
    ): Promise<boolean> {
        return ErrorHandler.withFallback(async () => {
            const { text, html } = this.formatter.format(reply, assistant);
            const transport = this.createTransport(assistant.email);
            try {
                await transport.sendMail({
                    from: { name: displayNameOf(assistant), address: assistant.email.sender },
                    to,
                    subject: replySubject(originalSubject),
                    text,
                    html
                });
            } finally {
                transport.close();
            }
            this.sink.info(`Response sent successfully to ${to}`);
            return true;
        }, () => false, 'sendResponse', this.sink);
    }
}
