import { simpleParser, type AddressObject, type ParsedMail } from 'mailparser';
import { convert } from 'html-to-text';
import type { LogSink } from '../utils/logger';
import { EmailParseError, describeError } from '../utils/ErrorHandler';
import { DEFAULT_ASSISTANT, type AssistantRegistry } from '../config/AssistantRegistry';

export interface EmailData {
    /** `From` header as written, display name included */
    sender: string;
    subject: string;
    /** `To` header as written; empty when absent */
    recipient: string;
    content: string;
}

const NO_REPLY_MARKERS = ['noreply', 'no-reply', 'daemon'];

function addressText(header: AddressObject | AddressObject[] | undefined): string {
    if (!header) return '';
    const groups = Array.isArray(header) ? header : [header];
    return groups.map(group => group.text).join(', ');
}

export class EmailParser {
    constructor(private readonly sink: LogSink) {}

    public async extractEmailContent(rawEmail: string): Promise<EmailData> {
        let parsed: ParsedMail;
        try {
            parsed = await simpleParser(rawEmail);
        } catch (error) {
            this.sink.error(`ERROR extracting email: ${describeError(error)}`);
            throw new EmailParseError(`Could not parse email: ${describeError(error)}`, { cause: error });
        }

        const sender = addressText(parsed.from);
        if (!sender) {
            this.sink.error('ERROR extracting email: no From address');
            throw new EmailParseError('Email has no From address');
        }

        const subject = parsed.subject || 'No subject';
        const recipient = addressText(parsed.to);

        let content = parsed.text ?? '';
        if (!content && typeof parsed.html === 'string') {
            content = convert(parsed.html, { wordwrap: false });
        }
        content = content.trim();

        this.sink.info(`From: ${sender}, To: ${recipient}, Subject: ${subject}`);
        this.sink.info(`Content extracted: ${content.slice(0, 100)}...`);

        return { sender, subject, recipient, content };
    }

    /**
     * Mail we must never answer: bounce and no-reply senders, and the
     * assistants' own addresses (which would otherwise loop).
     */
    public isNoReplyAddress(sender: string, registry?: AssistantRegistry): boolean {
        const address = sender.toLowerCase();
        if (NO_REPLY_MARKERS.some(marker => address.includes(marker))) return true;
        if (!registry) return false;
        return registry.senderAddresses().some(own => address === own || address.includes(`<${own}>`));
    }

    /** First configured assistant whose name appears in the recipient address. */
    public detectAssistant(email: EmailData, registry: AssistantRegistry, defaultAssistant: string): string {
        const recipient = email.recipient.toLowerCase();
        for (const name of registry.names()) {
            if (name === DEFAULT_ASSISTANT) continue;
            if (recipient.includes(name.toLowerCase())) {
                this.sink.info(`Detected assistant: ${name}`);
                return name;
            }
        }
        this.sink.info(`No specific assistant detected, using default: ${defaultAssistant}`);
        return defaultAssistant;
    }
}
