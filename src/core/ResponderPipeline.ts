import type { ResponderConfig } from '../config/ConfigManager';
import type { AssistantRegistry, ResolvedAssistant } from '../config/AssistantRegistry';
import { DEFAULT_ASSISTANT } from '../config/AssistantRegistry';
import type { SessionLog } from '../utils/SessionLog';
import { describeError } from '../utils/ErrorHandler';
import { EmailParser, type EmailData } from './EmailParser';
import { AIClient, type AIReply } from './AIClient';
import { ResponseFormatter } from './ResponseFormatter';
import { PromptEnhancer, type HostFacilities } from './enhancer';
import { EmailSender, type TransportFactory } from '../channels/EmailSender';
import { WebhookNotifier } from '../channels/WebhookNotifier';

export const ERROR_REPLY = 'Sorry, an error occurred while processing your email.';

export type PipelineOutcome = 'replied' | 'skipped' | 'failed';

export interface ResponderPipelineOptions {
    config: ResponderConfig;
    registry: AssistantRegistry;
    session: SessionLog;
    /** Host the probes read from; the real machine when omitted */
    host?: HostFacilities;
    transportFactory?: TransportFactory;
    now?: () => Date;
}

/**
 * One inbound email, start to finish: parse, pick an assistant, ask the AI,
 * reply by email and post a summary to the webhook.
 */
export class ResponderPipeline {
    private readonly config: ResponderConfig;
    private readonly registry: AssistantRegistry;
    private readonly session: SessionLog;
    private readonly parser: EmailParser;
    private readonly aiClient: AIClient;
    private readonly sender: EmailSender;
    private readonly notifier: WebhookNotifier;

    constructor(options: ResponderPipelineOptions) {
        const { config, registry, session } = options;
        this.config = config;
        this.registry = registry;
        this.session = session;

        this.parser = new EmailParser(session);
        this.aiClient = new AIClient({
            apiUrl: config.apiUrl,
            timeout: config.apiTimeout,
            logger: session,
            enhancer: new PromptEnhancer({
                host: options.host,
                logger: session,
                internetProbeUrl: config.internetProbeUrl
            })
        });
        this.sender = new EmailSender(new ResponseFormatter(), session, options.transportFactory);
        this.notifier = new WebhookNotifier(config.discordWebhookUrl, session, options.now);
    }

    public async processEmail(rawEmail: string): Promise<PipelineOutcome> {
        const log = this.session;
        log.info(`Email received, length: ${rawEmail.length}`);
        log.logRawEmail(rawEmail);

        let email: EmailData | undefined;
        let assistant: ResolvedAssistant | undefined;
        try {
            email = await this.parser.extractEmailContent(rawEmail);

            if (this.parser.isNoReplyAddress(email.sender, this.registry)) {
                log.info('Sender is a no-reply address. No response will be sent.');
                return 'skipped';
            }

            const assistantName = this.parser.detectAssistant(email, this.registry, this.config.defaultAssistant);
            assistant = this.registry.resolve(assistantName);

            const reply = await this.aiClient.reply(email.content, email.sender, assistant);
            await this.sender.sendResponse(email.sender, email.subject, reply, assistant);
            await this.notify(email, reply, assistantName);
            return 'replied';
        } catch (error) {
            log.error(`CRITICAL ERROR: Error during processing: ${describeError(error)}`);
            if (email) {
                const apology: AIReply = { message: ERROR_REPLY };
                const replyAs = assistant ?? { ...this.registry.getDefault(), name: DEFAULT_ASSISTANT };
                await this.sender.sendResponse(email.sender, email.subject, apology, replyAs);
                await this.notify(email, apology, 'error');
            }
            return 'failed';
        } finally {
            log.info('Done');
        }
    }

    private notify(email: EmailData, reply: AIReply, assistantName: string): Promise<boolean> {
        return this.notifier.notify(email, reply, assistantName, {
            filename: this.session.tempLogFilename,
            path: this.session.tempLogPath
        });
    }
}
