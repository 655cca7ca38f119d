import { z } from 'zod';
import type { LogSink } from '../utils/logger';
import { AIRequestError, describeError } from '../utils/ErrorHandler';
import type { ResolvedAssistant } from '../config/AssistantRegistry';
import type { PromptEnhancer } from './enhancer';

/** What ends up in the reply email. */
export interface AIReply {
    message: string;
}

export interface AIClientOptions {
    apiUrl: string;
    /** Seconds; passed through to the endpoint, not enforced locally */
    timeout: number;
    logger: LogSink;
    enhancer?: PromptEnhancer;
}

const CompletionSchema = z.object({
    success: z.boolean().optional(),
    message: z.string().optional()
});

export const FALLBACK_REPLY = "Sorry, I couldn't process your request.";
export const UNSUCCESSFUL_REPLY = "Sorry, the AI couldn't process your message correctly.";

/** Base prompt used when an assistant does not define one. */
export const DEFAULT_PROMPT = 'Reply to the following prompt:';

/**
 * Client for the completion endpoint: a single GET carrying the whole
 * conversation in its `content` query parameter.
 */
export class AIClient {
    private readonly apiUrl: string;
    private readonly timeout: number;
    private readonly sink: LogSink;
    private readonly enhancer?: PromptEnhancer;

    constructor(options: AIClientOptions) {
        this.apiUrl = options.apiUrl;
        this.timeout = options.timeout;
        this.sink = options.logger;
        this.enhancer = options.enhancer;
    }

    /** The prompt sent for `content`, enriched when the assistant asks for it. */
    public async buildContent(content: string, sender: string, assistant: ResolvedAssistant): Promise<string> {
        const basePrompt = assistant.prompt || DEFAULT_PROMPT;
        const prompt = assistant.enhancePrompt && this.enhancer
            ? await this.enhancer.enhancePrompt(basePrompt, assistant.enhancements)
            : basePrompt;
        return `${prompt} Reminder: You are talking to the sender (${sender}) of this mail! ${content}`;
    }

    public async askAI(content: string, sender: string, assistant: ResolvedAssistant): Promise<Response> {
        this.sink.info(`Calling AI API for assistant: ${assistant.name}...`);

        const url = new URL(this.apiUrl);
        url.searchParams.set('content', await this.buildContent(content, sender, assistant));
        url.searchParams.set('timeout', String(this.timeout));

        let response: Response;
        try {
            response = await fetch(url);
        } catch (error) {
            this.sink.error(`ERROR in askAI: ${describeError(error)}`);
            throw new AIRequestError(`AI request failed: ${describeError(error)}`, { cause: error });
        }

        this.sink.info(`API response status: ${response.status}`);
        return response;
    }

    /** Map the endpoint's answer onto a reply; never throws. */
    public async processResponse(response: Response): Promise<AIReply> {
        try {
            if (response.status !== 200) {
                return { message: `Error communicating with the AI: ${response.status}` };
            }
            const data = CompletionSchema.parse(await response.json());
            this.sink.info('AI data received');
            if (!data.success) {
                return { message: UNSUCCESSFUL_REPLY };
            }
            return { message: data.message ?? FALLBACK_REPLY };
        } catch (error) {
            this.sink.error(`ERROR in processResponse: ${describeError(error)}`);
            return { message: `Error processing AI response: ${describeError(error)}` };
        }
    }

    public async reply(content: string, sender: string, assistant: ResolvedAssistant): Promise<AIReply> {
        return this.processResponse(await this.askAI(content, sender, assistant));
    }
}
