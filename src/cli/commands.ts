import { ConfigManager } from '../config/ConfigManager';
import { AssistantRegistry } from '../config/AssistantRegistry';
import { SessionLog } from '../utils/SessionLog';
import { logger, type LogSink } from '../utils/logger';
import { describeError } from '../utils/ErrorHandler';
import { ResponderPipeline, type PipelineOutcome } from '../core/ResponderPipeline';
import { DEFAULT_PROMPT } from '../core/AIClient';
import { ALL_ENHANCEMENTS, ENHANCEMENT_KINDS, PromptEnhancer, type EnhancementSelection, type HostFacilities } from '../core/enhancer';

export interface GlobalOptions {
    config?: string;
    assistants?: string;
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
}

/** Handle one email read from stdin, logging to the configured files. */
export async function respond(rawEmail: string, options: GlobalOptions): Promise<PipelineOutcome> {
    const configManager = new ConfigManager({ configPath: options.config });
    const config = configManager.getAll();
    const registry = AssistantRegistry.load(options.assistants ?? config.assistantsPath);

    const session = new SessionLog({
        logFile: config.logFile,
        rawEmailLog: config.rawEmailLog,
        tempLogDir: config.tempLogDir,
        level: config.logLevel,
        console: true
    });
    session.info('Script started');
    try {
        return await new ResponderPipeline({ config, registry, session }).processEmail(rawEmail);
    } finally {
        await session.close();
    }
}

export interface ProbeCommandOptions {
    prompt?: string;
    internetProbeUrl?: string;
    host?: HostFacilities;
    logger?: LogSink;
}

/** The prompt an assistant with these enhancements would send, without any email. */
export async function probe(kinds: string[], options: ProbeCommandOptions = {}): Promise<string> {
    const selection: EnhancementSelection = kinds.length > 0 ? kinds : ALL_ENHANCEMENTS;
    const enhancer = new PromptEnhancer({
        host: options.host,
        logger: options.logger ?? logger,
        internetProbeUrl: options.internetProbeUrl
    });
    return enhancer.enhancePrompt(options.prompt ?? DEFAULT_PROMPT, selection);
}

export function listKinds(): string[] {
    return [...ENHANCEMENT_KINDS];
}

/** A stray rejection still fails the run, so a mail hook sees a non-zero exit. */
export function reportUnhandledRejection(reason: unknown, sink: LogSink = logger): void {
    sink.error(`Unhandled Promise rejection: ${describeError(reason)}`);
    process.exitCode = 1;
}
