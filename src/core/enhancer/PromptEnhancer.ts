import { logger as defaultLogger } from '../../utils/logger';
import type { LogSink } from '../../utils/logger';
import { isEnhancementKind } from './EnhancementKind';
import type { EnhancementSelection } from './EnhancementKind';
import { resolveEnhancements } from './SelectionPolicy';
import { renderEnhancement } from './PromptRenderer';
import { collectEnhancement, PROBES } from './probes';
import type { ProbeCatalog, ProbeContext } from './probes';
import { createNodeHost } from './HostFacilities';
import type { HostFacilities } from './HostFacilities';

export const TELEMETRY_HEADER = 'Here is real-time information you can use if relevant:';
export const EMAIL_TRAILER = 'The email is:';
export const DEFAULT_INTERNET_PROBE_URL = 'https://www.google.com';

export interface PromptEnhancerOptions {
    host?: HostFacilities;
    logger?: LogSink;
    internetProbeUrl?: string;
    /** Replaces the built-in probes; tests use this to stub individual kinds. */
    catalog?: ProbeCatalog;
}

/**
 * Place rendered telemetry between the base prompt and the marker after which
 * the caller appends the email. No lines, no change.
 */
export function assemblePrompt(basePrompt: string, lines: readonly string[]): string {
    if (lines.length === 0) return basePrompt;
    return `${basePrompt}\n\n${TELEMETRY_HEADER}\n${lines.join('\n')}\n\n${EMAIL_TRAILER}`;
}

/**
 * Enriches assistant prompts with live host telemetry.
 *
 * Probes run one after another in the requested order. Nothing here rejects:
 * a failing probe only costs its own section.
 */
export class PromptEnhancer {
    private readonly ctx: ProbeContext;
    private readonly catalog: ProbeCatalog;

    constructor(options: PromptEnhancerOptions = {}) {
        this.ctx = {
            host: options.host ?? createNodeHost(),
            logger: options.logger ?? defaultLogger,
            internetProbeUrl: options.internetProbeUrl ?? DEFAULT_INTERNET_PROBE_URL
        };
        this.catalog = options.catalog ?? PROBES;
    }

    public async collectLines(selection: EnhancementSelection): Promise<string[]> {
        const lines: string[] = [];
        for (const token of resolveEnhancements(selection)) {
            if (!isEnhancementKind(token)) {
                this.ctx.logger.debug(`PromptEnhancer: ignoring unknown enhancement "${token}"`);
                continue;
            }
            const result = await collectEnhancement(token, this.ctx, this.catalog);
            lines.push(...renderEnhancement(token, result));
        }
        return lines;
    }

    public async enhancePrompt(basePrompt: string, selection: EnhancementSelection): Promise<string> {
        return assemblePrompt(basePrompt, await this.collectLines(selection));
    }
}
