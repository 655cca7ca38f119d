import fs from 'fs';
import { z } from 'zod';
import { logger, type LogSink } from '../utils/logger';
import { ConfigError, describeError } from '../utils/ErrorHandler';
import { ALL_ENHANCEMENTS } from '../core/enhancer/EnhancementKind';

export const DEFAULT_ASSISTANT = 'default';

export const EmailSettingsSchema = z.object({
    sender: z.string().email(),
    smtpServer: z.string().min(1).default('localhost'),
    smtpPort: z.number().int().positive().default(587),
    smtpUser: z.string().default(''),
    smtpPassword: z.string().default('')
});

export const AssistantSchema = z.object({
    prompt: z.string().default('Reply to the following prompt:'),
    enhancePrompt: z.boolean().default(false),
    enhancements: z.union([z.literal(ALL_ENHANCEMENTS), z.array(z.string())]).default([]),
    displayName: z.string().min(1).optional(),
    accentColor: z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #rrggbb color').optional(),
    signature: z.string().optional(),
    email: EmailSettingsSchema
});

const AssistantsFileSchema = z
    .record(z.string(), AssistantSchema)
    .refine(entries => Object.prototype.hasOwnProperty.call(entries, DEFAULT_ASSISTANT), {
        message: `an assistant named "${DEFAULT_ASSISTANT}" is required`
    });

export type EmailSettings = z.infer<typeof EmailSettingsSchema>;
export type AssistantConfig = z.infer<typeof AssistantSchema>;

/** An assistant entry together with the name it was requested under. */
export interface ResolvedAssistant extends AssistantConfig {
    name: string;
}

export class AssistantRegistry {
    private readonly assistants: Map<string, AssistantConfig>;

    private constructor(assistants: Map<string, AssistantConfig>, private readonly sink: LogSink) {
        this.assistants = assistants;
    }

    public static fromObject(data: unknown, sink: LogSink = logger): AssistantRegistry {
        const parsed = AssistantsFileSchema.safeParse(data);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid assistants configuration: ${issues}`);
        }
        return new AssistantRegistry(new Map(Object.entries(parsed.data)), sink);
    }

    public static load(filePath: string, sink: LogSink = logger): AssistantRegistry {
        if (!fs.existsSync(filePath)) {
            throw new ConfigError(`Assistants configuration file not found at ${filePath}`);
        }
        let data: unknown;
        try {
            data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (error) {
            throw new ConfigError(`Error reading ${filePath}: ${describeError(error)}`, { cause: error });
        }
        return AssistantRegistry.fromObject(data, sink);
    }

    /** Names in file order, `default` included. */
    public names(): string[] {
        return [...this.assistants.keys()];
    }

    public has(name: string): boolean {
        return this.assistants.has(name);
    }

    /**
     * The named assistant, or the `default` entry under the requested name
     * when no such assistant is configured.
     */
    public resolve(name: string): ResolvedAssistant {
        const entry = this.assistants.get(name);
        if (entry) return { ...entry, name };

        this.sink.info(`Assistant ${name} not found, using default`);
        return { ...this.getDefault(), name };
    }

    public getDefault(): AssistantConfig {
        const entry = this.assistants.get(DEFAULT_ASSISTANT);
        if (!entry) {
            throw new ConfigError(`No "${DEFAULT_ASSISTANT}" assistant configured`);
        }
        return entry;
    }

    /** Lower-cased sender addresses of every configured assistant. */
    public senderAddresses(): string[] {
        return [...this.assistants.values()].map(assistant => assistant.email.sender.toLowerCase());
    }
}
