import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger, type LogSink } from '../utils/logger';
import { ConfigError, describeError } from '../utils/ErrorHandler';
import { DEFAULT_INTERNET_PROBE_URL } from '../core/enhancer/PromptEnhancer';

export const CONFIG_FILE_NAME = 'responder.config.yaml';

export const ResponderConfigSchema = z.object({
    logFile: z.string().min(1),
    rawEmailLog: z.string().min(1),
    tempLogDir: z.string().min(1),
    defaultAssistant: z.string().min(1),
    apiUrl: z.string({ required_error: 'apiUrl is not configured' }).url(),
    // Seconds, forwarded to the AI endpoint as its `timeout` parameter.
    apiTimeout: z.coerce.number().int().positive(),
    discordWebhookUrl: z.string().url().optional(),
    assistantsPath: z.string().min(1),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    internetProbeUrl: z.string().url()
});

export type ResponderConfig = z.infer<typeof ResponderConfigSchema>;

// Keys holding file system paths; relative values resolve against the config file's directory.
const PATH_KEYS = ['logFile', 'rawEmailLog', 'tempLogDir', 'assistantsPath'] as const;

const ENV_KEYS: Record<string, keyof ResponderConfig> = {
    RESPONDER_API_URL: 'apiUrl',
    RESPONDER_API_TIMEOUT: 'apiTimeout',
    DISCORD_WEBHOOK_URL: 'discordWebhookUrl',
    LOG_LEVEL: 'logLevel',
    RESPONDER_DEFAULT_ASSISTANT: 'defaultAssistant'
};

export interface ConfigManagerOptions {
    /** Explicit config file; skips the working-directory and home lookups */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    /** Defaults to ~/.inbox-responder */
    dataHome?: string;
    logger?: LogSink;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
    private readonly configPath: string | undefined;
    private readonly dataHome: string;
    private readonly config: ResponderConfig;

    constructor(options: ConfigManagerOptions = {}) {
        const env = options.env ?? process.env;
        const cwd = options.cwd ?? process.cwd();
        const sink = options.logger ?? logger;

        this.dataHome = options.dataHome || env.RESPONDER_DATA_DIR || path.join(os.homedir(), '.inbox-responder');

        const localPath = path.resolve(cwd, CONFIG_FILE_NAME);
        const globalPath = path.join(this.dataHome, CONFIG_FILE_NAME);

        // custom > local > global
        if (options.configPath) {
            this.configPath = path.resolve(cwd, options.configPath);
            if (!fs.existsSync(this.configPath)) {
                throw new ConfigError(`Configuration file not found at ${this.configPath}`);
            }
        } else {
            this.configPath = [localPath, globalPath].find(candidate => fs.existsSync(candidate));
        }

        if (this.configPath) {
            sink.info(`ConfigManager: Config path set to ${this.configPath}`);
        } else {
            sink.info(`ConfigManager: No ${CONFIG_FILE_NAME} found, using defaults and environment`);
        }

        this.config = this.loadConfig(env);
    }

    private loadConfig(env: NodeJS.ProcessEnv): ResponderConfig {
        const baseDir = this.configPath ? path.dirname(this.configPath) : this.dataHome;
        const fileConfig = this.configPath ? this.readFile(this.configPath) : {};

        for (const key of PATH_KEYS) {
            const value = fileConfig[key];
            if (typeof value === 'string' && value.length > 0) {
                fileConfig[key] = path.resolve(baseDir, value);
            }
        }

        // Environment variables win over the file; empty values are ignored.
        const envConfig: Record<string, unknown> = {};
        for (const [name, key] of Object.entries(ENV_KEYS)) {
            const value = env[name];
            if (value !== undefined && value !== '') envConfig[key] = value;
        }

        const merged = {
            ...this.getDefaultConfig(baseDir),
            ...fileConfig,
            ...envConfig
        };

        const parsed = ResponderConfigSchema.safeParse(merged);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid configuration: ${issues}`);
        }
        return parsed.data;
    }

    private readFile(filePath: string): Record<string, unknown> {
        let document: unknown;
        try {
            document = yaml.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (error) {
            throw new ConfigError(`Error loading config from ${filePath}: ${describeError(error)}`, { cause: error });
        }
        if (document === null || document === undefined) return {};
        if (!isRecord(document)) {
            throw new ConfigError(`Config file ${filePath} must contain a mapping`);
        }
        return { ...document };
    }

    private getDefaultConfig(baseDir: string): Partial<ResponderConfig> {
        return {
            logFile: path.join(this.dataHome, 'logs', 'responder.log'),
            rawEmailLog: path.join(this.dataHome, 'logs', 'raw_emails.log'),
            tempLogDir: path.join(os.tmpdir(), 'inbox-responder'),
            defaultAssistant: 'default',
            apiTimeout: 30,
            assistantsPath: path.join(baseDir, 'assistants.json'),
            logLevel: 'info',
            internetProbeUrl: DEFAULT_INTERNET_PROBE_URL
        };
    }

    public get<K extends keyof ResponderConfig>(key: K): ResponderConfig[K] {
        return this.config[key];
    }

    public getAll(): ResponderConfig {
        return { ...this.config };
    }

    public getConfigPath(): string | undefined {
        return this.configPath;
    }

    public getDataHome(): string {
        return this.dataHome;
    }
}
