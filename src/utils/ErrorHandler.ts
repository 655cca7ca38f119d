import { logger, type LogSink } from './logger';

/** Base class for failures raised by the responder pipeline (never by the probes). */
export class ResponderError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Configuration or assistant registry could not be loaded. */
export class ConfigError extends ResponderError {}

/** The inbound message could not be parsed into sender/subject/content. */
export class EmailParseError extends ResponderError {}

/** The AI completion request could not be made. */
export class AIRequestError extends ResponderError {}

/**
 * Turn anything thrown into a one-line message.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

export class ErrorHandler {
    /**
     * Runs `fn` once and resolves to `fallback()` if it rejects.
     * Single attempt, no retry.
     */
    public static async withFallback<T>(
        fn: () => Promise<T>,
        fallback: (error: unknown) => T | Promise<T>,
        context: string,
        sink: LogSink = logger
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            sink.error(`ERROR in ${context}: ${describeError(error)}`);
            return await fallback(error);
        }
    }
}
