import type { EnhancementKind } from '../EnhancementKind';
import type { HostFacilities } from '../HostFacilities';
import type { ProbeDataMap } from '../types';
import type { LogSink } from '../../../utils/logger';
import { describeError } from '../../../utils/ErrorHandler';

export interface ProbeContext {
    host: HostFacilities;
    logger: LogSink;
    /** URL requested once by the network probe to test connectivity */
    internetProbeUrl: string;
}

/**
 * One telemetry probe. `collect` may throw; the catalog turns a throw into an
 * absent result so that sibling probes are unaffected.
 */
export interface Probe<K extends EnhancementKind> {
    readonly kind: K;
    /** Used in diagnostics: "Error getting <label>: ..." */
    readonly label: string;
    collect(ctx: ProbeContext): Promise<ProbeDataMap[K]>;
}

/**
 * A single way of reading a value. Returning `undefined` (or throwing) passes
 * the turn to the next strategy; platform-specific strategies return
 * `undefined` on platforms they do not cover.
 */
export interface Strategy<T> {
    readonly source: string;
    read(host: HostFacilities): T | undefined | Promise<T | undefined>;
}

/**
 * Try each strategy in order and return the first value produced.
 * Resolves to `undefined` once every strategy has been exhausted.
 */
export async function firstAvailable<T>(
    what: string,
    strategies: readonly Strategy<T>[],
    ctx: ProbeContext
): Promise<T | undefined> {
    for (const strategy of strategies) {
        try {
            const value = await strategy.read(ctx.host);
            if (value !== undefined) return value;
        } catch (error) {
            ctx.logger.debug(`${what}: ${strategy.source} failed (${describeError(error)})`);
        }
    }
    ctx.logger.debug(`${what}: no source available`);
    return undefined;
}

/** Shorthand for a single-source read. */
export function attempt<T>(what: string, source: string, read: Strategy<T>['read'], ctx: ProbeContext): Promise<T | undefined> {
    return firstAvailable(what, [{ source, read }], ctx);
}

export function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/** Percentage with one decimal, the way `ps`/`df`-style tools report it. */
export function percentOf(part: number, whole: number): number {
    if (whole <= 0) return 0;
    return Math.round((part / whole) * 1000) / 10;
}

export const BYTES_PER_KB = 1024;
export const BYTES_PER_MB = 1024 ** 2;
export const BYTES_PER_GB = 1024 ** 3;

export function nonEmptyLines(output: string): string[] {
    return output.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
}

/** True when at least one field of a probe result carries data. */
export function hasData(result: object): boolean {
    return Object.values(result).some(value => value !== undefined);
}
