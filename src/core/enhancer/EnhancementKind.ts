/**
 * Catalog of host telemetry an assistant prompt can be enriched with.
 * The tuple order is the order "all" expands to.
 */
export const ENHANCEMENT_KINDS = [
    'time',
    'system',
    'network',
    'locale',
    'timezone',
    'performance',
    'hardware',
    'users',
    'network_traffic',
    'ports',
    'processes',
    'filesystem',
    'services'
] as const;

export type EnhancementKind = typeof ENHANCEMENT_KINDS[number];

/** Expands to the whole catalog. */
export const ALL_ENHANCEMENTS = 'all';

/**
 * What an assistant asks for: the "all" sentinel or an ordered token list.
 * Tokens stay plain strings because they come straight from configuration;
 * unknown ones are skipped when the prompt is assembled.
 */
export type EnhancementSelection = typeof ALL_ENHANCEMENTS | readonly string[];

export function isEnhancementKind(token: string): token is EnhancementKind {
    return ENHANCEMENT_KINDS.some(kind => kind === token);
}
