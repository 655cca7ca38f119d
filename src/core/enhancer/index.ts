/**
 * Prompt enhancement: enriches an assistant prompt with live host telemetry.
 *
 *   EnhancementKind:  the probe catalog and the selection type
 *   SelectionPolicy:  "all" / ordered token list → tokens to run
 *   probes/:          one fail-soft probe per kind, reading through HostFacilities
 *   PromptRenderer:   probe result → text lines
 *   PromptEnhancer:   runs the above and assembles the final prompt
 */

export { ENHANCEMENT_KINDS, ALL_ENHANCEMENTS, isEnhancementKind } from './EnhancementKind';
export type { EnhancementKind, EnhancementSelection } from './EnhancementKind';
export { resolveEnhancements } from './SelectionPolicy';
export { renderEnhancement, RENDER_LIMITS } from './PromptRenderer';
export { PromptEnhancer, assemblePrompt, TELEMETRY_HEADER, EMAIL_TRAILER, DEFAULT_INTERNET_PROBE_URL } from './PromptEnhancer';
export type { PromptEnhancerOptions } from './PromptEnhancer';
export { createNodeHost } from './HostFacilities';
export type { HostFacilities, SystemFacts, FsStats } from './HostFacilities';
export { collectEnhancement, PROBES } from './probes';
export type { ProbeCatalog, ProbeContext } from './probes';
export type * from './types';
