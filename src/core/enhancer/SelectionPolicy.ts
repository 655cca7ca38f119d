import { ALL_ENHANCEMENTS, ENHANCEMENT_KINDS, type EnhancementSelection } from './EnhancementKind';

/**
 * Resolve a selection into the ordered list of tokens to run.
 *
 * "all" (alone or anywhere in the list) wins over everything else and yields
 * the catalog order. Any other list is returned as given: duplicates repeat
 * their section and unknown tokens are left for the assembler to skip.
 */
export function resolveEnhancements(requested: EnhancementSelection): string[] {
    if (requested === ALL_ENHANCEMENTS || requested.includes(ALL_ENHANCEMENTS)) {
        return [...ENHANCEMENT_KINDS];
    }
    return [...requested];
}
