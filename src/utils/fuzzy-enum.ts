/**
 * Fuzzy Enum Matching Utilities
 *
 * Provides 3-tier fuzzy matching for tool actions:
 * 1. Exact match (case-insensitive)
 * 2. Alias match (synonym mapping)
 * 3. Levenshtein distance (auto-correct typos)
 *
 * Returns guiding errors with suggestions when no match is found.
 * Request enums (length, strictness) only get suggestions, never auto-correction.
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface MatchResult<T extends string> {
    matched: T;
    exact: boolean;
    similarity: number;
}

export interface GuidingError {
    error: 'invalid_action' | 'validation_error';
    input: string;
    suggestions: Array<{ value: string; similarity: number }>;
    message: string;
}

export type MatchOutcome<T extends string> = MatchResult<T> | GuidingError;

export function isGuidingError(result: unknown): result is GuidingError {
    return (
        typeof result === 'object' &&
        result !== null &&
        'error' in result &&
        typeof result.error === 'string' &&
        'suggestions' in result &&
        Array.isArray(result.suggestions)
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// LEVENSHTEIN DISTANCE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshtein(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    const matrix: number[][] = [];

    for (let i = 0; i <= a.length; i++) {
        matrix[i] = [i];
    }
    for (let j = 0; j <= b.length; j++) {
        matrix[0][j] = j;
    }

    for (let i = 1; i <= a.length; i++) {
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            matrix[i][j] = Math.min(
                matrix[i - 1][j] + 1,      // deletion
                matrix[i][j - 1] + 1,      // insertion
                matrix[i - 1][j - 1] + cost // substitution
            );
        }
    }

    return matrix[a.length][b.length];
}

/**
 * Calculate similarity score (0-1) between two strings
 */
export function similarity(a: string, b: string): number {
    const distance = levenshtein(a.toLowerCase(), b.toLowerCase());
    const maxLength = Math.max(a.length, b.length);
    if (maxLength === 0) return 1;
    return 1 - distance / maxLength;
}

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZE INPUT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Normalize input for matching:
 * - Lowercase
 * - Trim whitespace
 * - Replace hyphens/spaces with underscores
 */
export function normalizeInput(input: string): string {
    return input
        .toLowerCase()
        .trim()
        .replace(/[-\s]+/g, '_');
}

// ═══════════════════════════════════════════════════════════════════════════
// SUGGESTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Valid values ordered by similarity to the input, best first.
 * Ties keep the order of `values`.
 *
 * @example
 * rankSuggestions('standrd', ['short', 'standard', 'long'], 1); // ['standard']
 */
export function rankSuggestions(input: string, values: readonly string[], limit: number = 3): string[] {
    return values
        .map((value, index) => ({ value, index, score: similarity(input, value) }))
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, limit)
        .map(s => s.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// THREE-TIER ACTION MATCHING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Match an input against valid actions with 3-tier fuzzy matching
 *
 * @param input - User input to match
 * @param validActions - Array of valid action strings
 * @param aliases - Optional map of alias -> canonical action
 * @param threshold - Minimum similarity for fuzzy match (default: 0.6)
 * @returns MatchResult on success, GuidingError on failure
 *
 * @example
 * const actions = ['select', 'replace_mage', 'validate', 'catalog', 'story'] as const;
 * const aliases = { generate: 'select', check: 'validate' };
 *
 * matchAction('generate', actions, aliases); // { matched: 'select', exact: false, similarity: 0.95 }
 * matchAction('catalg', actions, aliases);   // { matched: 'catalog', exact: false, similarity: 0.86 }
 * matchAction('xyz', actions, aliases);      // GuidingError with suggestions
 */
export function matchAction<T extends string>(
    input: string,
    validActions: readonly T[],
    aliases?: Record<string, T>,
    threshold: number = 0.6
): MatchOutcome<T> {
    const normalized = normalizeInput(input);

    // ─────────────────────────────────────────────────────────────────────────
    // TIER 1: Exact match (case-insensitive)
    // ─────────────────────────────────────────────────────────────────────────
    const exactMatch = validActions.find(
        action => action.toLowerCase() === normalized
    );
    if (exactMatch) {
        return { matched: exactMatch, exact: true, similarity: 1.0 };
    }

    // ─────────────────────────────────────────────────────────────────────────
    // TIER 2: Alias match
    // ─────────────────────────────────────────────────────────────────────────
    if (aliases) {
        const aliasMatch = aliases[normalized];
        if (aliasMatch && validActions.includes(aliasMatch)) {
            return { matched: aliasMatch, exact: false, similarity: 0.95 };
        }
    }

    // ─────────────────────────────────────────────────────────────────────────
    // TIER 3: Fuzzy match (Levenshtein distance)
    // ─────────────────────────────────────────────────────────────────────────
    const scored = validActions.map(action => ({
        action,
        similarity: similarity(normalized, action)
    }));

    scored.sort((a, b) => b.similarity - a.similarity);
    const best = scored[0];

    if (best && best.similarity >= threshold) {
        return {
            matched: best.action,
            exact: false,
            similarity: best.similarity
        };
    }

    // ─────────────────────────────────────────────────────────────────────────
    // NO MATCH: Return guiding error with suggestions
    // ─────────────────────────────────────────────────────────────────────────
    const topSuggestions = scored.slice(0, 3).map(s => ({
        value: s.action,
        similarity: Math.round(s.similarity * 100)
    }));

    return {
        error: 'invalid_action',
        input,
        suggestions: topSuggestions,
        message: `Unknown action "${input}". Did you mean: ${
            topSuggestions.map(s => `"${s.value}" (${s.similarity}%)`).join(', ')
        }?`
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMAT GUIDING ERROR FOR MCP RESPONSE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a guiding error as an MCP tool response
 */
export function formatGuidingError(error: GuidingError): {
    content: Array<{ type: 'text'; text: string }>;
    isError: boolean;
} {
    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                error: error.error,
                message: error.message,
                input: error.input,
                suggestions: error.suggestions,
                hint: 'Try one of the suggested values above'
            }, null, 2)
        }],
        isError: true
    };
}
