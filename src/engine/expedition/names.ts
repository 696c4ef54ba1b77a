/**
 * Collapse every whitespace run to one space and trim.
 * `\s` also matches non-breaking spaces.
 */
export function normalizeSpace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

/**
 * Identity used for collision checks and name lookups.
 * "Ember  Vance" and "ember vance" are the same character.
 */
export function nameKey(value: string): string {
    return normalizeSpace(value).toLowerCase();
}

/**
 * Split a comma-separated list, dropping blank entries.
 */
export function splitList(value: string): string[] {
    return value.split(',').map(normalizeSpace).filter(item => item.length > 0);
}
