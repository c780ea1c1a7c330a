/**
 * Escape a literal string for use inside a RegExp source.
 */
export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern source for a field label, e.g. `\bname:\s*`.
 */
export function labelPattern(label: string): string {
    return `\\b${escapeRegExp(label)}:\\s*`;
}
