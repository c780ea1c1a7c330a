/**
 * Opening and closing delimiter characters counted by the matcher.
 */
export interface DelimiterPair {
    open: string;
    close: string;
}

/**
 * Half-open character range within a source text.
 */
export interface Span {
    /** Offset of the opening delimiter */
    start: number;
    /** Offset one past the matching closing delimiter */
    end: number;
}

export const BRACES: DelimiterPair = { open: "{", close: "}" };

export const PARENS: DelimiterPair = { open: "(", close: ")" };
