import { BRACES, type DelimiterPair, type Span } from "./types";

/**
 * Finds the first balanced block opening at or after `searchStart`.
 *
 * Depth goes up on every opener and down on every closer until it returns to
 * zero. Delimiters inside string or raw-string literals are counted like any
 * other character, so a literal `{` inside a quoted value shifts the match.
 *
 * @returns The span from the opener through its matching closer, or
 * `undefined` when there is no opener or the text ends before depth returns
 * to zero.
 */
export function findBalancedBlock(
    text: string,
    searchStart: number,
    pair: DelimiterPair = BRACES,
): Span | undefined {
    const start = text.indexOf(pair.open, Math.max(0, searchStart));
    if (start === -1) {
        return undefined;
    }

    let depth = 0;
    for (let pos = start; pos < text.length; pos++) {
        const ch = text[pos];
        if (ch === pair.open) {
            depth++;
        } else if (ch === pair.close) {
            depth--;
            if (depth === 0) {
                return { start, end: pos + 1 };
            }
        }
    }

    return undefined;
}

/**
 * Text strictly between the delimiters of a matched span.
 */
export function innerText(text: string, span: Span): string {
    return text.slice(span.start + 1, span.end - 1);
}

/**
 * Enumerates sibling top-level blocks inside `text`, in order.
 * Stops at the first unbalanced block.
 */
export function* siblingBlocks(text: string, pair: DelimiterPair = BRACES): Generator<Span> {
    let cursor = 0;
    while (cursor < text.length) {
        const span = findBalancedBlock(text, cursor, pair);
        if (!span) {
            return;
        }
        yield span;
        cursor = span.end;
    }
}
