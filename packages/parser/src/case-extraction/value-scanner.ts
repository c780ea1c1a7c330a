/**
 * Finds where a struct field's value ends.
 *
 * Parenthesis and brace depth are tracked independently. The value ends at a
 * `}` that closes the enclosing literal, or at a comma outside any nesting
 * that is followed (after whitespace) by one of `nextLabels` or by `}`.
 * Commas inside calls, composite literals, or between elements do not end it.
 *
 * @param nextLabels - Field labels including their trailing colon, e.g. `"cql:"`.
 * @returns Offset one past the last character of the value.
 */
export function scanValueEnd(text: string, start: number, nextLabels: readonly string[]): number {
    let parenDepth = 0;
    let braceDepth = 0;
    let pos = start;

    for (; pos < text.length; pos++) {
        const ch = text[pos];
        if (ch === "(") {
            parenDepth++;
        } else if (ch === ")") {
            parenDepth--;
        } else if (ch === "{") {
            braceDepth++;
        } else if (ch === "}") {
            if (braceDepth === 0) {
                break;
            }
            braceDepth--;
        } else if (ch === "," && parenDepth === 0 && braceDepth === 0) {
            const rest = text.slice(pos + 1).trimStart();
            if (rest.startsWith("}") || nextLabels.some((label) => rest.startsWith(label))) {
                break;
            }
        }
    }

    return pos;
}
