/**
 * User-facing error lines: a headline followed by optional detail lines.
 */
export type UserErrorMessage = readonly string[];
