import type { TestCase } from "../case-extraction/types";

/**
 * Everything extracted from one source file.
 */
export interface ExtractionResult {
    /** File name the source was read from */
    sourceName: string;
    /** Test function name to its cases, in declaration order */
    functions: Map<string, TestCase[]>;
}
