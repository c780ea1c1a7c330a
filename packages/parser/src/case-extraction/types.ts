import type { Value } from "../value-classifier/types";

/**
 * One row of a test table.
 */
export interface TestCase {
    readonly name: string;
    /** Expression under test, as written between its quotes */
    readonly expression: string;
    /** `undefined` when the row has no expected-value field */
    readonly expected?: Value;
}
