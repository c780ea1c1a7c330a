/**
 * JSON form of a classified value. Integers are `bigint` and `number` is
 * always a float, so the written text keeps the two apart.
 */
export type JsonValue =
    | null
    | bigint
    | number
    | boolean
    | string
    | { type: "Long"; value: bigint }
    | { type: "Decimal"; value: string }
    | { type: "Quantity"; value: number; unit: string }
    | { type: "DateTime" | "Date" | "Time"; args: string; precision: string }
    | { type: "Interval" | "List" | "Tuple"; raw: string }
    | { raw: string };

export interface FixtureCase {
    name: string;
    cql: string;
    expected: JsonValue;
}

/**
 * Fixture document written for one source file.
 */
export interface FixtureDocument {
    source: string;
    functions: Record<string, FixtureCase[]>;
}

export interface CaseCounts {
    tests: number;
    functions: number;
}
