import type { TestCase } from "../case-extraction/types";
import type { ExtractionResult } from "../table-extraction/types";
import type { Value } from "../value-classifier/types";
import type { CaseCounts, FixtureCase, FixtureDocument, JsonValue } from "./types";

const TEMPORAL_TYPES = { datetime: "DateTime", date: "Date", time: "Time" } as const;
const COMPOSITE_TYPES = { interval: "Interval", list: "List", tuple: "Tuple" } as const;

/**
 * JSON form of a value: primitives stay primitives, tagged kinds become
 * objects with a `type` discriminator, opaque text becomes `{ raw }`.
 */
export function valueToJson(value: Value): JsonValue {
    switch (value.kind) {
        case "null":
            return null;
        case "integer":
        case "float":
        case "boolean":
        case "string":
            return value.value;
        case "long":
            return { type: "Long", value: value.value };
        case "decimal":
            return { type: "Decimal", value: value.value };
        case "quantity":
            return { type: "Quantity", value: value.value, unit: value.unit };
        case "datetime":
        case "date":
        case "time":
            return { type: TEMPORAL_TYPES[value.kind], args: value.args, precision: value.precision };
        case "interval":
        case "list":
        case "tuple":
            return { type: COMPOSITE_TYPES[value.kind], raw: value.raw };
        case "opaque":
            return { raw: value.raw };
    }
}

/**
 * A missing expectation serialises as `null`, the same as a `nil` one.
 */
export function caseToJson(testCase: TestCase): FixtureCase {
    return {
        name: testCase.name,
        cql: testCase.expression,
        expected: testCase.expected ? valueToJson(testCase.expected) : null,
    };
}

export function toFixtureDocument(result: ExtractionResult): FixtureDocument {
    const functions: Record<string, FixtureCase[]> = {};
    for (const [name, cases] of result.functions) {
        functions[name] = cases.map(caseToJson);
    }
    return { source: result.sourceName, functions };
}

export function countCases(result: ExtractionResult): CaseCounts {
    let tests = 0;
    for (const cases of result.functions.values()) {
        tests += cases.length;
    }
    return { tests, functions: result.functions.size };
}

const INDENT = "  ";

/**
 * Pretty-printed JSON text of one or more documents. Layout matches
 * `JSON.stringify(document, null, 2)`; integers are written exactly and
 * floats always carry a fraction or exponent.
 */
export function formatFixture(document: FixtureDocument | FixtureDocument[]): string {
    return writeJson(document, 0);
}

function writeJson(value: unknown, depth: number): string {
    if (typeof value === "bigint") {
        return value.toString();
    }
    if (typeof value === "number") {
        return formatFloat(value);
    }
    if (typeof value === "string") {
        return JSON.stringify(value);
    }
    if (typeof value === "boolean") {
        return value ? "true" : "false";
    }

    const inner = INDENT.repeat(depth + 1);
    const outer = INDENT.repeat(depth);
    if (Array.isArray(value)) {
        if (value.length === 0) {
            return "[]";
        }
        const items = value.map((item: unknown) => `${inner}${writeJson(item, depth + 1)}`);
        return `[\n${items.join(",\n")}\n${outer}]`;
    }
    if (typeof value === "object" && value !== null) {
        const entries: [string, unknown][] = Object.entries(value).filter(([, item]) => item !== undefined);
        if (entries.length === 0) {
            return "{}";
        }
        const members = entries.map(([key, item]) => `${inner}${JSON.stringify(key)}: ${writeJson(item, depth + 1)}`);
        return `{\n${members.join(",\n")}\n${outer}}`;
    }
    return "null";
}

/**
 * `2` becomes `2.0`; non-finite values have no JSON spelling and become `null`.
 */
function formatFloat(value: number): string {
    if (!Number.isFinite(value)) {
        return "null";
    }
    if (Object.is(value, -0)) {
        return "-0.0";
    }
    const text = String(value);
    return Number.isInteger(value) && !text.includes("e") ? `${text}.0` : text;
}
