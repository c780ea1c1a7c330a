/**
 * Classified expected value of a test case.
 *
 * Primitive kinds carry a decoded value. Composite kinds keep their inner
 * source text verbatim for downstream re-parsing. `opaque` holds anything no
 * rule recognised.
 */
export type Value =
    | NullValue
    | IntegerValue
    | LongValue
    | FloatValue
    | DecimalValue
    | BooleanValue
    | StringValue
    | QuantityValue
    | TemporalValue
    | CompositeValue
    | OpaqueValue;

export interface NullValue {
    kind: "null";
}

/** Exact at any magnitude. */
export interface IntegerValue {
    kind: "integer";
    value: bigint;
}

export interface LongValue {
    kind: "long";
    value: bigint;
}

export interface FloatValue {
    kind: "float";
    value: number;
}

/**
 * Float conversion whose argument is not a literal (e.g. `float64(x)`).
 */
export interface DecimalValue {
    kind: "decimal";
    value: string;
}

export interface BooleanValue {
    kind: "boolean";
    value: boolean;
}

/** Quotes stripped; escape sequences left as written. */
export interface StringValue {
    kind: "string";
    value: string;
}

export interface QuantityValue {
    kind: "quantity";
    value: number;
    unit: string;
}

export type TemporalKind = "datetime" | "date" | "time";

export interface TemporalValue {
    kind: TemporalKind;
    /** Arguments of the nested date constructor, verbatim */
    args: string;
    /** Precision identifier without its package qualifier */
    precision: string;
}

export type CompositeKind = "interval" | "list" | "tuple";

export interface CompositeValue {
    kind: CompositeKind;
    /** Trimmed text between the literal's braces */
    raw: string;
}

export interface OpaqueValue {
    kind: "opaque";
    raw: string;
}

/**
 * One entry of the ordered classification table. Returns `undefined` when
 * the rule does not apply so the next rule is tried.
 */
export interface ClassificationRule {
    name: string;
    match: (text: string) => Value | undefined;
}
