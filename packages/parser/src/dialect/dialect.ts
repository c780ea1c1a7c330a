import type { Dialect, DialectOverrides } from "./types";

/**
 * Table-driven tests written against Go's `testing` package with values from
 * a `result` package, as in:
 *
 * ```go
 * func TestArithmetic(t *testing.T) {
 *     tests := []struct {
 *         name       string
 *         cql        string
 *         wantResult result.Value
 *     }{
 *         {name: "sum", cql: "1 + 2", wantResult: newOrFatal(t, 3)},
 *     }
 * }
 * ```
 */
export const GO_TESTING_DIALECT: Dialect = {
    functionPrefix: "Test",
    harnessParameterType: "*testing.T",
    fields: {
        name: "name",
        expression: "cql",
        expected: "wantResult",
        terminators: ["wantModel"],
    },
    wrappers: ["newOrFatal"],
    resultPackage: "result",
    modelPackage: "model",
    dateConstructor: "time.Date",
    longConstructor: "int64",
    floatConstructor: "float64",
    integerConstants: {
        "math.MaxInt32": 2147483647,
        "math.MinInt32": -2147483648,
    },
};

/**
 * Merge overrides over the default dialect. Nested field labels merge
 * key by key; lists and constant tables replace the defaults.
 */
export function resolveDialect(overrides: DialectOverrides = {}, base: Dialect = GO_TESTING_DIALECT): Dialect {
    const { fields, ...rest } = overrides;
    return {
        ...base,
        ...rest,
        fields: { ...base.fields, ...fields },
    };
}
