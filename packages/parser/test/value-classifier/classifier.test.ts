import { describe, expect, it, vi } from "vitest";
import { createLogger } from "@casetable/logger";
import { findBalancedBlock } from "../../src/brace-matcher";
import { PARENS } from "../../src/brace-matcher/types";
import { resolveDialect } from "../../src/dialect";
import { ValueClassifier } from "../../src/value-classifier";

describe("ValueClassifier", () => {
    const classifier = new ValueClassifier();

    describe("Feature: Primitive Literals", () => {
        it("should classify a bare integer", () => {
            expect(classifier.classify("42")).toEqual({ kind: "integer", value: 42n });
        });

        it("should keep a bare integer beyond the safe integer range exact", () => {
            expect(classifier.classify("99999999999999999999")).toEqual({
                kind: "integer",
                value: 99999999999999999999n,
            });
        });

        it("should classify a negative integer", () => {
            expect(classifier.classify("-15")).toEqual({ kind: "integer", value: -15n });
        });

        it("should classify an int64 conversion as a long", () => {
            expect(classifier.classify("int64(-7)")).toEqual({ kind: "long", value: -7n });
        });

        it("should keep long values beyond the safe integer range exact", () => {
            expect(classifier.classify("int64(9223372036854775807)")).toEqual({
                kind: "long",
                value: 9223372036854775807n,
            });
        });

        it("should classify nil and null as null", () => {
            expect(classifier.classify("nil")).toEqual({ kind: "null" });
            expect(classifier.classify("null")).toEqual({ kind: "null" });
        });

        it("should classify a decimal-point literal as a float", () => {
            expect(classifier.classify("-2.5")).toEqual({ kind: "float", value: -2.5 });
        });

        it("should classify booleans", () => {
            expect(classifier.classify("true")).toEqual({ kind: "boolean", value: true });
            expect(classifier.classify("false")).toEqual({ kind: "boolean", value: false });
        });

        it("should strip quotes without unescaping", () => {
            expect(classifier.classify('"positive"')).toEqual({ kind: "string", value: "positive" });
            expect(classifier.classify('"a\\"b"')).toEqual({ kind: "string", value: 'a\\"b' });
        });

        it("should trim surrounding whitespace before matching", () => {
            expect(classifier.classify("  \n 42\t")).toEqual({ kind: "integer", value: 42n });
        });
    });

    describe("Feature: Float Conversions", () => {
        it("should classify a float64 literal argument as a float", () => {
            expect(classifier.classify("float64(3)")).toEqual({ kind: "float", value: 3 });
            expect(classifier.classify("float64(1e-3)")).toEqual({ kind: "float", value: 0.001 });
        });

        it("should keep a symbolic float64 argument verbatim", () => {
            expect(classifier.classify("float64(x)")).toEqual({ kind: "decimal", value: "x" });
            expect(classifier.classify("float64(math.Pi / 2)")).toEqual({ kind: "decimal", value: "math.Pi / 2" });
        });

        it("should not treat two adjacent conversions as one call", () => {
            expect(classifier.classify("float64(a) + float64(b)")).toEqual({
                kind: "opaque",
                raw: "float64(a) + float64(b)",
            });
        });
    });

    describe("Feature: Wrapper Unwrapping", () => {
        it("should classify the inner expression of a wrapper call", () => {
            expect(classifier.classify("newOrFatal(t, 3)")).toEqual({ kind: "integer", value: 3n });
        });

        it("should unwrap multi-line wrapper bodies with nested calls", () => {
            const text = "newOrFatal(t,\n\tint64(\n\t\t12))";
            expect(classifier.classify(text)).toEqual({ kind: "long", value: 12n });
        });

        it("should unwrap nested wrappers", () => {
            expect(classifier.classify("newOrFatal(t, newOrFatal(t, true))")).toEqual({
                kind: "boolean",
                value: true,
            });
        });

        it("should fall back to opaque when the wrapper call is not closed", () => {
            expect(classifier.classify("newOrFatal(t, 3")).toEqual({ kind: "opaque", raw: "newOrFatal(t, 3" });
        });
    });

    describe("Feature: Tagged Composites", () => {
        it("should classify a quantity literal", () => {
            expect(classifier.classify("result.Quantity{Value: 5, Unit: model.Centimeter}")).toEqual({
                kind: "quantity",
                value: 5,
                unit: "Centimeter",
            });
        });

        it("should not classify a quantity with a symbolic amount", () => {
            const text = "result.Quantity{Value: n, Unit: model.Centimeter}";
            expect(classifier.classify(text)).toEqual({ kind: "opaque", raw: text });
        });

        it("should classify date, datetime and time literals", () => {
            const args = "2024, time.March, 1, 0, 0, 0, 0, time.UTC";
            expect(classifier.classify(`result.Date{Date: time.Date(${args}), Precision: model.DAY}`)).toEqual({
                kind: "date",
                args,
                precision: "DAY",
            });
            expect(
                classifier.classify(`result.DateTime{Date: time.Date(${args}), Precision: model.MILLISECOND}`),
            ).toEqual({ kind: "datetime", args, precision: "MILLISECOND" });
            expect(classifier.classify(`result.Time{Date: time.Date(${args}), Precision: model.HOUR}`)).toEqual({
                kind: "time",
                args,
                precision: "HOUR",
            });
        });

        it("should keep list, interval and tuple bodies verbatim", () => {
            expect(classifier.classify("result.List{Value: []result.Value{a, b}}")).toEqual({
                kind: "list",
                raw: "Value: []result.Value{a, b}",
            });
            expect(classifier.classify("result.Interval{\n  Low: x,\n  High: y,\n}")).toEqual({
                kind: "interval",
                raw: "Low: x,\n  High: y,",
            });
            expect(classifier.classify("result.Tuple{Value: map[string]result.Value{}}")).toEqual({
                kind: "tuple",
                raw: "Value: map[string]result.Value{}",
            });
        });

        it("should fall back to opaque for an empty composite body", () => {
            expect(classifier.classify("result.List{}")).toEqual({ kind: "opaque", raw: "result.List{}" });
        });
    });

    describe("Feature: Named Constants", () => {
        it("should resolve the 32-bit integer limits", () => {
            expect(classifier.classify("math.MaxInt32")).toEqual({ kind: "integer", value: 2147483647n });
            expect(classifier.classify("math.MinInt32")).toEqual({ kind: "integer", value: -2147483648n });
        });

        it("should not resolve inherited object keys", () => {
            expect(classifier.classify("toString")).toEqual({ kind: "opaque", raw: "toString" });
        });
    });

    describe("Feature: Totality", () => {
        it.each([
            "",
            "}",
            "((((",
            "someFunc(1, 2)",
            "result.Quantity{",
            "newOrFatal()",
            "\"",
        ])("should return exactly one variant for %j", (text) => {
            const value = classifier.classify(text);
            expect(value.kind).toBe("opaque");
            expect(value).toEqual({ kind: "opaque", raw: text.trim() });
        });
    });

    describe("Feature: Priority Order", () => {
        it("should prefer the decimal-point float rule over the float conversion rule", () => {
            expect(classifier.classify("1.5")).toEqual({ kind: "float", value: 1.5 });
            expect(classifier.classify("float64(1.5)")).toEqual({ kind: "float", value: 1.5 });
        });

        it("should prefer DateTime over Date for a DateTime literal", () => {
            const value = classifier.classify(
                "result.DateTime{Date: time.Date(2024, 1, 1, 0, 0, 0, 0, time.UTC), Precision: model.YEAR}",
            );
            expect(value.kind).toBe("datetime");
        });
    });

    describe("Feature: Balanced Captures", () => {
        it("should capture temporal args that are balanced", () => {
            const value = classifier.classify(
                "result.DateTime{Date: time.Date(2024, f(1), 1, 0, 0, 0, 0, time.FixedZone(\"\", 3600)), Precision: model.SECOND}",
            );
            expect(value.kind).toBe("datetime");
            if (value.kind === "datetime") {
                expect(value.args).toBe('2024, f(1), 1, 0, 0, 0, 0, time.FixedZone("", 3600)');
                const wrapped = `(${value.args})`;
                expect(findBalancedBlock(wrapped, 0, PARENS)).toEqual({ start: 0, end: wrapped.length });
            }
        });
    });

    describe("Feature: Dialect Overrides", () => {
        it("should use configured wrapper and package names", () => {
            const custom = new ValueClassifier(
                resolveDialect({ wrappers: ["mustValue"], resultPackage: "res", modelPackage: "units" }),
            );

            expect(custom.classify("mustValue(tb, res.Quantity{Value: 2.5, Unit: units.Meter})")).toEqual({
                kind: "quantity",
                value: 2.5,
                unit: "Meter",
            });
            expect(custom.classify("newOrFatal(t, 3)")).toEqual({ kind: "opaque", raw: "newOrFatal(t, 3)" });
        });
    });

    describe("Feature: Rule Logging", () => {
        it("should log the name of the rule that matched", () => {
            const logger = createLogger("test", "silent");
            const debug = vi.spyOn(logger, "debug");

            classifier.classify("newOrFatal(t, 3)", logger);
            classifier.classify("someFunc(1, 2)", logger);

            expect(debug.mock.calls).toEqual([
                ["Classified expected value", { rule: "wrapper", kind: "integer" }],
                ["No rule matched expected value", { rule: "opaque", raw: "someFunc(1, 2)" }],
            ]);
        });
    });
});
