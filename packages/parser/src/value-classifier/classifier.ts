import type { AppLogObj, Logger } from "@casetable/logger";
import { BRACES, PARENS, findBalancedBlock, innerText } from "../brace-matcher";
import { GO_TESTING_DIALECT, type Dialect } from "../dialect";
import { escapeRegExp } from "../utils/regex";
import type { ClassificationRule, CompositeKind, TemporalKind, Value } from "./types";

const INTEGER = /^-?\d+$/;
const DECIMAL_POINT = /^-?\d+\.\d+$/;
const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HANDLE_AND_INNER = /^\s*[A-Za-z_]\w*\s*,([\s\S]*)$/;

const TEMPORAL_KINDS: Record<string, TemporalKind> = {
    DateTime: "datetime",
    Date: "date",
    Time: "time",
};

const COMPOSITE_KINDS: Record<string, CompositeKind> = {
    Interval: "interval",
    List: "list",
    Tuple: "tuple",
};

/**
 * Classifies the source text of an expected value into a {@link Value}.
 *
 * Rules are tried in a fixed order and the first match wins; several
 * patterns overlap (`1.5` vs `float64(1.5)`, `Date` vs `DateTime`), so the
 * order is part of the contract. Text no rule recognises becomes `opaque`,
 * which makes `classify` total.
 */
export class ValueClassifier {
    private readonly dialect: Dialect;
    private readonly rules: ClassificationRule[];
    private readonly quantityPattern: RegExp;
    private readonly temporalPattern: RegExp;
    private readonly precisionPattern: RegExp;
    private readonly compositePattern: RegExp;

    constructor(dialect: Dialect = GO_TESTING_DIALECT) {
        this.dialect = dialect;

        const result = escapeRegExp(dialect.resultPackage);
        const model = escapeRegExp(dialect.modelPackage);
        this.quantityPattern = new RegExp(
            `^${result}\\.Quantity\\{\\s*Value:\\s*([^,]+?)\\s*,\\s*Unit:\\s*${model}\\.(\\w+)\\s*,?\\s*\\}$`,
        );
        this.temporalPattern = new RegExp(
            `^${result}\\.(DateTime|Date|Time)\\{\\s*Date:\\s*${escapeRegExp(dialect.dateConstructor)}\\s*(?=\\()`,
        );
        this.precisionPattern = new RegExp(`^\\s*,\\s*Precision:\\s*${model}\\.(\\w+)\\s*,?\\s*\\}$`);
        this.compositePattern = new RegExp(`^${result}\\.(Interval|List|Tuple)(?=\\{)`);

        this.rules = [
            { name: "wrapper", match: (text) => this.matchWrapper(text) },
            { name: "null", match: (text) => (text === "nil" || text === "null" ? { kind: "null" } : undefined) },
            { name: "integer", match: (text) => this.matchInteger(text) },
            { name: "long", match: (text) => this.matchLong(text) },
            {
                name: "float",
                match: (text) => (DECIMAL_POINT.test(text) ? { kind: "float", value: Number(text) } : undefined),
            },
            { name: "float-conversion", match: (text) => this.matchFloatConversion(text) },
            {
                name: "boolean",
                match: (text) => (text === "true" || text === "false" ? { kind: "boolean", value: text === "true" } : undefined),
            },
            { name: "string", match: (text) => this.matchString(text) },
            { name: "quantity", match: (text) => this.matchQuantity(text) },
            { name: "temporal", match: (text) => this.matchTemporal(text) },
            { name: "composite", match: (text) => this.matchComposite(text) },
            { name: "integer-constant", match: (text) => this.matchIntegerConstant(text) },
        ];
    }

    /**
     * Classify one expected-value expression. Never throws.
     */
    classify(exprText: string, logger?: Logger<AppLogObj>): Value {
        const text = exprText.trim();
        for (const rule of this.rules) {
            const value = rule.match(text);
            if (value) {
                logger?.debug("Classified expected value", { rule: rule.name, kind: value.kind });
                return value;
            }
        }
        logger?.debug("No rule matched expected value", { rule: "opaque", raw: text });
        return { kind: "opaque", raw: text };
    }

    /**
     * `wrapper(handle, inner)` spanning the whole text yields the
     * classification of `inner`.
     */
    private matchWrapper(text: string): Value | undefined {
        for (const wrapper of this.dialect.wrappers) {
            const args = this.callArguments(text, wrapper);
            if (args === undefined) {
                continue;
            }
            const match = HANDLE_AND_INNER.exec(args);
            if (match?.[1] !== undefined) {
                return this.classify(match[1]);
            }
        }
        return undefined;
    }

    private matchInteger(text: string): Value | undefined {
        if (!INTEGER.test(text)) {
            return undefined;
        }
        return { kind: "integer", value: BigInt(text) };
    }

    private matchLong(text: string): Value | undefined {
        const args = this.callArguments(text, this.dialect.longConstructor)?.trim();
        if (args === undefined || !INTEGER.test(args)) {
            return undefined;
        }
        return { kind: "long", value: BigInt(args) };
    }

    private matchFloatConversion(text: string): Value | undefined {
        const inner = this.callArguments(text, this.dialect.floatConstructor)?.trim();
        if (!inner) {
            return undefined;
        }
        if (NUMERIC_LITERAL.test(inner)) {
            return { kind: "float", value: Number(inner) };
        }
        return { kind: "decimal", value: inner };
    }

    private matchString(text: string): Value | undefined {
        if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
            return undefined;
        }
        return { kind: "string", value: text.slice(1, -1) };
    }

    private matchQuantity(text: string): Value | undefined {
        const match = this.quantityPattern.exec(text);
        const amount = match?.[1];
        const unit = match?.[2];
        if (amount === undefined || unit === undefined || !NUMERIC_LITERAL.test(amount)) {
            return undefined;
        }
        return { kind: "quantity", value: Number(amount), unit };
    }

    private matchTemporal(text: string): Value | undefined {
        const match = this.temporalPattern.exec(text);
        const kind = match?.[1] !== undefined ? TEMPORAL_KINDS[match[1]] : undefined;
        if (!match || !kind) {
            return undefined;
        }

        const call = findBalancedBlock(text, match[0].length, PARENS);
        if (!call) {
            return undefined;
        }

        const precision = this.precisionPattern.exec(text.slice(call.end))?.[1];
        if (precision === undefined) {
            return undefined;
        }
        return { kind, args: innerText(text, call), precision };
    }

    private matchComposite(text: string): Value | undefined {
        const match = this.compositePattern.exec(text);
        const kind = match?.[1] !== undefined ? COMPOSITE_KINDS[match[1]] : undefined;
        if (!match || !kind) {
            return undefined;
        }

        const body = findBalancedBlock(text, match[0].length, BRACES);
        if (!body || body.end !== text.length || body.end - body.start <= 2) {
            return undefined;
        }
        return { kind, raw: innerText(text, body).trim() };
    }

    private matchIntegerConstant(text: string): Value | undefined {
        const constants = this.dialect.integerConstants;
        if (!Object.hasOwn(constants, text)) {
            return undefined;
        }
        const value = constants[text];
        return value !== undefined && Number.isSafeInteger(value) ? { kind: "integer", value: BigInt(value) } : undefined;
    }

    /**
     * Text between the parentheses of `callee(...)` when that call spans the
     * whole input, otherwise `undefined`.
     */
    private callArguments(text: string, callee: string): string | undefined {
        if (!text.startsWith(`${callee}(`)) {
            return undefined;
        }
        const call = findBalancedBlock(text, callee.length, PARENS);
        if (!call || call.start !== callee.length || call.end !== text.length) {
            return undefined;
        }
        return innerText(text, call);
    }
}
