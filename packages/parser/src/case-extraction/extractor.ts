import type { AppLogObj, Logger } from "@casetable/logger";
import { GO_TESTING_DIALECT, type Dialect } from "../dialect";
import { labelPattern } from "../utils/regex";
import { ValueClassifier } from "../value-classifier";
import type { Value } from "../value-classifier/types";
import type { TestCase } from "./types";
import { scanValueEnd } from "./value-scanner";

/**
 * Reads the name, expression and expected value out of one test-case
 * struct literal.
 */
export class CaseExtractor {
    private readonly classifier: ValueClassifier;
    private readonly namePattern: RegExp;
    private readonly rawExpressionPattern: RegExp;
    private readonly quotedExpressionPattern: RegExp;
    private readonly expectedPattern: RegExp;
    private readonly nextLabels: string[];

    constructor(dialect: Dialect = GO_TESTING_DIALECT, classifier: ValueClassifier = new ValueClassifier(dialect)) {
        const { fields } = dialect;
        this.classifier = classifier;
        this.namePattern = new RegExp(`${labelPattern(fields.name)}"([^"]*)"`);
        this.rawExpressionPattern = new RegExp(`${labelPattern(fields.expression)}\`([^\`]*)\``);
        this.quotedExpressionPattern = new RegExp(`${labelPattern(fields.expression)}"((?:[^"\\\\]|\\\\.)*)"`);
        this.expectedPattern = new RegExp(labelPattern(fields.expected));
        this.nextLabels = [fields.name, fields.expression, fields.expected, ...fields.terminators].map(
            (label) => `${label}:`,
        );
    }

    /**
     * Extract a test case from the text of one balanced `{...}` block.
     *
     * @returns `undefined` when the block has no name or no expression.
     */
    extract(blockText: string, logger?: Logger<AppLogObj>): TestCase | undefined {
        const name = this.namePattern.exec(blockText)?.[1];
        if (name === undefined) {
            logger?.debug("Skipping case block without a name");
            return undefined;
        }

        const expression =
            this.rawExpressionPattern.exec(blockText)?.[1] ?? this.quotedExpressionPattern.exec(blockText)?.[1];
        if (expression === undefined) {
            logger?.debug("Skipping case block without an expression", { case: name });
            return undefined;
        }

        const expected = this.extractExpected(blockText, logger);
        return expected === undefined ? { name, expression } : { name, expression, expected };
    }

    /**
     * Source text of the expected-value field, trimmed and without a trailing
     * comma. `undefined` when the field is absent.
     */
    expectedText(blockText: string): string | undefined {
        const label = this.expectedPattern.exec(blockText);
        if (!label) {
            return undefined;
        }
        const start = label.index + label[0].length;
        const end = scanValueEnd(blockText, start, this.nextLabels);
        return blockText.slice(start, end).trim().replace(/,+$/, "");
    }

    private extractExpected(blockText: string, logger?: Logger<AppLogObj>): Value | undefined {
        const text = this.expectedText(blockText);
        return text === undefined ? undefined : this.classifier.classify(text, logger);
    }
}
