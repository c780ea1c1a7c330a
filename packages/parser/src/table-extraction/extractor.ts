import type { AppLogObj, Logger } from "@casetable/logger";
import { findBalancedBlock, innerText, siblingBlocks } from "../brace-matcher";
import { CaseExtractor } from "../case-extraction";
import type { TestCase } from "../case-extraction/types";
import { GO_TESTING_DIALECT, type Dialect } from "../dialect";
import { escapeRegExp } from "../utils/regex";
import type { ExtractionResult } from "./types";

/**
 * Walks test functions and their case tables.
 *
 * A table is a local `name := []struct{...}{ {...}, {...} }` declaration in
 * the function body. Every sibling block of its literal is handed to the
 * {@link CaseExtractor}; blocks that yield nothing are dropped and the walk
 * goes on.
 */
export class TableExtractor {
    private readonly dialect: Dialect;
    private readonly caseExtractor: CaseExtractor;
    private readonly parameterSource: string;

    constructor(dialect: Dialect = GO_TESTING_DIALECT, caseExtractor: CaseExtractor = new CaseExtractor(dialect)) {
        this.dialect = dialect;
        this.caseExtractor = caseExtractor;
        this.parameterSource = `\\(\\s*\\w+\\s+${escapeRegExp(dialect.harnessParameterType)}\\s*\\)`;
    }

    /**
     * Extract every test function of a file into an {@link ExtractionResult}.
     */
    extract(source: string, sourceName: string, logger?: Logger<AppLogObj>): ExtractionResult {
        const functions = this.extractFile(source, logger);
        logger?.debug("Extracted test tables", { file: sourceName, count: functions.size });
        return { sourceName, functions };
    }

    /**
     * Map of test function name to its cases. Functions without any
     * extractable case are left out.
     */
    extractFile(source: string, logger?: Logger<AppLogObj>): Map<string, TestCase[]> {
        const functions = new Map<string, TestCase[]>();

        for (const name of this.findTestFunctions(source)) {
            if (functions.has(name)) {
                continue;
            }
            const cases = this.extractFunction(source, name, logger);
            if (cases.length > 0) {
                functions.set(name, cases);
            } else {
                logger?.debug("No test cases found", { function: name });
            }
        }

        return functions;
    }

    /**
     * Cases of one named test function, in source order. Empty when the
     * function, its table, or a balanced table literal is missing.
     */
    extractFunction(source: string, functionName: string, logger?: Logger<AppLogObj>): TestCase[] {
        const declaration = new RegExp(`\\bfunc\\s+${escapeRegExp(functionName)}\\s*${this.parameterSource}\\s*(?=\\{)`);
        const match = declaration.exec(source);
        if (!match) {
            return [];
        }

        const body = findBalancedBlock(source, match.index + match[0].length);
        if (!body) {
            logger?.warn("Unbalanced function body", { function: functionName });
            return [];
        }

        const table = this.findTable(innerText(source, body));
        if (table === undefined) {
            return [];
        }

        const cases: TestCase[] = [];
        for (const span of siblingBlocks(table)) {
            const testCase = this.caseExtractor.extract(table.slice(span.start, span.end), logger);
            if (testCase) {
                cases.push(testCase);
            }
        }
        return cases;
    }

    /**
     * Names of all test functions declared in `source`, in order.
     */
    findTestFunctions(source: string): string[] {
        const prefix = escapeRegExp(this.dialect.functionPrefix);
        const pattern = new RegExp(`\\bfunc\\s+(${prefix}\\w*)\\s*${this.parameterSource}`, "g");
        return Array.from(source.matchAll(pattern), (match) => match[1]).filter(
            (name): name is string => name !== undefined,
        );
    }

    /**
     * Contents of the first anonymous-struct slice literal declared in a
     * function body.
     */
    private findTable(body: string): string | undefined {
        const declaration = /\b\w+\s*:?=\s*\[\]struct\s*(?=\{)/.exec(body);
        if (!declaration) {
            return undefined;
        }

        const fieldList = findBalancedBlock(body, declaration.index + declaration[0].length);
        if (!fieldList || !/^\s*\{/.test(body.slice(fieldList.end))) {
            return undefined;
        }

        const literal = findBalancedBlock(body, fieldList.end);
        return literal ? innerText(body, literal) : undefined;
    }
}
