export {
    BRACES,
    PARENS,
    findBalancedBlock,
    innerText,
    siblingBlocks,
    type DelimiterPair,
    type Span,
} from "./brace-matcher";
export { CaseExtractor, scanValueEnd, type TestCase } from "./case-extraction";
export { GO_TESTING_DIALECT, resolveDialect, type Dialect, type DialectOverrides, type FieldLabels } from "./dialect";
export {
    caseToJson,
    countCases,
    formatFixture,
    toFixtureDocument,
    valueToJson,
    type CaseCounts,
    type FixtureCase,
    type FixtureDocument,
    type JsonValue,
} from "./serialization";
export { TableExtractor, type ExtractionResult } from "./table-extraction";
export { ValueClassifier, type TemporalKind, type CompositeKind, type Value } from "./value-classifier";
