export { caseToJson, countCases, formatFixture, toFixtureDocument, valueToJson } from "./fixture";
export type { CaseCounts, FixtureCase, FixtureDocument, JsonValue } from "./types";
