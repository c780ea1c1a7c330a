export { GO_TESTING_DIALECT, resolveDialect } from "./dialect";
export type { Dialect, DialectOverrides, FieldLabels } from "./types";
