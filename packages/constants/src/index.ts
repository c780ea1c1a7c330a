export type { UserErrorMessage } from "./types";
export { ReadErrors } from "./read";
export { PipelinePhase, PipelineErrors } from "./pipeline";
export { CLIErrors, CLIDescriptions } from "./cli";
