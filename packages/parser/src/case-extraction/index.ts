export { CaseExtractor } from "./extractor";
export { scanValueEnd } from "./value-scanner";
export type { TestCase } from "./types";
