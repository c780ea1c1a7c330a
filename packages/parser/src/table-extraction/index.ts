export { TableExtractor } from "./extractor";
export type { ExtractionResult } from "./types";
