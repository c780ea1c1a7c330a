export { ExtractPipeline } from "./pipeline";
export {
    DEFAULT_CONFIG,
    type ExtractedFile,
    type Pipeline,
    type PipelineConfig,
    type PipelineError,
    type PipelineResult,
    type PipelineStats,
} from "./types";
