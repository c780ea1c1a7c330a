import type { Logger, AppLogObj } from "@casetable/logger";
import type { CaseCounts, Dialect, ExtractionResult, FixtureDocument } from "@casetable/parser";
import type { PipelinePhase, UserErrorMessage } from "@casetable/constants";

/**
 * Configuration for pipeline execution.
 */
export interface PipelineConfig {
    /**
     * Go test files to extract.
     */
    paths: string[];
    /**
     * Max file size in MB.
     * Defaults to 10
     */
    maxFileSizeMb?: number;
    /**
     * Surface conventions of the test source.
     * Defaults to the Go `testing` dialect.
     */
    dialect?: Dialect;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
    maxFileSizeMb: 10,
} as const;

/**
 * Result for a single extracted file.
 */
export interface ExtractedFile {
    /**
     * Path as given on input.
     */
    path: string;
    result: ExtractionResult;
    /**
     * JSON-ready fixture document.
     */
    document: FixtureDocument;
    counts: CaseCounts;
}

/**
 * Aggregated statistics for pipeline run.
 */
export interface PipelineStats {
    /**
     * Files successfully read.
     */
    filesRead: number;
    /**
     * Test functions with at least one case, across all files.
     */
    functionsExtracted: number;
    /**
     * Test cases across all files.
     */
    testsExtracted: number;
    /**
     * Total errors encountered.
     */
    errorsCount: number;
}

/**
 * Error collected during a run. The run goes on with the next file.
 */
export interface PipelineError {
    phase: PipelinePhase;
    path: string;
    message: string;
    code: string;
    userMessage: UserErrorMessage;
}

export interface PipelineResult {
    files: ExtractedFile[];
    errors: PipelineError[];
    stats: PipelineStats;
}

/**
 * Anything the CLI can run. {@link ExtractPipeline} is the real one; tests
 * substitute fakes.
 */
export interface Pipeline {
    run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult>;
}
