import type { ExtractedFile, PipelineError, PipelineResult } from "@casetable/core";
import type { OutputMode } from "./types";

/**
 * Reports progress on stderr so stdout stays free for fixture JSON.
 */
export class ProgressReporter {
    private mode: OutputMode;

    constructor(mode: OutputMode = "normal") {
        this.mode = mode;
    }

    /**
     * Report the counts extracted from one file.
     */
    extracted(file: ExtractedFile): void {
        const { tests, functions } = file.counts;
        if (this.mode === "json") {
            console.error(JSON.stringify({ type: "extracted", file: file.path, tests, functions }));
        } else if (this.mode !== "quiet") {
            console.error(this.formatExtracted(file));
        }

        if (this.mode === "verbose") {
            for (const [name, cases] of file.result.functions) {
                console.error(`  ${name} — ${cases.length} tests`);
            }
        }
    }

    /**
     * Report a written output file.
     */
    written(path: string): void {
        if (this.mode === "json") {
            console.error(JSON.stringify({ type: "written", path }));
        } else if (this.mode !== "quiet") {
            console.error(`Written to ${path}`);
        }
    }

    /**
     * Display the totals of a multi-file run.
     */
    complete(result: PipelineResult): void {
        if (this.mode === "json") {
            console.error(JSON.stringify({ type: "complete", stats: result.stats }));
        } else if (this.mode !== "quiet") {
            console.error(this.formatSummary(result));
        }
    }

    /**
     * Display an error.
     */
    error(error: PipelineError): void {
        if (this.mode === "json") {
            console.error(JSON.stringify({ type: "error", error }));
        } else {
            console.error(this.formatError(error));
        }
    }

    formatExtracted(file: ExtractedFile): string {
        return `Extracted ${file.counts.tests} tests from ${file.counts.functions} functions`;
    }

    formatSummary(result: PipelineResult): string {
        const { stats } = result;
        return `Extraction complete: ${stats.filesRead} files, ${stats.functionsExtracted} functions, ${stats.testsExtracted} tests, ${stats.errorsCount} errors`;
    }

    private formatError(error: PipelineError): string {
        if (this.mode === "quiet") {
            return `[${error.phase}] ${error.path}: ${error.message}`;
        }
        const userLines = error.userMessage.join("\n  ");
        return `[${error.phase}] ${error.path}: ${userLines}\n  ${error.message}`;
    }
}
