import { readFile, stat } from "node:fs/promises";
import { basename } from "node:path";
import { PipelineErrors, PipelinePhase, ReadErrors, type UserErrorMessage } from "@casetable/constants";
import type { AppLogObj, Logger } from "@casetable/logger";
import { GO_TESTING_DIALECT, TableExtractor, countCases, toFixtureDocument } from "@casetable/parser";
import {
    DEFAULT_CONFIG,
    type ExtractedFile,
    type Pipeline,
    type PipelineConfig,
    type PipelineError,
    type PipelineResult,
} from "./types";

/**
 * Reads each input file and extracts its test tables.
 * Read failures are collected per file; extraction itself never fails.
 */
export class ExtractPipeline implements Pipeline {
    async run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult> {
        const errors: PipelineError[] = [];
        const files: ExtractedFile[] = [];
        const maxFileSizeMb = config.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb;
        const extractor = new TableExtractor(config.dialect ?? GO_TESTING_DIALECT);

        for (const path of config.paths) {
            const content = await this.read(path, maxFileSizeMb, errors);
            if (content === undefined) {
                continue;
            }

            const result = extractor.extract(content, basename(path), logger);
            const counts = countCases(result);
            if (counts.functions === 0) {
                logger.warn(PipelineErrors.NO_TESTS(path).join(": "), { file: path });
            }
            files.push({ path, result, document: toFixtureDocument(result), counts });
        }

        let functionsExtracted = 0;
        let testsExtracted = 0;
        for (const file of files) {
            functionsExtracted += file.counts.functions;
            testsExtracted += file.counts.tests;
        }

        return {
            files,
            errors,
            stats: {
                filesRead: files.length,
                functionsExtracted,
                testsExtracted,
                errorsCount: errors.length,
            },
        };
    }

    /**
     * Read one file as UTF-8 after checking it exists, is a regular file and
     * fits the size limit.
     */
    private async read(path: string, maxFileSizeMb: number, errors: PipelineError[]): Promise<string | undefined> {
        try {
            const info = await stat(path);
            if (!info.isFile()) {
                errors.push(this.readError(path, "Not a regular file", "ENOTFILE", ReadErrors.NOT_A_FILE));
                return undefined;
            }
            if (info.size / (1024 * 1024) > maxFileSizeMb) {
                errors.push(
                    this.readError(
                        path,
                        `File is ${info.size} bytes, limit is ${maxFileSizeMb} MB`,
                        "EFBIG",
                        ReadErrors.FILE_TOO_LARGE,
                    ),
                );
                return undefined;
            }
            return await readFile(path, "utf-8");
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            const code = errorCode(error);
            errors.push(this.readError(path, message, code, this.toUserMessage(code)));
            return undefined;
        }
    }

    private readError(path: string, message: string, code: string, userMessage: UserErrorMessage): PipelineError {
        return {
            phase: PipelinePhase.READ,
            path,
            message,
            code,
            userMessage: PipelineErrors.READ_FAILURE(path, userMessage.join(" ")),
        };
    }

    private toUserMessage(code: string): UserErrorMessage {
        switch (code) {
            case "ENOENT":
                return ReadErrors.PATH_NOT_FOUND;
            case "EACCES":
            case "EPERM":
                return ReadErrors.PERMISSION_DENIED;
            default:
                return ReadErrors.UNEXPECTED_ERROR;
        }
    }
}

function errorCode(error: unknown): string {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return "UNKNOWN";
}
