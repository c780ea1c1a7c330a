import { mkdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { ExtractedFile, Pipeline, PipelineConfig } from "@casetable/core";
import { PipelineErrors, PipelinePhase } from "@casetable/constants";
import { createLogger, createJsonLogger, type AppLogObj, type LogMode, type Logger } from "@casetable/logger";
import { formatFixture, resolveDialect } from "@casetable/parser";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG, type FileConfig } from "./config-loader";
import { ProgressReporter } from "./progress-reporter";
import { ExitCode, type OutputMode, type ParseOptions } from "./types";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
    json: "debug",
};

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;

    constructor(pipeline: Pipeline) {
        this.pipeline = pipeline;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger — ensures all errors (including arg parse) are structured
        let logger = createLogger("casetable", "info");
        let options: ParseOptions;

        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("casetable", LOG_MODE_MAP[mode])
            : createLogger("casetable", LOG_MODE_MAP[mode]);
        const reporter = new ProgressReporter(mode);

        let config: PipelineConfig;
        try {
            config = await this.buildConfig(options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const result = await this.pipeline.run(config, logger);
        for (const error of result.errors) {
            reporter.error(error);
        }
        for (const file of result.files) {
            reporter.extracted(file);
        }

        const written = await this.writeOutput(options, result.files, reporter, logger);
        if (result.files.length > 1) {
            reporter.complete(result);
        }

        return result.errors.length > 0 || !written ? ExitCode.EXTRACT_ERROR : ExitCode.SUCCESS;
    }

    /**
     * Build PipelineConfig from options and the config file.
     */
    async buildConfig(options: ParseOptions): Promise<PipelineConfig> {
        let fileConfig: FileConfig;

        if (options.noConfig) {
            fileConfig = { ...DEFAULT_CONFIG };
        } else {
            const configPath = options.configPath ?? ConfigLoader.findConfigFile();
            fileConfig = await ConfigLoader.load(configPath);
        }

        return {
            paths: options.inputs,
            maxFileSizeMb: fileConfig.maxFileSizeMb,
            dialect: resolveDialect(fileConfig.dialect),
        };
    }

    /**
     * Single input: one document to --output or stdout. Several inputs: one
     * `<name>.json` per input under the --output directory, or a JSON array
     * on stdout.
     *
     * @returns false when a write failed
     */
    private async writeOutput(
        options: ParseOptions,
        files: ExtractedFile[],
        reporter: ProgressReporter,
        logger: Logger<AppLogObj>,
    ): Promise<boolean> {
        if (files.length === 0) {
            return true;
        }

        if (!options.output) {
            const documents = files.map((file) => file.document);
            const [only] = documents;
            process.stdout.write(`${formatFixture(options.inputs.length === 1 && only ? only : documents)}\n`);
            return true;
        }

        if (options.inputs.length === 1) {
            const [file] = files;
            return file ? this.writeDocument(options.output, formatFixture(file.document), reporter, logger) : true;
        }

        const outputDir = options.output;
        try {
            await mkdir(outputDir, { recursive: true });
        } catch (error) {
            this.reportWriteFailure(outputDir, error, logger);
            return false;
        }

        let ok = true;
        for (const file of files) {
            const target = join(outputDir, `${basename(file.path, extname(file.path))}.json`);
            ok = (await this.writeDocument(target, formatFixture(file.document), reporter, logger)) && ok;
        }
        return ok;
    }

    private async writeDocument(
        path: string,
        content: string,
        reporter: ProgressReporter,
        logger: Logger<AppLogObj>,
    ): Promise<boolean> {
        try {
            await writeFile(path, `${content}\n`, "utf-8");
            reporter.written(path);
            return true;
        } catch (error) {
            this.reportWriteFailure(path, error, logger);
            return false;
        }
    }

    private reportWriteFailure(path: string, error: unknown, logger: Logger<AppLogObj>): void {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(PipelineErrors.WRITE_FAILURE(path, message).join(": "), { phase: PipelinePhase.WRITE });
    }

    private getOutputMode(options: ParseOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }
}
