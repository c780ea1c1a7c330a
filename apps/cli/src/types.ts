/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    EXTRACT = "extract",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    EXTRACT_ERROR = 1,
    CONFIG_ERROR = 2,
}

/**
 * Parsed CLI arguments.
 */
export interface ParseOptions {
    command: Command;
    inputs: string[];
    /** Output file (one input) or directory (several inputs) */
    output?: string;
    configPath?: string;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    noConfig: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";
