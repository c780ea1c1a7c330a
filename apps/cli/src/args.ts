import {
    Command as CommanderProgram,
    CommanderError,
} from "commander";
import { CLIDescriptions, CLIErrors } from "@casetable/constants";
import { Command, type ParseOptions } from "./types";

const VERSION = "0.1.0";

function defaultOptions(): ParseOptions {
    return {
        command: Command.EXTRACT,
        inputs: [],
        verbose: false,
        quiet: false,
        json: false,
        noConfig: false,
        help: false,
        version: false,
    };
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("casetable")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    program
        .command("extract")
        .description(CLIDescriptions.EXTRACT)
        .argument("[inputs...]", "Go test files to extract")
        .option("-o, --output <path>", "output file (one input) or directory (several inputs)")
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "report progress as JSON lines", false);

    return program;
}

/**
 * Map commander-parsed options to our ParseOptions type.
 */
function buildParseOptions(inputs: string[], opts: Record<string, unknown>): ParseOptions {
    if (opts.verbose === true && opts.quiet === true) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }
    if (inputs.length === 0) {
        throw new Error(CLIErrors.MISSING_INPUT);
    }

    return {
        ...defaultOptions(),
        inputs,
        output: typeof opts.output === "string" ? opts.output : undefined,
        configPath: typeof opts.config === "string" ? opts.config : undefined,
        noConfig: opts.config === false,
        verbose: opts.verbose === true,
        quiet: opts.quiet === true,
        json: opts.json === true,
    };
}

/**
 * Parse CLI arguments into ParseOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, missing input or subcommand
 */
export function parseArgs(args: string[]): ParseOptions {
    const program = createProgram();

    let result: ParseOptions | undefined;

    for (const cmd of program.commands) {
        if (cmd.name() !== Command.EXTRACT) continue;

        cmd.action((inputs: string[], opts: Record<string, unknown>) => {
            result = buildParseOptions(inputs, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return { ...defaultOptions(), help: true };
            }
            if (err.code === "commander.version") {
                return { ...defaultOptions(), version: true };
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}
