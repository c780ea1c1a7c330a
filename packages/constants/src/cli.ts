export const CLIErrors = {
	MISSING_SUBCOMMAND:
		"Missing subcommand. Usage: casetable extract <input...> [--output <path>]",
	MISSING_INPUT: "Missing input file. Usage: casetable extract <input...>",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	INVALID_CONFIG: (path: string, detail: string) =>
		`Invalid config file ${path}: ${detail}`,
	CONFIG_PARSE_ERROR: (path: string) =>
		`Invalid config file: parse error at ${path}`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Extract table-driven test cases from Go test files into JSON fixtures",
	EXTRACT: "Extract test tables from one or more Go test files",
} as const;
