import type { UserErrorMessage } from "./types";

/**
 * Pipeline execution phases.
 */
export enum PipelinePhase {
	READ = "read",
	WRITE = "write",
}

export const PipelineErrors = {
	READ_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Failed to read "${file}"`,
		message,
	],
	NO_TESTS: (file: string): UserErrorMessage => [
		`No table-driven tests found in "${file}"`,
	],
	WRITE_FAILURE: (file: string, message: string): UserErrorMessage => [
		`Failed to write "${file}"`,
		message,
	],
} as const;
