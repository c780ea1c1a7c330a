import type { UserErrorMessage } from "./types";

export const ReadErrors = {
	PATH_NOT_FOUND: ["Path does not exist"],
	NOT_A_FILE: ["Path is not a regular file"],
	PERMISSION_DENIED: ["Permission denied"],
	FILE_TOO_LARGE: ["File exceeds the configured size limit"],
	UNEXPECTED_ERROR: ["Unexpected error reading file"],
} as const satisfies Record<string, UserErrorMessage>;
