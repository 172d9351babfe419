export type AppErrorCode =
	| "INVALID_CONFIG"
	| "STORE_READ_FAILED"
	| "STORE_CORRUPT"
	| "STORE_WRITE_FAILED"
	| "PROMPT_UNDELIVERED"
	| "UNKNOWN_REPORT"
	| "INVALID_REQUEST";

/**
 * Application-level error with a machine-readable code.
 * Used for config validation, store I/O, prompt delivery and request parsing.
 */
export class AppError extends Error {
	public readonly code: AppErrorCode;

	constructor(code: AppErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "AppError";
		this.code = code;
	}
}

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return "Internal error";
}

/** Node fs errors expose `code` ("ENOENT", "EACCES", ...) on the error object. */
export function errnoCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return undefined;
	}
	const { code } = error;
	return typeof code === "string" ? code : undefined;
}
