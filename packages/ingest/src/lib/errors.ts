/**
 * Raised when an input cannot be read as a USLM document. Fatal for the
 * whole run; no partial results accompany it.
 */
export class DocumentLoadError extends Error {
	readonly code = "DocumentLoadFailure";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DocumentLoadError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
