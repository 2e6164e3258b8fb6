export type AnalysisErrorCode =
	| "INVALID_INPUT_SHAPE"
	| "INVALID_SETTINGS"
	| "HISTORY_READ_FAILED";

/** Base class for every error the analyzer throws on purpose. */
export class AnalysisError extends Error {
	readonly code: AnalysisErrorCode;

	constructor(code: AnalysisErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "AnalysisError";
		this.code = code;
	}
}

/** The input is not a sequence of row-like records at all. */
export class InvalidInputShapeError extends AnalysisError {
	constructor(message: string) {
		super("INVALID_INPUT_SHAPE", message);
		this.name = "InvalidInputShapeError";
	}
}

export class InvalidSettingsError extends AnalysisError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super("INVALID_SETTINGS", `Invalid analysis settings: ${issues.join("; ")}`);
		this.name = "InvalidSettingsError";
		this.issues = issues;
	}
}

export class HistoryReadError extends AnalysisError {
	readonly historyPath: string;

	constructor(historyPath: string, cause: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		super("HISTORY_READ_FAILED", `Failed to read history from ${historyPath}: ${detail}`, { cause });
		this.name = "HistoryReadError";
		this.historyPath = historyPath;
	}
}
