export enum NamesErrorCode {
	EMPTY_WORD_LIST = "EMPTY_WORD_LIST",
	INVALID_WORD = "INVALID_WORD",
	UNKNOWN_CASE_STYLE = "UNKNOWN_CASE_STYLE",
	INVALID_COUNT = "INVALID_COUNT",
	INVALID_WORD_FILE = "INVALID_WORD_FILE",
	UNEXPECTED_ARGUMENT = "UNEXPECTED_ARGUMENT",
}

export interface NamesErrorMeta {
	exitCode?: number;
}

export class NamesError extends Error {
	code: NamesErrorCode;
	suggestion?: string;
	meta?: NamesErrorMeta;

	constructor(code: NamesErrorCode, message: string, suggestion?: string, meta?: NamesErrorMeta) {
		super(message);
		this.name = "NamesError";
		this.code = code;
		this.suggestion = suggestion;
		this.meta = meta;
	}
}

export function isNamesError(error: unknown): error is NamesError {
	return error instanceof NamesError;
}

export function getErrorDetails(error: unknown): { message: string; suggestion?: string } {
	if (isNamesError(error)) {
		return { message: error.message, suggestion: error.suggestion };
	}

	return { message: error instanceof Error ? error.message : String(error) };
}
