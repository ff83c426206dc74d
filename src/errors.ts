/** Failure kinds surfaced to callers. Everything else is absorbed and logged. */
export type WorkbookErrorCode =
	| "InvalidArchive"
	| "MissingPart"
	| "XmlParseError"
	| "InvalidReference"
	| "InvalidSheetIndex"
	| "NotLoaded";

/** Base class of every error thrown by this package. */
export class WorkbookError extends Error {
	readonly code: WorkbookErrorCode;

	constructor(code: WorkbookErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** The input is not a readable zip archive. */
export class InvalidArchiveError extends WorkbookError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("InvalidArchive", message, options);
	}
}

/** A structurally required part (workbook, worksheet) is absent from the package. */
export class MissingPartError extends WorkbookError {
	readonly part: string;

	constructor(part: string, message?: string) {
		super("MissingPart", message ?? `Missing package part: ${part}`);
		this.part = part;
	}
}

/** A required part holds malformed XML. */
export class XmlParseError extends WorkbookError {
	readonly part: string;

	constructor(part: string, detail: string) {
		super("XmlParseError", `Malformed XML in ${part}: ${detail}`);
		this.part = part;
	}
}

/** A cell or range reference does not match the A1 grammar. */
export class InvalidReferenceError extends WorkbookError {
	readonly reference: string;

	constructor(reference: string) {
		super("InvalidReference", `Invalid cell reference: "${reference}"`);
		this.reference = reference;
	}
}

export class InvalidSheetIndexError extends WorkbookError {
	readonly index: number;

	constructor(index: number, sheetCount: number) {
		super("InvalidSheetIndex", `Sheet index ${index} is out of range (workbook has ${sheetCount} sheets)`);
		this.index = index;
	}
}

export class NotLoadedError extends WorkbookError {
	constructor(operation: string) {
		super("NotLoaded", `Cannot ${operation}: no workbook loaded`);
	}
}

/** Type guard for errors raised by this package. */
export function isWorkbookError(error: unknown): error is WorkbookError {
	return error instanceof WorkbookError;
}
