/** Base error class for all polyframe errors */
export class PolyFrameError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** A table's columns are malformed (ragged lengths, duplicate names, non-cell values) */
export class TableShapeError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "TABLE_SHAPE", cause);
	}
}

/** Structured error codes carried by every {@link PolyFrameError} subclass. */
export const ERROR_CODES = {
	EMPTY_INPUT: "EMPTY_INPUT",
	DUPLICATE_NAME: "DUPLICATE_NAME",
	INVALID_STRATEGY: "INVALID_STRATEGY",
	NOT_FOUND: "NOT_FOUND",
	STRATEGY_INVOCATION: "STRATEGY_INVOCATION",
	STRATEGY_CONTRACT: "STRATEGY_CONTRACT",
	TABLE_SHAPE: "TABLE_SHAPE",
	JOIN_KEY: "JOIN_KEY",
	JOIN_CARDINALITY: "JOIN_CARDINALITY",
	ARROW_CONVERSION: "ARROW_CONVERSION",
} as const;

/** A single error code value from {@link ERROR_CODES}. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
