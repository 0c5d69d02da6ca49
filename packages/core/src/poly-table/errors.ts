import { PolyFrameError } from "../result/errors";

/** No tables were supplied where at least one is required */
export class EmptyInputError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "EMPTY_INPUT", cause);
	}
}

/** Two tables were registered under the same name */
export class DuplicateNameError extends PolyFrameError {
	readonly tableName: string;

	constructor(tableName: string, cause?: Error) {
		super(`Duplicate table name "${tableName}"`, "DUPLICATE_NAME", cause);
		this.tableName = tableName;
	}
}

/** The supplied merge strategy is not a function */
export class InvalidStrategyError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_STRATEGY", cause);
	}
}

/** No table is registered under the requested name */
export class NotFoundError extends PolyFrameError {
	readonly tableName: string;

	constructor(tableName: string, cause?: Error) {
		super(`No table named "${tableName}"`, "NOT_FOUND", cause);
		this.tableName = tableName;
	}
}
