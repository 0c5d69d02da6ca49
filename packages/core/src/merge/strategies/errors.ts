import { PolyFrameError } from "../../result/errors";

/** Join keys could not be resolved between two tables */
export class JoinKeyError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "JOIN_KEY", cause);
	}
}

/** A row matched more rows than the join allows */
export class JoinCardinalityError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "JOIN_CARDINALITY", cause);
	}
}
