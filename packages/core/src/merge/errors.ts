import { PolyFrameError } from "../result/errors";

/** The merge strategy threw; `cause` is the original error */
export class StrategyInvocationError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "STRATEGY_INVOCATION", cause);
	}
}

/** The merge strategy returned something other than a single table */
export class StrategyContractError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "STRATEGY_CONTRACT", cause);
	}
}
