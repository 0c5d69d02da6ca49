import { PolyFrameError } from "@polyframe/core";

/** A table could not be converted to or from Apache Arrow */
export class ArrowConversionError extends PolyFrameError {
	constructor(message: string, cause?: Error) {
		super(message, "ARROW_CONVERSION", cause);
	}
}
