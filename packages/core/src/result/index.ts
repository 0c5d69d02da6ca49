export {
	ERROR_CODES,
	type ErrorCode,
	PolyFrameError,
	TableShapeError,
	toError,
} from "./errors";
export { Err, flatMapResult, mapResult, Ok, type Result, unwrapOrThrow } from "./result";
