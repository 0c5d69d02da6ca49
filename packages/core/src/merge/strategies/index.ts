export { bindRows, bindRowsStrategy } from "./bind-rows";
export { JoinCardinalityError, JoinKeyError } from "./errors";
export {
	type Combine,
	defaultMergeStrategy,
	foldStrategy,
	innerJoinStrategy,
	leftJoinStrategy,
} from "./fold";
export {
	DEFAULT_JOIN_MULTIPLE,
	DEFAULT_JOIN_SUFFIX,
	innerJoin,
	type JoinMultiple,
	type JoinOptions,
	leftJoin,
} from "./join";
export { encodeKey } from "./keys";
